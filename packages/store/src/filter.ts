/**
 * @tally/store — Structural filter evaluation and ordering.
 *
 * Used by the in-process store. A storage adapter backed by a query
 * language translates the same filters instead.
 */

import type { FindOptions, RecordFilter, StoredRecord } from "./types.js";

function fieldOf(record: object, field: string): unknown {
  const value: unknown = Reflect.get(record, field);
  return value;
}

/**
 * Order two field values. `null` sorts before everything else;
 * values of different kinds are considered equal.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return -1;
  if (b === null || b === undefined) return 1;

  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  return 0;
}

function matchesCondition(value: unknown, condition: unknown): boolean {
  if (condition === null || typeof condition !== "object") {
    return value === condition;
  }

  if ("in" in condition) {
    const options = condition.in;
    return Array.isArray(options) && options.includes(value);
  }

  if ("ne" in condition) {
    return value !== condition.ne;
  }

  if (value === null || value === undefined) {
    return false;
  }

  if ("gte" in condition && condition.gte !== undefined && compareValues(value, condition.gte) < 0) {
    return false;
  }
  if ("gt" in condition && condition.gt !== undefined && compareValues(value, condition.gt) <= 0) {
    return false;
  }
  if ("lte" in condition && condition.lte !== undefined && compareValues(value, condition.lte) > 0) {
    return false;
  }
  if ("lt" in condition && condition.lt !== undefined && compareValues(value, condition.lt) >= 0) {
    return false;
  }
  return true;
}

/**
 * Check a record against every condition of a filter.
 */
export function matchesFilter<T extends StoredRecord>(
  record: T,
  filter: RecordFilter<T> | undefined,
): boolean {
  if (filter === undefined) {
    return true;
  }
  for (const field of Object.keys(filter)) {
    const condition: unknown = Reflect.get(filter, field);
    if (condition === undefined) continue;
    if (!matchesCondition(fieldOf(record, field), condition)) {
      return false;
    }
  }
  return true;
}

/**
 * Apply ordering and limit to an already-filtered list.
 */
export function applyFindOptions<T extends StoredRecord>(
  records: readonly T[],
  options: FindOptions<T> | undefined,
): T[] {
  const result = [...records];
  const orderBy = options?.orderBy ?? [];

  if (orderBy.length > 0) {
    result.sort((a, b) => {
      for (const order of orderBy) {
        const cmp = compareValues(fieldOf(a, order.field), fieldOf(b, order.field));
        if (cmp !== 0) {
          return order.direction === "desc" ? -cmp : cmp;
        }
      }
      return 0;
    });
  }

  if (options?.limit !== undefined && options.limit >= 0) {
    return result.slice(0, options.limit);
  }
  return result;
}
