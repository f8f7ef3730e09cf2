/**
 * @tally/store — Core types.
 *
 * The persistence contract the bookkeeping core consumes: typed tables
 * reached through a unit of work that commits or rolls back as a whole.
 *
 * Design principles:
 * - One unit of work per externally triggered operation
 * - Commit on success, rollback on any failure, always release
 * - Filters are structural so any storage engine can translate them
 * - Records are flat; nested data is serialized by the caller
 */

import type {
  AccountRecord,
  BusinessDocumentItemRecord,
  BusinessDocumentRecord,
  CashflowTypeRecord,
  FixedExpenseRecord,
  MonthlyReportRecord,
  SplitRecord,
  TransactionRecord,
} from "@tally/types";

// =============================================================================
// Tables
// =============================================================================

/**
 * Every table the engine persists, keyed by table name.
 */
export interface TableRecords {
  readonly accounts: AccountRecord;
  readonly transactions: TransactionRecord;
  readonly splits: SplitRecord;
  readonly cashflowTypes: CashflowTypeRecord;
  readonly documents: BusinessDocumentRecord;
  readonly documentItems: BusinessDocumentItemRecord;
  readonly fixedExpenses: FixedExpenseRecord;
  readonly monthlyReports: MonthlyReportRecord;
}

export type TableName = keyof TableRecords;

export const TABLE_NAMES: readonly TableName[] = [
  "accounts",
  "transactions",
  "splits",
  "cashflowTypes",
  "documents",
  "documentItems",
  "fixedExpenses",
  "monthlyReports",
];

/** Anything stored in a table has a string primary key. */
export interface StoredRecord {
  readonly id: string;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Condition on one field.
 *
 * - A bare value: equality
 * - `{ in }`: membership
 * - `{ ne }`: inequality
 * - `{ gte, gt, lte, lt }`: range (strings compare lexicographically,
 *   which orders ISO dates correctly)
 */
export type FieldCondition<V> =
  | V
  | { readonly in: readonly V[] }
  | { readonly ne: V }
  | {
      readonly gte?: V;
      readonly gt?: V;
      readonly lte?: V;
      readonly lt?: V;
    };

/** All conditions must hold (logical AND). */
export type RecordFilter<T> = {
  readonly [K in keyof T]?: FieldCondition<T[K]>;
};

export interface OrderBy<T> {
  readonly field: keyof T & string;
  readonly direction?: "asc" | "desc";
}

export interface FindOptions<T> {
  readonly orderBy?: readonly OrderBy<T>[];
  readonly limit?: number;
}

/** Fields that may be changed after insert. Keys set to `undefined` are rejected. */
export type RecordPatch<T> = {
  readonly [K in Exclude<keyof T, "id">]?: T[K];
};

/**
 * Typed access to one table inside a unit of work.
 */
export interface Table<T extends StoredRecord> {
  get(id: string): Promise<T | undefined>;

  /** Records for the ids that exist, in the order requested. */
  getMany(ids: readonly string[]): Promise<readonly T[]>;

  find(filter?: RecordFilter<T>, options?: FindOptions<T>): Promise<readonly T[]>;

  count(filter?: RecordFilter<T>): Promise<number>;

  /** Throws StoreError("DUPLICATE_ID") if the id is taken. */
  insert(record: T): Promise<T>;

  /** Throws StoreError("RECORD_NOT_FOUND") if the id is unknown. */
  update(id: string, patch: RecordPatch<T>): Promise<T>;

  /** Returns false if nothing was deleted. */
  delete(id: string): Promise<boolean>;

  /** Returns the number of deleted records. */
  deleteWhere(filter?: RecordFilter<T>): Promise<number>;
}

// =============================================================================
// Unit of work
// =============================================================================

/**
 * A transactional session. Nothing it writes is visible outside
 * until the owning `Store.transaction` call commits.
 */
export interface UnitOfWork {
  table<N extends TableName>(name: N): Table<TableRecords[N]>;
}

/**
 * Source of units of work.
 */
export interface Store {
  /**
   * Run `work` inside one unit of work.
   *
   * Commits when the returned promise resolves and rolls back when it
   * rejects; the rejection is rethrown unchanged after rollback.
   */
  transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "RECORD_NOT_FOUND"
  | "DUPLICATE_ID"
  | "INVALID_PATCH"
  | "UNIT_OF_WORK_CLOSED";

/**
 * Error thrown by store operations.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly table?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
