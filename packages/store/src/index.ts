/**
 * @tally/store — Transactional persistence for the bookkeeping core.
 *
 * Provides:
 * - Store / UnitOfWork / Table interfaces the core is written against
 * - Structural filters that storage adapters can translate
 * - InMemoryStore: serialized, all-or-nothing units of work in process
 *
 * @packageDocumentation
 */

// Core types
export type {
  TableRecords,
  TableName,
  StoredRecord,
  FieldCondition,
  RecordFilter,
  OrderBy,
  FindOptions,
  RecordPatch,
  Table,
  UnitOfWork,
  Store,
  StoreErrorCode,
} from "./types.js";
export { StoreError, TABLE_NAMES } from "./types.js";

// Filtering
export { matchesFilter, applyFindOptions, compareValues } from "./filter.js";

// Implementations
export { InMemoryStore } from "./in-memory-store.js";
