/**
 * @tally/store — In-memory Store implementation.
 *
 * Keeps every table in a Map. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Embedding the engine where durability is handled elsewhere
 *
 * Properties:
 * - Units of work run one at a time (serializable isolation)
 * - Each unit of work writes to a private copy of the tables;
 *   commit swaps the copy in, rollback drops it
 * - Stored records are frozen, so callers can never mutate state
 *   outside `update`
 * - No durability guarantees
 */

import { applyFindOptions, matchesFilter } from "./filter.js";
import type {
  FindOptions,
  RecordFilter,
  RecordPatch,
  Store,
  StoredRecord,
  Table,
  TableName,
  TableRecords,
  UnitOfWork,
} from "./types.js";
import { StoreError, TABLE_NAMES } from "./types.js";

type TableData = { [N in TableName]: Map<string, TableRecords[N]> };

function emptyTables(): TableData {
  return {
    accounts: new Map(),
    transactions: new Map(),
    splits: new Map(),
    cashflowTypes: new Map(),
    documents: new Map(),
    documentItems: new Map(),
    fixedExpenses: new Map(),
    monthlyReports: new Map(),
  };
}

function copyTables(source: TableData): TableData {
  return {
    accounts: new Map(source.accounts),
    transactions: new Map(source.transactions),
    splits: new Map(source.splits),
    cashflowTypes: new Map(source.cashflowTypes),
    documents: new Map(source.documents),
    documentItems: new Map(source.documentItems),
    fixedExpenses: new Map(source.fixedExpenses),
    monthlyReports: new Map(source.monthlyReports),
  };
}

// =============================================================================
// Table
// =============================================================================

class InMemoryTable<T extends StoredRecord> implements Table<T> {
  constructor(
    private readonly _name: string,
    private readonly _rows: Map<string, T>,
    private readonly _assertOpen: () => void,
  ) {}

  async get(id: string): Promise<T | undefined> {
    this._assertOpen();
    return this._rows.get(id);
  }

  async getMany(ids: readonly string[]): Promise<readonly T[]> {
    this._assertOpen();
    const result: T[] = [];
    for (const id of new Set(ids)) {
      const row = this._rows.get(id);
      if (row !== undefined) {
        result.push(row);
      }
    }
    return result;
  }

  async find(filter?: RecordFilter<T>, options?: FindOptions<T>): Promise<readonly T[]> {
    this._assertOpen();
    const matched = [...this._rows.values()].filter((row) => matchesFilter(row, filter));
    return applyFindOptions(matched, options);
  }

  async count(filter?: RecordFilter<T>): Promise<number> {
    this._assertOpen();
    let count = 0;
    for (const row of this._rows.values()) {
      if (matchesFilter(row, filter)) count++;
    }
    return count;
  }

  async insert(record: T): Promise<T> {
    this._assertOpen();
    if (this._rows.has(record.id)) {
      throw new StoreError(
        "DUPLICATE_ID",
        `Record "${record.id}" already exists in ${this._name}`,
        this._name,
      );
    }
    const stored: T = { ...record };
    Object.freeze(stored);
    this._rows.set(record.id, stored);
    return stored;
  }

  async update(id: string, patch: RecordPatch<T>): Promise<T> {
    this._assertOpen();
    const existing = this._rows.get(id);
    if (existing === undefined) {
      throw new StoreError(
        "RECORD_NOT_FOUND",
        `Record "${id}" not found in ${this._name}`,
        this._name,
      );
    }
    for (const field of Object.keys(patch)) {
      if (field === "id" || Reflect.get(patch, field) === undefined) {
        throw new StoreError(
          "INVALID_PATCH",
          `Field "${field}" cannot be set on ${this._name}`,
          this._name,
        );
      }
    }
    const stored: T = { ...existing, ...patch, id };
    Object.freeze(stored);
    this._rows.set(id, stored);
    return stored;
  }

  async delete(id: string): Promise<boolean> {
    this._assertOpen();
    return this._rows.delete(id);
  }

  async deleteWhere(filter?: RecordFilter<T>): Promise<number> {
    this._assertOpen();
    let deleted = 0;
    for (const [id, row] of [...this._rows]) {
      if (matchesFilter(row, filter)) {
        this._rows.delete(id);
        deleted++;
      }
    }
    return deleted;
  }
}

// =============================================================================
// Unit of work
// =============================================================================

class InMemoryUnitOfWork implements UnitOfWork {
  private _open = true;

  constructor(private readonly _tables: TableData) {}

  table<N extends TableName>(name: N): Table<TableRecords[N]> {
    this._assertOpen();
    const rows: Map<string, TableRecords[N]> = this._tables[name];
    return new InMemoryTable<TableRecords[N]>(name, rows, () => this._assertOpen());
  }

  close(): void {
    this._open = false;
  }

  private _assertOpen(): void {
    if (!this._open) {
      throw new StoreError(
        "UNIT_OF_WORK_CLOSED",
        "Unit of work has already been committed or rolled back",
      );
    }
  }
}

// =============================================================================
// Store
// =============================================================================

/**
 * In-memory store.
 *
 * `transaction` calls queue behind each other, so two postings can never
 * interleave their balance reads and writes.
 */
export class InMemoryStore implements Store {
  private _committed: TableData = emptyTables();
  private _tail: Promise<void> = Promise.resolve();
  private _commitCount = 0;
  private _rollbackCount = 0;

  async transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const release = await this._acquire();
    const working = copyTables(this._committed);
    const uow = new InMemoryUnitOfWork(working);

    try {
      const result = await work(uow);
      this._committed = working;
      this._commitCount++;
      return result;
    } catch (error: unknown) {
      this._rollbackCount++;
      throw error;
    } finally {
      uow.close();
      release();
    }
  }

  /** Number of committed units of work. */
  get commitCount(): number {
    return this._commitCount;
  }

  /** Number of rolled-back units of work. */
  get rollbackCount(): number {
    return this._rollbackCount;
  }

  /** Committed row counts per table. */
  stats(): Readonly<Record<TableName, number>> {
    const counts: Record<TableName, number> = {
      accounts: 0,
      transactions: 0,
      splits: 0,
      cashflowTypes: 0,
      documents: 0,
      documentItems: 0,
      fixedExpenses: 0,
      monthlyReports: 0,
    };
    for (const name of TABLE_NAMES) {
      counts[name] = this._committed[name].size;
    }
    return counts;
  }

  private _acquire(): Promise<() => void> {
    const previous = this._tail;
    let release: () => void = () => undefined;
    this._tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    return previous.then(() => release);
  }
}
