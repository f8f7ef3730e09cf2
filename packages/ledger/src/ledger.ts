/**
 * @tally/ledger — Core Ledger class.
 *
 * Double-entry ledger engine bound to one unit of work. Posting, editing
 * and deleting a transaction adjust the cached account balances in the
 * same unit of work as the split writes, so the two are never observably
 * out of step.
 *
 * API surface:
 * - list() / get() — Read transactions
 * - post() — Validate and persist a balanced transaction
 * - update() — Roll back the old splits, replace them, apply the new ones
 * - delete() — Roll back the splits and remove the transaction
 * - listSplitDetails() — Joined read-only split rows
 * - auditBalances() / rebuildBalances() — Re-derive balances from history
 * - trialBalance() — Debit and credit columns as of a date
 */

import type {
  AccountRecord,
  CashflowTypeRecord,
  IsoDate,
  SplitRecord,
  Timestamp,
  TransactionRecord,
} from "@tally/types";
import { isAmount, isIsoDate } from "@tally/types";
import type { Table, UnitOfWork } from "@tally/store";
import { AccountRegistry } from "./accounts.js";
import { fractionToDecimal, fractionToScaled, sumExact, toFraction } from "./amount-codec.js";
import type { Fraction } from "./amount-codec.js";
import {
  auditBalances,
  computeBalances,
  computeTrialBalance,
  splitAmount,
} from "./balance-calculator.js";
import { CashflowTypeRegistry } from "./cashflow-types.js";
import type { EngineContext } from "./context.js";
import { nowTimestamp, resolveContext, today } from "./context.js";
import { AMOUNT_SCALE, formatAmount, parseAmount } from "./money-math.js";
import type {
  BalanceAudit,
  EngineOptions,
  ListTransactionsOptions,
  PostedTransaction,
  SplitDetail,
  SplitDetailQuery,
  SplitInput,
  TransactionInput,
  TrialBalance,
} from "./types.js";
import { NotFoundError, ValidationError } from "./types.js";

const DEFAULT_LIST_LIMIT = 50;
const DEFAULT_DETAIL_LIMIT = 100;

interface PreparedSplit {
  readonly input: SplitInput;
  readonly fraction: Fraction;
}

/**
 * Double-entry ledger over a unit of work.
 *
 * Every write is validated in full before anything is written; a failure
 * part-way through a write still leaves nothing behind once the owning
 * unit of work rolls back.
 */
export class Ledger {
  private readonly _transactions: Table<TransactionRecord>;
  private readonly _splits: Table<SplitRecord>;
  private readonly _accounts: Table<AccountRecord>;
  private readonly _cashflowTypeRows: Table<CashflowTypeRecord>;
  private readonly _registry: AccountRegistry;
  private readonly _cashflowTypes: CashflowTypeRegistry;
  private readonly _context: EngineContext;

  constructor(uow: UnitOfWork, options?: EngineOptions) {
    this._transactions = uow.table("transactions");
    this._splits = uow.table("splits");
    this._accounts = uow.table("accounts");
    this._cashflowTypeRows = uow.table("cashflowTypes");
    this._registry = new AccountRegistry(uow, options);
    this._cashflowTypes = new CashflowTypeRegistry(uow, options);
    this._context = resolveContext(options);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Newest first: post date descending, then creation time descending.
   */
  async list(options: ListTransactionsOptions = {}): Promise<readonly TransactionRecord[]> {
    return this._transactions.find(undefined, {
      orderBy: [
        { field: "postDate", direction: "desc" },
        { field: "createdAt", direction: "desc" },
      ],
      limit: options.limit ?? DEFAULT_LIST_LIMIT,
    });
  }

  async get(id: string): Promise<PostedTransaction | undefined> {
    const transaction = await this._transactions.get(id);
    if (transaction === undefined) {
      return undefined;
    }
    const splits = await this._splits.find({ transactionId: id }, { orderBy: [{ field: "position" }] });
    return { transaction, splits };
  }

  /**
   * Get a transaction by id. Throws NotFoundError if it does not exist.
   */
  async require(id: string): Promise<PostedTransaction> {
    const posted = await this.get(id);
    if (posted === undefined) {
      throw new NotFoundError("TRANSACTION_NOT_FOUND", `Transaction not found: "${id}"`, { id });
    }
    return posted;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Post a balanced transaction.
   *
   * Validation rules (all must pass before anything is written):
   * 1. Post date is a real calendar date
   * 2. At least two splits
   * 3. Every amount is a decimal string
   * 4. The stored fractions sum to exactly zero
   * 5. Every referenced account exists
   * 6. Every referenced cash-flow type exists
   */
  async post(input: TransactionInput): Promise<PostedTransaction> {
    const prepared = await this._prepare(input);
    const now = nowTimestamp(this._context);

    const transaction = await this._transactions.insert({
      id: this._context.newId(),
      num: input.num ?? null,
      postDate: input.postDate,
      enteredAt: now,
      description: input.description ?? null,
      businessType: input.businessType ?? null,
      referenceNo: input.referenceNo ?? null,
      createdAt: now,
      updatedAt: now,
    });

    const splits = await this._insertSplits(transaction.id, prepared, now);
    await this._applyDeltas(computeBalances(splits), 1n, now);
    return { transaction, splits };
  }

  /**
   * Replace a transaction's header and splits.
   *
   * Two phases inside the caller's unit of work: the old splits' deltas
   * are reversed, then the new splits' deltas are applied. Accounts that
   * appear in only one version are adjusted correctly.
   */
  async update(id: string, input: TransactionInput): Promise<PostedTransaction> {
    const existing = await this.require(id);
    const prepared = await this._prepare(input);
    const now = nowTimestamp(this._context);

    await this._applyDeltas(computeBalances(existing.splits), -1n, now);
    await this._splits.deleteWhere({ transactionId: id });

    const transaction = await this._transactions.update(id, {
      num: input.num ?? null,
      postDate: input.postDate,
      description: input.description ?? null,
      businessType: input.businessType ?? null,
      referenceNo: input.referenceNo ?? null,
      updatedAt: now,
    });

    const splits = await this._insertSplits(id, prepared, now);
    await this._applyDeltas(computeBalances(splits), 1n, now);
    return { transaction, splits };
  }

  /**
   * Reverse a transaction's balance effect and remove it with its splits.
   */
  async delete(id: string): Promise<void> {
    const existing = await this.require(id);
    await this._applyDeltas(computeBalances(existing.splits), -1n, nowTimestamp(this._context));
    await this._splits.deleteWhere({ transactionId: id });
    await this._transactions.delete(id);
  }

  // ─── Reporting Reads ─────────────────────────────────────────────────

  /**
   * Splits joined with transaction, account and cash-flow type names.
   * Newest post date first; splits of one transaction stay in position order.
   */
  async listSplitDetails(query: SplitDetailQuery = {}): Promise<readonly SplitDetail[]> {
    const splits = await this._splits.find(
      query.transactionId !== undefined ? { transactionId: query.transactionId } : undefined,
    );

    const transactions = indexById(await this._transactions.getMany(unique(splits.map((s) => s.transactionId))));
    const accounts = indexById(await this._accounts.getMany(unique(splits.map((s) => s.accountId))));
    const cashflowTypes = indexById(
      await this._cashflowTypeRows.getMany(
        unique(splits.flatMap((s) => (s.cashflowTypeId !== null ? [s.cashflowTypeId] : []))),
      ),
    );

    const rows: { detail: SplitDetail; createdAt: Timestamp; position: number }[] = [];
    for (const split of splits) {
      const transaction = transactions.get(split.transactionId);
      if (transaction === undefined) continue;
      const account = accounts.get(split.accountId);
      const cashflowType = split.cashflowTypeId !== null ? cashflowTypes.get(split.cashflowTypeId) : undefined;

      rows.push({
        createdAt: transaction.createdAt,
        position: split.position,
        detail: {
          splitId: split.id,
          transactionId: transaction.id,
          postDate: transaction.postDate,
          num: transaction.num,
          description: transaction.description,
          accountId: split.accountId,
          accountName: account?.name ?? "",
          accountType: account?.accountType ?? "",
          amount: splitAmount(split),
          memo: split.memo,
          reconcileState: split.reconcileState,
          cashflowTypeId: split.cashflowTypeId,
          cashflowTypeName: cashflowType?.name ?? null,
        },
      });
    }

    rows.sort(
      (a, b) =>
        compareDesc(a.detail.postDate, b.detail.postDate) ||
        compareDesc(a.createdAt, b.createdAt) ||
        compareAsc(a.detail.transactionId, b.detail.transactionId) ||
        a.position - b.position,
    );

    return rows.slice(0, query.limit ?? DEFAULT_DETAIL_LIMIT).map((row) => row.detail);
  }

  // ─── Balance Derivation ──────────────────────────────────────────────

  /**
   * Compare every cached balance with the sum of its splits.
   */
  async auditBalances(): Promise<BalanceAudit> {
    const accounts = await this._accounts.find(undefined, { orderBy: [{ field: "name" }] });
    const splits = await this._splits.find();
    return auditBalances(accounts, splits);
  }

  /**
   * Overwrite every drifted cached balance with the value derived from
   * split history. Returns the audit taken before the rewrite.
   */
  async rebuildBalances(): Promise<BalanceAudit> {
    const audit = await this.auditBalances();
    const now = nowTimestamp(this._context);
    for (const discrepancy of audit.discrepancies) {
      await this._accounts.update(discrepancy.accountId, {
        currentBalance: discrepancy.derived,
        updatedAt: now,
      });
    }
    return audit;
  }

  /**
   * Trial balance from splits posted on or before `asOf` (default: today).
   */
  async trialBalance(asOf?: IsoDate): Promise<TrialBalance> {
    const date = asOf ?? today(this._context);
    if (!isIsoDate(date)) {
      throw new ValidationError("INVALID_DATE", `Invalid date: "${date}"`, { date });
    }

    const transactions = await this._transactions.find({ postDate: { lte: date } });
    const splits = await this._splits.find({ transactionId: { in: transactions.map((t) => t.id) } });
    const accounts = await this._registry.list({ includeHidden: true });
    return computeTrialBalance(accounts, splits, date);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private async _prepare(input: TransactionInput): Promise<readonly PreparedSplit[]> {
    if (!isIsoDate(input.postDate)) {
      throw new ValidationError("INVALID_DATE", `Invalid post date: "${String(input.postDate)}"`, {
        postDate: input.postDate,
      });
    }

    if (input.splits.length < 2) {
      throw new ValidationError(
        "INSUFFICIENT_SPLITS",
        `A transaction needs at least two splits, got ${String(input.splits.length)}`,
        { count: input.splits.length },
      );
    }

    const prepared = input.splits.map((split, index): PreparedSplit => {
      if (!isAmount(split.amount)) {
        throw new ValidationError("INVALID_AMOUNT", `Split ${String(index + 1)} has an invalid amount: "${String(split.amount)}"`, {
          index,
        });
      }
      return { input: split, fraction: toFraction(split.amount) };
    });

    const exact = sumExact(input.splits.map((split) => split.amount));
    if (exact.numerator !== 0n) {
      const difference = fractionToDecimal(exact);
      throw new ValidationError("UNBALANCED_TRANSACTION", `Split amounts must sum to zero, off by ${difference}`, {
        difference,
      });
    }

    // Rounding to the stored scale must not unbalance it either.
    let total = 0n;
    for (const split of prepared) {
      total += fractionToScaled(split.fraction.numerator, split.fraction.denominator);
    }
    if (total !== 0n) {
      throw new ValidationError(
        "UNBALANCED_TRANSACTION",
        `Split amounts no longer sum to zero once rounded to ${String(AMOUNT_SCALE)} decimals, off by ${formatAmount(total)}`,
        { difference: formatAmount(total), rounded: true },
      );
    }

    await this._registry.requireMany(input.splits.map((split) => split.accountId));

    const cashflowTypeIds = input.splits.flatMap((split) =>
      split.cashflowTypeId !== undefined && split.cashflowTypeId !== null ? [split.cashflowTypeId] : [],
    );
    if (cashflowTypeIds.length > 0) {
      await this._cashflowTypes.requireMany(cashflowTypeIds);
    }

    return prepared;
  }

  private async _insertSplits(
    transactionId: string,
    prepared: readonly PreparedSplit[],
    now: Timestamp,
  ): Promise<readonly SplitRecord[]> {
    const splits: SplitRecord[] = [];
    for (const [position, split] of prepared.entries()) {
      splits.push(
        await this._splits.insert({
          id: this._context.newId(),
          transactionId,
          accountId: split.input.accountId,
          position,
          memo: split.input.memo ?? null,
          reconcileState: split.input.reconcileState ?? "n",
          valueNum: split.fraction.numerator,
          valueDenom: split.fraction.denominator,
          cashflowTypeId: split.input.cashflowTypeId ?? null,
          createdAt: now,
        }),
      );
    }
    return splits;
  }

  /**
   * Add `sign * delta` to each account's cached balance.
   * Throws ValidationError if any account is missing.
   */
  private async _applyDeltas(
    deltas: ReadonlyMap<string, bigint>,
    sign: 1n | -1n,
    now: Timestamp,
  ): Promise<void> {
    const accounts = await this._registry.requireMany(deltas.keys());
    for (const account of accounts.values()) {
      const delta = (deltas.get(account.id) ?? 0n) * sign;
      await this._accounts.update(account.id, {
        currentBalance: formatAmount(parseAmount(account.currentBalance) + delta),
        updatedAt: now,
      });
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function indexById<T extends { readonly id: string }>(records: readonly T[]): Map<string, T> {
  return new Map(records.map((record) => [record.id, record]));
}

function compareAsc(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareDesc(a: string, b: string): number {
  return compareAsc(b, a);
}
