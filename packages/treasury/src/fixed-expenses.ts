/**
 * Recurring Charge Scheduler — Fixed monthly expenses.
 *
 * A fixed expense debits its expense account once per calendar month,
 * on or after its due day, and credits a funding account chosen by
 * available balance.
 *
 * Rules:
 * - The due day is the configured day clamped to the month's length
 * - `lastRunMonth` is the only idempotency guard: one successful run per month
 * - Insufficient funds are warnings, not errors; the charge still posts
 * - A run with no usable funding account posts nothing
 * - Only a cash funding leg carries the cash-flow type, and a cash-funded
 *   expense must have one
 */

import type { AccountRecord, FixedExpenseRecord, IsoDate } from "@tally/types";
import {
  daysInMonth,
  firstDayOfMonth,
  formatIsoDate,
  isAmount,
  isIsoDate,
  parseIsoDate,
} from "@tally/types";
import type { RecordPatch, Store, Table, UnitOfWork } from "@tally/store";
import {
  AccountRegistry,
  CashflowTypeRegistry,
  Ledger,
  NotFoundError,
  ValidationError,
  compareAmounts,
  isPositiveAmount,
  negateAmount,
  normalizeAmount,
  nowTimestamp,
  resolveContext,
} from "@tally/ledger";
import type { EngineContext, EngineOptions } from "@tally/ledger";
import type {
  FixedExpenseInput,
  FixedExpensePatchInput,
  FixedExpenseRun,
  FundingChoice,
} from "./types.js";

const MIN_DAY = 1;
const MAX_DAY = 28;

// =============================================================================
// Due dates
// =============================================================================

/**
 * The date the expense falls due in `asOf`'s month.
 * Day 30 in February 2023 → 2023-02-28.
 */
export function dueDateFor(expense: Pick<FixedExpenseRecord, "dayOfMonth">, asOf: IsoDate): IsoDate {
  const { year, month } = parseIsoDate(asOf);
  const day = Math.min(Math.max(expense.dayOfMonth, MIN_DAY), daysInMonth(year, month));
  return formatIsoDate(year, month, day);
}

/**
 * Whether the expense should run on `asOf`: not yet run this month,
 * and the due date has been reached.
 */
export function isDue(
  expense: Pick<FixedExpenseRecord, "dayOfMonth" | "lastRunMonth">,
  asOf: IsoDate,
): boolean {
  if (expense.lastRunMonth === firstDayOfMonth(asOf)) {
    return false;
  }
  return asOf >= dueDateFor(expense, asOf);
}

// =============================================================================
// Funding
// =============================================================================

/**
 * Choose the account that pays a charge.
 *
 * The primary account wins when its balance covers the amount. Otherwise
 * the fallback is used, with a warning when it is short as well. Without
 * a fallback the primary is charged anyway; without either, nothing is.
 */
export function selectFundingAccount(
  amount: string,
  primary: AccountRecord | undefined,
  fallback: AccountRecord | undefined,
): FundingChoice {
  if (primary !== undefined && compareAmounts(primary.currentBalance, amount) >= 0) {
    return { accountId: primary.id, warnings: [] };
  }

  const warnings: string[] = [];
  if (primary !== undefined) {
    warnings.push(`Primary account ${primary.name} has insufficient balance (current ${primary.currentBalance}).`);
  } else {
    warnings.push("No primary account configured.");
  }

  if (fallback !== undefined) {
    if (compareAmounts(fallback.currentBalance, amount) < 0) {
      warnings.push(
        `Fallback account ${fallback.name} is also short (current ${fallback.currentBalance}); its balance may go negative.`,
      );
    }
    return { accountId: fallback.id, warnings };
  }

  warnings.push("No fallback account configured; charging the primary account.");
  return { accountId: primary?.id ?? null, warnings };
}

// =============================================================================
// Scheduler
// =============================================================================

export interface ListFixedExpensesOptions {
  readonly activeOnly?: boolean | undefined;
}

export class FixedExpenseScheduler {
  private readonly _expenses: Table<FixedExpenseRecord>;
  private readonly _accounts: AccountRegistry;
  private readonly _cashflowTypes: CashflowTypeRegistry;
  private readonly _ledger: Ledger;
  private readonly _context: EngineContext;

  constructor(uow: UnitOfWork, options?: EngineOptions) {
    this._expenses = uow.table("fixedExpenses");
    this._accounts = new AccountRegistry(uow, options);
    this._cashflowTypes = new CashflowTypeRegistry(uow, options);
    this._ledger = new Ledger(uow, options);
    this._context = resolveContext(options);
  }

  // ─── Configuration ───────────────────────────────────────────────────

  /** Ordered by due day, then name. */
  async list(options: ListFixedExpensesOptions = {}): Promise<readonly FixedExpenseRecord[]> {
    return this._expenses.find(options.activeOnly === true ? { isActive: true } : undefined, {
      orderBy: [{ field: "dayOfMonth" }, { field: "name" }],
    });
  }

  async get(id: string): Promise<FixedExpenseRecord | undefined> {
    return this._expenses.get(id);
  }

  async require(id: string): Promise<FixedExpenseRecord> {
    const expense = await this._expenses.get(id);
    if (expense === undefined) {
      throw new NotFoundError("FIXED_EXPENSE_NOT_FOUND", `Fixed expense not found: "${id}"`, { id });
    }
    return expense;
  }

  async create(input: FixedExpenseInput): Promise<FixedExpenseRecord> {
    const fields = validateFields(input);
    await this._assertReferences(input);

    const now = nowTimestamp(this._context);
    return this._expenses.insert({
      id: this._context.newId(),
      name: fields.name,
      amount: fields.amount,
      expenseAccountId: input.expenseAccountId,
      primaryAccountId: input.primaryAccountId ?? null,
      fallbackAccountId: input.fallbackAccountId ?? null,
      cashflowTypeId: input.cashflowTypeId ?? null,
      dayOfMonth: input.dayOfMonth,
      isActive: input.isActive ?? true,
      lastRunMonth: null,
      lastRunAt: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  async update(id: string, patch: FixedExpensePatchInput): Promise<FixedExpenseRecord> {
    const existing = await this.require(id);
    const merged: FixedExpenseInput = {
      name: patch.name ?? existing.name,
      amount: patch.amount ?? existing.amount,
      expenseAccountId: patch.expenseAccountId ?? existing.expenseAccountId,
      primaryAccountId: patch.primaryAccountId !== undefined ? patch.primaryAccountId : existing.primaryAccountId,
      fallbackAccountId: patch.fallbackAccountId !== undefined ? patch.fallbackAccountId : existing.fallbackAccountId,
      cashflowTypeId: patch.cashflowTypeId !== undefined ? patch.cashflowTypeId : existing.cashflowTypeId,
      dayOfMonth: patch.dayOfMonth ?? existing.dayOfMonth,
      isActive: patch.isActive ?? existing.isActive,
    };
    const fields = validateFields(merged);
    await this._assertReferences(merged);

    const update: RecordPatch<FixedExpenseRecord> = {
      name: fields.name,
      amount: fields.amount,
      expenseAccountId: merged.expenseAccountId,
      primaryAccountId: merged.primaryAccountId ?? null,
      fallbackAccountId: merged.fallbackAccountId ?? null,
      cashflowTypeId: merged.cashflowTypeId ?? null,
      dayOfMonth: merged.dayOfMonth,
      isActive: merged.isActive ?? true,
      updatedAt: nowTimestamp(this._context),
    };
    return this._expenses.update(id, update);
  }

  async delete(id: string): Promise<void> {
    await this.require(id);
    await this._expenses.delete(id);
  }

  // ─── Execution ───────────────────────────────────────────────────────

  /**
   * Run one fixed expense on `runDate`.
   *
   * Skips with a warning when the expense is inactive, not due (unless
   * `force`), or has a non-positive amount. On success the expense is
   * stamped with the run month and time.
   */
  async execute(id: string, runDate: IsoDate, force = false): Promise<FixedExpenseRun> {
    if (!isIsoDate(runDate)) {
      throw new ValidationError("INVALID_DATE", `Invalid run date: "${String(runDate)}"`, { runDate });
    }
    const expense = await this.require(id);
    const skipped = (warnings: readonly string[]): FixedExpenseRun => ({
      expenseId: expense.id,
      expenseName: expense.name,
      transactionId: null,
      warnings,
    });

    if (!expense.isActive) {
      return skipped(["Fixed expense is inactive; not executed."]);
    }
    if (!force && !isDue(expense, runDate)) {
      return skipped([`Not due yet (due on day ${String(parseIsoDate(dueDateFor(expense, runDate)).day)}); not executed.`]);
    }
    if (!isPositiveAmount(expense.amount)) {
      return skipped(["Amount must be greater than 0; not executed."]);
    }

    const primary = expense.primaryAccountId !== null ? await this._accounts.get(expense.primaryAccountId) : undefined;
    const fallback =
      expense.fallbackAccountId !== null ? await this._accounts.get(expense.fallbackAccountId) : undefined;
    const funding = selectFundingAccount(expense.amount, primary, fallback);
    if (funding.accountId === null) {
      return skipped([...funding.warnings, "No usable funding account configured; not executed."]);
    }

    const fundingAccount = funding.accountId === primary?.id ? primary : fallback;
    const fundsFromCash = fundingAccount?.isCash === true;
    if (fundingAccount !== undefined && fundingAccount.isCash && expense.cashflowTypeId === null) {
      throw new ValidationError(
        "CASHFLOW_TYPE_REQUIRED",
        `Fixed expense "${expense.name}" draws on cash account ${fundingAccount.name} but has no cash-flow type`,
        { accountId: fundingAccount.id },
      );
    }

    const memo = `${expense.name} automatic charge`;
    const posted = await this._ledger.post({
      postDate: runDate,
      description: `${runDate.slice(0, 7)} ${expense.name} fixed expense`,
      businessType: "fixed_expense",
      splits: [
        { accountId: expense.expenseAccountId, amount: expense.amount, memo },
        {
          accountId: funding.accountId,
          amount: negateAmount(expense.amount),
          memo,
          cashflowTypeId: fundsFromCash ? expense.cashflowTypeId : null,
        },
      ],
    });

    const now = nowTimestamp(this._context);
    await this._expenses.update(expense.id, {
      lastRunMonth: firstDayOfMonth(runDate),
      lastRunAt: now,
      updatedAt: now,
    });

    return {
      expenseId: expense.id,
      expenseName: expense.name,
      transactionId: posted.transaction.id,
      warnings: funding.warnings,
    };
  }

  private async _assertReferences(input: FixedExpenseInput): Promise<void> {
    const accountIds = [input.expenseAccountId, input.primaryAccountId, input.fallbackAccountId].flatMap((id) =>
      id !== undefined && id !== null ? [id] : [],
    );
    const accounts = await this._accounts.requireMany(accountIds);
    if (input.cashflowTypeId !== undefined && input.cashflowTypeId !== null) {
      await this._cashflowTypes.requireMany([input.cashflowTypeId]);
      return;
    }
    const cashFunding = [input.primaryAccountId, input.fallbackAccountId]
      .flatMap((id) => (id !== undefined && id !== null ? [accounts.get(id)] : []))
      .find((account) => account?.isCash === true);
    if (cashFunding !== undefined) {
      throw new ValidationError(
        "CASHFLOW_TYPE_REQUIRED",
        `A cash-flow type is required when funding from cash account ${cashFunding.name}`,
        { accountId: cashFunding.id },
      );
    }
  }
}

// =============================================================================
// Batch run
// =============================================================================

/**
 * Run every active fixed expense that is due on `runDate`.
 *
 * Each expense runs in its own unit of work with `force` set, since due-ness
 * was checked here. A failing expense is rolled back and reported with its
 * error as a warning; the batch carries on.
 */
export async function runDueFixedExpenses(
  store: Store,
  runDate: IsoDate,
  options?: EngineOptions,
): Promise<readonly FixedExpenseRun[]> {
  if (!isIsoDate(runDate)) {
    throw new ValidationError("INVALID_DATE", `Invalid run date: "${String(runDate)}"`, { runDate });
  }

  const due = await store.transaction(async (uow) => {
    const expenses = await new FixedExpenseScheduler(uow, options).list({ activeOnly: true });
    return expenses.filter((expense) => isDue(expense, runDate));
  });

  const results: FixedExpenseRun[] = [];
  for (const expense of due) {
    try {
      results.push(
        await store.transaction((uow) => new FixedExpenseScheduler(uow, options).execute(expense.id, runDate, true)),
      );
    } catch (error: unknown) {
      results.push({
        expenseId: expense.id,
        expenseName: expense.name,
        transactionId: null,
        warnings: [`Run failed: ${error instanceof Error ? error.message : String(error)}`],
      });
    }
  }
  return results;
}

// =============================================================================
// Validation
// =============================================================================

function validateFields(input: FixedExpenseInput): { name: string; amount: string } {
  const name = input.name.trim();
  if (name === "") {
    throw new ValidationError("INVALID_FIXED_EXPENSE", "Fixed expense name must not be empty");
  }
  if (!isAmount(input.amount)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid fixed expense amount: "${String(input.amount)}"`);
  }
  if (!Number.isInteger(input.dayOfMonth) || input.dayOfMonth < MIN_DAY || input.dayOfMonth > MAX_DAY) {
    throw new ValidationError(
      "INVALID_FIXED_EXPENSE",
      `Day of month must be between ${String(MIN_DAY)} and ${String(MAX_DAY)}, got ${String(input.dayOfMonth)}`,
      { dayOfMonth: input.dayOfMonth },
    );
  }
  return { name, amount: normalizeAmount(input.amount) };
}
