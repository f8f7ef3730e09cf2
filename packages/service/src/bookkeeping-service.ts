/**
 * BookkeepingService — Composition root for the domain packages.
 *
 * Presentation layers call this service; they never import the domain
 * packages directly. Every operation runs in exactly one unit of work:
 * it commits when the operation succeeds and rolls back on any failure,
 * so a rejected call leaves nothing behind.
 *
 * Caller input arrives as `unknown` and is parsed with the DTO schemas
 * before it reaches the domain.
 */

import type {
  AccountRecord,
  BusinessDocumentRecord,
  CashflowTypeRecord,
  FixedExpenseRecord,
  IsoDate,
  TransactionRecord,
} from "@tally/types";
import { isIsoDate } from "@tally/types";
import type { Store, UnitOfWork } from "@tally/store";
import {
  AccountRegistry,
  CashflowTypeRegistry,
  Ledger,
  LedgerError,
  ValidationError,
} from "@tally/ledger";
import type {
  AccountBalanceRow,
  BalanceAudit,
  Clock,
  IdGenerator,
  PostedTransaction,
  SplitDetail,
  TrialBalance,
} from "@tally/ledger";
import {
  DocumentComposer,
  FixedExpenseScheduler,
  isDue,
  runDueFixedExpenses,
} from "@tally/treasury";
import type { DocumentWithItems, FixedExpenseRun } from "@tally/treasury";
import { FinancialReports, getOrCreateMonthlySnapshot } from "@tally/reports";
import type {
  BalanceSheet,
  CashflowStatement,
  IncomeStatement,
  MonthlySnapshot,
  ReportOptions,
} from "@tally/reports";
import type { AppConfig } from "./config.js";
import { retentionPolicy } from "./config.js";
import {
  BusinessDocumentSchema,
  CreateAccountSchema,
  CreateCashflowTypeSchema,
  CreateFixedExpenseSchema,
  DocumentQuerySchema,
  DocumentTypeSchema,
  ListTransactionsQuerySchema,
  SplitDetailQuerySchema,
  TransactionSchema,
  UpdateAccountSchema,
  UpdateFixedExpenseSchema,
  parseInput,
} from "./dto.js";
import type { Logger } from "./logger.js";

// =============================================================================
// Configuration
// =============================================================================

export interface BookkeepingServiceOptions {
  readonly store: Store;
  readonly logger: Logger;
  readonly config: Pick<
    AppConfig,
    "REPORT_BALANCE_TOLERANCE" | "REPORT_CACHE_RETENTION" | "TRANSACTION_LIST_LIMIT"
  >;
  readonly clock?: Clock | undefined;
  readonly newId?: IdGenerator | undefined;
}

type LogFields = Readonly<Record<string, unknown>>;

// =============================================================================
// Service
// =============================================================================

export class BookkeepingService {
  private readonly _store: Store;
  private readonly _logger: Logger;
  private readonly _options: ReportOptions;
  private readonly _listLimit: number;

  constructor(options: BookkeepingServiceOptions) {
    this._store = options.store;
    this._logger = options.logger;
    this._listLimit = options.config.TRANSACTION_LIST_LIMIT;
    this._options = {
      clock: options.clock,
      newId: options.newId,
      tolerance: options.config.REPORT_BALANCE_TOLERANCE,
      retention: retentionPolicy(options.config),
    };
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  listAccounts(includeHidden = false): Promise<readonly AccountRecord[]> {
    return this._read("listAccounts", (uow) => this._accounts(uow).list({ includeHidden }));
  }

  getAccount(id: string): Promise<AccountRecord | undefined> {
    return this._read("getAccount", (uow) => this._accounts(uow).get(id));
  }

  listAccountBalances(): Promise<readonly AccountBalanceRow[]> {
    return this._read("listAccountBalances", (uow) => this._accounts(uow).listBalances());
  }

  createAccount(input: unknown): Promise<AccountRecord> {
    return this._write(
      "createAccount",
      {},
      (uow) => this._accounts(uow).create(parseInput(CreateAccountSchema, input)),
      (account) => ({ accountId: account.id }),
    );
  }

  updateAccount(id: string, input: unknown): Promise<AccountRecord> {
    return this._write("updateAccount", { accountId: id }, (uow) =>
      this._accounts(uow).update(id, parseInput(UpdateAccountSchema, input)),
    );
  }

  deleteAccount(id: string): Promise<void> {
    return this._write("deleteAccount", { accountId: id }, (uow) => this._accounts(uow).delete(id));
  }

  // ─── Cash-flow Types ───────────────────────────────────────────────

  listCashflowTypes(activeOnly = false): Promise<readonly CashflowTypeRecord[]> {
    return this._read("listCashflowTypes", (uow) => this._cashflowTypes(uow).list({ activeOnly }));
  }

  createCashflowType(input: unknown): Promise<CashflowTypeRecord> {
    return this._write(
      "createCashflowType",
      {},
      (uow) => this._cashflowTypes(uow).create(parseInput(CreateCashflowTypeSchema, input)),
      (type) => ({ cashflowTypeId: type.id, code: type.code }),
    );
  }

  setCashflowTypeActive(id: string, isActive: boolean): Promise<CashflowTypeRecord> {
    return this._write("setCashflowTypeActive", { cashflowTypeId: id, isActive }, (uow) =>
      this._cashflowTypes(uow).setActive(id, isActive),
    );
  }

  seedDefaultCashflowTypes(): Promise<readonly CashflowTypeRecord[]> {
    return this._write(
      "seedDefaultCashflowTypes",
      {},
      (uow) => this._cashflowTypes(uow).seedDefaults(),
      (inserted) => ({ inserted: inserted.length }),
    );
  }

  // ─── Ledger ────────────────────────────────────────────────────────

  listTransactions(limit?: number): Promise<readonly TransactionRecord[]> {
    return this._read("listTransactions", (uow) =>
      this._ledger(uow).list({ limit: parseInput(ListTransactionsQuerySchema, { limit }).limit ?? this._listLimit }),
    );
  }

  getTransaction(id: string): Promise<PostedTransaction | undefined> {
    return this._read("getTransaction", (uow) => this._ledger(uow).get(id));
  }

  postTransaction(input: unknown): Promise<PostedTransaction> {
    return this._write(
      "postTransaction",
      {},
      (uow) => this._ledger(uow).post(parseInput(TransactionSchema, input)),
      (posted) => ({ transactionId: posted.transaction.id, splits: posted.splits.length }),
    );
  }

  updateTransaction(id: string, input: unknown): Promise<PostedTransaction> {
    return this._write(
      "updateTransaction",
      { transactionId: id },
      (uow) => this._ledger(uow).update(id, parseInput(TransactionSchema, input)),
      (posted) => ({ splits: posted.splits.length }),
    );
  }

  deleteTransaction(id: string): Promise<void> {
    return this._write("deleteTransaction", { transactionId: id }, (uow) => this._ledger(uow).delete(id));
  }

  listSplitDetails(query: unknown = {}): Promise<readonly SplitDetail[]> {
    return this._read("listSplitDetails", (uow) =>
      this._ledger(uow).listSplitDetails(parseInput(SplitDetailQuerySchema, query)),
    );
  }

  auditBalances(): Promise<BalanceAudit> {
    return this._read("auditBalances", (uow) => this._ledger(uow).auditBalances());
  }

  rebuildBalances(): Promise<BalanceAudit> {
    return this._write(
      "rebuildBalances",
      {},
      (uow) => this._ledger(uow).rebuildBalances(),
      (audit) => ({ repaired: audit.discrepancies.length }),
    );
  }

  trialBalance(asOf?: IsoDate): Promise<TrialBalance> {
    return this._read("trialBalance", (uow) => this._ledger(uow).trialBalance(asOf));
  }

  // ─── Business Documents ────────────────────────────────────────────

  postBusinessDocument(input: unknown, type: unknown): Promise<DocumentWithItems> {
    return this._write(
      "postBusinessDocument",
      {},
      (uow) =>
        new DocumentComposer(uow, this._options).post(
          parseInput(DocumentTypeSchema, type),
          parseInput(BusinessDocumentSchema, input),
        ),
      (posted) => ({
        documentId: posted.document.id,
        docNo: posted.document.docNo,
        transactionId: posted.document.transactionId,
      }),
    );
  }

  getBusinessDocument(id: string): Promise<DocumentWithItems | undefined> {
    return this._read("getBusinessDocument", (uow) => new DocumentComposer(uow, this._options).get(id));
  }

  listBusinessDocuments(query: unknown = {}): Promise<readonly BusinessDocumentRecord[]> {
    return this._read("listBusinessDocuments", (uow) =>
      new DocumentComposer(uow, this._options).list(parseInput(DocumentQuerySchema, query)),
    );
  }

  // ─── Fixed Expenses ────────────────────────────────────────────────

  listFixedExpenses(activeOnly = false): Promise<readonly FixedExpenseRecord[]> {
    return this._read("listFixedExpenses", (uow) => this._scheduler(uow).list({ activeOnly }));
  }

  getFixedExpense(id: string): Promise<FixedExpenseRecord | undefined> {
    return this._read("getFixedExpense", (uow) => this._scheduler(uow).get(id));
  }

  createFixedExpense(input: unknown): Promise<FixedExpenseRecord> {
    return this._write(
      "createFixedExpense",
      {},
      (uow) => this._scheduler(uow).create(parseInput(CreateFixedExpenseSchema, input)),
      (expense) => ({ expenseId: expense.id }),
    );
  }

  updateFixedExpense(id: string, input: unknown): Promise<FixedExpenseRecord> {
    return this._write("updateFixedExpense", { expenseId: id }, (uow) =>
      this._scheduler(uow).update(id, parseInput(UpdateFixedExpenseSchema, input)),
    );
  }

  deleteFixedExpense(id: string): Promise<void> {
    return this._write("deleteFixedExpense", { expenseId: id }, (uow) => this._scheduler(uow).delete(id));
  }

  /** Whether the expense would run on `date`. */
  isFixedExpenseDue(id: string, date: IsoDate): Promise<boolean> {
    return this._read("isFixedExpenseDue", async (uow) => {
      if (!isIsoDate(date)) {
        throw new ValidationError("INVALID_DATE", `Invalid date: "${String(date)}"`, { date });
      }
      return isDue(await this._scheduler(uow).require(id), date);
    });
  }

  async executeFixedExpense(id: string, runDate: IsoDate, force = false): Promise<FixedExpenseRun> {
    const run = await this._write(
      "executeFixedExpense",
      { expenseId: id, runDate, force },
      (uow) => this._scheduler(uow).execute(id, runDate, force),
      (result) => ({ transactionId: result.transactionId }),
    );
    this._logRunWarnings(run);
    return run;
  }

  /**
   * Run every active fixed expense due on `runDate`, each in its own
   * unit of work. A failing expense is reported, not thrown.
   */
  async executeAllDueFixedExpenses(runDate: IsoDate): Promise<readonly FixedExpenseRun[]> {
    const log = this._logger.child({ op: "executeAllDueFixedExpenses", runDate });
    log.debug("start");
    const runs = await runDueFixedExpenses(this._store, runDate, this._options);
    for (const run of runs) {
      this._logRunWarnings(run);
    }
    log.info(
      { attempted: runs.length, posted: runs.filter((run) => run.transactionId !== null).length },
      "executeAllDueFixedExpenses committed",
    );
    return runs;
  }

  // ─── Reports ───────────────────────────────────────────────────────

  balanceSheet(reportDate?: IsoDate): Promise<BalanceSheet> {
    return this._read("balanceSheet", (uow) => this._reports(uow).balanceSheet(reportDate));
  }

  incomeStatement(startDate?: IsoDate, endDate?: IsoDate): Promise<IncomeStatement> {
    return this._read("incomeStatement", (uow) => this._reports(uow).incomeStatement(startDate, endDate));
  }

  cashflowStatement(startDate?: IsoDate, endDate?: IsoDate): Promise<CashflowStatement> {
    return this._read("cashflowStatement", (uow) => this._reports(uow).cashflowStatement(startDate, endDate));
  }

  /** Statements for the last full month before `asOf` (default: today), cached. */
  getOrCreateMonthlySnapshot(asOf?: IsoDate): Promise<MonthlySnapshot> {
    return this._write(
      "getOrCreateMonthlySnapshot",
      { asOf },
      (uow) => getOrCreateMonthlySnapshot(uow, asOf, this._options),
      (snapshot) => ({ month: snapshot.month, fromCache: snapshot.fromCache }),
    );
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _accounts(uow: UnitOfWork): AccountRegistry {
    return new AccountRegistry(uow, this._options);
  }

  private _cashflowTypes(uow: UnitOfWork): CashflowTypeRegistry {
    return new CashflowTypeRegistry(uow, this._options);
  }

  private _ledger(uow: UnitOfWork): Ledger {
    return new Ledger(uow, this._options);
  }

  private _scheduler(uow: UnitOfWork): FixedExpenseScheduler {
    return new FixedExpenseScheduler(uow, this._options);
  }

  private _reports(uow: UnitOfWork): FinancialReports {
    return new FinancialReports(uow, this._options);
  }

  private _read<T>(op: string, work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return this._run(op, {}, work, undefined, "debug");
  }

  private _write<T>(
    op: string,
    fields: LogFields,
    work: (uow: UnitOfWork) => Promise<T>,
    summarize?: (result: T) => LogFields,
  ): Promise<T> {
    return this._run(op, fields, work, summarize, "info");
  }

  private async _run<T>(
    op: string,
    fields: LogFields,
    work: (uow: UnitOfWork) => Promise<T>,
    summarize: ((result: T) => LogFields) | undefined,
    level: "debug" | "info",
  ): Promise<T> {
    const log = this._logger.child({ op, ...fields });
    log.debug("start");
    try {
      const result = await this._store.transaction(work);
      log[level](summarize?.(result) ?? {}, `${op} committed`);
      return result;
    } catch (error: unknown) {
      if (error instanceof LedgerError) {
        log.warn({ code: error.code, kind: error.kind, details: error.details }, error.message);
      } else {
        log.error({ err: error }, `${op} failed`);
      }
      throw error;
    }
  }

  private _logRunWarnings(run: FixedExpenseRun): void {
    for (const warning of run.warnings) {
      this._logger.warn({ op: "fixedExpenseRun", expenseId: run.expenseId }, warning);
    }
  }
}
