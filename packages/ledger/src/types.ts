/**
 * @tally/ledger — Types for the ledger engine.
 *
 * Inputs accepted by the registries and the engine, read models they
 * return, and the error taxonomy shared by every domain package.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Consistency problems found after computation are data, not errors
 */

import type {
  Amount,
  CashflowDirection,
  FlowType,
  IsoDate,
  ReconcileState,
  SplitRecord,
  TransactionRecord,
} from "@tally/types";

// ─── Engine Options ──────────────────────────────────────────────────────

/** Source of the current time. Injected so tests can pin it. */
export type Clock = () => Date;

/** Source of new opaque record ids. */
export type IdGenerator = () => string;

export interface EngineOptions {
  readonly clock?: Clock | undefined;
  readonly newId?: IdGenerator | undefined;
}

// ─── Accounts ────────────────────────────────────────────────────────────

export interface AccountInput {
  readonly name: string;
  /** Any casing; stored upper-case. */
  readonly accountType: string;
  readonly parentId?: string | null | undefined;
  readonly code?: string | null | undefined;
  readonly description?: string | null | undefined;
  readonly hidden?: boolean | undefined;
  readonly placeholder?: boolean | undefined;
  readonly isCash?: boolean | undefined;
}

/**
 * Partial account update. An omitted field is left unchanged;
 * `null` clears a nullable field.
 */
export type AccountPatchInput = Partial<AccountInput>;

export interface AccountBalanceRow {
  readonly accountId: string;
  readonly name: string;
  readonly accountType: string;
  readonly code: string | null;
  readonly isCash: boolean;
  readonly balance: Amount;
}

// ─── Cash-flow Types ─────────────────────────────────────────────────────

export interface CashflowTypeInput {
  readonly code: string;
  readonly name: string;
  readonly category?: string | null | undefined;
  readonly flowType: FlowType;
  readonly direction: CashflowDirection;
  readonly isActive?: boolean | undefined;
  readonly sortOrder?: number | undefined;
}

// ─── Transactions ────────────────────────────────────────────────────────

/** One leg of a transaction. Debits are positive, credits negative. */
export interface SplitInput {
  readonly accountId: string;
  readonly amount: Amount;
  readonly memo?: string | null | undefined;
  readonly cashflowTypeId?: string | null | undefined;
  readonly reconcileState?: ReconcileState | undefined;
}

export interface TransactionInput {
  readonly postDate: IsoDate;
  readonly num?: string | null | undefined;
  readonly description?: string | null | undefined;
  readonly businessType?: string | null | undefined;
  readonly referenceNo?: string | null | undefined;
  readonly splits: readonly SplitInput[];
}

/** A posted transaction with its splits in position order. */
export interface PostedTransaction {
  readonly transaction: TransactionRecord;
  readonly splits: readonly SplitRecord[];
}

export interface ListTransactionsOptions {
  readonly limit?: number | undefined;
}

/**
 * A split joined with its transaction, account and cash-flow type.
 * Read-only; never a source of truth for balances.
 */
export interface SplitDetail {
  readonly splitId: string;
  readonly transactionId: string;
  readonly postDate: IsoDate;
  readonly num: string | null;
  readonly description: string | null;
  readonly accountId: string;
  readonly accountName: string;
  readonly accountType: string;
  readonly amount: Amount;
  readonly memo: string | null;
  readonly reconcileState: ReconcileState;
  readonly cashflowTypeId: string | null;
  readonly cashflowTypeName: string | null;
}

export interface SplitDetailQuery {
  readonly transactionId?: string | undefined;
  readonly limit?: number | undefined;
}

// ─── Balance Derivation ──────────────────────────────────────────────────

/**
 * An account whose stored balance differs from the sum of its splits.
 */
export interface BalanceDiscrepancy {
  readonly accountId: string;
  readonly accountName: string;
  readonly recorded: Amount;
  readonly derived: Amount;
  /** recorded − derived */
  readonly difference: Amount;
}

export interface BalanceAudit {
  readonly accountsChecked: number;
  readonly discrepancies: readonly BalanceDiscrepancy[];
  readonly consistent: boolean;
}

/**
 * A single line in the trial balance. Exactly one of the two
 * columns is non-zero.
 */
export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountName: string;
  readonly accountType: string;
  readonly debit: Amount;
  readonly credit: Amount;
}

export interface TrialBalance {
  readonly asOf: IsoDate;
  readonly lines: readonly TrialBalanceLine[];
  readonly totalDebit: Amount;
  readonly totalCredit: Amount;
  /** Whether total debits equal total credits. */
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for domain operations. */
export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "INSUFFICIENT_SPLITS"
  | "UNKNOWN_ACCOUNT"
  | "UNKNOWN_CASHFLOW_TYPE"
  | "INVALID_AMOUNT"
  | "INVALID_DATE"
  | "DUPLICATE_ACCOUNT_NAME"
  | "INVALID_ACCOUNT_TYPE"
  | "INVALID_PARENT"
  | "PARENT_CYCLE"
  | "ACCOUNT_HAS_CHILDREN"
  | "ACCOUNT_HAS_BALANCE"
  | "ACCOUNT_IN_USE"
  | "ACCOUNT_NOT_FOUND"
  | "TRANSACTION_NOT_FOUND"
  | "CASHFLOW_TYPE_NOT_FOUND"
  | "CASHFLOW_TYPE_REQUIRED"
  | "DUPLICATE_CASHFLOW_CODE"
  | "EMPTY_DOCUMENT"
  | "DOCUMENT_NOT_FOUND"
  | "FIXED_EXPENSE_NOT_FOUND"
  | "INVALID_FIXED_EXPENSE"
  | "INVALID_INPUT";

export type LedgerErrorKind = "validation" | "not_found";

export type ErrorDetails = Readonly<Record<string, unknown>>;

/**
 * Structured error from a domain operation.
 * Always thrown, never returned as a code.
 */
export class LedgerError extends Error {
  constructor(
    public readonly kind: LedgerErrorKind,
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

/** Caller input violates an invariant. Nothing was written. */
export class ValidationError extends LedgerError {
  constructor(code: LedgerErrorCode, message: string, details?: ErrorDetails) {
    super("validation", code, message, details);
    this.name = "ValidationError";
  }
}

/** An id did not resolve. */
export class NotFoundError extends LedgerError {
  constructor(code: LedgerErrorCode, message: string, details?: ErrorDetails) {
    super("not_found", code, message, details);
    this.name = "NotFoundError";
  }
}
