/**
 * Financial Types
 *
 * Persistent records of the bookkeeping engine.
 *
 * Rules:
 * - Monetary amounts are decimal strings ("100.50", "-12.000001"), never floats
 * - Signed amounts are debit-positive, credit-negative
 * - Split amounts are stored as an exact numerator/denominator pair
 * - Post dates are calendar dates ("2024-03-31"); audit fields are ISO 8601 timestamps
 */

/**
 * A decimal monetary amount as a string.
 * Single-currency: the engine never converts between currencies.
 */
export type Amount = string;

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

/** ISO 8601 timestamp. */
export type Timestamp = string;

// =============================================================================
// Chart of accounts
// =============================================================================

/**
 * A node in the chart of accounts.
 *
 * `accountType` is one of the raw type codes in `ACCOUNT_TYPES` (stored upper-case).
 * `currentBalance` equals the signed sum of every split posted to the account and
 * is only ever changed by the ledger engine.
 */
export interface AccountRecord {
  readonly id: string;
  readonly name: string;
  readonly accountType: string;
  readonly parentId: string | null;
  readonly code: string | null;
  readonly description: string | null;
  readonly hidden: boolean;
  /** Pure grouping node. Not enforced by the ledger. */
  readonly placeholder: boolean;
  /** Cash or bank account: document postings touching it must carry a cash-flow type. */
  readonly isCash: boolean;
  readonly currentBalance: Amount;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/**
 * Raw account type codes, grouped by the statement section they roll into.
 */
export const ACCOUNT_TYPES = [
  "ASSET",
  "CURRENT_ASSET",
  "FIXED_ASSET",
  "NON_CURRENT_ASSET",
  "CASH",
  "BANK",
  "RECEIVABLE",
  "INVENTORY",
  "LIABILITY",
  "CURRENT_LIABILITY",
  "NON_CURRENT_LIABILITY",
  "PAYABLE",
  "EQUITY",
  "CAPITAL",
  "RETAINED_EARNINGS",
  "INCOME",
  "REVENUE",
  "SALES",
  "EXPENSE",
  "COST",
  "OPERATING_EXPENSE",
  "COGS",
] as const;

export type AccountTypeCode = (typeof ACCOUNT_TYPES)[number];

// =============================================================================
// Transactions and splits
// =============================================================================

/** A journal transaction. Owns its splits exclusively. */
export interface TransactionRecord {
  readonly id: string;
  /** External voucher number. */
  readonly num: string | null;
  readonly postDate: IsoDate;
  readonly enteredAt: Timestamp;
  readonly description: string | null;
  readonly businessType: string | null;
  readonly referenceNo: string | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/** n = not reconciled, c = cleared, y = reconciled */
export type ReconcileState = "n" | "c" | "y";

/**
 * One leg of a transaction. The amount is `valueNum / valueDenom`,
 * where `valueDenom` is a power of ten.
 */
export interface SplitRecord {
  readonly id: string;
  readonly transactionId: string;
  readonly accountId: string;
  /** Zero-based position within the owning transaction. */
  readonly position: number;
  readonly memo: string | null;
  readonly reconcileState: ReconcileState;
  readonly valueNum: bigint;
  readonly valueDenom: bigint;
  readonly cashflowTypeId: string | null;
  readonly createdAt: Timestamp;
}

// =============================================================================
// Cash-flow classification
// =============================================================================

export const FLOW_TYPES = ["operating", "investing", "financing"] as const;
export type FlowType = (typeof FLOW_TYPES)[number];

export const CASHFLOW_DIRECTIONS = ["inflow", "outflow"] as const;
export type CashflowDirection = (typeof CASHFLOW_DIRECTIONS)[number];

/** Classification attached to cash and bank splits for the cash-flow statement. */
export interface CashflowTypeRecord {
  readonly id: string;
  readonly code: string;
  readonly name: string;
  readonly category: string | null;
  readonly flowType: FlowType;
  readonly direction: CashflowDirection;
  readonly isActive: boolean;
  readonly sortOrder: number;
  readonly createdAt: Timestamp;
}

// =============================================================================
// Business documents
// =============================================================================

export const BUSINESS_DOCUMENT_TYPES = ["sale", "purchase", "expense", "cashflow"] as const;
export type BusinessDocumentType = (typeof BUSINESS_DOCUMENT_TYPES)[number];

/** A business event backed by exactly one generated transaction. Immutable once posted. */
export interface BusinessDocumentRecord {
  readonly id: string;
  readonly docType: BusinessDocumentType;
  readonly docNo: string;
  readonly docDate: IsoDate;
  readonly partnerName: string | null;
  readonly referenceNo: string | null;
  readonly description: string | null;
  /** Sum of the item amounts. */
  readonly totalAmount: Amount;
  readonly status: "posted";
  readonly transactionId: string;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/** A debit/credit account pair and a positive amount. */
export interface BusinessDocumentItemRecord {
  readonly id: string;
  readonly documentId: string;
  readonly lineNo: number;
  readonly description: string | null;
  readonly memo: string | null;
  readonly debitAccountId: string;
  readonly creditAccountId: string;
  readonly quantity: Amount | null;
  readonly unitPrice: Amount | null;
  readonly amount: Amount;
  readonly cashflowTypeId: string | null;
  readonly createdAt: Timestamp;
}

// =============================================================================
// Recurring charges
// =============================================================================

/** A fixed monthly charge posted automatically on its due day. */
export interface FixedExpenseRecord {
  readonly id: string;
  readonly name: string;
  readonly amount: Amount;
  /** Debited on every run. */
  readonly expenseAccountId: string;
  /** Credited when its balance covers the amount. */
  readonly primaryAccountId: string | null;
  /** Credited when the primary account is short or missing. */
  readonly fallbackAccountId: string | null;
  /** Tag put on the funding split when it draws on a cash account. */
  readonly cashflowTypeId: string | null;
  /** 1-28; clamped to the month length when computing the due date. */
  readonly dayOfMonth: number;
  readonly isActive: boolean;
  /** First day of the month of the last successful run. */
  readonly lastRunMonth: IsoDate | null;
  readonly lastRunAt: Timestamp | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

// =============================================================================
// Report cache
// =============================================================================

export const REPORT_TYPES = ["balance_sheet", "income_statement", "cashflow_statement"] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

/** One cached statement for one month. `payload` is the serialized statement. */
export interface MonthlyReportRecord {
  readonly id: string;
  /** First day of the report month. */
  readonly reportMonth: IsoDate;
  readonly reportType: ReportType;
  readonly payload: string;
  /** SHA-256 of the canonical JSON payload. */
  readonly payloadHash: string;
  readonly createdAt: Timestamp;
}
