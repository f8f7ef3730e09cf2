/**
 * @tally/reports domain types.
 *
 * Statements are plain data: every amount is a canonical decimal string,
 * every date a `YYYY-MM-DD` string, so a statement serializes to JSON
 * without custom encoders.
 */

import type { Amount, CashflowDirection, IsoDate } from "@tally/types";
import type { EngineOptions } from "@tally/ledger";

/** Statement section an account type rolls into. */
export type StatementSection = "asset" | "liability" | "equity" | "revenue" | "expense";

// =============================================================================
// Lines
// =============================================================================

/**
 * One row of a balance sheet or income statement.
 *
 * Amounts are reporting-positive: credit-normal sections (liabilities,
 * equity, revenue) are negated from their ledger sign.
 */
export interface StatementLine {
  /** Account id, or `{parentId}:subtotal` for a subtotal row. */
  readonly lineId: string;
  readonly accountId: string;
  readonly code: string;
  readonly name: string;
  readonly accountType: string;
  readonly parentId: string | null;
  readonly placeholder: boolean;
  readonly isSubtotal: boolean;
  readonly amount: Amount;
}

// =============================================================================
// Statements
// =============================================================================

export interface BalanceSheet {
  readonly reportDate: IsoDate;
  readonly assets: readonly StatementLine[];
  readonly liabilities: readonly StatementLine[];
  readonly equity: readonly StatementLine[];
  readonly assetTotal: Amount;
  readonly liabilityTotal: Amount;
  readonly equityTotal: Amount;
  /** Revenue minus expense over all history up to the report date. */
  readonly netIncome: Amount;
  readonly equityWithIncome: Amount;
  readonly totalLiabilityEquity: Amount;
  /** `|assets - (liabilities + equity + net income)| < tolerance` */
  readonly isBalanced: boolean;
}

export interface IncomeStatement {
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;
  readonly revenues: readonly StatementLine[];
  readonly expenses: readonly StatementLine[];
  readonly revenueTotal: Amount;
  readonly expenseTotal: Amount;
  readonly netIncome: Amount;
}

/** Movement tagged with one cash-flow type over the period, as an absolute amount. */
export interface CashflowItem {
  readonly cashflowTypeId: string;
  readonly code: string;
  readonly name: string;
  readonly direction: CashflowDirection;
  readonly amount: Amount;
}

export interface CashflowSection {
  readonly items: readonly CashflowItem[];
  readonly inflow: Amount;
  readonly outflow: Amount;
  readonly net: Amount;
}

export interface CashflowStatement {
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;
  readonly operating: CashflowSection;
  readonly investing: CashflowSection;
  readonly financing: CashflowSection;
  readonly totalNet: Amount;
}

/** The three statements cached for one month. */
export interface MonthlyReportSet {
  readonly balanceSheet: BalanceSheet;
  readonly incomeStatement: IncomeStatement;
  readonly cashflowStatement: CashflowStatement;
}

export interface MonthlySnapshot {
  /** First day of the reported month. */
  readonly month: IsoDate;
  readonly reports: MonthlyReportSet;
  /** True when served from the cache rather than generated. */
  readonly fromCache: boolean;
}

// =============================================================================
// Options
// =============================================================================

/**
 * How many cached months survive a write.
 *
 * `keep-last` keeps the month just written plus the most recent other
 * months up to `count` in total; `count: 1` is a single-slot cache.
 */
export type RetentionPolicy =
  | { readonly kind: "keep-last"; readonly count: number }
  | { readonly kind: "keep-all" };

export interface ReportOptions extends EngineOptions {
  /** Balance-sheet check tolerance. Default "0.01". */
  readonly tolerance?: Amount | undefined;
  /** Default: keep the last month only. */
  readonly retention?: RetentionPolicy | undefined;
}
