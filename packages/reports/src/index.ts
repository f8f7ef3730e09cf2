/**
 * @tally/reports — Financial statements.
 *
 * Derives the balance sheet, income statement and cash-flow statement
 * from split history, and caches closed months as hashed snapshots.
 */

// Generator
export {
  FinancialReports,
  buildBalanceSheet,
  buildIncomeStatement,
  buildCashflowStatement,
  DEFAULT_BALANCE_TOLERANCE,
} from "./statements.js";

// Classification and roll-up
export { classifyAccountType, isCreditNormal, SECTION_BY_ACCOUNT_TYPE } from "./classification.js";
export { withSubtotals } from "./hierarchy.js";

// History reads
export { splitsPostedWithin, accountAmounts, cashflowAmounts } from "./queries.js";
export type { PostDateRange } from "./queries.js";

// Monthly cache
export { MonthlyReportCache, getOrCreateMonthlySnapshot, DEFAULT_RETENTION } from "./monthly-cache.js";
export {
  BalanceSheetSchema,
  IncomeStatementSchema,
  CashflowStatementSchema,
  StatementLineSchema,
  encodeReport,
  hashPayload,
  decodeBalanceSheet,
  decodeIncomeStatement,
  decodeCashflowStatement,
} from "./payload.js";
export type { EncodedPayload } from "./payload.js";

// Types
export type {
  StatementSection,
  StatementLine,
  BalanceSheet,
  IncomeStatement,
  CashflowItem,
  CashflowSection,
  CashflowStatement,
  MonthlyReportSet,
  MonthlySnapshot,
  RetentionPolicy,
  ReportOptions,
} from "./types.js";
