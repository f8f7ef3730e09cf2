/**
 * @tally/types — Shared domain types for the Tally stack.
 *
 * - Persistent records (accounts, transactions, splits, documents, ...)
 * - Closed vocabularies (account types, cash-flow classes, report types)
 * - Runtime guards for boundary values
 * - Date-only calendar helpers
 *
 * Design rules:
 * - All record types are readonly
 * - No runtime dependencies
 */

// Records and vocabularies
export type {
  Amount,
  IsoDate,
  Timestamp,
  AccountRecord,
  AccountTypeCode,
  TransactionRecord,
  ReconcileState,
  SplitRecord,
  FlowType,
  CashflowDirection,
  CashflowTypeRecord,
  BusinessDocumentType,
  BusinessDocumentRecord,
  BusinessDocumentItemRecord,
  FixedExpenseRecord,
  ReportType,
  MonthlyReportRecord,
} from "./financial.js";

export {
  ACCOUNT_TYPES,
  FLOW_TYPES,
  CASHFLOW_DIRECTIONS,
  BUSINESS_DOCUMENT_TYPES,
  REPORT_TYPES,
} from "./financial.js";

// Runtime type guards
export {
  isAmount,
  isIsoDate,
  isAccountTypeCode,
  isKnownAccountType,
  isFlowType,
  isCashflowDirection,
  isBusinessDocumentType,
} from "./guards.js";

// Calendar
export type { CalendarDate } from "./calendar.js";
export {
  daysInMonth,
  formatIsoDate,
  parseIsoDate,
  toIsoDate,
  firstDayOfMonth,
  lastDayOfMonth,
  previousMonth,
  startOfYear,
  compactDate,
} from "./calendar.js";
