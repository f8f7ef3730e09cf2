/**
 * @tally/ledger — Double-entry ledger engine.
 *
 * Enforces double-entry accounting invariants:
 * - Every transaction's splits sum to exactly zero
 * - Cached account balances equal the sum of their splits after every write
 * - All monetary arithmetic uses bigint (no floating point)
 * - Split amounts persist as exact numerator/denominator pairs
 *
 * Every class here is bound to one unit of work from @tally/store;
 * the caller owns commit and rollback.
 */

// Core engine
export { Ledger } from "./ledger.js";

// Registries
export { AccountRegistry } from "./accounts.js";
export type { ListAccountsOptions } from "./accounts.js";
export { CashflowTypeRegistry, DEFAULT_CASHFLOW_TYPES } from "./cashflow-types.js";
export type { ListCashflowTypesOptions } from "./cashflow-types.js";

// Balance computation
export {
  auditBalances,
  computeBalances,
  computeTrialBalance,
  splitAmount,
  splitScaledAmount,
} from "./balance-calculator.js";

// Amount codec
export { toFraction, fromFraction, fractionToScaled, fractionToDecimal, sumExact } from "./amount-codec.js";
export type { Fraction } from "./amount-codec.js";

// Money arithmetic
export {
  AMOUNT_SCALE,
  parseAmount,
  formatAmount,
  normalizeAmount,
  negateAmount,
  sumAmounts,
  compareAmounts,
  isZeroAmount,
  isPositiveAmount,
  withinTolerance,
} from "./money-math.js";

// Clock and ids
export { newId, nowTimestamp, resolveContext, today } from "./context.js";
export type { EngineContext } from "./context.js";

// Types
export type {
  Clock,
  IdGenerator,
  EngineOptions,
  AccountInput,
  AccountPatchInput,
  AccountBalanceRow,
  CashflowTypeInput,
  SplitInput,
  TransactionInput,
  PostedTransaction,
  ListTransactionsOptions,
  SplitDetail,
  SplitDetailQuery,
  BalanceDiscrepancy,
  BalanceAudit,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
  LedgerErrorKind,
  ErrorDetails,
} from "./types.js";

export { LedgerError, ValidationError, NotFoundError } from "./types.js";
