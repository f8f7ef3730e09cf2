/**
 * @tally/treasury — Business documents and recurring charges.
 *
 * Both produce ledger postings through @tally/ledger inside the
 * caller's unit of work.
 */

// Business documents
export {
  DocumentComposer,
  DOCUMENT_LABELS,
  DOCUMENT_PREFIXES,
  formatDocumentNumber,
} from "./documents.js";

// Fixed expenses
export {
  FixedExpenseScheduler,
  dueDateFor,
  isDue,
  runDueFixedExpenses,
  selectFundingAccount,
} from "./fixed-expenses.js";
export type { ListFixedExpensesOptions } from "./fixed-expenses.js";

// Types
export type {
  BusinessDocumentInput,
  DocumentItemInput,
  DocumentQuery,
  DocumentWithItems,
  FixedExpenseInput,
  FixedExpensePatchInput,
  FixedExpenseRun,
  FundingChoice,
} from "./types.js";
