/**
 * @tally/treasury domain types.
 *
 * Treasury turns business events into ledger postings:
 * - Business documents (sale, purchase, expense, cash movement)
 * - Fixed monthly charges funded from a primary or fallback account
 */

import type {
  Amount,
  BusinessDocumentItemRecord,
  BusinessDocumentRecord,
  BusinessDocumentType,
  IsoDate,
} from "@tally/types";

// =============================================================================
// Business documents
// =============================================================================

/** One line: debit one account, credit another, by a positive amount. */
export interface DocumentItemInput {
  readonly lineNo?: number | null | undefined;
  readonly description?: string | null | undefined;
  readonly memo?: string | null | undefined;
  readonly debitAccountId: string;
  readonly creditAccountId: string;
  readonly amount: Amount;
  readonly quantity?: Amount | null | undefined;
  readonly unitPrice?: Amount | null | undefined;
  /** Overrides the document's default cash-flow type. */
  readonly cashflowTypeId?: string | null | undefined;
}

export interface BusinessDocumentInput {
  /** Generated as `{prefix}-{YYYYMMDD}-{seq}` when blank. */
  readonly docNo?: string | null | undefined;
  readonly docDate: IsoDate;
  readonly partnerName?: string | null | undefined;
  readonly referenceNo?: string | null | undefined;
  readonly description?: string | null | undefined;
  /** Default cash-flow type for items that carry none. */
  readonly cashflowTypeId?: string | null | undefined;
  readonly items: readonly DocumentItemInput[];
}

export interface DocumentWithItems {
  readonly document: BusinessDocumentRecord;
  readonly items: readonly BusinessDocumentItemRecord[];
}

export interface DocumentQuery {
  readonly type?: BusinessDocumentType | undefined;
  /** Inclusive. */
  readonly from?: IsoDate | undefined;
  /** Inclusive. */
  readonly to?: IsoDate | undefined;
}

// =============================================================================
// Fixed expenses
// =============================================================================

export interface FixedExpenseInput {
  readonly name: string;
  readonly amount: Amount;
  readonly expenseAccountId: string;
  readonly primaryAccountId?: string | null | undefined;
  readonly fallbackAccountId?: string | null | undefined;
  readonly cashflowTypeId?: string | null | undefined;
  /** 1-28. */
  readonly dayOfMonth: number;
  readonly isActive?: boolean | undefined;
}

/** Omitted fields stay unchanged; `null` clears a nullable field. */
export type FixedExpensePatchInput = Partial<FixedExpenseInput>;

/** Outcome of one run attempt. A null transaction id means nothing was posted. */
export interface FixedExpenseRun {
  readonly expenseId: string;
  readonly expenseName: string;
  readonly transactionId: string | null;
  readonly warnings: readonly string[];
}

/** Which account funds a charge, and what the choice had to warn about. */
export interface FundingChoice {
  readonly accountId: string | null;
  readonly warnings: readonly string[];
}
