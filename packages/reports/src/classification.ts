/**
 * Account type → statement section mapping.
 */

import type { AccountTypeCode } from "@tally/types";
import { isAccountTypeCode } from "@tally/types";
import type { StatementSection } from "./types.js";

export const SECTION_BY_ACCOUNT_TYPE = {
  ASSET: "asset",
  CURRENT_ASSET: "asset",
  FIXED_ASSET: "asset",
  NON_CURRENT_ASSET: "asset",
  CASH: "asset",
  BANK: "asset",
  RECEIVABLE: "asset",
  INVENTORY: "asset",
  LIABILITY: "liability",
  CURRENT_LIABILITY: "liability",
  NON_CURRENT_LIABILITY: "liability",
  PAYABLE: "liability",
  EQUITY: "equity",
  CAPITAL: "equity",
  RETAINED_EARNINGS: "equity",
  INCOME: "revenue",
  REVENUE: "revenue",
  SALES: "revenue",
  EXPENSE: "expense",
  COST: "expense",
  OPERATING_EXPENSE: "expense",
  COGS: "expense",
} as const satisfies Record<AccountTypeCode, StatementSection>;

/**
 * Section for a raw account type, case-insensitive.
 * Unknown types return null and stay out of every statement.
 */
export function classifyAccountType(accountType: string): StatementSection | null {
  const code = accountType.trim().toUpperCase();
  return isAccountTypeCode(code) ? SECTION_BY_ACCOUNT_TYPE[code] : null;
}

/** Liabilities, equity and revenue carry credit (negative) ledger balances. */
export function isCreditNormal(section: StatementSection): boolean {
  return section === "liability" || section === "equity" || section === "revenue";
}
