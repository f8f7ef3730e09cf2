/**
 * @tally/reports — Ledger history reads.
 *
 * Statements are computed from splits and their transactions' post
 * dates, never from the balances cached on account rows.
 */

import type { IsoDate, SplitRecord } from "@tally/types";
import type { UnitOfWork } from "@tally/store";
import { computeBalances, splitScaledAmount } from "@tally/ledger";

export interface PostDateRange {
  /** Inclusive; open-ended when omitted. */
  readonly from?: IsoDate | undefined;
  /** Inclusive. */
  readonly to: IsoDate;
}

/** Splits whose transaction was posted within `range`. */
export async function splitsPostedWithin(uow: UnitOfWork, range: PostDateRange): Promise<readonly SplitRecord[]> {
  const transactions = await uow.table("transactions").find({ postDate: { gte: range.from, lte: range.to } });
  if (transactions.length === 0) {
    return [];
  }
  return uow.table("splits").find({ transactionId: { in: transactions.map((t) => t.id) } });
}

/** Signed sum per account over `range`, scaled by 10^6. */
export async function accountAmounts(uow: UnitOfWork, range: PostDateRange): Promise<Map<string, bigint>> {
  return computeBalances(await splitsPostedWithin(uow, range));
}

/**
 * Signed sum per cash-flow type over `range`, scaled by 10^6.
 * Untagged splits are left out.
 */
export async function cashflowAmounts(uow: UnitOfWork, range: PostDateRange): Promise<Map<string, bigint>> {
  const totals = new Map<string, bigint>();
  for (const split of await splitsPostedWithin(uow, range)) {
    if (split.cashflowTypeId === null) continue;
    totals.set(split.cashflowTypeId, (totals.get(split.cashflowTypeId) ?? 0n) + splitScaledAmount(split));
  }
  return totals;
}
