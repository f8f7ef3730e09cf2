/**
 * @tally/ledger — Balance calculation engine.
 *
 * Derives balances from split history, independent of the balances
 * cached on the account rows.
 *
 * Rules:
 * - Balances are signed: debit-positive, credit-negative
 * - All arithmetic is exact (bigint scaled by 10^6)
 * - Discrepancies and imbalances are reported as data, never thrown
 */

import type { AccountRecord, Amount, IsoDate, SplitRecord } from "@tally/types";
import { fractionToScaled } from "./amount-codec.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type { BalanceAudit, BalanceDiscrepancy, TrialBalance, TrialBalanceLine } from "./types.js";

type SplitValue = Pick<SplitRecord, "valueNum" | "valueDenom">;

/** Signed split amount, scaled by 10^6. */
export function splitScaledAmount(split: SplitValue): bigint {
  return fractionToScaled(split.valueNum, split.valueDenom);
}

/** Signed split amount as a canonical decimal string. */
export function splitAmount(split: SplitValue): Amount {
  return formatAmount(splitScaledAmount(split));
}

/**
 * Sum splits per account.
 * Accounts without splits are absent from the result.
 */
export function computeBalances(
  splits: Iterable<Pick<SplitRecord, "accountId" | "valueNum" | "valueDenom">>,
): Map<string, bigint> {
  const balances = new Map<string, bigint>();
  for (const split of splits) {
    balances.set(split.accountId, (balances.get(split.accountId) ?? 0n) + splitScaledAmount(split));
  }
  return balances;
}

/**
 * Compare every account's stored balance with the sum of its splits.
 */
export function auditBalances(
  accounts: readonly AccountRecord[],
  splits: Iterable<SplitRecord>,
): BalanceAudit {
  const derived = computeBalances(splits);
  const discrepancies: BalanceDiscrepancy[] = [];

  for (const account of accounts) {
    const recorded = parseAmount(account.currentBalance);
    const expected = derived.get(account.id) ?? 0n;
    if (recorded !== expected) {
      discrepancies.push({
        accountId: account.id,
        accountName: account.name,
        recorded: formatAmount(recorded),
        derived: formatAmount(expected),
        difference: formatAmount(recorded - expected),
      });
    }
  }

  return {
    accountsChecked: accounts.length,
    discrepancies,
    consistent: discrepancies.length === 0,
  };
}

/**
 * Compute the trial balance from splits posted up to `asOf`.
 *
 * The caller passes only the splits in range. Accounts with a zero
 * derived balance are omitted; lines keep the order of `accounts`.
 */
export function computeTrialBalance(
  accounts: readonly AccountRecord[],
  splits: Iterable<SplitRecord>,
  asOf: IsoDate,
): TrialBalance {
  const derived = computeBalances(splits);
  const lines: TrialBalanceLine[] = [];
  let totalDebit = 0n;
  let totalCredit = 0n;

  for (const account of accounts) {
    const balance = derived.get(account.id) ?? 0n;
    if (balance === 0n) continue;

    const debit = balance > 0n ? balance : 0n;
    const credit = balance < 0n ? -balance : 0n;
    totalDebit += debit;
    totalCredit += credit;

    lines.push({
      accountId: account.id,
      accountName: account.name,
      accountType: account.accountType,
      debit: formatAmount(debit),
      credit: formatAmount(credit),
    });
  }

  return {
    asOf,
    lines,
    totalDebit: formatAmount(totalDebit),
    totalCredit: formatAmount(totalCredit),
    balanced: totalDebit === totalCredit,
  };
}
