/**
 * Tests for the pure balance calculation functions.
 *
 * Covers:
 * - Summing splits per account, mixed denominators included
 * - Audit discrepancies
 * - Trial balance columns and the balanced flag
 */

import { describe, it, expect } from "vitest";
import type { AccountRecord, SplitRecord } from "@tally/types";
import {
  auditBalances,
  computeBalances,
  computeTrialBalance,
  splitAmount,
} from "../src/balance-calculator.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2024-01-15T10:00:00.000Z";

function account(id: string, currentBalance: string, accountType = "ASSET"): AccountRecord {
  return {
    id,
    name: id.toUpperCase(),
    accountType,
    parentId: null,
    code: null,
    description: null,
    hidden: false,
    placeholder: false,
    isCash: false,
    currentBalance,
    createdAt: TS,
    updatedAt: TS,
  };
}

let splitSeq = 0;
function split(accountId: string, valueNum: bigint, valueDenom: bigint): SplitRecord {
  splitSeq += 1;
  return {
    id: `s${String(splitSeq)}`,
    transactionId: "t1",
    accountId,
    position: splitSeq,
    memo: null,
    reconcileState: "n",
    valueNum,
    valueDenom,
    cashflowTypeId: null,
    createdAt: TS,
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("computeBalances", () => {
  it("sums splits with different denominators exactly", () => {
    const balances = computeBalances([
      split("a", 150n, 100n),
      split("a", 1_234n, 1_000n),
      split("b", -2_734n, 1_000n),
    ]);
    expect(balances.get("a")).toBe(2_734_000n);
    expect(balances.get("b")).toBe(-2_734_000n);
    expect(balances.has("c")).toBe(false);
  });

  it("formats a split amount", () => {
    expect(splitAmount(split("a", -1_234n, 1_000n))).toBe("-1.234");
  });
});

describe("auditBalances", () => {
  it("lists each account whose cached balance drifted", () => {
    const audit = auditBalances(
      [account("a", "1.50"), account("b", "-1.00"), account("c", "0.00")],
      [split("a", 150n, 100n), split("b", -150n, 100n)],
    );

    expect(audit).toEqual({
      accountsChecked: 3,
      consistent: false,
      discrepancies: [{ accountId: "b", accountName: "B", recorded: "-1.00", derived: "-1.50", difference: "0.50" }],
    });
  });
});

describe("computeTrialBalance", () => {
  it("puts positive balances in the debit column and negative in the credit column", () => {
    const trial = computeTrialBalance(
      [account("cash", "0", "CASH"), account("sales", "0", "INCOME"), account("idle", "0")],
      [split("cash", 5_000n, 100n), split("sales", -5_000n, 100n)],
      "2024-01-31",
    );

    expect(trial).toEqual({
      asOf: "2024-01-31",
      lines: [
        { accountId: "cash", accountName: "CASH", accountType: "CASH", debit: "50.00", credit: "0.00" },
        { accountId: "sales", accountName: "SALES", accountType: "INCOME", debit: "0.00", credit: "50.00" },
      ],
      totalDebit: "50.00",
      totalCredit: "50.00",
      balanced: true,
    });
  });

  it("flags an unbalanced history", () => {
    const trial = computeTrialBalance([account("a", "0")], [split("a", 1n, 100n)], "2024-01-31");
    expect(trial.balanced).toBe(false);
    expect(trial.totalDebit).toBe("0.01");
    expect(trial.totalCredit).toBe("0.00");
  });
});
