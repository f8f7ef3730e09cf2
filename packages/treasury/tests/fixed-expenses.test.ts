/**
 * Tests for the recurring charge scheduler.
 *
 * Covers:
 * - Due dates clamped to short months
 * - isDue idempotence around a successful run
 * - Funding account selection and its warnings
 * - Execution, skips, and the batch run
 * - Cash-flow tagging of cash funding legs
 * - Configuration validation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccountRegistry, Ledger } from "@tally/ledger";
import type { AccountRecord, FixedExpenseRecord } from "@tally/types";
import {
  FixedExpenseScheduler,
  dueDateFor,
  isDue,
  runDueFixedExpenses,
  selectFundingAccount,
} from "../src/fixed-expenses.js";
import type { FixedExpenseInput } from "../src/types.js";
import type { Fixture } from "./helpers.js";
import { NOW, balanceOf, createFixture } from "./helpers.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

let fx: Fixture;

function withScheduler<T>(work: (scheduler: FixedExpenseScheduler) => Promise<T>): Promise<T> {
  return fx.store.transaction((uow) => work(new FixedExpenseScheduler(uow, fx.options)));
}

async function fund(accountId: string, amount: string): Promise<void> {
  await fx.store.transaction((uow) =>
    new Ledger(uow, fx.options).post({
      postDate: "2024-03-01",
      splits: [
        { accountId, amount, cashflowTypeId: fx.cashflow.salesIn },
        { accountId: fx.accounts.sales, amount: `-${amount}` },
      ],
    }),
  );
}

function rentInput(overrides: Partial<FixedExpenseInput> = {}): FixedExpenseInput {
  return {
    name: "Office rent",
    amount: "300",
    expenseAccountId: fx.accounts.rent,
    primaryAccountId: fx.accounts.bank,
    fallbackAccountId: fx.accounts.cash,
    cashflowTypeId: fx.cashflow.expensesOut,
    dayOfMonth: 10,
    ...overrides,
  };
}

function account(name: string, currentBalance: string): AccountRecord {
  return {
    id: name.toLowerCase(),
    name,
    accountType: "BANK",
    parentId: null,
    code: null,
    description: null,
    hidden: false,
    placeholder: false,
    isCash: true,
    currentBalance,
    createdAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
  };
}

beforeEach(async () => {
  fx = await createFixture();
});

// ─── Due dates ───────────────────────────────────────────────────────────

describe("dueDateFor / isDue", () => {
  it("clamps day 30 to the 28th in February of a non-leap year", () => {
    expect(dueDateFor({ dayOfMonth: 30 }, "2023-02-10")).toBe("2023-02-28");
    expect(isDue({ dayOfMonth: 30, lastRunMonth: null }, "2023-02-27")).toBe(false);
    expect(isDue({ dayOfMonth: 30, lastRunMonth: null }, "2023-02-28")).toBe(true);
  });

  it("clamps to the 29th in a leap year", () => {
    expect(dueDateFor({ dayOfMonth: 31 }, "2024-02-01")).toBe("2024-02-29");
  });

  it("treats days below 1 as the 1st", () => {
    expect(dueDateFor({ dayOfMonth: 0 }, "2024-05-20")).toBe("2024-05-01");
  });

  it("is not due again in a month that already ran", () => {
    const expense = { dayOfMonth: 5, lastRunMonth: "2024-03-01" };
    expect(isDue(expense, "2024-03-31")).toBe(false);
    expect(isDue(expense, "2024-04-05")).toBe(true);
  });

  it("gives the same answer when asked twice", () => {
    const expense = { dayOfMonth: 15, lastRunMonth: null };
    expect(isDue(expense, "2024-03-15")).toBe(isDue(expense, "2024-03-15"));
    expect(isDue(expense, "2024-03-14")).toBe(isDue(expense, "2024-03-14"));
  });
});

// ─── Funding ─────────────────────────────────────────────────────────────

describe("selectFundingAccount", () => {
  it("uses the primary account when it covers the amount", () => {
    expect(selectFundingAccount("300", account("Bank", "300.00"), account("Cash", "0"))).toEqual({
      accountId: "bank",
      warnings: [],
    });
  });

  it("falls back when the primary is short", () => {
    expect(selectFundingAccount("300", account("Bank", "299.99"), account("Cash", "500"))).toEqual({
      accountId: "cash",
      warnings: ["Primary account Bank has insufficient balance (current 299.99)."],
    });
  });

  it("warns again when the fallback is short too", () => {
    expect(selectFundingAccount("300", account("Bank", "10.00"), account("Cash", "20.00"))).toEqual({
      accountId: "cash",
      warnings: [
        "Primary account Bank has insufficient balance (current 10.00).",
        "Fallback account Cash is also short (current 20.00); its balance may go negative.",
      ],
    });
  });

  it("uses the fallback when no primary is configured", () => {
    expect(selectFundingAccount("1", undefined, account("Cash", "5.00"))).toEqual({
      accountId: "cash",
      warnings: ["No primary account configured."],
    });
  });

  it("charges a short primary when there is no fallback", () => {
    expect(selectFundingAccount("300", account("Bank", "0.00"), undefined)).toEqual({
      accountId: "bank",
      warnings: [
        "Primary account Bank has insufficient balance (current 0.00).",
        "No fallback account configured; charging the primary account.",
      ],
    });
  });

  it("chooses nothing when neither account is configured", () => {
    expect(selectFundingAccount("1", undefined, undefined)).toEqual({
      accountId: null,
      warnings: ["No primary account configured.", "No fallback account configured; charging the primary account."],
    });
  });
});

// ─── Execution ───────────────────────────────────────────────────────────

describe("execute", () => {
  it("posts the charge from the primary account and stamps the run", async () => {
    await fund(fx.accounts.bank, "1000");
    const expense = await withScheduler((s) => s.create(rentInput()));

    const run = await withScheduler((s) => s.execute(expense.id, "2024-03-12"));

    expect(run.warnings).toEqual([]);
    expect(run.transactionId).not.toBeNull();
    expect(await balanceOf(fx, fx.accounts.bank)).toBe("700.00");
    expect(await balanceOf(fx, fx.accounts.rent)).toBe("300.00");

    const stamped = await withScheduler((s) => s.require(expense.id));
    expect(stamped.lastRunMonth).toBe("2024-03-01");
    expect(stamped.lastRunAt).toBe(NOW.toISOString());

    const posted = await fx.store.transaction((uow) => new Ledger(uow, fx.options).require(run.transactionId ?? ""));
    expect(posted.transaction.description).toBe("2024-03 Office rent fixed expense");
    expect(posted.splits.map((s) => [s.accountId, s.valueNum, s.memo, s.cashflowTypeId])).toEqual([
      [fx.accounts.rent, 30_000n, "Office rent automatic charge", null],
      [fx.accounts.bank, -30_000n, "Office rent automatic charge", fx.cashflow.expensesOut],
    ]);
  });

  it("is not due for the rest of the month after a successful run", async () => {
    await fund(fx.accounts.bank, "1000");
    const expense = await withScheduler((s) => s.create(rentInput()));
    await withScheduler((s) => s.execute(expense.id, "2024-03-12"));

    const stamped = await withScheduler((s) => s.require(expense.id));
    for (const date of ["2024-03-10", "2024-03-20", "2024-03-31"]) {
      expect(isDue(stamped, date)).toBe(false);
    }

    const again = await withScheduler((s) => s.execute(expense.id, "2024-03-20"));
    expect(again).toEqual({
      expenseId: expense.id,
      expenseName: "Office rent",
      transactionId: null,
      warnings: ["Not due yet (due on day 10); not executed."],
    });
    expect(await balanceOf(fx, fx.accounts.bank)).toBe("700.00");
  });

  it("skips an inactive expense", async () => {
    const expense = await withScheduler((s) => s.create(rentInput({ isActive: false })));
    const run = await withScheduler((s) => s.execute(expense.id, "2024-03-12", true));
    expect(run.warnings).toEqual(["Fixed expense is inactive; not executed."]);
    expect(run.transactionId).toBeNull();
  });

  it("skips before the due day unless forced", async () => {
    await fund(fx.accounts.bank, "1000");
    const expense = await withScheduler((s) => s.create(rentInput()));

    const early = await withScheduler((s) => s.execute(expense.id, "2024-03-09"));
    expect(early.transactionId).toBeNull();

    const forced = await withScheduler((s) => s.execute(expense.id, "2024-03-09", true));
    expect(forced.transactionId).not.toBeNull();
  });

  it("skips a non-positive amount", async () => {
    const expense = await withScheduler((s) => s.create(rentInput({ amount: "0" })));
    const run = await withScheduler((s) => s.execute(expense.id, "2024-03-12"));
    expect(run.warnings).toEqual(["Amount must be greater than 0; not executed."]);
  });

  it("charges the fallback when the primary is short, letting it go negative", async () => {
    await fund(fx.accounts.bank, "100");
    const expense = await withScheduler((s) => s.create(rentInput()));

    const run = await withScheduler((s) => s.execute(expense.id, "2024-03-12"));

    expect(run.warnings).toEqual([
      "Primary account Bank has insufficient balance (current 100.00).",
      "Fallback account Cash is also short (current 0.00); its balance may go negative.",
    ]);
    expect(await balanceOf(fx, fx.accounts.cash)).toBe("-300.00");
    expect(await balanceOf(fx, fx.accounts.bank)).toBe("100.00");
  });

  it("leaves the cash-flow type off a non-cash funding leg", async () => {
    const expense = await withScheduler((s) =>
      s.create(rentInput({ primaryAccountId: fx.accounts.payable, fallbackAccountId: null })),
    );

    const run = await withScheduler((s) => s.execute(expense.id, "2024-03-12"));

    const posted = await fx.store.transaction((uow) => new Ledger(uow, fx.options).require(run.transactionId ?? ""));
    expect(posted.splits.map((s) => [s.accountId, s.valueNum, s.cashflowTypeId])).toEqual([
      [fx.accounts.rent, 30_000n, null],
      [fx.accounts.payable, -30_000n, null],
    ]);
  });

  it("refuses to draw on an account that became cash without a cash-flow type", async () => {
    const expense = await withScheduler((s) =>
      s.create(rentInput({ primaryAccountId: fx.accounts.payable, fallbackAccountId: null, cashflowTypeId: null })),
    );
    await fx.store.transaction((uow) =>
      new AccountRegistry(uow, fx.options).update(fx.accounts.payable, { isCash: true }),
    );

    await expect(withScheduler((s) => s.execute(expense.id, "2024-03-12"))).rejects.toMatchObject({
      code: "CASHFLOW_TYPE_REQUIRED",
      details: { accountId: fx.accounts.payable },
    });
    expect(await balanceOf(fx, fx.accounts.payable)).toBe("0.00");
    expect((await withScheduler((s) => s.require(expense.id))).lastRunMonth).toBeNull();
  });

  it("posts nothing without any funding account", async () => {
    const expense = await withScheduler((s) =>
      s.create(rentInput({ primaryAccountId: null, fallbackAccountId: null })),
    );
    const run = await withScheduler((s) => s.execute(expense.id, "2024-03-12"));

    expect(run.transactionId).toBeNull();
    expect(run.warnings).toEqual([
      "No primary account configured.",
      "No fallback account configured; charging the primary account.",
      "No usable funding account configured; not executed.",
    ]);
    expect((await withScheduler((s) => s.require(expense.id))).lastRunMonth).toBeNull();
  });
});

// ─── Batch run ───────────────────────────────────────────────────────────

describe("runDueFixedExpenses", () => {
  it("runs only active, due expenses and isolates failures", async () => {
    await fund(fx.accounts.bank, "1000");

    const rent = await withScheduler((s) => s.create(rentInput({ dayOfMonth: 5 })));
    await withScheduler((s) => s.create(rentInput({ name: "Insurance", dayOfMonth: 20 })));
    await withScheduler((s) => s.create(rentInput({ name: "Cleaning", dayOfMonth: 5, isActive: false })));
    const broken = await withScheduler((s) =>
      s.create(
        rentInput({
          name: "Software",
          primaryAccountId: fx.accounts.payable,
          fallbackAccountId: null,
          cashflowTypeId: null,
          dayOfMonth: 1,
        }),
      ),
    );
    await fx.store.transaction((uow) =>
      new AccountRegistry(uow, fx.options).update(fx.accounts.payable, { isCash: true }),
    );

    const results = await runDueFixedExpenses(fx.store, "2024-03-10", fx.options);

    expect(results.map((r) => r.expenseId)).toEqual([broken.id, rent.id]);
    expect(results[0]?.transactionId).toBeNull();
    expect(results[0]?.warnings).toEqual([
      'Run failed: Fixed expense "Software" draws on cash account Payable but has no cash-flow type',
    ]);
    expect(results[1]?.transactionId).not.toBeNull();
    expect(await balanceOf(fx, fx.accounts.bank)).toBe("700.00");
    expect(await balanceOf(fx, fx.accounts.payable)).toBe("0.00");

    const rerun = await runDueFixedExpenses(fx.store, "2024-03-10", fx.options);
    expect(rerun.map((r) => r.expenseId)).toEqual([broken.id]);
  });
});

// ─── Configuration ───────────────────────────────────────────────────────

describe("configuration", () => {
  it("creates with defaults", async () => {
    const expense = await withScheduler((s) => s.create(rentInput({ amount: "300.5" })));
    const expected: Partial<FixedExpenseRecord> = {
      name: "Office rent",
      amount: "300.50",
      isActive: true,
      lastRunMonth: null,
      lastRunAt: null,
    };
    expect(expense).toMatchObject(expected);
  });

  it("rejects a day outside 1-28", async () => {
    await expect(withScheduler((s) => s.create(rentInput({ dayOfMonth: 29 })))).rejects.toMatchObject({
      code: "INVALID_FIXED_EXPENSE",
    });
    await expect(withScheduler((s) => s.create(rentInput({ dayOfMonth: 0 })))).rejects.toMatchObject({
      code: "INVALID_FIXED_EXPENSE",
    });
  });

  it("rejects unknown accounts", async () => {
    await expect(
      withScheduler((s) => s.create(rentInput({ fallbackAccountId: "nope" }))),
    ).rejects.toMatchObject({ code: "UNKNOWN_ACCOUNT", details: { missing: ["nope"] } });
  });

  it("requires a cash-flow type when funding from a cash account", async () => {
    await expect(
      withScheduler((s) => s.create(rentInput({ primaryAccountId: fx.accounts.payable, cashflowTypeId: null }))),
    ).rejects.toMatchObject({ code: "CASHFLOW_TYPE_REQUIRED", details: { accountId: fx.accounts.cash } });

    const onCredit = await withScheduler((s) =>
      s.create(rentInput({ primaryAccountId: fx.accounts.payable, fallbackAccountId: null, cashflowTypeId: null })),
    );
    expect(onCredit.cashflowTypeId).toBeNull();

    await expect(
      withScheduler((s) => s.update(onCredit.id, { fallbackAccountId: fx.accounts.bank })),
    ).rejects.toMatchObject({ code: "CASHFLOW_TYPE_REQUIRED", details: { accountId: fx.accounts.bank } });
  });

  it("updates only the given fields", async () => {
    const expense = await withScheduler((s) => s.create(rentInput()));
    const updated = await withScheduler((s) => s.update(expense.id, { amount: "450", fallbackAccountId: null }));

    expect(updated.amount).toBe("450.00");
    expect(updated.fallbackAccountId).toBeNull();
    expect(updated.primaryAccountId).toBe(fx.accounts.bank);
    expect(updated.dayOfMonth).toBe(10);
  });

  it("lists by due day and deletes", async () => {
    await withScheduler((s) => s.create(rentInput({ name: "Late", dayOfMonth: 25 })));
    const early = await withScheduler((s) => s.create(rentInput({ name: "Early", dayOfMonth: 2 })));

    expect((await withScheduler((s) => s.list())).map((e) => e.name)).toEqual(["Early", "Late"]);

    await withScheduler((s) => s.delete(early.id));
    expect((await withScheduler((s) => s.list())).map((e) => e.name)).toEqual(["Late"]);
    await expect(withScheduler((s) => s.delete(early.id))).rejects.toMatchObject({
      code: "FIXED_EXPENSE_NOT_FOUND",
    });
  });
});
