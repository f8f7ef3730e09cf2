/**
 * Shared fixtures: pinned clock, predictable ids, a chart of accounts
 * and a couple of cash-flow types.
 */

import { InMemoryStore } from "@tally/store";
import { AccountRegistry, CashflowTypeRegistry } from "@tally/ledger";
import type { EngineOptions } from "@tally/ledger";

export const NOW = new Date("2024-03-15T09:30:00.000Z");

export function testOptions(): EngineOptions {
  let next = 0;
  return {
    clock: () => NOW,
    newId: () => {
      next += 1;
      return `id-${String(next).padStart(4, "0")}`;
    },
  };
}

export interface Fixture {
  readonly store: InMemoryStore;
  readonly options: EngineOptions;
  readonly accounts: {
    readonly bank: string;
    readonly cash: string;
    readonly receivable: string;
    readonly sales: string;
    readonly rent: string;
    readonly payable: string;
  };
  readonly cashflow: {
    readonly salesIn: string;
    readonly expensesOut: string;
  };
}

export async function createFixture(): Promise<Fixture> {
  const store = new InMemoryStore();
  const options = testOptions();

  return store.transaction(async (uow) => {
    const registry = new AccountRegistry(uow, options);
    const types = new CashflowTypeRegistry(uow, options);

    const bank = await registry.create({ name: "Bank", accountType: "BANK", isCash: true });
    const cash = await registry.create({ name: "Cash", accountType: "CASH", isCash: true });
    const receivable = await registry.create({ name: "Receivable", accountType: "RECEIVABLE" });
    const sales = await registry.create({ name: "Sales", accountType: "SALES" });
    const rent = await registry.create({ name: "Rent", accountType: "EXPENSE" });
    const payable = await registry.create({ name: "Payable", accountType: "PAYABLE" });

    const salesIn = await types.create({
      code: "OP_SALES",
      name: "Sales receipts",
      flowType: "operating",
      direction: "inflow",
    });
    const expensesOut = await types.create({
      code: "OP_EXPENSES",
      name: "Expenses paid",
      flowType: "operating",
      direction: "outflow",
    });

    return {
      store,
      options,
      accounts: {
        bank: bank.id,
        cash: cash.id,
        receivable: receivable.id,
        sales: sales.id,
        rent: rent.id,
        payable: payable.id,
      },
      cashflow: { salesIn: salesIn.id, expensesOut: expensesOut.id },
    };
  });
}

export async function balanceOf(fixture: Fixture, accountId: string): Promise<string | undefined> {
  return fixture.store.transaction(async (uow) => (await uow.table("accounts").get(accountId))?.currentBalance);
}
