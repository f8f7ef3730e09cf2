/**
 * Shared fixtures: pinned clock, predictable ids, and a small company
 * with two months of history.
 */

import { InMemoryStore } from "@tally/store";
import type { IsoDate } from "@tally/types";
import { AccountRegistry, CashflowTypeRegistry, Ledger } from "@tally/ledger";
import type { ReportOptions } from "../src/types.js";

export const NOW = new Date("2024-03-15T09:30:00.000Z");

export function testOptions(extra: ReportOptions = {}): ReportOptions {
  let next = 0;
  return {
    clock: () => NOW,
    newId: () => {
      next += 1;
      return `id-${String(next).padStart(4, "0")}`;
    },
    ...extra,
  };
}

export interface Company {
  readonly store: InMemoryStore;
  readonly options: ReportOptions;
  readonly accounts: Readonly<Record<"assets" | "bank" | "cash" | "loan" | "capital" | "sales" | "rent" | "archive", string>>;
  readonly cashflow: Readonly<Record<"salesIn" | "expensesOut" | "capitalIn" | "loanIn", string>>;
}

type Leg = readonly [accountId: string, amount: string, cashflowTypeId?: string];

export async function post(company: Company, postDate: IsoDate, legs: readonly Leg[]): Promise<void> {
  await company.store.transaction((uow) =>
    new Ledger(uow, company.options).post({
      postDate,
      splits: legs.map(([accountId, amount, cashflowTypeId]) => ({ accountId, amount, cashflowTypeId })),
    }),
  );
}

/**
 * Chart of accounts and cash-flow types, no postings.
 */
export async function createCompany(extra: ReportOptions = {}): Promise<Company> {
  const store = new InMemoryStore();
  const options = testOptions(extra);

  return store.transaction(async (uow) => {
    const registry = new AccountRegistry(uow, options);
    const types = new CashflowTypeRegistry(uow, options);

    const assets = await registry.create({ name: "Assets", accountType: "ASSET", code: "1000", placeholder: true });
    const bank = await registry.create({ name: "Bank", accountType: "BANK", code: "1010", parentId: assets.id, isCash: true });
    const cash = await registry.create({ name: "Cash", accountType: "CASH", code: "1020", parentId: assets.id, isCash: true });
    const loan = await registry.create({ name: "Loan", accountType: "LIABILITY", code: "2000" });
    const capital = await registry.create({ name: "Capital", accountType: "CAPITAL", code: "3000" });
    const sales = await registry.create({ name: "Sales", accountType: "SALES", code: "4000" });
    const rent = await registry.create({ name: "Rent", accountType: "EXPENSE", code: "5000" });
    const archive = await registry.create({ name: "Archive", accountType: "EXPENSE", code: "5900", hidden: true });

    const salesIn = await types.create({
      code: "OP_SALES", name: "Sales receipts", flowType: "operating", direction: "inflow", sortOrder: 10,
    });
    const expensesOut = await types.create({
      code: "OP_EXPENSES", name: "Expenses paid", flowType: "operating", direction: "outflow", sortOrder: 20,
    });
    const capitalIn = await types.create({
      code: "FIN_CAPITAL", name: "Capital contributed", flowType: "financing", direction: "inflow", sortOrder: 30,
    });
    const loanIn = await types.create({
      code: "FIN_LOAN", name: "Loans received", flowType: "financing", direction: "inflow", sortOrder: 40,
    });

    return {
      store,
      options,
      accounts: {
        assets: assets.id,
        bank: bank.id,
        cash: cash.id,
        loan: loan.id,
        capital: capital.id,
        sales: sales.id,
        rent: rent.id,
        archive: archive.id,
      },
      cashflow: {
        salesIn: salesIn.id,
        expensesOut: expensesOut.id,
        capitalIn: capitalIn.id,
        loanIn: loanIn.id,
      },
    };
  });
}

/**
 * January: capital 250 and a loan of 200 into the bank.
 * February: cash sales of 80 and 30 of rent paid from the bank.
 *
 * End of February: assets 500 = liabilities 200 + equity 250 + net income 50.
 */
export async function postHistory(company: Company): Promise<void> {
  const { accounts: a, cashflow: c } = company;
  await post(company, "2024-01-05", [[a.bank, "250", c.capitalIn], [a.capital, "-250"]]);
  await post(company, "2024-01-10", [[a.bank, "200", c.loanIn], [a.loan, "-200"]]);
  await post(company, "2024-02-01", [[a.cash, "80", c.salesIn], [a.sales, "-80"]]);
  await post(company, "2024-02-20", [[a.rent, "30"], [a.bank, "-30", c.expensesOut]]);
}
