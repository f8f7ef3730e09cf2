/**
 * @tally/reports — Financial Report Generator.
 *
 * Rules:
 * - Hidden accounts and unclassified account types are left out
 * - Balance sheet amounts are point balances as of the report date
 * - Income statement amounts are flows within the period
 * - Net income on the balance sheet covers all history up to the report
 *   date and is folded into equity
 * - An imbalance is reported through `isBalanced`, never thrown
 */

import type { AccountRecord, CashflowTypeRecord, FlowType, IsoDate } from "@tally/types";
import { isIsoDate, startOfYear } from "@tally/types";
import type { UnitOfWork } from "@tally/store";
import {
  AccountRegistry,
  CashflowTypeRegistry,
  ValidationError,
  formatAmount,
  normalizeAmount,
  resolveContext,
  today,
  withinTolerance,
} from "@tally/ledger";
import type { EngineContext } from "@tally/ledger";
import { classifyAccountType, isCreditNormal } from "./classification.js";
import { withSubtotals } from "./hierarchy.js";
import { accountAmounts, cashflowAmounts } from "./queries.js";
import type {
  BalanceSheet,
  CashflowItem,
  CashflowSection,
  CashflowStatement,
  IncomeStatement,
  ReportOptions,
  StatementLine,
} from "./types.js";

export const DEFAULT_BALANCE_TOLERANCE = "0.01";

// =============================================================================
// Builders
// =============================================================================

function lineFor(account: AccountRecord, amount: bigint): StatementLine {
  return {
    lineId: account.id,
    accountId: account.id,
    code: account.code ?? "",
    name: account.name,
    accountType: account.accountType,
    parentId: account.parentId,
    placeholder: account.placeholder,
    isSubtotal: false,
    amount: formatAmount(amount),
  };
}

/**
 * Build a balance sheet from signed point balances.
 * `accounts` should already exclude hidden accounts; line order follows it.
 */
export function buildBalanceSheet(
  accounts: readonly AccountRecord[],
  balances: ReadonlyMap<string, bigint>,
  reportDate: IsoDate,
  tolerance: string = DEFAULT_BALANCE_TOLERANCE,
): BalanceSheet {
  const assets: StatementLine[] = [];
  const liabilities: StatementLine[] = [];
  const equity: StatementLine[] = [];
  let assetTotal = 0n;
  let liabilityTotal = 0n;
  let equityTotal = 0n;
  let netIncome = 0n;

  for (const account of accounts) {
    const section = classifyAccountType(account.accountType);
    if (section === null) continue;

    const balance = balances.get(account.id) ?? 0n;
    const reported = isCreditNormal(section) ? -balance : balance;

    switch (section) {
      case "asset":
        assets.push(lineFor(account, reported));
        assetTotal += reported;
        break;
      case "liability":
        liabilities.push(lineFor(account, reported));
        liabilityTotal += reported;
        break;
      case "equity":
        equity.push(lineFor(account, reported));
        equityTotal += reported;
        break;
      case "revenue":
        netIncome += reported;
        break;
      case "expense":
        netIncome -= reported;
        break;
    }
  }

  const equityWithIncome = equityTotal + netIncome;
  const totalLiabilityEquity = liabilityTotal + equityWithIncome;

  return {
    reportDate,
    assets: withSubtotals(assets),
    liabilities: withSubtotals(liabilities),
    equity: withSubtotals(equity),
    assetTotal: formatAmount(assetTotal),
    liabilityTotal: formatAmount(liabilityTotal),
    equityTotal: formatAmount(equityTotal),
    netIncome: formatAmount(netIncome),
    equityWithIncome: formatAmount(equityWithIncome),
    totalLiabilityEquity: formatAmount(totalLiabilityEquity),
    isBalanced: withinTolerance(formatAmount(assetTotal), formatAmount(totalLiabilityEquity), tolerance),
  };
}

/**
 * Build an income statement from signed period flows.
 */
export function buildIncomeStatement(
  accounts: readonly AccountRecord[],
  flows: ReadonlyMap<string, bigint>,
  startDate: IsoDate,
  endDate: IsoDate,
): IncomeStatement {
  const revenues: StatementLine[] = [];
  const expenses: StatementLine[] = [];
  let revenueTotal = 0n;
  let expenseTotal = 0n;

  for (const account of accounts) {
    const section = classifyAccountType(account.accountType);
    const flow = flows.get(account.id) ?? 0n;
    if (section === "revenue") {
      revenues.push(lineFor(account, -flow));
      revenueTotal -= flow;
    } else if (section === "expense") {
      expenses.push(lineFor(account, flow));
      expenseTotal += flow;
    }
  }

  return {
    startDate,
    endDate,
    revenues: withSubtotals(revenues),
    expenses: withSubtotals(expenses),
    revenueTotal: formatAmount(revenueTotal),
    expenseTotal: formatAmount(expenseTotal),
    netIncome: formatAmount(revenueTotal - expenseTotal),
  };
}

interface SectionTotals {
  readonly items: CashflowItem[];
  inflow: bigint;
  outflow: bigint;
}

function finishSection(totals: SectionTotals): CashflowSection {
  return {
    items: totals.items,
    inflow: formatAmount(totals.inflow),
    outflow: formatAmount(totals.outflow),
    net: formatAmount(totals.inflow - totals.outflow),
  };
}

/**
 * Build a cash-flow statement from signed per-type totals.
 *
 * Each type with movements in the period becomes one item holding the
 * absolute value of its net movement. Items keep the order of `types`.
 */
export function buildCashflowStatement(
  types: readonly CashflowTypeRecord[],
  totals: ReadonlyMap<string, bigint>,
  startDate: IsoDate,
  endDate: IsoDate,
): CashflowStatement {
  const sections: Record<FlowType, SectionTotals> = {
    operating: { items: [], inflow: 0n, outflow: 0n },
    investing: { items: [], inflow: 0n, outflow: 0n },
    financing: { items: [], inflow: 0n, outflow: 0n },
  };

  for (const type of types) {
    const total = totals.get(type.id);
    if (total === undefined) continue;

    const amount = total < 0n ? -total : total;
    const section = sections[type.flowType];
    section.items.push({
      cashflowTypeId: type.id,
      code: type.code,
      name: type.name,
      direction: type.direction,
      amount: formatAmount(amount),
    });
    if (type.direction === "inflow") {
      section.inflow += amount;
    } else {
      section.outflow += amount;
    }
  }

  const net = (s: SectionTotals): bigint => s.inflow - s.outflow;

  return {
    startDate,
    endDate,
    operating: finishSection(sections.operating),
    investing: finishSection(sections.investing),
    financing: finishSection(sections.financing),
    totalNet: formatAmount(net(sections.operating) + net(sections.investing) + net(sections.financing)),
  };
}

// =============================================================================
// Generator
// =============================================================================

function assertDate(value: IsoDate, field: string): void {
  if (!isIsoDate(value)) {
    throw new ValidationError("INVALID_DATE", `Invalid ${field}: "${String(value)}"`, { [field]: value });
  }
}

/**
 * Statements computed from live ledger history inside one unit of work.
 */
export class FinancialReports {
  private readonly _accounts: AccountRegistry;
  private readonly _cashflowTypes: CashflowTypeRegistry;
  private readonly _context: EngineContext;
  private readonly _tolerance: string;

  constructor(
    private readonly _uow: UnitOfWork,
    options: ReportOptions = {},
  ) {
    this._accounts = new AccountRegistry(_uow, options);
    this._cashflowTypes = new CashflowTypeRegistry(_uow, options);
    this._context = resolveContext(options);
    this._tolerance = normalizeAmount(options.tolerance ?? DEFAULT_BALANCE_TOLERANCE);
  }

  /** Balance sheet as of `reportDate` (default: today). */
  async balanceSheet(reportDate?: IsoDate): Promise<BalanceSheet> {
    const date = reportDate ?? today(this._context);
    assertDate(date, "reportDate");

    const accounts = await this._accounts.list();
    const balances = await accountAmounts(this._uow, { to: date });
    return buildBalanceSheet(accounts, balances, date, this._tolerance);
  }

  /** Income statement for [startDate, endDate]; defaults to the year to date. */
  async incomeStatement(startDate?: IsoDate, endDate?: IsoDate): Promise<IncomeStatement> {
    const period = this._period(startDate, endDate);
    const accounts = await this._accounts.list();
    const flows = await accountAmounts(this._uow, { from: period.start, to: period.end });
    return buildIncomeStatement(accounts, flows, period.start, period.end);
  }

  /** Cash-flow statement for [startDate, endDate]; defaults to the year to date. */
  async cashflowStatement(startDate?: IsoDate, endDate?: IsoDate): Promise<CashflowStatement> {
    const period = this._period(startDate, endDate);
    const types = await this._cashflowTypes.list();
    const totals = await cashflowAmounts(this._uow, { from: period.start, to: period.end });
    return buildCashflowStatement(types, totals, period.start, period.end);
  }

  private _period(startDate: IsoDate | undefined, endDate: IsoDate | undefined): { start: IsoDate; end: IsoDate } {
    const end = endDate ?? today(this._context);
    assertDate(end, "endDate");
    const start = startDate ?? startOfYear(end);
    assertDate(start, "startDate");
    if (start > end) {
      throw new ValidationError("INVALID_DATE", `Start date ${start} is after end date ${end}`, {
        startDate: start,
        endDate: end,
      });
    }
    return { start, end };
  }
}
