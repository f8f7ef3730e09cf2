/**
 * @tally/reports — Monthly Report Cache.
 *
 * Keeps the three statements of a closed month as point-in-time
 * snapshots. A snapshot is never patched: saving a month replaces its
 * rows wholesale, and the retention policy prunes other months.
 */

import type { IsoDate, MonthlyReportRecord, ReportType } from "@tally/types";
import { firstDayOfMonth, isIsoDate, lastDayOfMonth, previousMonth } from "@tally/types";
import type { Table, UnitOfWork } from "@tally/store";
import { ValidationError, nowTimestamp, resolveContext, today } from "@tally/ledger";
import type { EngineContext } from "@tally/ledger";
import {
  decodeBalanceSheet,
  decodeCashflowStatement,
  decodeIncomeStatement,
  encodeReport,
} from "./payload.js";
import { FinancialReports } from "./statements.js";
import type { MonthlyReportSet, MonthlySnapshot, ReportOptions, RetentionPolicy } from "./types.js";

export const DEFAULT_RETENTION: RetentionPolicy = { kind: "keep-last", count: 1 };

function monthKey(date: IsoDate): IsoDate {
  if (!isIsoDate(date)) {
    throw new ValidationError("INVALID_DATE", `Invalid month: "${String(date)}"`, { month: date });
  }
  return firstDayOfMonth(date);
}

export class MonthlyReportCache {
  private readonly _rows: Table<MonthlyReportRecord>;
  private readonly _context: EngineContext;
  private readonly _retention: RetentionPolicy;

  constructor(uow: UnitOfWork, options: ReportOptions = {}) {
    this._rows = uow.table("monthlyReports");
    this._context = resolveContext(options);
    this._retention = options.retention ?? DEFAULT_RETENTION;
    if (this._retention.kind === "keep-last" && !(Number.isInteger(this._retention.count) && this._retention.count >= 1)) {
      throw new RangeError(`Retention count must be a positive integer, got ${String(this._retention.count)}`);
    }
  }

  /** Cached months, newest first. */
  async months(): Promise<readonly IsoDate[]> {
    const rows = await this._rows.find(undefined, { orderBy: [{ field: "reportMonth", direction: "desc" }] });
    return [...new Set(rows.map((row) => row.reportMonth))];
  }

  /**
   * The cached set for `month`, or undefined unless all three statements
   * are present and intact.
   */
  async load(month: IsoDate): Promise<MonthlyReportSet | undefined> {
    const rows = await this._rows.find({ reportMonth: monthKey(month) });
    const byType = new Map<ReportType, MonthlyReportRecord>(rows.map((row) => [row.reportType, row]));

    const balanceRow = byType.get("balance_sheet");
    const incomeRow = byType.get("income_statement");
    const cashflowRow = byType.get("cashflow_statement");
    if (balanceRow === undefined || incomeRow === undefined || cashflowRow === undefined) {
      return undefined;
    }

    const balanceSheet = decodeBalanceSheet(balanceRow);
    const incomeStatement = decodeIncomeStatement(incomeRow);
    const cashflowStatement = decodeCashflowStatement(cashflowRow);
    if (balanceSheet === undefined || incomeStatement === undefined || cashflowStatement === undefined) {
      return undefined;
    }
    return { balanceSheet, incomeStatement, cashflowStatement };
  }

  /** Replace `month`'s rows, then apply the retention policy. */
  async save(month: IsoDate, reports: MonthlyReportSet): Promise<void> {
    const key = monthKey(month);
    await this._rows.deleteWhere({ reportMonth: key });

    const createdAt = nowTimestamp(this._context);
    const entries: readonly [ReportType, MonthlyReportSet[keyof MonthlyReportSet]][] = [
      ["balance_sheet", reports.balanceSheet],
      ["income_statement", reports.incomeStatement],
      ["cashflow_statement", reports.cashflowStatement],
    ];
    for (const [reportType, report] of entries) {
      const encoded = encodeReport(report);
      await this._rows.insert({
        id: this._context.newId(),
        reportMonth: key,
        reportType,
        payload: encoded.payload,
        payloadHash: encoded.payloadHash,
        createdAt,
      });
    }

    await this._prune(key);
  }

  private async _prune(kept: IsoDate): Promise<void> {
    if (this._retention.kind === "keep-all") {
      return;
    }
    const others = (await this.months()).filter((month) => month !== kept);
    const expired = others.slice(this._retention.count - 1);
    if (expired.length > 0) {
      await this._rows.deleteWhere({ reportMonth: { in: expired } });
    }
  }
}

/**
 * Statements for the last full calendar month before `asOf` (default:
 * today). Served from the cache when a complete, intact set exists;
 * otherwise generated from the ledger, saved and returned.
 */
export async function getOrCreateMonthlySnapshot(
  uow: UnitOfWork,
  asOf?: IsoDate,
  options: ReportOptions = {},
): Promise<MonthlySnapshot> {
  const date = asOf ?? today(resolveContext(options));
  if (!isIsoDate(date)) {
    throw new ValidationError("INVALID_DATE", `Invalid date: "${String(date)}"`, { date });
  }

  const month = previousMonth(date);
  const cache = new MonthlyReportCache(uow, options);
  const cached = await cache.load(month);
  if (cached !== undefined) {
    return { month, reports: cached, fromCache: true };
  }

  const monthEnd = lastDayOfMonth(month);
  const generator = new FinancialReports(uow, options);
  const reports: MonthlyReportSet = {
    balanceSheet: await generator.balanceSheet(monthEnd),
    incomeStatement: await generator.incomeStatement(month, monthEnd),
    cashflowStatement: await generator.cashflowStatement(month, monthEnd),
  };
  await cache.save(month, reports);
  return { month, reports, fromCache: false };
}
