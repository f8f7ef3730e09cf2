/**
 * @tally/ledger — Cash-flow type registry.
 *
 * Cash-flow types tag the cash and bank legs of a transaction so the
 * cash-flow statement can classify each movement.
 *
 * Rules:
 * - Codes are unique
 * - Types are deactivated, never deleted (splits keep referencing them)
 */

import type { CashflowTypeRecord } from "@tally/types";
import { isCashflowDirection, isFlowType } from "@tally/types";
import type { Table, UnitOfWork } from "@tally/store";
import type { EngineContext } from "./context.js";
import { nowTimestamp, resolveContext } from "./context.js";
import type { CashflowTypeInput, EngineOptions } from "./types.js";
import { NotFoundError, ValidationError } from "./types.js";

const DEFAULT_SORT_ORDER = 100;

/**
 * Standard catalog installed by `seedDefaults`.
 */
export const DEFAULT_CASHFLOW_TYPES: readonly CashflowTypeInput[] = [
  { code: "OP_SALES", name: "Cash received from customers", category: "Sales", flowType: "operating", direction: "inflow", sortOrder: 10 },
  { code: "OP_OTHER_IN", name: "Other operating receipts", category: "Other", flowType: "operating", direction: "inflow", sortOrder: 20 },
  { code: "OP_SUPPLIERS", name: "Cash paid to suppliers", category: "Purchases", flowType: "operating", direction: "outflow", sortOrder: 30 },
  { code: "OP_PAYROLL", name: "Cash paid to employees", category: "Payroll", flowType: "operating", direction: "outflow", sortOrder: 40 },
  { code: "OP_EXPENSES", name: "Operating expenses paid", category: "Expenses", flowType: "operating", direction: "outflow", sortOrder: 50 },
  { code: "OP_TAXES", name: "Taxes paid", category: "Taxes", flowType: "operating", direction: "outflow", sortOrder: 60 },
  { code: "INV_ASSET_SALE", name: "Proceeds from sale of assets", category: "Assets", flowType: "investing", direction: "inflow", sortOrder: 70 },
  { code: "INV_ASSET_PURCHASE", name: "Purchase of long-term assets", category: "Assets", flowType: "investing", direction: "outflow", sortOrder: 80 },
  { code: "FIN_CAPITAL_IN", name: "Capital contributed", category: "Capital", flowType: "financing", direction: "inflow", sortOrder: 90 },
  { code: "FIN_LOAN_IN", name: "Proceeds from borrowing", category: "Loans", flowType: "financing", direction: "inflow", sortOrder: 100 },
  { code: "FIN_LOAN_OUT", name: "Repayment of borrowing", category: "Loans", flowType: "financing", direction: "outflow", sortOrder: 110 },
  { code: "FIN_DISTRIBUTION", name: "Distributions to owners", category: "Capital", flowType: "financing", direction: "outflow", sortOrder: 120 },
];

export interface ListCashflowTypesOptions {
  readonly activeOnly?: boolean | undefined;
}

export class CashflowTypeRegistry {
  private readonly _types: Table<CashflowTypeRecord>;
  private readonly _context: EngineContext;

  constructor(uow: UnitOfWork, options?: EngineOptions) {
    this._types = uow.table("cashflowTypes");
    this._context = resolveContext(options);
  }

  /** Ordered by sort order, then code. */
  async list(options: ListCashflowTypesOptions = {}): Promise<readonly CashflowTypeRecord[]> {
    return this._types.find(options.activeOnly === true ? { isActive: true } : undefined, {
      orderBy: [{ field: "sortOrder" }, { field: "code" }],
    });
  }

  async get(id: string): Promise<CashflowTypeRecord | undefined> {
    return this._types.get(id);
  }

  async create(input: CashflowTypeInput): Promise<CashflowTypeRecord> {
    const code = input.code.trim();
    const name = input.name.trim();
    if (code === "" || name === "") {
      throw new ValidationError("INVALID_INPUT", "Cash-flow type code and name must not be empty");
    }
    if (!isFlowType(input.flowType)) {
      throw new ValidationError("INVALID_INPUT", `Unknown flow type: "${String(input.flowType)}"`);
    }
    if (!isCashflowDirection(input.direction)) {
      throw new ValidationError("INVALID_INPUT", `Unknown cash-flow direction: "${String(input.direction)}"`);
    }
    if ((await this._types.count({ code })) > 0) {
      throw new ValidationError("DUPLICATE_CASHFLOW_CODE", `Cash-flow type code already exists: "${code}"`, { code });
    }

    return this._types.insert({
      id: this._context.newId(),
      code,
      name,
      category: input.category ?? null,
      flowType: input.flowType,
      direction: input.direction,
      isActive: input.isActive ?? true,
      sortOrder: input.sortOrder ?? DEFAULT_SORT_ORDER,
      createdAt: nowTimestamp(this._context),
    });
  }

  async setActive(id: string, isActive: boolean): Promise<CashflowTypeRecord> {
    if ((await this._types.get(id)) === undefined) {
      throw new NotFoundError("CASHFLOW_TYPE_NOT_FOUND", `Cash-flow type not found: "${id}"`, { id });
    }
    return this._types.update(id, { isActive });
  }

  /**
   * Check that every id resolves. Throws a single ValidationError listing
   * all missing ids (sorted).
   */
  async requireMany(ids: Iterable<string>): Promise<ReadonlyMap<string, CashflowTypeRecord>> {
    const wanted = [...new Set(ids)];
    const found = await this._types.getMany(wanted);
    const byId = new Map(found.map((type) => [type.id, type]));
    const missing = wanted.filter((id) => !byId.has(id)).sort();
    if (missing.length > 0) {
      throw new ValidationError(
        "UNKNOWN_CASHFLOW_TYPE",
        `Cash-flow types not found: ${missing.join(", ")}`,
        { missing },
      );
    }
    return byId;
  }

  /**
   * Insert every catalog entry whose code is not present yet.
   * Returns the inserted records.
   */
  async seedDefaults(
    catalog: readonly CashflowTypeInput[] = DEFAULT_CASHFLOW_TYPES,
  ): Promise<readonly CashflowTypeRecord[]> {
    const existing = new Set((await this._types.find()).map((type) => type.code));
    const inserted: CashflowTypeRecord[] = [];
    for (const entry of catalog) {
      if (existing.has(entry.code)) continue;
      inserted.push(await this.create(entry));
      existing.add(entry.code);
    }
    return inserted;
  }
}
