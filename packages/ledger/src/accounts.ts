/**
 * @tally/ledger — Account registry.
 *
 * Manages the chart of accounts inside one unit of work.
 *
 * Rules:
 * - Account names are unique (exact, case-sensitive match)
 * - Account types come from the fixed taxonomy, stored upper-case
 * - The parent chain never forms a cycle
 * - Balances start at zero and change only through the ledger engine
 * - Only unused, childless, zero-balance accounts can be deleted
 */

import type { AccountRecord } from "@tally/types";
import { isKnownAccountType } from "@tally/types";
import type { RecordPatch, Table, UnitOfWork } from "@tally/store";
import type { EngineContext } from "./context.js";
import { nowTimestamp, resolveContext } from "./context.js";
import { isZeroAmount } from "./money-math.js";
import type {
  AccountBalanceRow,
  AccountInput,
  AccountPatchInput,
  EngineOptions,
} from "./types.js";
import { NotFoundError, ValidationError } from "./types.js";

export interface ListAccountsOptions {
  readonly includeHidden?: boolean | undefined;
}

/**
 * Chart of accounts bound to a unit of work.
 */
export class AccountRegistry {
  private readonly _accounts: Table<AccountRecord>;
  private readonly _context: EngineContext;

  constructor(
    private readonly _uow: UnitOfWork,
    options?: EngineOptions,
  ) {
    this._accounts = _uow.table("accounts");
    this._context = resolveContext(options);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Accounts ordered by code, then name. Hidden accounts are
   * excluded unless requested.
   */
  async list(options: ListAccountsOptions = {}): Promise<readonly AccountRecord[]> {
    return this._accounts.find(options.includeHidden === true ? undefined : { hidden: false }, {
      orderBy: [{ field: "code" }, { field: "name" }],
    });
  }

  async get(id: string): Promise<AccountRecord | undefined> {
    return this._accounts.get(id);
  }

  /**
   * Get an account by id. Throws NotFoundError if it does not exist.
   */
  async require(id: string): Promise<AccountRecord> {
    const account = await this._accounts.get(id);
    if (account === undefined) {
      throw new NotFoundError("ACCOUNT_NOT_FOUND", `Account not found: "${id}"`, { id });
    }
    return account;
  }

  /**
   * Load every account in `ids`. Throws a single ValidationError listing
   * all missing ids (sorted) if any are absent.
   */
  async requireMany(ids: Iterable<string>): Promise<ReadonlyMap<string, AccountRecord>> {
    const wanted = [...new Set(ids)];
    const found = await this._accounts.getMany(wanted);
    const byId = new Map(found.map((account) => [account.id, account]));
    const missing = wanted.filter((id) => !byId.has(id)).sort();
    if (missing.length > 0) {
      throw new ValidationError(
        "UNKNOWN_ACCOUNT",
        `Accounts not found: ${missing.join(", ")}`,
        { missing },
      );
    }
    return byId;
  }

  /** Every account with its current balance, ordered by name. */
  async listBalances(): Promise<readonly AccountBalanceRow[]> {
    const accounts = await this._accounts.find(undefined, { orderBy: [{ field: "name" }] });
    return accounts.map((account) => ({
      accountId: account.id,
      name: account.name,
      accountType: account.accountType,
      code: account.code,
      isCash: account.isCash,
      balance: account.currentBalance,
    }));
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  async create(input: AccountInput): Promise<AccountRecord> {
    const name = requireName(input.name);
    await this._assertNameFree(name);
    const accountType = normalizeAccountType(input.accountType);

    const parentId = input.parentId ?? null;
    if (parentId !== null) {
      await this._assertParentExists(parentId);
    }

    const now = nowTimestamp(this._context);
    return this._accounts.insert({
      id: this._context.newId(),
      name,
      accountType,
      parentId,
      code: input.code ?? null,
      description: input.description ?? null,
      hidden: input.hidden ?? false,
      placeholder: input.placeholder ?? false,
      isCash: input.isCash ?? false,
      currentBalance: "0.00",
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Apply a partial update. Omitted fields stay unchanged.
   */
  async update(id: string, fields: AccountPatchInput): Promise<AccountRecord> {
    const existing = await this.require(id);

    let name: string | undefined;
    if (fields.name !== undefined) {
      name = requireName(fields.name);
      if (name !== existing.name) {
        await this._assertNameFree(name);
      }
    }

    const accountType =
      fields.accountType !== undefined ? normalizeAccountType(fields.accountType) : undefined;

    if (fields.parentId !== undefined && fields.parentId !== null) {
      if (fields.parentId === id) {
        throw new ValidationError("INVALID_PARENT", "An account cannot be its own parent", { id });
      }
      await this._assertParentExists(fields.parentId);
      await this._assertNoCycle(id, fields.parentId);
    }

    const patch: RecordPatch<AccountRecord> = {
      ...(name !== undefined ? { name } : {}),
      ...(accountType !== undefined ? { accountType } : {}),
      ...(fields.parentId !== undefined ? { parentId: fields.parentId } : {}),
      ...(fields.code !== undefined ? { code: fields.code } : {}),
      ...(fields.description !== undefined ? { description: fields.description } : {}),
      ...(fields.hidden !== undefined ? { hidden: fields.hidden } : {}),
      ...(fields.placeholder !== undefined ? { placeholder: fields.placeholder } : {}),
      ...(fields.isCash !== undefined ? { isCash: fields.isCash } : {}),
      updatedAt: nowTimestamp(this._context),
    };
    return this._accounts.update(id, patch);
  }

  /**
   * Delete an account.
   *
   * Checked in order: child accounts (named in the error), non-zero
   * balance, referencing splits, fixed expenses (named) and document
   * items. Hiding is the alternative for used accounts.
   */
  async delete(id: string): Promise<void> {
    const account = await this.require(id);

    const children = await this._accounts.find({ parentId: id }, { orderBy: [{ field: "name" }] });
    if (children.length > 0) {
      const names = children.map((child) => child.name);
      throw new ValidationError(
        "ACCOUNT_HAS_CHILDREN",
        `Account "${account.name}" has child accounts: ${names.join(", ")}`,
        { children: names },
      );
    }

    if (!isZeroAmount(account.currentBalance)) {
      throw new ValidationError(
        "ACCOUNT_HAS_BALANCE",
        `Account "${account.name}" has a non-zero balance: ${account.currentBalance}`,
        { balance: account.currentBalance },
      );
    }

    const references = await this._uow.table("splits").count({ accountId: id });
    if (references > 0) {
      throw new ValidationError(
        "ACCOUNT_IN_USE",
        `Account "${account.name}" is referenced by ${String(references)} split(s)`,
        { splits: references },
      );
    }

    const expenses = this._uow.table("fixedExpenses");
    const charging = new Map<string, string>();
    const chargingRows = [
      ...(await expenses.find({ expenseAccountId: id })),
      ...(await expenses.find({ primaryAccountId: id })),
      ...(await expenses.find({ fallbackAccountId: id })),
    ];
    for (const expense of chargingRows) charging.set(expense.id, expense.name);
    if (charging.size > 0) {
      const names = [...charging.values()].sort();
      throw new ValidationError(
        "ACCOUNT_IN_USE",
        `Account "${account.name}" is used by fixed expense(s): ${names.join(", ")}`,
        { fixedExpenses: names },
      );
    }

    const items = this._uow.table("documentItems");
    const itemIds = new Set<string>([
      ...(await items.find({ debitAccountId: id })).map((item) => item.id),
      ...(await items.find({ creditAccountId: id })).map((item) => item.id),
    ]);
    if (itemIds.size > 0) {
      throw new ValidationError(
        "ACCOUNT_IN_USE",
        `Account "${account.name}" is referenced by ${String(itemIds.size)} document item(s)`,
        { documentItems: itemIds.size },
      );
    }

    await this._accounts.delete(id);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private async _assertNameFree(name: string): Promise<void> {
    const clash = await this._accounts.count({ name });
    if (clash > 0) {
      throw new ValidationError("DUPLICATE_ACCOUNT_NAME", `Account name already exists: "${name}"`, { name });
    }
  }

  private async _assertParentExists(parentId: string): Promise<void> {
    const parent = await this._accounts.get(parentId);
    if (parent === undefined) {
      throw new ValidationError("INVALID_PARENT", `Parent account not found: "${parentId}"`, { parentId });
    }
  }

  /**
   * Walk the ancestors of the proposed parent. Reaching the account
   * itself means the new parent is one of its descendants.
   */
  private async _assertNoCycle(id: string, parentId: string): Promise<void> {
    const visited = new Set<string>();
    let cursor: string | null = parentId;
    while (cursor !== null && !visited.has(cursor)) {
      if (cursor === id) {
        throw new ValidationError(
          "PARENT_CYCLE",
          `Account "${parentId}" is a descendant of "${id}" and cannot become its parent`,
          { id, parentId },
        );
      }
      visited.add(cursor);
      const ancestor: AccountRecord | undefined = await this._accounts.get(cursor);
      cursor = ancestor?.parentId ?? null;
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function requireName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === "") {
    throw new ValidationError("INVALID_INPUT", "Account name must not be empty");
  }
  return trimmed;
}

function normalizeAccountType(accountType: string): string {
  const trimmed = accountType.trim();
  if (!isKnownAccountType(trimmed)) {
    throw new ValidationError("INVALID_ACCOUNT_TYPE", `Unknown account type: "${accountType}"`, {
      accountType,
    });
  }
  return trimmed.toUpperCase();
}
