/**
 * Shared fixtures for ledger tests: a pinned clock, predictable ids,
 * and a store pre-loaded with a small chart of accounts.
 */

import { InMemoryStore } from "@tally/store";
import type { AccountRecord } from "@tally/types";
import { AccountRegistry } from "../src/accounts.js";
import type { AccountInput, EngineOptions } from "../src/types.js";

export const NOW = new Date("2024-03-15T09:30:00.000Z");

/** Ids "id-0001", "id-0002", ... in creation order. */
export function sequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${String(next).padStart(4, "0")}`;
  };
}

export function testOptions(): EngineOptions {
  return { clock: () => NOW, newId: sequentialIds() };
}

/**
 * Create accounts in one unit of work and return them keyed by name.
 */
export async function seedAccounts(
  store: InMemoryStore,
  options: EngineOptions,
  inputs: readonly AccountInput[],
): Promise<Record<string, AccountRecord>> {
  return store.transaction(async (uow) => {
    const registry = new AccountRegistry(uow, options);
    const byName: Record<string, AccountRecord> = {};
    for (const input of inputs) {
      const account = await registry.create(input);
      byName[account.name] = account;
    }
    return byName;
  });
}

/** Read every account's cached balance keyed by account name. */
export async function balancesByName(store: InMemoryStore): Promise<Record<string, string>> {
  return store.transaction(async (uow) => {
    const accounts = await uow.table("accounts").find();
    return Object.fromEntries(accounts.map((account) => [account.name, account.currentBalance]));
  });
}
