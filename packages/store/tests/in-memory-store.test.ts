/**
 * Tests for InMemoryStore.
 *
 * Verifies:
 * - Commit: writes become visible to later units of work
 * - Rollback: a rejected unit of work leaves no trace
 * - Serialization: concurrent units of work never interleave
 * - Closed units of work reject further use
 * - Table CRUD errors
 */

import { describe, it, expect } from "vitest";
import type { AccountRecord } from "@tally/types";
import { InMemoryStore } from "../src/in-memory-store.js";
import { StoreError } from "../src/types.js";
import type { UnitOfWork } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const TS = "2024-01-15T10:00:00.000Z";

function account(id: string, name: string, balance = "0.00"): AccountRecord {
  return {
    id,
    name,
    accountType: "ASSET",
    parentId: null,
    code: null,
    description: null,
    hidden: false,
    placeholder: false,
    isCash: false,
    currentBalance: balance,
    createdAt: TS,
    updatedAt: TS,
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Commit and rollback
// =============================================================================

describe("transaction", () => {
  it("commits writes when the work resolves", async () => {
    const store = new InMemoryStore();

    await store.transaction(async (uow) => {
      await uow.table("accounts").insert(account("a1", "Cash"));
    });

    const found = await store.transaction((uow) => uow.table("accounts").get("a1"));
    expect(found?.name).toBe("Cash");
    expect(store.commitCount).toBe(2);
  });

  it("returns the value produced by the work", async () => {
    const store = new InMemoryStore();
    const result = await store.transaction(async () => 42);
    expect(result).toBe(42);
  });

  it("rolls back every write when the work rejects", async () => {
    const store = new InMemoryStore();
    await store.transaction(async (uow) => {
      await uow.table("accounts").insert(account("a1", "Cash"));
    });

    await expect(
      store.transaction(async (uow) => {
        await uow.table("accounts").insert(account("a2", "Bank"));
        await uow.table("accounts").update("a1", { currentBalance: "10.00" });
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    const rows = await store.transaction((uow) => uow.table("accounts").find());
    expect(rows).toHaveLength(1);
    expect(rows[0]?.currentBalance).toBe("0.00");
    expect(store.rollbackCount).toBe(1);
    expect(store.stats().accounts).toBe(1);
  });

  it("runs concurrent units of work one at a time", async () => {
    const store = new InMemoryStore();
    await store.transaction(async (uow) => {
      await uow.table("accounts").insert(account("a1", "Cash", "0.00"));
    });

    const increment = async (uow: UnitOfWork): Promise<void> => {
      const table = uow.table("accounts");
      const current = await table.get("a1");
      await delay(5);
      const next = Number(current?.currentBalance ?? "0") + 1;
      await table.update("a1", { currentBalance: `${next}.00` });
    };

    await Promise.all([
      store.transaction(increment),
      store.transaction(increment),
      store.transaction(increment),
    ]);

    const final = await store.transaction((uow) => uow.table("accounts").get("a1"));
    expect(final?.currentBalance).toBe("3.00");
  });

  it("keeps serving after a rolled-back unit of work", async () => {
    const store = new InMemoryStore();
    await expect(store.transaction(async () => Promise.reject(new Error("first")))).rejects.toThrow("first");
    await expect(store.transaction(async () => "second")).resolves.toBe("second");
  });

  it("rejects use of a unit of work after it closed", async () => {
    const store = new InMemoryStore();
    const leaked: UnitOfWork[] = [];
    await store.transaction(async (uow) => {
      leaked.push(uow);
    });

    expect(leaked).toHaveLength(1);
    expect(() => leaked[0]?.table("accounts")).toThrow(StoreError);
  });
});

// =============================================================================
// Table operations
// =============================================================================

describe("table", () => {
  it("rejects a duplicate id", async () => {
    const store = new InMemoryStore();
    await expect(
      store.transaction(async (uow) => {
        const accounts = uow.table("accounts");
        await accounts.insert(account("a1", "Cash"));
        await accounts.insert(account("a1", "Cash again"));
      }),
    ).rejects.toMatchObject({ code: "DUPLICATE_ID", table: "accounts" });
  });

  it("rejects an update of an unknown id", async () => {
    const store = new InMemoryStore();
    await expect(
      store.transaction((uow) => uow.table("accounts").update("nope", { hidden: true })),
    ).rejects.toMatchObject({ code: "RECORD_NOT_FOUND" });
  });

  it("rejects a patch that sets a field to undefined", async () => {
    const store = new InMemoryStore();
    await expect(
      store.transaction(async (uow) => {
        await uow.table("accounts").insert(account("a1", "Cash"));
        await uow.table("accounts").update("a1", { code: undefined });
      }),
    ).rejects.toMatchObject({ code: "INVALID_PATCH" });
  });

  it("updates only the patched fields", async () => {
    const store = new InMemoryStore();
    const updated = await store.transaction(async (uow) => {
      await uow.table("accounts").insert(account("a1", "Cash"));
      return uow.table("accounts").update("a1", { hidden: true });
    });
    expect(updated.hidden).toBe(true);
    expect(updated.name).toBe("Cash");
    expect(Object.isFrozen(updated)).toBe(true);
  });

  it("returns getMany results in request order, skipping unknown ids", async () => {
    const store = new InMemoryStore();
    const rows = await store.transaction(async (uow) => {
      const accounts = uow.table("accounts");
      await accounts.insert(account("a1", "Cash"));
      await accounts.insert(account("a2", "Bank"));
      return accounts.getMany(["a2", "missing", "a1", "a2"]);
    });
    expect(rows.map((r) => r.id)).toEqual(["a2", "a1"]);
  });

  it("deletes by id and by filter", async () => {
    const store = new InMemoryStore();
    const result = await store.transaction(async (uow) => {
      const accounts = uow.table("accounts");
      await accounts.insert(account("a1", "Cash"));
      await accounts.insert(account("a2", "Bank"));
      await accounts.insert(account("a3", "Till"));
      const single = await accounts.delete("a1");
      const missing = await accounts.delete("a1");
      const many = await accounts.deleteWhere({ name: { in: ["Bank", "Till"] } });
      return { single, missing, many, left: await accounts.count() };
    });
    expect(result).toEqual({ single: true, missing: false, many: 2, left: 0 });
  });
});
