/**
 * Tests for the cash-flow type registry.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryStore } from "@tally/store";
import { CashflowTypeRegistry, DEFAULT_CASHFLOW_TYPES } from "../src/cashflow-types.js";
import type { EngineOptions } from "../src/types.js";
import { testOptions } from "./helpers.js";

let store: InMemoryStore;
let options: EngineOptions;

function withTypes<T>(work: (registry: CashflowTypeRegistry) => Promise<T>): Promise<T> {
  return store.transaction((uow) => work(new CashflowTypeRegistry(uow, options)));
}

beforeEach(() => {
  store = new InMemoryStore();
  options = testOptions();
});

describe("CashflowTypeRegistry", () => {
  it("creates a type with defaults", async () => {
    const created = await withTypes((r) =>
      r.create({ code: "OP_RENT", name: "Rent paid", flowType: "operating", direction: "outflow" }),
    );
    expect(created).toMatchObject({ code: "OP_RENT", category: null, isActive: true, sortOrder: 100 });
  });

  it("rejects a duplicate code", async () => {
    await withTypes((r) => r.create({ code: "X", name: "X", flowType: "investing", direction: "inflow" }));
    await expect(
      withTypes((r) => r.create({ code: "X", name: "Other", flowType: "investing", direction: "inflow" })),
    ).rejects.toMatchObject({ code: "DUPLICATE_CASHFLOW_CODE" });
  });

  it("lists by sort order and filters inactive types", async () => {
    const late = await withTypes((r) =>
      r.create({ code: "B", name: "B", flowType: "financing", direction: "inflow", sortOrder: 20 }),
    );
    await withTypes((r) => r.create({ code: "A", name: "A", flowType: "financing", direction: "outflow", sortOrder: 10 }));
    await withTypes((r) => r.setActive(late.id, false));

    expect((await withTypes((r) => r.list())).map((t) => t.code)).toEqual(["A", "B"]);
    expect((await withTypes((r) => r.list({ activeOnly: true }))).map((t) => t.code)).toEqual(["A"]);
  });

  it("reports an unknown id on setActive as not found", async () => {
    await expect(withTypes((r) => r.setActive("nope", true))).rejects.toMatchObject({
      kind: "not_found",
      code: "CASHFLOW_TYPE_NOT_FOUND",
    });
  });

  it("lists every missing id at once", async () => {
    await expect(withTypes((r) => r.requireMany(["b", "a", "b"]))).rejects.toMatchObject({
      code: "UNKNOWN_CASHFLOW_TYPE",
      details: { missing: ["a", "b"] },
    });
  });

  it("seeds the default catalog once", async () => {
    await withTypes((r) =>
      r.create({ code: "OP_SALES", name: "Custom sales", flowType: "operating", direction: "inflow" }),
    );

    const first = await withTypes((r) => r.seedDefaults());
    const second = await withTypes((r) => r.seedDefaults());

    expect(first).toHaveLength(DEFAULT_CASHFLOW_TYPES.length - 1);
    expect(second).toEqual([]);
    expect(store.stats().cashflowTypes).toBe(DEFAULT_CASHFLOW_TYPES.length);
  });
});
