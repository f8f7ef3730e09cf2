/**
 * Single-level roll-up of statement lines.
 */

import { formatAmount, parseAmount } from "@tally/ledger";
import type { StatementLine } from "./types.js";

/**
 * Append a subtotal row after every parent whose direct children appear
 * in `lines`. The subtotal is the sum of those children's amounts only;
 * grandchildren are not compounded. Zero subtotals are left out.
 */
export function withSubtotals(lines: readonly StatementLine[]): StatementLine[] {
  const present = new Set(lines.map((line) => line.accountId));
  const childTotals = new Map<string, bigint>();

  for (const line of lines) {
    if (line.parentId !== null && present.has(line.parentId)) {
      childTotals.set(line.parentId, (childTotals.get(line.parentId) ?? 0n) + parseAmount(line.amount));
    }
  }

  const result: StatementLine[] = [];
  for (const line of lines) {
    result.push(line);
    const total = childTotals.get(line.accountId);
    if (total !== undefined && total !== 0n) {
      result.push({
        lineId: `${line.accountId}:subtotal`,
        accountId: line.accountId,
        code: "",
        name: `${line.name} subtotal`,
        accountType: line.accountType,
        parentId: line.accountId,
        placeholder: true,
        isSubtotal: true,
        amount: formatAmount(total),
      });
    }
  }
  return result;
}
