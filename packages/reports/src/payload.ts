/**
 * @tally/reports — Statement payload encoding.
 *
 * A cached statement is stored as canonical JSON (RFC 8785) together with
 * the SHA-256 of that text. Reading back checks the hash first, then the
 * shape; a payload failing either is treated as absent.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { CASHFLOW_DIRECTIONS, isAmount, isIsoDate } from "@tally/types";
import type { BalanceSheet, CashflowStatement, IncomeStatement } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

const AmountSchema = z.string().refine(isAmount, { message: "Expected a decimal amount" });
const DateSchema = z.string().refine(isIsoDate, { message: "Expected a YYYY-MM-DD date" });

export const StatementLineSchema = z.object({
  lineId: z.string(),
  accountId: z.string(),
  code: z.string(),
  name: z.string(),
  accountType: z.string(),
  parentId: z.string().nullable(),
  placeholder: z.boolean(),
  isSubtotal: z.boolean(),
  amount: AmountSchema,
});

export const BalanceSheetSchema = z.object({
  reportDate: DateSchema,
  assets: z.array(StatementLineSchema),
  liabilities: z.array(StatementLineSchema),
  equity: z.array(StatementLineSchema),
  assetTotal: AmountSchema,
  liabilityTotal: AmountSchema,
  equityTotal: AmountSchema,
  netIncome: AmountSchema,
  equityWithIncome: AmountSchema,
  totalLiabilityEquity: AmountSchema,
  isBalanced: z.boolean(),
});

export const IncomeStatementSchema = z.object({
  startDate: DateSchema,
  endDate: DateSchema,
  revenues: z.array(StatementLineSchema),
  expenses: z.array(StatementLineSchema),
  revenueTotal: AmountSchema,
  expenseTotal: AmountSchema,
  netIncome: AmountSchema,
});

const CashflowSectionSchema = z.object({
  items: z.array(
    z.object({
      cashflowTypeId: z.string(),
      code: z.string(),
      name: z.string(),
      direction: z.enum(CASHFLOW_DIRECTIONS),
      amount: AmountSchema,
    }),
  ),
  inflow: AmountSchema,
  outflow: AmountSchema,
  net: AmountSchema,
});

export const CashflowStatementSchema = z.object({
  startDate: DateSchema,
  endDate: DateSchema,
  operating: CashflowSectionSchema,
  investing: CashflowSectionSchema,
  financing: CashflowSectionSchema,
  totalNet: AmountSchema,
});

// =============================================================================
// Encoding
// =============================================================================

export interface EncodedPayload {
  readonly payload: string;
  readonly payloadHash: string;
}

export function hashPayload(payload: string): string {
  return createHash("sha256").update(payload).digest("hex");
}

export function encodeReport(report: BalanceSheet | IncomeStatement | CashflowStatement): EncodedPayload {
  const payload = canonicalize(report);
  return { payload, payloadHash: hashPayload(payload) };
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, encoded: EncodedPayload): T | undefined {
  if (hashPayload(encoded.payload) !== encoded.payloadHash) {
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(encoded.payload);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function decodeBalanceSheet(encoded: EncodedPayload): BalanceSheet | undefined {
  return decode(BalanceSheetSchema, encoded);
}

export function decodeIncomeStatement(encoded: EncodedPayload): IncomeStatement | undefined {
  return decode(IncomeStatementSchema, encoded);
}

export function decodeCashflowStatement(encoded: EncodedPayload): CashflowStatement | undefined {
  return decode(CashflowStatementSchema, encoded);
}
