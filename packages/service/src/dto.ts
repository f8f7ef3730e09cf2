/**
 * Input DTOs with Zod validation schemas.
 *
 * Every service operation that takes caller input parses it here first.
 * Shape errors surface as ValidationError("INVALID_INPUT"); business
 * rules (balance, references, numbering) stay in the domain packages.
 */

import { z } from "zod";
import type { ZodError } from "zod";
import { BUSINESS_DOCUMENT_TYPES, CASHFLOW_DIRECTIONS, FLOW_TYPES } from "@tally/types";
import { ValidationError } from "@tally/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

const IdSchema = z.string().min(1).max(128);
const OptionalText = z.string().max(1024).nullable().optional();
const OptionalId = IdSchema.nullable().optional();
const AmountSchema = z.string().min(1).max(64);
const DateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

// =============================================================================
// Account DTOs
// =============================================================================

export const CreateAccountSchema = z.object({
  name: z.string().min(1).max(256),
  accountType: z.string().min(1).max(64),
  parentId: OptionalId,
  code: z.string().max(64).nullable().optional(),
  description: OptionalText,
  hidden: z.boolean().optional(),
  placeholder: z.boolean().optional(),
  isCash: z.boolean().optional(),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

export const UpdateAccountSchema = CreateAccountSchema.partial();

export type UpdateAccountDto = z.infer<typeof UpdateAccountSchema>;

export const CreateCashflowTypeSchema = z.object({
  code: z.string().min(1).max(64),
  name: z.string().min(1).max(256),
  category: OptionalText,
  flowType: z.enum(FLOW_TYPES),
  direction: z.enum(CASHFLOW_DIRECTIONS),
  isActive: z.boolean().optional(),
  sortOrder: z.number().int().optional(),
});

export type CreateCashflowTypeDto = z.infer<typeof CreateCashflowTypeSchema>;

// =============================================================================
// Transaction DTOs
// =============================================================================

export const SplitSchema = z.object({
  accountId: IdSchema,
  amount: AmountSchema,
  memo: OptionalText,
  cashflowTypeId: OptionalId,
  reconcileState: z.enum(["n", "c", "y"]).optional(),
});

export const TransactionSchema = z.object({
  postDate: DateSchema,
  num: z.string().max(64).nullable().optional(),
  description: OptionalText,
  businessType: z.string().max(64).nullable().optional(),
  referenceNo: z.string().max(128).nullable().optional(),
  splits: z.array(SplitSchema),
});

export type TransactionDto = z.infer<typeof TransactionSchema>;

export const ListTransactionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export const SplitDetailQuerySchema = z.object({
  transactionId: IdSchema.optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

// =============================================================================
// Business Document DTOs
// =============================================================================

export const DocumentTypeSchema = z.enum(BUSINESS_DOCUMENT_TYPES);

export const DocumentItemSchema = z.object({
  lineNo: z.number().int().min(1).nullable().optional(),
  description: OptionalText,
  memo: OptionalText,
  debitAccountId: IdSchema,
  creditAccountId: IdSchema,
  amount: AmountSchema,
  quantity: AmountSchema.nullable().optional(),
  unitPrice: AmountSchema.nullable().optional(),
  cashflowTypeId: OptionalId,
});

export const BusinessDocumentSchema = z.object({
  docNo: z.string().max(64).nullable().optional(),
  docDate: DateSchema,
  partnerName: z.string().max(256).nullable().optional(),
  referenceNo: z.string().max(128).nullable().optional(),
  description: OptionalText,
  cashflowTypeId: OptionalId,
  items: z.array(DocumentItemSchema),
});

export type BusinessDocumentDto = z.infer<typeof BusinessDocumentSchema>;

export const DocumentQuerySchema = z.object({
  type: DocumentTypeSchema.optional(),
  from: DateSchema.optional(),
  to: DateSchema.optional(),
});

// =============================================================================
// Fixed Expense DTOs
// =============================================================================

export const CreateFixedExpenseSchema = z.object({
  name: z.string().min(1).max(256),
  amount: AmountSchema,
  expenseAccountId: IdSchema,
  primaryAccountId: OptionalId,
  fallbackAccountId: OptionalId,
  cashflowTypeId: OptionalId,
  dayOfMonth: z.number().int(),
  isActive: z.boolean().optional(),
});

export type CreateFixedExpenseDto = z.infer<typeof CreateFixedExpenseSchema>;

export const UpdateFixedExpenseSchema = CreateFixedExpenseSchema.partial();

export type UpdateFixedExpenseDto = z.infer<typeof UpdateFixedExpenseSchema>;

// =============================================================================
// Parsing
// =============================================================================

export interface InputIssue {
  readonly path: string;
  readonly message: string;
}

function formatZodErrors(error: ZodError): readonly InputIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parse caller input against a schema.
 *
 * @throws {ValidationError} INVALID_INPUT with `details.issues`
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodErrors(result.error);
    throw new ValidationError("INVALID_INPUT", "Input validation failed", { issues });
  }
  return result.data;
}
