/**
 * @tally/service — Error envelopes.
 *
 * All errors reaching a presentation layer are shaped as:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 *
 * Domain errors keep their code, message and details. Anything else is
 * reported as INTERNAL_ERROR without its message.
 */

import { LedgerError } from "@tally/ledger";

export interface ErrorDetail {
  readonly code: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: string,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

export function toErrorEnvelope(error: unknown): ErrorEnvelope {
  if (error instanceof LedgerError) {
    return createErrorEnvelope(error.code, error.message, error.details);
  }
  return createErrorEnvelope("INTERNAL_ERROR", "Internal server error");
}

/** HTTP status a presentation layer should answer with. */
export function statusFor(error: unknown): 400 | 404 | 500 {
  if (error instanceof LedgerError) {
    return error.kind === "not_found" ? 404 : 400;
  }
  return 500;
}
