/**
 * Runtime Type Guards
 *
 * Narrowing functions for values that cross a system boundary
 * (caller input, rows read back from persistence).
 */

import { daysInMonth } from "./calendar.js";
import {
  ACCOUNT_TYPES,
  BUSINESS_DOCUMENT_TYPES,
  CASHFLOW_DIRECTIONS,
  FLOW_TYPES,
} from "./financial.js";
import type {
  AccountTypeCode,
  Amount,
  BusinessDocumentType,
  CashflowDirection,
  FlowType,
  IsoDate,
} from "./financial.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const ACCOUNT_TYPE_SET = new Set<string>(ACCOUNT_TYPES);
const FLOW_TYPE_SET = new Set<string>(FLOW_TYPES);
const DIRECTION_SET = new Set<string>(CASHFLOW_DIRECTIONS);
const DOCUMENT_TYPE_SET = new Set<string>(BUSINESS_DOCUMENT_TYPES);

/** A plain decimal string: optional minus, digits, optional fraction. */
export function isAmount(value: unknown): value is Amount {
  return typeof value === "string" && AMOUNT_PATTERN.test(value.trim());
}

/** A `YYYY-MM-DD` string naming a real calendar day. */
export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string") return false;
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function isAccountTypeCode(value: unknown): value is AccountTypeCode {
  return typeof value === "string" && ACCOUNT_TYPE_SET.has(value);
}

/** Case-insensitive: "cash" and "CASH" are both known account types. */
export function isKnownAccountType(value: string): boolean {
  return ACCOUNT_TYPE_SET.has(value.toUpperCase());
}

export function isFlowType(value: unknown): value is FlowType {
  return typeof value === "string" && FLOW_TYPE_SET.has(value);
}

export function isCashflowDirection(value: unknown): value is CashflowDirection {
  return typeof value === "string" && DIRECTION_SET.has(value);
}

export function isBusinessDocumentType(value: unknown): value is BusinessDocumentType {
  return typeof value === "string" && DOCUMENT_TYPE_SET.has(value);
}

