/**
 * @tally/ledger — Clock and id defaults shared by every engine class.
 */

import { randomUUID } from "node:crypto";
import type { IsoDate, Timestamp } from "@tally/types";
import { toIsoDate } from "@tally/types";
import type { Clock, EngineOptions, IdGenerator } from "./types.js";

/** 32 lowercase hex characters. */
export function newId(): string {
  return randomUUID().replace(/-/g, "");
}

export interface EngineContext {
  readonly clock: Clock;
  readonly newId: IdGenerator;
}

export function resolveContext(options: EngineOptions = {}): EngineContext {
  return {
    clock: options.clock ?? (() => new Date()),
    newId: options.newId ?? newId,
  };
}

export function nowTimestamp(context: EngineContext): Timestamp {
  return context.clock().toISOString();
}

export function today(context: EngineContext): IsoDate {
  return toIsoDate(context.clock());
}
