/**
 * @tally/service — Public API.
 *
 * `createBookkeeping()` wires configuration, logging and a store into a
 * ready BookkeepingService.
 */

import type { Store } from "@tally/store";
import { InMemoryStore } from "@tally/store";
import type { Clock, IdGenerator } from "@tally/ledger";
import { BookkeepingService } from "./bookkeeping-service.js";
import type { AppConfig } from "./config.js";
import { loadConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";

export { BookkeepingService } from "./bookkeeping-service.js";
export type { BookkeepingServiceOptions } from "./bookkeeping-service.js";
export { ConfigSchema, loadConfig, retentionPolicy } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { createErrorEnvelope, toErrorEnvelope, statusFor } from "./errors.js";
export type { ErrorDetail, ErrorEnvelope } from "./errors.js";
export * from "./dto.js";

// =============================================================================
// Factory
// =============================================================================

export interface CreateBookkeepingOptions {
  /** Default: a fresh InMemoryStore. */
  readonly store?: Store | undefined;
  /** Default: loaded from process.env. */
  readonly config?: AppConfig | undefined;
  /** Default: built from the config. */
  readonly logger?: Logger | undefined;
  readonly clock?: Clock | undefined;
  readonly newId?: IdGenerator | undefined;
}

export interface Bookkeeping {
  readonly service: BookkeepingService;
  readonly store: Store;
  readonly config: AppConfig;
  readonly logger: Logger;
}

export function createBookkeeping(options: CreateBookkeepingOptions = {}): Bookkeeping {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);
  const store = options.store ?? new InMemoryStore();

  const service = new BookkeepingService({
    store,
    logger,
    config,
    clock: options.clock,
    newId: options.newId,
  });

  logger.info(
    { retention: config.REPORT_CACHE_RETENTION, tolerance: config.REPORT_BALANCE_TOLERANCE },
    "Bookkeeping service ready",
  );

  return { service, store, config, logger };
}
