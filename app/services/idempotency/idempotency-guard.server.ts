/**
 * External Event Idempotency Guard
 *
 * Deduplicates redelivered external events with a set-if-absent key that
 * expires after a bounded TTL. The key is only written for identifiers that
 * pass validation.
 */

import type { RedisClientWrapper } from "../../utils/redis-client.server";
import { IDEMPOTENCY_DEFAULTS } from "../../utils/config.shared";
import { ErrorCode, Errors } from "../../utils/errors";
import { logger as baseLogger, type Logger } from "../../utils/logger.server";

export type IdempotencyStore = Pick<RedisClientWrapper, "setNX" | "del">;

export interface IdempotencyGuardOptions {
  scope: string;
  ttlSeconds: number;
  keyPrefix?: string;
  logger?: Logger;
}

export function idempotencyKey(scope: string, eventId: string, prefix: string = IDEMPOTENCY_DEFAULTS.KEY_PREFIX): string {
  return `${prefix}:${scope}:${eventId}`;
}

export function normalizeEventId(eventId: string): string {
  const trimmed = eventId.trim();
  if (!trimmed) {
    throw Errors.missingField("eventId", "event id is required");
  }
  if (!IDEMPOTENCY_DEFAULTS.EVENT_ID_PATTERN.test(trimmed)) {
    throw Errors.invalidFormat("eventId", "event id is malformed");
  }
  return trimmed;
}

export class IdempotencyGuard {
  private readonly scope: string;
  private readonly ttlMs: number;
  private readonly keyPrefix: string;
  private readonly logger: Logger;

  constructor(private readonly store: IdempotencyStore, options: IdempotencyGuardOptions) {
    if (!options.scope.trim()) {
      throw Errors.internal("idempotency scope is required");
    }
    if (options.ttlSeconds <= 0) {
      throw Errors.internal("idempotency ttl must be positive");
    }
    this.scope = options.scope.trim();
    this.ttlMs = options.ttlSeconds * 1000;
    this.keyPrefix = options.keyPrefix ?? IDEMPOTENCY_DEFAULTS.KEY_PREFIX;
    this.logger = options.logger ?? baseLogger.child({ component: "idempotency", scope: this.scope });
  }

  /**
   * Marks the event as seen. Resolves true when the event was already marked
   * within the TTL window (a duplicate), false when it is new.
   */
  async checkAndMark(eventId: string): Promise<boolean> {
    const id = normalizeEventId(eventId);
    const key = idempotencyKey(this.scope, id, this.keyPrefix);
    let acquired: boolean;
    try {
      acquired = await this.store.setNX(key, "1", this.ttlMs);
    } catch (error) {
      throw Errors.dependency("mark idempotency key", error, ErrorCode.DEPENDENCY_CACHE);
    }
    if (!acquired) {
      this.logger.info("duplicate external event", { eventId: id });
    }
    return !acquired;
  }

  /**
   * Releases the key so a failed event can be processed again on redelivery.
   */
  async delete(eventId: string): Promise<void> {
    const id = normalizeEventId(eventId);
    try {
      await this.store.del(idempotencyKey(this.scope, id, this.keyPrefix));
    } catch (error) {
      throw Errors.dependency("delete idempotency key", error, ErrorCode.DEPENDENCY_CACHE);
    }
  }
}
