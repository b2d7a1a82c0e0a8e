import { randomUUID } from "crypto";
import type { IOutboxRepository } from "../../domain/outbox/outbox.repository";
import type { DomainEvent, OutboxRecord, PayloadEnvelope } from "../../domain/outbox/outbox.entity";
import { OUTBOX_CONFIG } from "../../utils/config.shared";
import { Errors } from "../../utils/errors";
import { logger as baseLogger, type Logger } from "../../utils/logger.server";

export interface OutboxEmitterDeps<Tx> {
  repository: IOutboxRepository<Tx>;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Appends domain events to the outbox inside the caller's transaction.
 * Nothing is batched or retried here: the row commits or rolls back with
 * the state change it describes.
 */
export class OutboxEmitter<Tx> {
  private readonly repository: IOutboxRepository<Tx>;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(deps: OutboxEmitterDeps<Tx>) {
    this.repository = deps.repository;
    this.logger = deps.logger ?? baseLogger.child({ component: "outbox" });
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
  }

  async emit<TData>(tx: Tx | undefined, event: DomainEvent<TData>): Promise<OutboxRecord> {
    if (tx === undefined) {
      throw Errors.internal("outbox emit requires an active transaction");
    }
    if (!event.aggregateId) {
      throw Errors.validation("aggregate id is required", "aggregateId");
    }
    const envelope: PayloadEnvelope<TData> = {
      version: event.version ?? OUTBOX_CONFIG.PAYLOAD_VERSION,
      eventId: this.generateId(),
      occurredAt: (event.occurredAt ?? this.now()).toISOString(),
      actor: event.actor,
      data: event.data,
    };
    const record = await this.repository.insert(
      {
        eventType: event.eventType,
        aggregateType: event.aggregateType,
        aggregateId: event.aggregateId,
        payload: toJsonObject(envelope),
      },
      tx
    );
    this.logger.info("outbox event queued", {
      outboxEventId: record.id,
      envelopeEventId: envelope.eventId,
      eventType: event.eventType,
      aggregateType: event.aggregateType,
      aggregateId: event.aggregateId,
    });
    return record;
  }
}

function toJsonObject<TData>(envelope: PayloadEnvelope<TData>): Record<string, unknown> {
  const record: Record<string, unknown> = {
    version: envelope.version,
    eventId: envelope.eventId,
    occurredAt: envelope.occurredAt,
    data: envelope.data,
  };
  if (envelope.actor) {
    record.actor = envelope.actor;
  }
  return record;
}
