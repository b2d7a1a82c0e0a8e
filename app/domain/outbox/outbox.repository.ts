import type { OutboxAggregateTypeValue, OutboxEventTypeValue } from "../../types/enums";
import type { OutboxRecord } from "./outbox.entity";

export interface InsertOutboxData {
  eventType: OutboxEventTypeValue;
  aggregateType: OutboxAggregateTypeValue;
  aggregateId: string;
  payload: Record<string, unknown>;
}

export interface OutboxMarkerQuery {
  eventType: OutboxEventTypeValue;
  aggregateType: OutboxAggregateTypeValue;
  aggregateId: string;
  /** Matched against `payload.data.warningType`. */
  warningType: string;
}

/**
 * Inserts require a transaction handle: an outbox row never exists outside
 * the transaction that produced it.
 */
export interface IOutboxRepository<Tx> {
  insert(data: InsertOutboxData, tx: Tx): Promise<OutboxRecord>;

  /** Whether a marked event was already recorded for the aggregate. */
  existsWithMarker(query: OutboxMarkerQuery, tx?: Tx): Promise<boolean>;
}
