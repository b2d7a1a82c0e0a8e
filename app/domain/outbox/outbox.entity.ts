/**
 * Outbox Domain Types
 *
 * A DomainEvent is what services hand to the emitter; an OutboxRecord is the
 * row that lands in the same transaction as the state change it describes.
 */

import type {
  LicenseStatusType,
  OutboxAggregateTypeValue,
  OutboxEventTypeValue,
} from "../../types/enums";

export interface ActorRef {
  readonly userId?: string;
  readonly storeId?: string;
  readonly role?: string;
}

export interface DomainEvent<TData> {
  readonly eventType: OutboxEventTypeValue;
  readonly aggregateType: OutboxAggregateTypeValue;
  readonly aggregateId: string;
  readonly actor?: ActorRef;
  readonly data: TData;
  readonly version?: number;
  readonly occurredAt?: Date;
}

/**
 * Versioned envelope persisted as the outbox payload.
 */
export interface PayloadEnvelope<TData> {
  readonly version: number;
  readonly eventId: string;
  readonly occurredAt: string;
  readonly actor?: ActorRef;
  readonly data: TData;
}

export interface OutboxRecord {
  readonly id: string;
  readonly eventType: OutboxEventTypeValue;
  readonly aggregateType: OutboxAggregateTypeValue;
  readonly aggregateId: string;
  readonly payload: Record<string, unknown>;
  readonly createdAt: Date;
}

export interface LicenseStatusChangedData {
  readonly licenseId: string;
  readonly storeId: string;
  readonly status: LicenseStatusType;
  readonly reason?: string;
  readonly warningType?: string;
}
