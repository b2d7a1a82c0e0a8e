import { and, eq, sql } from "drizzle-orm";
import type { Database, DbExecutor, DbTransaction } from "../../db.server";
import { outboxEvents } from "../../db/schema";
import { Errors } from "../../utils/errors";
import type {
  InsertOutboxData,
  IOutboxRepository,
  OutboxMarkerQuery,
} from "../../domain/outbox/outbox.repository";
import type { OutboxRecord } from "../../domain/outbox/outbox.entity";

export class DrizzleOutboxRepository implements IOutboxRepository<DbTransaction> {
  constructor(private readonly db: Database) {}

  private exec(tx?: DbTransaction): DbExecutor {
    return tx ?? this.db;
  }

  async insert(data: InsertOutboxData, tx: DbTransaction): Promise<OutboxRecord> {
    const [row] = await tx
      .insert(outboxEvents)
      .values(data)
      .returning({
        id: outboxEvents.id,
        eventType: outboxEvents.eventType,
        aggregateType: outboxEvents.aggregateType,
        aggregateId: outboxEvents.aggregateId,
        payload: outboxEvents.payload,
        createdAt: outboxEvents.createdAt,
      });
    if (!row) {
      throw Errors.internal("outbox insert returned no row");
    }
    return row;
  }

  async existsWithMarker(query: OutboxMarkerQuery, tx?: DbTransaction): Promise<boolean> {
    const rows = await this.exec(tx)
      .select({ id: outboxEvents.id })
      .from(outboxEvents)
      .where(
        and(
          eq(outboxEvents.eventType, query.eventType),
          eq(outboxEvents.aggregateType, query.aggregateType),
          eq(outboxEvents.aggregateId, query.aggregateId),
          sql`${outboxEvents.payload} -> 'data' ->> 'warningType' = ${query.warningType}`
        )
      )
      .limit(1);
    return rows.length > 0;
  }
}
