import { eq } from "drizzle-orm";
import type { Database, DbExecutor, DbTransaction } from "../../db.server";
import { subscriptions } from "../../db/schema";
import { Errors } from "../../utils/errors";
import type {
  CreateSubscriptionData,
  ISubscriptionRepository,
  UpdateSubscriptionData,
} from "../../domain/subscription/subscription.repository";
import type { Subscription } from "../../domain/subscription/subscription.entity";

export class DrizzleSubscriptionRepository implements ISubscriptionRepository<DbTransaction> {
  constructor(private readonly db: Database) {}

  private exec(tx?: DbTransaction): DbExecutor {
    return tx ?? this.db;
  }

  async findByExternalId(externalSubscriptionId: string, tx?: DbTransaction): Promise<Subscription | null> {
    const [row] = await this.exec(tx)
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.externalSubscriptionId, externalSubscriptionId))
      .limit(1);
    return row ?? null;
  }

  async create(data: CreateSubscriptionData, tx?: DbTransaction): Promise<Subscription> {
    const [row] = await this.exec(tx).insert(subscriptions).values(data).returning();
    if (!row) {
      throw Errors.internal("subscription insert returned no row");
    }
    return row;
  }

  async update(id: string, data: UpdateSubscriptionData, tx?: DbTransaction): Promise<Subscription | null> {
    const [row] = await this.exec(tx)
      .update(subscriptions)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(subscriptions.id, id))
      .returning();
    return row ?? null;
  }
}
