import { and, eq, inArray } from "drizzle-orm";
import type { Database, DbExecutor, DbTransaction } from "../../db.server";
import { storeMemberships, stores } from "../../db/schema";
import type { KYCStatusType, MemberRoleType } from "../../types/enums";
import type { IMembershipRepository, IStoreRepository } from "../../domain/store/store.repository";
import type { Store } from "../../domain/store/store.entity";

export class DrizzleStoreRepository implements IStoreRepository<DbTransaction> {
  constructor(private readonly db: Database) {}

  private exec(tx?: DbTransaction): DbExecutor {
    return tx ?? this.db;
  }

  async findById(id: string, tx?: DbTransaction): Promise<Store | null> {
    const [row] = await this.exec(tx)
      .select({
        id: stores.id,
        companyName: stores.companyName,
        kycStatus: stores.kycStatus,
        subscriptionActive: stores.subscriptionActive,
        createdAt: stores.createdAt,
        updatedAt: stores.updatedAt,
      })
      .from(stores)
      .where(eq(stores.id, id))
      .limit(1);
    return row ?? null;
  }

  async updateKycStatus(id: string, status: KYCStatusType, tx?: DbTransaction): Promise<void> {
    await this.exec(tx)
      .update(stores)
      .set({ kycStatus: status, updatedAt: new Date() })
      .where(eq(stores.id, id));
  }

  async updateSubscriptionActive(id: string, active: boolean, tx?: DbTransaction): Promise<void> {
    await this.exec(tx)
      .update(stores)
      .set({ subscriptionActive: active, updatedAt: new Date() })
      .where(eq(stores.id, id));
  }
}

export class DrizzleMembershipRepository implements IMembershipRepository {
  constructor(private readonly db: Database) {}

  async userHasRole(userId: string, storeId: string, roles: readonly MemberRoleType[]): Promise<boolean> {
    if (roles.length === 0) {
      return false;
    }
    const [row] = await this.db
      .select({ id: storeMemberships.id })
      .from(storeMemberships)
      .where(
        and(
          eq(storeMemberships.userId, userId),
          eq(storeMemberships.storeId, storeId),
          inArray(storeMemberships.role, [...roles])
        )
      )
      .limit(1);
    return row !== undefined;
  }
}
