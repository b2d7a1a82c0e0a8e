import { and, count, desc, eq, gte, inArray, isNotNull, lt, lte, or } from "drizzle-orm";
import type { Database, DbExecutor, DbTransaction } from "../../db.server";
import { licenses } from "../../db/schema";
import { LicenseStatus, type LicenseStatusType } from "../../types/enums";
import { Errors } from "../../utils/errors";
import type {
  CreateLicenseData,
  ILicenseRepository,
  ListLicensesQuery,
} from "../../domain/license/license.repository";
import type { License } from "../../domain/license/license.entity";

const EXPIRABLE_STATUSES: LicenseStatusType[] = [LicenseStatus.PENDING, LicenseStatus.VERIFIED];

export class DrizzleLicenseRepository implements ILicenseRepository<DbTransaction> {
  constructor(private readonly db: Database) {}

  private exec(tx?: DbTransaction): DbExecutor {
    return tx ?? this.db;
  }

  async create(data: CreateLicenseData, tx?: DbTransaction): Promise<License> {
    const [row] = await this.exec(tx).insert(licenses).values(data).returning();
    if (!row) {
      throw Errors.internal("license insert returned no row");
    }
    return row;
  }

  async findById(id: string, tx?: DbTransaction): Promise<License | null> {
    const [row] = await this.exec(tx).select().from(licenses).where(eq(licenses.id, id)).limit(1);
    return row ?? null;
  }

  async findByIdForUpdate(id: string, tx: DbTransaction): Promise<License | null> {
    const [row] = await tx
      .select()
      .from(licenses)
      .where(eq(licenses.id, id))
      .limit(1)
      .for("update");
    return row ?? null;
  }

  async updateStatus(id: string, status: LicenseStatusType, tx?: DbTransaction): Promise<void> {
    await this.exec(tx)
      .update(licenses)
      .set({ status, updatedAt: new Date() })
      .where(eq(licenses.id, id));
  }

  async delete(id: string, tx?: DbTransaction): Promise<void> {
    await this.exec(tx).delete(licenses).where(eq(licenses.id, id));
  }

  async listStatusesByStore(storeId: string, tx?: DbTransaction): Promise<LicenseStatusType[]> {
    const rows = await this.exec(tx)
      .select({ status: licenses.status })
      .from(licenses)
      .where(eq(licenses.storeId, storeId));
    return rows.map((r) => r.status);
  }

  async countByStoreAndStatus(
    storeId: string,
    status: LicenseStatusType,
    tx?: DbTransaction
  ): Promise<number> {
    const [row] = await this.exec(tx)
      .select({ value: count() })
      .from(licenses)
      .where(and(eq(licenses.storeId, storeId), eq(licenses.status, status)));
    return row?.value ?? 0;
  }

  async listByStore(query: ListLicensesQuery, tx?: DbTransaction): Promise<License[]> {
    const { cursor } = query;
    const afterCursor = cursor
      ? or(
          lt(licenses.createdAt, cursor.createdAt),
          and(eq(licenses.createdAt, cursor.createdAt), lt(licenses.id, cursor.id))
        )
      : undefined;
    return this.exec(tx)
      .select()
      .from(licenses)
      .where(and(eq(licenses.storeId, query.storeId), afterCursor))
      .orderBy(desc(licenses.createdAt), desc(licenses.id))
      .limit(query.limit);
  }

  async findExpiringBetween(from: Date, to: Date, tx?: DbTransaction): Promise<License[]> {
    return this.exec(tx)
      .select()
      .from(licenses)
      .where(
        and(
          gte(licenses.expirationDate, from),
          lt(licenses.expirationDate, to),
          eq(licenses.status, LicenseStatus.VERIFIED)
        )
      );
  }

  async findExpirationCandidates(cutoff: Date, tx?: DbTransaction): Promise<License[]> {
    return this.exec(tx)
      .select()
      .from(licenses)
      .where(
        and(
          isNotNull(licenses.expirationDate),
          lte(licenses.expirationDate, cutoff),
          inArray(licenses.status, EXPIRABLE_STATUSES)
        )
      );
  }

  async findExpiredBefore(cutoff: Date, tx?: DbTransaction): Promise<License[]> {
    return this.exec(tx)
      .select()
      .from(licenses)
      .where(and(eq(licenses.status, LicenseStatus.EXPIRED), lt(licenses.updatedAt, cutoff)));
  }
}
