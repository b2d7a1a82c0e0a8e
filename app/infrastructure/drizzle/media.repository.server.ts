import { and, eq } from "drizzle-orm";
import type { Database, DbExecutor, DbTransaction } from "../../db.server";
import { media, mediaAttachments } from "../../db/schema";
import { AttachmentEntityType, type AttachmentEntityTypeValue } from "../../types/enums";
import type { IAttachmentRepository, IMediaRepository } from "../../domain/media/media.repository";
import type { Media, MediaAttachment } from "../../domain/media/media.entity";

export class DrizzleMediaRepository implements IMediaRepository<DbTransaction> {
  constructor(private readonly db: Database) {}

  async findById(id: string, tx?: DbTransaction): Promise<Media | null> {
    const executor: DbExecutor = tx ?? this.db;
    const [row] = await executor
      .select({
        id: media.id,
        storeId: media.storeId,
        kind: media.kind,
        status: media.status,
        mimeType: media.mimeType,
        storageKey: media.storageKey,
      })
      .from(media)
      .where(eq(media.id, id))
      .limit(1);
    return row ?? null;
  }
}

function toEntityType(value: string): AttachmentEntityTypeValue | null {
  return value === AttachmentEntityType.LICENSE ? AttachmentEntityType.LICENSE : null;
}

export class DrizzleAttachmentRepository implements IAttachmentRepository<DbTransaction> {
  constructor(private readonly db: Database) {}

  async create(attachment: MediaAttachment, tx: DbTransaction): Promise<void> {
    await tx
      .insert(mediaAttachments)
      .values({ ...attachment })
      .onConflictDoNothing({
        target: [mediaAttachments.entityType, mediaAttachments.entityId, mediaAttachments.mediaId],
      });
  }

  async delete(
    entityType: AttachmentEntityTypeValue,
    entityId: string,
    mediaId: string,
    tx: DbTransaction
  ): Promise<void> {
    await tx
      .delete(mediaAttachments)
      .where(
        and(
          eq(mediaAttachments.entityType, entityType),
          eq(mediaAttachments.entityId, entityId),
          eq(mediaAttachments.mediaId, mediaId)
        )
      );
  }

  async listByEntity(
    entityType: AttachmentEntityTypeValue,
    entityId: string,
    tx?: DbTransaction
  ): Promise<MediaAttachment[]> {
    const executor: DbExecutor = tx ?? this.db;
    const rows = await executor
      .select({
        mediaId: mediaAttachments.mediaId,
        entityType: mediaAttachments.entityType,
        entityId: mediaAttachments.entityId,
        storeId: mediaAttachments.storeId,
        storageKey: mediaAttachments.storageKey,
      })
      .from(mediaAttachments)
      .where(and(eq(mediaAttachments.entityType, entityType), eq(mediaAttachments.entityId, entityId)));
    const result: MediaAttachment[] = [];
    for (const row of rows) {
      const type = toEntityType(row.entityType);
      if (type) {
        result.push({ ...row, entityType: type });
      }
    }
    return result;
  }
}
