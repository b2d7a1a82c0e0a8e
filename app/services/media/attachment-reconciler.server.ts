import type { IAttachmentRepository, IMediaRepository } from "../../domain/media/media.repository";
import type { Media } from "../../domain/media/media.entity";
import type { AttachmentEntityTypeValue } from "../../types/enums";
import { Errors, wrapDependency } from "../../utils/errors";

export interface ReconcileAttachmentsInput {
  entityType: AttachmentEntityTypeValue;
  entityId: string;
  storeId: string;
  previousMediaIds: readonly string[];
  nextMediaIds: readonly string[];
}

export interface AttachmentReconcilerDeps<Tx> {
  attachments: IAttachmentRepository<Tx>;
  media: IMediaRepository<Tx>;
}

function sortedDifference(left: ReadonlySet<string>, right: ReadonlySet<string>): string[] {
  return [...left].filter((id) => !right.has(id)).sort();
}

/**
 * Keeps media_attachments in step with the media an aggregate references.
 */
export class AttachmentReconciler<Tx> {
  constructor(private readonly deps: AttachmentReconcilerDeps<Tx>) {}

  async reconcile(tx: Tx, input: ReconcileAttachmentsInput): Promise<void> {
    if (!input.entityId) {
      throw Errors.missingField("entityId", "entity_id required");
    }
    if (!input.storeId) {
      throw Errors.missingField("storeId", "store_id required");
    }
    const previous = new Set(input.previousMediaIds.filter(Boolean));
    const next = new Set(input.nextMediaIds.filter(Boolean));

    for (const mediaId of sortedDifference(next, previous)) {
      let media: Media | null;
      try {
        media = await this.deps.media.findById(mediaId, tx);
      } catch (error) {
        throw wrapDependency(error, "fetch media metadata");
      }
      if (!media) {
        throw Errors.mediaNotFound(mediaId);
      }
      if (media.storeId !== input.storeId) {
        throw Errors.validation("media belongs to different store", "mediaId");
      }
      await this.deps.attachments.create(
        {
          mediaId,
          entityType: input.entityType,
          entityId: input.entityId,
          storeId: input.storeId,
          storageKey: media.storageKey,
        },
        tx
      );
    }

    for (const mediaId of sortedDifference(previous, next)) {
      await this.deps.attachments.delete(input.entityType, input.entityId, mediaId, tx);
    }
  }
}
