/**
 * Media and Attachment Repository Interfaces
 */

import type { AttachmentEntityTypeValue } from "../../types/enums";
import type { Media, MediaAttachment } from "./media.entity";

export interface IMediaRepository<Tx> {
  findById(id: string, tx?: Tx): Promise<Media | null>;
}

export interface IAttachmentRepository<Tx> {
  create(attachment: MediaAttachment, tx: Tx): Promise<void>;

  delete(entityType: AttachmentEntityTypeValue, entityId: string, mediaId: string, tx: Tx): Promise<void>;

  listByEntity(entityType: AttachmentEntityTypeValue, entityId: string, tx?: Tx): Promise<MediaAttachment[]>;
}
