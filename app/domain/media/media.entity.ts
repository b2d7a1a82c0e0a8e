/**
 * Media Domain Entity
 *
 * Uploaded files and the links that bind them to aggregates such as licenses.
 */

import type { AttachmentEntityTypeValue, MediaKindType, MediaStatusType } from "../../types/enums";
import { LICENSE_MEDIA_RULES } from "../../utils/config.shared";

export interface Media {
  readonly id: string;
  readonly storeId: string;
  readonly kind: MediaKindType;
  readonly status: MediaStatusType;
  readonly mimeType: string;
  readonly storageKey: string;
}

export interface MediaAttachment {
  readonly mediaId: string;
  readonly entityType: AttachmentEntityTypeValue;
  readonly entityId: string;
  readonly storeId: string;
  readonly storageKey: string;
}

export function isMediaReady(media: Pick<Media, "status">): boolean {
  return LICENSE_MEDIA_RULES.READY_STATUSES.some((s) => s === media.status);
}

/**
 * License documents must be a PDF or an image.
 */
export function isAllowedLicenseMimeType(mimeType: string): boolean {
  const normalized = mimeType.trim().toLowerCase();
  return (
    normalized === LICENSE_MEDIA_RULES.PDF_MIME_TYPE ||
    normalized.startsWith(LICENSE_MEDIA_RULES.IMAGE_MIME_PREFIX)
  );
}
