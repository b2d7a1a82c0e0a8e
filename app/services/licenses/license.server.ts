/**
 * License Lifecycle Service
 *
 * Store members submit licenses, an administrator verifies or rejects them,
 * and store owners remove terminal ones. Every mutation runs in a single
 * transaction together with its attachment links, the recomputed store KYC
 * status and the outbox event describing it.
 */

import type {
  CreateLicenseData,
  ILicenseRepository,
} from "../../domain/license/license.repository";
import {
  isDecision,
  isDeletable,
  isLicenseType,
  type License,
  type LicenseWithDocumentUrl,
} from "../../domain/license/license.entity";
import type { IMediaRepository } from "../../domain/media/media.repository";
import { isAllowedLicenseMimeType, isMediaReady, type Media } from "../../domain/media/media.entity";
import type { IMembershipRepository, IStoreRepository } from "../../domain/store/store.repository";
import type { Store } from "../../domain/store/store.entity";
import type { ActorRef, LicenseStatusChangedData } from "../../domain/outbox/outbox.entity";
import {
  AttachmentEntityType,
  KYCStatus,
  LicenseStatus,
  MediaKind,
  OutboxAggregateType,
  OutboxEventType,
  type LicenseDecision,
  type LicenseStatusType,
  type MemberRoleType,
} from "../../types/enums";
import { LICENSE_ROLE_SETS, SIGNED_URL_DEFAULTS } from "../../utils/config.shared";
import { ErrorCode, Errors, wrapDependency } from "../../utils/errors";
import { logger as baseLogger, metrics, type Logger } from "../../utils/logger.server";
import {
  decodeCursor,
  normalizeLimit,
  paginate,
  type Page,
  type PageRequest,
} from "../../utils/pagination";
import type { TransactionRunner } from "../db/transaction.server";
import type { ReconcileAttachmentsInput } from "../media/attachment-reconciler.server";
import type { OutboxEmitter } from "../outbox/outbox-emitter.server";
import type { DocumentUrlSigner } from "../storage/document-url-signer.server";
import type { StoreKycReconciler } from "./kyc-reconciler.server";

// =============================================================================
// Types
// =============================================================================

/**
 * The authenticated caller and the store they are acting for.
 */
export interface LicenseActor {
  userId: string;
  storeId: string;
}

export interface CreateLicenseInput {
  mediaId: string;
  issuingState: string;
  issueDate?: Date | null;
  expirationDate?: Date | null;
  type: string;
  number: string;
}

export interface LicenseRoleSets {
  create: readonly MemberRoleType[];
  delete: readonly MemberRoleType[];
}

export interface AttachmentLinker<Tx> {
  reconcile(tx: Tx, input: ReconcileAttachmentsInput): Promise<void>;
}

export type LicenseEventEmitter<Tx> = Pick<OutboxEmitter<Tx>, "emit">;

export interface LicenseServiceDeps<Tx> {
  transactions: TransactionRunner<Tx>;
  licenses: ILicenseRepository<Tx>;
  stores: Pick<IStoreRepository<Tx>, "findById" | "updateKycStatus">;
  memberships: IMembershipRepository;
  media: IMediaRepository<Tx>;
  attachments: AttachmentLinker<Tx>;
  kyc: StoreKycReconciler<Tx>;
  outbox: LicenseEventEmitter<Tx>;
  signer: DocumentUrlSigner;
  roles?: Partial<LicenseRoleSets>;
  signedUrlTtlSeconds?: number;
  logger?: Logger;
}

// =============================================================================
// Service
// =============================================================================

export class LicenseService<Tx> {
  private readonly roles: LicenseRoleSets;
  private readonly signedUrlTtlSeconds: number;
  private readonly logger: Logger;

  constructor(private readonly deps: LicenseServiceDeps<Tx>) {
    this.roles = {
      create: deps.roles?.create ?? LICENSE_ROLE_SETS.CREATE,
      delete: deps.roles?.delete ?? LICENSE_ROLE_SETS.DELETE,
    };
    this.signedUrlTtlSeconds = deps.signedUrlTtlSeconds ?? SIGNED_URL_DEFAULTS.TTL_SECONDS;
    this.logger = deps.logger ?? baseLogger.child({ component: "licenses" });
  }

  /**
   * Submits a pending license backed by an uploaded license document.
   */
  async createLicense(actor: LicenseActor, input: CreateLicenseInput): Promise<License> {
    const storeId = actor.storeId.trim();
    const userId = actor.userId.trim();
    if (!storeId) {
      throw Errors.missingField("storeId", "active store id required");
    }
    if (!userId) {
      throw Errors.missingField("userId", "user id required");
    }
    const mediaId = input.mediaId.trim();
    const issuingState = input.issuingState.trim();
    const number = input.number.trim();
    const type = input.type.trim();
    if (!mediaId) {
      throw Errors.missingField("mediaId", "media_id is required");
    }
    if (!issuingState) {
      throw Errors.missingField("issuingState", "issuing_state is required");
    }
    if (!number) {
      throw Errors.missingField("number", "number is required");
    }
    if (!isLicenseType(type)) {
      throw Errors.invalidFormat("type", "invalid license type");
    }

    await this.requireRole(userId, storeId, this.roles.create);

    let media: Media | null;
    try {
      media = await this.deps.media.findById(mediaId);
    } catch (error) {
      throw wrapDependency(error, "fetch media");
    }
    if (!media) {
      throw Errors.mediaNotFound(mediaId);
    }
    if (media.storeId !== storeId) {
      throw Errors.forbidden("media does not belong to active store", { storeId, mediaId });
    }
    if (media.kind !== MediaKind.LICENSE_DOC) {
      throw Errors.validation("media must be a license document", "mediaId");
    }
    if (!isMediaReady(media)) {
      throw Errors.conflict(ErrorCode.CONFLICT_MEDIA_NOT_READY, "media not ready", {
        mediaId,
        mediaStatus: media.status,
      });
    }
    if (!isAllowedLicenseMimeType(media.mimeType)) {
      throw Errors.validation("media mime_type must be pdf or image", "mimeType");
    }

    const data: CreateLicenseData = {
      storeId,
      userId,
      status: LicenseStatus.PENDING,
      mediaId,
      storageKey: media.storageKey,
      issuingState,
      issueDate: input.issueDate ?? null,
      expirationDate: input.expirationDate ?? null,
      type,
      number,
    };

    let license: License;
    try {
      license = await this.deps.transactions.withTransaction(async (tx) => {
        const created = await this.deps.licenses.create(data, tx);
        await this.deps.attachments.reconcile(tx, {
          entityType: AttachmentEntityType.LICENSE,
          entityId: created.id,
          storeId,
          previousMediaIds: [],
          nextMediaIds: [mediaId],
        });
        await this.emitStatusChanged(tx, created, LicenseStatus.PENDING, { userId, storeId });
        return created;
      }, "create license");
    } catch (error) {
      throw wrapDependency(error, "create license");
    }

    metrics.licenseTransition({
      licenseId: license.id,
      storeId,
      from: null,
      to: LicenseStatus.PENDING,
      source: "create",
    });
    return license;
  }

  /**
   * Applies an administrator's decision to a pending license and recomputes
   * the store's KYC status in the same transaction.
   */
  async verifyLicense(
    licenseId: string,
    decision: string,
    reason?: string,
    actor?: ActorRef
  ): Promise<License> {
    if (!isDecision(decision)) {
      throw Errors.validation("invalid decision", "decision");
    }
    const id = licenseId.trim();
    if (!id) {
      throw Errors.missingField("licenseId", "license id required");
    }
    const next: LicenseDecision = decision;
    const trimmedReason = reason?.trim() || undefined;

    let result: { previous: LicenseStatusType; updated: License };
    try {
      result = await this.deps.transactions.withTransaction(async (tx) => {
        const current = await this.deps.licenses.findByIdForUpdate(id, tx);
        if (!current) {
          throw Errors.licenseNotFound(id);
        }
        if (current.status !== LicenseStatus.PENDING) {
          throw Errors.conflict(ErrorCode.CONFLICT_LICENSE_FINALIZED, "license already finalized", {
            licenseId: id,
            status: current.status,
          });
        }
        await this.deps.licenses.updateStatus(id, next, tx);
        await this.deps.kyc.reconcile(tx, current.storeId);
        const updated: License = { ...current, status: next };
        await this.emitStatusChanged(tx, updated, next, actor, trimmedReason);
        return { previous: current.status, updated };
      }, "verify license");
    } catch (error) {
      throw wrapDependency(error, "update license status");
    }

    metrics.licenseTransition({
      licenseId: id,
      storeId: result.updated.storeId,
      from: result.previous,
      to: next,
      source: "verify",
    });
    return result.updated;
  }

  /**
   * Removes a rejected or expired license together with its attachment link.
   * When the store has no verified license left afterwards and its KYC status
   * says otherwise, it drops back to pending verification.
   */
  async deleteLicense(actor: LicenseActor, licenseId: string): Promise<void> {
    const storeId = actor.storeId.trim();
    const userId = actor.userId.trim();
    const id = licenseId.trim();
    if (!storeId) {
      throw Errors.missingField("storeId", "active store id required");
    }
    if (!userId) {
      throw Errors.missingField("userId", "user id required");
    }
    if (!id) {
      throw Errors.missingField("licenseId", "license id required");
    }

    await this.requireRole(userId, storeId, this.roles.delete);

    let license: License | null;
    try {
      license = await this.deps.licenses.findById(id);
    } catch (error) {
      throw wrapDependency(error, "fetch license");
    }
    if (!license) {
      throw Errors.licenseNotFound(id);
    }
    if (license.storeId !== storeId) {
      throw Errors.forbidden("license does not belong to active store", { storeId, licenseId: id });
    }
    if (!isDeletable(license)) {
      throw Errors.conflict(
        ErrorCode.CONFLICT_LICENSE_NOT_DELETABLE,
        "only rejected or expired licenses can be deleted",
        { licenseId: id, status: license.status }
      );
    }

    const mediaId = license.mediaId;
    try {
      await this.deps.transactions.withTransaction(async (tx) => {
        await this.deps.attachments.reconcile(tx, {
          entityType: AttachmentEntityType.LICENSE,
          entityId: id,
          storeId,
          previousMediaIds: [mediaId],
          nextMediaIds: [],
        });
        await this.deps.licenses.delete(id, tx);
      }, "delete license");
    } catch (error) {
      throw wrapDependency(error, "delete license");
    }
    this.logger.info("license deleted", { licenseId: id, storeId, status: license.status });

    await this.resetKycWithoutVerifiedLicense(storeId);
  }

  /**
   * Lists a store's licenses newest first, each with a short-lived link to
   * its document. Licenses without a stored document get an empty link.
   */
  async listLicenses(storeId: string, page: PageRequest = {}): Promise<Page<LicenseWithDocumentUrl>> {
    const id = storeId.trim();
    if (!id) {
      throw Errors.missingField("storeId", "active store id required");
    }
    const limit = normalizeLimit(page.limit);
    const cursor = page.cursor ? decodeCursor(page.cursor) : undefined;

    let rows: License[];
    try {
      rows = await this.deps.licenses.listByStore({ storeId: id, limit: limit + 1, cursor });
    } catch (error) {
      throw wrapDependency(error, "list licenses");
    }
    const { items, nextCursor } = paginate(rows, limit);

    const withUrls: LicenseWithDocumentUrl[] = [];
    for (const license of items) {
      withUrls.push({ ...license, signedUrl: await this.signedUrlFor(license) });
    }
    return { items: withUrls, nextCursor };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async requireRole(
    userId: string,
    storeId: string,
    roles: readonly MemberRoleType[]
  ): Promise<void> {
    let allowed: boolean;
    try {
      allowed = await this.deps.memberships.userHasRole(userId, storeId, roles);
    } catch (error) {
      throw wrapDependency(error, "check membership role");
    }
    if (!allowed) {
      throw Errors.insufficientRole(storeId);
    }
  }

  private async signedUrlFor(license: License): Promise<string> {
    if (!license.storageKey.trim()) {
      return "";
    }
    try {
      return await this.deps.signer.signedReadUrl(license.storageKey, this.signedUrlTtlSeconds);
    } catch (error) {
      throw Errors.dependency("generate signed read url", error, ErrorCode.DEPENDENCY_SIGNER);
    }
  }

  private async emitStatusChanged(
    tx: Tx,
    license: License,
    status: LicenseStatusType,
    actor?: ActorRef,
    reason?: string
  ): Promise<void> {
    const data: LicenseStatusChangedData = {
      licenseId: license.id,
      storeId: license.storeId,
      status,
      ...(reason ? { reason } : {}),
    };
    await this.deps.outbox.emit(tx, {
      eventType: OutboxEventType.LICENSE_STATUS_CHANGED,
      aggregateType: OutboxAggregateType.LICENSE,
      aggregateId: license.id,
      actor,
      data,
    });
  }

  private async resetKycWithoutVerifiedLicense(storeId: string): Promise<void> {
    let verified: number;
    let store: Store | null;
    try {
      verified = await this.deps.licenses.countByStoreAndStatus(storeId, LicenseStatus.VERIFIED);
      if (verified > 0) {
        return;
      }
      store = await this.deps.stores.findById(storeId);
    } catch (error) {
      throw wrapDependency(error, "reconcile store kyc after delete");
    }
    if (!store) {
      throw Errors.storeNotFound(storeId);
    }
    if (store.kycStatus === KYCStatus.PENDING_VERIFICATION) {
      return;
    }
    try {
      await this.deps.stores.updateKycStatus(storeId, KYCStatus.PENDING_VERIFICATION);
    } catch (error) {
      throw wrapDependency(error, "update store kyc status");
    }
    metrics.kycReconciled({
      storeId,
      previous: store.kycStatus,
      next: KYCStatus.PENDING_VERIFICATION,
      changed: true,
    });
  }
}
