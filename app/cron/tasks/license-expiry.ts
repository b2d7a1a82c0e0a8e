import type { ILicenseRepository } from "../../domain/license/license.repository";
import type { IAttachmentRepository } from "../../domain/media/media.repository";
import type { LicenseStatusChangedData } from "../../domain/outbox/outbox.entity";
import type { IOutboxRepository } from "../../domain/outbox/outbox.repository";
import {
  addUtcDays,
  canTransition,
  endOfUtcDay,
  formatUtcDate,
  isTerminalStatus,
  startOfUtcDay,
  type License,
} from "../../domain/license/license.entity";
import type { TransactionRunner } from "../../services/db/transaction.server";
import type { StoreKycReconciler } from "../../services/licenses/kyc-reconciler.server";
import type { AttachmentLinker, LicenseEventEmitter } from "../../services/licenses/license.server";
import {
  AttachmentEntityType,
  LicenseStatus,
  OutboxAggregateType,
  OutboxEventType,
} from "../../types/enums";
import { LICENSE_SCHEDULER_DEFAULTS } from "../../utils/config.shared";
import { wrapDependency, type AppError } from "../../utils/errors";
import { createTimer, logger, metrics } from "../../utils/logger.server";
import {
  isSweepFailed,
  type CronLogger,
  type LicenseSweepSummary,
  type SweepName,
  type SweepResult,
} from "../types";

export interface LicenseExpirySweepsDeps<Tx> {
  transactions: TransactionRunner<Tx>;
  licenses: ILicenseRepository<Tx>;
  attachments: Pick<IAttachmentRepository<Tx>, "listByEntity">;
  linker: AttachmentLinker<Tx>;
  kyc: StoreKycReconciler<Tx>;
  outbox: LicenseEventEmitter<Tx>;
  outboxRecords: Pick<IOutboxRepository<Tx>, "existsWithMarker">;
  warningDays?: number;
  purgeAfterDays?: number;
  purgeEnabled?: boolean;
  now?: () => Date;
  logger?: CronLogger;
}

type LicenseOutcome = "processed" | "skipped";

/**
 * The three time-driven passes over licenses. Each pass walks its
 * candidates one transaction at a time and stops at the first failure;
 * whatever is left is picked up again on the next tick.
 */
export class LicenseExpirySweeps<Tx> {
  private readonly warningDays: number;
  private readonly purgeAfterDays: number;
  private readonly purgeEnabled: boolean;
  private readonly now: () => Date;
  private readonly logger: CronLogger;

  constructor(private readonly deps: LicenseExpirySweepsDeps<Tx>) {
    this.warningDays = deps.warningDays ?? LICENSE_SCHEDULER_DEFAULTS.EXPIRY_WARNING_DAYS;
    this.purgeAfterDays = deps.purgeAfterDays ?? LICENSE_SCHEDULER_DEFAULTS.EXPIRED_PURGE_DAYS;
    this.purgeEnabled = deps.purgeEnabled ?? true;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? logger.child({ component: "license-scheduler" });
  }

  async process(): Promise<LicenseSweepSummary> {
    const timer = createTimer();
    const warn = await this.warnExpiring();
    const expire = await this.expireLicenses();
    const purge = await this.purgeExpired();
    const errors = [warn, expire, purge].filter(isSweepFailed).map((result) => result.error);
    return { warn, expire, purge, errors, durationMs: timer.elapsed() };
  }

  /**
   * Emits an expiry warning for every verified license expiring on the UTC
   * day that lies `warningDays` ahead. A license is warned once: reruns on
   * the same day find the earlier warning and skip it. License state is left
   * untouched.
   */
  async warnExpiring(): Promise<SweepResult> {
    const from = startOfUtcDay(addUtcDays(this.now(), this.warningDays));
    const to = addUtcDays(from, 1);
    return this.sweep(
      "warn",
      () => this.deps.licenses.findExpiringBetween(from, to),
      "list expiring licenses",
      async (license) => {
        return this.deps.transactions.withTransaction<LicenseOutcome>(async (tx) => {
          const warned = await this.deps.outboxRecords.existsWithMarker(
            {
              eventType: OutboxEventType.LICENSE_STATUS_CHANGED,
              aggregateType: OutboxAggregateType.LICENSE,
              aggregateId: license.id,
              warningType: LICENSE_SCHEDULER_DEFAULTS.WARNING_TYPE,
            },
            tx
          );
          if (warned) {
            return "skipped";
          }
          const data: LicenseStatusChangedData = {
            licenseId: license.id,
            storeId: license.storeId,
            status: license.status,
            reason: `expires on ${formatUtcDate(license.expirationDate ?? from)}`,
            warningType: LICENSE_SCHEDULER_DEFAULTS.WARNING_TYPE,
          };
          await this.deps.outbox.emit(tx, {
            eventType: OutboxEventType.LICENSE_STATUS_CHANGED,
            aggregateType: OutboxAggregateType.LICENSE,
            aggregateId: license.id,
            data,
          });
          return "processed";
        }, "license expiry warning");
      },
      "emit expiry warning"
    );
  }

  /**
   * Moves pending and verified licenses whose expiration date has been
   * reached to expired, recomputing the store's KYC status each time.
   */
  async expireLicenses(): Promise<SweepResult> {
    const cutoff = endOfUtcDay(this.now());
    return this.sweep(
      "expire",
      () => this.deps.licenses.findExpirationCandidates(cutoff),
      "list expiration candidates",
      async (candidate) => {
        const expired = await this.deps.transactions.withTransaction(async (tx): Promise<License | null> => {
          const current = await this.deps.licenses.findByIdForUpdate(candidate.id, tx);
          if (
            !current ||
            isTerminalStatus(current.status) ||
            !canTransition(current.status, LicenseStatus.EXPIRED)
          ) {
            return null;
          }
          await this.deps.licenses.updateStatus(current.id, LicenseStatus.EXPIRED, tx);
          await this.deps.kyc.reconcile(tx, current.storeId);
          const data: LicenseStatusChangedData = {
            licenseId: current.id,
            storeId: current.storeId,
            status: LicenseStatus.EXPIRED,
            reason: LICENSE_SCHEDULER_DEFAULTS.EXPIRED_REASON,
          };
          await this.deps.outbox.emit(tx, {
            eventType: OutboxEventType.LICENSE_STATUS_CHANGED,
            aggregateType: OutboxAggregateType.LICENSE,
            aggregateId: current.id,
            data,
          });
          return current;
        }, "expire license");
        if (!expired) {
          return "skipped";
        }
        metrics.licenseTransition({
          licenseId: expired.id,
          storeId: expired.storeId,
          from: expired.status,
          to: LicenseStatus.EXPIRED,
          source: "scheduler",
        });
        return "processed";
      },
      "expire license"
    );
  }

  /**
   * Hard-deletes licenses that have stayed expired past the retention window.
   */
  async purgeExpired(): Promise<SweepResult> {
    if (!this.purgeEnabled) {
      return { sweep: "purge", candidates: 0, processed: 0, skipped: 0 };
    }
    const cutoff = addUtcDays(this.now(), -this.purgeAfterDays);
    return this.sweep(
      "purge",
      () => this.deps.licenses.findExpiredBefore(cutoff),
      "list purgeable licenses",
      async (candidate) => {
        return this.deps.transactions.withTransaction<LicenseOutcome>(async (tx) => {
          const current = await this.deps.licenses.findByIdForUpdate(candidate.id, tx);
          if (!current || current.status !== LicenseStatus.EXPIRED) {
            return "skipped";
          }
          const linked = await this.deps.attachments.listByEntity(
            AttachmentEntityType.LICENSE,
            current.id,
            tx
          );
          await this.deps.linker.reconcile(tx, {
            entityType: AttachmentEntityType.LICENSE,
            entityId: current.id,
            storeId: current.storeId,
            previousMediaIds: linked.map((attachment) => attachment.mediaId),
            nextMediaIds: [],
          });
          await this.deps.licenses.delete(current.id, tx);
          await this.deps.kyc.reconcile(tx, current.storeId);
          return "processed";
        }, "purge license");
      },
      "purge expired license"
    );
  }

  private async sweep(
    name: SweepName,
    load: () => Promise<License[]>,
    loadOperation: string,
    handle: (license: License) => Promise<LicenseOutcome>,
    handleOperation: string
  ): Promise<SweepResult> {
    const timer = createTimer();
    const result: SweepResult = { sweep: name, candidates: 0, processed: 0, skipped: 0 };

    let candidates: License[];
    try {
      candidates = await load();
    } catch (error) {
      return this.finish(result, timer.elapsed(), wrapDependency(error, loadOperation));
    }
    result.candidates = candidates.length;

    for (const license of candidates) {
      try {
        const outcome = await handle(license);
        if (outcome === "processed") {
          result.processed++;
        } else {
          result.skipped++;
        }
      } catch (error) {
        const failure = wrapDependency(error, handleOperation).withMetadata({
          licenseId: license.id,
          storeId: license.storeId,
        });
        return this.finish(result, timer.elapsed(), failure);
      }
    }
    return this.finish(result, timer.elapsed());
  }

  private finish(result: SweepResult, duration: number, error?: AppError): SweepResult {
    metrics.schedulerSweep({
      sweep: result.sweep,
      candidates: result.candidates,
      processed: result.processed,
      status: error ? "failed" : "completed",
      duration,
    });
    if (error) {
      this.logger.warn(`License ${result.sweep} sweep stopped`, {
        processed: result.processed,
        remaining: result.candidates - result.processed - result.skipped,
        error: error.message,
      });
      return { ...result, error };
    }
    this.logger.debug(`License ${result.sweep} sweep completed`, {
      candidates: result.candidates,
      processed: result.processed,
      skipped: result.skipped,
    });
    return result;
  }
}
