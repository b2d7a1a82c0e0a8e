import defaultDb from "../db.server";
import { LicenseExpirySweeps, LicenseScheduler } from "../cron";
import {
  DrizzleAttachmentRepository,
  DrizzleLicenseRepository,
  DrizzleMediaRepository,
  DrizzleMembershipRepository,
  DrizzleOutboxRepository,
  DrizzleStoreRepository,
  DrizzleSubscriptionRepository,
} from "../infrastructure/drizzle";
import { PaymentEventReconciler } from "../services/billing/payment-event-reconciler.server";
import { StripePaymentProvider } from "../services/billing/payment-provider.server";
import { DrizzleTransactionRunner } from "../services/db/transaction.server";
import { IdempotencyGuard } from "../services/idempotency/idempotency-guard.server";
import { KycReconciler } from "../services/licenses/kyc-reconciler.server";
import { LicenseService } from "../services/licenses/license.server";
import { AttachmentReconciler } from "../services/media/attachment-reconciler.server";
import { OutboxEmitter } from "../services/outbox/outbox-emitter.server";
import { HmacDocumentUrlSigner } from "../services/storage/document-url-signer.server";
import {
  IDEMPOTENCY_CONFIG,
  LICENSE_ROLE_SETS,
  LICENSE_SCHEDULER_CONFIG,
  STORAGE_CONFIG,
  STRIPE_CONFIG,
  isDevelopment,
  isProduction,
} from "../utils/config.server";
import { logger as baseLogger } from "../utils/logger.server";
import { getRedisClient } from "../utils/redis-client.server";
import { createPaymentWebhookHandler } from "../webhooks";
import type { ContainerOverrides, IAppConfig, IContainer, IEnvConfig } from "./types";

export type {
  ContainerOverrides,
  IAppConfig,
  IContainer,
  IEnvConfig,
  IIdempotencyConfig,
  ISchedulerConfig,
  IStorageConfig,
  IStripeConfig,
} from "./types";

function resolveNodeEnv(): IEnvConfig["nodeEnv"] {
  const value = process.env.NODE_ENV;
  return value === "production" || value === "test" ? value : "development";
}

export function createConfigAdapter(): IAppConfig {
  return {
    env: {
      nodeEnv: resolveNodeEnv(),
      isProduction: isProduction(),
      isDevelopment: isDevelopment(),
    },
    scheduler: {
      intervalMs: LICENSE_SCHEDULER_CONFIG.INTERVAL_MS,
      expiryWarningDays: LICENSE_SCHEDULER_CONFIG.EXPIRY_WARNING_DAYS,
      expiredPurgeDays: LICENSE_SCHEDULER_CONFIG.EXPIRED_PURGE_DAYS,
      purgeEnabled: LICENSE_SCHEDULER_CONFIG.PURGE_ENABLED,
    },
    idempotency: {
      ttlSeconds: IDEMPOTENCY_CONFIG.TTL_SECONDS,
      keyPrefix: IDEMPOTENCY_CONFIG.KEY_PREFIX,
      paymentScope: IDEMPOTENCY_CONFIG.PAYMENT_SCOPE,
    },
    storage: {
      documentUrlBase: STORAGE_CONFIG.DOCUMENT_URL_BASE,
      signingSecret: STORAGE_CONFIG.SIGNING_SECRET,
      signedUrlTtlSeconds: STORAGE_CONFIG.SIGNED_URL_TTL_SECONDS,
    },
    stripe: {
      secretKey: STRIPE_CONFIG.SECRET_KEY,
      webhookSecret: STRIPE_CONFIG.WEBHOOK_SECRET,
    },
  };
}

/**
 * Wires repositories, services and the scheduler on top of one database
 * handle. Every service shares the same transaction runner, so the license
 * service and the scheduler go through identical transition paths.
 */
export async function createContainer(overrides: ContainerOverrides = {}): Promise<IContainer> {
  const config = overrides.config ?? createConfigAdapter();
  const logger = overrides.logger ?? baseLogger;
  const db = overrides.db ?? defaultDb;

  const transactions = new DrizzleTransactionRunner(db);
  const licenseRepository = new DrizzleLicenseRepository(db);
  const storeRepository = new DrizzleStoreRepository(db);
  const mediaRepository = new DrizzleMediaRepository(db);
  const attachmentRepository = new DrizzleAttachmentRepository(db);

  const kyc = new KycReconciler({ licenses: licenseRepository, stores: storeRepository });
  const outboxRepository = new DrizzleOutboxRepository(db);
  const outbox = new OutboxEmitter({
    repository: outboxRepository,
    logger: logger.child({ component: "outbox" }),
  });
  const attachments = new AttachmentReconciler({
    attachments: attachmentRepository,
    media: mediaRepository,
  });
  const signer =
    overrides.signer ??
    new HmacDocumentUrlSigner({
      baseUrl: config.storage.documentUrlBase,
      secret: config.storage.signingSecret,
    });

  const licenses = new LicenseService({
    transactions,
    licenses: licenseRepository,
    stores: storeRepository,
    memberships: new DrizzleMembershipRepository(db),
    media: mediaRepository,
    attachments,
    kyc,
    outbox,
    signer,
    roles: { create: LICENSE_ROLE_SETS.CREATE, delete: LICENSE_ROLE_SETS.DELETE },
    signedUrlTtlSeconds: config.storage.signedUrlTtlSeconds,
    logger: logger.child({ component: "licenses" }),
  });

  const sweeps = new LicenseExpirySweeps({
    transactions,
    licenses: licenseRepository,
    attachments: attachmentRepository,
    linker: attachments,
    kyc,
    outbox,
    outboxRecords: outboxRepository,
    warningDays: config.scheduler.expiryWarningDays,
    purgeAfterDays: config.scheduler.expiredPurgeDays,
    purgeEnabled: config.scheduler.purgeEnabled,
    logger: logger.child({ component: "license-scheduler" }),
  });
  const scheduler = new LicenseScheduler(sweeps, {
    intervalMs: config.scheduler.intervalMs,
    logger: logger.child({ component: "license-scheduler" }),
  });

  const provider =
    overrides.paymentProvider ??
    new StripePaymentProvider({
      secretKey: config.stripe.secretKey,
      webhookSecret: config.stripe.webhookSecret,
    });
  const payments = new PaymentEventReconciler({
    transactions,
    subscriptions: new DrizzleSubscriptionRepository(db),
    stores: storeRepository,
    provider,
    logger: logger.child({ component: "payment-reconciler" }),
  });
  const redis = overrides.redis ?? (await getRedisClient());
  const paymentGuard = new IdempotencyGuard(redis, {
    scope: config.idempotency.paymentScope,
    ttlSeconds: config.idempotency.ttlSeconds,
    keyPrefix: config.idempotency.keyPrefix,
    logger: logger.child({ component: "idempotency", scope: config.idempotency.paymentScope }),
  });
  const paymentWebhook = createPaymentWebhookHandler({
    provider,
    guard: paymentGuard,
    reconciler: payments,
    logger: logger.child({ component: "payment-webhook" }),
  });

  return {
    config,
    logger,
    kyc,
    licenses,
    sweeps,
    scheduler,
    payments,
    paymentGuard,
    paymentWebhook,
  };
}

let containerPromise: Promise<IContainer> | null = null;

/**
 * Process-wide container built on first use.
 */
export function getContainer(): Promise<IContainer> {
  if (!containerPromise) {
    containerPromise = createContainer().catch((error: unknown) => {
      containerPromise = null;
      throw error;
    });
  }
  return containerPromise;
}

export function resetContainer(): void {
  containerPromise = null;
}
