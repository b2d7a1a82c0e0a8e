/**
 * Container Types
 *
 * Type definitions for the dependency injection container.
 */

import type { LicenseScheduler } from "../cron/license-scheduler";
import type { LicenseExpirySweeps } from "../cron/tasks/license-expiry";
import type { Database, DbTransaction } from "../db.server";
import type { PaymentEventReconciler } from "../services/billing/payment-event-reconciler.server";
import type { PaymentProviderClient } from "../services/billing/payment-provider.server";
import type { IdempotencyGuard } from "../services/idempotency/idempotency-guard.server";
import type { KycReconciler } from "../services/licenses/kyc-reconciler.server";
import type { LicenseService } from "../services/licenses/license.server";
import type { DocumentUrlSigner } from "../services/storage/document-url-signer.server";
import type { Logger } from "../utils/logger.server";
import type { RedisClientWrapper } from "../utils/redis-client.server";
import type { WebhookHandler } from "../webhooks/types";

// =============================================================================
// Config Interface
// =============================================================================

export interface IEnvConfig {
  nodeEnv: "development" | "production" | "test";
  isProduction: boolean;
  isDevelopment: boolean;
}

export interface ISchedulerConfig {
  intervalMs: number;
  expiryWarningDays: number;
  expiredPurgeDays: number;
  purgeEnabled: boolean;
}

export interface IIdempotencyConfig {
  ttlSeconds: number;
  keyPrefix: string;
  paymentScope: string;
}

export interface IStorageConfig {
  documentUrlBase: string;
  signingSecret: string;
  signedUrlTtlSeconds: number;
}

export interface IStripeConfig {
  secretKey: string;
  webhookSecret: string;
}

export interface IAppConfig {
  env: IEnvConfig;
  scheduler: ISchedulerConfig;
  idempotency: IIdempotencyConfig;
  storage: IStorageConfig;
  stripe: IStripeConfig;
}

// =============================================================================
// Container Interface
// =============================================================================

/**
 * Infrastructure handed to the container. Anything omitted falls back to
 * the process-wide pool, Redis client or Stripe SDK.
 */
export interface ContainerOverrides {
  db?: Database;
  redis?: RedisClientWrapper;
  paymentProvider?: PaymentProviderClient;
  signer?: DocumentUrlSigner;
  config?: IAppConfig;
  logger?: Logger;
}

export interface IContainer {
  config: IAppConfig;
  logger: Logger;
  kyc: KycReconciler<DbTransaction>;
  licenses: LicenseService<DbTransaction>;
  sweeps: LicenseExpirySweeps<DbTransaction>;
  scheduler: LicenseScheduler;
  payments: PaymentEventReconciler<DbTransaction>;
  paymentGuard: IdempotencyGuard;
  paymentWebhook: WebhookHandler;
}
