export * from "./config.shared";

import {
  IDEMPOTENCY_DEFAULTS,
  LICENSE_SCHEDULER_DEFAULTS,
  SIGNED_URL_DEFAULTS,
} from "./config.shared";
import { logger } from "./logger.server";

export function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value && process.env.NODE_ENV === "production") {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || "";
}

export function getEnv(key: string, defaultValue: string = ""): string {
  return process.env[key] || defaultValue;
}

export function getBoolEnv(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

export function getNumEnv(key: string, defaultValue: number, minValue?: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  if (isNaN(num)) return defaultValue;
  if (minValue !== undefined && num < minValue) {
    logger.warn(`${key}=${num} is below minimum ${minValue}, using minimum`);
    return minValue;
  }
  return num;
}

export function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

export function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

export const DATABASE_CONFIG = {
  URL: getEnv("DATABASE_URL"),
  POOL_MAX: getNumEnv("DB_POOL_MAX", 10, 1),
  IDLE_TIMEOUT_MS: getNumEnv("DB_IDLE_TIMEOUT_MS", 30_000, 1000),
} as const;

export const REDIS_CONFIG = {
  URL: getEnv("REDIS_URL"),
  CONNECT_TIMEOUT_MS: getNumEnv("REDIS_CONNECT_TIMEOUT_MS", 5000, 1000),
  MEMORY_MAX_KEYS: getNumEnv("REDIS_MEMORY_MAX_KEYS", 10_000, 100),
} as const;

export const LICENSE_SCHEDULER_CONFIG = {
  INTERVAL_MS: getNumEnv("LICENSE_SCHEDULER_INTERVAL_MS", LICENSE_SCHEDULER_DEFAULTS.INTERVAL_MS, 1000),
  EXPIRY_WARNING_DAYS: getNumEnv("LICENSE_EXPIRY_WARNING_DAYS", LICENSE_SCHEDULER_DEFAULTS.EXPIRY_WARNING_DAYS, 1),
  EXPIRED_PURGE_DAYS: getNumEnv("LICENSE_EXPIRED_PURGE_DAYS", LICENSE_SCHEDULER_DEFAULTS.EXPIRED_PURGE_DAYS, 1),
  PURGE_ENABLED: getBoolEnv("LICENSE_PURGE_ENABLED", true),
} as const;

export const IDEMPOTENCY_CONFIG = {
  TTL_SECONDS: getNumEnv("IDEMPOTENCY_TTL_SECONDS", IDEMPOTENCY_DEFAULTS.TTL_SECONDS, 60),
  KEY_PREFIX: IDEMPOTENCY_DEFAULTS.KEY_PREFIX,
  PAYMENT_SCOPE: IDEMPOTENCY_DEFAULTS.PAYMENT_SCOPE,
} as const;

export const STORAGE_CONFIG = {
  DOCUMENT_URL_BASE: getEnv("DOCUMENT_URL_BASE", "http://localhost:8080/documents"),
  SIGNING_SECRET: getRequiredEnv("DOCUMENT_URL_SIGNING_SECRET"),
  SIGNED_URL_TTL_SECONDS: getNumEnv("SIGNED_URL_TTL_SECONDS", SIGNED_URL_DEFAULTS.TTL_SECONDS, 30),
} as const;

export const STRIPE_CONFIG = {
  SECRET_KEY: getRequiredEnv("STRIPE_SECRET_KEY"),
  WEBHOOK_SECRET: getRequiredEnv("STRIPE_WEBHOOK_SECRET"),
} as const;

const REQUIRED_IN_PRODUCTION = [
  "DATABASE_URL",
  "REDIS_URL",
  "DOCUMENT_URL_SIGNING_SECRET",
  "STRIPE_SECRET_KEY",
  "STRIPE_WEBHOOK_SECRET",
] as const;

const RECOMMENDED = [
  { key: "DOCUMENT_URL_BASE", reason: "signed license document links point at localhost" },
  { key: "LOG_LEVEL", reason: "defaults to info in production and debug elsewhere" },
] as const;

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateConfig(): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const production = isProduction();
  for (const key of REQUIRED_IN_PRODUCTION) {
    if (!process.env[key]) {
      if (production) {
        errors.push(`Missing required environment variable: ${key}`);
      } else {
        warnings.push(`${key} not set (required in production)`);
      }
    }
  }
  for (const { key, reason } of RECOMMENDED) {
    if (!process.env[key]) {
      warnings.push(`${key} not set - ${reason}`);
    }
  }
  if (LICENSE_SCHEDULER_CONFIG.EXPIRED_PURGE_DAYS <= LICENSE_SCHEDULER_CONFIG.EXPIRY_WARNING_DAYS) {
    warnings.push("LICENSE_EXPIRED_PURGE_DAYS is not greater than LICENSE_EXPIRY_WARNING_DAYS");
  }
  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

export function validateConfigOrThrow(): void {
  const result = validateConfig();
  for (const warning of result.warnings) {
    logger.warn(`[CONFIG] ${warning}`);
  }
  if (!result.valid) {
    for (const error of result.errors) {
      logger.error(`[CONFIG] ${error}`);
    }
    throw new Error(`Configuration invalid: ${result.errors.join("; ")}`);
  }
  logger.info("[CONFIG] Configuration validated", {
    schedulerIntervalMs: LICENSE_SCHEDULER_CONFIG.INTERVAL_MS,
    expiryWarningDays: LICENSE_SCHEDULER_CONFIG.EXPIRY_WARNING_DAYS,
    idempotencyTtlSeconds: IDEMPOTENCY_CONFIG.TTL_SECONDS,
  });
}
