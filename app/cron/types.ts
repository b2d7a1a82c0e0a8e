/**
 * Cron Service Type Definitions
 *
 * Types for the license expiry sweeps and the scheduler loop that runs them.
 */

import type { AppError } from "../utils/errors";

// =============================================================================
// Sweep Results
// =============================================================================

export type SweepName = "warn" | "expire" | "purge";

/**
 * Outcome of one pass over a sweep's candidate set. A sweep stops at the
 * first failing license, so `processed` can be lower than `candidates`.
 */
export interface SweepResult {
  sweep: SweepName;
  candidates: number;
  processed: number;
  skipped: number;
  error?: AppError;
}

/**
 * Combined result of one scheduler tick
 */
export interface LicenseSweepSummary {
  warn: SweepResult;
  expire: SweepResult;
  purge: SweepResult;
  errors: AppError[];
  durationMs: number;
}

// =============================================================================
// Logger Types
// =============================================================================

/**
 * Cron logger interface (subset of Logger)
 */
export interface CronLogger {
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void;
  debug(message: string, metadata?: Record<string, unknown>): void;
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSweepFailed(result: SweepResult): result is SweepResult & { error: AppError } {
  return result.error !== undefined;
}

export function hasSweepErrors(summary: LicenseSweepSummary): boolean {
  return summary.errors.length > 0;
}
