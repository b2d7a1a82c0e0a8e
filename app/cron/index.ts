/**
 * Cron Module
 *
 * Centralized exports for the license expiry sweeps and their scheduler.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  SweepName,
  SweepResult,
  LicenseSweepSummary,
  CronLogger,
} from "./types";

export { isSweepFailed, hasSweepErrors } from "./types";

// =============================================================================
// Tasks
// =============================================================================

export { LicenseExpirySweeps, type LicenseExpirySweepsDeps } from "./tasks/license-expiry";

// =============================================================================
// Scheduler
// =============================================================================

export {
  LicenseScheduler,
  abortableSleep,
  type LicenseSchedulerOptions,
  type Sleep,
  type SweepProcessor,
} from "./license-scheduler";
