/**
 * License Domain Entity
 *
 * A compliance document owned by a store. Status moves along
 * pending -> verified | rejected, and pending | verified -> expired.
 * Rejected and expired are terminal; the only way out is deletion.
 */

import {
  LicenseStatus,
  LICENSE_TYPES,
  type LicenseDecision,
  type LicenseStatusType,
  type LicenseTypeValue,
} from "../../types/enums";

// =============================================================================
// License Entity
// =============================================================================

export interface License {
  readonly id: string;
  readonly storeId: string;
  readonly userId: string;
  readonly status: LicenseStatusType;
  readonly mediaId: string;
  readonly storageKey: string;
  readonly issuingState: string;
  readonly issueDate: Date | null;
  readonly expirationDate: Date | null;
  readonly type: LicenseTypeValue;
  readonly number: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * License row plus a time-bounded link to its document.
 */
export interface LicenseWithDocumentUrl extends License {
  readonly signedUrl: string;
}

// =============================================================================
// Transition Rules
// =============================================================================

const ALLOWED_TRANSITIONS: Record<LicenseStatusType, readonly LicenseStatusType[]> = {
  [LicenseStatus.PENDING]: [LicenseStatus.VERIFIED, LicenseStatus.REJECTED, LicenseStatus.EXPIRED],
  [LicenseStatus.VERIFIED]: [LicenseStatus.EXPIRED],
  [LicenseStatus.REJECTED]: [],
  [LicenseStatus.EXPIRED]: [],
};

export function canTransition(from: LicenseStatusType, to: LicenseStatusType): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: LicenseStatusType): boolean {
  return status === LicenseStatus.REJECTED || status === LicenseStatus.EXPIRED;
}

/**
 * Only terminal, non-compliant licenses may be removed.
 */
export function isDeletable(license: Pick<License, "status">): boolean {
  return isTerminalStatus(license.status);
}

export function isDecision(value: unknown): value is LicenseDecision {
  return value === LicenseStatus.VERIFIED || value === LicenseStatus.REJECTED;
}

export function isLicenseType(value: unknown): value is LicenseTypeValue {
  return typeof value === "string" && LICENSE_TYPES.some((t) => t === value);
}

// =============================================================================
// Date Helpers
// =============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Last millisecond of the UTC calendar day containing `date`.
 */
export function endOfUtcDay(date: Date): Date {
  return new Date(startOfUtcDay(date).getTime() + DAY_MS - 1);
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Formats as YYYY-MM-DD in UTC.
 */
export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
