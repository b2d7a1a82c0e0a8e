/**
 * Centralized Enum Definitions
 *
 * Status enums and constant values shared by the license, compliance and
 * billing modules. Const objects with `as const` keep the runtime values and
 * the literal types in one place; the tuple forms feed drizzle column enums
 * and zod schemas.
 */

// =============================================================================
// License Enums
// =============================================================================

export const LicenseStatus = {
  PENDING: "pending",
  VERIFIED: "verified",
  REJECTED: "rejected",
  EXPIRED: "expired",
} as const;

export type LicenseStatusType = typeof LicenseStatus[keyof typeof LicenseStatus];

export const LICENSE_STATUSES = ["pending", "verified", "rejected", "expired"] as const satisfies readonly LicenseStatusType[];

export const LicenseType = {
  PRODUCER: "producer",
  GROWER: "grower",
  DISPENSARY: "dispensary",
  MERCHANT: "merchant",
} as const;

export type LicenseTypeValue = typeof LicenseType[keyof typeof LicenseType];

export const LICENSE_TYPES = ["producer", "grower", "dispensary", "merchant"] as const satisfies readonly LicenseTypeValue[];

/**
 * Decisions accepted by license verification.
 */
export type LicenseDecision = typeof LicenseStatus.VERIFIED | typeof LicenseStatus.REJECTED;

// =============================================================================
// Store Enums
// =============================================================================

export const KYCStatus = {
  PENDING_VERIFICATION: "pending_verification",
  VERIFIED: "verified",
  REJECTED: "rejected",
  EXPIRED: "expired",
} as const;

export type KYCStatusType = typeof KYCStatus[keyof typeof KYCStatus];

export const KYC_STATUSES = ["pending_verification", "verified", "rejected", "expired"] as const satisfies readonly KYCStatusType[];

export const MemberRole = {
  OWNER: "owner",
  ADMIN: "admin",
  MANAGER: "manager",
  VIEWER: "viewer",
  AGENT: "agent",
  STAFF: "staff",
  OPS: "ops",
} as const;

export type MemberRoleType = typeof MemberRole[keyof typeof MemberRole];

export const MEMBER_ROLES = ["owner", "admin", "manager", "viewer", "agent", "staff", "ops"] as const satisfies readonly MemberRoleType[];

// =============================================================================
// Media Enums
// =============================================================================

export const MediaKind = {
  PRODUCT: "product",
  ADS: "ads",
  PDF: "pdf",
  LICENSE_DOC: "license_doc",
  OTHER: "other",
} as const;

export type MediaKindType = typeof MediaKind[keyof typeof MediaKind];

export const MEDIA_KINDS = ["product", "ads", "pdf", "license_doc", "other"] as const satisfies readonly MediaKindType[];

export const MediaStatus = {
  PENDING: "pending",
  UPLOADED: "uploaded",
  PROCESSING: "processing",
  READY: "ready",
  FAILED: "failed",
  DELETE_REQUESTED: "delete_requested",
  DELETED: "deleted",
  DELETE_FAILED: "delete_failed",
} as const;

export type MediaStatusType = typeof MediaStatus[keyof typeof MediaStatus];

export const MEDIA_STATUSES = [
  "pending",
  "uploaded",
  "processing",
  "ready",
  "failed",
  "delete_requested",
  "deleted",
  "delete_failed",
] as const satisfies readonly MediaStatusType[];

// =============================================================================
// Billing Enums
// =============================================================================

export const SubscriptionStatus = {
  TRIALING: "trialing",
  ACTIVE: "active",
  PAST_DUE: "past_due",
  CANCELED: "canceled",
  INCOMPLETE: "incomplete",
  INCOMPLETE_EXPIRED: "incomplete_expired",
  UNPAID: "unpaid",
  PAUSED: "paused",
} as const;

export type SubscriptionStatusType = typeof SubscriptionStatus[keyof typeof SubscriptionStatus];

export const SUBSCRIPTION_STATUSES = [
  "trialing",
  "active",
  "past_due",
  "canceled",
  "incomplete",
  "incomplete_expired",
  "unpaid",
  "paused",
] as const satisfies readonly SubscriptionStatusType[];

// =============================================================================
// Outbox Enums
// =============================================================================

export const OutboxEventType = {
  LICENSE_STATUS_CHANGED: "license_status_changed",
} as const;

export type OutboxEventTypeValue = typeof OutboxEventType[keyof typeof OutboxEventType];

export const OUTBOX_EVENT_TYPES = ["license_status_changed"] as const satisfies readonly OutboxEventTypeValue[];

export const OutboxAggregateType = {
  LICENSE: "license",
  STORE: "store",
  SUBSCRIPTION: "subscription",
} as const;

export type OutboxAggregateTypeValue = typeof OutboxAggregateType[keyof typeof OutboxAggregateType];

export const OUTBOX_AGGREGATE_TYPES = ["license", "store", "subscription"] as const satisfies readonly OutboxAggregateTypeValue[];

export const AttachmentEntityType = {
  LICENSE: "license",
} as const;

export type AttachmentEntityTypeValue = typeof AttachmentEntityType[keyof typeof AttachmentEntityType];
