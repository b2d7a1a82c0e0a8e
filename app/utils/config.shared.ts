import { MemberRole, type MemberRoleType } from "../types/enums";

const DAY_MS = 24 * 60 * 60 * 1000;

export const LICENSE_SCHEDULER_DEFAULTS = {
  INTERVAL_MS: DAY_MS,
  EXPIRY_WARNING_DAYS: 14,
  EXPIRED_PURGE_DAYS: 30,
  WARNING_TYPE: "expiry_warning",
  EXPIRED_REASON: "expired by scheduler",
} as const;

export const LICENSE_ROLE_SETS: {
  readonly CREATE: readonly MemberRoleType[];
  readonly DELETE: readonly MemberRoleType[];
} = {
  CREATE: [MemberRole.OWNER, MemberRole.ADMIN, MemberRole.MANAGER, MemberRole.STAFF, MemberRole.OPS],
  DELETE: [MemberRole.OWNER, MemberRole.MANAGER],
};

export const LICENSE_MEDIA_RULES = {
  READY_STATUSES: ["uploaded", "ready"],
  PDF_MIME_TYPE: "application/pdf",
  IMAGE_MIME_PREFIX: "image/",
} as const;

export const PAGINATION_CONFIG = {
  DEFAULT_LIMIT: 25,
  MAX_LIMIT: 100,
} as const;

export const IDEMPOTENCY_DEFAULTS = {
  KEY_PREFIX: "pf:idempotency",
  TTL_SECONDS: 7 * 24 * 60 * 60,
  PAYMENT_SCOPE: "stripe",
  EVENT_ID_PATTERN: /^[A-Za-z0-9][A-Za-z0-9_:.-]{0,254}$/,
} as const;

export const OUTBOX_CONFIG = {
  PAYLOAD_VERSION: 1,
} as const;

export const SIGNED_URL_DEFAULTS = {
  TTL_SECONDS: 15 * 60,
} as const;
