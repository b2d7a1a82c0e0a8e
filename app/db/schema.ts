import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  jsonb,
  integer,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import {
  KYC_STATUSES,
  LICENSE_STATUSES,
  LICENSE_TYPES,
  MEDIA_KINDS,
  MEDIA_STATUSES,
  MEMBER_ROLES,
  OUTBOX_AGGREGATE_TYPES,
  OUTBOX_EVENT_TYPES,
  SUBSCRIPTION_STATUSES,
} from "../types/enums";

// ===========================================
// STORES: vendor storefronts and their derived compliance view
// ===========================================
export const stores = pgTable("stores", {
  id: uuid("id").primaryKey().defaultRandom(),
  companyName: text("company_name").notNull(),
  kycStatus: text("kyc_status", { enum: KYC_STATUSES }).notNull().default("pending_verification"),
  subscriptionActive: boolean("subscription_active").notNull().default(false),
  createdAt: timestamp("created_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
});

export const storeMemberships = pgTable("store_memberships", {
  id: uuid("id").primaryKey().defaultRandom(),
  storeId: uuid("store_id").notNull().references(() => stores.id, { onDelete: "cascade" }),
  userId: uuid("user_id").notNull(),
  role: text("role", { enum: MEMBER_ROLES }).notNull(),
  createdAt: timestamp("created_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  storeUserIdx: uniqueIndex("store_memberships_store_user_idx").on(t.storeId, t.userId),
}));

// ===========================================
// MEDIA: uploaded documents and their attachment links
// ===========================================
export const media = pgTable("media", {
  id: uuid("id").primaryKey().defaultRandom(),
  storeId: uuid("store_id").notNull().references(() => stores.id, { onDelete: "cascade" }),
  userId: uuid("user_id").notNull(),
  kind: text("kind", { enum: MEDIA_KINDS }).notNull(),
  status: text("status", { enum: MEDIA_STATUSES }).notNull().default("pending"),
  fileName: text("file_name").notNull(),
  mimeType: text("mime_type").notNull(),
  storageKey: text("storage_key").notNull(),
  sizeBytes: integer("size_bytes").notNull().default(0),
  createdAt: timestamp("created_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
});

export const mediaAttachments = pgTable("media_attachments", {
  id: uuid("id").primaryKey().defaultRandom(),
  mediaId: uuid("media_id").notNull().references(() => media.id, { onDelete: "cascade" }),
  entityType: text("entity_type").notNull(),
  entityId: uuid("entity_id").notNull(),
  storeId: uuid("store_id").notNull(),
  storageKey: text("storage_key").notNull(),
  createdAt: timestamp("created_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  entityMediaIdx: uniqueIndex("media_attachments_entity_media_idx").on(t.entityType, t.entityId, t.mediaId),
}));

// ===========================================
// LICENSES: compliance documents per store
// ===========================================
export const licenses = pgTable("licenses", {
  id: uuid("id").primaryKey().defaultRandom(),
  storeId: uuid("store_id").notNull().references(() => stores.id, { onDelete: "cascade" }),
  userId: uuid("user_id").notNull(),
  status: text("status", { enum: LICENSE_STATUSES }).notNull().default("pending"),
  mediaId: uuid("media_id").notNull().references(() => media.id),
  storageKey: text("storage_key").notNull().default(""),
  issuingState: text("issuing_state").notNull(),
  issueDate: timestamp("issue_date", { mode: "date", withTimezone: true }),
  expirationDate: timestamp("expiration_date", { mode: "date", withTimezone: true }),
  type: text("type", { enum: LICENSE_TYPES }).notNull(),
  number: text("number").notNull(),
  createdAt: timestamp("created_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  storeCreatedIdx: index("licenses_store_created_idx").on(t.storeId, t.createdAt, t.id),
  expirationIdx: index("licenses_expiration_idx").on(t.expirationDate),
}));

// ===========================================
// OUTBOX: append-only domain events written alongside state changes
// ===========================================
export const outboxEvents = pgTable("outbox_events", {
  id: uuid("id").primaryKey().defaultRandom(),
  eventType: text("event_type", { enum: OUTBOX_EVENT_TYPES }).notNull(),
  aggregateType: text("aggregate_type", { enum: OUTBOX_AGGREGATE_TYPES }).notNull(),
  aggregateId: uuid("aggregate_id").notNull(),
  payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
  attemptCount: integer("attempt_count").notNull().default(0),
  lastError: text("last_error"),
  publishedAt: timestamp("published_at", { mode: "date", withTimezone: true }),
  createdAt: timestamp("created_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  unpublishedIdx: index("outbox_events_unpublished_idx").on(t.publishedAt, t.createdAt),
  aggregateIdx: index("outbox_events_aggregate_idx").on(t.aggregateType, t.aggregateId),
}));

// ===========================================
// SUBSCRIPTIONS: local mirror of payment provider subscriptions
// ===========================================
export const subscriptions = pgTable("subscriptions", {
  id: uuid("id").primaryKey().defaultRandom(),
  storeId: uuid("store_id").notNull().references(() => stores.id, { onDelete: "cascade" }),
  externalSubscriptionId: text("external_subscription_id").notNull(),
  status: text("status", { enum: SUBSCRIPTION_STATUSES }).notNull(),
  priceId: text("price_id"),
  customerId: text("customer_id"),
  paymentMethodId: text("payment_method_id"),
  currentPeriodStart: timestamp("current_period_start", { mode: "date", withTimezone: true }),
  currentPeriodEnd: timestamp("current_period_end", { mode: "date", withTimezone: true }),
  cancelAtPeriodEnd: boolean("cancel_at_period_end").notNull().default(false),
  canceledAt: timestamp("canceled_at", { mode: "date", withTimezone: true }),
  metadata: jsonb("metadata").$type<Record<string, string>>().notNull().default({}),
  createdAt: timestamp("created_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { mode: "date", withTimezone: true }).notNull().defaultNow(),
}, (t) => ({
  externalIdx: uniqueIndex("subscriptions_external_idx").on(t.externalSubscriptionId),
  storeExternalIdx: uniqueIndex("subscriptions_store_external_idx").on(t.storeId, t.externalSubscriptionId),
}));
