/**
 * Drizzle Infrastructure Layer
 *
 * PostgreSQL implementations of the domain repository interfaces. Each
 * repository takes the optional transaction handle produced by
 * DrizzleTransactionRunner.
 */

export { DrizzleLicenseRepository } from "./license.repository.server";
export { DrizzleStoreRepository, DrizzleMembershipRepository } from "./store.repository.server";
export { DrizzleMediaRepository, DrizzleAttachmentRepository } from "./media.repository.server";
export { DrizzleOutboxRepository } from "./outbox.repository.server";
export { DrizzleSubscriptionRepository } from "./subscription.repository.server";
