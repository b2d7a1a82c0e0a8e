export {
  InMemoryDatabase,
  InMemoryTransactionRunner,
  InMemoryLicenseRepository,
  InMemoryStoreRepository,
  InMemoryMembershipRepository,
  InMemoryMediaRepository,
  InMemoryAttachmentRepository,
  InMemoryOutboxRepository,
  InMemorySubscriptionRepository,
  createInMemoryRepositories,
  type FakeTx,
  type InMemoryState,
  type InMemoryRepositories,
} from "./in-memory-store";

export { createMockLogger, type MockLogger } from "./logger.mock";
