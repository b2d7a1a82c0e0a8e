import { describe, it, expect, vi, beforeEach } from "vitest";
import { LicenseExpirySweeps } from "../../app/cron/tasks/license-expiry";
import { KycReconciler } from "../../app/services/licenses/kyc-reconciler.server";
import { AttachmentReconciler } from "../../app/services/media/attachment-reconciler.server";
import { OutboxEmitter } from "../../app/services/outbox/outbox-emitter.server";
import { AppError } from "../../app/utils/errors";
import {
  createInMemoryRepositories,
  createMockLogger,
  type FakeTx,
  type InMemoryRepositories,
  type MockLogger,
} from "../mocks";

const STORE_ID = "11111111-1111-4111-8111-111111111111";

describe("LicenseExpirySweeps", () => {
  let repos: InMemoryRepositories;
  let logger: MockLogger;

  function createSweeps(options: { purgeEnabled?: boolean } = {}): LicenseExpirySweeps<FakeTx> {
    return new LicenseExpirySweeps({
      transactions: repos.transactions,
      licenses: repos.licenses,
      attachments: repos.attachments,
      linker: new AttachmentReconciler({ attachments: repos.attachments, media: repos.media }),
      kyc: new KycReconciler({ licenses: repos.licenses, stores: repos.stores }),
      outbox: new OutboxEmitter({
        repository: repos.outbox,
        logger: createMockLogger(),
        now: () => repos.db.now(),
        generateId: () => "event-1",
      }),
      outboxRecords: repos.outbox,
      warningDays: 14,
      purgeAfterDays: 30,
      purgeEnabled: options.purgeEnabled,
      now: () => repos.db.now(),
      logger,
    });
  }

  beforeEach(() => {
    // clock: 2024-06-01T12:00:00Z
    repos = createInMemoryRepositories();
    logger = createMockLogger();
    repos.db.addStore({ id: STORE_ID, kycStatus: "verified" });
  });

  describe("expireLicenses", () => {
    beforeEach(() => {
      repos.db.addLicense({
        id: "due-verified",
        storeId: STORE_ID,
        status: "verified",
        expirationDate: new Date("2024-06-01T00:00:00.000Z"),
      });
      repos.db.addLicense({
        id: "due-pending",
        storeId: STORE_ID,
        status: "pending",
        expirationDate: new Date("2024-06-01T23:00:00.000Z"),
      });
      repos.db.addLicense({
        id: "due-rejected",
        storeId: STORE_ID,
        status: "rejected",
        expirationDate: new Date("2024-05-01T00:00:00.000Z"),
      });
    });

    it("expires every pending or verified license due by the end of today", async () => {
      const result = await createSweeps().expireLicenses();

      expect(result).toEqual({ sweep: "expire", candidates: 2, processed: 2, skipped: 0 });
      expect(repos.db.license("due-verified")?.status).toBe("expired");
      expect(repos.db.license("due-pending")?.status).toBe("expired");
      expect(repos.db.license("due-rejected")?.status).toBe("rejected");
      expect(repos.db.state.outbox.map((event) => event.payload.data)).toEqual([
        { licenseId: "due-verified", storeId: STORE_ID, status: "expired", reason: "expired by scheduler" },
        { licenseId: "due-pending", storeId: STORE_ID, status: "expired", reason: "expired by scheduler" },
      ]);
    });

    it("recomputes the store status from what is left", async () => {
      await createSweeps().expireLicenses();

      // expired + rejected
      expect(repos.db.store(STORE_ID)?.kycStatus).toBe("rejected");
    });

    it("keeps a store verified while another verified license is still valid", async () => {
      repos.db.addLicense({
        id: "valid-verified",
        storeId: STORE_ID,
        status: "verified",
        expirationDate: new Date("2024-06-02T00:00:00.000Z"),
      });

      await createSweeps().expireLicenses();

      expect(repos.db.license("valid-verified")?.status).toBe("verified");
      expect(repos.db.store(STORE_ID)?.kycStatus).toBe("verified");
    });

    it("finds nothing left to do on a second run", async () => {
      const sweeps = createSweeps();
      await sweeps.expireLicenses();

      const second = await sweeps.expireLicenses();

      expect(second).toEqual({ sweep: "expire", candidates: 0, processed: 0, skipped: 0 });
      expect(repos.db.state.outbox).toHaveLength(2);
    });

    it("skips a candidate that was finalized after it was listed", async () => {
      const finalized = repos.db.addLicense({
        id: "due-rejected",
        storeId: STORE_ID,
        status: "rejected",
        expirationDate: new Date("2024-05-01T00:00:00.000Z"),
      });
      vi.spyOn(repos.licenses, "findExpirationCandidates").mockResolvedValue([
        { ...finalized, status: "verified" },
      ]);

      const result = await createSweeps().expireLicenses();

      expect(result).toEqual({ sweep: "expire", candidates: 1, processed: 0, skipped: 1 });
      expect(repos.db.license("due-rejected")?.status).toBe("rejected");
      expect(repos.db.state.outbox).toEqual([]);
    });

    it("stops at the first failure and rolls that license back", async () => {
      repos.db.failOn("outbox.insert", new Error("outbox unavailable"), 1);

      const result = await createSweeps().expireLicenses();

      expect(result).toMatchObject({ sweep: "expire", candidates: 2, processed: 0, skipped: 0 });
      expect(result.error).toBeInstanceOf(AppError);
      expect(result.error?.message).toBe("expire license");
      expect(result.error?.metadata).toMatchObject({ licenseId: "due-verified", storeId: STORE_ID });
      expect(repos.db.license("due-verified")?.status).toBe("verified");
      expect(repos.db.license("due-pending")?.status).toBe("pending");
      expect(logger.warn).toHaveBeenCalledWith("License expire sweep stopped", {
        processed: 0,
        remaining: 2,
        error: "expire license",
      });
    });

    it("picks the remaining work up on the next run", async () => {
      repos.db.failOn("outbox.insert", new Error("outbox unavailable"), 1);
      const sweeps = createSweeps();
      await sweeps.expireLicenses();

      const retry = await sweeps.expireLicenses();

      expect(retry).toEqual({ sweep: "expire", candidates: 2, processed: 2, skipped: 0 });
    });
  });

  describe("warnExpiring", () => {
    beforeEach(() => {
      repos.db.addLicense({
        id: "in-window",
        storeId: STORE_ID,
        status: "verified",
        expirationDate: new Date("2024-06-15T09:00:00.000Z"),
      });
      repos.db.addLicense({
        id: "day-after",
        storeId: STORE_ID,
        status: "verified",
        expirationDate: new Date("2024-06-16T00:00:00.000Z"),
      });
      repos.db.addLicense({
        id: "already-expired",
        storeId: STORE_ID,
        status: "expired",
        expirationDate: new Date("2024-06-15T09:00:00.000Z"),
      });
      repos.db.addLicense({
        id: "rejected-in-window",
        storeId: STORE_ID,
        status: "rejected",
        expirationDate: new Date("2024-06-15T10:00:00.000Z"),
      });
      repos.db.addLicense({
        id: "pending-in-window",
        storeId: STORE_ID,
        status: "pending",
        expirationDate: new Date("2024-06-15T11:00:00.000Z"),
      });
    });

    it("warns about licenses expiring on the day the warning window ends", async () => {
      const result = await createSweeps().warnExpiring();

      expect(result).toEqual({ sweep: "warn", candidates: 1, processed: 1, skipped: 0 });
      expect(repos.db.state.outbox).toHaveLength(1);
      expect(repos.db.state.outbox[0]).toMatchObject({
        eventType: "license_status_changed",
        aggregateType: "license",
        aggregateId: "in-window",
        payload: {
          data: {
            licenseId: "in-window",
            storeId: STORE_ID,
            status: "verified",
            reason: "expires on 2024-06-15",
            warningType: "expiry_warning",
          },
        },
      });
    });

    it("only warns verified licenses", async () => {
      await createSweeps().warnExpiring();

      expect(repos.db.state.outbox.map((event) => event.aggregateId)).toEqual(["in-window"]);
    });

    it("does not warn a license twice when the sweep runs again", async () => {
      const sweeps = createSweeps();
      await sweeps.warnExpiring();

      const second = await sweeps.warnExpiring();

      expect(second).toEqual({ sweep: "warn", candidates: 1, processed: 0, skipped: 1 });
      expect(repos.db.state.outbox.map((event) => event.aggregateId)).toEqual(["in-window"]);
    });

    it("still warns a license whose only events are status changes", async () => {
      repos.db.state.outbox.push({
        id: "outbox-earlier",
        eventType: "license_status_changed",
        aggregateType: "license",
        aggregateId: "in-window",
        payload: { data: { licenseId: "in-window", storeId: STORE_ID, status: "verified" } },
        createdAt: new Date("2024-05-01T00:00:00.000Z"),
      });

      const result = await createSweeps().warnExpiring();

      expect(result.processed).toBe(1);
      expect(repos.db.state.outbox).toHaveLength(2);
    });

    it("leaves license and store state unchanged", async () => {
      await createSweeps().warnExpiring();

      expect(repos.db.license("in-window")?.status).toBe("verified");
      expect(repos.db.writeCount("licenses.updateStatus")).toBe(0);
      expect(repos.db.writeCount("stores.updateKycStatus")).toBe(0);
    });
  });

  describe("purgeExpired", () => {
    beforeEach(() => {
      repos.db.addStore({ id: STORE_ID, kycStatus: "expired" });
      repos.db.addMedia({ id: "old-doc", storeId: STORE_ID });
      repos.db.addLicense({
        id: "long-expired",
        storeId: STORE_ID,
        status: "expired",
        mediaId: "old-doc",
        updatedAt: new Date("2024-04-01T00:00:00.000Z"),
      });
      repos.db.state.attachments.push({
        mediaId: "old-doc",
        entityType: "license",
        entityId: "long-expired",
        storeId: STORE_ID,
        storageKey: "docs/old.pdf",
      });
      repos.db.addLicense({
        id: "recently-expired",
        storeId: STORE_ID,
        status: "expired",
        updatedAt: new Date("2024-05-20T00:00:00.000Z"),
      });
      repos.db.addLicense({ id: "fresh", storeId: STORE_ID, status: "pending" });
    });

    it("deletes licenses expired longer than the retention window", async () => {
      const result = await createSweeps().purgeExpired();

      expect(result).toEqual({ sweep: "purge", candidates: 1, processed: 1, skipped: 0 });
      expect(repos.db.license("long-expired")).toBeUndefined();
      expect(repos.db.license("recently-expired")?.status).toBe("expired");
      expect(repos.db.state.attachments).toEqual([]);
      expect(repos.db.state.outbox).toEqual([]);
    });

    it("keeps the store status in line with the remaining licenses", async () => {
      repos.db.state.licenses.delete("recently-expired");

      await createSweeps().purgeExpired();

      expect(repos.db.store(STORE_ID)?.kycStatus).toBe("pending_verification");
    });

    it("does nothing when purging is disabled", async () => {
      const result = await createSweeps({ purgeEnabled: false }).purgeExpired();

      expect(result).toEqual({ sweep: "purge", candidates: 0, processed: 0, skipped: 0 });
      expect(repos.db.license("long-expired")).toBeDefined();
    });
  });

  describe("process", () => {
    it("runs every sweep and collects their failures", async () => {
      repos.db.failOn("licenses.read");

      const summary = await createSweeps().process();

      expect(summary.errors.map((error) => error.message)).toEqual([
        "list expiring licenses",
        "list expiration candidates",
        "list purgeable licenses",
      ]);
      expect(summary.warn.error?.isRetryable).toBe(true);
    });

    it("reports no errors on a clean run", async () => {
      const summary = await createSweeps().process();

      expect(summary.errors).toEqual([]);
      expect(summary.expire).toEqual({ sweep: "expire", candidates: 0, processed: 0, skipped: 0 });
    });
  });
});
