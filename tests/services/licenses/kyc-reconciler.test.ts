import { describe, it, expect, beforeEach } from "vitest";
import {
  KycReconciler,
  deriveStoreKycStatus,
} from "../../../app/services/licenses/kyc-reconciler.server";
import { AppError, ErrorCode, ErrorKind } from "../../../app/utils/errors";
import type { LicenseStatusType } from "../../../app/types/enums";
import { createInMemoryRepositories, type InMemoryRepositories } from "../../mocks";

const STORE_ID = "11111111-1111-4111-8111-111111111111";

describe("deriveStoreKycStatus", () => {
  const cases: Array<[LicenseStatusType[], string]> = [
    [[], "pending_verification"],
    [["pending"], "pending_verification"],
    [["pending", "pending"], "pending_verification"],
    [["verified"], "verified"],
    [["verified", "rejected"], "verified"],
    [["expired", "verified"], "verified"],
    [["expired"], "expired"],
    [["expired", "pending"], "expired"],
    [["expired", "rejected"], "rejected"],
    [["rejected", "pending"], "rejected"],
    [["rejected"], "rejected"],
  ];

  it.each(cases)("derives %j as %s", (statuses, expected) => {
    expect(deriveStoreKycStatus(statuses)).toBe(expected);
  });

  it("does not depend on the order of the statuses", () => {
    expect(deriveStoreKycStatus(["rejected", "expired"])).toBe("rejected");
    expect(deriveStoreKycStatus(["pending", "rejected", "verified"])).toBe("verified");
  });
});

describe("KycReconciler", () => {
  let repos: InMemoryRepositories;
  let reconciler: KycReconciler<{ readonly id: number }>;

  beforeEach(() => {
    repos = createInMemoryRepositories();
    repos.db.addStore({ id: STORE_ID });
    reconciler = new KycReconciler({ licenses: repos.licenses, stores: repos.stores });
  });

  it("writes the derived status when it differs from the stored one", async () => {
    repos.db.addLicense({ id: "license-a", storeId: STORE_ID, status: "verified" });

    const result = await reconciler.reconcile({ id: 1 }, STORE_ID);

    expect(result).toEqual({ previous: "pending_verification", next: "verified", changed: true });
    expect(repos.db.store(STORE_ID)?.kycStatus).toBe("verified");
    expect(repos.db.writeCount("stores.updateKycStatus")).toBe(1);
  });

  it("skips the write when the status is already current", async () => {
    repos.db.addLicense({ id: "license-a", storeId: STORE_ID, status: "verified" });
    await reconciler.reconcile({ id: 1 }, STORE_ID);

    const second = await reconciler.reconcile({ id: 2 }, STORE_ID);

    expect(second).toEqual({ previous: "verified", next: "verified", changed: false });
    expect(repos.db.writeCount("stores.updateKycStatus")).toBe(1);
  });

  it("moves a store back to pending verification once no licenses remain", async () => {
    repos.db.addStore({ id: STORE_ID, kycStatus: "rejected" });

    const result = await reconciler.reconcile({ id: 1 }, STORE_ID);

    expect(result.next).toBe("pending_verification");
    expect(repos.db.store(STORE_ID)?.kycStatus).toBe("pending_verification");
  });

  it("reports a missing store as not found", async () => {
    const error = await reconciler.reconcile({ id: 1 }, "missing-store").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: ErrorCode.NOT_FOUND_STORE, kind: ErrorKind.NOT_FOUND });
  });

  it("wraps repository failures as dependency errors", async () => {
    repos.db.failOn("licenses.read");

    const error = await reconciler.reconcile({ id: 1 }, STORE_ID).catch((e: unknown) => e);

    expect(error).toMatchObject({
      kind: ErrorKind.DEPENDENCY,
      message: "list license statuses",
      isRetryable: true,
    });
  });
});
