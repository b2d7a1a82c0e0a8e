import { describe, it, expect, beforeEach } from "vitest";
import {
  IdempotencyGuard,
  idempotencyKey,
  normalizeEventId,
  type IdempotencyStore,
} from "../../../app/services/idempotency/idempotency-guard.server";
import { AppError, ErrorCode } from "../../../app/utils/errors";
import { InMemoryFallback } from "../../../app/utils/redis-client.server";
import { createMockLogger } from "../../mocks";

describe("idempotencyKey", () => {
  it("namespaces the event id by prefix and scope", () => {
    expect(idempotencyKey("stripe", "evt_1")).toBe("pf:idempotency:stripe:evt_1");
    expect(idempotencyKey("stripe", "evt_1", "custom")).toBe("custom:stripe:evt_1");
  });
});

describe("normalizeEventId", () => {
  it("trims surrounding whitespace", () => {
    expect(normalizeEventId("  evt_123  ")).toBe("evt_123");
  });

  it("rejects empty identifiers", () => {
    expect(() => normalizeEventId("   ")).toThrow("event id is required");
  });

  it.each(["evt 123", "-leading-dash", "evt/slash", "x".repeat(256)])("rejects %s", (value) => {
    expect(() => normalizeEventId(value)).toThrow("event id is malformed");
  });
});

describe("IdempotencyGuard", () => {
  let clock: number;
  let store: InMemoryFallback;
  let guard: IdempotencyGuard;

  beforeEach(() => {
    clock = Date.UTC(2024, 5, 1);
    store = new InMemoryFallback(100, () => clock);
    guard = new IdempotencyGuard(store, { scope: "stripe", ttlSeconds: 60, logger: createMockLogger() });
  });

  it("reports the first delivery as new and the second as a duplicate", async () => {
    expect(await guard.checkAndMark("evt_1")).toBe(false);
    expect(await guard.checkAndMark("evt_1")).toBe(true);
    expect(await guard.checkAndMark("evt_2")).toBe(false);
  });

  it("writes the key with the configured ttl", async () => {
    await guard.checkAndMark("evt_1");

    expect(await store.ttl("pf:idempotency:stripe:evt_1")).toBe(60);
  });

  it("treats a delivery after the ttl window as new", async () => {
    await guard.checkAndMark("evt_1");
    clock += 60_000;

    expect(await guard.checkAndMark("evt_1")).toBe(false);
  });

  it("lets a released event be processed again", async () => {
    await guard.checkAndMark("evt_1");
    await guard.delete("evt_1");

    expect(await guard.checkAndMark("evt_1")).toBe(false);
  });

  it("never writes a key for a malformed id", async () => {
    await expect(guard.checkAndMark("bad id")).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_INVALID_FORMAT,
    });
    expect(await store.ttl("pf:idempotency:stripe:bad id")).toBe(-2);
  });

  it("reports store failures as cache dependency errors", async () => {
    const failing: IdempotencyStore = {
      setNX: async () => {
        throw new Error("connection reset");
      },
      del: async () => {
        throw new Error("connection reset");
      },
    };
    const broken = new IdempotencyGuard(failing, { scope: "stripe", ttlSeconds: 60 });

    const markError = await broken.checkAndMark("evt_1").catch((e: unknown) => e);
    const deleteError = await broken.delete("evt_1").catch((e: unknown) => e);

    expect(markError).toBeInstanceOf(AppError);
    expect(markError).toMatchObject({ code: ErrorCode.DEPENDENCY_CACHE, message: "mark idempotency key" });
    expect(deleteError).toMatchObject({ code: ErrorCode.DEPENDENCY_CACHE, message: "delete idempotency key" });
  });

  it("refuses a blank scope or a non-positive ttl", () => {
    expect(() => new IdempotencyGuard(store, { scope: " ", ttlSeconds: 60 })).toThrow(
      "idempotency scope is required"
    );
    expect(() => new IdempotencyGuard(store, { scope: "stripe", ttlSeconds: 0 })).toThrow(
      "idempotency ttl must be positive"
    );
  });
});
