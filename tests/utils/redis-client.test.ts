import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { IdempotencyGuard } from "../../app/services/idempotency/idempotency-guard.server";
import { AppError, ErrorCode } from "../../app/utils/errors";
import { InMemoryFallback } from "../../app/utils/redis-client.server";
import { createMockLogger } from "../mocks";

describe("InMemoryFallback", () => {
  let clock: number;
  let store: InMemoryFallback;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    clock = Date.UTC(2024, 5, 1);
    store = new InMemoryFallback(2, () => clock);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses new keys instead of evicting live ones", async () => {
    await store.setNX("a", "1", 60_000);
    await store.setNX("b", "1", 60_000);

    await expect(store.setNX("c", "1", 60_000)).rejects.toThrow("in-memory store is full (2 live keys)");
    expect(await store.setNX("a", "1", 60_000)).toBe(false);
    expect(await store.ttl("b")).toBe(60);
  });

  it("makes room by dropping expired keys", async () => {
    await store.setNX("a", "1", 1_000);
    await store.setNX("b", "1", 60_000);
    clock += 1_000;

    expect(await store.setNX("c", "1", 60_000)).toBe(true);
    expect(await store.ttl("a")).toBe(-2);
    expect(await store.ttl("b")).toBe(59);
  });

  it("surfaces a full store to the guard as a cache dependency failure", async () => {
    const guard = new IdempotencyGuard(store, { scope: "stripe", ttlSeconds: 60, logger: createMockLogger() });
    await guard.checkAndMark("evt_1");
    await guard.checkAndMark("evt_2");

    const error = await guard.checkAndMark("evt_3").then(
      () => undefined,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: ErrorCode.DEPENDENCY_CACHE, message: "mark idempotency key" });
    expect(await guard.checkAndMark("evt_1")).toBe(true);
  });
});
