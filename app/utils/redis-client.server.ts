import { createClient } from "redis";
import { logger } from "./logger.server";
import { REDIS_CONFIG } from "./config.server";

export interface RedisClientWrapper {
  setNX(key: string, value: string, ttlMs: number): Promise<boolean>;
  del(key: string): Promise<number>;
  /** Seconds left, -1 without expiry, -2 when the key does not exist. */
  ttl(key: string): Promise<number>;
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

type RedisConnection = ReturnType<typeof createClient>;

/**
 * Process-local stand-in used when no REDIS_URL is configured and in tests.
 * `now` is injectable so expiry can be exercised without sleeping. Only
 * expired keys are ever dropped; a store full of live keys refuses new ones.
 */
export class InMemoryFallback implements RedisClientWrapper {
  private stringStore = new Map<string, MemoryEntry>();
  private maxSize: number;
  private now: () => number;
  constructor(maxSize = 10000, now: () => number = Date.now) {
    this.maxSize = maxSize;
    this.now = now;
  }
  private isExpired(expiresAt: number): boolean {
    return expiresAt <= this.now();
  }
  private removeExpired(): void {
    for (const [key, entry] of this.stringStore.entries()) {
      if (this.isExpired(entry.expiresAt)) {
        this.stringStore.delete(key);
      }
    }
  }
  async setNX(key: string, value: string, ttlMs: number): Promise<boolean> {
    const entry = this.stringStore.get(key);
    if (entry && !this.isExpired(entry.expiresAt)) {
      return false;
    }
    if (this.stringStore.size >= this.maxSize) {
      this.removeExpired();
      if (this.stringStore.size >= this.maxSize) {
        logger.error("[REDIS] In-memory store is full of live keys", undefined, {
          maxSize: this.maxSize,
        });
        throw new Error(`in-memory store is full (${this.maxSize} live keys)`);
      }
    }
    this.stringStore.set(key, {
      value,
      expiresAt: this.now() + ttlMs,
    });
    return true;
  }
  async del(key: string): Promise<number> {
    return this.stringStore.delete(key) ? 1 : 0;
  }
  async ttl(key: string): Promise<number> {
    const entry = this.stringStore.get(key);
    if (!entry || this.isExpired(entry.expiresAt)) {
      return -2;
    }
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }
}

class RedisClientFactory {
  private static instance: RedisClientFactory | null = null;
  private client: RedisClientWrapper | null = null;
  private rawClient: RedisConnection | null = null;
  private initPromise: Promise<RedisClientWrapper> | null = null;
  private constructor() {}
  static getInstance(): RedisClientFactory {
    if (!RedisClientFactory.instance) {
      RedisClientFactory.instance = new RedisClientFactory();
    }
    return RedisClientFactory.instance;
  }
  async getClient(): Promise<RedisClientWrapper> {
    if (this.client) {
      return this.client;
    }
    if (this.initPromise) {
      return this.initPromise;
    }
    this.initPromise = this.initialize();
    return this.initPromise;
  }
  private async initialize(): Promise<RedisClientWrapper> {
    const redisUrl = REDIS_CONFIG.URL;
    if (!redisUrl) {
      if (process.env.NODE_ENV === "production") {
        throw new Error("REDIS_URL is required in production (idempotency keys need shared storage)");
      }
      logger.info("[REDIS] No REDIS_URL configured, using in-memory store");
      this.client = new InMemoryFallback(REDIS_CONFIG.MEMORY_MAX_KEYS);
      return this.client;
    }
    const client = createClient({
      url: redisUrl,
      socket: {
        connectTimeout: REDIS_CONFIG.CONNECT_TIMEOUT_MS,
        reconnectStrategy: (retries: number) => {
          logger.warn("[REDIS] Reconnecting", { attempt: retries + 1 });
          return Math.min(30_000, Math.round(500 * Math.pow(1.7, retries)));
        },
      },
    });
    client.on("error", (err: unknown) => {
      logger.error("[REDIS] Client error", err);
    });
    client.on("ready", () => {
      logger.info("[REDIS] Connected");
    });
    logger.info("[REDIS] Connecting...", {
      redisHost: redisUrl.replace(/\/\/[^:]+:[^@]+@/, "//***:***@"),
    });
    try {
      await client.connect();
    } catch (error) {
      this.initPromise = null;
      logger.error("[REDIS] Failed to connect", error);
      throw error;
    }
    this.rawClient = client;
    this.client = {
      setNX: async (key: string, value: string, ttlMs: number): Promise<boolean> => {
        const result = await client.set(key, value, { NX: true, PX: ttlMs });
        return result !== null;
      },
      del: async (key: string): Promise<number> => client.del(key),
      ttl: async (key: string): Promise<number> => client.ttl(key),
    };
    return this.client;
  }
  async close(): Promise<void> {
    if (this.rawClient) {
      try {
        await this.rawClient.quit();
        logger.info("[REDIS] Connection closed");
      } catch (error) {
        logger.error("[REDIS] Error closing connection", error);
      }
      this.rawClient = null;
      this.client = null;
    }
    this.initPromise = null;
  }
}

export async function getRedisClient(): Promise<RedisClientWrapper> {
  return RedisClientFactory.getInstance().getClient();
}

export async function closeRedisConnection(): Promise<void> {
  await RedisClientFactory.getInstance().close();
}
