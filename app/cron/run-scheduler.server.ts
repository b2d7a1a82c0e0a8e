import { closeDatabase } from "../db.server";
import { getContainer } from "../container";
import { validateConfigOrThrow } from "../utils/config.server";
import { logger } from "../utils/logger.server";
import { closeRedisConnection } from "../utils/redis-client.server";

/**
 * Runs the license scheduler until the signal aborts, then releases the
 * database pool and the Redis connection.
 */
export async function runLicenseScheduler(signal: AbortSignal): Promise<{ ticks: number }> {
  validateConfigOrThrow();
  try {
    const { scheduler } = await getContainer();
    await scheduler.run(signal);
    return { ticks: scheduler.tickCount };
  } finally {
    await closeRedisConnection();
    await closeDatabase();
    logger.info("License scheduler resources released");
  }
}
