import type { Database, DbTransaction } from "../../db.server";
import { createTimer, logSlowOperation } from "../../utils/logger.server";

/**
 * Runs `fn` inside one database transaction: commit when it resolves,
 * roll back when it throws. The handle passed to `fn` is what repositories
 * take as their transaction argument.
 */
export interface TransactionRunner<Tx> {
  withTransaction<T>(fn: (tx: Tx) => Promise<T>, label?: string): Promise<T>;
}

const SLOW_TRANSACTION_MS = 1000;

export class DrizzleTransactionRunner implements TransactionRunner<DbTransaction> {
  constructor(private readonly db: Database) {}

  async withTransaction<T>(fn: (tx: DbTransaction) => Promise<T>, label = "transaction"): Promise<T> {
    const timer = createTimer();
    try {
      return await this.db.transaction(fn);
    } finally {
      logSlowOperation(label, timer.elapsed(), SLOW_TRANSACTION_MS);
    }
  }
}
