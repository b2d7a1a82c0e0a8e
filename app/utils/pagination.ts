import { PAGINATION_CONFIG } from "./config.shared";
import { Errors } from "./errors";

export interface KeysetCursor {
  createdAt: Date;
  id: string;
}

export interface PageRequest {
  limit?: number;
  cursor?: string | null;
}

export interface Page<T> {
  items: T[];
  nextCursor: string | null;
}

export function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return PAGINATION_CONFIG.DEFAULT_LIMIT;
  }
  return Math.min(PAGINATION_CONFIG.MAX_LIMIT, Math.max(1, Math.floor(limit)));
}

export function encodeCursor(cursor: KeysetCursor): string {
  return Buffer.from(`${cursor.createdAt.toISOString()}|${cursor.id}`, "utf8").toString("base64url");
}

export function decodeCursor(raw: string): KeysetCursor {
  const decoded = Buffer.from(raw, "base64url").toString("utf8");
  const separator = decoded.indexOf("|");
  if (separator <= 0) {
    throw Errors.invalidFormat("cursor", "invalid cursor");
  }
  const createdAt = new Date(decoded.slice(0, separator));
  const id = decoded.slice(separator + 1);
  if (Number.isNaN(createdAt.getTime()) || !id) {
    throw Errors.invalidFormat("cursor", "invalid cursor");
  }
  return { createdAt, id };
}

/**
 * Splits a `limit + 1` fetch into the page and the cursor for the next one.
 */
export function paginate<T extends KeysetCursor>(rows: T[], limit: number): Page<T> {
  if (rows.length <= limit) {
    return { items: rows, nextCursor: null };
  }
  const items = rows.slice(0, limit);
  const last = items[items.length - 1];
  return {
    items,
    nextCursor: last ? encodeCursor({ createdAt: last.createdAt, id: last.id }) : null,
  };
}
