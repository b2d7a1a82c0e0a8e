import { createHash, randomBytes } from "crypto";
import { AsyncLocalStorage } from "async_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

interface CorrelationContext {
  correlationId: string;
  storeId?: string;
  userId?: string;
  jobId?: string;
  eventId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  storeId?: string;
  userId?: string;
  jobId?: string;
  eventId?: string;
  duration?: number;
  error?: {
    name?: string;
    message?: string;
    code?: string;
    stack?: string;
  };
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function resolveMinLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

const MIN_LOG_LEVEL: LogLevel = resolveMinLevel();

const IS_PRODUCTION = process.env.NODE_ENV === "production";

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

export function generateCorrelationId(): string {
  return randomBytes(12).toString("hex");
}

export function withCorrelation<T>(
  context: Partial<CorrelationContext>,
  fn: () => T
): T {
  const existingContext = correlationStorage.getStore();
  const newContext: CorrelationContext = {
    correlationId: context.correlationId || existingContext?.correlationId || generateCorrelationId(),
    ...existingContext,
    ...context,
  };
  return correlationStorage.run(newContext, fn);
}

export function getCorrelationContext(): CorrelationContext | undefined {
  return correlationStorage.getStore();
}

const SENSITIVE_FIELD_PATTERNS = [
  "accesstoken",
  "access_token",
  "apisecret",
  "api_secret",
  "apikey",
  "api_key",
  "password",
  "token",
  "secret",
  "credentials",
  "authorization",
  "bearer",
  "signature",
  "email",
  "phone",
  "address",
  "cardnumber",
  "card_number",
  "cvv",
  "iban",
  "accountnumber",
  "account_number",
  "licensenumber",
  "license_number",
];

const EXCLUDED_FIELDS = [
  "rawbody",
  "raw_body",
  "rawpayload",
  "raw_payload",
  "webhookpayload",
  "webhook_payload",
  "requestbody",
  "request_body",
  "responsebody",
  "response_body",
];

const HASHED_FIELDS = ["customerid", "customer_id", "paymentmethodid", "payment_method_id"];

function safeHash(value: unknown, length: number = 12): string {
  if (typeof value !== "string") return "[REDACTED]";
  const v = value.trim();
  if (v.length === 0) return "[REDACTED]";
  return createHash("sha256").update(v).digest("hex").slice(0, length);
}

function safeUrlForLogging(value: unknown, maxLen: number = 200): string {
  if (typeof value !== "string") return "[REDACTED]";
  const raw = value.trim();
  if (raw.length === 0) return "[REDACTED]";
  try {
    const u = new URL(raw);
    u.search = "";
    u.hash = "";
    return u.toString().slice(0, maxLen);
  } catch {
    const cut = raw.split("#")[0]?.split("?")[0] ?? raw;
    return cut.slice(0, maxLen);
  }
}

function isLogContext(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sanitizeContext(context: LogContext, depth: number = 0): LogContext {
  if (depth > 5) return { _truncated: true };
  const sanitized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();
    if (HASHED_FIELDS.includes(lowerKey)) {
      sanitized[key] = safeHash(value, 12);
      continue;
    }
    if (lowerKey === "url" || lowerKey.endsWith("url")) {
      sanitized[key] = safeUrlForLogging(value, 200);
      continue;
    }
    if (EXCLUDED_FIELDS.some((f) => lowerKey.includes(f))) {
      sanitized[key] = "[EXCLUDED]";
      continue;
    }
    if (SENSITIVE_FIELD_PATTERNS.some((f) => lowerKey.includes(f))) {
      sanitized[key] = "[REDACTED]";
    } else if (value instanceof Date) {
      sanitized[key] = value.toISOString();
    } else if (Array.isArray(value)) {
      const sanitizedArray: unknown[] = value.slice(0, 10).map((item) =>
        isLogContext(item) ? sanitizeContext(item, depth + 1) : item
      );
      if (value.length > 10) {
        sanitizedArray.push(`...(${value.length - 10} more)`);
      }
      sanitized[key] = sanitizedArray;
    } else if (isLogContext(value)) {
      sanitized[key] = sanitizeContext(value, depth + 1);
    } else if (typeof value === "string" && value.length > 500) {
      sanitized[key] = value.substring(0, 200) + "...[TRUNCATED]";
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

function describeError(error: unknown): LogEntry["error"] {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code,
      stack: IS_PRODUCTION ? undefined : error.stack,
    };
  }
  return { message: String(error) };
}

function buildLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: unknown
): LogEntry {
  const correlationContext = correlationStorage.getStore();
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };
  if (correlationContext) {
    entry.correlationId = correlationContext.correlationId;
    if (correlationContext.storeId) entry.storeId = correlationContext.storeId;
    if (correlationContext.userId) entry.userId = correlationContext.userId;
    if (correlationContext.jobId) entry.jobId = correlationContext.jobId;
    if (correlationContext.eventId) entry.eventId = correlationContext.eventId;
  }
  if (error !== undefined && error !== null) {
    entry.error = describeError(error);
  }
  if (context && Object.keys(context).length > 0) {
    Object.assign(entry, sanitizeContext(context));
  }
  return entry;
}

function formatForConsole(entry: LogEntry): string {
  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  }
  const { timestamp, level, message, correlationId, ...rest } = entry;
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  const corrId = correlationId ? ` [${correlationId.substring(0, 8)}]` : "";
  if (Object.keys(rest).length > 0) {
    return `${prefix}${corrId} ${message} ${JSON.stringify(rest)}`;
  }
  return `${prefix}${corrId} ${message}`;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[MIN_LOG_LEVEL];
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  log(level: LogLevel, message: string, context?: LogContext): void;
  child(additionalContext: LogContext): Logger;
}

function write(level: LogLevel, formatted: string): void {
  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.info(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      break;
  }
}

function createChildLogger(additionalContext: LogContext): Logger {
  return {
    debug: (msg: string, ctx?: LogContext) =>
      loggerImpl.debug(msg, { ...additionalContext, ...ctx }),
    info: (msg: string, ctx?: LogContext) =>
      loggerImpl.info(msg, { ...additionalContext, ...ctx }),
    warn: (msg: string, ctx?: LogContext) =>
      loggerImpl.warn(msg, { ...additionalContext, ...ctx }),
    error: (msg: string, err?: unknown, ctx?: LogContext) =>
      loggerImpl.error(msg, err, { ...additionalContext, ...ctx }),
    log: (level: LogLevel, msg: string, ctx?: LogContext) =>
      loggerImpl.log(level, msg, { ...additionalContext, ...ctx }),
    child: (moreContext: LogContext) =>
      createChildLogger({ ...additionalContext, ...moreContext }),
  };
}

const loggerImpl: Logger = {
  debug(message: string, context?: LogContext): void {
    if (shouldLog("debug")) {
      write("debug", formatForConsole(buildLogEntry("debug", message, context)));
    }
  },
  info(message: string, context?: LogContext): void {
    if (shouldLog("info")) {
      write("info", formatForConsole(buildLogEntry("info", message, context)));
    }
  },
  warn(message: string, context?: LogContext): void {
    if (shouldLog("warn")) {
      write("warn", formatForConsole(buildLogEntry("warn", message, context)));
    }
  },
  error(message: string, error?: unknown, context?: LogContext): void {
    if (shouldLog("error")) {
      write("error", formatForConsole(buildLogEntry("error", message, context, error)));
    }
  },
  log(level: LogLevel, message: string, context?: LogContext): void {
    if (shouldLog(level)) {
      write(level, formatForConsole(buildLogEntry(level, message, context)));
    }
  },
  child(additionalContext: LogContext): Logger {
    return createChildLogger(additionalContext);
  },
};

export const logger: Logger = loggerImpl;

export const metrics = {
  licenseTransition(context: {
    licenseId: string;
    storeId: string;
    from: string | null;
    to: string;
    source: "create" | "verify" | "scheduler";
  }): void {
    logger.info(`[METRIC] license_transition`, {
      ...context,
      _metric: "license_transition",
    });
  },
  kycReconciled(context: {
    storeId: string;
    previous: string;
    next: string;
    changed: boolean;
  }): void {
    logger.log(context.changed ? "info" : "debug", `[METRIC] kyc_reconciled`, {
      ...context,
      _metric: "kyc_reconciled",
    });
  },
  schedulerSweep(context: {
    sweep: "warn" | "expire" | "purge";
    candidates: number;
    processed: number;
    status: "completed" | "failed";
    duration: number;
  }): void {
    const level = context.status === "failed" ? "warn" : "info";
    logger.log(level, `[METRIC] scheduler_sweep`, {
      ...context,
      _metric: "scheduler_sweep",
    });
  },
  paymentWebhook(context: {
    eventId: string;
    eventType: string;
    status: "processed" | "duplicate" | "ignored" | "failed";
    duration?: number;
    error?: string;
  }): void {
    const level = context.status === "failed" ? "warn" : "info";
    logger.log(level, `[METRIC] payment_webhook`, {
      ...context,
      _metric: "payment_webhook",
    });
  },
};

export function createTimer(): { elapsed: () => number } {
  const start = performance.now();
  return {
    elapsed: () => Math.round(performance.now() - start),
  };
}

export function logSlowOperation(
  operation: string,
  duration: number,
  thresholdMs: number,
  context?: LogContext
): void {
  if (duration > thresholdMs) {
    logger.warn(`Slow operation: ${operation}`, {
      duration,
      threshold: thresholdMs,
      slowBy: duration - thresholdMs,
      ...context,
    });
  }
}
