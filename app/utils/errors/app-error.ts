export const ErrorKind = {
  VALIDATION: "validation",
  FORBIDDEN: "forbidden",
  NOT_FOUND: "not_found",
  CONFLICT: "conflict",
  DEPENDENCY: "dependency",
  INTERNAL: "internal",
} as const;

export type ErrorKindType = (typeof ErrorKind)[keyof typeof ErrorKind];

export const ErrorCode = {

  VALIDATION_ERROR: "VALIDATION_ERROR",
  VALIDATION_MISSING_FIELD: "VALIDATION_MISSING_FIELD",
  VALIDATION_INVALID_FORMAT: "VALIDATION_INVALID_FORMAT",
  VALIDATION_SIGNATURE_INVALID: "VALIDATION_SIGNATURE_INVALID",

  FORBIDDEN_ROLE: "FORBIDDEN_ROLE",
  FORBIDDEN_STORE_MISMATCH: "FORBIDDEN_STORE_MISMATCH",

  NOT_FOUND_LICENSE: "NOT_FOUND_LICENSE",
  NOT_FOUND_MEDIA: "NOT_FOUND_MEDIA",
  NOT_FOUND_STORE: "NOT_FOUND_STORE",
  NOT_FOUND_RESOURCE: "NOT_FOUND_RESOURCE",

  CONFLICT_LICENSE_FINALIZED: "CONFLICT_LICENSE_FINALIZED",
  CONFLICT_LICENSE_NOT_DELETABLE: "CONFLICT_LICENSE_NOT_DELETABLE",
  CONFLICT_MEDIA_NOT_READY: "CONFLICT_MEDIA_NOT_READY",
  CONFLICT_SUBSCRIPTION_STORE: "CONFLICT_SUBSCRIPTION_STORE",

  DEPENDENCY_DATABASE: "DEPENDENCY_DATABASE",
  DEPENDENCY_PAYMENT_PROVIDER: "DEPENDENCY_PAYMENT_PROVIDER",
  DEPENDENCY_SIGNER: "DEPENDENCY_SIGNER",
  DEPENDENCY_CACHE: "DEPENDENCY_CACHE",
  DEPENDENCY_ERROR: "DEPENDENCY_ERROR",

  INTERNAL_ERROR: "INTERNAL_ERROR",
  INTERNAL_CONFIG_ERROR: "INTERNAL_CONFIG_ERROR",
  INTERNAL_UNEXPECTED: "INTERNAL_UNEXPECTED",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ErrorMetadata {

  storeId?: string;

  licenseId?: string;

  mediaId?: string;

  eventId?: string;

  operation?: string;

  field?: string;

  correlationId?: string;

  httpStatus?: number;

  [key: string]: unknown;
}

export function kindOfCode(code: ErrorCodeType): ErrorKindType {
  if (code.startsWith("VALIDATION_")) return ErrorKind.VALIDATION;
  if (code.startsWith("FORBIDDEN_")) return ErrorKind.FORBIDDEN;
  if (code.startsWith("NOT_FOUND_")) return ErrorKind.NOT_FOUND;
  if (code.startsWith("CONFLICT_")) return ErrorKind.CONFLICT;
  if (code.startsWith("DEPENDENCY_")) return ErrorKind.DEPENDENCY;
  return ErrorKind.INTERNAL;
}

export class AppError extends Error {

  public readonly kind: ErrorKindType;

  public readonly isRetryable: boolean;

  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(

    public readonly code: ErrorCodeType,

    message: string,

    isRetryable: boolean = false,

    public readonly metadata: ErrorMetadata = {},

    cause?: Error
  ) {
    super(message);
    this.name = "AppError";
    this.kind = kindOfCode(code);
    this.isRetryable = isRetryable;
    this.cause = cause;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Wraps an unknown failure. An existing AppError keeps its code, kind and
   * retryability; only the message and metadata are layered on.
   */
  static wrap(
    error: unknown,
    code: ErrorCodeType = ErrorCode.INTERNAL_UNEXPECTED,
    message?: string,
    metadata: ErrorMetadata = {}
  ): AppError {
    if (error instanceof AppError) {

      return new AppError(
        error.code,
        message || error.message,
        error.isRetryable,
        { ...error.metadata, ...metadata },
        error.cause || error
      );
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    const errorMessage = message || originalError.message || "An unexpected error occurred";
    const isRetryable = kindOfCode(code) === ErrorKind.DEPENDENCY;

    return new AppError(code, errorMessage, isRetryable, metadata, originalError);
  }

  withMetadata(additionalMetadata: ErrorMetadata): AppError {
    return new AppError(
      this.code,
      this.message,
      this.isRetryable,
      { ...this.metadata, ...additionalMetadata },
      this.cause
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      isRetryable: this.isRetryable,
      metadata: this.metadata,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  getErrorChain(): Error[] {
    const chain: Error[] = [this];
    let current: Error | undefined = this.cause;
    while (current) {
      chain.push(current);
      current = current instanceof AppError ? current.cause : undefined;
    }
    return chain;
  }

  toClientResponse(): { code: string; kind: ErrorKindType; message: string } {

    const safeMessage = this.kind === ErrorKind.INTERNAL
      ? "An internal error occurred"
      : this.message;

    return {
      code: this.code,
      kind: this.kind,
      message: safeMessage,
    };
  }

  getHttpStatus(): number {
    if (this.metadata.httpStatus) {
      return this.metadata.httpStatus;
    }

    switch (this.kind) {
      case ErrorKind.VALIDATION:
        return 400;
      case ErrorKind.FORBIDDEN:
        return 403;
      case ErrorKind.NOT_FOUND:
        return 404;
      case ErrorKind.CONFLICT:
        return 409;
      case ErrorKind.DEPENDENCY:
        return 502;
      default:
        return 500;
    }
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unknown error occurred";
}

export function ensureAppError(
  error: unknown,
  defaultCode: ErrorCodeType = ErrorCode.INTERNAL_UNEXPECTED
): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return AppError.wrap(error, defaultCode);
}

export function errorKindOf(error: unknown): ErrorKindType {
  return error instanceof AppError ? error.kind : ErrorKind.INTERNAL;
}

export const Errors = {

  validation: (message: string, field?: string) =>
    new AppError(ErrorCode.VALIDATION_ERROR, message, false, field ? { field } : {}),

  missingField: (field: string, message?: string) =>
    new AppError(
      ErrorCode.VALIDATION_MISSING_FIELD,
      message ?? `${field} is required`,
      false,
      { field }
    ),

  invalidFormat: (field: string, message: string, cause?: Error) =>
    new AppError(ErrorCode.VALIDATION_INVALID_FORMAT, message, false, { field }, cause),

  signatureInvalid: (cause?: Error) =>
    new AppError(
      ErrorCode.VALIDATION_SIGNATURE_INVALID,
      "webhook signature verification failed",
      false,
      {},
      cause
    ),

  forbidden: (message: string, metadata: ErrorMetadata = {}) =>
    new AppError(ErrorCode.FORBIDDEN_STORE_MISMATCH, message, false, metadata),

  insufficientRole: (storeId: string) =>
    new AppError(ErrorCode.FORBIDDEN_ROLE, "insufficient store role", false, { storeId }),

  licenseNotFound: (licenseId: string) =>
    new AppError(ErrorCode.NOT_FOUND_LICENSE, "license not found", false, { licenseId }),

  mediaNotFound: (mediaId: string) =>
    new AppError(ErrorCode.NOT_FOUND_MEDIA, "media not found", false, { mediaId }),

  storeNotFound: (storeId: string) =>
    new AppError(ErrorCode.NOT_FOUND_STORE, "store not found", false, { storeId }),

  notFound: (resource: string, id?: string) =>
    new AppError(ErrorCode.NOT_FOUND_RESOURCE, `${resource} not found`, false, {
      resource,
      resourceId: id,
    }),

  conflict: (
    code: Extract<ErrorCodeType, `CONFLICT_${string}`>,
    message: string,
    metadata: ErrorMetadata = {}
  ) => new AppError(code, message, false, metadata),

  dependency: (
    operation: string,
    cause?: unknown,
    code: Extract<ErrorCodeType, `DEPENDENCY_${string}`> = ErrorCode.DEPENDENCY_ERROR
  ) =>
    new AppError(
      code,
      operation,
      true,
      { operation },
      cause instanceof Error ? cause : cause === undefined ? undefined : new Error(String(cause))
    ),

  internal: (message: string, cause?: Error) =>
    new AppError(ErrorCode.INTERNAL_ERROR, message, false, {}, cause),

  unexpected: (cause?: unknown) =>
    AppError.wrap(cause, ErrorCode.INTERNAL_UNEXPECTED, "An unexpected error occurred"),
} as const;

/**
 * Passes AppErrors through untouched and wraps anything else as a dependency
 * failure named after the operation.
 */
export function wrapDependency(
  error: unknown,
  operation: string,
  code: Extract<ErrorCodeType, `DEPENDENCY_${string}`> = ErrorCode.DEPENDENCY_DATABASE
): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return Errors.dependency(operation, error, code);
}
