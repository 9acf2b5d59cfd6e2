export class TextRefError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.code = options?.code || "TEXTREF_ERROR";
    this.details = options?.details;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.cause !== undefined && { cause: serializeError(this.cause) }),
    };
  }
}

/**
 * A file reference could not be mapped to an openable resource: an unsupported
 * reference shape, an unknown `%variable%` or a cyclic variable definition.
 */
export class ResolutionError extends TextRefError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "RESOLUTION_ERROR" });
  }
}

/**
 * The underlying open, read or write call failed. `details.code` carries the
 * system error code (ENOENT, EACCES, ...).
 */
export class FileAccessError extends TextRefError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "FILE_ACCESS_ERROR" });
  }

  get errno(): string | undefined {
    const code = this.details?.code;
    return typeof code === "string" ? code : undefined;
  }
}

export class UnsupportedOperationError extends FileAccessError {}

export class InvalidStreamError extends TextRefError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "INVALID_STREAM" });
  }
}

export class InvalidModeError extends TextRefError {
  constructor(mode: string, reason: string) {
    super(`Invalid mode "${mode}": ${reason}`, { code: "INVALID_MODE", details: { mode } });
  }
}

export class ConfigError extends TextRefError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, { ...options, code: "CONFIG_ERROR" });
  }
}

export class EnvironmentError extends TextRefError {
  constructor(message: string) {
    super(message, { code: "ENVIRONMENT_ERROR" });
  }
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
      ...("cause" in error && error.cause !== undefined && { cause: serializeError(error.cause) }),
    };
  }
  return error;
}
