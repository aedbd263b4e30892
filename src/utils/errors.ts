/**
 * Error types and codes for springinit.
 * Every error raised on purpose extends SpringInitError.
 */

/**
 * Base error class for all springinit errors.
 */
export class SpringInitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SpringInitError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors (loading, parsing, validation).
 */
export class ConfigError extends SpringInitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Generator service errors (unreachable, bad status, unexpected payload).
 */
export class ServiceError extends SpringInitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ServiceError';
  }
}

/**
 * Invalid answers or flags for the project being generated.
 */
export class ProjectError extends SpringInitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ProjectError';
  }
}

/**
 * The project directory is already taken by a file or a directory.
 */
export class TargetExistsError extends SpringInitError {
  constructor(
    public readonly target: string,
    public readonly existing: 'file' | 'directory'
  ) {
    super(ErrorCodes.TARGET_EXISTS, `a ${existing} named '${target}' already exists`, {
      target,
      existing,
    });
    this.name = 'TargetExistsError';
  }
}

export type ExtractionErrorKind = 'invalid-archive' | 'target-exists' | 'filesystem';

/**
 * Archive extraction failures.
 * `kind` tells a corrupt archive apart from a failing filesystem.
 */
export class ExtractionError extends SpringInitError {
  constructor(
    public readonly kind: ExtractionErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(EXTRACTION_CODES[kind], message, details);
    this.name = 'ExtractionError';
  }

  /** Path of the filesystem node involved, if any. */
  get path(): string | undefined {
    const value = this.details?.path;
    return typeof value === 'string' ? value : undefined;
  }
}

export const ErrorCodes = {
  // Configuration (C001-C002)
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // Generator service (N001-N004)
  SERVICE_UNREACHABLE: 'N001',
  SERVICE_STATUS: 'N002',
  SERVICE_PAYLOAD: 'N003',
  SERVICE_TIMEOUT: 'N004',

  // Project answers (P001-P003)
  INVALID_FIELD: 'P001',
  UNKNOWN_OPTION: 'P002',
  INCOMPATIBLE_DEPENDENCY: 'P003',

  // Extraction (X001-X003)
  TARGET_EXISTS: 'X001',
  ARCHIVE_INVALID: 'X002',
  FILESYSTEM_ERROR: 'X003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const EXTRACTION_CODES: Record<ExtractionErrorKind, ErrorCode> = {
  'invalid-archive': ErrorCodes.ARCHIVE_INVALID,
  'target-exists': ErrorCodes.TARGET_EXISTS,
  filesystem: ErrorCodes.FILESYSTEM_ERROR,
};

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
