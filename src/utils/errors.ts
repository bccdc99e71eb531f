/**
 * Error types and codes for the ecosystem auditor.
 * Only these errors abort a run; every other anomaly becomes a Finding.
 */

/**
 * Base error class for all auditor errors.
 */
export class EcoAuditError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EcoAuditError';
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
 * Input that cannot be parsed into repository records at all.
 * The only error class that aborts an audit run.
 */
export class MalformedMetadataError extends EcoAuditError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'MalformedMetadataError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends EcoAuditError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends EcoAuditError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Malformed metadata (X001-X004)
  UNPARSABLE_DOCUMENT: 'X001',
  INVALID_INDEX_SHAPE: 'X002',
  INVALID_RECORD: 'X003',
  MISSING_NAME: 'X004',

  // Configuration (C001-C002)
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  // System (S001-S002)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
