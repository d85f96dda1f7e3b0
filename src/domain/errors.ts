/**
 * Version Audit Error Hierarchy
 *
 * All errors raised by the audit engine extend VersionAuditError with an
 * error code and a recoverable flag. Probe failures are additionally tagged
 * with a ProbeFailureKind so that callers can tell an unreachable server
 * from a misconfigured one without parsing the message.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - PROBE_*: Federation probe failures (1xxx)
 * - COMPAT_*: Compatibility table lookups (2xxx)
 * - FILTER_*: User supplied filter expressions (3xxx)
 * - MATRIX_*: Homeserver API errors (4xxx)
 * - CONFIG_*: Configuration errors (5xxx)
 */
export const ErrorCodes = {
  // Probe errors (1xxx)
  PROBE_UNREACHABLE: 'E1001',
  PROBE_TLS_IDENTITY: 'E1002',
  PROBE_PROTOCOL_CHECK: 'E1003',
  PROBE_NO_VERSION_INFO: 'E1004',
  PROBE_TIMEOUT: 'E1005',
  PROBE_INTERNAL: 'E1006',

  // Compatibility errors (2xxx)
  COMPAT_UNKNOWN_SOFTWARE: 'E2001',
  COMPAT_SCHEME_MISMATCH: 'E2002',
  COMPAT_TABLE_INVALID: 'E2003',

  // Filter errors (3xxx)
  FILTER_INVALID_OPERATOR: 'E3001',
  FILTER_INVALID_VERSION: 'E3002',

  // Matrix errors (4xxx)
  MATRIX_REQUEST_FAILED: 'E4001',
  MATRIX_INVALID_RESPONSE: 'E4002',

  // Configuration errors (5xxx)
  CONFIG_VALIDATION_ERROR: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

export class VersionAuditError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Whether retrying the same operation may succeed */
  readonly recoverable: boolean;

  constructor(
    message: string,
    options: {
      code: ErrorCode;
      recoverable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'VersionAuditError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Probe Errors
// ============================================================================

export type ProbeFailureKind =
  | 'unreachable'
  | 'tls-identity'
  | 'protocol-check'
  | 'no-version-info'
  | 'timeout'
  | 'internal';

const PROBE_CODES: Record<ProbeFailureKind, ErrorCode> = {
  unreachable: ErrorCodes.PROBE_UNREACHABLE,
  'tls-identity': ErrorCodes.PROBE_TLS_IDENTITY,
  'protocol-check': ErrorCodes.PROBE_PROTOCOL_CHECK,
  'no-version-info': ErrorCodes.PROBE_NO_VERSION_INFO,
  timeout: ErrorCodes.PROBE_TIMEOUT,
  internal: ErrorCodes.PROBE_INTERNAL,
};

/**
 * A classified failure of a single federation probe.
 * The message is shown to users as-is.
 */
export class ProbeError extends VersionAuditError {
  readonly kind: ProbeFailureKind;

  constructor(kind: ProbeFailureKind, message: string, cause?: unknown) {
    super(message, {
      code: PROBE_CODES[kind],
      recoverable: kind !== 'internal',
      cause,
    });
    this.name = 'ProbeError';
    this.kind = kind;
  }
}

// ============================================================================
// Compatibility Errors
// ============================================================================

export class UnknownSoftwareError extends VersionAuditError {
  readonly software: string;

  constructor(software: string) {
    super(`No room version requirements known for ${software}`, {
      code: ErrorCodes.COMPAT_UNKNOWN_SOFTWARE,
    });
    this.name = 'UnknownSoftwareError';
    this.software = software;
  }
}

/**
 * Raised when two versions of different families or schemes are ordered.
 * Always a bug in the caller.
 */
export class SchemeMismatchError extends VersionAuditError {
  constructor(left: string, right: string) {
    super(`Cannot compare ${left} with ${right}`, {
      code: ErrorCodes.COMPAT_SCHEME_MISMATCH,
    });
    this.name = 'SchemeMismatchError';
  }
}

export class CompatibilityTableError extends VersionAuditError {
  constructor(message: string) {
    super(message, { code: ErrorCodes.COMPAT_TABLE_INVALID });
    this.name = 'CompatibilityTableError';
  }
}

// ============================================================================
// Filter Errors
// ============================================================================

export class InvalidFilterExpressionError extends VersionAuditError {
  constructor(message: string, code: ErrorCode = ErrorCodes.FILTER_INVALID_VERSION, cause?: unknown) {
    super(message, { code, cause });
    this.name = 'InvalidFilterExpressionError';
  }
}

// ============================================================================
// Matrix Errors
// ============================================================================

export class MatrixApiError extends VersionAuditError {
  readonly status?: number;
  readonly errcode?: string;

  constructor(
    message: string,
    options: { status?: number; errcode?: string; code?: ErrorCode; cause?: unknown } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.MATRIX_REQUEST_FAILED,
      recoverable: options.status === undefined || options.status >= 500 || options.status === 429,
      cause: options.cause,
    });
    this.name = 'MatrixApiError';
    this.status = options.status;
    this.errcode = options.errcode;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends VersionAuditError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message, { code: ErrorCodes.CONFIG_VALIDATION_ERROR });
    this.name = 'ConfigError';
    this.details = details;
  }
}
