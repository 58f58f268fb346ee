/**
 * Standard error classes for the fixture engine
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  MALFORMED_ENDPOINT = "MALFORMED_ENDPOINT",
  DISTRIBUTION_MISMATCH = "DISTRIBUTION_MISMATCH",
  EMPTY_INPUT = "EMPTY_INPUT",
  NO_REPLACEMENTS_AVAILABLE = "NO_REPLACEMENTS_AVAILABLE",
  STORAGE_ERROR = "STORAGE_ERROR",
  INVALID_REPLICATION_FACTOR = "INVALID_REPLICATION_FACTOR",
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
    cause?: string;
  };
}

export class FixtureError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FixtureError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * Structural defects reported by the endpoint parser
 */
export type EndpointDefect =
  | "missing-scheme"
  | "missing-authority"
  | "missing-host"
  | "invalid-port"
  | "missing-port";

export class MalformedEndpointError extends FixtureError {
  constructor(
    public readonly line: string,
    public readonly defect: EndpointDefect,
    message: string,
  ) {
    super(ErrorCode.MALFORMED_ENDPOINT, message, { line, defect });
    this.name = "MalformedEndpointError";
  }
}

export class DistributionMismatchError extends FixtureError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.DISTRIBUTION_MISMATCH, message, details);
    this.name = "DistributionMismatchError";
  }
}

export class EmptyInputError extends FixtureError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.EMPTY_INPUT, message, details);
    this.name = "EmptyInputError";
  }
}

export class NoReplacementsAvailableError extends FixtureError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.NO_REPLACEMENTS_AVAILABLE, message, details);
    this.name = "NoReplacementsAvailableError";
  }
}

export class StorageError extends FixtureError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.STORAGE_ERROR, message, details, options);
    this.name = "StorageError";
  }
}

export class InvalidReplicationFactorError extends FixtureError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.INVALID_REPLICATION_FACTOR, message, details);
    this.name = "InvalidReplicationFactorError";
  }
}

export class ConfigError extends FixtureError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class ValidationError extends FixtureError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.VALIDATION_ERROR, message, details);
    this.name = "ValidationError";
  }
}

/**
 * Wrap anything thrown into a FixtureError, keeping the original as cause
 */
export function toFixtureError(error: unknown): FixtureError {
  if (error instanceof FixtureError) {
    return error;
  }
  return new FixtureError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
