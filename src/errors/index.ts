/**
 * Error types for the procedure batch exporter.
 *
 * Every error carries a `fatal` flag: fatal errors abort a batch run, the rest
 * are confined to the period that raised them. Driver errors from `mssql` are
 * mapped onto this hierarchy by {@link parseDriverError}.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error codes for the batch exporter.
 */
export enum BatchErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',

  // Connection errors
  ConnectionFailed = 'CONNECTION_FAILED',

  // Caller input errors
  InvalidRange = 'INVALID_RANGE',
  InvalidDate = 'INVALID_DATE',

  // Parameter errors
  MissingParameter = 'MISSING_PARAMETER',
  ParameterType = 'PARAMETER_TYPE',
  UnresolvedParameter = 'UNRESOLVED_PARAMETER',

  // Execution errors
  ExecutionError = 'EXECUTION_ERROR',
  QueryTimeout = 'QUERY_TIMEOUT',
  FallbackExhausted = 'FALLBACK_EXHAUSTED',
  UnsafeLiteral = 'UNSAFE_LITERAL',
  InvalidObjectName = 'INVALID_OBJECT_NAME',

  // Export errors
  ExportError = 'EXPORT_ERROR',
}

/**
 * SQL Server error numbers that mean the session itself is unusable.
 */
export enum SqlServerErrorNumber {
  ServerNotFound = 53,
  ConnectionBroken = 10053,
  NetworkError = 10054,
  LoginFailed = 18456,
  PasswordExpired = 18488,
  QueryTimeout = -2,
}

/**
 * Driver error codes (tedious/mssql) raised when a connection cannot be used.
 */
const CONNECTION_ERROR_CODES = new Set([
  'ELOGIN',
  'ESOCKET',
  'ECONNCLOSED',
  'ENOTOPEN',
  'EINSTLOOKUP',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
]);

const CONNECTION_ERROR_NUMBERS = new Set<number>([
  SqlServerErrorNumber.ServerNotFound,
  SqlServerErrorNumber.ConnectionBroken,
  SqlServerErrorNumber.NetworkError,
  SqlServerErrorNumber.LoginFailed,
  SqlServerErrorNumber.PasswordExpired,
]);

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class.
 */
export class BatchError extends Error {
  /** Error code */
  readonly code: BatchErrorCode;
  /** Whether this error aborts the whole batch */
  readonly fatal: boolean;
  /** SQL Server error number (if from SQL Server) */
  readonly errorNumber?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: BatchErrorCode;
    message: string;
    fatal?: boolean;
    errorNumber?: number;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'BatchError';
    this.code = options.code;
    this.fatal = options.fatal ?? false;
    this.errorNumber = options.errorNumber;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BatchError);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      errorNumber: this.errorNumber,
      details: this.details,
    };
  }
}

// ============================================================================
// Fatal Errors
// ============================================================================

/**
 * Configuration error: catalog missing or malformed, incomplete settings.
 */
export class ConfigurationError extends BatchError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super({
      code: BatchErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      fatal: true,
      details,
      cause,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * A session to SQL Server could not be established or was lost.
 */
export class ConnectionFailedError extends BatchError {
  constructor(target: string, cause?: Error, errorNumber?: number) {
    super({
      code: BatchErrorCode.ConnectionFailed,
      message: cause
        ? `Failed to connect to SQL Server at ${target}: ${cause.message}`
        : `Failed to connect to SQL Server at ${target}`,
      fatal: true,
      errorNumber,
      details: { target },
      cause,
    });
    this.name = 'ConnectionFailedError';
  }
}

// ============================================================================
// Caller Input Errors
// ============================================================================

/**
 * Range whose start lies after its end.
 */
export class InvalidRangeError extends BatchError {
  constructor(start: Date, end: Date) {
    super({
      code: BatchErrorCode.InvalidRange,
      message: `Start date ${start.toISOString()} is after end date ${end.toISOString()}`,
      details: { start: start.toISOString(), end: end.toISOString() },
    });
    this.name = 'InvalidRangeError';
  }
}

/**
 * Date string that is not a valid `YYYYMMDD` calendar date.
 */
export class InvalidDateError extends BatchError {
  constructor(value: string) {
    super({
      code: BatchErrorCode.InvalidDate,
      message: `Invalid date: ${value}. Use the format YYYYMMDD (e.g. 20250101)`,
      details: { value },
    });
    this.name = 'InvalidDateError';
  }
}

// ============================================================================
// Parameter Errors (Per Period)
// ============================================================================

/**
 * Base class for binder failures.
 */
export class ParameterError extends BatchError {
  constructor(code: BatchErrorCode, message: string, details?: Record<string, unknown>) {
    super({ code, message, details });
    this.name = 'ParameterError';
  }
}

/**
 * Integer parameter with neither override nor default.
 */
export class MissingParameterError extends ParameterError {
  constructor(parameter: string) {
    super(
      BatchErrorCode.MissingParameter,
      `Integer parameter '${parameter}' was not provided and has no default`,
      { parameter }
    );
    this.name = 'MissingParameterError';
  }
}

/**
 * Value that cannot be cast to the declared kind.
 */
export class ParameterTypeError extends ParameterError {
  constructor(parameter: string, expected: string, value: unknown) {
    super(
      BatchErrorCode.ParameterType,
      `Parameter '${parameter}' expects ${expected}, got ${JSON.stringify(value)}`,
      { parameter, expected, value }
    );
    this.name = 'ParameterTypeError';
  }
}

/**
 * Slots left empty after binding.
 */
export class UnresolvedParameterError extends ParameterError {
  readonly parameters: readonly string[];

  constructor(parameters: readonly string[]) {
    super(
      BatchErrorCode.UnresolvedParameter,
      `Could not resolve parameter(s): ${parameters.join(', ')}`,
      { parameters }
    );
    this.name = 'UnresolvedParameterError';
    this.parameters = parameters;
  }
}

// ============================================================================
// Execution Errors (Per Period)
// ============================================================================

/**
 * Query execution error.
 */
export class ExecutionError extends BatchError {
  constructor(
    message: string,
    options: { errorNumber?: number; cause?: Error; code?: BatchErrorCode; details?: Record<string, unknown> } = {}
  ) {
    super({
      code: options.code ?? BatchErrorCode.ExecutionError,
      message: `Query execution failed: ${message}`,
      errorNumber: options.errorNumber,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'ExecutionError';
  }
}

/**
 * Query exceeded the driver's request timeout.
 */
export class QueryTimeoutError extends ExecutionError {
  constructor(message: string, cause?: Error) {
    super(`timeout: ${message}`, {
      code: BatchErrorCode.QueryTimeout,
      errorNumber: SqlServerErrorNumber.QueryTimeout,
      cause,
    });
    this.name = 'QueryTimeoutError';
  }
}

/**
 * Both the bound attempt and the literal fallback failed.
 */
export class FallbackExhaustedError extends ExecutionError {
  readonly boundError: Error;
  readonly literalError: Error;

  constructor(target: string, boundError: Error, literalError: Error) {
    super(`'${target}' failed with bound and literal arguments: ${literalError.message}`, {
      code: BatchErrorCode.FallbackExhausted,
      cause: literalError,
      details: { target, boundError: boundError.message, literalError: literalError.message },
    });
    this.name = 'FallbackExhaustedError';
    this.boundError = boundError;
    this.literalError = literalError;
  }
}

/**
 * Value refused for textual interpolation into the fallback call.
 */
export class UnsafeLiteralError extends ExecutionError {
  constructor(parameter: string, cause?: Error) {
    super(`value of '${parameter}' is not allowed in a literal call`, {
      code: BatchErrorCode.UnsafeLiteral,
      cause,
      details: { parameter },
    });
    this.name = 'UnsafeLiteralError';
  }
}

/**
 * Routine, table or column name that is not a plain SQL identifier.
 */
export class InvalidObjectNameError extends ExecutionError {
  constructor(objectName: string, reason: string) {
    super(`invalid object name '${objectName}': ${reason}`, {
      code: BatchErrorCode.InvalidObjectName,
      details: { objectName, reason },
    });
    this.name = 'InvalidObjectNameError';
  }
}

// ============================================================================
// Export Errors (Per Period)
// ============================================================================

/**
 * Spreadsheet could not be written.
 */
export class ExportError extends BatchError {
  constructor(message: string, destination?: string, cause?: Error) {
    super({
      code: BatchErrorCode.ExportError,
      message: `Export failed: ${message}`,
      details: destination ? { destination } : undefined,
      cause,
    });
    this.name = 'ExportError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

interface DriverErrorFields {
  message: string;
  code?: string;
  number?: number;
}

function readDriverFields(error: unknown): DriverErrorFields {
  if (error instanceof Error) {
    const fields: DriverErrorFields = { message: error.message };
    if ('code' in error && typeof error.code === 'string') {
      fields.code = error.code;
    }
    if ('number' in error && typeof error.number === 'number') {
      fields.number = error.number;
    }
    return fields;
  }
  return { message: String(error) };
}

/**
 * Maps a driver error onto the batch error hierarchy.
 *
 * @param error - Anything thrown by `mssql`
 * @param target - Server description used in connection failures
 */
export function parseDriverError(error: unknown, target = 'unknown'): BatchError {
  if (error instanceof BatchError) {
    return error;
  }

  const fields = readDriverFields(error);
  const cause = error instanceof Error ? error : new Error(fields.message);

  if (
    (fields.code !== undefined && CONNECTION_ERROR_CODES.has(fields.code)) ||
    (fields.number !== undefined && CONNECTION_ERROR_NUMBERS.has(fields.number))
  ) {
    return new ConnectionFailedError(target, cause, fields.number);
  }

  if (fields.code === 'ETIMEOUT' || fields.number === SqlServerErrorNumber.QueryTimeout) {
    return new QueryTimeoutError(fields.message, cause);
  }

  return new ExecutionError(fields.message, { errorNumber: fields.number, cause });
}

/**
 * Checks if an error belongs to this hierarchy.
 */
export function isBatchError(error: unknown): error is BatchError {
  return error instanceof BatchError;
}

/**
 * Checks if an error must abort the whole batch.
 */
export function isFatalError(error: unknown): boolean {
  return isBatchError(error) && error.fatal;
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
