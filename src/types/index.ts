/**
 * Core type definitions for the procedure batch exporter.
 *
 * Connection settings, the declarative procedure schema, date ranges and the
 * tabular results that flow between the splitter, binder, executor and
 * exporter.
 */

// ============================================================================
// Connection Types
// ============================================================================

/**
 * SQL Server connection configuration.
 *
 * SECURITY: password field is marked as sensitive and never logged.
 */
export interface ConnectionConfig {
  /** Database server hostname or IP address */
  host: string;
  /** Database server port (default: 1433) */
  port: number;
  /** Database name to connect to */
  database: string;
  /** Database username */
  username: string;
  /**
   * Database password (SENSITIVE - never logged).
   * @sensitive
   */
  password: string;
  /** SQL Server instance name (for named instances) */
  instanceName?: string;
  /** Whether the connection is encrypted */
  encrypt: boolean;
  /** Whether to trust the server certificate (for self-signed certs) */
  trustServerCertificate: boolean;
  /** Connection timeout in milliseconds */
  connectTimeout: number;
  /** Request timeout in milliseconds */
  requestTimeout: number;
  /** Application name for connection tracking */
  applicationName: string;
}

// ============================================================================
// Date Range Types
// ============================================================================

/**
 * Inclusive datetime range. `start <= end` always holds.
 */
export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

/**
 * One calendar-month slice of a {@link DateRange}.
 */
export interface MonthlyPeriod extends DateRange {
  /** 1-based ordinal of the period within its range */
  readonly index: number;
}

// ============================================================================
// Procedure Schema Types
// ============================================================================

/**
 * Parameter kinds understood by the binder.
 */
export type ParameterKind = 'temporal' | 'integer' | 'generic';

/**
 * Which bound of the period a temporal parameter receives.
 */
export type ParameterRole = 'start' | 'end' | 'other';

/**
 * Values a parameter can be bound to.
 */
export type ParameterValue = string | number | boolean | Date;

/**
 * Declared procedure parameter.
 */
export interface ParameterSpec {
  readonly name: string;
  readonly kind: ParameterKind;
  /** 1-based ordinal in the call */
  readonly position: number;
  readonly default?: ParameterValue;
  /** Explicit role tag; when absent temporal roles are inferred from the name */
  readonly role?: ParameterRole;
}

/**
 * Declarative description of one exportable procedure.
 */
export interface ProcedureSchema {
  /** Qualified routine name, e.g. `fato.ciclodetalhado` */
  readonly name: string;
  /** Parameters ordered by position */
  readonly parameters: readonly ParameterSpec[];
  /** Folder (relative to the export root) that receives the workbooks */
  readonly outputFolder: string;
  /** Table read in ranged-scan mode instead of calling the routine */
  readonly table?: string;
  /** Date column used by the ranged-scan predicate */
  readonly dateColumn?: string;
}

/**
 * A resolved argument, ready for execution.
 */
export interface BoundArgument {
  readonly name: string;
  readonly kind: ParameterKind;
  readonly position: number;
  readonly value: ParameterValue;
}

/**
 * Positional argument list, one entry per declared parameter.
 */
export type BoundArguments = readonly BoundArgument[];

/**
 * Caller-supplied values keyed by parameter name.
 */
export type ParameterOverrides = Readonly<Record<string, ParameterValue>>;

// ============================================================================
// Result Types
// ============================================================================

/**
 * Rectangular query result.
 */
export interface ResultSet {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly unknown[])[];
}

/**
 * A file produced for one non-empty period.
 */
export interface ArtifactDescriptor {
  readonly path: string;
  readonly procedure: string;
  readonly period: MonthlyPeriod;
  readonly rowCount: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * The result returned when a call produced no descriptor at all.
 */
export const EMPTY_RESULT_SET: ResultSet = Object.freeze({
  columns: Object.freeze([]),
  rows: Object.freeze([]),
});

/**
 * Whether a result set carries no rows.
 */
export function isEmptyResultSet(resultSet: ResultSet): boolean {
  return resultSet.rows.length === 0;
}

/**
 * Validates a connection configuration.
 *
 * @returns Array of validation error messages (empty if valid)
 */
export function validateConnectionConfig(config: ConnectionConfig): string[] {
  const errors: string[] = [];

  if (!config.host || config.host.trim().length === 0) {
    errors.push('Host is required');
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push('Port must be between 1 and 65535');
  }

  if (!config.database || config.database.trim().length === 0) {
    errors.push('Database name is required');
  }

  if (!config.username || config.username.trim().length === 0) {
    errors.push('Username is required');
  }

  if (!config.password) {
    errors.push('Password is required');
  }

  if (config.connectTimeout <= 0) {
    errors.push('Connect timeout must be positive');
  }

  if (config.requestTimeout <= 0) {
    errors.push('Request timeout must be positive');
  }

  return errors;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Default SQL Server port.
 */
export const DEFAULT_SQLSERVER_PORT = 1433;

/**
 * Default connection timeout (30 seconds).
 */
export const DEFAULT_CONNECT_TIMEOUT = 30000;

/**
 * Default request timeout. Monthly extracts can run long, so 10 minutes.
 */
export const DEFAULT_REQUEST_TIMEOUT = 600000;

/**
 * Default application name reported to the server.
 */
export const DEFAULT_APPLICATION_NAME = 'procedure-batch';

/**
 * Date column used by ranged scans when the schema names none.
 */
export const DEFAULT_DATE_COLUMN = 'Data';

/**
 * Maximum identifier length in SQL Server.
 */
export const SQLSERVER_IDENTIFIER_MAX_LENGTH = 128;
