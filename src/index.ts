/**
 * Monthly procedure batch exporter.
 *
 * Runs configured SQL Server routines (or ranged table scans) over a date
 * range one calendar month at a time and exports every non-empty month to
 * an Excel workbook.
 *
 * @module procedure-batch
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
  ConnectionConfig,
  DateRange,
  MonthlyPeriod,
  ParameterKind,
  ParameterRole,
  ParameterValue,
  ParameterSpec,
  ProcedureSchema,
  BoundArgument,
  BoundArguments,
  ParameterOverrides,
  ResultSet,
  ArtifactDescriptor,
} from './types/index.js';

export {
  EMPTY_RESULT_SET,
  isEmptyResultSet,
  validateConnectionConfig,
  DEFAULT_SQLSERVER_PORT,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_APPLICATION_NAME,
  DEFAULT_DATE_COLUMN,
  SQLSERVER_IDENTIFIER_MAX_LENGTH,
} from './types/index.js';

// ============================================================================
// Error Exports
// ============================================================================

export {
  BatchErrorCode,
  SqlServerErrorNumber,
  BatchError,
  ConfigurationError,
  ConnectionFailedError,
  InvalidRangeError,
  InvalidDateError,
  ParameterError,
  MissingParameterError,
  ParameterTypeError,
  UnresolvedParameterError,
  ExecutionError,
  QueryTimeoutError,
  FallbackExhaustedError,
  UnsafeLiteralError,
  InvalidObjectNameError,
  ExportError,
  parseDriverError,
  isBatchError,
  isFatalError,
  errorMessage,
} from './errors/index.js';

// ============================================================================
// Configuration Exports
// ============================================================================

export {
  createDefaultConnectionConfig,
  assertValidConnectionConfig,
  createConfigFromEnv,
  parseServerAddress,
  describeServer,
  redactConfig,
} from './config/index.js';
export type { ServerAddress, ConnectionEnv } from './config/index.js';

export {
  ProcedureCatalog,
  DEFAULT_CATALOG_PATH,
  loadProcedureCatalog,
  parseProcedureCatalog,
} from './config/procedures.js';

// ============================================================================
// Batch Exports
// ============================================================================

export {
  createDateRange,
  splitMonthly,
  parseDateString,
  endOfDay,
  formatYearMonth,
  formatSqlDate,
  formatSqlDateTime,
  formatDisplayDate,
} from './batch/date-range.js';

export { bindParameters, temporalRole, toInteger } from './batch/parameter-binder.js';

export { BatchOrchestrator } from './batch/orchestrator.js';
export type { BatchOrchestratorOptions } from './batch/orchestrator.js';

// ============================================================================
// Session Exports
// ============================================================================

export { MssqlConnectionProvider, toMssqlConfig, toRawQueryResult } from './pool/index.js';
export type {
  SqlParameterType,
  SqlParameter,
  RawQueryResult,
  SqlSession,
  SessionProvider,
} from './pool/index.js';

export {
  ScriptedSessionProvider,
  rows,
  noResultSet,
  driverError,
} from './simulation/index.js';
export type { RecordedQuery, ScriptedResponse } from './simulation/index.js';

// ============================================================================
// Execution Exports
// ============================================================================

export { ProcedureExecutor, toResultSet, describeExecutionFailure } from './operations/procedure.js';
export type { ExecutionMode, ExecutionAttempt } from './operations/procedure.js';

export {
  quoteIdentifier,
  quoteLiteral,
  toSqlParameter,
  buildBoundCall,
  buildLiteralCall,
  buildBoundRangeQuery,
  buildLiteralRangeQuery,
} from './operations/statements.js';
export type { Statement } from './operations/statements.js';

export { RoutineCatalog, kindForType } from './operations/catalog.js';
export type { RoutineParameter } from './operations/catalog.js';

// ============================================================================
// Export Exports
// ============================================================================

export {
  ExcelExporter,
  DEFAULT_OUTPUT_DIR,
  MAX_SHEET_NAME_LENGTH,
  toSheetName,
  toCellValue,
} from './export/excel.js';
export type {
  ExportDestination,
  SheetData,
  TabularExporter,
  ExcelExporterOptions,
} from './export/excel.js';

// ============================================================================
// Observability Exports
// ============================================================================

export {
  // Logger
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  redactContext,

  // Metrics
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,

  // Tracer
  NoopTracer,
  RecordedSpan,
  InMemoryTracer,

  // Observability container
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';
export type {
  Logger,
  LogContext,
  LogEntry,
  ConsoleLoggerOptions,
  MetricsCollector,
  MetricTags,
  SpanStatus,
  SpanAttribute,
  SpanContext,
  SpanEvent,
  Tracer,
  Observability,
} from './observability/index.js';

// ============================================================================
// Factory
// ============================================================================

import type { ConnectionConfig } from './types/index.js';
import type { ProcedureCatalog } from './config/procedures.js';
import type { Observability } from './observability/index.js';
import type { SessionProvider, SqlSession } from './pool/index.js';
import { ConfigurationError } from './errors/index.js';
import { assertValidConnectionConfig } from './config/index.js';
import { MssqlConnectionProvider } from './pool/index.js';
import { ProcedureExecutor } from './operations/procedure.js';
import { RoutineCatalog } from './operations/catalog.js';
import { ExcelExporter } from './export/excel.js';
import { BatchOrchestrator } from './batch/orchestrator.js';
import { createConsoleObservability } from './observability/index.js';

/**
 * Options for {@link createProcedureBatch}.
 */
export interface ProcedureBatchOptions {
  /** Procedure catalog */
  catalog: ProcedureCatalog;
  /** Connection settings; ignored when `provider` is given */
  connection?: ConnectionConfig;
  /** Session source (defaults to an mssql provider built from `connection`) */
  provider?: SessionProvider;
  /** Export root (default: `output`) */
  outputDir?: string;
  /** Observability components (optional, defaults to console logging at INFO) */
  observability?: Observability;
}

/**
 * Wired components of a batch run.
 */
export interface ProcedureBatch {
  orchestrator: BatchOrchestrator;
  executor: ProcedureExecutor;
  routines: RoutineCatalog;
  exporter: ExcelExporter;
  provider: SessionProvider;
  observability: Observability;
}

/**
 * Wires provider, executor, exporter and orchestrator together.
 *
 * @throws {ConfigurationError} If neither a provider nor a valid connection is given
 */
export function createProcedureBatch(options: ProcedureBatchOptions): ProcedureBatch {
  const observability = options.observability ?? createConsoleObservability();

  let provider: SessionProvider;
  if (options.provider) {
    provider = options.provider;
  } else {
    if (!options.connection) {
      throw new ConfigurationError('a connection configuration or a session provider is required');
    }
    assertValidConnectionConfig(options.connection);
    provider = new MssqlConnectionProvider(options.connection, observability);
  }

  const acquire = () => provider.acquire();
  const release = (session: SqlSession) => provider.release(session);

  const executor = new ProcedureExecutor(acquire, release, observability);
  const routines = new RoutineCatalog(acquire, release, observability);
  const exporter = new ExcelExporter({ baseDir: options.outputDir, observability });
  const orchestrator = new BatchOrchestrator({ catalog: options.catalog, executor, exporter, observability });

  return { orchestrator, executor, routines, exporter, provider, observability };
}
