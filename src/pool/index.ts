/**
 * Scoped SQL Server sessions on the mssql driver.
 *
 * Each acquire opens a single-connection pool so that session settings such
 * as `SET NOCOUNT ON` stay on the connection that runs the query. Release
 * closes it.
 *
 * @module pool
 */

import mssql from 'mssql';
import type { ConnectionPool, ISqlType, config as MssqlConfig } from 'mssql';
import type { ConnectionConfig } from '../types/index.js';
import { describeServer } from '../config/index.js';
import { ConnectionFailedError, errorMessage, parseDriverError } from '../errors/index.js';
import { MetricNames } from '../observability/index.js';
import type { Observability } from '../observability/index.js';

// ============================================================================
// Session Types
// ============================================================================

/**
 * Driver types used for bound parameters.
 */
export type SqlParameterType = 'varchar' | 'nvarchar' | 'int' | 'float' | 'bit';

/**
 * A typed, named query parameter (referenced as `@name` in the SQL text).
 */
export interface SqlParameter {
  name: string;
  type: SqlParameterType;
  value: string | number | boolean;
}

/**
 * Raw outcome of a query.
 *
 * `columns` is undefined when the statement produced no result descriptor.
 */
export interface RawQueryResult {
  columns?: readonly string[];
  rows: readonly (readonly unknown[])[];
}

/**
 * A connection held for the duration of one executor invocation.
 */
export interface SqlSession {
  /** Unique session identifier */
  readonly id: string;
  /** Suppresses row-count messages for the rest of the session */
  disableRowCounts(): Promise<void>;
  /** Runs a batch and returns its first result set */
  query(text: string, params?: readonly SqlParameter[]): Promise<RawQueryResult>;
}

/**
 * Source of sessions.
 */
export interface SessionProvider {
  acquire(): Promise<SqlSession>;
  release(session: SqlSession): Promise<void>;
}

// ============================================================================
// mssql Adapter
// ============================================================================

/**
 * Converts ConnectionConfig to mssql configuration.
 */
export function toMssqlConfig(config: ConnectionConfig): MssqlConfig {
  const mssqlConfig: MssqlConfig = {
    server: config.host,
    database: config.database,
    user: config.username,
    password: config.password,
    connectionTimeout: config.connectTimeout,
    requestTimeout: config.requestTimeout,
    pool: { min: 0, max: 1 },
    options: {
      encrypt: config.encrypt,
      trustServerCertificate: config.trustServerCertificate,
      enableArithAbort: true,
      appName: config.applicationName,
    },
  };

  // Named instances are resolved through the browser service, not a fixed port
  if (config.instanceName) {
    mssqlConfig.options = { ...mssqlConfig.options, instanceName: config.instanceName };
  } else {
    mssqlConfig.port = config.port;
  }

  return mssqlConfig;
}

function sqlTypeFor(type: SqlParameterType): ISqlType | (() => ISqlType) {
  switch (type) {
    case 'varchar':
      return mssql.VarChar(mssql.MAX);
    case 'nvarchar':
      return mssql.NVarChar(mssql.MAX);
    case 'int':
      return mssql.Int;
    case 'float':
      return mssql.Float;
    case 'bit':
      return mssql.Bit;
  }
}

interface ColumnMetadata {
  index: number;
  name: string;
}

function isColumnMetadata(value: unknown): value is ColumnMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'index' in value &&
    typeof value.index === 'number'
  );
}

/**
 * Builds a raw result from an `arrayRowMode` response: `recordset` holds one
 * array per row, and `columns` one metadata array per result set. Columns are
 * read by position, so repeated names (`SELECT a.id, b.id`) are all kept.
 */
export function toRawQueryResult(recordset: unknown, columns: unknown): RawQueryResult {
  if (!Array.isArray(recordset)) {
    return { rows: [] };
  }
  const rows = recordset.map((row: unknown) => (Array.isArray(row) ? Array.from<unknown>(row) : []));
  const metadata: unknown = Array.isArray(columns) ? columns[0] : undefined;
  if (!Array.isArray(metadata)) {
    return { rows };
  }
  return {
    columns: metadata
      .filter(isColumnMetadata)
      .sort((a, b) => a.index - b.index)
      .map(column => column.name),
    rows,
  };
}

/**
 * Session backed by a dedicated mssql connection pool.
 */
class MssqlSession implements SqlSession {
  readonly id: string;
  private readonly pool: ConnectionPool;
  private readonly target: string;
  private rowCountsDisabled = false;

  constructor(id: string, pool: ConnectionPool, target: string) {
    this.id = id;
    this.pool = pool;
    this.target = target;
  }

  get connectionPool(): ConnectionPool {
    return this.pool;
  }

  async disableRowCounts(): Promise<void> {
    try {
      await this.pool.request().batch('SET NOCOUNT ON');
    } catch (error) {
      throw parseDriverError(error, this.target);
    }
    this.rowCountsDisabled = true;
  }

  async query(text: string, params: readonly SqlParameter[] = []): Promise<RawQueryResult> {
    const request = this.pool.request();
    request.arrayRowMode = true;
    for (const param of params) {
      request.input(param.name, sqlTypeFor(param.type), param.value);
    }

    // Repeated per batch in case the driver hands back a reset connection
    const batch = this.rowCountsDisabled ? `SET NOCOUNT ON;\n${text}` : text;

    try {
      const result = await request.query(batch);
      return toRawQueryResult(result.recordset, 'columns' in result ? result.columns : undefined);
    } catch (error) {
      throw parseDriverError(error, this.target);
    }
  }
}

/**
 * Opens and closes SQL Server sessions from an explicit configuration.
 */
export class MssqlConnectionProvider implements SessionProvider {
  private readonly config: ConnectionConfig;
  private readonly observability: Observability;
  private readonly sessions: Map<string, MssqlSession>;
  private nextSessionId: number;

  /**
   * Creates a new provider.
   *
   * @param config - Connection configuration
   * @param observability - Observability components (logger, metrics, tracer)
   */
  constructor(config: ConnectionConfig, observability: Observability) {
    this.config = config;
    this.observability = observability;
    this.sessions = new Map();
    this.nextSessionId = 1;
  }

  /**
   * Opens a session.
   *
   * @throws {ConnectionFailedError} If the server cannot be reached or rejects the login
   */
  async acquire(): Promise<SqlSession> {
    const target = describeServer(this.config);
    const startTime = Date.now();
    const pool = new mssql.ConnectionPool(toMssqlConfig(this.config));

    pool.on('error', (err: Error) => {
      this.observability.logger.error('Unexpected connection error', { error: err.message, target });
      this.observability.metrics.increment(MetricNames.ERRORS_TOTAL, 1, { type: 'pool_error' });
    });

    try {
      await pool.connect();
    } catch (error) {
      this.observability.logger.error('Failed to connect', { target, error: errorMessage(error) });
      this.observability.metrics.increment(MetricNames.ERRORS_TOTAL, 1, { type: 'connect_failed' });
      const parsed = parseDriverError(error, target);
      if (parsed instanceof ConnectionFailedError) {
        throw parsed;
      }
      throw new ConnectionFailedError(target, error instanceof Error ? error : undefined);
    }

    const latencyMs = Date.now() - startTime;
    this.observability.metrics.timing(MetricNames.SESSION_ACQUIRE_DURATION_SECONDS, latencyMs / 1000);

    const session = new MssqlSession(`session_${this.nextSessionId++}`, pool, target);
    this.sessions.set(session.id, session);

    this.observability.logger.debug('Opened session', { sessionId: session.id, target, latencyMs });
    return session;
  }

  /**
   * Closes a session. Close failures are logged, never thrown.
   */
  async release(session: SqlSession): Promise<void> {
    const tracked = this.sessions.get(session.id);
    if (!tracked) {
      return;
    }
    this.sessions.delete(session.id);

    try {
      await tracked.connectionPool.close();
      this.observability.logger.debug('Closed session', { sessionId: session.id });
    } catch (error) {
      this.observability.logger.warn('Error closing session', {
        sessionId: session.id,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Executes a function with an automatically managed session.
   */
  async withSession<T>(fn: (session: SqlSession) => Promise<T>): Promise<T> {
    const session = await this.acquire();
    try {
      return await fn(session);
    } finally {
      await this.release(session);
    }
  }

  /**
   * Opens a session and runs `SELECT 1`.
   *
   * @throws {ConnectionFailedError} If the server cannot be reached
   */
  async testConnection(): Promise<void> {
    await this.withSession(async session => {
      await session.query('SELECT 1 AS ok');
    });
    this.observability.logger.info('Connection test succeeded', { target: describeServer(this.config) });
  }

  /**
   * Number of sessions currently open.
   */
  get openSessions(): number {
    return this.sessions.size;
  }
}
