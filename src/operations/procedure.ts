/**
 * Resilient routine execution.
 *
 * Every invocation makes a bound attempt with typed parameters and, if that
 * raises a non-fatal error, one literal attempt with the values inlined.
 * Connection failures propagate untouched.
 *
 * @module operations/procedure
 */

import type { BoundArguments, DateRange, ResultSet } from '../types/index.js';
import { EMPTY_RESULT_SET } from '../types/index.js';
import {
  BatchError,
  FallbackExhaustedError,
  errorMessage,
  isFatalError,
  parseDriverError,
} from '../errors/index.js';
import type { Observability, SpanContext } from '../observability/index.js';
import { MetricNames } from '../observability/index.js';
import type { RawQueryResult, SqlSession } from '../pool/index.js';
import type { Statement } from './statements.js';
import {
  buildBoundCall,
  buildBoundRangeQuery,
  buildLiteralCall,
  buildLiteralRangeQuery,
  quoteIdentifier,
} from './statements.js';

/**
 * How an invocation reaches its data.
 */
export type ExecutionMode = 'routine' | 'range';

/**
 * Which attempt produced a result.
 */
export type ExecutionAttempt = 'bound' | 'literal';

/**
 * Routine executor with a literal fallback and observability.
 */
export class ProcedureExecutor {
  private readonly getSession: () => Promise<SqlSession>;
  private readonly releaseSession: (session: SqlSession) => Promise<void>;
  private readonly observability: Observability;

  /**
   * Creates a new ProcedureExecutor.
   *
   * @param getSession - Function that opens a session
   * @param releaseSession - Function that closes it again
   * @param observability - Observability container for logging, metrics, and tracing
   */
  constructor(
    getSession: () => Promise<SqlSession>,
    releaseSession: (session: SqlSession) => Promise<void>,
    observability: Observability
  ) {
    this.getSession = getSession;
    this.releaseSession = releaseSession;
    this.observability = observability;
  }

  /**
   * Calls a stored routine with positional arguments.
   *
   * @param routine - Qualified routine name, e.g. `fato.ciclodetalhado`
   * @param args - Bound arguments in position order
   * @returns The first result set, or an empty one when the routine returns none
   * @throws {InvalidObjectNameError} If the routine name is not a plain identifier
   * @throws {UnsafeLiteralError} If the fallback would have to inline a refused value
   * @throws {FallbackExhaustedError} If both attempts fail
   * @throws {ConnectionFailedError} If the session cannot be opened or is lost
   */
  async executeRoutine(routine: string, args: BoundArguments): Promise<ResultSet> {
    return this.run(
      'routine',
      routine,
      [routine],
      () => buildBoundCall(routine, args),
      () => buildLiteralCall(routine, args),
      { argument_count: args.length }
    );
  }

  /**
   * Reads the rows of a table whose date column lies within a period.
   *
   * The end bound is sent to the second (`…23:59:59`). A `datetime` column
   * rounds to that anyway; on a `datetime2` column, rows stamped within the
   * last second of the period fall outside the scan.
   *
   * @param table - Qualified table name
   * @param dateColumn - Column compared against the period bounds
   * @param period - Inclusive bounds
   */
  async executeRange(table: string, dateColumn: string, period: DateRange): Promise<ResultSet> {
    return this.run(
      'range',
      table,
      [table, dateColumn],
      () => buildBoundRangeQuery(table, dateColumn, period),
      () => buildLiteralRangeQuery(table, dateColumn, period),
      { date_column: dateColumn }
    );
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private async run(
    mode: ExecutionMode,
    target: string,
    identifiers: readonly string[],
    bound: () => Statement,
    literal: () => Statement,
    attributes: Record<string, string | number>
  ): Promise<ResultSet> {
    return this.observability.tracer.withSpan(
      `batch.executor.${mode}`,
      async (span: SpanContext) => {
        const startTime = Date.now();
        let session: SqlSession | undefined;

        span.setAttribute('target', target);
        span.setAttribute('mode', mode);
        for (const [key, value] of Object.entries(attributes)) {
          span.setAttribute(key, value);
        }

        try {
          // Names are checked before a session is opened.
          for (const identifier of identifiers) {
            quoteIdentifier(identifier);
          }
          session = await this.getSession();
          await session.disableRowCounts();

          const { raw, attempt } = await this.attempt(session, mode, target, bound, literal, span);
          const result = toResultSet(raw);
          const duration = Date.now() - startTime;

          this.recordMetrics(mode, attempt, result, duration, span);
          this.observability.logger.debug('Execution finished', {
            target,
            mode,
            attempt,
            rowCount: result.rows.length,
            duration,
          });

          span.setStatus('OK');
          return result;
        } catch (error) {
          const wrapped = parseDriverError(error, target);
          const duration = Date.now() - startTime;
          span.recordException(wrapped);
          span.setAttribute('duration_ms', duration);

          this.observability.metrics.increment(MetricNames.ERRORS_TOTAL, 1, {
            error_type: wrapped.code,
            mode,
          });
          this.observability.logger.error('Execution failed', {
            target,
            mode,
            error: wrapped.message,
            duration,
          });

          throw wrapped;
        } finally {
          if (session) {
            await this.releaseSession(session);
          }
        }
      }
    );
  }

  private async attempt(
    session: SqlSession,
    mode: ExecutionMode,
    target: string,
    bound: () => Statement,
    literal: () => Statement,
    span: SpanContext
  ): Promise<{ raw: RawQueryResult; attempt: ExecutionAttempt }> {
    const boundStatement = bound();
    this.observability.logger.info('Executing', { target, mode, attempt: 'bound' });
    this.observability.logger.debug('Bound statement', {
      sql: boundStatement.text,
      params: boundStatement.params.map(param => ({ name: param.name, type: param.type, value: param.value })),
    });

    let boundError: BatchError;
    try {
      return { raw: await session.query(boundStatement.text, boundStatement.params), attempt: 'bound' };
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      boundError = parseDriverError(error, target);
      if (isFatalError(boundError)) {
        throw boundError;
      }
    }

    this.observability.metrics.increment(MetricNames.LITERAL_FALLBACKS_TOTAL, 1, { mode });
    span.recordEvent('literal_fallback', { reason: boundError.message });
    this.observability.logger.warn('Bound execution failed, retrying with literal arguments', {
      target,
      mode,
      error: boundError.message,
    });

    // Refused values end the fallback before anything is sent
    const literalStatement = literal();
    this.observability.logger.debug('Literal statement', { sql: literalStatement.text });

    try {
      return { raw: await session.query(literalStatement.text), attempt: 'literal' };
    } catch (error) {
      const literalError = parseDriverError(error, target);
      if (isFatalError(literalError)) {
        throw literalError;
      }
      throw new FallbackExhaustedError(target, boundError, literalError);
    }
  }

  private recordMetrics(
    mode: ExecutionMode,
    attempt: ExecutionAttempt,
    result: ResultSet,
    duration: number,
    span: SpanContext
  ): void {
    this.observability.metrics.increment(MetricNames.QUERIES_TOTAL, 1, { mode, attempt });
    this.observability.metrics.timing(MetricNames.QUERY_DURATION_SECONDS, duration / 1000, { mode });
    this.observability.metrics.increment(MetricNames.ROWS_RETURNED_TOTAL, result.rows.length, { mode });

    span.setAttribute('attempt', attempt);
    span.setAttribute('duration_ms', duration);
    span.setAttribute('row_count', result.rows.length);
  }
}

/**
 * Normalises a raw result. A statement without a result descriptor yields
 * the empty result set; a descriptor with no rows keeps its columns.
 */
export function toResultSet(raw: RawQueryResult): ResultSet {
  if (raw.columns === undefined) {
    return EMPTY_RESULT_SET;
  }
  return { columns: [...raw.columns], rows: raw.rows.map(row => [...row]) };
}

/**
 * Message for logging an execution failure with its bound-attempt cause.
 */
export function describeExecutionFailure(error: unknown): string {
  if (error instanceof FallbackExhaustedError) {
    return `${error.message} (bound attempt: ${error.boundError.message})`;
  }
  return errorMessage(error);
}
