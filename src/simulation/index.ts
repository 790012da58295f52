/**
 * Scripted in-process sessions.
 *
 * Stands in for SQL Server in tests and dry runs: queries are answered from
 * a queue of scripted responses and every interaction is recorded.
 *
 * @module simulation
 */

import type { RawQueryResult, SessionProvider, SqlParameter, SqlSession } from '../pool/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A query received by a scripted session.
 */
export interface RecordedQuery {
  /** Session that received the query */
  sessionId: string;
  /** SQL text */
  text: string;
  /** Bound parameters */
  params: readonly SqlParameter[];
  /** Whether row counts were disabled when the query arrived */
  rowCountsDisabled: boolean;
}

/**
 * Answer to a query: a result, an error to throw, or a function of the query.
 */
export type ScriptedResponse =
  | RawQueryResult
  | Error
  | ((query: RecordedQuery) => RawQueryResult | Error);

/**
 * Builds a raw result with a column descriptor.
 */
export function rows(columns: readonly string[], data: readonly (readonly unknown[])[] = []): RawQueryResult {
  return { columns, rows: data };
}

/**
 * A statement that produced no result descriptor at all.
 */
export function noResultSet(): RawQueryResult {
  return { rows: [] };
}

/**
 * An error carrying driver fields, as thrown by mssql.
 */
export function driverError(message: string, fields: { code?: string; number?: number } = {}): Error {
  return Object.assign(new Error(message), fields);
}

// ============================================================================
// Scripted Session
// ============================================================================

class ScriptedSession implements SqlSession {
  readonly id: string;
  private readonly provider: ScriptedSessionProvider;
  rowCountsDisabled = false;

  constructor(id: string, provider: ScriptedSessionProvider) {
    this.id = id;
    this.provider = provider;
  }

  async disableRowCounts(): Promise<void> {
    this.rowCountsDisabled = true;
  }

  async query(text: string, params: readonly SqlParameter[] = []): Promise<RawQueryResult> {
    const recorded: RecordedQuery = {
      sessionId: this.id,
      text,
      params: [...params],
      rowCountsDisabled: this.rowCountsDisabled,
    };
    return this.provider.answer(recorded);
  }
}

/**
 * Session provider that answers from scripted responses.
 *
 * Queued responses are consumed first, in order; once the queue is empty the
 * fallback handler answers. With neither, a query fails.
 */
export class ScriptedSessionProvider implements SessionProvider {
  private readonly queue: ScriptedResponse[] = [];
  private readonly recorded: RecordedQuery[] = [];
  private readonly open: Set<string> = new Set();
  private handler?: (query: RecordedQuery) => RawQueryResult | Error;
  private acquireError?: Error;
  private nextSessionId = 1;

  /** Number of sessions opened */
  acquireCount = 0;
  /** Number of sessions closed */
  releaseCount = 0;

  /**
   * Queues responses, answered in order.
   */
  enqueue(...responses: ScriptedResponse[]): this {
    this.queue.push(...responses);
    return this;
  }

  /**
   * Sets the handler for queries arriving after the queue runs dry.
   */
  respondWith(handler: (query: RecordedQuery) => RawQueryResult | Error): this {
    this.handler = handler;
    return this;
  }

  /**
   * Makes every following acquire fail with the given error.
   */
  failAcquire(error: Error): this {
    this.acquireError = error;
    return this;
  }

  async acquire(): Promise<SqlSession> {
    if (this.acquireError) {
      throw this.acquireError;
    }
    this.acquireCount += 1;
    const session = new ScriptedSession(`scripted_${this.nextSessionId++}`, this);
    this.open.add(session.id);
    return session;
  }

  async release(session: SqlSession): Promise<void> {
    if (this.open.delete(session.id)) {
      this.releaseCount += 1;
    }
  }

  /** @internal */
  answer(query: RecordedQuery): RawQueryResult {
    this.recorded.push(query);

    const next = this.queue.shift();
    const response = next ?? this.handler;
    if (response === undefined) {
      throw new Error(`No scripted response for query: ${query.text}`);
    }

    const outcome = typeof response === 'function' ? response(query) : response;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  /** Gets all queries received so far */
  getQueries(): RecordedQuery[] {
    return [...this.recorded];
  }

  /** Number of sessions acquired and not yet released */
  get openSessions(): number {
    return this.open.size;
  }
}
