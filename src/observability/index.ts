/**
 * Logging, counters and spans for the batch exporter.
 *
 * Every component takes an `Observability` container; production wiring logs
 * JSON lines to the console, tests swap in the in-memory recorders below.
 */

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  DEBUG = 10,
  INFO = 20,
  WARN = 30,
  ERROR = 40,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger whose entries carry `context` in addition to this one's */
  child(context: LogContext): Logger;
}

/**
 * Level methods shared by the concrete loggers; subclasses decide where an
 * entry goes.
 */
abstract class LevelledLogger implements Logger {
  protected readonly bound: LogContext;

  protected constructor(bound: LogContext) {
    this.bound = bound;
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, { ...this.bound, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, { ...this.bound, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, { ...this.bound, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, { ...this.bound, ...context });
  }

  abstract child(context: LogContext): Logger;

  protected abstract write(level: LogLevel, message: string, context: LogContext): void;
}

const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = new Set(['password', 'secret', 'token', 'connectionstring']);

function isPlainRecord(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy of `context` with sensitive keys masked, nested plain objects included.
 */
export function redactContext(context: LogContext): LogContext {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        return [key, REDACTED];
      }
      return [key, isPlainRecord(value) ? redactContext(value) : value];
    })
  );
}

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped (default: INFO) */
  level?: LogLevel;
  /** Fields added to every entry */
  context?: LogContext;
}

/**
 * Writes one JSON document per entry: `{ timestamp, level, message, context? }`.
 * Errors go to stderr through `console.error`, warnings through `console.warn`.
 */
export class ConsoleLogger extends LevelledLogger {
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options.context ?? {});
    this.level = options.level ?? LogLevel.INFO;
  }

  override child(context: LogContext): Logger {
    return new ConsoleLogger({ level: this.level, context: { ...this.bound, ...context } });
  }

  protected override write(level: LogLevel, message: string, context: LogContext): void {
    if (level < this.level) {
      return;
    }
    const redacted = redactContext(context);
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(redacted).length > 0 ? { context: redacted } : {}),
    });

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * Keeps entries in memory. Children append to their parent's list.
 */
export class InMemoryLogger extends LevelledLogger {
  private readonly entries: LogEntry[];

  constructor(context: LogContext = {}, entries: LogEntry[] = []) {
    super(context);
    this.entries = entries;
  }

  override child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.bound, ...context }, this.entries);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(entry => entry.level === level);
  }

  protected override write(level: LogLevel, message: string, context: LogContext): void {
    this.entries.push({ level, message, context, timestamp: new Date() });
  }
}

// ============================================================================
// Metrics
// ============================================================================

export const MetricNames = {
  QUERIES_TOTAL: 'batch_queries_total',
  QUERY_DURATION_SECONDS: 'batch_query_duration_seconds',
  ROWS_RETURNED_TOTAL: 'batch_rows_returned_total',
  LITERAL_FALLBACKS_TOTAL: 'batch_literal_fallbacks_total',
  SESSION_ACQUIRE_DURATION_SECONDS: 'batch_session_acquire_duration_seconds',
  PERIODS_TOTAL: 'batch_periods_total',
  ARTIFACTS_TOTAL: 'batch_artifacts_total',
  ERRORS_TOTAL: 'batch_errors_total',
} as const;

export type MetricTags = Record<string, string>;

export interface MetricsCollector {
  /** Adds `value` (default 1) to a counter */
  increment(name: string, value?: number, tags?: MetricTags): void;
  /** Records one observation of a duration */
  timing(name: string, value: number, tags?: MetricTags): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * `name{a=1,b=2}` with tags in key order, so tag order never splits a series.
 */
function seriesKey(name: string, tags: MetricTags = {}): string {
  const pairs = Object.keys(tags)
    .sort()
    .map(key => `${key}=${tags[key] ?? ''}`);
  return pairs.length === 0 ? name : `${name}{${pairs.join(',')}}`;
}

export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly timings = new Map<string, number[]>();

  increment(name: string, value = 1, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, value: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    const series = this.timings.get(key);
    if (series) {
      series.push(value);
    } else {
      this.timings.set(key, [value]);
    }
  }

  getCounter(name: string, tags?: MetricTags): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  /** Observations of one timing series, in recording order */
  getTimings(name: string, tags?: MetricTags): number[] {
    return [...(this.timings.get(seriesKey(name, tags)) ?? [])];
  }
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanStatus = 'OK' | 'ERROR' | 'UNSET';

export type SpanAttribute = string | number | boolean;

export interface SpanContext {
  setStatus(status: SpanStatus, message?: string): void;
  setAttribute(key: string, value: SpanAttribute): void;
  recordEvent(name: string, attributes?: Record<string, unknown>): void;
  /** Marks the span failed with the error's message */
  recordException(error: Error): void;
}

export interface Tracer {
  /**
   * Runs `fn` inside a span. The span ends when `fn` settles; a rejection is
   * recorded on it and rethrown.
   */
  withSpan<T>(
    name: string,
    fn: (span: SpanContext) => T | Promise<T>,
    attributes?: Record<string, SpanAttribute>
  ): Promise<T>;
}

const NOOP_SPAN: SpanContext = {
  setStatus: () => {},
  setAttribute: () => {},
  recordEvent: () => {},
  recordException: () => {},
};

export class NoopTracer implements Tracer {
  async withSpan<T>(_name: string, fn: (span: SpanContext) => T | Promise<T>): Promise<T> {
    return fn(NOOP_SPAN);
  }
}

export interface SpanEvent {
  name: string;
  attributes?: Record<string, unknown>;
}

/**
 * A span kept by {@link InMemoryTracer}.
 */
export class RecordedSpan implements SpanContext {
  readonly name: string;
  readonly attributes: Record<string, SpanAttribute>;
  readonly events: SpanEvent[] = [];
  status: SpanStatus = 'UNSET';
  statusMessage?: string;
  endTime?: Date;

  constructor(name: string, attributes: Record<string, SpanAttribute> = {}) {
    this.name = name;
    this.attributes = { ...attributes };
  }

  setStatus(status: SpanStatus, message?: string): void {
    this.status = status;
    this.statusMessage = message;
  }

  setAttribute(key: string, value: SpanAttribute): void {
    this.attributes[key] = value;
  }

  recordEvent(name: string, attributes?: Record<string, unknown>): void {
    this.events.push(attributes ? { name, attributes } : { name });
  }

  recordException(error: Error): void {
    this.setStatus('ERROR', error.message);
  }

  finish(): void {
    this.endTime = new Date();
  }
}

export class InMemoryTracer implements Tracer {
  private readonly spans: RecordedSpan[] = [];

  async withSpan<T>(
    name: string,
    fn: (span: SpanContext) => T | Promise<T>,
    attributes?: Record<string, SpanAttribute>
  ): Promise<T> {
    const span = new RecordedSpan(name, attributes);
    this.spans.push(span);
    try {
      const result = await fn(span);
      if (span.status === 'UNSET') {
        span.setStatus('OK');
      }
      return result;
    } catch (error) {
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.finish();
    }
  }

  getSpans(): RecordedSpan[] {
    return [...this.spans];
  }

  getSpansByName(name: string): RecordedSpan[] {
    return this.spans.filter(span => span.name === name);
  }
}

// ============================================================================
// Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
  tracer: Tracer;
}

export function createNoopObservability(): Observability {
  return { logger: new NoopLogger(), metrics: new NoopMetricsCollector(), tracer: new NoopTracer() };
}

/**
 * Recorders whose contents tests can inspect.
 */
export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
  tracer: InMemoryTracer;
} {
  return { logger: new InMemoryLogger(), metrics: new InMemoryMetricsCollector(), tracer: new InMemoryTracer() };
}

/**
 * JSON-line console logging; metrics and spans are not exported anywhere.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return { logger: new ConsoleLogger({ level }), metrics: new NoopMetricsCollector(), tracer: new NoopTracer() };
}
