/**
 * SQL text for the two execution attempts.
 *
 * The bound form passes every value as a typed parameter. The literal form
 * inlines values and only accepts those that survive {@link quoteLiteral}.
 *
 * @module operations/statements
 */

import type { BoundArguments, DateRange, ParameterValue } from '../types/index.js';
import { SQLSERVER_IDENTIFIER_MAX_LENGTH } from '../types/index.js';
import { InvalidObjectNameError, UnsafeLiteralError } from '../errors/index.js';
import { formatSqlDate, formatSqlDateTime } from '../batch/date-range.js';
import type { SqlParameter } from '../pool/index.js';

/**
 * A statement ready to send to a session.
 */
export interface Statement {
  text: string;
  params: SqlParameter[];
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Latin-1 letters, digits, space and _-.,:/@'
const SAFE_LITERAL_PATTERN = /^[A-Za-z0-9À-ÿ _\-.,:/@']*$/;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Validates a (possibly qualified) object name and bracket-quotes each part.
 *
 * @example quoteIdentifier('fato.ciclodetalhado') // '[fato].[ciclodetalhado]'
 * @throws {InvalidObjectNameError} If any part is not a plain identifier
 */
export function quoteIdentifier(name: string): string {
  const parts = name.split('.');
  if (parts.length > 3) {
    throw new InvalidObjectNameError(name, 'at most three name parts are allowed');
  }
  return parts
    .map(part => {
      if (part.length === 0) {
        throw new InvalidObjectNameError(name, 'empty name part');
      }
      if (part.length > SQLSERVER_IDENTIFIER_MAX_LENGTH) {
        throw new InvalidObjectNameError(name, `name part exceeds ${SQLSERVER_IDENTIFIER_MAX_LENGTH} characters`);
      }
      if (!IDENTIFIER_PATTERN.test(part)) {
        throw new InvalidObjectNameError(name, `'${part}' is not a plain identifier`);
      }
      return `[${part}]`;
    })
    .join('.');
}

// ============================================================================
// Values
// ============================================================================

/**
 * Maps an argument value onto a typed driver parameter.
 *
 * Dates travel pre-formatted as `YYYYMMDD HH:MM:SS` strings.
 */
export function toSqlParameter(name: string, value: ParameterValue): SqlParameter {
  if (value instanceof Date) {
    return { name, type: 'varchar', value: formatSqlDateTime(value) };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
      ? { name, type: 'int', value }
      : { name, type: 'float', value };
  }
  if (typeof value === 'boolean') {
    return { name, type: 'bit', value };
  }
  return { name, type: 'nvarchar', value };
}

/**
 * Renders a value as a SQL literal for the fallback call.
 *
 * Dates become `'YYYYMMDD'`, strings are single-quoted with embedded quotes
 * doubled, numbers are written verbatim and booleans become 1/0.
 *
 * @param parameter - Parameter name, reported when the value is refused
 * @throws {UnsafeLiteralError} For strings outside the allowed character set and non-finite numbers
 */
export function quoteLiteral(parameter: string, value: ParameterValue): string {
  if (value instanceof Date) {
    return `'${formatSqlDate(value)}'`;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new UnsafeLiteralError(parameter);
    }
    return String(value);
  }
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  if (!SAFE_LITERAL_PATTERN.test(value)) {
    throw new UnsafeLiteralError(parameter);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

// ============================================================================
// Routine Calls
// ============================================================================

/**
 * `EXEC [schema].[routine] @p1, @p2, ...` with typed parameters.
 */
export function buildBoundCall(routine: string, args: BoundArguments): Statement {
  const target = quoteIdentifier(routine);
  const params = args.map((arg, index) => toSqlParameter(`p${index + 1}`, arg.value));
  const placeholders = params.map(param => `@${param.name}`).join(', ');
  return {
    text: placeholders ? `EXEC ${target} ${placeholders}` : `EXEC ${target}`,
    params,
  };
}

/**
 * `EXEC [schema].[routine] '20250101', '20250131', 5` with inlined values.
 *
 * @throws {UnsafeLiteralError} If any value is refused
 */
export function buildLiteralCall(routine: string, args: BoundArguments): Statement {
  const target = quoteIdentifier(routine);
  const literals = args.map(arg => quoteLiteral(arg.name, arg.value)).join(', ');
  return {
    text: literals ? `EXEC ${target} ${literals}` : `EXEC ${target}`,
    params: [],
  };
}

// ============================================================================
// Ranged Scans
// ============================================================================

function rangePrefix(table: string, dateColumn: string): string {
  return `SELECT * FROM ${quoteIdentifier(table)} WHERE ${quoteIdentifier(dateColumn)} BETWEEN`;
}

/**
 * `SELECT * FROM [schema].[table] WHERE [col] BETWEEN @start AND @end`.
 *
 * Both bounds are whole seconds, so the end bound is `23:59:59` of the last
 * day. On a `datetime2` column, rows after that second are not matched.
 */
export function buildBoundRangeQuery(table: string, dateColumn: string, range: DateRange): Statement {
  return {
    text: `${rangePrefix(table, dateColumn)} @start AND @end`,
    params: [toSqlParameter('start', range.start), toSqlParameter('end', range.end)],
  };
}

/**
 * The ranged scan with both bounds inlined as `'YYYYMMDD HH:MM:SS'`. Same
 * whole-second end bound as {@link buildBoundRangeQuery}.
 */
export function buildLiteralRangeQuery(table: string, dateColumn: string, range: DateRange): Statement {
  return {
    text: `${rangePrefix(table, dateColumn)} '${formatSqlDateTime(range.start)}' AND '${formatSqlDateTime(range.end)}'`,
    params: [],
  };
}
