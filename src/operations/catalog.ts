/**
 * Reads routine signatures from the server catalog.
 *
 * @module operations/catalog
 */

import type { ParameterKind } from '../types/index.js';
import { parseDriverError } from '../errors/index.js';
import type { Observability } from '../observability/index.js';
import type { SqlSession } from '../pool/index.js';
import { quoteIdentifier } from './statements.js';

/**
 * A parameter as declared on the server.
 */
export interface RoutineParameter {
  /** 1-based ordinal */
  position: number;
  /** Name without the leading `@` */
  name: string;
  /** SQL Server type name, e.g. `datetime` */
  typeName: string;
  /** Maximum length in bytes (-1 for MAX types) */
  maxLength: number;
  isOutput: boolean;
  /** Kind the binder would use for this type */
  kind: ParameterKind;
}

const DESCRIBE_SQL = `SELECT p.parameter_id, p.name, TYPE_NAME(p.user_type_id), p.max_length, p.is_output
FROM sys.parameters AS p
WHERE p.object_id = OBJECT_ID(@routine) AND p.parameter_id > 0
ORDER BY p.parameter_id`;

const TEMPORAL_TYPES = new Set(['date', 'datetime', 'datetime2', 'smalldatetime', 'datetimeoffset']);
const INTEGER_TYPES = new Set(['int', 'bigint', 'smallint', 'tinyint']);

/**
 * Maps a SQL Server type name onto a parameter kind.
 */
export function kindForType(typeName: string): ParameterKind {
  const normalized = typeName.toLowerCase();
  if (TEMPORAL_TYPES.has(normalized)) return 'temporal';
  if (INTEGER_TYPES.has(normalized)) return 'integer';
  return 'generic';
}

function toRoutineParameter(row: readonly unknown[]): RoutineParameter {
  const [position, name, typeName, maxLength, isOutput] = row;
  const type = typeof typeName === 'string' ? typeName : String(typeName);
  return {
    position: Number(position),
    name: String(name).replace(/^@/, ''),
    typeName: type,
    maxLength: Number(maxLength),
    isOutput: isOutput === true || isOutput === 1,
    kind: kindForType(type),
  };
}

/**
 * Looks up routine parameters in `sys.parameters`.
 */
export class RoutineCatalog {
  private readonly getSession: () => Promise<SqlSession>;
  private readonly releaseSession: (session: SqlSession) => Promise<void>;
  private readonly observability: Observability;

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
   * Lists a routine's declared parameters in position order. An unknown
   * routine yields an empty list.
   *
   * @throws {InvalidObjectNameError} If the name is not a plain identifier
   */
  async describe(routine: string): Promise<RoutineParameter[]> {
    const quoted = quoteIdentifier(routine);
    const session = await this.getSession();
    try {
      const result = await session.query(DESCRIBE_SQL, [{ name: 'routine', type: 'nvarchar', value: quoted }]);
      const parameters = result.rows.map(toRoutineParameter);
      this.observability.logger.debug('Described routine', { routine, parameterCount: parameters.length });
      return parameters;
    } catch (error) {
      throw parseDriverError(error, routine);
    } finally {
      await this.releaseSession(session);
    }
  }
}
