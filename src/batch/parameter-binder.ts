/**
 * Resolves a procedure's declared parameters into a positional argument list
 * for one period.
 * @module batch/parameter-binder
 */

import type {
  BoundArgument,
  BoundArguments,
  MonthlyPeriod,
  ParameterOverrides,
  ParameterRole,
  ParameterSpec,
  ParameterValue,
  ProcedureSchema,
} from '../types/index.js';
import { MissingParameterError, ParameterTypeError, UnresolvedParameterError } from '../errors/index.js';

const START_HINTS = ['inicial', 'inicio', 'start'];
const END_HINTS = ['final', 'fim', 'end'];

/**
 * Role of a temporal parameter: its tag if present, otherwise inferred from
 * its name. `undefined` means the positional pass decides.
 */
export function temporalRole(param: ParameterSpec): ParameterRole | undefined {
  if (param.role !== undefined) {
    return param.role;
  }
  const name = param.name.toLowerCase();
  if (START_HINTS.some(hint => name.includes(hint))) {
    return 'start';
  }
  if (END_HINTS.some(hint => name.includes(hint))) {
    return 'end';
  }
  return undefined;
}

/**
 * Casts a value to an integer.
 *
 * @throws {ParameterTypeError} For non-integral numbers, non-numeric values and
 *   integers outside the safe range
 */
export function toInteger(name: string, value: ParameterValue): number {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())
        ? Number.parseInt(value.trim(), 10)
        : Number.NaN;
  // Past 2^53 the parsed number is no longer the value that was given.
  if (!Number.isSafeInteger(parsed)) {
    throw new ParameterTypeError(name, 'an integer', value);
  }
  return parsed;
}

function lookup(overrides: ParameterOverrides, name: string): ParameterValue | undefined {
  return Object.prototype.hasOwnProperty.call(overrides, name) ? overrides[name] : undefined;
}

/**
 * Binds a schema's parameters for one period.
 *
 * Temporal parameters tagged (or named) as start/end receive the period
 * bounds; untagged ones are filled in position order, start first. Integers
 * come from the override or the default, cast to integer. Generic values
 * come from the override or the default.
 *
 * @returns One argument per declared parameter, ordered by position
 * @throws {MissingParameterError} Integer with neither override nor default
 * @throws {ParameterTypeError} Integer value that cannot be cast
 * @throws {UnresolvedParameterError} Any slot left empty
 */
export function bindParameters(
  schema: ProcedureSchema,
  period: MonthlyPeriod,
  overrides: ParameterOverrides = {}
): BoundArguments {
  const ordered = [...schema.parameters].sort((a, b) => a.position - b.position);
  const values = new Map<string, ParameterValue>();
  const pending: ParameterSpec[] = [];
  let startAssigned = false;

  for (const param of ordered) {
    switch (param.kind) {
      case 'temporal': {
        const role = temporalRole(param);
        if (role === 'start') {
          values.set(param.name, period.start);
          startAssigned = true;
        } else if (role === 'end') {
          values.set(param.name, period.end);
        } else if (role === 'other') {
          const value = lookup(overrides, param.name) ?? param.default;
          if (value !== undefined) {
            values.set(param.name, value);
          }
        } else {
          pending.push(param);
        }
        break;
      }

      case 'integer': {
        const value = lookup(overrides, param.name) ?? param.default;
        if (value === undefined) {
          throw new MissingParameterError(param.name);
        }
        values.set(param.name, toInteger(param.name, value));
        break;
      }

      case 'generic': {
        const value = lookup(overrides, param.name) ?? param.default;
        if (value !== undefined) {
          values.set(param.name, value);
        }
        break;
      }
    }
  }

  for (const param of pending) {
    if (startAssigned) {
      values.set(param.name, period.end);
    } else {
      values.set(param.name, period.start);
      startAssigned = true;
    }
  }

  const unresolved = ordered.filter(param => !values.has(param.name)).map(param => param.name);
  if (unresolved.length > 0) {
    throw new UnresolvedParameterError(unresolved);
  }

  return ordered.map((param): BoundArgument => {
    const value = values.get(param.name);
    if (value === undefined) {
      throw new UnresolvedParameterError([param.name]);
    }
    return { name: param.name, kind: param.kind, position: param.position, value };
  });
}
