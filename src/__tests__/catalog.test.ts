/**
 * Tests for routine signature lookup.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  RoutineCatalog,
  ScriptedSessionProvider,
  createNoopObservability,
  driverError,
  kindForType,
  rows,
  ExecutionError,
  InvalidObjectNameError,
} from '../index.js';

const COLUMNS = ['parameter_id', 'name', 'type', 'max_length', 'is_output'];

describe('RoutineCatalog', () => {
  let provider: ScriptedSessionProvider;
  let routines: RoutineCatalog;

  beforeEach(() => {
    provider = new ScriptedSessionProvider();
    routines = new RoutineCatalog(
      () => provider.acquire(),
      session => provider.release(session),
      createNoopObservability()
    );
  });

  it('should list declared parameters with their kinds', async () => {
    provider.enqueue(
      rows(COLUMNS, [
        [1, '@dataInicial', 'datetime', 8, false],
        [2, '@id_empresa', 'int', 4, false],
        [3, '@tipo', 'varchar', 20, false],
        [4, '@total', 'int', 4, true],
      ])
    );

    const parameters = await routines.describe('fato.proc');

    expect(parameters).toEqual([
      { position: 1, name: 'dataInicial', typeName: 'datetime', maxLength: 8, isOutput: false, kind: 'temporal' },
      { position: 2, name: 'id_empresa', typeName: 'int', maxLength: 4, isOutput: false, kind: 'integer' },
      { position: 3, name: 'tipo', typeName: 'varchar', maxLength: 20, isOutput: false, kind: 'generic' },
      { position: 4, name: 'total', typeName: 'int', maxLength: 4, isOutput: true, kind: 'integer' },
    ]);
    expect(provider.getQueries()[0]?.params).toEqual([{ name: 'routine', type: 'nvarchar', value: '[fato].[proc]' }]);
    expect(provider.releaseCount).toBe(1);
  });

  it('should return an empty list for unknown routines', async () => {
    provider.enqueue(rows(COLUMNS));

    expect(await routines.describe('fato.nope')).toEqual([]);
  });

  it('should release the session when the lookup fails', async () => {
    provider.enqueue(driverError('Invalid object name', { number: 208 }));

    await expect(routines.describe('fato.proc')).rejects.toThrow(ExecutionError);
    expect(provider.releaseCount).toBe(1);
  });

  it('should reject invalid names without opening a session', async () => {
    await expect(routines.describe("fato.proc'--")).rejects.toThrow(InvalidObjectNameError);
    expect(provider.acquireCount).toBe(0);
  });
});

describe('kindForType', () => {
  it('should map SQL Server types onto parameter kinds', () => {
    expect(kindForType('DateTime2')).toBe('temporal');
    expect(kindForType('smalldatetime')).toBe('temporal');
    expect(kindForType('bigint')).toBe('integer');
    expect(kindForType('decimal')).toBe('generic');
  });
});
