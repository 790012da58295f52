/**
 * Tests for the Excel exporter.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import {
  ExcelExporter,
  ExportError,
  EMPTY_RESULT_SET,
  MetricNames,
  createInMemoryObservability,
  toCellValue,
  toSheetName,
} from '../index.js';

const readWorkbook = async (path: string): Promise<Workbook> => {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  return workbook;
};

describe('ExcelExporter', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'procedure-batch-export-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  describe('export', () => {
    it('should write a header row followed by the data rows', async () => {
      const observability = createInMemoryObservability();
      const exporter = new ExcelExporter({ baseDir, observability });

      const path = await exporter.export(
        { columns: ['id', 'nome'], rows: [[1, 'Ana'], [2, 'Bruno']] },
        { folder: 'ciclo', name: 'fato.proc_202501' }
      );

      expect(path).toBe(join(baseDir, 'ciclo', 'fato.proc_202501.xlsx'));
      const sheet = (await readWorkbook(path)).getWorksheet('Sheet1');
      expect(sheet?.rowCount).toBe(3);
      expect(sheet?.getRow(1).getCell(1).value).toBe('id');
      expect(sheet?.getRow(1).getCell(2).value).toBe('nome');
      expect(sheet?.getRow(2).getCell(1).value).toBe(1);
      expect(sheet?.getRow(2).getCell(2).value).toBe('Ana');
      expect(observability.metrics.getCounter(MetricNames.ARTIFACTS_TOTAL)).toBe(1);
    });

    it('should not append the extension twice', () => {
      const exporter = new ExcelExporter({ baseDir });

      expect(exporter.resolvePath({ folder: 'a', name: 'report.xlsx' })).toBe(join(baseDir, 'a', 'report.xlsx'));
    });

    it('should refuse an empty result set without writing', async () => {
      const exporter = new ExcelExporter({ baseDir });

      await expect(exporter.export(EMPTY_RESULT_SET, { folder: 'a', name: 'empty' })).rejects.toThrow(
        'Export failed: result set is empty'
      );
      expect(existsSync(join(baseDir, 'a', 'empty.xlsx'))).toBe(false);
    });

    it('should report write failures as export errors', async () => {
      const exporter = new ExcelExporter({ baseDir: join(baseDir, 'missing\0dir') });

      await expect(
        exporter.export({ columns: ['id'], rows: [[1]] }, { folder: 'a', name: 'b' })
      ).rejects.toThrow(ExportError);
    });
  });

  describe('exportSheets', () => {
    it('should write one sheet per non-empty result set', async () => {
      const exporter = new ExcelExporter({ baseDir });
      const longName = 'a'.repeat(40);

      const path = await exporter.exportSheets(
        [
          { name: longName, resultSet: { columns: ['x'], rows: [[1]] } },
          { name: 'vazio', resultSet: { columns: ['x'], rows: [] } },
          { name: 'jan/fev', resultSet: { columns: ['y'], rows: [['z']] } },
        ],
        { folder: 'multi', name: 'resumo' }
      );

      const workbook = await readWorkbook(path);
      expect(workbook.worksheets.map(sheet => sheet.name)).toEqual(['a'.repeat(31), 'jan_fev']);
    });

    it('should refuse when every result set is empty', async () => {
      const exporter = new ExcelExporter({ baseDir });

      await expect(
        exporter.exportSheets([{ name: 'vazio', resultSet: EMPTY_RESULT_SET }], { folder: 'multi', name: 'resumo' })
      ).rejects.toThrow('Export failed: no sheet has rows');
    });
  });
});

describe('toSheetName', () => {
  it('should replace forbidden characters and truncate', () => {
    expect(toSheetName('a/b:c[d]')).toBe('a_b_c_d_');
    expect(toSheetName('x'.repeat(35))).toBe('x'.repeat(31));
    expect(toSheetName('')).toBe('Sheet1');
  });
});

describe('toCellValue', () => {
  it('should pass through values a cell can hold', () => {
    const date = new Date(2025, 0, 1);
    expect(toCellValue(date)).toBe(date);
    expect(toCellValue('a')).toBe('a');
    expect(toCellValue(1.5)).toBe(1.5);
    expect(toCellValue(true)).toBe(true);
  });

  it('should convert other driver values', () => {
    expect(toCellValue(null)).toBeNull();
    expect(toCellValue(undefined)).toBeNull();
    expect(toCellValue(10n)).toBe('10');
    expect(toCellValue(Buffer.from([0xab, 0x01]))).toBe('ab01');
    expect(toCellValue({ a: 1 })).toBe('{"a":1}');
  });
});
