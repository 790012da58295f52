/**
 * Spreadsheet export of result sets.
 *
 * @module export/excel
 */

import { mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import ExcelJS from 'exceljs';
import type { CellValue, Workbook } from 'exceljs';
import type { ResultSet } from '../types/index.js';
import { isEmptyResultSet } from '../types/index.js';
import { ExportError, errorMessage } from '../errors/index.js';
import type { Observability } from '../observability/index.js';
import { MetricNames, createNoopObservability } from '../observability/index.js';

/**
 * Where an export lands, relative to the exporter's base directory.
 */
export interface ExportDestination {
  /** Sub-folder of the base directory */
  folder: string;
  /** File name; `.xlsx` is appended when missing */
  name: string;
}

/**
 * A named result set for multi-sheet workbooks.
 */
export interface SheetData {
  name: string;
  resultSet: ResultSet;
}

/**
 * Sink for non-empty result sets.
 */
export interface TabularExporter {
  /**
   * Writes a result set and returns the path written.
   *
   * @throws {ExportError} If the result set is empty or the file cannot be written
   */
  export(resultSet: ResultSet, destination: ExportDestination): Promise<string>;
}

/**
 * Options for {@link ExcelExporter}.
 */
export interface ExcelExporterOptions {
  /** Export root (default: `output`) */
  baseDir?: string;
  observability?: Observability;
}

/**
 * Default export root, relative to the working directory.
 */
export const DEFAULT_OUTPUT_DIR = 'output';

/**
 * Longest sheet name Excel accepts.
 */
export const MAX_SHEET_NAME_LENGTH = 31;

const FORBIDDEN_SHEET_CHARS = /[[\]:*?/\\]/g;

/**
 * Makes a string usable as a worksheet name.
 */
export function toSheetName(name: string): string {
  const cleaned = name.replace(FORBIDDEN_SHEET_CHARS, '_').slice(0, MAX_SHEET_NAME_LENGTH);
  return cleaned.length > 0 ? cleaned : 'Sheet1';
}

/**
 * Maps a driver value onto something a cell can hold.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('hex');
  }
  return JSON.stringify(value);
}

/**
 * Writes `.xlsx` workbooks with exceljs.
 */
export class ExcelExporter implements TabularExporter {
  private readonly baseDir: string;
  private readonly observability: Observability;

  constructor(options: ExcelExporterOptions = {}) {
    this.baseDir = options.baseDir ?? DEFAULT_OUTPUT_DIR;
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Resolves the file path for a destination.
   */
  resolvePath(destination: ExportDestination): string {
    const fileName = destination.name.toLowerCase().endsWith('.xlsx') ? destination.name : `${destination.name}.xlsx`;
    return join(this.baseDir, destination.folder, fileName);
  }

  async export(resultSet: ResultSet, destination: ExportDestination): Promise<string> {
    const path = this.resolvePath(destination);
    if (isEmptyResultSet(resultSet)) {
      throw new ExportError('result set is empty', path);
    }

    const workbook = new ExcelJS.Workbook();
    this.addSheet(workbook, 'Sheet1', resultSet);
    await this.write(workbook, path);

    this.observability.metrics.increment(MetricNames.ARTIFACTS_TOTAL, 1);
    this.observability.logger.info('Exported workbook', { path, rowCount: resultSet.rows.length });
    return path;
  }

  /**
   * Writes several result sets into one workbook, one sheet each. Empty
   * result sets are skipped.
   *
   * @throws {ExportError} If every result set is empty or the file cannot be written
   */
  async exportSheets(sheets: readonly SheetData[], destination: ExportDestination): Promise<string> {
    const path = this.resolvePath(destination);
    const nonEmpty = sheets.filter(sheet => !isEmptyResultSet(sheet.resultSet));
    if (nonEmpty.length === 0) {
      throw new ExportError('no sheet has rows', path);
    }

    const workbook = new ExcelJS.Workbook();
    try {
      for (const sheet of nonEmpty) {
        this.addSheet(workbook, toSheetName(sheet.name), sheet.resultSet);
      }
    } catch (error) {
      throw new ExportError(errorMessage(error), path, error instanceof Error ? error : undefined);
    }
    await this.write(workbook, path);

    this.observability.metrics.increment(MetricNames.ARTIFACTS_TOTAL, 1);
    this.observability.logger.info('Exported workbook', { path, sheets: nonEmpty.length });
    return path;
  }

  private addSheet(workbook: Workbook, name: string, resultSet: ResultSet): void {
    const worksheet = workbook.addWorksheet(name);
    worksheet.addRow([...resultSet.columns]);
    for (const row of resultSet.rows) {
      worksheet.addRow(row.map(toCellValue));
    }
  }

  private async write(workbook: Workbook, path: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await workbook.xlsx.writeFile(path);
    } catch (error) {
      throw new ExportError(errorMessage(error), path, error instanceof Error ? error : undefined);
    }
  }
}
