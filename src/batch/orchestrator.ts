/**
 * Drives a procedure across the monthly periods of a date range.
 *
 * @module batch/orchestrator
 */

import type {
  ArtifactDescriptor,
  DateRange,
  MonthlyPeriod,
  ParameterOverrides,
  ProcedureSchema,
  ResultSet,
} from '../types/index.js';
import { DEFAULT_DATE_COLUMN, isEmptyResultSet } from '../types/index.js';
import { ConfigurationError, isBatchError, isFatalError } from '../errors/index.js';
import type { Observability, SpanContext } from '../observability/index.js';
import { MetricNames } from '../observability/index.js';
import type { ProcedureCatalog } from '../config/procedures.js';
import type { ProcedureExecutor } from '../operations/procedure.js';
import { describeExecutionFailure } from '../operations/procedure.js';
import type { TabularExporter } from '../export/excel.js';
import { bindParameters } from './parameter-binder.js';
import {
  createDateRange,
  endOfDay,
  formatDisplayDate,
  formatYearMonth,
  splitMonthly,
} from './date-range.js';

/**
 * Collaborators of the orchestrator.
 */
export interface BatchOrchestratorOptions {
  catalog: ProcedureCatalog;
  executor: ProcedureExecutor;
  exporter: TabularExporter;
  observability: Observability;
}

/**
 * Runs procedures period by period and collects the files they produce.
 *
 * Failures confined to one period are logged and the batch moves on; fatal
 * errors (configuration, connection) abort the run.
 */
export class BatchOrchestrator {
  private readonly catalog: ProcedureCatalog;
  private readonly executor: ProcedureExecutor;
  private readonly exporter: TabularExporter;
  private readonly observability: Observability;

  constructor(options: BatchOrchestratorOptions) {
    this.catalog = options.catalog;
    this.executor = options.executor;
    this.exporter = options.exporter;
    this.observability = options.observability;
  }

  /**
   * Runs a configured procedure by name.
   *
   * @param name - Procedure name as configured
   * @param startDate - First day of the range
   * @param endDate - Last day of the range, included up to its last instant
   * @param extraParams - Values for integer and generic parameters
   * @throws {ConfigurationError} If the procedure is not configured
   * @throws {InvalidRangeError} If start is after the end of `endDate`
   */
  async runProcedure(
    name: string,
    startDate: Date,
    endDate: Date,
    extraParams: ParameterOverrides = {}
  ): Promise<ArtifactDescriptor[]> {
    const schema = this.catalog.get(name);
    if (!schema) {
      throw new ConfigurationError(`Procedure '${name}' is not configured`, {
        available: this.catalog.list().map(p => p.name),
      });
    }
    const range = createDateRange(startDate, endOfDay(endDate));
    return this.run(schema, range, extraParams);
  }

  /**
   * Runs a schema over a range.
   *
   * @returns One artifact per non-empty period, in period order
   */
  async run(
    schema: ProcedureSchema,
    range: DateRange,
    overrides: ParameterOverrides = {}
  ): Promise<ArtifactDescriptor[]> {
    const periods = Array.from(splitMonthly(range));
    const ranged = this.catalog.isRangedScan(schema);
    const logger = this.observability.logger.child({ procedure: schema.name });

    return this.observability.tracer.withSpan(
      'batch.run',
      async (span: SpanContext) => {
        logger.info(`Running '${schema.name}' over ${periods.length} monthly period(s)`, {
          mode: ranged ? 'range' : 'routine',
          start: formatDisplayDate(range.start),
          end: formatDisplayDate(range.end),
        });

        const artifacts: ArtifactDescriptor[] = [];

        for (const period of periods) {
          logger.info(
            `Period ${period.index}/${periods.length}: ${formatDisplayDate(period.start)} to ${formatDisplayDate(period.end)}`
          );
          this.observability.metrics.increment(MetricNames.PERIODS_TOTAL, 1, { procedure: schema.name });

          try {
            const result = await this.fetch(schema, period, overrides, ranged);
            if (isEmptyResultSet(result)) {
              logger.info('No rows returned for this period', { period: period.index });
              continue;
            }

            const path = await this.exporter.export(result, {
              folder: schema.outputFolder,
              name: `${schema.name}_${formatYearMonth(period.start)}`,
            });
            artifacts.push({ path, procedure: schema.name, period, rowCount: result.rows.length });
            logger.info(`${result.rows.length} row(s) exported`, { period: period.index, path });
          } catch (error) {
            if (isFatalError(error)) {
              logger.error('Aborting batch', { period: period.index, error: describeExecutionFailure(error) });
              throw error;
            }
            this.observability.metrics.increment(MetricNames.ERRORS_TOTAL, 1, {
              error_type: isBatchError(error) ? error.code : 'UNKNOWN',
              stage: 'period',
            });
            logger.error('Period failed', { period: period.index, error: describeExecutionFailure(error) });
          }
        }

        span.setAttribute('period_count', periods.length);
        span.setAttribute('artifact_count', artifacts.length);
        logger.info(`Batch finished. ${artifacts.length} file(s) generated`);
        return artifacts;
      },
      { procedure: schema.name }
    );
  }

  private async fetch(
    schema: ProcedureSchema,
    period: MonthlyPeriod,
    overrides: ParameterOverrides,
    ranged: boolean
  ): Promise<ResultSet> {
    if (ranged) {
      return this.executor.executeRange(schema.table ?? schema.name, schema.dateColumn ?? DEFAULT_DATE_COLUMN, period);
    }
    const args = bindParameters(schema, period, overrides);
    return this.executor.executeRoutine(schema.name, args);
  }
}
