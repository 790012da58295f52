import { Command, InvalidArgumentError } from 'commander';
import type { ParameterValue } from '../types/index.js';
import { createConfigFromEnv, describeServer } from '../config/index.js';
import { DEFAULT_CATALOG_PATH, loadProcedureCatalog } from '../config/procedures.js';
import { errorMessage } from '../errors/index.js';
import { LogLevel, createConsoleObservability } from '../observability/index.js';
import type { Observability } from '../observability/index.js';
import { MssqlConnectionProvider } from '../pool/index.js';
import { RoutineCatalog } from '../operations/catalog.js';
import { DEFAULT_OUTPUT_DIR } from '../export/excel.js';
import { parseDateString } from '../batch/date-range.js';
import { createProcedureBatch } from '../index.js';

/**
 * Options accepted before or after any command.
 */
export type GlobalOptions = {
  config: string;
  output: string;
  debug?: boolean;
};

type RunOptions = {
  procedure: string;
  start: string;
  end: string;
  param: Record<string, ParameterValue>;
};

/**
 * Folds one `key=value` token into the extra parameters. Values made only of
 * digits become integers when they fit a safe integer; longer ones stay strings.
 *
 * @throws {InvalidArgumentError} If the token has no `=` or an empty key
 */
export const collectParam = (
  token: string,
  previous: Record<string, ParameterValue>,
): Record<string, ParameterValue> => {
  const eq = token.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Invalid parameter: ${token}. Use the format key=value`);
  }
  const key = token.slice(0, eq);
  const value = token.slice(eq + 1);
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  return { ...previous, [key]: Number.isSafeInteger(parsed) ? parsed : value };
};

/**
 * Parses a list of `key=value` tokens.
 */
export const parseExtraParams = (tokens: readonly string[]): Record<string, ParameterValue> =>
  tokens.reduce<Record<string, ParameterValue>>((params, token) => collectParam(token, params), {});

const createObservability = (globals: GlobalOptions): Observability =>
  createConsoleObservability(globals.debug ? LogLevel.DEBUG : LogLevel.INFO);

const createProvider = (observability: Observability): MssqlConnectionProvider => {
  const config = createConfigFromEnv();
  observability.logger.debug('Using SQL Server', { server: describeServer(config) });
  return new MssqlConnectionProvider(config, observability);
};

/**
 * Runs a command body; failures are logged and turn into exit code 1.
 */
const guarded = async (observability: Observability, body: () => Promise<void>): Promise<void> => {
  try {
    await body();
  } catch (error) {
    observability.logger.error(errorMessage(error));
    process.exitCode = 1;
  }
};

/**
 * Defines the command surface.
 */
export const buildCli = (): Command => {
  const cli = new Command();
  cli
    .name('procedure-batch')
    .description('Runs SQL Server procedures month by month and exports each month to Excel')
    .option('-c, --config <path>', 'procedure catalog', DEFAULT_CATALOG_PATH)
    .option('-o, --output <dir>', 'export root directory', DEFAULT_OUTPUT_DIR)
    .option('--debug', 'verbose logging');

  cli
    .command('run')
    .description('Execute a procedure over a date range, one month at a time')
    .requiredOption('-p, --procedure <name>', 'procedure name as configured')
    .requiredOption('-s, --start <YYYYMMDD>', 'first day of the range')
    .requiredOption('-e, --end <YYYYMMDD>', 'last day of the range (inclusive)')
    .option('-P, --param <key=value...>', 'extra procedure parameters', collectParam, {})
    .action(async (opts: RunOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions & RunOptions>();
      const observability = createObservability(globals);

      await guarded(observability, async () => {
        const { logger } = observability;
        const catalog = await loadProcedureCatalog(globals.config);

        if (!catalog.get(opts.procedure)) {
          logger.error(`Procedure '${opts.procedure}' not found`);
          logger.info('Available procedures', { procedures: catalog.list().map(p => p.name) });
          process.exitCode = 1;
          return;
        }

        const start = parseDateString(opts.start);
        const end = parseDateString(opts.end);

        const { orchestrator } = createProcedureBatch({
          catalog,
          provider: createProvider(observability),
          outputDir: globals.output,
          observability,
        });

        const artifacts = await orchestrator.runProcedure(opts.procedure, start, end, opts.param);
        if (artifacts.length === 0) {
          logger.info('No files were generated');
          return;
        }
        logger.info('Files generated', { files: artifacts.map(a => a.path) });
      });
    });

  cli
    .command('list')
    .description('List configured procedures')
    .action(async (_opts: unknown, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const observability = createObservability(globals);

      await guarded(observability, async () => {
        const catalog = await loadProcedureCatalog(globals.config);
        console.log('Available procedures:');
        catalog.list().forEach((procedure, index) => {
          const mode = catalog.isRangedScan(procedure) ? ' (ranged scan)' : '';
          console.log(`  ${index + 1}. ${procedure.name}${mode}`);
        });
      });
    });

  cli
    .command('test')
    .description('Check the database connection')
    .action(async (_opts: unknown, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const observability = createObservability(globals);

      await guarded(observability, async () => {
        await createProvider(observability).testConnection();
      });
    });

  cli
    .command('describe')
    .description("List a routine's declared parameters")
    .argument('<procedure>', 'qualified routine name')
    .action(async (procedure: string, _opts: unknown, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const observability = createObservability(globals);

      await guarded(observability, async () => {
        const provider = createProvider(observability);
        const routines = new RoutineCatalog(
          () => provider.acquire(),
          session => provider.release(session),
          observability,
        );
        const parameters = await routines.describe(procedure);
        if (parameters.length === 0) {
          console.log(`No parameters found for ${procedure} (unknown routine or none declared)`);
          return;
        }
        console.log(`Parameters of ${procedure}:`);
        for (const param of parameters) {
          const output = param.isOutput ? ' OUTPUT' : '';
          console.log(`  ${param.position}. @${param.name} ${param.typeName}(${param.maxLength})${output} -> ${param.kind}`);
        }
      });
    });

  return cli;
};

/**
 * Parses arguments and dispatches to a command.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
