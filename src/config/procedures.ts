/**
 * Procedure catalog: the declarative list of exportable procedures.
 *
 * Loaded from YAML and validated once; everything downstream works on the
 * read-only {@link ProcedureSchema} values it produces.
 * @module config/procedures
 */

import { readFile } from 'node:fs/promises';
import { load } from 'js-yaml';
import { z } from 'zod';
import type { ParameterKind, ParameterSpec, ProcedureSchema } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../errors/index.js';

/**
 * Default catalog location, relative to the working directory.
 */
export const DEFAULT_CATALOG_PATH = 'config/procedures.yaml';

const KIND_BY_TYPE: Record<'datetime' | 'int' | 'other', ParameterKind> = {
  datetime: 'temporal',
  int: 'integer',
  other: 'generic',
};

const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.date()]);

const ParameterEntrySchema = z.object({
  name: z.string().trim().min(1),
  type: z.enum(['datetime', 'int', 'other']),
  position: z.number().int().positive(),
  // `default: null` and a bare `default:` both mean no default.
  default: ParameterValueSchema.nullish(),
  role: z.enum(['start', 'end', 'other']).optional(),
});

const ProcedureEntrySchema = z.object({
  name: z.string().trim().min(1),
  output_folder: z.string().trim().min(1).optional(),
  table: z.string().trim().min(1).optional(),
  date_column: z.string().trim().min(1).optional(),
  params: z.array(ParameterEntrySchema).default([]),
});

const CatalogSchema = z.object({
  ranged_scan_qualifiers: z.array(z.string().trim().min(1)).default([]),
  procedures: z.array(ProcedureEntrySchema),
});

type ProcedureEntry = z.infer<typeof ProcedureEntrySchema>;

/**
 * Read-only view over the configured procedures.
 */
export class ProcedureCatalog {
  private readonly procedures: Map<string, ProcedureSchema>;
  private readonly qualifiers: ReadonlySet<string>;

  constructor(procedures: readonly ProcedureSchema[], rangedScanQualifiers: readonly string[] = []) {
    this.procedures = new Map();
    for (const procedure of procedures) {
      if (this.procedures.has(procedure.name)) {
        throw new ConfigurationError(`Duplicate procedure '${procedure.name}'`);
      }
      this.procedures.set(procedure.name, procedure);
    }
    this.qualifiers = new Set(rangedScanQualifiers.map(q => q.toLowerCase()));
  }

  /**
   * Gets a procedure by name, or undefined when it is not configured.
   */
  get(name: string): ProcedureSchema | undefined {
    return this.procedures.get(name);
  }

  /**
   * All procedures in declaration order.
   */
  list(): ProcedureSchema[] {
    return Array.from(this.procedures.values());
  }

  /**
   * Whether a schema is executed as a ranged table scan rather than a routine call.
   */
  isRangedScan(schema: ProcedureSchema): boolean {
    if (schema.table !== undefined) {
      return true;
    }
    const dot = schema.name.indexOf('.');
    if (dot === -1) {
      return false;
    }
    return this.qualifiers.has(schema.name.slice(0, dot).toLowerCase());
  }

  /**
   * Qualifiers whose objects are read with a ranged table scan.
   */
  rangedScanQualifiers(): string[] {
    return Array.from(this.qualifiers);
  }
}

function toProcedureSchema(entry: ProcedureEntry, source: string): ProcedureSchema {
  const parameters: ParameterSpec[] = entry.params
    .map(param => ({
      name: param.name,
      kind: KIND_BY_TYPE[param.type],
      position: param.position,
      ...(param.default !== undefined && param.default !== null ? { default: param.default } : {}),
      ...(param.role !== undefined ? { role: param.role } : {}),
    }))
    .sort((a, b) => a.position - b.position);

  parameters.forEach((param, index) => {
    if (param.position !== index + 1) {
      throw new ConfigurationError(
        `Procedure '${entry.name}' in ${source}: parameter positions must be unique and run from 1 to ${parameters.length}`,
        { procedure: entry.name, positions: parameters.map(p => p.position) }
      );
    }
  });

  const names = new Set<string>();
  for (const param of parameters) {
    const key = param.name.toLowerCase();
    if (names.has(key)) {
      throw new ConfigurationError(`Procedure '${entry.name}' in ${source}: duplicate parameter '${param.name}'`);
    }
    names.add(key);
  }

  return Object.freeze({
    name: entry.name,
    parameters: Object.freeze(parameters.map(param => Object.freeze(param))),
    outputFolder: entry.output_folder ?? entry.name,
    ...(entry.table !== undefined ? { table: entry.table } : {}),
    ...(entry.date_column !== undefined ? { dateColumn: entry.date_column } : {}),
  });
}

/**
 * Parses catalog text.
 *
 * @param text - YAML document
 * @param source - Where the text came from, for error messages
 * @throws {ConfigurationError} On a syntax error, a schema violation, duplicate names or gapped positions
 */
export function parseProcedureCatalog(text: string, source = '<inline>'): ProcedureCatalog {
  let document: unknown;
  try {
    document = load(text);
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse ${source}: ${errorMessage(error)}`,
      { source },
      error instanceof Error ? error : undefined
    );
  }

  const parsed = CatalogSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid catalog ${source}: ${issues.join('; ')}`, { source });
  }

  const procedures = parsed.data.procedures.map(entry => toProcedureSchema(entry, source));
  return new ProcedureCatalog(procedures, parsed.data.ranged_scan_qualifiers);
}

/**
 * Reads and parses the catalog file.
 *
 * @throws {ConfigurationError} If the file cannot be read or is invalid
 */
export async function loadProcedureCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<ProcedureCatalog> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Could not read procedure catalog ${path}: ${errorMessage(error)}`,
      { path },
      error instanceof Error ? error : undefined
    );
  }
  return parseProcedureCatalog(text, path);
}
