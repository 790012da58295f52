/**
 * Connection configuration.
 *
 * The provider receives an explicit {@link ConnectionConfig}; only the CLI
 * builds one from the environment.
 * @module config
 */

import { z } from 'zod';
import type { ConnectionConfig } from '../types/index.js';
import {
  validateConnectionConfig,
  DEFAULT_SQLSERVER_PORT,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_APPLICATION_NAME,
} from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Creates a default connection configuration.
 *
 * @param overrides - Partial configuration to override defaults
 * @returns Complete connection configuration with defaults
 */
export function createDefaultConnectionConfig(
  overrides: Partial<ConnectionConfig> & Pick<ConnectionConfig, 'host' | 'database' | 'username' | 'password'>
): ConnectionConfig {
  return {
    port: DEFAULT_SQLSERVER_PORT,
    encrypt: false,
    trustServerCertificate: true,
    connectTimeout: DEFAULT_CONNECT_TIMEOUT,
    requestTimeout: DEFAULT_REQUEST_TIMEOUT,
    applicationName: DEFAULT_APPLICATION_NAME,
    ...overrides,
  };
}

/**
 * Validates a connection configuration.
 *
 * @throws {ConfigurationError} If any field is invalid
 */
export function assertValidConnectionConfig(config: ConnectionConfig): void {
  const errors = validateConnectionConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(`Connection validation failed: ${errors.join('; ')}`);
  }
}

/**
 * Redacts sensitive information from configuration for logging.
 *
 * @param config - Connection configuration
 * @returns Redacted configuration safe for logging
 */
export function redactConfig(config: ConnectionConfig): ConnectionConfig {
  return {
    ...config,
    password: '[REDACTED]',
  };
}

/**
 * Human-readable server description, used in logs and connection errors.
 */
export function describeServer(config: ConnectionConfig): string {
  const server = config.instanceName ? `${config.host}\\${config.instanceName}` : `${config.host}:${config.port}`;
  return `${server}/${config.database}`;
}

// ============================================================================
// Server Address
// ============================================================================

/**
 * Host, port and named instance parsed from a server address.
 */
export interface ServerAddress {
  host: string;
  port?: number;
  instanceName?: string;
}

/**
 * Parses `host`, `host,port` or `host\instance`.
 *
 * @throws {ConfigurationError} If the port is not a valid TCP port
 */
export function parseServerAddress(server: string): ServerAddress {
  const trimmed = server.trim();

  const backslash = trimmed.indexOf('\\');
  if (backslash !== -1) {
    return {
      host: trimmed.slice(0, backslash),
      instanceName: trimmed.slice(backslash + 1) || undefined,
    };
  }

  const comma = trimmed.indexOf(',');
  if (comma !== -1) {
    const portText = trimmed.slice(comma + 1).trim();
    const port = Number(portText);
    if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
      throw new ConfigurationError(`Invalid port in server address: ${server}`);
    }
    return { host: trimmed.slice(0, comma).trim(), port };
  }

  return { host: trimmed };
}

// ============================================================================
// Environment
// ============================================================================

function required(variable: string) {
  const message = `${variable} environment variable is required`;
  return z.string({ required_error: message }).trim().min(1, message);
}

function optionalText() {
  return z
    .string()
    .trim()
    .transform(value => (value === '' ? undefined : value))
    .optional();
}

function yesNo(variable: string) {
  return optionalText().pipe(
    z
      .string()
      .toLowerCase()
      .refine(value => YES.has(value) || NO.has(value), `${variable} must be yes or no`)
      .transform(value => YES.has(value))
      .optional()
  );
}

function seconds(variable: string) {
  return optionalText().pipe(
    z.coerce
      .number({ invalid_type_error: `${variable} must be a number of seconds` })
      .int(`${variable} must be a whole number of seconds`)
      .positive(`${variable} must be positive`)
      .optional()
  );
}

const YES = new Set(['yes', 'y', 'true', '1']);
const NO = new Set(['no', 'n', 'false', '0']);

const EnvSchema = z.object({
  DB_SERVER: required('DB_SERVER'),
  DB_DATABASE: required('DB_DATABASE'),
  DB_USERNAME: required('DB_USERNAME'),
  DB_PASSWORD: z
    .string({ required_error: 'DB_PASSWORD environment variable is required' })
    .min(1, 'DB_PASSWORD environment variable is required'),
  DB_PORT: optionalText().pipe(
    z.coerce.number().int().min(1, 'DB_PORT must be between 1 and 65535').max(65535, 'DB_PORT must be between 1 and 65535').optional()
  ),
  DB_TRUST_CERT: yesNo('DB_TRUST_CERT'),
  DB_ENCRYPT: yesNo('DB_ENCRYPT'),
  DB_CONNECT_TIMEOUT: seconds('DB_CONNECT_TIMEOUT'),
  DB_REQUEST_TIMEOUT: seconds('DB_REQUEST_TIMEOUT'),
  DB_APP_NAME: optionalText(),
});

/**
 * Environment variables read by {@link createConfigFromEnv}.
 */
export type ConnectionEnv = z.input<typeof EnvSchema>;

/**
 * Creates a configuration from environment variables.
 *
 * Environment variables:
 * - DB_SERVER: `host`, `host,port` or `host\instance`
 * - DB_DATABASE: Database name
 * - DB_USERNAME: Database username
 * - DB_PASSWORD: Database password
 * - DB_PORT: Port when DB_SERVER carries none (default: 1433)
 * - DB_TRUST_CERT: Trust server certificate, yes/no (default: yes)
 * - DB_ENCRYPT: Encrypt the connection, yes/no (default: no)
 * - DB_CONNECT_TIMEOUT: Connection timeout in seconds
 * - DB_REQUEST_TIMEOUT: Request timeout in seconds
 * - DB_APP_NAME: Application name
 *
 * @throws {ConfigurationError} If required variables are missing or malformed
 */
export function createConfigFromEnv(env: Record<string, string | undefined> = process.env): ConnectionConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const messages = parsed.error.issues.map(issue => issue.message);
    throw new ConfigurationError(messages.join('; '), {
      variables: parsed.error.issues.map(issue => issue.path.join('.')),
    });
  }

  const vars = parsed.data;
  const address = parseServerAddress(vars.DB_SERVER);

  const config = createDefaultConnectionConfig({
    host: address.host,
    port: address.port ?? vars.DB_PORT ?? DEFAULT_SQLSERVER_PORT,
    instanceName: address.instanceName,
    database: vars.DB_DATABASE,
    username: vars.DB_USERNAME,
    password: vars.DB_PASSWORD,
    trustServerCertificate: vars.DB_TRUST_CERT ?? true,
    encrypt: vars.DB_ENCRYPT ?? false,
    connectTimeout: vars.DB_CONNECT_TIMEOUT !== undefined ? vars.DB_CONNECT_TIMEOUT * 1000 : DEFAULT_CONNECT_TIMEOUT,
    requestTimeout: vars.DB_REQUEST_TIMEOUT !== undefined ? vars.DB_REQUEST_TIMEOUT * 1000 : DEFAULT_REQUEST_TIMEOUT,
    applicationName: vars.DB_APP_NAME ?? DEFAULT_APPLICATION_NAME,
  });

  assertValidConnectionConfig(config);
  return config;
}
