/**
 * Tests for connection configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  createConfigFromEnv,
  createDefaultConnectionConfig,
  assertValidConnectionConfig,
  parseServerAddress,
  describeServer,
  redactConfig,
  toMssqlConfig,
  ConfigurationError,
} from '../index.js';

const baseEnv = {
  DB_SERVER: 'db.local',
  DB_DATABASE: 'warehouse',
  DB_USERNAME: 'reader',
  DB_PASSWORD: 'test-secret',
};

describe('createConfigFromEnv', () => {
  it('should build a configuration with defaults', () => {
    expect(createConfigFromEnv(baseEnv)).toEqual({
      host: 'db.local',
      port: 1433,
      database: 'warehouse',
      username: 'reader',
      password: 'test-secret',
      encrypt: false,
      trustServerCertificate: true,
      connectTimeout: 30000,
      requestTimeout: 600000,
      applicationName: 'procedure-batch',
    });
  });

  it('should list every missing required variable', () => {
    expect(() => createConfigFromEnv({})).toThrow(
      'Configuration error: DB_SERVER environment variable is required; ' +
        'DB_DATABASE environment variable is required; ' +
        'DB_USERNAME environment variable is required; ' +
        'DB_PASSWORD environment variable is required'
    );
  });

  it('should treat blank values as missing', () => {
    expect(() => createConfigFromEnv({ ...baseEnv, DB_SERVER: '   ' })).toThrow(
      'DB_SERVER environment variable is required'
    );
    expect(() => createConfigFromEnv({ ...baseEnv, DB_PASSWORD: '' })).toThrow(
      'DB_PASSWORD environment variable is required'
    );
  });

  it('should take the port from the server address first', () => {
    expect(createConfigFromEnv({ ...baseEnv, DB_SERVER: 'db.local,14330', DB_PORT: '1500' }).port).toBe(14330);
    expect(createConfigFromEnv({ ...baseEnv, DB_PORT: '1500' }).port).toBe(1500);
  });

  it('should read a named instance', () => {
    const config = createConfigFromEnv({ ...baseEnv, DB_SERVER: 'db.local\\SQLEXPRESS' });

    expect(config.host).toBe('db.local');
    expect(config.instanceName).toBe('SQLEXPRESS');
  });

  it('should parse yes/no flags', () => {
    const config = createConfigFromEnv({ ...baseEnv, DB_TRUST_CERT: 'no', DB_ENCRYPT: 'YES' });

    expect(config.trustServerCertificate).toBe(false);
    expect(config.encrypt).toBe(true);
  });

  it('should reject flags that are not yes or no', () => {
    expect(() => createConfigFromEnv({ ...baseEnv, DB_ENCRYPT: 'maybe' })).toThrow(
      'Configuration error: DB_ENCRYPT must be yes or no'
    );
  });

  it('should convert timeouts from seconds', () => {
    const config = createConfigFromEnv({ ...baseEnv, DB_CONNECT_TIMEOUT: '15', DB_REQUEST_TIMEOUT: '120' });

    expect(config.connectTimeout).toBe(15000);
    expect(config.requestTimeout).toBe(120000);
  });

  it('should reject non-positive timeouts', () => {
    expect(() => createConfigFromEnv({ ...baseEnv, DB_CONNECT_TIMEOUT: '0' })).toThrow(
      'DB_CONNECT_TIMEOUT must be positive'
    );
  });

  it('should use the configured application name', () => {
    expect(createConfigFromEnv({ ...baseEnv, DB_APP_NAME: 'nightly-export' }).applicationName).toBe('nightly-export');
  });

  it('should reject a malformed port in the server address', () => {
    expect(() => createConfigFromEnv({ ...baseEnv, DB_SERVER: 'db.local,notaport' })).toThrow(ConfigurationError);
  });
});

describe('parseServerAddress', () => {
  it('should accept the three address forms', () => {
    expect(parseServerAddress('db.local')).toEqual({ host: 'db.local' });
    expect(parseServerAddress('db.local,1444')).toEqual({ host: 'db.local', port: 1444 });
    expect(parseServerAddress('db.local\\REPORTS')).toEqual({ host: 'db.local', instanceName: 'REPORTS' });
  });

  it('should reject ports out of range', () => {
    expect(() => parseServerAddress('db.local,70000')).toThrow(
      'Configuration error: Invalid port in server address: db.local,70000'
    );
  });
});

describe('connection helpers', () => {
  const config = createDefaultConnectionConfig({
    host: 'db.local',
    database: 'warehouse',
    username: 'reader',
    password: 'test-secret',
  });

  it('should describe the server', () => {
    expect(describeServer(config)).toBe('db.local:1433/warehouse');
    expect(describeServer({ ...config, instanceName: 'REPORTS' })).toBe('db.local\\REPORTS/warehouse');
  });

  it('should redact the password', () => {
    expect(redactConfig(config).password).toBe('[REDACTED]');
  });

  it('should reject an incomplete configuration', () => {
    expect(() => assertValidConnectionConfig({ ...config, host: '' })).toThrow(ConfigurationError);
  });

  it('should open single-connection pools', () => {
    const mssqlConfig = toMssqlConfig(config);

    expect(mssqlConfig.server).toBe('db.local');
    expect(mssqlConfig.port).toBe(1433);
    expect(mssqlConfig.pool).toEqual({ min: 0, max: 1 });
    expect(mssqlConfig.options?.encrypt).toBe(false);
    expect(mssqlConfig.options?.trustServerCertificate).toBe(true);
  });

  it('should address named instances without a port', () => {
    const mssqlConfig = toMssqlConfig({ ...config, instanceName: 'REPORTS' });

    expect(mssqlConfig.port).toBeUndefined();
    expect(mssqlConfig.options?.instanceName).toBe('REPORTS');
  });
});
