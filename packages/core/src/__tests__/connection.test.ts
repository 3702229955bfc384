import { describe, it, expect } from 'vitest';
import { BuildPoolConfig, ConnectionManager } from '../db/connection';
import { ConnectionError } from '../core/errors';
import { DatabaseConfig } from '../db/types';

const baseConfig: DatabaseConfig = {
  Server: 'localhost',
  Database: 'testdb',
  User: 'sa',
  Password: 'test-secret',
};

describe('BuildPoolConfig', () => {
  it('applies connection defaults', () => {
    expect(BuildPoolConfig(baseConfig)).toEqual({
      server: 'localhost',
      port: 1433,
      user: 'sa',
      password: 'test-secret',
      database: 'testdb',
      options: {
        encrypt: false,
        trustServerCertificate: true,
      },
      pool: { max: 1, min: 0 },
      requestTimeout: 30_000,
      connectionTimeout: 15_000,
    });
  });

  it('uses explicit port and options', () => {
    const poolConfig = BuildPoolConfig({
      ...baseConfig,
      Port: 1500,
      Options: {
        Encrypt: true,
        TrustServerCertificate: false,
        RequestTimeout: 5_000,
        ConnectionTimeout: 2_000,
      },
    });

    expect(poolConfig.port).toBe(1500);
    expect(poolConfig.options).toEqual({ encrypt: true, trustServerCertificate: false });
    expect(poolConfig.requestTimeout).toBe(5_000);
    expect(poolConfig.connectionTimeout).toBe(2_000);
  });
});

describe('ConnectionManager', () => {
  it('is not connected before Connect()', () => {
    expect(new ConnectionManager(baseConfig).IsConnected).toBe(false);
  });

  it('refuses to hand out a pool before Connect()', () => {
    expect(() => new ConnectionManager(baseConfig).GetPool()).toThrow(ConnectionError);
  });

  it('allows Disconnect() without a connection', async () => {
    await expect(new ConnectionManager(baseConfig).Disconnect()).resolves.toBeUndefined();
  });
});
