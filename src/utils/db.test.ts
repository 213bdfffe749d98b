/**
 * Unit tests for the database connection pool utility.
 *
 * These tests verify configuration parsing and pool creation
 * without requiring a live database connection.
 */

import { describe, it, expect } from 'vitest';
import { getDbConfig, createPool, sqlStateOf } from './db.js';

describe('db utility', () => {
  describe('getDbConfig', () => {
    it('should return default configuration when no env vars are set', () => {
      const config = getDbConfig({});

      expect(config.host).toBe('localhost');
      expect(config.port).toBe(5432);
      expect(config.database).toBe('traces');
      expect(config.user).toBe('postgres');
      expect(config.password).toBe('');
      expect(config.max).toBe(10);
      expect(config.idleTimeoutMillis).toBe(30000);
      expect(config.connectionTimeoutMillis).toBe(5000);
      expect(config.ssl).toBe(false);
    });

    it('should read configuration from environment variables', () => {
      const config = getDbConfig({
        DB_HOST: 'db.internal',
        DB_PORT: '5433',
        DB_NAME: 'trace_db',
        DB_USER: 'tracer',
        DB_PASSWORD: 'test-secret',
        DB_POOL_MAX: '4',
        DB_IDLE_TIMEOUT: '60000',
        DB_CONNECT_TIMEOUT: '10000',
        DB_SSL: 'true',
      });

      expect(config).toEqual({
        host: 'db.internal',
        port: 5433,
        database: 'trace_db',
        user: 'tracer',
        password: 'test-secret',
        max: 4,
        idleTimeoutMillis: 60000,
        connectionTimeoutMillis: 10000,
        ssl: true,
      });
    });

    it('should fall back to defaults for unparseable numbers', () => {
      const config = getDbConfig({ DB_PORT: 'abc', DB_POOL_MAX: '-3' });

      expect(config.port).toBe(5432);
      expect(config.max).toBe(10);
    });
  });

  describe('createPool', () => {
    it('should create a pool with custom config overrides', async () => {
      const pool = createPool({ host: 'custom-host', port: 5433, max: 2 });
      expect(pool.totalCount).toBe(0);
      await pool.end();
    });
  });

  describe('sqlStateOf', () => {
    it('should read the SQLSTATE code from a driver error', () => {
      const error = Object.assign(new Error('duplicate key'), { code: '23505' });
      expect(sqlStateOf(error)).toBe('23505');
    });

    it('should ignore errors without a SQLSTATE code', () => {
      const error = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });
      expect(sqlStateOf(error)).toBeUndefined();
      expect(sqlStateOf(new Error('plain'))).toBeUndefined();
      expect(sqlStateOf('not an error')).toBeUndefined();
    });
  });
});
