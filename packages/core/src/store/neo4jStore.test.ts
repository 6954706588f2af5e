/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Neo4jGraphStore, toCypherParams } from './neo4jStore.js';
import { debugLogger } from '../utils/debugLogger.js';
import { ConnectionError, StoreQueryError } from '../utils/errors.js';

const mocks = vi.hoisted(() => {
  const session = { run: vi.fn(), close: vi.fn() };
  const driver = {
    verifyConnectivity: vi.fn(),
    session: vi.fn(() => session),
    close: vi.fn(),
  };
  return {
    session,
    driver,
    createDriver: vi.fn(() => driver),
    basicAuth: vi.fn(() => ({ scheme: 'basic' })),
    toInt: vi.fn((value: number) => ({ low: value, high: 0 })),
  };
});

vi.mock('neo4j-driver', () => ({
  default: {
    driver: mocks.createDriver,
    auth: { basic: mocks.basicAuth },
    int: mocks.toInt,
  },
}));

function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

const connection = {
  uri: 'bolt://localhost:7687',
  username: 'neo4j',
  password: 'test-secret',
};

describe('toCypherParams', () => {
  it('should convert top-level integers only', () => {
    expect(
      toCypherParams({ top_k: 5, score: 0.5, name: 'idx', vector: [1, 2] }),
    ).toEqual({
      top_k: { low: 5, high: 0 },
      score: 0.5,
      name: 'idx',
      vector: [1, 2],
    });
  });
});

describe('Neo4jGraphStore', () => {
  beforeEach(() => {
    vi.spyOn(debugLogger, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  it('should create a driver with basic auth and plain numbers', () => {
    new Neo4jGraphStore(connection);

    expect(mocks.basicAuth).toHaveBeenCalledWith('neo4j', 'test-secret');
    expect(mocks.createDriver).toHaveBeenCalledWith(
      'bolt://localhost:7687',
      { scheme: 'basic' },
      { disableLosslessIntegers: true },
    );
  });

  describe('run', () => {
    it('should return rows as objects and close the session', async () => {
      mocks.session.run.mockResolvedValueOnce({
        records: [{ toObject: () => ({ text: 'Engine mounts', score: 0.9 }) }],
      });
      const store = new Neo4jGraphStore(connection);

      const rows = await store.run('RETURN $top_k', { top_k: 3 });

      expect(rows).toEqual([{ text: 'Engine mounts', score: 0.9 }]);
      expect(mocks.session.run).toHaveBeenCalledWith('RETURN $top_k', {
        top_k: { low: 3, high: 0 },
      });
      expect(mocks.session.close).toHaveBeenCalledTimes(1);
    });

    it('should wrap rejected statements with the driver code', async () => {
      mocks.session.run.mockRejectedValueOnce(
        driverError('Invalid input', 'Neo.ClientError.Statement.SyntaxError'),
      );
      const store = new Neo4jGraphStore(connection);

      const error = await store.run('RETRN 1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreQueryError);
      expect(error).toHaveProperty('message', 'Invalid input');
      expect(error).toHaveProperty(
        'storeCode',
        'Neo.ClientError.Statement.SyntaxError',
      );
      expect(mocks.session.close).toHaveBeenCalledTimes(1);
    });

    it('should report lost connections as ConnectionError', async () => {
      mocks.session.run.mockRejectedValueOnce(
        driverError('Connection lost', 'ServiceUnavailable'),
      );
      const store = new Neo4jGraphStore(connection);

      await expect(store.run('RETURN 1')).rejects.toThrow(
        'Neo4j service unavailable: Connection lost',
      );
    });
  });

  describe('verifyConnectivity', () => {
    it('should map rejected credentials', async () => {
      mocks.driver.verifyConnectivity.mockRejectedValueOnce(
        driverError(
          'The client is unauthorized',
          'Neo.ClientError.Security.Unauthorized',
        ),
      );
      const store = new Neo4jGraphStore(connection);

      await expect(store.verifyConnectivity()).rejects.toThrow(
        'Neo4j authentication failed: The client is unauthorized',
      );
    });

    it('should map an unreachable server', async () => {
      mocks.driver.verifyConnectivity.mockRejectedValueOnce(
        driverError('Could not perform discovery', 'ServiceUnavailable'),
      );
      const store = new Neo4jGraphStore(connection);

      await expect(store.verifyConnectivity()).rejects.toThrow(
        'Neo4j service unavailable: Could not perform discovery',
      );
    });

    it('should wrap any other failure', async () => {
      mocks.driver.verifyConnectivity.mockRejectedValueOnce(new Error('boom'));
      const store = new Neo4jGraphStore(connection);

      const error = await store.verifyConnectivity().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toHaveProperty('message', 'Failed to connect to Neo4j: boom');
    });
  });

  describe('close', () => {
    it('should close the driver once', async () => {
      const store = new Neo4jGraphStore(connection);

      await store.close();
      await store.close();

      expect(mocks.driver.close).toHaveBeenCalledTimes(1);
    });

    it('should refuse statements after closing', async () => {
      const store = new Neo4jGraphStore(connection);
      await store.close();

      await expect(store.run('RETURN 1')).rejects.toThrow(
        'Neo4jGraphStore is closed',
      );
    });
  });
});
