/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Neo4j implementation of the GraphStore interface.
 *
 * Wraps neo4j-driver with one session per statement. Integers come back as
 * JavaScript numbers (`disableLosslessIntegers`), and top-level integer
 * parameters are sent as Cypher INTEGER so they can feed `LIMIT` and index
 * procedure arguments.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import { debugLogger } from '../utils/debugLogger.js';
import {
  ConnectionError,
  StoreQueryError,
  getErrorMessage,
} from '../utils/errors.js';
import type {
  ConnectionConfig,
  CypherParams,
  CypherRow,
  GraphStore,
} from './store.js';

const UNAUTHORIZED_CODES = new Set([
  'Neo.ClientError.Security.Unauthorized',
  'Neo.ClientError.Security.AuthenticationRateLimit',
]);

const UNAVAILABLE_CODES = new Set(['ServiceUnavailable', 'SessionExpired']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Convert top-level integer parameters to Cypher integers.
 *
 * Nested values (lists, maps) are left alone: embedding lists must stay
 * floats and memory batches carry no integers.
 */
export function toCypherParams(params: CypherParams): CypherParams {
  const converted: CypherParams = {};
  for (const [key, value] of Object.entries(params)) {
    converted[key] =
      typeof value === 'number' && Number.isInteger(value)
        ? neo4j.int(value)
        : value;
  }
  return converted;
}

export class Neo4jGraphStore implements GraphStore {
  private readonly uri: string;
  private driver: Driver | null;

  constructor(connection: ConnectionConfig) {
    this.uri = connection.uri;
    this.driver = neo4j.driver(
      connection.uri,
      neo4j.auth.basic(connection.username, connection.password),
      { disableLosslessIntegers: true },
    );
  }

  async verifyConnectivity(): Promise<void> {
    const driver = this.getDriver();
    try {
      await driver.verifyConnectivity();
      debugLogger.log(`Neo4jGraphStore: Connected to ${this.uri}`);
    } catch (error) {
      const code = errorCode(error);
      const message = getErrorMessage(error);
      if (code && UNAUTHORIZED_CODES.has(code)) {
        debugLogger.error(`Neo4jGraphStore: Authentication failed: ${message}`);
        throw new ConnectionError(`Neo4j authentication failed: ${message}`, {
          cause: error,
        });
      }
      if (code && UNAVAILABLE_CODES.has(code)) {
        debugLogger.error(`Neo4jGraphStore: Service unavailable: ${message}`);
        throw new ConnectionError(`Neo4j service unavailable: ${message}`, {
          cause: error,
        });
      }
      debugLogger.error(`Neo4jGraphStore: Failed to connect: ${message}`);
      throw new ConnectionError(`Failed to connect to Neo4j: ${message}`, {
        cause: error,
      });
    }
  }

  async run(cypher: string, params: CypherParams = {}): Promise<CypherRow[]> {
    const session = this.getDriver().session();
    try {
      const result = await session.run(cypher, toCypherParams(params));
      return result.records.map((record) => record.toObject());
    } catch (error) {
      const code = errorCode(error);
      if (code && UNAVAILABLE_CODES.has(code)) {
        throw new ConnectionError(
          `Neo4j service unavailable: ${getErrorMessage(error)}`,
          { cause: error },
        );
      }
      throw new StoreQueryError(getErrorMessage(error), {
        cause: error,
        storeCode: code,
      });
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    if (!this.driver) {
      return;
    }
    const driver = this.driver;
    this.driver = null;
    await driver.close();
    debugLogger.log('Neo4jGraphStore: Connection closed');
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new ConnectionError('Neo4jGraphStore is closed');
    }
    return this.driver;
  }
}

/**
 * Default GraphStoreFactory.
 */
export function createNeo4jGraphStore(
  connection: ConnectionConfig,
): GraphStore {
  return new Neo4jGraphStore(connection);
}
