/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Graph store interface used by retrievers and memory.
 *
 * This interface abstracts the database driver so retrieval and memory
 * logic can run against an in-process fake in tests.
 *
 * @see ./neo4jStore.ts for the Neo4j implementation
 */

/**
 * Parameters bound to a Cypher statement.
 */
export type CypherParams = Record<string, unknown>;

/**
 * A result row, keyed by the names in the RETURN clause.
 */
export type CypherRow = Record<string, unknown>;

/**
 * Connection settings for a graph store.
 */
export interface ConnectionConfig {
  uri: string;
  username: string;
  password: string;
}

/**
 * A Cypher-capable graph database.
 *
 * @example
 * ```typescript
 * const store = new Neo4jGraphStore(connection);
 * await store.verifyConnectivity();
 *
 * const rows = await store.run(
 *   'MATCH (m:Memory) WHERE m.user_id = $user_id RETURN m.text AS text',
 *   { user_id: 'u-1' },
 * );
 *
 * await store.close();
 * ```
 */
export interface GraphStore {
  /**
   * Check that the store is reachable and the credentials are accepted.
   *
   * @throws ConnectionError if not
   */
  verifyConnectivity(): Promise<void>;

  /**
   * Run one statement and collect its rows.
   *
   * @throws StoreQueryError if the store rejects the statement
   */
  run(cypher: string, params?: CypherParams): Promise<CypherRow[]>;

  /**
   * Release the underlying driver.
   */
  close(): Promise<void>;
}

/**
 * Builds a store for a connection. Injected into the provider so tests can
 * supply a fake.
 */
export type GraphStoreFactory = (connection: ConnectionConfig) => GraphStore;
