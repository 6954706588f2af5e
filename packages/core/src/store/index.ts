/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Store layer exports.
 */

export type {
  ConnectionConfig,
  CypherParams,
  CypherRow,
  GraphStore,
  GraphStoreFactory,
} from './store.js';

export {
  Neo4jGraphStore,
  createNeo4jGraphStore,
  toCypherParams,
} from './neo4jStore.js';
