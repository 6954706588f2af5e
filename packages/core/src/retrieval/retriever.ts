/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Retriever contract shared by all search strategies.
 */

import type { RetrieverResultItem } from '../types.js';

/**
 * The five search strategies. Enrichment turns the default node projection
 * into a user-supplied retrieval query.
 */
export type RetrieverKind =
  | 'vector'
  | 'vector-cypher'
  | 'hybrid'
  | 'hybrid-cypher'
  | 'fulltext';

/**
 * A search strategy bound to one index (or index pair) on one store.
 */
export interface Retriever {
  readonly kind: RetrieverKind;

  /**
   * Search for the given text.
   *
   * @returns Up to `topK` items ordered by descending score
   */
  search(queryText: string, topK: number): Promise<RetrieverResultItem[]>;
}
