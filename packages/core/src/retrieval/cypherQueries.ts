/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Cypher for index lookups.
 *
 * Every lookup yields `node` and `score`, which the default projection or a
 * user retrieval query then turns into rows.
 */

import { quoteIdentifier } from './indexInfo.js';

export const VECTOR_LOOKUP = `CALL db.index.vector.queryNodes($vector_index_name, $top_k, $query_vector)
YIELD node, score`;

export const FULLTEXT_LOOKUP = `CALL db.index.fulltext.queryNodes($fulltext_index_name, $query_text, {limit: $top_k})
YIELD node, score`;

/**
 * Union of a vector and a fulltext lookup. Each leg is normalised by its own
 * top score, and a node found by both keeps the better one.
 */
export const HYBRID_LOOKUP = `CALL {
  CALL db.index.vector.queryNodes($vector_index_name, $top_k, $query_vector)
  YIELD node, score
  WITH collect({node: node, score: score}) AS nodes, max(score) AS vector_index_max_score
  UNWIND nodes AS n
  RETURN n.node AS node, (n.score / vector_index_max_score) AS score
  UNION
  CALL db.index.fulltext.queryNodes($fulltext_index_name, $query_text, {limit: $top_k})
  YIELD node, score
  WITH collect({node: node, score: score}) AS nodes, max(score) AS ft_index_max_score
  UNWIND nodes AS n
  RETURN n.node AS node, (n.score / ft_index_max_score) AS score
}
WITH node, max(score) AS score ORDER BY score DESC LIMIT $top_k`;

export const FULLTEXT_DEFAULT_RETURN = 'RETURN node.text AS text, score';

/**
 * Node projection with the embedding blanked out.
 */
export function nodeProjection(embeddingProperty: string | undefined): string {
  const blanked = embeddingProperty
    ? `, ${quoteIdentifier(embeddingProperty)}: null`
    : '';
  return `RETURN node {.*${blanked}} AS node, labels(node) AS nodeLabels, elementId(node) AS id, score`;
}

/**
 * Append a projection or retrieval query to a lookup.
 */
export function withReturn(lookup: string, tail: string): string {
  return `${lookup}\nWITH node, score\n${tail}`;
}
