/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Conversion of Cypher result rows into retriever items.
 */

import type { CypherRow } from '../store/store.js';
import type { RetrieverResultItem } from '../types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format a row produced by a retrieval query.
 *
 * `text` becomes the content, else the first string column, else the whole
 * row as JSON. Every column not used as content goes to metadata.
 */
export function formatCypherRecord(row: CypherRow): RetrieverResultItem {
  const entries = Object.entries(row);

  let contentKey: string | undefined;
  if (typeof row['text'] === 'string') {
    contentKey = 'text';
  } else {
    contentKey = entries.find(([, value]) => typeof value === 'string')?.[0];
  }

  if (contentKey === undefined) {
    return { content: JSON.stringify(row), metadata: null };
  }

  const content = String(row[contentKey]);
  const rest = entries.filter(([key]) => key !== contentKey);
  return {
    content,
    metadata: rest.length > 0 ? Object.fromEntries(rest) : null,
  };
}

/**
 * Format a row from the default node projection
 * (`node`, `nodeLabels`, `id`, `score`).
 *
 * The embedding property is projected as null, so null properties are left
 * out of the JSON fallback.
 */
export function formatNodeRecord(row: CypherRow): RetrieverResultItem {
  const node = isRecord(row['node']) ? row['node'] : {};
  const properties = Object.fromEntries(
    Object.entries(node).filter(([, value]) => value !== null),
  );
  const text = properties['text'];

  return {
    content: typeof text === 'string' ? text : JSON.stringify(properties),
    metadata: {
      score: row['score'],
      nodeLabels: row['nodeLabels'],
      id: row['id'],
    },
  };
}
