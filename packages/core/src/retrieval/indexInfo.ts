/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Index metadata probe.
 *
 * Retrievers read the index definition once, when they are created, to learn
 * which label and properties it covers and, for vector indexes, the
 * embedding dimensions.
 */

import { z } from 'zod';
import type { GraphStore } from '../store/store.js';
import { StoreQueryError } from '../utils/errors.js';

export type IndexKind = 'VECTOR' | 'FULLTEXT';

export interface IndexInfo {
  name: string;
  type: IndexKind;
  labels: string[];
  properties: string[];
  /** Vector indexes only */
  dimensions?: number;
}

const SHOW_INDEX_QUERY = `SHOW INDEXES YIELD name, type, labelsOrTypes, properties, options
WHERE name = $name
RETURN name, type, labelsOrTypes, properties,
       options.indexConfig.\`vector.dimensions\` AS dimensions`;

const indexRowSchema = z.object({
  name: z.string(),
  type: z.string(),
  labelsOrTypes: z.array(z.string()).nullable(),
  properties: z.array(z.string()).nullable(),
  dimensions: z.number().nullish(),
});

/**
 * Read the definition of an index and check its type.
 *
 * @throws StoreQueryError if the index does not exist or has another type
 */
export async function fetchIndexInfo(
  store: GraphStore,
  name: string,
  expected: IndexKind,
): Promise<IndexInfo> {
  const rows = await store.run(SHOW_INDEX_QUERY, { name });
  if (rows.length === 0) {
    throw new StoreQueryError(`No index named '${name}' exists`);
  }

  const parsed = indexRowSchema.safeParse(rows[0]);
  if (!parsed.success) {
    throw new StoreQueryError(
      `Unexpected metadata for index '${name}': ${parsed.error.message}`,
      { cause: parsed.error },
    );
  }

  const row = parsed.data;
  if (row.type !== expected) {
    throw new StoreQueryError(
      `Index '${name}' is a ${row.type} index, expected ${expected}`,
    );
  }

  return {
    name: row.name,
    type: expected,
    labels: row.labelsOrTypes ?? [],
    properties: row.properties ?? [],
    dimensions: row.dimensions ?? undefined,
  };
}

/**
 * Quote a label or property name for interpolation into Cypher.
 */
export function quoteIdentifier(identifier: string): string {
  return `\`${identifier.replace(/`/g, '``')}\``;
}
