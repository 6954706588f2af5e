/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { createRetriever, selectRetrieverKind } from './selector.js';
import {
  parseProviderOptions,
  type IndexType,
  type ProviderOptions,
} from '../config/providerConfig.js';
import type { RetrieverKind } from './retriever.js';
import {
  FakeGraphStore,
  fulltextIndexRow,
  vectorIndexRow,
} from '../test-utils/fakeGraphStore.js';
import { StoreQueryError } from '../utils/errors.js';

const embedder = { embedQuery: () => [0.1, 0.2, 0.3] };

function searchConfig(options: ProviderOptions) {
  return parseProviderOptions(options, {}).search;
}

function indexedStore(): FakeGraphStore {
  return new FakeGraphStore().withIndexes(
    vectorIndexRow('chunks'),
    fulltextIndexRow('chunkText'),
  );
}

const selectionTable: Array<[IndexType, boolean, RetrieverKind]> = [
  ['vector', false, 'vector'],
  ['vector', true, 'vector-cypher'],
  ['hybrid', false, 'hybrid'],
  ['hybrid', true, 'hybrid-cypher'],
  ['fulltext', false, 'fulltext'],
  ['fulltext', true, 'fulltext'],
];

describe('selectRetrieverKind', () => {
  it.each(selectionTable)('should map %s (enriched: %s) to %s', (indexType, enriched, kind) => {
    expect(selectRetrieverKind(indexType, enriched)).toBe(kind);
  });
});

const retrievalQuery = 'RETURN node.text AS text, score';

const builds: Array<[ProviderOptions, RetrieverKind]> = [
  [{ indexName: 'chunks', embedder }, 'vector'],
  [{ indexName: 'chunks', embedder, retrievalQuery }, 'vector-cypher'],
  [
    {
      indexName: 'chunks',
      indexType: 'hybrid',
      fulltextIndexName: 'chunkText',
      embedder,
    },
    'hybrid',
  ],
  [
    {
      indexName: 'chunks',
      indexType: 'hybrid',
      fulltextIndexName: 'chunkText',
      embedder,
      retrievalQuery,
    },
    'hybrid-cypher',
  ],
  [{ indexName: 'chunkText', indexType: 'fulltext' }, 'fulltext'],
  [{ indexName: 'chunkText', indexType: 'fulltext', retrievalQuery }, 'fulltext'],
];

describe('createRetriever', () => {
  it.each(builds)('should build configuration %# as %s', async (options, kind) => {
    const retriever = await createRetriever(searchConfig(options), indexedStore());

    expect(retriever.kind).toBe(kind);
  });

  it('should propagate probe failures', async () => {
    const create = createRetriever(
      searchConfig({ indexName: 'unknown', indexType: 'fulltext' }),
      indexedStore(),
    );

    await expect(create).rejects.toThrow(StoreQueryError);
  });
});
