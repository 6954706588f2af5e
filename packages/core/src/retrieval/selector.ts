/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Picks and builds the retriever for a search configuration.
 */

import type { IndexType, SearchConfig } from '../config/providerConfig.js';
import type { GraphStore } from '../store/store.js';
import { ConfigurationError } from '../utils/errors.js';
import { FulltextRetriever } from './fulltextRetriever.js';
import { HybridCypherRetriever, HybridRetriever } from './hybridRetriever.js';
import type { Retriever, RetrieverKind } from './retriever.js';
import { VectorCypherRetriever, VectorRetriever } from './vectorRetriever.js';

const RETRIEVER_TABLE: Record<IndexType, Record<'plain' | 'enriched', RetrieverKind>> = {
  vector: { plain: 'vector', enriched: 'vector-cypher' },
  hybrid: { plain: 'hybrid', enriched: 'hybrid-cypher' },
  fulltext: { plain: 'fulltext', enriched: 'fulltext' },
};

export function selectRetrieverKind(
  indexType: IndexType,
  enriched: boolean,
): RetrieverKind {
  return RETRIEVER_TABLE[indexType][enriched ? 'enriched' : 'plain'];
}

function requireOption<T>(value: T | undefined, message: string): T {
  if (value === undefined) {
    throw new ConfigurationError(message);
  }
  return value;
}

/**
 * Build the retriever for a search configuration, probing its index
 * metadata.
 *
 * @throws StoreQueryError if an index is missing or has the wrong type
 */
export async function createRetriever(
  search: SearchConfig,
  store: GraphStore,
): Promise<Retriever> {
  const kind = selectRetrieverKind(search.indexType, search.useGraphEnrichment);

  switch (kind) {
    case 'vector':
    case 'vector-cypher':
    case 'hybrid':
    case 'hybrid-cypher': {
      const embedder = requireOption(
        search.embedder,
        `embedder is required when indexType is '${search.indexType}'`,
      );
      if (kind === 'vector') {
        return VectorRetriever.create(store, {
          indexName: search.indexName,
          embedder,
        });
      }
      if (kind === 'vector-cypher') {
        return VectorCypherRetriever.create(store, {
          indexName: search.indexName,
          embedder,
          retrievalQuery: requireOption(
            search.retrievalQuery,
            'retrievalQuery is required for graph enrichment',
          ),
        });
      }

      const hybridOptions = {
        indexName: search.indexName,
        fulltextIndexName: requireOption(
          search.fulltextIndexName,
          "fulltextIndexName is required when indexType is 'hybrid'",
        ),
        embedder,
        filterStopWords: search.filterStopWords,
      };
      if (kind === 'hybrid') {
        return HybridRetriever.create(store, hybridOptions);
      }
      return HybridCypherRetriever.create(store, {
        ...hybridOptions,
        retrievalQuery: requireOption(
          search.retrievalQuery,
          'retrievalQuery is required for graph enrichment',
        ),
      });
    }
    case 'fulltext':
      return FulltextRetriever.create(store, {
        indexName: search.indexName,
        filterStopWords: search.filterStopWords,
        retrievalQuery: search.retrievalQuery,
      });
    default: {
      const unreachable: never = kind;
      throw new ConfigurationError(`Unknown retriever kind: ${String(unreachable)}`);
    }
  }
}
