/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Hybrid retrievers: a vector and a fulltext lookup merged
 * into one ranking, with and without graph enrichment.
 */

import type { Embedder } from '../memory/embeddings/embeddings.js';
import type { CypherRow, GraphStore } from '../store/store.js';
import type { RetrieverResultItem } from '../types.js';
import { HYBRID_LOOKUP, nodeProjection, withReturn } from './cypherQueries.js';
import { fetchIndexInfo, type IndexInfo } from './indexInfo.js';
import { formatCypherRecord, formatNodeRecord } from './recordFormatter.js';
import type { Retriever } from './retriever.js';
import { escapeLucene, toFulltextQuery } from './stopWords.js';
import { embedForIndex } from './vectorRetriever.js';

export interface HybridRetrieverOptions {
  indexName: string;
  fulltextIndexName: string;
  embedder: Embedder;
  /** Send only keywords to the fulltext leg */
  filterStopWords: boolean;
}

interface HybridIndexes {
  vector: IndexInfo;
  fulltext: IndexInfo;
}

async function fetchHybridIndexes(
  store: GraphStore,
  options: HybridRetrieverOptions,
): Promise<HybridIndexes> {
  const vector = await fetchIndexInfo(store, options.indexName, 'VECTOR');
  const fulltext = await fetchIndexInfo(
    store,
    options.fulltextIndexName,
    'FULLTEXT',
  );
  return { vector, fulltext };
}

/**
 * Text for the fulltext leg. The vector leg always sees the full text, so a
 * query with no keywords falls back to the escaped text instead of skipping
 * the leg.
 */
function fulltextLegQuery(queryText: string, filterStopWords: boolean): string {
  return (
    toFulltextQuery(queryText, filterStopWords) ||
    escapeLucene(queryText.trim())
  );
}

class HybridSearch {
  constructor(
    private readonly store: GraphStore,
    private readonly embedder: Embedder,
    private readonly indexes: HybridIndexes,
    private readonly filterStopWords: boolean,
    readonly query: string,
  ) {}

  async run(queryText: string, topK: number): Promise<CypherRow[]> {
    const vector = await embedForIndex(
      this.embedder,
      queryText,
      this.indexes.vector,
    );
    return this.store.run(this.query, {
      vector_index_name: this.indexes.vector.name,
      fulltext_index_name: this.indexes.fulltext.name,
      top_k: topK,
      query_vector: vector,
      query_text: fulltextLegQuery(queryText, this.filterStopWords),
    });
  }
}

export class HybridRetriever implements Retriever {
  readonly kind = 'hybrid';

  private constructor(private readonly hybrid: HybridSearch) {}

  static async create(
    store: GraphStore,
    options: HybridRetrieverOptions,
  ): Promise<HybridRetriever> {
    const indexes = await fetchHybridIndexes(store, options);
    const query = withReturn(
      HYBRID_LOOKUP,
      nodeProjection(indexes.vector.properties[0]),
    );
    return new HybridRetriever(
      new HybridSearch(
        store,
        options.embedder,
        indexes,
        options.filterStopWords,
        query,
      ),
    );
  }

  async search(queryText: string, topK: number): Promise<RetrieverResultItem[]> {
    const rows = await this.hybrid.run(queryText, topK);
    return rows.map(formatNodeRecord);
  }
}

export class HybridCypherRetriever implements Retriever {
  readonly kind = 'hybrid-cypher';

  private constructor(private readonly hybrid: HybridSearch) {}

  static async create(
    store: GraphStore,
    options: HybridRetrieverOptions & { retrievalQuery: string },
  ): Promise<HybridCypherRetriever> {
    const indexes = await fetchHybridIndexes(store, options);
    return new HybridCypherRetriever(
      new HybridSearch(
        store,
        options.embedder,
        indexes,
        options.filterStopWords,
        withReturn(HYBRID_LOOKUP, options.retrievalQuery),
      ),
    );
  }

  async search(queryText: string, topK: number): Promise<RetrieverResultItem[]> {
    const rows = await this.hybrid.run(queryText, topK);
    return rows.map(formatCypherRecord);
  }
}
