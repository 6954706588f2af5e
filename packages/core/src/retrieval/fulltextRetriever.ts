/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Keyword search over a fulltext index.
 *
 * Serves both the plain and the enriched fulltext strategy: the retrieval
 * query, when given, replaces the default `text`/`score` projection.
 */

import type { GraphStore } from '../store/store.js';
import type { RetrieverResultItem } from '../types.js';
import { debugLogger } from '../utils/debugLogger.js';
import {
  FULLTEXT_DEFAULT_RETURN,
  FULLTEXT_LOOKUP,
  withReturn,
} from './cypherQueries.js';
import { fetchIndexInfo, type IndexInfo } from './indexInfo.js';
import { formatCypherRecord } from './recordFormatter.js';
import type { Retriever } from './retriever.js';
import { toFulltextQuery } from './stopWords.js';

export interface FulltextRetrieverOptions {
  indexName: string;
  filterStopWords: boolean;
  retrievalQuery?: string;
}

export class FulltextRetriever implements Retriever {
  readonly kind = 'fulltext';
  private readonly query: string;

  private constructor(
    private readonly store: GraphStore,
    private readonly index: IndexInfo,
    private readonly filterStopWords: boolean,
    retrievalQuery: string | undefined,
  ) {
    this.query = withReturn(
      FULLTEXT_LOOKUP,
      retrievalQuery ?? FULLTEXT_DEFAULT_RETURN,
    );
  }

  static async create(
    store: GraphStore,
    options: FulltextRetrieverOptions,
  ): Promise<FulltextRetriever> {
    const index = await fetchIndexInfo(store, options.indexName, 'FULLTEXT');
    return new FulltextRetriever(
      store,
      index,
      options.filterStopWords,
      options.retrievalQuery,
    );
  }

  async search(queryText: string, topK: number): Promise<RetrieverResultItem[]> {
    const fulltextQuery = toFulltextQuery(queryText, this.filterStopWords);
    if (!fulltextQuery) {
      debugLogger.debug(
        'FulltextRetriever: No keywords left after filtering, skipping search',
      );
      return [];
    }

    const rows = await this.store.run(this.query, {
      fulltext_index_name: this.index.name,
      query_text: fulltextQuery,
      top_k: topK,
    });
    return rows.map(formatCypherRecord);
  }
}
