/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Vector similarity retrievers, with and without graph
 * enrichment.
 */

import type { Embedder } from '../memory/embeddings/embeddings.js';
import type { GraphStore } from '../store/store.js';
import type { RetrieverResultItem } from '../types.js';
import { EmbeddingError, getErrorMessage } from '../utils/errors.js';
import { VECTOR_LOOKUP, nodeProjection, withReturn } from './cypherQueries.js';
import { fetchIndexInfo, type IndexInfo } from './indexInfo.js';
import { formatCypherRecord, formatNodeRecord } from './recordFormatter.js';
import type { Retriever, RetrieverKind } from './retriever.js';

/**
 * Embed a query for a vector index, checking the dimensions the index was
 * created with.
 *
 * @throws EmbeddingError if the embedder fails or returns the wrong size
 */
export async function embedForIndex(
  embedder: Embedder,
  text: string,
  index: IndexInfo,
): Promise<number[]> {
  let vector: number[];
  try {
    vector = await embedder.embedQuery(text);
  } catch (error) {
    if (error instanceof EmbeddingError) {
      throw error;
    }
    throw new EmbeddingError(
      `Failed to embed query: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  if (index.dimensions !== undefined && vector.length !== index.dimensions) {
    throw new EmbeddingError(
      `Embedding has ${vector.length} dimensions but index '${index.name}' expects ${index.dimensions}`,
    );
  }
  return vector;
}

export interface VectorRetrieverOptions {
  indexName: string;
  embedder: Embedder;
}

export interface VectorCypherRetrieverOptions extends VectorRetrieverOptions {
  retrievalQuery: string;
}

abstract class BaseVectorRetriever implements Retriever {
  abstract readonly kind: RetrieverKind;

  protected constructor(
    protected readonly store: GraphStore,
    protected readonly embedder: Embedder,
    protected readonly index: IndexInfo,
  ) {}

  protected abstract readonly query: string;

  protected abstract format(row: Record<string, unknown>): RetrieverResultItem;

  async search(queryText: string, topK: number): Promise<RetrieverResultItem[]> {
    const vector = await embedForIndex(this.embedder, queryText, this.index);
    const rows = await this.store.run(this.query, {
      vector_index_name: this.index.name,
      top_k: topK,
      query_vector: vector,
    });
    return rows.map((row) => this.format(row));
  }
}

/**
 * Nearest neighbours from a vector index, returned as node properties.
 */
export class VectorRetriever extends BaseVectorRetriever {
  readonly kind = 'vector';
  protected readonly query: string;

  private constructor(store: GraphStore, embedder: Embedder, index: IndexInfo) {
    super(store, embedder, index);
    this.query = withReturn(VECTOR_LOOKUP, nodeProjection(index.properties[0]));
  }

  static async create(
    store: GraphStore,
    options: VectorRetrieverOptions,
  ): Promise<VectorRetriever> {
    const index = await fetchIndexInfo(store, options.indexName, 'VECTOR');
    return new VectorRetriever(store, options.embedder, index);
  }

  protected format(row: Record<string, unknown>): RetrieverResultItem {
    return formatNodeRecord(row);
  }
}

/**
 * Nearest neighbours from a vector index, expanded by a retrieval query.
 */
export class VectorCypherRetriever extends BaseVectorRetriever {
  readonly kind = 'vector-cypher';
  protected readonly query: string;

  private constructor(
    store: GraphStore,
    embedder: Embedder,
    index: IndexInfo,
    retrievalQuery: string,
  ) {
    super(store, embedder, index);
    this.query = withReturn(VECTOR_LOOKUP, retrievalQuery);
  }

  static async create(
    store: GraphStore,
    options: VectorCypherRetrieverOptions,
  ): Promise<VectorCypherRetriever> {
    const index = await fetchIndexInfo(store, options.indexName, 'VECTOR');
    return new VectorCypherRetriever(
      store,
      options.embedder,
      index,
      options.retrievalQuery,
    );
  }

  protected format(row: Record<string, unknown>): RetrieverResultItem {
    return formatCypherRecord(row);
  }
}
