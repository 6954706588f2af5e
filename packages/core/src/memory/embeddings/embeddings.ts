/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Embedder interface for generating query vectors.
 *
 * The provider embeds one text per call, for knowledge search, memory search
 * and each stored memory. Batch embedding is never assumed.
 *
 * @see ./ollamaEmbeddings.ts for the Ollama implementation
 * @see ./openaiEmbeddings.ts for the OpenAI-compatible implementation
 */

/**
 * Anything that can turn a text into a vector.
 *
 * May be synchronous; the provider always calls it through its executor.
 *
 * @example
 * ```typescript
 * const embedder = new OllamaEmbeddings({
 *   baseUrl: 'http://localhost:11434',
 *   model: 'nomic-embed-text',
 *   dimension: 768,
 * });
 *
 * const vector = await embedder.embedQuery('Which engines report vibration?');
 * ```
 */
export interface Embedder {
  embedQuery(text: string): number[] | Promise<number[]>;
}

/**
 * Configuration for an HTTP embedding client.
 */
export interface EmbeddingConfig {
  /** Base URL for the embedding API (e.g., 'http://localhost:11434') */
  baseUrl: string;

  /** Model name to use for embeddings (e.g., 'nomic-embed-text') */
  model: string;

  /** Expected dimension of the embedding vectors (e.g., 768) */
  dimension: number;

  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

/**
 * An embedder backed by a remote model, exposing its model and dimension.
 */
export interface EmbeddingClient extends Embedder {
  embedQuery(text: string): Promise<number[]>;

  /**
   * Get the embedding dimension for this model.
   */
  getDimension(): number;

  /**
   * Get the model name being used.
   */
  getModel(): string;
}

/**
 * Type guard used when validating options.
 */
export function isEmbedder(value: unknown): value is Embedder {
  return (
    typeof value === 'object' &&
    value !== null &&
    'embedQuery' in value &&
    typeof value.embedQuery === 'function'
  );
}
