/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Embeddings layer exports.
 */

export type {
  Embedder,
  EmbeddingClient,
  EmbeddingConfig,
} from './embeddings.js';
export { isEmbedder } from './embeddings.js';

export { OllamaEmbeddings } from './ollamaEmbeddings.js';
export {
  OpenAIEmbeddings,
  OPENAI_BASE_URL,
  type OpenAIEmbeddingConfig,
} from './openaiEmbeddings.js';
export {
  EmbeddingProviderFactory,
  type EmbeddingProvider,
  type ProviderInfo,
} from './embeddingProviderFactory.js';
