/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Public exports for conversation memory.
 *
 * ```
 * invoked() → ensureIndexes() → store() → (:Memory {text, role, scope...})
 * invoking() → search() → RetrieverResultItem[] → formatResultItems()
 * ```
 */

// =============================================================================
// Type exports
// =============================================================================

export type {
  EnsureIndexesOptions,
  MemoryNodeProperties,
  MemoryRecord,
} from './types.js';

// =============================================================================
// Manager exports
// =============================================================================

export { MemoryManager, type MemoryManagerOptions } from './MemoryManager.js';

// =============================================================================
// Embeddings exports
// =============================================================================

export type {
  Embedder,
  EmbeddingClient,
  EmbeddingConfig,
  EmbeddingProvider,
  OpenAIEmbeddingConfig,
  ProviderInfo,
} from './embeddings/index.js';

export {
  EmbeddingProviderFactory,
  OllamaEmbeddings,
  OpenAIEmbeddings,
  OPENAI_BASE_URL,
  isEmbedder,
} from './embeddings/index.js';
