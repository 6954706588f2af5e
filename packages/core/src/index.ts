/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Public exports for the graph context provider.
 */

// =============================================================================
// Provider
// =============================================================================

export {
  Neo4jContextProvider,
  MEMORY_CONTEXT_PROMPT,
  type ProviderDependencies,
} from './Neo4jContextProvider.js';

export type {
  ChatMessage,
  ContextBundle,
  MessageRole,
  RetrieverResultItem,
} from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_CONTEXT_PROMPT,
  MEMORY_ROLES,
  parseProviderOptions,
  requireConnection,
  type IndexType,
  type MemoryConfig,
  type MemoryRetrievalMode,
  type MemoryRole,
  type ProviderConfig,
  type ProviderOptions,
  type ScopeConfig,
  type SearchConfig,
} from './config/providerConfig.js';

export {
  loadNeo4jSettings,
  type Environment,
  type Neo4jSettings,
} from './config/settings.js';

// =============================================================================
// Context formatting and scoping
// =============================================================================

export {
  classifyField,
  formatField,
  formatResultItem,
  formatResultItems,
  type FieldShape,
} from './context/formatters.js';

export {
  ThreadCapture,
  buildScopeFilter,
  hasScopeDimension,
  resolveScope,
  type ResolvedScope,
  type ScopeFilter,
} from './context/scopeFilter.js';

// =============================================================================
// Retrieval
// =============================================================================

export * from './retrieval/index.js';

// =============================================================================
// Memory and embeddings
// =============================================================================

export * from './memory/index.js';

// =============================================================================
// Store
// =============================================================================

export * from './store/index.js';

// =============================================================================
// Utilities
// =============================================================================

export {
  DeferredExecutor,
  inlineExecutor,
  type BlockingCallExecutor,
  type DeferredExecutorOptions,
} from './utils/blockingExecutor.js';

export {
  closeDebugLogger,
  configureDebugLogger,
  debugLogger,
  type DebugLogLevel,
  type DebugLoggerOptions,
} from './utils/debugLogger.js';

export * from './utils/errors.js';
