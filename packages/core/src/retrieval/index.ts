/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type { Retriever, RetrieverKind } from './retriever.js';
export type { IndexInfo, IndexKind } from './indexInfo.js';
export { fetchIndexInfo } from './indexInfo.js';
export { formatCypherRecord, formatNodeRecord } from './recordFormatter.js';
export { extractKeywords, escapeLucene, STOP_WORDS } from './stopWords.js';
export { VectorRetriever, VectorCypherRetriever } from './vectorRetriever.js';
export { HybridRetriever, HybridCypherRetriever } from './hybridRetriever.js';
export { FulltextRetriever } from './fulltextRetriever.js';
export { selectRetrieverKind, createRetriever } from './selector.js';
export { buildQueryText, SearchExecutor } from './searchExecutor.js';
