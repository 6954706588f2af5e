/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Conversation memory stored as scoped graph nodes.
 *
 * A MemoryManager lives for one connection. It provisions its indexes
 * lazily, writes qualifying conversation turns, and retrieves past turns
 * within the caller's scope.
 *
 * ## Retrieval modes
 *
 * - similarity: embed the query, rank by cosine similarity against
 *   `m.embedding`
 * - recency: no embedder configured; newest records first, score 1.0
 *
 * ## Key Guards
 *
 * - Every store and embedder call goes through the executor
 * - The initialized flag is set only after all index statements succeed
 * - Write and provisioning failures propagate to the caller
 * - Nothing is read or written while the scope has no dimension set
 */

import { v4 as uuidv4 } from 'uuid';
import type { MemoryConfig, MemoryRole } from '../config/providerConfig.js';
import {
  buildScopeFilter,
  hasScopeDimension,
  scopeProperties,
} from '../context/scopeFilter.js';
import type { ResolvedScope } from '../context/scopeFilter.js';
import type { GraphStore } from '../store/store.js';
import type { ChatMessage, RetrieverResultItem } from '../types.js';
import type { BlockingCallExecutor } from '../utils/blockingExecutor.js';
import { debugLogger } from '../utils/debugLogger.js';
import {
  VectorIndexUnsupportedError,
  getErrorMessage,
} from '../utils/errors.js';
import type { Embedder } from './embeddings/embeddings.js';
import type {
  EnsureIndexesOptions,
  MemoryNodeProperties,
  MemoryRecord,
} from './types.js';

const SCOPE_INDEX_FIELDS = [
  'user_id',
  'thread_id',
  'agent_id',
  'application_id',
] as const;

const DIMENSION_PROBE_TEXT = 'test';

export interface MemoryManagerOptions {
  store: GraphStore;
  executor: BlockingCallExecutor;
  config: MemoryConfig;
  /** Enables similarity retrieval and memory embeddings */
  embedder?: Embedder;
}

function isVectorUnsupported(error: unknown): boolean {
  const message = getErrorMessage(error).toLowerCase();
  return message.includes('vector') && message.includes('not supported');
}

function toNodeProperties(record: MemoryRecord): MemoryNodeProperties {
  const properties: MemoryNodeProperties = {
    id: record.id,
    text: record.text,
    role: record.role,
    timestamp: record.timestamp,
    application_id: record.applicationId,
    agent_id: record.agentId,
    user_id: record.userId,
    thread_id: record.threadId,
  };
  if (record.messageId !== undefined) {
    properties.message_id = record.messageId;
  }
  if (record.authorName !== undefined) {
    properties.author_name = record.authorName;
  }
  if (record.embedding !== undefined) {
    properties.embedding = [...record.embedding];
  }
  return properties;
}

export class MemoryManager {
  private readonly graphStore: GraphStore;
  private readonly executor: BlockingCallExecutor;
  private readonly config: MemoryConfig;
  private readonly embedder?: Embedder;
  private initialized = false;

  constructor(options: MemoryManagerOptions) {
    this.graphStore = options.store;
    this.executor = options.executor;
    this.config = options.config;
    this.embedder = options.embedder;

    if (this.config.retrievalMode === 'recency') {
      debugLogger.warn(
        'MemoryManager: No embedder configured, memory search returns the most recent memories in scope',
      );
    }
  }

  get indexesInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Create the memory indexes if they do not exist yet.
   *
   * The first call on a connection honours `overwriteIndex` from the
   * configuration; later calls are no-ops unless `overwrite` is passed.
   *
   * @throws VectorIndexUnsupportedError if the store cannot create vector
   *   indexes
   */
  async ensureIndexes(options: EnsureIndexesOptions = {}): Promise<void> {
    const overwrite =
      options.overwrite ?? (!this.initialized && this.config.overwriteIndex);
    if (this.initialized && !overwrite) {
      return;
    }

    const statements = await this.buildIndexStatements(overwrite);
    for (const statement of statements) {
      try {
        await this.executor.run(() => this.graphStore.run(statement));
      } catch (error) {
        if (isVectorUnsupported(error)) {
          throw new VectorIndexUnsupportedError(error);
        }
        throw error;
      }
    }

    this.initialized = true;
    debugLogger.log(
      `MemoryManager: Memory indexes ready (${statements.length} statements)`,
    );
  }

  /**
   * Persist the messages whose role is configured and whose text is not
   * blank. Writes nothing when the scope has no dimension set.
   *
   * @returns The records written, in message order
   */
  async store(
    messages: readonly ChatMessage[],
    scope: ResolvedScope,
  ): Promise<MemoryRecord[]> {
    const records: MemoryRecord[] = [];
    if (!hasScopeDimension(scope)) {
      debugLogger.warn(
        'MemoryManager: No scope dimension is set, skipping memory write',
      );
      return records;
    }
    const properties = scopeProperties(scope);

    for (const message of messages) {
      const role = this.storedRole(message);
      const text = message.text;
      if (!role || !text?.trim()) {
        continue;
      }

      const embedding = this.embedder
        ? await this.embed(this.embedder, text)
        : undefined;

      records.push({
        id: uuidv4(),
        text,
        role,
        timestamp: new Date().toISOString(),
        applicationId: properties.application_id,
        agentId: properties.agent_id,
        userId: properties.user_id,
        threadId: properties.thread_id,
        ...(message.messageId ? { messageId: message.messageId } : {}),
        ...(message.authorName ? { authorName: message.authorName } : {}),
        ...(embedding ? { embedding } : {}),
      });
    }

    if (records.length === 0) {
      return records;
    }

    const memories = records.map(toNodeProperties);
    const cypher = this.buildWriteStatement(memories);
    await this.executor.run(() => this.graphStore.run(cypher, { memories }));

    debugLogger.debug(`MemoryManager: Stored ${records.length} memories`);
    return records;
  }

  /**
   * Retrieve memories in scope for a query.
   */
  async search(
    queryText: string,
    scope: ResolvedScope,
    topK: number,
  ): Promise<RetrieverResultItem[]> {
    if (!queryText.trim()) {
      return [];
    }
    if (!hasScopeDimension(scope)) {
      debugLogger.warn(
        'MemoryManager: No scope dimension is set, skipping memory search',
      );
      return [];
    }

    const filter = buildScopeFilter(scope);
    const label = this.config.label;
    const projection =
      'RETURN m.text AS text, m.role AS role, m.timestamp AS timestamp';

    let cypher: string;
    let params: Record<string, unknown>;

    if (this.embedder && this.config.retrievalMode === 'similarity') {
      const queryEmbedding = await this.embed(this.embedder, queryText);
      cypher = `MATCH (m:${label})
WHERE ${filter.clause} AND m.embedding IS NOT NULL
WITH m, vector.similarity.cosine(m.embedding, $query_embedding) AS score
ORDER BY score DESC
LIMIT $top_k
${projection}, score`;
      params = {
        ...filter.params,
        query_embedding: queryEmbedding,
        top_k: topK,
      };
    } else {
      cypher = `MATCH (m:${label})
WHERE ${filter.clause}
WITH m
ORDER BY m.timestamp DESC
LIMIT $top_k
${projection}, 1.0 AS score`;
      params = { ...filter.params, top_k: topK };
    }

    const rows = await this.executor.run(() =>
      this.graphStore.run(cypher, params),
    );
    return rows.map((row) => ({
      content: typeof row['text'] === 'string' ? row['text'] : '',
      metadata: {
        score: row['score'],
        role: row['role'],
        timestamp: row['timestamp'],
      },
    }));
  }

  private storedRole(message: ChatMessage): MemoryRole | undefined {
    return this.config.roles.find((role) => role === message.role);
  }

  private async embed(embedder: Embedder, text: string): Promise<number[]> {
    return this.executor.run(() => embedder.embedQuery(text));
  }

  private async buildIndexStatements(overwrite: boolean): Promise<string[]> {
    const { label, vectorIndexName, fulltextIndexName } = this.config;
    const statements: string[] = [];

    const create = (name: string, statement: string) => {
      if (overwrite) {
        statements.push(`DROP INDEX ${name} IF EXISTS`);
      }
      statements.push(statement);
    };

    if (this.embedder) {
      const probe = await this.embed(this.embedder, DIMENSION_PROBE_TEXT);
      create(
        vectorIndexName,
        `CREATE VECTOR INDEX ${vectorIndexName} IF NOT EXISTS
FOR (m:${label})
ON m.embedding
OPTIONS {indexConfig: {\`vector.dimensions\`: ${probe.length}, \`vector.similarity_function\`: 'cosine'}}`,
      );
    }

    create(
      fulltextIndexName,
      `CREATE FULLTEXT INDEX ${fulltextIndexName} IF NOT EXISTS
FOR (m:${label})
ON EACH [m.text]`,
    );

    for (const field of SCOPE_INDEX_FIELDS) {
      const name = `memory_${field}`;
      create(
        name,
        `CREATE INDEX ${name} IF NOT EXISTS
FOR (m:${label})
ON (m.${field})`,
      );
    }

    return statements;
  }

  private buildWriteStatement(memories: readonly MemoryNodeProperties[]): string {
    const assignments = [
      'm.id = memory.id',
      'm.text = memory.text',
      'm.role = memory.role',
      'm.timestamp = memory.timestamp',
      'm.application_id = memory.application_id',
      'm.agent_id = memory.agent_id',
      'm.user_id = memory.user_id',
      'm.thread_id = memory.thread_id',
    ];
    if (memories.some((memory) => memory.message_id !== undefined)) {
      assignments.push('m.message_id = memory.message_id');
    }
    if (memories.some((memory) => memory.author_name !== undefined)) {
      assignments.push('m.author_name = memory.author_name');
    }
    if (memories.some((memory) => memory.embedding !== undefined)) {
      assignments.push('m.embedding = memory.embedding');
    }

    return `UNWIND $memories AS memory
CREATE (m:${this.config.label})
SET ${assignments.join(',\n    ')}`;
  }
}
