/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Context provider backed by a Neo4j knowledge graph.
 *
 * Before each model turn the host calls `invoking()`, which searches the
 * configured index (and, when enabled, scoped conversation memory) with the
 * text of the recent conversation. After the turn `invoked()` stores the
 * exchanged messages as memories.
 *
 * ## Lifecycle
 *
 * ```
 * new Neo4jContextProvider(options)   validate; fail fast on bad options
 *   → connect()                        verify store, probe index, build retriever
 *   → invoking() / invoked() ...       per turn
 *   → disconnect()                     close store, drop retriever and memory
 * ```
 *
 * Search never fails a turn: without a connection, or when a search
 * errors, the bundle is simply empty. Memory writes do propagate.
 */

import {
  parseProviderOptions,
  requireConnection,
  type MemoryConfig,
  type ProviderConfig,
  type ProviderOptions,
  type ScopeConfig,
  type SearchConfig,
} from './config/providerConfig.js';
import type { Environment } from './config/settings.js';
import { formatResultItems } from './context/formatters.js';
import {
  ThreadCapture,
  resolveScope,
  type ResolvedScope,
} from './context/scopeFilter.js';
import { MemoryManager } from './memory/MemoryManager.js';
import type { EnsureIndexesOptions } from './memory/types.js';
import type { Retriever } from './retrieval/retriever.js';
import { buildQueryText, SearchExecutor } from './retrieval/searchExecutor.js';
import { createRetriever } from './retrieval/selector.js';
import { createNeo4jGraphStore } from './store/neo4jStore.js';
import type { GraphStore, GraphStoreFactory } from './store/store.js';
import type {
  ChatMessage,
  ContextBundle,
  RetrieverResultItem,
} from './types.js';
import {
  DeferredExecutor,
  type BlockingCallExecutor,
} from './utils/blockingExecutor.js';
import { debugLogger } from './utils/debugLogger.js';
import {
  ConfigurationError,
  NotConnectedError,
  getErrorMessage,
} from './utils/errors.js';

export const MEMORY_CONTEXT_PROMPT =
  '## Conversation Memory\n' +
  'Relevant information from past conversations:';

/**
 * Collaborators that can be replaced, mostly by tests.
 */
export interface ProviderDependencies {
  /** Runs store and embedder calls (default: DeferredExecutor) */
  executor?: BlockingCallExecutor;
  /** Builds the graph store on connect (default: Neo4jGraphStore) */
  storeFactory?: GraphStoreFactory;
  /** Environment for connection fallbacks (default: process.env) */
  env?: Environment;
}

interface ActiveConnection {
  store: GraphStore;
  retriever: Retriever;
  memory: MemoryManager | null;
}

function isMessageList(
  messages: ChatMessage | readonly ChatMessage[],
): messages is readonly ChatMessage[] {
  return Array.isArray(messages);
}

function toMessageList(
  messages: ChatMessage | readonly ChatMessage[] | null | undefined,
): readonly ChatMessage[] {
  if (!messages) {
    return [];
  }
  return isMessageList(messages) ? messages : [messages];
}

function contextMessage(text: string): ChatMessage {
  return { role: 'user', text };
}

/**
 * Supplies knowledge-graph and memory context to an agent.
 *
 * @example
 * ```typescript
 * const provider = new Neo4jContextProvider({
 *   indexName: 'maintenanceChunks',
 *   indexType: 'fulltext',
 *   memoryEnabled: true,
 *   userId: 'user-42',
 * });
 *
 * await provider.use(async () => {
 *   const context = await provider.invoking(messages);
 *   const reply = await agent.run([...context.messages, ...messages]);
 *   await provider.invoked(messages, reply);
 * });
 * ```
 */
export class Neo4jContextProvider {
  private readonly config: ProviderConfig;
  private readonly executor: BlockingCallExecutor;
  private readonly storeFactory: GraphStoreFactory;
  private readonly searchExecutor: SearchExecutor;
  private readonly threads: ThreadCapture;
  private connection: ActiveConnection | null = null;

  /**
   * @throws ConfigurationError if any option is invalid
   */
  constructor(options: ProviderOptions, deps: ProviderDependencies = {}) {
    this.config = parseProviderOptions(options, deps.env);
    this.executor =
      deps.executor ??
      new DeferredExecutor({ timeoutMs: this.config.storeTimeoutMs });
    this.storeFactory = deps.storeFactory ?? createNeo4jGraphStore;
    this.searchExecutor = new SearchExecutor(
      this.executor,
      this.config.search.topK,
    );
    this.threads = new ThreadCapture(
      this.config.scope.usePerOperationThreadId,
    );
  }

  get search(): SearchConfig {
    return this.config.search;
  }

  get memory(): MemoryConfig {
    return this.config.memory;
  }

  get scope(): ScopeConfig {
    return this.config.scope;
  }

  get isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Open the store, verify it, and build the retriever.
   *
   * No-op when already connected. On failure the store is closed before
   * the error is rethrown.
   *
   * @throws ConfigurationError if uri, username or password is missing
   * @throws ConnectionError if the store is unreachable or rejects the
   *   credentials
   * @throws StoreQueryError if the configured index is missing
   */
  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connectionConfig = requireConnection(this.config);
    const store = this.storeFactory(connectionConfig);

    try {
      await this.executor.run(() => store.verifyConnectivity());
      const retriever = await this.executor.run(() =>
        createRetriever(this.config.search, store),
      );
      const memory = this.config.memory.enabled
        ? new MemoryManager({
            store,
            executor: this.executor,
            config: this.config.memory,
            embedder: this.config.search.embedder,
          })
        : null;

      this.connection = { store, retriever, memory };
      debugLogger.log(
        `Neo4jContextProvider: Connected with ${retriever.kind} retriever on '${this.config.search.indexName}'`,
      );
    } catch (error) {
      await this.closeAfterFailure(store);
      throw error;
    }
  }

  /**
   * Close the store and drop the retriever and memory manager.
   */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    this.connection = null;
    await connection.store.close();
    debugLogger.log('Neo4jContextProvider: Disconnected');
  }

  /**
   * Connect, run `fn`, and always disconnect afterwards.
   */
  async use<T>(fn: (provider: this) => T | Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await fn(this);
    } finally {
      await this.disconnect();
    }
  }

  /**
   * Record the thread the host is serving.
   *
   * @throws ConflictError if per-operation scoping is on and a different
   *   thread was already recorded
   */
  async threadCreated(threadId: string | null | undefined): Promise<void> {
    this.threads.capture(threadId);
  }

  /**
   * Build context for the next model turn.
   *
   * @returns A bundle, empty when nothing relevant was found
   */
  async invoking(
    messages: ChatMessage | readonly ChatMessage[],
  ): Promise<ContextBundle> {
    const connection = this.connection;
    if (!connection) {
      return { messages: [] };
    }

    const queryText = buildQueryText(
      toMessageList(messages),
      this.config.search.messageHistoryCount,
    );
    if (!queryText.trim()) {
      return { messages: [] };
    }

    const contextMessages: ChatMessage[] = [];

    const results = await this.searchExecutor.search(
      connection.retriever,
      queryText,
    );
    const knowledgeBlocks = formatResultItems(results);
    if (knowledgeBlocks.length > 0) {
      contextMessages.push(contextMessage(this.config.search.contextPrompt));
      contextMessages.push(...knowledgeBlocks.map(contextMessage));
    }

    if (connection.memory) {
      const memories = await this.searchMemories(connection.memory, queryText);
      const memoryBlocks = formatResultItems(memories);
      if (memoryBlocks.length > 0) {
        contextMessages.push(contextMessage(MEMORY_CONTEXT_PROMPT));
        contextMessages.push(...memoryBlocks.map(contextMessage));
      }
    }

    return { messages: contextMessages };
  }

  /**
   * Store the turn's messages as memories.
   *
   * Does nothing unless memory is enabled and the provider is connected.
   * The turn is stored even when the model call failed.
   *
   * @throws StoreQueryError if provisioning or the write fails
   */
  async invoked(
    requestMessages: ChatMessage | readonly ChatMessage[],
    responseMessages?: ChatMessage | readonly ChatMessage[] | null,
    invokeError?: unknown,
  ): Promise<void> {
    const memory = this.connection?.memory;
    if (!memory) {
      return;
    }

    if (invokeError !== undefined) {
      debugLogger.debug(
        `Neo4jContextProvider: Storing turn that ended with an error: ${getErrorMessage(invokeError)}`,
      );
    }

    await memory.ensureIndexes();
    await memory.store(
      [...toMessageList(requestMessages), ...toMessageList(responseMessages)],
      this.currentScope(),
    );
  }

  /**
   * Create the memory indexes now instead of on the first write.
   *
   * @throws NotConnectedError if not connected
   * @throws ConfigurationError if memory is disabled
   */
  async provisionMemoryIndexes(
    options: EnsureIndexesOptions = {},
  ): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      throw new NotConnectedError('provision memory indexes');
    }
    if (!connection.memory) {
      throw new ConfigurationError(
        'Memory indexes can only be provisioned when memoryEnabled is true',
      );
    }
    await connection.memory.ensureIndexes(options);
  }

  private currentScope(): ResolvedScope {
    return resolveScope(this.config.scope, this.threads.threadId);
  }

  private async searchMemories(
    memory: MemoryManager,
    queryText: string,
  ): Promise<RetrieverResultItem[]> {
    try {
      return await memory.search(
        queryText,
        this.currentScope(),
        this.config.search.topK,
      );
    } catch (error) {
      debugLogger.warn(
        `Neo4jContextProvider: Memory search failed: ${getErrorMessage(error)}`,
      );
      return [];
    }
  }

  private async closeAfterFailure(store: GraphStore): Promise<void> {
    try {
      await store.close();
    } catch (closeError) {
      debugLogger.warn(
        `Neo4jContextProvider: Failed to close store after connect error: ${getErrorMessage(closeError)}`,
      );
    }
  }
}
