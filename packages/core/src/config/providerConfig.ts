/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Provider options validation.
 *
 * One zod schema validates every constructor option, including the
 * cross-field rules, and produces frozen configuration records:
 *
 * - SearchConfig: index and retrieval settings
 * - MemoryConfig: memory storage settings
 * - ScopeConfig: multi-tenancy scoping
 *
 * Connection fields are merged with the environment here but only checked
 * when the provider connects.
 */

import { z } from 'zod';
import type { Embedder } from '../memory/embeddings/embeddings.js';
import { isEmbedder } from '../memory/embeddings/embeddings.js';
import type { ConnectionConfig } from '../store/store.js';
import { ConfigurationError } from '../utils/errors.js';
import { loadNeo4jSettings, type Environment } from './settings.js';

export type IndexType = 'vector' | 'fulltext' | 'hybrid';

export type MemoryRole = 'user' | 'assistant' | 'system';

export const MEMORY_ROLES: readonly MemoryRole[] = [
  'user',
  'assistant',
  'system',
];

export const DEFAULT_CONTEXT_PROMPT =
  '## Knowledge Graph Context\n' +
  'Use the following information from the knowledge graph to answer the question:';

/**
 * Options accepted by the provider constructor.
 */
export interface ProviderOptions {
  /** Neo4j URI. Falls back to NEO4J_URI. */
  uri?: string;
  /** Falls back to NEO4J_USERNAME. */
  username?: string;
  /** Falls back to NEO4J_PASSWORD. */
  password?: string;

  /** Index to search. Required; falls back to NEO4J_INDEX_NAME. */
  indexName?: string;
  /** Search mode (default: 'vector') */
  indexType?: IndexType;
  /** Fulltext index for hybrid search. Required when indexType is 'hybrid'. */
  fulltextIndexName?: string;
  /** Results per search (default: 5) */
  topK?: number;
  /** Header placed before knowledge results */
  contextPrompt?: string;
  /**
   * Cypher run after the index lookup for graph enrichment. Sees `node` and
   * `score`, and should return a `text` column.
   */
  retrievalQuery?: string;
  /** Required for vector and hybrid search. Also embeds memories. */
  embedder?: Embedder;
  /** Recent messages used to build the query (default: 10) */
  messageHistoryCount?: number;
  /** Reduce fulltext queries to keywords (default: true for fulltext only) */
  filterStopWords?: boolean;

  /** Store conversation turns as memory nodes (default: false) */
  memoryEnabled?: boolean;
  /** Node label for memories (default: 'Memory') */
  memoryLabel?: string;
  /** Roles stored as memories; subset of user, assistant, system */
  memoryRoles?: readonly string[];
  /** Drop and recreate memory indexes on provisioning (default: false) */
  overwriteMemoryIndex?: boolean;
  memoryVectorIndexName?: string;
  memoryFulltextIndexName?: string;

  applicationId?: string;
  agentId?: string;
  userId?: string;
  threadId?: string;
  /** Scope the thread dimension to the thread the host reports */
  scopeToPerOperationThreadId?: boolean;

  /** Deadline for each store call, in ms (default: none) */
  storeTimeoutMs?: number;
}

export interface SearchConfig {
  readonly indexName: string;
  readonly indexType: IndexType;
  readonly fulltextIndexName?: string;
  readonly retrievalQuery?: string;
  readonly topK: number;
  readonly contextPrompt: string;
  readonly messageHistoryCount: number;
  /** Resolved: explicit option, else true only for fulltext */
  readonly filterStopWords: boolean;
  readonly embedder?: Embedder;
  readonly useGraphEnrichment: boolean;
}

export type MemoryRetrievalMode = 'similarity' | 'recency';

export interface MemoryConfig {
  readonly enabled: boolean;
  readonly label: string;
  readonly roles: readonly MemoryRole[];
  readonly overwriteIndex: boolean;
  readonly vectorIndexName: string;
  readonly fulltextIndexName: string;
  /** 'similarity' when an embedder is configured, else 'recency' */
  readonly retrievalMode: MemoryRetrievalMode;
}

export interface ScopeConfig {
  readonly applicationId?: string;
  readonly agentId?: string;
  readonly userId?: string;
  readonly threadId?: string;
  readonly usePerOperationThreadId: boolean;
}

export interface ProviderConfig {
  readonly search: SearchConfig;
  readonly memory: MemoryConfig;
  readonly scope: ScopeConfig;
  readonly connection: Readonly<Partial<ConnectionConfig>>;
  readonly storeTimeoutMs?: number;
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isMemoryRole(value: string): value is MemoryRole {
  return MEMORY_ROLES.some((role) => role === value);
}

const optionalText = z
  .string()
  .transform((value) => value.trim())
  .transform((value) => (value === '' ? undefined : value))
  .optional();

function identifier(option: string, fallback: string) {
  return z
    .string()
    .regex(
      IDENTIFIER_PATTERN,
      `${option} must be a Cypher identifier (letters, digits, underscore)`,
    )
    .default(fallback);
}

const providerOptionsSchema = z
  .object({
    uri: optionalText,
    username: optionalText,
    password: optionalText,
    indexName: z
      .string({
        required_error:
          'indexName is required. Set via constructor or NEO4J_INDEX_NAME env var.',
      })
      .trim()
      .min(
        1,
        'indexName is required. Set via constructor or NEO4J_INDEX_NAME env var.',
      ),
    indexType: z.enum(['vector', 'fulltext', 'hybrid']).default('vector'),
    fulltextIndexName: optionalText,
    topK: z.number().int().min(1, 'topK must be at least 1').default(5),
    contextPrompt: z.string().default(DEFAULT_CONTEXT_PROMPT),
    retrievalQuery: optionalText,
    embedder: z
      .custom<Embedder>(isEmbedder, 'embedder must implement embedQuery(text)')
      .optional(),
    messageHistoryCount: z
      .number()
      .int()
      .min(1, 'messageHistoryCount must be at least 1')
      .default(10),
    filterStopWords: z.boolean().optional(),
    memoryEnabled: z.boolean().default(false),
    memoryLabel: identifier('memoryLabel', 'Memory'),
    memoryRoles: z
      .array(
        z
          .string()
          .refine(isMemoryRole, (role) => ({
            message: `Invalid memory role: ${role}. Must be one of ${MEMORY_ROLES.join(', ')}`,
          })),
      )
      .default(['user', 'assistant']),
    overwriteMemoryIndex: z.boolean().default(false),
    memoryVectorIndexName: identifier(
      'memoryVectorIndexName',
      'memory_embeddings',
    ),
    memoryFulltextIndexName: identifier(
      'memoryFulltextIndexName',
      'memory_fulltext',
    ),
    applicationId: optionalText,
    agentId: optionalText,
    userId: optionalText,
    threadId: optionalText,
    scopeToPerOperationThreadId: z.boolean().default(false),
    storeTimeoutMs: z
      .number()
      .int()
      .positive('storeTimeoutMs must be positive')
      .optional(),
  })
  .superRefine((options, ctx) => {
    if (options.indexType === 'hybrid' && !options.fulltextIndexName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fulltextIndexName'],
        message: "fulltextIndexName is required when indexType is 'hybrid'",
      });
    }

    if (
      (options.indexType === 'vector' || options.indexType === 'hybrid') &&
      !options.embedder
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['embedder'],
        message: `embedder is required when indexType is '${options.indexType}'`,
      });
    }

    if (options.memoryEnabled) {
      const hasScope = [
        options.applicationId,
        options.agentId,
        options.userId,
        options.threadId,
      ].some((value) => value !== undefined);
      if (!hasScope) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['memoryEnabled'],
          message:
            'Memory requires at least one scope filter: applicationId, agentId, userId, or threadId',
        });
      }
    }
  });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path && !issue.message.includes(path)
        ? `${path}: ${issue.message}`
        : issue.message;
    })
    .join('; ');
}

/**
 * Validate constructor options and build frozen configuration records.
 *
 * Missing connection fields and index name fall back to the environment.
 *
 * @throws ConfigurationError naming the first invalid option(s)
 */
export function parseProviderOptions(
  options: ProviderOptions,
  env: Environment = process.env,
): ProviderConfig {
  const settings = loadNeo4jSettings(env);
  const result = providerOptionsSchema.safeParse({
    ...options,
    uri: options.uri ?? settings.uri,
    username: options.username ?? settings.username,
    password: options.password ?? settings.password,
    indexName: options.indexName ?? settings.indexName,
  });

  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error), {
      cause: result.error,
    });
  }

  const parsed = result.data;

  const search: SearchConfig = Object.freeze({
    indexName: parsed.indexName,
    indexType: parsed.indexType,
    fulltextIndexName: parsed.fulltextIndexName,
    retrievalQuery: parsed.retrievalQuery,
    topK: parsed.topK,
    contextPrompt: parsed.contextPrompt,
    messageHistoryCount: parsed.messageHistoryCount,
    filterStopWords: parsed.filterStopWords ?? parsed.indexType === 'fulltext',
    embedder: parsed.embedder,
    useGraphEnrichment: parsed.retrievalQuery !== undefined,
  });

  const memory: MemoryConfig = Object.freeze({
    enabled: parsed.memoryEnabled,
    label: parsed.memoryLabel,
    roles: Object.freeze([...new Set(parsed.memoryRoles)]),
    overwriteIndex: parsed.overwriteMemoryIndex,
    vectorIndexName: parsed.memoryVectorIndexName,
    fulltextIndexName: parsed.memoryFulltextIndexName,
    retrievalMode: parsed.embedder ? 'similarity' : 'recency',
  });

  const scope: ScopeConfig = Object.freeze({
    applicationId: parsed.applicationId,
    agentId: parsed.agentId,
    userId: parsed.userId,
    threadId: parsed.threadId,
    usePerOperationThreadId: parsed.scopeToPerOperationThreadId,
  });

  return Object.freeze({
    search,
    memory,
    scope,
    connection: Object.freeze({
      uri: parsed.uri,
      username: parsed.username,
      password: parsed.password,
    }),
    storeTimeoutMs: parsed.storeTimeoutMs,
  });
}

/**
 * Get the complete connection config.
 *
 * @throws ConfigurationError if any of uri, username or password is missing
 */
export function requireConnection(config: ProviderConfig): ConnectionConfig {
  const { uri, username, password } = config.connection;
  if (!uri || !username || !password) {
    throw new ConfigurationError(
      'Neo4j connection requires uri, username, and password. ' +
        'Set via constructor or NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD env vars.',
    );
  }
  return { uri, username, password };
}
