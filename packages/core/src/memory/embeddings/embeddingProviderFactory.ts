/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Embedding provider factory with automatic detection.
 *
 * Implements a "provider ladder" that selects an embedding provider based
 * on environment configuration and availability.
 *
 * ## Provider Ladder (Detection Order)
 *
 * | Priority | Provider | Detection                   | Notes                       |
 * | -------- | -------- | --------------------------- | --------------------------- |
 * | 1        | Ollama   | `OLLAMA_HOST` reachable     | Local, no network egress    |
 * | 2        | Endpoint | `EMBED_BASE_URL` set        | Self-hosted (vLLM/TEI)      |
 * | 3        | OpenAI   | `OPENAI_API_KEY` exists     | Hosted                      |
 *
 * ## Environment Variables
 *
 * - `EMBED_PROVIDER`: Force a provider ('auto'|'ollama'|'openai'|'endpoint')
 * - `EMBED_MODEL`: Override the provider's default model
 * - `EMBED_BASE_URL`: Base URL for the endpoint provider, or an
 *   OpenAI-compatible base URL (e.g. Azure) when the provider is 'openai'
 * - `OPENAI_API_KEY`: OpenAI API key
 * - `OLLAMA_HOST`: Ollama host (default: http://localhost:11434)
 */

import { z } from 'zod';
import type { Environment } from '../../config/settings.js';
import { debugLogger } from '../../utils/debugLogger.js';
import { ConfigurationError, getErrorMessage } from '../../utils/errors.js';
import type { EmbeddingClient } from './embeddings.js';
import { OllamaEmbeddings } from './ollamaEmbeddings.js';
import { OpenAIEmbeddings } from './openaiEmbeddings.js';

export type EmbeddingProvider = 'auto' | 'ollama' | 'openai' | 'endpoint';

/**
 * Provider detection result.
 */
export interface ProviderInfo {
  provider: Exclude<EmbeddingProvider, 'auto'>;
  model: string;
  dimension: number;
}

const DEFAULT_MODELS: Record<Exclude<EmbeddingProvider, 'auto'>, string> = {
  ollama: 'nomic-embed-text',
  openai: 'text-embedding-3-small',
  endpoint: 'nomic-embed-text',
};

/**
 * Default dimensions for known models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
};

const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

const AVAILABILITY_CHECK_TIMEOUT = 3000;

const embedEnvSchema = z.object({
  EMBED_PROVIDER: z
    .enum(['auto', 'ollama', 'openai', 'endpoint'], {
      errorMap: () => ({
        message: 'EMBED_PROVIDER must be one of auto, ollama, openai, endpoint',
      }),
    })
    .optional(),
  EMBED_MODEL: z.string().min(1).optional(),
  EMBED_BASE_URL: z.string().url().optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OLLAMA_HOST: z.string().url().default(DEFAULT_OLLAMA_HOST),
});

type EmbedEnv = z.infer<typeof embedEnvSchema>;

/**
 * Factory for creating embedding clients with automatic provider detection.
 *
 * @example
 * ```typescript
 * const factory = new EmbeddingProviderFactory();
 * const embedder = await factory.createClient();
 *
 * const provider = new Neo4jContextProvider({
 *   indexName: 'chunkEmbeddings',
 *   embedder,
 * });
 * ```
 */
export class EmbeddingProviderFactory {
  private readonly env: EmbedEnv;
  private active: ProviderInfo | null = null;

  /**
   * @throws ConfigurationError if an embedding variable is malformed
   */
  constructor(env: Environment = process.env) {
    const parsed = embedEnvSchema.safeParse(env);
    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.issues.map((issue) => issue.message).join('; '),
        { cause: parsed.error },
      );
    }
    this.env = parsed.data;
  }

  /**
   * Create an embedding client using the provider ladder.
   *
   * @throws ConfigurationError if no provider can be used
   */
  async createClient(): Promise<EmbeddingClient> {
    const explicit = this.env.EMBED_PROVIDER;
    if (explicit && explicit !== 'auto') {
      debugLogger.log(
        `EmbeddingProviderFactory: Using explicit provider: ${explicit}`,
      );
      return this.createProviderClient(explicit);
    }

    debugLogger.log('EmbeddingProviderFactory: Auto-detecting provider...');

    if (await this.checkOllamaAvailability()) {
      return this.createProviderClient('ollama');
    }
    if (this.env.EMBED_BASE_URL) {
      return this.createProviderClient('endpoint');
    }
    if (this.env.OPENAI_API_KEY) {
      return this.createProviderClient('openai');
    }

    throw new ConfigurationError(
      `No embedding provider available: Ollama is not reachable at ${this.env.OLLAMA_HOST}, ` +
        'and neither EMBED_BASE_URL nor OPENAI_API_KEY is set.',
    );
  }

  /**
   * The provider chosen by the last createClient call.
   */
  getProviderInfo(): ProviderInfo | null {
    return this.active;
  }

  private createProviderClient(
    provider: Exclude<EmbeddingProvider, 'auto'>,
  ): EmbeddingClient {
    const model = this.env.EMBED_MODEL ?? DEFAULT_MODELS[provider];
    const dimension = MODEL_DIMENSIONS[model] ?? 768;

    let client: EmbeddingClient;
    switch (provider) {
      case 'ollama':
        client = new OllamaEmbeddings({
          baseUrl: this.env.OLLAMA_HOST,
          model,
          dimension,
        });
        break;
      case 'endpoint':
        client = new OllamaEmbeddings({
          baseUrl: this.require(this.env.EMBED_BASE_URL, 'EMBED_BASE_URL', provider),
          model,
          dimension,
        });
        break;
      case 'openai':
        client = new OpenAIEmbeddings({
          apiKey: this.require(this.env.OPENAI_API_KEY, 'OPENAI_API_KEY', provider),
          baseUrl: this.env.EMBED_BASE_URL,
          model,
          dimension,
        });
        break;
      default: {
        const unknownProvider: never = provider;
        throw new ConfigurationError(
          `Unknown embedding provider: ${String(unknownProvider)}`,
        );
      }
    }

    this.active = { provider, model, dimension };
    debugLogger.log(
      `EmbeddingProviderFactory: Using ${provider} (${model}, ${dimension} dims)`,
    );
    return client;
  }

  private require(
    value: string | undefined,
    variable: string,
    provider: string,
  ): string {
    if (!value) {
      throw new ConfigurationError(
        `${variable} is required for embedding provider '${provider}'`,
      );
    }
    return value;
  }

  private async checkOllamaAvailability(): Promise<boolean> {
    const host = this.env.OLLAMA_HOST.replace(/\/$/, '');
    try {
      const response = await fetch(`${host}/api/tags`, {
        signal: AbortSignal.timeout(AVAILABILITY_CHECK_TIMEOUT),
      });
      if (response.ok) {
        debugLogger.log('EmbeddingProviderFactory: Ollama is available');
        return true;
      }
      debugLogger.log(
        `EmbeddingProviderFactory: Ollama answered ${response.status}`,
      );
      return false;
    } catch (error) {
      debugLogger.log(
        `EmbeddingProviderFactory: Ollama not reachable: ${getErrorMessage(error)}`,
      );
      return false;
    }
  }
}
