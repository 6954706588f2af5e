/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Ollama embedding client implementation.
 *
 * Uses Ollama's `/api/embed` endpoint with a single input per request.
 *
 * ## Endpoint
 *
 * POST http://localhost:11434/api/embed
 *
 * Request:
 * ```json
 * {
 *   "model": "nomic-embed-text",
 *   "input": "text"
 * }
 * ```
 *
 * Response:
 * ```json
 * {
 *   "model": "nomic-embed-text",
 *   "embeddings": [[0.1, 0.2, ...]]
 * }
 * ```
 *
 * Self-hosted servers that mirror this API (vLLM, TEI) work through the
 * same client.
 */

import { z } from 'zod';
import { debugLogger } from '../../utils/debugLogger.js';
import { EmbeddingError } from '../../utils/errors.js';
import type { EmbeddingClient, EmbeddingConfig } from './embeddings.js';
import { postJson } from './http.js';

const ollamaEmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Ollama embedding client using the /api/embed endpoint.
 *
 * Failures throw EmbeddingError; no zero vectors are substituted.
 */
export class OllamaEmbeddings implements EmbeddingClient {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly dimension: number;
  private readonly timeoutMs: number;

  constructor(config: EmbeddingConfig) {
    // Remove trailing slash from base URL
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
    this.dimension = config.dimension;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embedQuery(text: string): Promise<number[]> {
    const data = await postJson({
      service: 'Ollama',
      url: `${this.baseUrl}/api/embed`,
      body: { model: this.model, input: text },
      timeoutMs: this.timeoutMs,
      schema: ollamaEmbedResponseSchema,
    });

    const [embedding] = data.embeddings;
    if (!embedding) {
      throw new EmbeddingError('Ollama returned no embedding');
    }

    if (embedding.length !== this.dimension) {
      debugLogger.warn(
        `OllamaEmbeddings: Dimension mismatch: expected ${this.dimension}, got ${embedding.length}`,
      );
    }
    return embedding;
  }

  getDimension(): number {
    return this.dimension;
  }

  getModel(): string {
    return this.model;
  }
}
