/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview OpenAI-compatible embedding client (`POST {baseUrl}/embeddings`).
 */

import { z } from 'zod';
import { EmbeddingError } from '../../utils/errors.js';
import type { EmbeddingClient } from './embeddings.js';
import { postJson } from './http.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  /** Any OpenAI-compatible base URL (default: OPENAI_BASE_URL) */
  baseUrl?: string;
  model: string;
  dimension: number;
  timeoutMs?: number;
}

const openAIEmbedResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

export class OpenAIEmbeddings implements EmbeddingClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly dimension: number;
  private readonly timeoutMs: number;

  constructor(config: OpenAIEmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? OPENAI_BASE_URL).replace(/\/$/, '');
    this.model = config.model;
    this.dimension = config.dimension;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  async embedQuery(text: string): Promise<number[]> {
    const data = await postJson({
      service: 'OpenAI',
      url: `${this.baseUrl}/embeddings`,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: { model: this.model, input: text },
      timeoutMs: this.timeoutMs,
      schema: openAIEmbedResponseSchema,
    });

    const [first] = data.data;
    if (!first) {
      throw new EmbeddingError('OpenAI returned no embedding');
    }
    return first.embedding;
  }

  getDimension(): number {
    return this.dimension;
  }

  getModel(): string {
    return this.model;
  }
}
