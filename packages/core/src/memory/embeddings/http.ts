/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview JSON POST with a deadline, shared by the HTTP embedders.
 */

import type { z } from 'zod';
import { EmbeddingError, getErrorMessage } from '../../utils/errors.js';

export interface PostJsonOptions<T> {
  /** Name used in error messages, e.g. 'Ollama' */
  service: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  timeoutMs: number;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * POST a JSON body and validate the JSON reply.
 *
 * @throws EmbeddingError on timeout, a non-2xx status or an unexpected reply
 */
export async function postJson<T>(options: PostJsonOptions<T>): Promise<T> {
  const { service, url, timeoutMs } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      body: JSON.stringify(options.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new EmbeddingError(
        `${service} embed request timed out after ${timeoutMs}ms`,
        { cause: error },
      );
    }
    throw new EmbeddingError(
      `${service} embed request failed: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new EmbeddingError(
      `${service} embed failed: ${response.status} ${response.statusText}`,
    );
  }

  const parsed = options.schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new EmbeddingError(
      `${service} returned an invalid response: ${parsed.error.message}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
