/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Query text construction and fault-tolerant search.
 */

import type { ChatMessage, RetrieverResultItem } from '../types.js';
import type { BlockingCallExecutor } from '../utils/blockingExecutor.js';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { Retriever } from './retriever.js';

/**
 * Join the text of the last `historyCount` user and assistant messages that
 * have any, oldest first.
 */
export function buildQueryText(
  messages: readonly ChatMessage[],
  historyCount: number,
): string {
  const relevant = messages.filter(
    (message) =>
      (message.role === 'user' || message.role === 'assistant') &&
      typeof message.text === 'string' &&
      message.text.trim() !== '',
  );
  return relevant
    .slice(-historyCount)
    .map((message) => message.text)
    .join('\n');
}

/**
 * Runs knowledge searches through the executor. A failed search is logged
 * and yields no results; it is never retried.
 */
export class SearchExecutor {
  constructor(
    private readonly executor: BlockingCallExecutor,
    private readonly topK: number,
  ) {}

  async search(
    retriever: Retriever | null,
    queryText: string,
  ): Promise<RetrieverResultItem[]> {
    if (!retriever || !queryText.trim()) {
      return [];
    }

    try {
      return await this.executor.run(() =>
        retriever.search(queryText, this.topK),
      );
    } catch (error) {
      debugLogger.warn(
        `SearchExecutor: ${retriever.kind} search failed: ${getErrorMessage(error)}`,
      );
      return [];
    }
  }
}
