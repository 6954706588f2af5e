/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Types shared with the host agent framework.
 */

/**
 * Roles a host may attach to a message. Only user, assistant and system
 * messages can become memories.
 */
export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

/**
 * A chat message as seen by the provider.
 */
export interface ChatMessage {
  role: MessageRole;
  /** Message text; blank or missing text is ignored for search and memory */
  text?: string | null;
  /** Host-assigned message id, persisted with memories when present */
  messageId?: string;
  /** Display name of the author, persisted with memories when present */
  authorName?: string;
}

/**
 * Context returned to the host before a model turn.
 *
 * An empty `messages` array means no context is available.
 */
export interface ContextBundle {
  messages: ChatMessage[];
}

/**
 * One ranked hit from a retriever or from memory search.
 */
export interface RetrieverResultItem {
  /** Primary text of the hit */
  content: string;
  /** Remaining fields, including `score` when the store reported one */
  metadata: Record<string, unknown> | null;
}
