/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Types for conversation memory.
 */

import type { MemoryRole } from '../config/providerConfig.js';

/**
 * A persisted conversation turn. Records are written once and never
 * updated.
 */
export interface MemoryRecord {
  /** UUID v4 */
  readonly id: string;
  readonly text: string;
  readonly role: MemoryRole;
  /** ISO-8601, UTC */
  readonly timestamp: string;
  readonly applicationId: string | null;
  readonly agentId: string | null;
  readonly userId: string | null;
  readonly threadId: string | null;
  readonly messageId?: string;
  readonly authorName?: string;
  readonly embedding?: readonly number[];
}

/**
 * Node properties written for a memory, in store naming.
 */
export interface MemoryNodeProperties {
  id: string;
  text: string;
  role: MemoryRole;
  timestamp: string;
  application_id: string | null;
  agent_id: string | null;
  user_id: string | null;
  thread_id: string | null;
  message_id?: string;
  author_name?: string;
  embedding?: number[];
}

export interface EnsureIndexesOptions {
  /** Drop and recreate every memory index */
  overwrite?: boolean;
}
