/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Tenant and thread scoping for memory records.
 *
 * Memory nodes carry four scope properties: application_id, agent_id,
 * user_id and thread_id. A filter constrains every dimension that is set and
 * leaves the others open.
 */

import type { ScopeConfig } from '../config/providerConfig.js';
import { ConflictError } from '../utils/errors.js';

/**
 * Scope values with the thread dimension already resolved.
 */
export interface ResolvedScope {
  applicationId?: string;
  agentId?: string;
  userId?: string;
  threadId?: string;
}

export type ScopeProperty = 'application_id' | 'agent_id' | 'user_id' | 'thread_id';

/**
 * A Cypher predicate with its parameter bindings.
 */
export interface ScopeFilter {
  clause: string;
  params: Partial<Record<ScopeProperty, string>>;
}

export const SCOPE_PROPERTIES: readonly ScopeProperty[] = [
  'application_id',
  'agent_id',
  'user_id',
  'thread_id',
];

/**
 * Map a resolved scope to its node property values.
 */
export function scopeProperties(
  scope: ResolvedScope,
): Record<ScopeProperty, string | null> {
  return {
    application_id: scope.applicationId ?? null,
    agent_id: scope.agentId ?? null,
    user_id: scope.userId ?? null,
    thread_id: scope.threadId ?? null,
  };
}

/**
 * Whether at least one dimension constrains the scope.
 */
export function hasScopeDimension(scope: ResolvedScope): boolean {
  return Object.values(scopeProperties(scope)).some((value) => value !== null);
}

/**
 * Build a conjunctive equality filter over the set dimensions.
 *
 * With no dimension set the clause is `true` and binds nothing, so callers
 * that need isolation must make sure at least one dimension is set.
 *
 * @param alias - Node variable the clause refers to
 */
export function buildScopeFilter(
  scope: ResolvedScope,
  alias = 'm',
): ScopeFilter {
  const conditions: string[] = [];
  const params: ScopeFilter['params'] = {};

  const values = scopeProperties(scope);

  for (const property of SCOPE_PROPERTIES) {
    const value = values[property];
    if (value === null) {
      continue;
    }
    conditions.push(`${alias}.${property} = $${property}`);
    params[property] = value;
  }

  return {
    clause: conditions.length > 0 ? conditions.join(' AND ') : 'true',
    params,
  };
}

/**
 * Resolve the thread dimension: the captured thread id when scoping per
 * operation, the configured one otherwise.
 */
export function resolveScope(
  scope: ScopeConfig,
  capturedThreadId: string | undefined,
): ResolvedScope {
  return {
    applicationId: scope.applicationId,
    agentId: scope.agentId,
    userId: scope.userId,
    threadId: scope.usePerOperationThreadId
      ? capturedThreadId
      : scope.threadId,
  };
}

/**
 * Holds the first thread id reported by the host.
 *
 * With per-operation scoping on, a provider serves a single thread: a
 * different id after the first one is a ConflictError.
 */
export class ThreadCapture {
  private captured: string | undefined;

  constructor(private readonly perOperation: boolean) {}

  get threadId(): string | undefined {
    return this.captured;
  }

  capture(threadId: string | null | undefined): void {
    if (!threadId) {
      return;
    }
    if (this.perOperation && this.captured && this.captured !== threadId) {
      throw new ConflictError(
        'Neo4jContextProvider can only be used with one thread at a time ' +
          'when scopeToPerOperationThreadId is true.',
      );
    }
    this.captured ??= threadId;
  }
}
