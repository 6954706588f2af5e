/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Formatters for context injection.
 *
 * Turns ranked retriever hits into one text block each:
 *
 * ```
 * [Score: 0.912] [title: Engine Manual] [tags: engine, vibration] Main text...
 * ```
 *
 * Key rules:
 * - Score first, three decimals, only when it is a finite number
 * - Other metadata in insertion order; null values and empty lists skipped
 * - Content last, verbatim
 * - Blocks that end up empty are dropped
 */

import type { RetrieverResultItem } from '../types.js';

/**
 * Shape of a metadata value, decided once before rendering.
 */
export type FieldShape =
  | { kind: 'sequence'; items: readonly unknown[] }
  | { kind: 'scalar'; value: unknown };

export function classifyField(value: unknown): FieldShape {
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value };
  }
  if (value instanceof Set) {
    return { kind: 'sequence', items: [...value] };
  }
  return { kind: 'scalar', value };
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Render one scalar. Plain objects (e.g. map projections) render as JSON;
 * other objects use their own string form, which covers Neo4j temporal
 * values.
 */
export function renderScalar(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null && isPlainObject(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Render one metadata field, or '' when it contributes nothing.
 */
export function formatField(key: string, value: unknown): string {
  const shape = classifyField(value);
  if (shape.kind === 'sequence') {
    if (shape.items.length === 0) {
      return '';
    }
    return `[${key}: ${shape.items.map(renderScalar).join(', ')}]`;
  }
  return `[${key}: ${renderScalar(shape.value)}]`;
}

/**
 * Format a single hit as a text block.
 *
 * @returns The block, or '' if the hit has nothing to show
 */
export function formatResultItem(item: RetrieverResultItem): string {
  const parts: string[] = [];
  const metadata = item.metadata ?? {};

  const score = metadata['score'];
  if (typeof score === 'number' && Number.isFinite(score)) {
    parts.push(`[Score: ${score.toFixed(3)}]`);
  }

  for (const [key, value] of Object.entries(metadata)) {
    if (key === 'score' || value === null || value === undefined) {
      continue;
    }
    const field = formatField(key, value);
    if (field) {
      parts.push(field);
    }
  }

  if (item.content) {
    parts.push(item.content);
  }

  return parts.join(' ');
}

/**
 * Format hits in rank order, dropping empty blocks.
 *
 * @example
 * ```typescript
 * formatResultItems([
 *   { content: 'Replace the bearing.', metadata: { score: 0.8346, source: 'manual' } },
 *   { content: '', metadata: { tags: [] } },
 * ]);
 * // ['[Score: 0.835] [source: manual] Replace the bearing.']
 * ```
 */
export function formatResultItems(
  items: readonly RetrieverResultItem[],
): string[] {
  return items.map(formatResultItem).filter((block) => block.length > 0);
}
