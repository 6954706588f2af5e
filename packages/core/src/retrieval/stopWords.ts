/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Keyword extraction and Lucene escaping for fulltext queries.
 */

import stopWordList from './stop-words.json' with { type: 'json' };

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

const LUCENE_SPECIAL = /[+\-&|!(){}[\]^"~*?:\\/]/g;

const LUCENE_OPERATORS = /\b(AND|OR|NOT)\b/g;

/**
 * Reduce text to its keywords: lower-cased words longer than one character
 * that are not stop words, space-separated.
 *
 * @example
 * ```typescript
 * extractKeywords('What is the torque spec for the M8 bolt?');
 * // 'torque spec m8 bolt'
 * ```
 */
export function extractKeywords(text: string): string {
  const words = text.toLowerCase().match(WORD_PATTERN) ?? [];
  return words
    .filter((word) => word.length > 1 && !STOP_WORDS.has(word))
    .join(' ');
}

/**
 * Escape text so the fulltext index parses it as plain terms.
 */
export function escapeLucene(text: string): string {
  return text
    .replace(LUCENE_SPECIAL, (char) => `\\${char}`)
    .replace(LUCENE_OPERATORS, (operator) => operator.toLowerCase());
}

/**
 * Prepare user text for a fulltext lookup.
 *
 * @returns The escaped query, or '' when nothing searchable is left
 */
export function toFulltextQuery(text: string, filterStopWords: boolean): string {
  const terms = filterStopWords ? extractKeywords(text) : text.trim();
  return terms ? escapeLucene(terms) : '';
}
