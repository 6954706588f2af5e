/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  classifyField,
  formatField,
  formatResultItem,
  formatResultItems,
} from './formatters.js';

describe('classifyField', () => {
  it('should treat arrays and sets as sequences', () => {
    expect(classifyField(['a', 'b'])).toEqual({
      kind: 'sequence',
      items: ['a', 'b'],
    });
    expect(classifyField(new Set([1, 2]))).toEqual({
      kind: 'sequence',
      items: [1, 2],
    });
  });

  it('should treat strings as scalars', () => {
    expect(classifyField('engine')).toEqual({
      kind: 'scalar',
      value: 'engine',
    });
  });
});

describe('formatField', () => {
  it('should join sequence items', () => {
    expect(formatField('tags', ['engine', 'vibration'])).toBe(
      '[tags: engine, vibration]',
    );
  });

  it('should render nothing for an empty sequence', () => {
    expect(formatField('tags', [])).toBe('');
  });

  it('should render scalars as is', () => {
    expect(formatField('count', 3)).toBe('[count: 3]');
    expect(formatField('active', false)).toBe('[active: false]');
  });

  it('should render plain objects as JSON', () => {
    expect(formatField('part', { id: 'P-1', qty: 2 })).toBe(
      '[part: {"id":"P-1","qty":2}]',
    );
  });

  it('should render dates as ISO strings', () => {
    expect(formatField('at', new Date('2024-03-01T10:00:00Z'))).toBe(
      '[at: 2024-03-01T10:00:00.000Z]',
    );
  });
});

describe('formatResultItem', () => {
  it('should put the score first, then metadata, then content', () => {
    const block = formatResultItem({
      content: 'Inspect the fan blades.',
      metadata: { source: 'manual', score: 0.91234, tags: ['fan'] },
    });

    expect(block).toBe(
      '[Score: 0.912] [source: manual] [tags: fan] Inspect the fan blades.',
    );
  });

  it('should skip null metadata values and empty sequences', () => {
    const block = formatResultItem({
      content: 'Text',
      metadata: { score: 1, owner: null, tags: [] },
    });

    expect(block).toBe('[Score: 1.000] Text');
  });

  it('should skip a score that is not a finite number', () => {
    const block = formatResultItem({
      content: 'Text',
      metadata: { score: 'high' },
    });

    expect(block).toBe('Text');
  });

  it('should format items without metadata', () => {
    expect(formatResultItem({ content: 'Only content', metadata: null })).toBe(
      'Only content',
    );
  });

  it('should round the score half up to three decimals', () => {
    expect(
      formatResultItem({ content: 'Bearing wear', metadata: { score: 0.8345 } }),
    ).toBe('[Score: 0.835] Bearing wear');
  });

  it('should return an empty string when nothing is shown', () => {
    expect(formatResultItem({ content: '', metadata: { tags: [] } })).toBe('');
  });
});

describe('formatResultItems', () => {
  it('should keep rank order and drop empty blocks', () => {
    const blocks = formatResultItems([
      { content: 'Replace the bearing.', metadata: { score: 0.8346, source: 'manual' } },
      { content: '', metadata: { tags: [] } },
      { content: 'Check the oil.', metadata: null },
    ]);

    expect(blocks).toEqual([
      '[Score: 0.835] [source: manual] Replace the bearing.',
      'Check the oil.',
    ]);
  });
});
