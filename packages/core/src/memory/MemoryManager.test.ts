/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type Mock,
} from 'vitest';
import { MemoryManager } from './MemoryManager.js';
import type { MemoryConfig } from '../config/providerConfig.js';
import { FakeGraphStore } from '../test-utils/fakeGraphStore.js';
import type { ChatMessage } from '../types.js';
import {
  inlineExecutor,
  type BlockingCallExecutor,
} from '../utils/blockingExecutor.js';
import { debugLogger } from '../utils/debugLogger.js';
import {
  StoreQueryError,
  VectorIndexUnsupportedError,
} from '../utils/errors.js';

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function memoryConfig(overrides: Partial<MemoryConfig> = {}): MemoryConfig {
  return {
    enabled: true,
    label: 'Memory',
    roles: ['user', 'assistant'],
    overwriteIndex: false,
    vectorIndexName: 'memory_embeddings',
    fulltextIndexName: 'memory_fulltext',
    retrievalMode: 'similarity',
    ...overrides,
  };
}

describe('MemoryManager', () => {
  let store: FakeGraphStore;
  let embedder: { embedQuery: Mock<(text: string) => number[]> };

  beforeEach(() => {
    store = new FakeGraphStore();
    embedder = { embedQuery: vi.fn((_text: string) => [0.1, 0.2, 0.3]) };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  function similarityManager(config = memoryConfig()): MemoryManager {
    return new MemoryManager({
      store,
      executor: inlineExecutor,
      config,
      embedder,
    });
  }

  function recencyManager(): MemoryManager {
    return new MemoryManager({
      store,
      executor: inlineExecutor,
      config: memoryConfig({ retrievalMode: 'recency' }),
    });
  }

  describe('ensureIndexes', () => {
    it('should create vector, fulltext and scope indexes', async () => {
      const manager = similarityManager();

      await manager.ensureIndexes();

      expect(embedder.embedQuery).toHaveBeenCalledWith('test');
      expect(store.statements.map((statement) => statement.cypher)).toEqual([
        'CREATE VECTOR INDEX memory_embeddings IF NOT EXISTS\n' +
          'FOR (m:Memory)\n' +
          'ON m.embedding\n' +
          "OPTIONS {indexConfig: {`vector.dimensions`: 3, `vector.similarity_function`: 'cosine'}}",
        'CREATE FULLTEXT INDEX memory_fulltext IF NOT EXISTS\nFOR (m:Memory)\nON EACH [m.text]',
        'CREATE INDEX memory_user_id IF NOT EXISTS\nFOR (m:Memory)\nON (m.user_id)',
        'CREATE INDEX memory_thread_id IF NOT EXISTS\nFOR (m:Memory)\nON (m.thread_id)',
        'CREATE INDEX memory_agent_id IF NOT EXISTS\nFOR (m:Memory)\nON (m.agent_id)',
        'CREATE INDEX memory_application_id IF NOT EXISTS\nFOR (m:Memory)\nON (m.application_id)',
      ]);
      expect(manager.indexesInitialized).toBe(true);
    });

    it('should skip the vector index without an embedder', async () => {
      vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
      const manager = recencyManager();

      await manager.ensureIndexes();

      expect(store.statements).toHaveLength(5);
      expect(
        store.statements.some((statement) =>
          statement.cypher.includes('VECTOR'),
        ),
      ).toBe(false);
    });

    it('should provision once until an overwrite is requested', async () => {
      const manager = similarityManager();

      await manager.ensureIndexes();
      await manager.ensureIndexes();
      expect(store.statements).toHaveLength(6);

      await manager.ensureIndexes({ overwrite: true });
      expect(store.statements).toHaveLength(18);
      expect(store.statements[6]?.cypher).toBe(
        'DROP INDEX memory_embeddings IF EXISTS',
      );
      expect(embedder.embedQuery).toHaveBeenCalledTimes(2);
    });

    it('should honour overwriteIndex on the first provisioning only', async () => {
      const manager = similarityManager(memoryConfig({ overwriteIndex: true }));

      await manager.ensureIndexes();
      await manager.ensureIndexes();

      expect(store.statements).toHaveLength(12);
      expect(store.statements[2]?.cypher).toBe(
        'DROP INDEX memory_fulltext IF EXISTS',
      );
    });

    it('should report stores without vector index support', async () => {
      store.failOn(
        'CREATE VECTOR INDEX',
        new StoreQueryError('Invalid input: Vector indexes are not supported'),
      );
      const manager = similarityManager();

      await expect(manager.ensureIndexes()).rejects.toThrow(
        VectorIndexUnsupportedError,
      );
      expect(manager.indexesInitialized).toBe(false);
    });

    it('should propagate other failures unchanged', async () => {
      const failure = new StoreQueryError('Permission denied');
      store.failOn('CREATE FULLTEXT INDEX', failure);
      const manager = similarityManager();

      await expect(manager.ensureIndexes()).rejects.toBe(failure);
      expect(manager.indexesInitialized).toBe(false);
    });
  });

  describe('store', () => {
    const messages: ChatMessage[] = [
      { role: 'user', text: 'The left engine vibrates.' },
      { role: 'system', text: 'You are a maintenance assistant.' },
      { role: 'assistant', text: '   ' },
      {
        role: 'assistant',
        text: 'Check the engine mounts.',
        messageId: 'msg-2',
        authorName: 'Helper',
      },
    ];
    const scope = { applicationId: 'fleet', userId: 'u-1' };

    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));
    });

    it('should persist messages with a configured role and text', async () => {
      const manager = similarityManager();

      const records = await manager.store(messages, scope);

      expect(records).toHaveLength(2);
      expect(records[0]?.id).toMatch(UUID_PATTERN);
      expect(records[0]).toEqual({
        id: records[0]?.id,
        text: 'The left engine vibrates.',
        role: 'user',
        timestamp: '2024-05-01T12:00:00.000Z',
        applicationId: 'fleet',
        agentId: null,
        userId: 'u-1',
        threadId: null,
        embedding: [0.1, 0.2, 0.3],
      });
      expect(records[1]?.messageId).toBe('msg-2');
      expect(records[1]?.authorName).toBe('Helper');
      expect(embedder.embedQuery).toHaveBeenCalledTimes(2);
    });

    it('should write all records in one statement', async () => {
      const manager = similarityManager();

      const records = await manager.store(messages, scope);

      expect(store.statements).toHaveLength(1);
      const [write] = store.statements;
      expect(write?.cypher).toBe(
        'UNWIND $memories AS memory\n' +
          'CREATE (m:Memory)\n' +
          'SET m.id = memory.id,\n' +
          '    m.text = memory.text,\n' +
          '    m.role = memory.role,\n' +
          '    m.timestamp = memory.timestamp,\n' +
          '    m.application_id = memory.application_id,\n' +
          '    m.agent_id = memory.agent_id,\n' +
          '    m.user_id = memory.user_id,\n' +
          '    m.thread_id = memory.thread_id,\n' +
          '    m.message_id = memory.message_id,\n' +
          '    m.author_name = memory.author_name,\n' +
          '    m.embedding = memory.embedding',
      );
      expect(write?.params['memories']).toEqual([
        {
          id: records[0]?.id,
          text: 'The left engine vibrates.',
          role: 'user',
          timestamp: '2024-05-01T12:00:00.000Z',
          application_id: 'fleet',
          agent_id: null,
          user_id: 'u-1',
          thread_id: null,
          embedding: [0.1, 0.2, 0.3],
        },
        {
          id: records[1]?.id,
          text: 'Check the engine mounts.',
          role: 'assistant',
          timestamp: '2024-05-01T12:00:00.000Z',
          application_id: 'fleet',
          agent_id: null,
          user_id: 'u-1',
          thread_id: null,
          message_id: 'msg-2',
          author_name: 'Helper',
          embedding: [0.1, 0.2, 0.3],
        },
      ]);
    });

    it('should omit optional assignments no record needs', async () => {
      vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
      const manager = recencyManager();

      await manager.store([{ role: 'user', text: 'Hello' }], scope);

      const cypher = store.statements[0]?.cypher ?? '';
      expect(cypher.endsWith('m.thread_id = memory.thread_id')).toBe(true);
    });

    it('should store system messages when the role is configured', async () => {
      const manager = similarityManager(
        memoryConfig({ roles: ['system'] }),
      );

      const records = await manager.store(messages, scope);

      expect(records.map((record) => record.role)).toEqual(['system']);
    });

    it('should not write when nothing qualifies', async () => {
      const manager = similarityManager();

      const records = await manager.store(
        [{ role: 'tool', text: '{"ok":true}' }],
        scope,
      );

      expect(records).toEqual([]);
      expect(store.statements).toHaveLength(0);
    });

    it('should not write memories without a scope dimension', async () => {
      const warn = vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
      const manager = similarityManager();

      expect(await manager.store(messages, {})).toEqual([]);
      expect(store.statements).toHaveLength(0);
      expect(embedder.embedQuery).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith(
        'MemoryManager: No scope dimension is set, skipping memory write',
      );
    });

    it('should route every store and embedder call through the executor', async () => {
      let runs = 0;
      const counting: BlockingCallExecutor = {
        async run<T>(call: () => T | Promise<T>): Promise<T> {
          runs++;
          return call();
        },
      };
      const manager = new MemoryManager({
        store,
        executor: counting,
        config: memoryConfig(),
        embedder,
      });

      await manager.store(messages, scope);

      expect(runs).toBe(3);
    });

    it('should propagate write failures', async () => {
      store.failOn('UNWIND $memories', new StoreQueryError('Disk full'));
      const manager = similarityManager();

      await expect(manager.store(messages, scope)).rejects.toThrow('Disk full');
    });
  });

  describe('search', () => {
    const row = {
      text: 'The left engine vibrates.',
      role: 'user',
      timestamp: '2024-05-01T12:00:00.000Z',
    };

    it('should rank scoped memories by cosine similarity', async () => {
      store.on('vector.similarity.cosine', [{ ...row, score: 0.87 }]);
      const manager = similarityManager();

      const results = await manager.search(
        'engine vibration',
        { userId: 'u-1', threadId: 't-1' },
        4,
      );

      expect(results).toEqual([
        {
          content: 'The left engine vibrates.',
          metadata: {
            score: 0.87,
            role: 'user',
            timestamp: '2024-05-01T12:00:00.000Z',
          },
        },
      ]);
      const [query] = store.statements;
      expect(query?.cypher).toContain(
        'WHERE m.user_id = $user_id AND m.thread_id = $thread_id AND m.embedding IS NOT NULL',
      );
      expect(query?.params).toEqual({
        user_id: 'u-1',
        thread_id: 't-1',
        query_embedding: [0.1, 0.2, 0.3],
        top_k: 4,
      });
    });

    it('should return the most recent memories without an embedder', async () => {
      const warn = vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
      store.on('ORDER BY m.timestamp DESC', [{ ...row, score: 1 }]);
      const manager = recencyManager();

      const results = await manager.search('engine', { agentId: 'a-1' }, 2);

      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining('No embedder configured'),
      );
      expect(results[0]?.metadata).toEqual({
        score: 1,
        role: 'user',
        timestamp: '2024-05-01T12:00:00.000Z',
      });
      const [query] = store.statements;
      expect(query?.cypher).toContain('1.0 AS score');
      expect(query?.params).toEqual({ agent_id: 'a-1', top_k: 2 });
    });

    it('should not search without a scope dimension', async () => {
      const warn = vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
      const manager = similarityManager();

      expect(await manager.search('engine', {}, 4)).toEqual([]);
      expect(store.statements).toHaveLength(0);
      expect(embedder.embedQuery).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith(
        'MemoryManager: No scope dimension is set, skipping memory search',
      );
    });

    it('should not query for blank text', async () => {
      const manager = similarityManager();

      expect(await manager.search('  ', { userId: 'u-1' }, 4)).toEqual([]);
      expect(store.statements).toHaveLength(0);
      expect(embedder.embedQuery).not.toHaveBeenCalled();
    });
  });
});
