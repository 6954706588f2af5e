/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview In-process GraphStore for tests.
 *
 * Records every statement and answers from handlers registered by substring
 * or pattern. The most recently registered matching handler wins; statements
 * nothing matches return no rows.
 */

import type {
  CypherParams,
  CypherRow,
  GraphStore,
} from '../store/store.js';

export interface RecordedStatement {
  cypher: string;
  params: CypherParams;
}

export type StatementResponder = (
  cypher: string,
  params: CypherParams,
) => CypherRow[] | Promise<CypherRow[]>;

interface Handler {
  match: string | RegExp;
  respond: StatementResponder;
}

export type IndexRow = {
  name: string;
  type: 'VECTOR' | 'FULLTEXT' | 'RANGE';
  labelsOrTypes: string[];
  properties: string[];
  dimensions: number | null;
};

export function vectorIndexRow(
  name: string,
  label = 'Chunk',
  property = 'embedding',
  dimensions = 3,
): IndexRow {
  return {
    name,
    type: 'VECTOR',
    labelsOrTypes: [label],
    properties: [property],
    dimensions,
  };
}

export function fulltextIndexRow(
  name: string,
  label = 'Chunk',
  properties: string[] = ['text'],
): IndexRow {
  return {
    name,
    type: 'FULLTEXT',
    labelsOrTypes: [label],
    properties,
    dimensions: null,
  };
}

export class FakeGraphStore implements GraphStore {
  readonly statements: RecordedStatement[] = [];
  connectivityError: Error | null = null;
  closeCalls = 0;
  private readonly handlers: Handler[] = [];

  /**
   * Answer statements containing `match` (or matching it) with fixed rows
   * or a responder.
   */
  on(match: string | RegExp, rows: CypherRow[] | StatementResponder): this {
    const respond: StatementResponder =
      typeof rows === 'function' ? rows : () => rows;
    this.handlers.push({ match, respond });
    return this;
  }

  /**
   * Reject statements containing `match` with `error`.
   */
  failOn(match: string | RegExp, error: Error): this {
    return this.on(match, () => {
      throw error;
    });
  }

  /**
   * Answer index probes with the given definitions, looked up by name.
   */
  withIndexes(...indexes: IndexRow[]): this {
    return this.on('SHOW INDEXES', (_cypher, params) =>
      indexes.filter((index) => index.name === params['name']),
    );
  }

  /**
   * Statements other than index probes, in order.
   */
  get queries(): RecordedStatement[] {
    return this.statements.filter(
      (statement) => !statement.cypher.startsWith('SHOW INDEXES'),
    );
  }

  async verifyConnectivity(): Promise<void> {
    if (this.connectivityError) {
      throw this.connectivityError;
    }
  }

  async run(cypher: string, params: CypherParams = {}): Promise<CypherRow[]> {
    this.statements.push({ cypher, params });
    for (let i = this.handlers.length - 1; i >= 0; i--) {
      const handler = this.handlers[i];
      if (handler && matches(handler.match, cypher)) {
        return handler.respond(cypher, params);
      }
    }
    return [];
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

function matches(match: string | RegExp, cypher: string): boolean {
  return typeof match === 'string' ? cypher.includes(match) : match.test(cypher);
}
