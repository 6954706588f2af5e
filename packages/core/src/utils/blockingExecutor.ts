/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Executors for store and embedder calls.
 *
 * Every call that reaches the graph store or the embedder goes through a
 * `BlockingCallExecutor`, so the host's turn never runs a store call inline
 * and tests can substitute `inlineExecutor`.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { StoreTimeoutError } from './errors.js';

/**
 * Runs a call that may block or take a long time.
 *
 * Implementations must propagate whatever the call throws, unchanged.
 */
export interface BlockingCallExecutor {
  run<T>(call: () => T | Promise<T>): Promise<T>;
}

/**
 * Runs the call in the current tick. Used by tests.
 */
export const inlineExecutor: BlockingCallExecutor = {
  async run<T>(call: () => T | Promise<T>): Promise<T> {
    return call();
  },
};

export interface DeferredExecutorOptions {
  /** Reject with StoreTimeoutError after this many ms (default: no deadline) */
  timeoutMs?: number;
}

/**
 * Defers each call to a later turn of the event loop and optionally bounds
 * it with a deadline.
 *
 * The deadline only stops the caller from waiting; the underlying call is
 * not cancelled.
 */
export class DeferredExecutor implements BlockingCallExecutor {
  private readonly timeoutMs?: number;

  constructor(options: DeferredExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  async run<T>(call: () => T | Promise<T>): Promise<T> {
    await yieldToEventLoop();

    const pending = Promise.resolve().then(call);
    if (this.timeoutMs === undefined) {
      return pending;
    }

    const timeoutMs = this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new StoreTimeoutError(timeoutMs)),
        timeoutMs,
      );
    });

    try {
      return await Promise.race([pending, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
