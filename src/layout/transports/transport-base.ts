/**
 * Transport Base Class - shared request lifecycle for every layout transport
 *
 * Provides:
 * - Serialization (unserializable graph -> LayoutRejectedError)
 * - Per-call deadline merged with the caller's AbortSignal
 * - Completion/failure logging
 * - Closed-state guard
 */

import { LAYOUT_TIMEOUT_MS } from '../../shared/config.js';
import type { TransportKind } from '../../shared/config.js';
import { EngineUnavailableError, LayoutCancelledError } from '../../shared/errors.js';
import { LayoutLogger } from '../../shared/logger.js';
import type { EngineOutputMode } from '../../shared/protocol.js';
import type { AbstractGraph } from '../../shared/types/elk-graph.js';
import type { LayoutTransport } from '../types.js';
import { Deadline } from './deadline.js';
import { serializeGraph } from './response.js';

export interface TransportBaseOptions {
  outputMode?: EngineOutputMode;
  timeoutMs?: number;
}

export abstract class TransportBase implements LayoutTransport {
  abstract readonly kind: TransportKind;
  readonly outputMode: EngineOutputMode;
  protected readonly timeoutMs: number;
  protected closed = false;

  constructor(options: TransportBaseOptions = {}) {
    this.outputMode = options.outputMode ?? 'layout';
    this.timeoutMs = options.timeoutMs ?? LAYOUT_TIMEOUT_MS;
  }

  async send(graph: AbstractGraph, signal?: AbortSignal): Promise<unknown> {
    if (this.closed) {
      throw new EngineUnavailableError('Layout transport is closed', this.kind);
    }
    const payload = serializeGraph(graph);
    if (signal?.aborted) {
      throw new LayoutCancelledError(this.kind);
    }

    const deadline = new Deadline(this.timeoutMs, signal);
    const startedAt = Date.now();
    try {
      const result = await this.exchange(payload, deadline);
      LayoutLogger.layoutCompleted(this.kind, Date.now() - startedAt);
      return result;
    } catch (error) {
      if (error instanceof Error) {
        LayoutLogger.layoutFailed(this.kind, error);
      }
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.release();
  }

  /**
   * Deliver one serialized graph and return the decoded answer.
   * Must settle with `deadline.toError()` once the deadline aborts.
   */
  protected abstract exchange(payload: string, deadline: Deadline): Promise<unknown>;

  /**
   * Free processes and connections
   */
  protected abstract release(): Promise<void>;
}
