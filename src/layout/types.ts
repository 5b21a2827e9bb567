/**
 * Layout Transport Type Definitions
 */

import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import type { TransportKind } from '../shared/config.js';
import type { EngineOutputMode } from '../shared/protocol.js';
import type { AbstractGraph } from '../shared/types/elk-graph.js';
import type { ElkEngine } from '../engine/elk-engine.js';

/**
 * Layout Transport
 *
 * Carries one abstract graph to the engine and returns the engine's raw,
 * unvalidated answer. Validation happens in the client.
 */
export interface LayoutTransport {
  readonly kind: TransportKind;
  readonly outputMode: EngineOutputMode;

  /**
   * @throws LayoutRejectedError if the engine refuses the graph
   * @throws LayoutTransportError if the engine cannot be reached or answers badly
   */
  send(graph: AbstractGraph, signal?: AbortSignal): Promise<unknown>;

  /**
   * Release processes and connections; later calls fail
   */
  close(): Promise<void>;
}

/**
 * The part of a child process the process transports use
 */
export interface EngineProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnEngine = (command: string, args: readonly string[]) => EngineProcess;

/**
 * Transport Options
 *
 * One flat options object for every transport kind; each transport reads
 * the fields it needs.
 */
export interface TransportOptions {
  kind: TransportKind;
  outputMode?: EngineOutputMode;
  timeoutMs?: number;

  /** Process transports: executable and leading arguments */
  command?: string;
  args?: readonly string[];
  spawnEngine?: SpawnEngine;

  /** Network transports */
  url?: string;

  /** In-process transport */
  engine?: ElkEngine;
}
