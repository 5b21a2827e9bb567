/**
 * LayoutTransport answering from a script instead of an engine
 */

import type { TransportKind } from '../../src/shared/config.js';
import type { EngineOutputMode } from '../../src/shared/protocol.js';
import type { AbstractGraph } from '../../src/shared/types/elk-graph.js';
import type { LayoutTransport } from '../../src/layout/types.js';

export class ScriptedTransport implements LayoutTransport {
  readonly kind: TransportKind = 'in-process';
  readonly sent: AbstractGraph[] = [];
  closeCount = 0;

  constructor(
    private readonly answer: (graph: AbstractGraph) => unknown,
    readonly outputMode: EngineOutputMode = 'layout'
  ) {}

  async send(graph: AbstractGraph): Promise<unknown> {
    this.sent.push(graph);
    return this.answer(graph);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}
