/**
 * In-Process Transport
 *
 * Calls the engine host directly. The deadline stops the wait, not the
 * kernel: an abandoned elkjs run finishes in the background and its result
 * is dropped.
 */

import type { TransportKind } from '../../shared/config.js';
import { ElkEngine } from '../../engine/elk-engine.js';
import type { Deadline } from './deadline.js';
import { raceDeadline } from './deadline.js';
import { TransportBase } from './transport-base.js';
import type { TransportBaseOptions } from './transport-base.js';

export interface InProcessTransportOptions extends TransportBaseOptions {
  engine?: ElkEngine;
}

export class InProcessTransport extends TransportBase {
  readonly kind: TransportKind = 'in-process';
  private readonly engine: ElkEngine;

  constructor(options: InProcessTransportOptions = {}) {
    super(options);
    this.engine = options.engine ?? new ElkEngine();
  }

  protected exchange(payload: string, deadline: Deadline): Promise<unknown> {
    // Parse the wire text so the engine sees exactly what a remote engine would
    const document: unknown = JSON.parse(payload);
    return raceDeadline(this.engine.run(document, this.outputMode), deadline, this.kind);
  }

  protected async release(): Promise<void> {
    // No resources held
  }
}
