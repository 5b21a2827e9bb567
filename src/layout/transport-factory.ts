/**
 * Layout Transport Factory
 *
 * Creates the transport named by configuration (LAYOUT_TRANSPORT).
 */

import {
  ELK_ENGINE_COMMAND,
  ELK_ENGINE_SCRIPT,
  ELK_ENGINE_URL,
  ELK_ENGINE_WS_URL,
  LAYOUT_TIMEOUT_MS,
  LAYOUT_TRANSFORM_SIDE,
  LAYOUT_TRANSPORT,
} from '../shared/config.js';
import type { LayoutTransport, TransportOptions } from './types.js';
import { HttpTransport } from './transports/http-transport.js';
import { InProcessTransport } from './transports/in-process-transport.js';
import { OneShotProcessTransport } from './transports/oneshot-process-transport.js';
import { PersistentProcessTransport } from './transports/persistent-process-transport.js';
import { WebSocketTransport } from './transports/websocket-transport.js';

/**
 * Transport options from environment configuration
 *
 * @param overrides - Values taking precedence over the environment
 */
export function loadTransportOptions(overrides: Partial<TransportOptions> = {}): TransportOptions {
  const kind = overrides.kind ?? LAYOUT_TRANSPORT;

  return {
    kind,
    outputMode: overrides.outputMode ?? (LAYOUT_TRANSFORM_SIDE === 'engine' ? 'scene' : 'layout'),
    timeoutMs: overrides.timeoutMs ?? LAYOUT_TIMEOUT_MS,
    command: overrides.command ?? ELK_ENGINE_COMMAND,
    args: overrides.args ?? [ELK_ENGINE_SCRIPT],
    spawnEngine: overrides.spawnEngine,
    url: overrides.url ?? (kind === 'websocket' ? ELK_ENGINE_WS_URL : ELK_ENGINE_URL),
    engine: overrides.engine,
  };
}

/**
 * Create a transport
 *
 * @param options - Transport selection; defaults to the environment configuration
 */
export function createTransport(options: TransportOptions = loadTransportOptions()): LayoutTransport {
  const { outputMode, timeoutMs } = options;

  switch (options.kind) {
    case 'oneshot-process':
      return new OneShotProcessTransport({
        outputMode,
        timeoutMs,
        command: options.command,
        args: options.args,
        spawnEngine: options.spawnEngine,
      });
    case 'persistent-process':
      return new PersistentProcessTransport({
        outputMode,
        timeoutMs,
        command: options.command,
        args: options.args,
        spawnEngine: options.spawnEngine,
      });
    case 'http':
      return new HttpTransport({ outputMode, timeoutMs, url: options.url });
    case 'websocket':
      return new WebSocketTransport({ outputMode, timeoutMs, url: options.url });
    case 'in-process':
      return new InProcessTransport({ outputMode, timeoutMs, engine: options.engine });
  }
}
