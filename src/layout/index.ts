/**
 * Layout Module Exports
 */

export * from './types.js';
export { GraphLayoutClient, withLayoutClient } from './graph-layout-client.js';
export type { GraphLayoutClientOptions } from './graph-layout-client.js';
export { createTransport, loadTransportOptions } from './transport-factory.js';
export { OneShotProcessTransport, spawnEngineProcess } from './transports/oneshot-process-transport.js';
export type { ProcessTransportOptions } from './transports/oneshot-process-transport.js';
export { PersistentProcessTransport } from './transports/persistent-process-transport.js';
export { HttpTransport } from './transports/http-transport.js';
export type { NetworkTransportOptions } from './transports/http-transport.js';
export { WebSocketTransport } from './transports/websocket-transport.js';
export { InProcessTransport } from './transports/in-process-transport.js';
export type { InProcessTransportOptions } from './transports/in-process-transport.js';
export * from './layout-options.js';
