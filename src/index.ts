/**
 * elk-scene-bridge
 *
 * Abstract graph -> elkjs layout -> renderer scene tree
 */

export * from './layout/index.js';
export * from './scene/index.js';
export { ElkEngine, createElkKernel } from './engine/elk-engine.js';
export type { LayoutKernel } from './engine/elk-engine.js';
export { LayoutServer } from './engine/layout-server.js';
export { serveLines } from './engine/line-protocol.js';
export * from './shared/errors.js';
export * from './shared/types/elk-graph.js';
export * from './shared/types/scene.js';
export { parseLayoutedGraph, parseSceneGraph } from './shared/schemas/elk-graph-schema.js';
export { READY_MARKER, EXIT_CODE_REJECTED } from './shared/protocol.js';
export type { EngineOutputMode } from './shared/protocol.js';
export { validateConfig, TRANSPORT_KINDS } from './shared/config.js';
export type { TransportKind, TransformSide } from './shared/config.js';
export { LayoutLogger } from './shared/logger.js';
export { generatedIdPattern, GENERATED_ID_PREFIX } from './shared/utils/random-id.js';
