/**
 * Scene Module
 *
 * Positioned ELK graph -> renderer scene tree
 */

export { SceneTransformer, transformToScene, countSceneElements, ROOT_SCENE_ID } from './scene-transformer.js';
export type { SceneTransformerOptions } from './scene-transformer.js';
export { IdRegistry } from './id-registry.js';
export { classifyEdge, effectiveEndpoints } from './edge-classifier.js';
export type { ClassifiedEdge, PrimitiveEdge, ExtendedEdge } from './edge-classifier.js';
