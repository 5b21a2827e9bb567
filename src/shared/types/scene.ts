/**
 * Scene Types
 *
 * Renderer-facing tree of positioned visual elements, discriminated by `type`
 */

import type { Point } from './elk-graph.js';

export interface Dimension {
  width: number;
  height: number;
}

export interface SceneLabel {
  type: 'label';
  id: string;
  text: string;
  position: Point;
  size: Dimension;
}

/**
 * Marker where edge routes meet
 */
export interface SceneJunction {
  type: 'junction';
  id: string;
  position: Point;
}

export interface SceneEdge {
  type: 'edge';
  id: string;
  sourceId: string;
  targetId: string;
  routingPoints: Point[];
  /** Junctions first, then labels */
  children: Array<SceneJunction | SceneLabel>;
}

export interface ScenePort {
  type: 'port';
  id: string;
  position: Point;
  size: Dimension;
  children: SceneLabel[];
}

/**
 * Child nodes, then ports, then labels, then edges
 */
export type SceneNodeChild = SceneNode | ScenePort | SceneLabel | SceneEdge;

export interface SceneNode {
  type: 'node';
  id: string;
  position: Point;
  size: Dimension;
  children: SceneNodeChild[];
}

export interface SceneGraph {
  type: 'graph';
  id: string;
  /** Top-level nodes, then top-level edges */
  children: Array<SceneNode | SceneEdge>;
}

export type SceneElement = SceneGraph | SceneNodeChild | SceneJunction;
