/**
 * Edge Classification
 *
 * ELK edges come in two shapes told apart only by which fields are set.
 * Classify once at ingestion; everything downstream matches on `kind`.
 */

import { AmbiguousEdgeError } from '../shared/errors.js';
import type { LayoutedEdge } from '../shared/types/elk-graph.js';

export interface PrimitiveEdge {
  kind: 'primitive';
  source: string;
  target: string;
}

export interface ExtendedEdge {
  kind: 'extended';
  sources: string[];
  targets: string[];
}

export type ClassifiedEdge = PrimitiveEdge | ExtendedEdge;

/**
 * Classify a positioned edge
 *
 * @param edge - Edge as returned by the engine
 * @param edgeId - Registered id, used in error messages
 * @throws AmbiguousEdgeError if the edge is both, neither, or half of a shape
 */
export function classifyEdge(edge: LayoutedEdge, edgeId: string): ClassifiedEdge {
  const hasSource = edge.source !== undefined;
  const hasTarget = edge.target !== undefined;
  const hasSources = edge.sources !== undefined;
  const hasTargets = edge.targets !== undefined;

  const touchesPrimitive = hasSource || hasTarget;
  const touchesExtended = hasSources || hasTargets;

  if (touchesPrimitive && touchesExtended) {
    throw new AmbiguousEdgeError(edgeId, 'has both source/target and sources/targets');
  }

  if (edge.source !== undefined && edge.target !== undefined) {
    return { kind: 'primitive', source: edge.source, target: edge.target };
  }

  if (edge.sources !== undefined && edge.targets !== undefined) {
    if (edge.sources.length === 0 || edge.targets.length === 0) {
      throw new AmbiguousEdgeError(edgeId, 'sources and targets must not be empty');
    }
    return { kind: 'extended', sources: edge.sources, targets: edge.targets };
  }

  if (touchesPrimitive) {
    throw new AmbiguousEdgeError(edgeId, hasSource ? 'source without target' : 'target without source');
  }

  if (touchesExtended) {
    throw new AmbiguousEdgeError(edgeId, hasSources ? 'sources without targets' : 'targets without sources');
  }

  throw new AmbiguousEdgeError(edgeId, 'has neither source/target nor sources/targets');
}

/**
 * Endpoint pair used by the simplified scene edge
 */
export function effectiveEndpoints(edge: ClassifiedEdge): { sourceId: string; targetId: string } {
  switch (edge.kind) {
    case 'primitive':
      return { sourceId: edge.source, targetId: edge.target };
    case 'extended':
      return { sourceId: edge.sources[0], targetId: edge.targets[0] };
  }
}
