/**
 * Layout Option Presets
 *
 * Well-tested ELK configurations for context diagrams. Presets are frozen;
 * copy before adding diagram-specific options.
 */

import { LayoutConfigError } from '../shared/errors.js';
import type { LayoutOptions } from '../shared/types/elk-graph.js';

/**
 * Global layered layout used by most diagrams
 */
export const LAYOUT_OPTIONS: Readonly<LayoutOptions> = Object.freeze({
  algorithm: 'layered',
  edgeRouting: 'ORTHOGONAL',
  'elk.direction': 'RIGHT',
  hierarchyHandling: 'INCLUDE_CHILDREN',
  'layered.edgeLabels.sideSelection': 'ALWAYS_DOWN',
  'layered.nodePlacement.strategy': 'BRANDES_KOEPF',
  'layered.considerModelOrder.strategy': 'NODES_AND_EDGES',
  'spacing.labelNode': '0.0',
});

export const CLASS_TREE_LAYOUT_OPTIONS: Readonly<LayoutOptions> = Object.freeze({
  algorithm: 'layered',
  edgeRouting: 'ORTHOGONAL',
  'elk.direction': 'RIGHT',
  'layered.edgeLabels.sideSelection': 'ALWAYS_DOWN',
  'layered.nodePlacement.strategy': 'BRANDES_KOEPF',
  'spacing.labelNode': '0.0',
  'spacing.edgeNode': 20,
  'compaction.postCompaction.strategy': 'LEFT_RIGHT_CONSTRAINT_LOCKING',
  'layered.considerModelOrder.components': 'MODEL_ORDER',
  separateConnectedComponents: false,
});

export const RECT_PACKING_LAYOUT_OPTIONS: Readonly<LayoutOptions> = Object.freeze({
  algorithm: 'elk.rectpacking',
  'nodeSize.constraints': '[NODE_LABELS, MINIMUM_SIZE]',
  // width / height
  'widthApproximation.targetWidth': 1,
  'elk.contentAlignment': 'V_TOP H_CENTER',
});

export const LABEL_LAYOUT_OPTIONS: Readonly<LayoutOptions> = Object.freeze({
  'nodeLabels.placement': 'OUTSIDE, V_BOTTOM, H_CENTER',
});

/**
 * Raises the straightness priority of edges
 */
export const EDGE_STRAIGHTENING_LAYOUT_OPTIONS: Readonly<LayoutOptions> = Object.freeze({
  'layered.priority.straightness': '10',
});

/**
 * Where ELK places port labels (`portLabels.placement`)
 */
export enum PortLabelPosition {
  /** Outside the port */
  OUTSIDE = 'OUTSIDE',
  /** Inside the box owning the port */
  INSIDE = 'INSIDE',
  NEXT_TO_PORT_IF_POSSIBLE = 'NEXT_TO_PORT_IF_POSSIBLE',
  ALWAYS_SAME_SIDE = 'ALWAYS_SAME_SIDE',
  /** Opposite side, same axis */
  ALWAYS_OTHER_SAME_SIDE = 'ALWAYS_OTHER_SAME_SIDE',
  SPACE_EFFICIENT = 'SPACE_EFFICIENT',
}

const PORT_LABEL_POSITIONS: readonly string[] = Object.values(PortLabelPosition);

function isPortLabelPosition(value: string): value is PortLabelPosition {
  return PORT_LABEL_POSITIONS.includes(value);
}

/**
 * Resolve a position name
 *
 * @throws LayoutConfigError for unknown names
 */
export function parsePortLabelPosition(name: string): PortLabelPosition {
  if (!isPortLabelPosition(name)) {
    throw new LayoutConfigError(`Invalid port label position '${name}'`);
  }
  return name;
}

/**
 * Fresh, mutable copy of the global layered options
 */
export function getGlobalLayeredLayoutOptions(): LayoutOptions {
  return { ...LAYOUT_OPTIONS };
}

/**
 * Options for the box owning labelled ports
 */
export function portLabelLayoutOptions(position: PortLabelPosition | string): LayoutOptions {
  return { 'portLabels.placement': parsePortLabelPosition(position) };
}
