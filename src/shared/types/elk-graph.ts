/**
 * ELK Graph Types
 *
 * The abstract graph handed to the layout engine and the positioned graph
 * it hands back. Both follow the ELK JSON format.
 */

/**
 * Point
 *
 * X/Y coordinates
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Layout options are passed to the engine untouched
 */
export type LayoutOptions = Record<string, string | number | boolean>;

// ========== ABSTRACT GRAPH (engine input) ==========

export interface GraphLabel {
  /** Optional: the scene generates one when absent */
  id?: string;
  text?: string;
  width?: number;
  height?: number;
  layoutOptions?: LayoutOptions;
}

export interface GraphPort {
  id: string;
  width?: number;
  height?: number;
  labels?: GraphLabel[];
  layoutOptions?: LayoutOptions;
}

/**
 * Primitive edge: one source, one target
 */
export interface PrimitiveGraphEdge {
  id: string;
  source: string;
  target: string;
  sourcePort?: string;
  targetPort?: string;
  labels?: GraphLabel[];
  layoutOptions?: LayoutOptions;
}

/**
 * Extended edge: ordered, non-empty endpoint lists
 */
export interface ExtendedGraphEdge {
  id: string;
  sources: string[];
  targets: string[];
  labels?: GraphLabel[];
  layoutOptions?: LayoutOptions;
}

export type GraphEdge = PrimitiveGraphEdge | ExtendedGraphEdge;

export interface GraphNode {
  id: string;
  width?: number;
  height?: number;
  children?: GraphNode[];
  ports?: GraphPort[];
  labels?: GraphLabel[];
  /** Edges scoped to this container */
  edges?: GraphEdge[];
  layoutOptions?: LayoutOptions;
}

/**
 * Abstract Graph
 *
 * Root of the pre-layout description, built per render by a collector
 */
export interface AbstractGraph {
  id?: string;
  layoutOptions?: LayoutOptions;
  children?: GraphNode[];
  edges?: GraphEdge[];
}

// ========== LAYOUT-ENGINE OUTPUT ==========
// Ids are optional here: the scene transformer reports missing ids itself.

export interface ShapeGeometry {
  x?: number;
  y?: number;
  width?: number;
  height?: number;
}

export interface LayoutedLabel extends ShapeGeometry {
  id?: string;
  text?: string;
  layoutOptions?: LayoutOptions;
}

export interface LayoutedPort extends ShapeGeometry {
  id?: string;
  labels?: LayoutedLabel[];
  layoutOptions?: LayoutOptions;
}

/**
 * Edge Section
 *
 * One continuous routed segment of an edge
 */
export interface EdgeSection {
  id?: string;
  startPoint: Point;
  bendPoints?: Point[];
  endPoint: Point;
  incomingShape?: string;
  outgoingShape?: string;
}

/**
 * Positioned edge in either shape; classified by field presence
 */
export interface LayoutedEdge {
  id?: string;
  source?: string;
  target?: string;
  sourcePort?: string;
  targetPort?: string;
  sources?: string[];
  targets?: string[];
  sourcePoint?: Point;
  bendPoints?: Point[];
  targetPoint?: Point;
  sections?: EdgeSection[];
  junctionPoints?: Point[];
  labels?: LayoutedLabel[];
  layoutOptions?: LayoutOptions;
}

export interface LayoutedNode extends ShapeGeometry {
  id?: string;
  children?: LayoutedNode[];
  ports?: LayoutedPort[];
  labels?: LayoutedLabel[];
  edges?: LayoutedEdge[];
  layoutOptions?: LayoutOptions;
}

/**
 * Layouted Graph
 *
 * Root of the engine output: the input graph annotated with geometry
 */
export type LayoutedGraph = LayoutedNode;
