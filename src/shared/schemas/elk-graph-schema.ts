/**
 * ELK Graph and Scene Schemas
 *
 * Runtime validation of whatever crosses the engine boundary. Engine output
 * keeps unknown keys so a parsed layout is the engine's document unchanged.
 */

import { z } from 'zod';
import type { TransportKind } from '../config.js';
import { MalformedResponseError } from '../errors.js';
import type {
  EdgeSection,
  LayoutedEdge,
  LayoutedGraph,
  LayoutedLabel,
  LayoutedNode,
  LayoutedPort,
  Point,
} from '../types/elk-graph.js';
import type {
  Dimension,
  SceneEdge,
  SceneGraph,
  SceneJunction,
  SceneLabel,
  SceneNode,
  ScenePort,
} from '../types/scene.js';

// ========== ENGINE OUTPUT ==========

export const pointSchema: z.ZodType<Point> = z
  .object({ x: z.number(), y: z.number() })
  .passthrough();

export const layoutOptionsSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const geometryShape = {
  x: z.number().optional(),
  y: z.number().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
};

export const layoutedLabelSchema: z.ZodType<LayoutedLabel> = z
  .object({
    ...geometryShape,
    id: z.string().optional(),
    text: z.string().optional(),
    layoutOptions: layoutOptionsSchema.optional(),
  })
  .passthrough();

export const layoutedPortSchema: z.ZodType<LayoutedPort> = z
  .object({
    ...geometryShape,
    id: z.string().optional(),
    labels: z.array(layoutedLabelSchema).optional(),
    layoutOptions: layoutOptionsSchema.optional(),
  })
  .passthrough();

export const edgeSectionSchema: z.ZodType<EdgeSection> = z
  .object({
    id: z.string().optional(),
    startPoint: pointSchema,
    bendPoints: z.array(pointSchema).optional(),
    endPoint: pointSchema,
    incomingShape: z.string().optional(),
    outgoingShape: z.string().optional(),
  })
  .passthrough();

export const layoutedEdgeSchema: z.ZodType<LayoutedEdge> = z
  .object({
    id: z.string().optional(),
    source: z.string().optional(),
    target: z.string().optional(),
    sourcePort: z.string().optional(),
    targetPort: z.string().optional(),
    sources: z.array(z.string()).optional(),
    targets: z.array(z.string()).optional(),
    sourcePoint: pointSchema.optional(),
    bendPoints: z.array(pointSchema).optional(),
    targetPoint: pointSchema.optional(),
    sections: z.array(edgeSectionSchema).optional(),
    junctionPoints: z.array(pointSchema).optional(),
    labels: z.array(layoutedLabelSchema).optional(),
    layoutOptions: layoutOptionsSchema.optional(),
  })
  .passthrough();

export const layoutedNodeSchema: z.ZodType<LayoutedNode> = z.lazy(() =>
  z
    .object({
      ...geometryShape,
      id: z.string().optional(),
      children: z.array(layoutedNodeSchema).optional(),
      ports: z.array(layoutedPortSchema).optional(),
      labels: z.array(layoutedLabelSchema).optional(),
      edges: z.array(layoutedEdgeSchema).optional(),
      layoutOptions: layoutOptionsSchema.optional(),
    })
    .passthrough()
);

export const layoutedGraphSchema: z.ZodType<LayoutedGraph> = layoutedNodeSchema;

/**
 * Engine input: any JSON object, root id optional
 */
export const graphDocumentSchema = z.object({ id: z.string().optional() }).passthrough();

// ========== SCENE ==========

const dimensionSchema: z.ZodType<Dimension> = z.object({
  width: z.number(),
  height: z.number(),
});

export const sceneLabelSchema: z.ZodType<SceneLabel> = z.object({
  type: z.literal('label'),
  id: z.string(),
  text: z.string(),
  position: pointSchema,
  size: dimensionSchema,
});

export const sceneJunctionSchema: z.ZodType<SceneJunction> = z.object({
  type: z.literal('junction'),
  id: z.string(),
  position: pointSchema,
});

export const sceneEdgeSchema: z.ZodType<SceneEdge> = z.object({
  type: z.literal('edge'),
  id: z.string(),
  sourceId: z.string(),
  targetId: z.string(),
  routingPoints: z.array(pointSchema),
  children: z.array(z.union([sceneJunctionSchema, sceneLabelSchema])),
});

export const scenePortSchema: z.ZodType<ScenePort> = z.object({
  type: z.literal('port'),
  id: z.string(),
  position: pointSchema,
  size: dimensionSchema,
  children: z.array(sceneLabelSchema),
});

export const sceneNodeSchema: z.ZodType<SceneNode> = z.lazy(() =>
  z.object({
    type: z.literal('node'),
    id: z.string(),
    position: pointSchema,
    size: dimensionSchema,
    children: z.array(z.union([sceneNodeSchema, scenePortSchema, sceneLabelSchema, sceneEdgeSchema])),
  })
);

export const sceneGraphSchema: z.ZodType<SceneGraph> = z.object({
  type: z.literal('graph'),
  id: z.string(),
  children: z.array(z.union([sceneNodeSchema, sceneEdgeSchema])),
});

// ========== PARSERS ==========

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid document';
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validate a raw engine answer as a positioned graph
 */
export function parseLayoutedGraph(value: unknown, transport: TransportKind): LayoutedGraph {
  const result = layoutedGraphSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedResponseError(describeIssue(result.error), transport);
  }
  return result.data;
}

/**
 * Validate a raw engine answer as a scene tree
 */
export function parseSceneGraph(value: unknown, transport: TransportKind): SceneGraph {
  const result = sceneGraphSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedResponseError(describeIssue(result.error), transport);
  }
  return result.data;
}
