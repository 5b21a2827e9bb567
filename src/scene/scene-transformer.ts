/**
 * Scene Transformer
 *
 * Turns a positioned ELK graph into the renderer's scene tree:
 * - registers every node, port and edge id (duplicates and missing ids abort the pass)
 * - generates ids for labels that have none, drops labels without text
 * - rebuilds edge routing from sections or from the legacy point fields
 * - adds a junction child per junction point
 *
 * Primitive edges whose routing comes back as sections (ELK issue #553) are
 * routed from the sections; the legacy point fields are ignored for them.
 */

import { IdRegistry } from './id-registry.js';
import { classifyEdge, effectiveEndpoints } from './edge-classifier.js';
import type { ClassifiedEdge } from './edge-classifier.js';
import { LayoutConfigError } from '../shared/errors.js';
import { DEFAULT_ID_WIDTH, MAX_ID_WIDTH, MIN_ID_WIDTH, isValidIdWidth } from '../shared/utils/random-id.js';
import type { RandomSource } from '../shared/utils/random-id.js';
import type {
  EdgeSection,
  LayoutedEdge,
  LayoutedGraph,
  LayoutedLabel,
  LayoutedNode,
  LayoutedPort,
  Point,
  ShapeGeometry,
} from '../shared/types/elk-graph.js';
import type {
  Dimension,
  SceneEdge,
  SceneElement,
  SceneGraph,
  SceneLabel,
  SceneNode,
  ScenePort,
} from '../shared/types/scene.js';

export const ROOT_SCENE_ID = 'root';

export interface SceneTransformerOptions {
  /** Digits in generated label ids */
  idWidth?: number;
  /** Random source for generated label ids */
  random?: RandomSource;
}

type TextLabel = LayoutedLabel & { text: string };

function hasText(label: LayoutedLabel): label is TextLabel {
  return label.text !== undefined && label.text !== '';
}

function position(shape: ShapeGeometry): Point {
  return { x: shape.x ?? 0, y: shape.y ?? 0 };
}

function size(shape: ShapeGeometry): Dimension {
  return { width: shape.width ?? 0, height: shape.height ?? 0 };
}

function copyPoint(point: Point): Point {
  return { x: point.x, y: point.y };
}

/**
 * One transformation pass. Registries live exactly as long as the pass.
 */
class TransformPass {
  private readonly nodeIds = new IdRegistry('node');
  private readonly portIds = new IdRegistry('port');
  private readonly edgeIds = new IdRegistry('edge');
  private readonly labelIds = new IdRegistry('label');
  private readonly sectionIds = new IdRegistry('section');

  constructor(
    private readonly idWidth: number,
    private readonly random: RandomSource
  ) {}

  transformGraph(graph: LayoutedGraph): SceneGraph {
    const id = graph.id || ROOT_SCENE_ID;
    const scene: SceneGraph = { type: 'graph', id, children: [] };

    (graph.children ?? []).forEach((node, i) => {
      scene.children.push(this.transformNode(node, `${id}/children[${i}]`));
    });
    (graph.edges ?? []).forEach((edge, i) => {
      scene.children.push(this.transformEdge(edge, `${id}/edges[${i}]`));
    });

    return scene;
  }

  transformNode(node: LayoutedNode, location: string): SceneNode {
    const id = this.nodeIds.register(node.id, location);
    const sceneNode: SceneNode = {
      type: 'node',
      id,
      position: position(node),
      size: size(node),
      children: [],
    };

    (node.children ?? []).forEach((child, i) => {
      sceneNode.children.push(this.transformNode(child, `${location}/children[${i}]`));
    });
    (node.ports ?? []).forEach((port, i) => {
      sceneNode.children.push(this.transformPort(port, `${location}/ports[${i}]`));
    });
    sceneNode.children.push(...this.transformLabels(node.labels, location));
    (node.edges ?? []).forEach((edge, i) => {
      sceneNode.children.push(this.transformEdge(edge, `${location}/edges[${i}]`));
    });

    return sceneNode;
  }

  transformPort(port: LayoutedPort, location: string): ScenePort {
    const id = this.portIds.register(port.id, location);
    return {
      type: 'port',
      id,
      position: position(port),
      size: size(port),
      children: this.transformLabels(port.labels, location),
    };
  }

  transformLabel(label: TextLabel, location: string): SceneLabel {
    // Labels are never referenced by other elements, so their ids may be generated
    const id = this.labelIds.registerOrGenerate(label.id, location, this.idWidth, this.random);
    return {
      type: 'label',
      id,
      text: label.text,
      position: position(label),
      size: size(label),
    };
  }

  transformEdge(edge: LayoutedEdge, location: string): SceneEdge {
    const id = this.edgeIds.register(edge.id, location);
    const classified = classifyEdge(edge, id);
    const { sourceId, targetId } = effectiveEndpoints(classified);

    const sceneEdge: SceneEdge = {
      type: 'edge',
      id,
      sourceId,
      targetId,
      routingPoints: this.routingPoints(edge, classified, location),
      children: [],
    };

    (edge.junctionPoints ?? []).forEach((point, i) => {
      sceneEdge.children.push({ type: 'junction', id: `${id}_j${i}`, position: copyPoint(point) });
    });
    sceneEdge.children.push(...this.transformLabels(edge.labels, location));

    return sceneEdge;
  }

  private transformLabels(labels: LayoutedLabel[] | undefined, location: string): SceneLabel[] {
    const sceneLabels: SceneLabel[] = [];
    (labels ?? []).forEach((label, i) => {
      if (hasText(label)) {
        sceneLabels.push(this.transformLabel(label, `${location}/labels[${i}]`));
      }
    });
    return sceneLabels;
  }

  private routingPoints(edge: LayoutedEdge, classified: ClassifiedEdge, location: string): Point[] {
    const sections = edge.sections ?? [];
    if (sections.length > 0) {
      return sections.flatMap((section, i) =>
        this.sectionPoints(section, `${location}/sections[${i}]`)
      );
    }

    switch (classified.kind) {
      case 'extended':
        return [];
      case 'primitive': {
        const points: Point[] = [];
        if (edge.sourcePoint) points.push(copyPoint(edge.sourcePoint));
        points.push(...(edge.bendPoints ?? []).map(copyPoint));
        if (edge.targetPoint) points.push(copyPoint(edge.targetPoint));
        return points;
      }
    }
  }

  private sectionPoints(section: EdgeSection, location: string): Point[] {
    if (section.id !== undefined) {
      this.sectionIds.register(section.id, location);
    }
    return [
      copyPoint(section.startPoint),
      ...(section.bendPoints ?? []).map(copyPoint),
      copyPoint(section.endPoint),
    ];
  }
}

/**
 * Scene Transformer
 *
 * Stateless between calls: every `transform` starts with empty registries.
 */
export class SceneTransformer {
  private readonly idWidth: number;
  private readonly random: RandomSource;

  /**
   * @throws LayoutConfigError if `idWidth` is not an integer from 1 to 15
   */
  constructor(options: SceneTransformerOptions = {}) {
    const idWidth = options.idWidth ?? DEFAULT_ID_WIDTH;
    if (!isValidIdWidth(idWidth)) {
      throw new LayoutConfigError(
        `Generated id width must be an integer from ${MIN_ID_WIDTH} to ${MAX_ID_WIDTH}, got ${idWidth}`
      );
    }
    this.idWidth = idWidth;
    this.random = options.random ?? Math.random;
  }

  /**
   * Transform one positioned graph into one scene
   *
   * @throws SceneStructureError on missing, duplicate or ambiguous elements; no partial scene is returned
   */
  transform(graph: LayoutedGraph): SceneGraph {
    return new TransformPass(this.idWidth, this.random).transformGraph(graph);
  }
}

/**
 * Transform with a throwaway transformer
 */
export function transformToScene(graph: LayoutedGraph, options: SceneTransformerOptions = {}): SceneGraph {
  return new SceneTransformer(options).transform(graph);
}

/**
 * Count every element below and including `element`
 */
export function countSceneElements(element: SceneElement): number {
  if (!('children' in element)) return 1;
  let count = 1;
  for (const child of element.children) {
    count += countSceneElements(child);
  }
  return count;
}
