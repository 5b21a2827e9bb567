/**
 * ELK Engine Host
 *
 * Runs elkjs on one graph document. Every engine surface (one-shot CLI,
 * line mode, HTTP/WebSocket service, in-process transport) goes through here.
 */

import * as elkjs from 'elkjs';
import type { ElkNode } from 'elkjs';
import { GENERATED_ID_WIDTH } from '../shared/config.js';
import { LayoutRejectedError, errorMessage } from '../shared/errors.js';
import { LayoutLogger } from '../shared/logger.js';
import type { EngineOutputMode } from '../shared/protocol.js';
import { graphDocumentSchema, parseLayoutedGraph } from '../shared/schemas/elk-graph-schema.js';
import type { LayoutedGraph } from '../shared/types/elk-graph.js';
import type { SceneGraph } from '../shared/types/scene.js';
import { SceneTransformer, ROOT_SCENE_ID, countSceneElements } from '../scene/scene-transformer.js';

/**
 * The layout algorithm itself; elkjs unless a test injects another
 */
export interface LayoutKernel {
  layout(graph: ElkNode): Promise<unknown>;
}

/**
 * Bookkeeping elkjs leaves on the objects it returns (GWT hash codes)
 */
const KERNEL_STATE_KEYS: ReadonlySet<string> = new Set(['$H']);

/**
 * Plain JSON copy of a kernel result without the kernel's own bookkeeping
 */
function withoutKernelState(result: unknown): unknown {
  if (result === undefined) return undefined;
  const copy: unknown = JSON.parse(
    JSON.stringify(result, (key: string, value: unknown) => (KERNEL_STATE_KEYS.has(key) ? undefined : value))
  );
  return copy;
}

export function createElkKernel(): LayoutKernel {
  const elk = new elkjs.default();
  return {
    layout: (graph) => elk.layout(graph),
  };
}

export class ElkEngine {
  private kernel: LayoutKernel | null;
  private readonly transformer: SceneTransformer;

  constructor(
    kernel?: LayoutKernel,
    transformer: SceneTransformer = new SceneTransformer({ idWidth: GENERATED_ID_WIDTH })
  ) {
    this.kernel = kernel ?? null;
    this.transformer = transformer;
  }

  /**
   * Lay out one graph document
   *
   * @throws LayoutRejectedError if the document is not a graph object or the kernel refuses it
   */
  async layout(document: unknown): Promise<LayoutedGraph> {
    const parsed = graphDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new LayoutRejectedError('graph must be a JSON object');
    }

    // elkjs writes its results into the graph it is given
    const elkGraph: ElkNode = JSON.parse(
      JSON.stringify({ ...parsed.data, id: parsed.data.id || ROOT_SCENE_ID })
    );

    let result: unknown;
    try {
      result = await this.getKernel().layout(elkGraph);
    } catch (error) {
      throw new LayoutRejectedError(errorMessage(error), { cause: error });
    }

    return parseLayoutedGraph(withoutKernelState(result), 'in-process');
  }

  /**
   * Lay out, then transform to a scene in `scene` mode
   */
  async run(document: unknown, mode: EngineOutputMode): Promise<LayoutedGraph | SceneGraph> {
    const layouted = await this.layout(document);
    if (mode === 'layout') {
      return layouted;
    }

    const scene = this.transformer.transform(layouted);
    LayoutLogger.sceneBuilt(scene.id, countSceneElements(scene));
    return scene;
  }

  private getKernel(): LayoutKernel {
    if (!this.kernel) {
      this.kernel = createElkKernel();
    }
    return this.kernel;
  }
}
