/**
 * Graph Layout Client
 *
 * Submits an abstract graph to the layout engine and returns either the
 * positioned graph or the scene built from it. Transport-agnostic: the same
 * graph yields the same coordinates over every transport.
 *
 * Errors are never swallowed: structural errors (SceneStructureError), refused
 * graphs (LayoutRejectedError) and transport failures (LayoutTransportError)
 * all reach the caller, and no partial result is returned.
 */

import { LayoutConfigError } from '../shared/errors.js';
import { LayoutLogger } from '../shared/logger.js';
import { GENERATED_ID_WIDTH } from '../shared/config.js';
import { parseLayoutedGraph, parseSceneGraph } from '../shared/schemas/elk-graph-schema.js';
import type { AbstractGraph, LayoutedGraph } from '../shared/types/elk-graph.js';
import type { SceneGraph } from '../shared/types/scene.js';
import { SceneTransformer, countSceneElements } from '../scene/scene-transformer.js';
import type { SceneTransformerOptions } from '../scene/scene-transformer.js';
import { createTransport, loadTransportOptions } from './transport-factory.js';
import type { LayoutTransport, TransportOptions } from './types.js';

export interface GraphLayoutClientOptions {
  transformer?: SceneTransformerOptions;
}

export class GraphLayoutClient {
  private readonly transformer: SceneTransformer;

  constructor(
    private readonly transport: LayoutTransport,
    options: GraphLayoutClientOptions = {}
  ) {
    this.transformer = new SceneTransformer({ idWidth: GENERATED_ID_WIDTH, ...options.transformer });
  }

  /**
   * Client over the transport named by configuration
   */
  static fromConfig(overrides: Partial<TransportOptions> = {}, options: GraphLayoutClientOptions = {}): GraphLayoutClient {
    return new GraphLayoutClient(createTransport(loadTransportOptions(overrides)), options);
  }

  get transportKind(): LayoutTransport['kind'] {
    return this.transport.kind;
  }

  /**
   * Lay out a graph
   *
   * @throws LayoutConfigError if the transport answers with scenes
   * @throws LayoutRejectedError if the engine refuses the graph
   * @throws LayoutTransportError if the engine cannot be reached or answers badly
   */
  async layout(graph: AbstractGraph, signal?: AbortSignal): Promise<LayoutedGraph> {
    if (this.transport.outputMode !== 'layout') {
      throw new LayoutConfigError(
        `Transport '${this.transport.kind}' returns scenes; layout() needs a layout-mode transport`
      );
    }
    const raw = await this.transport.send(graph, signal);
    return parseLayoutedGraph(raw, this.transport.kind);
  }

  /**
   * Lay out a graph and build its scene
   *
   * @throws SceneStructureError if the positioned graph is structurally invalid
   */
  async render(graph: AbstractGraph, signal?: AbortSignal): Promise<SceneGraph> {
    if (this.transport.outputMode === 'scene') {
      const raw = await this.transport.send(graph, signal);
      return parseSceneGraph(raw, this.transport.kind);
    }

    const layouted = await this.layout(graph, signal);
    const scene = this.transformer.transform(layouted);
    LayoutLogger.sceneBuilt(scene.id, countSceneElements(scene));
    return scene;
  }

  /**
   * Release the transport's processes and connections
   */
  async close(): Promise<void> {
    await this.transport.close();
  }
}

/**
 * Run `fn` with a client and always close it afterwards
 *
 * @param transport - Transport to use, or options for the factory
 */
export async function withLayoutClient<T>(
  transport: LayoutTransport | TransportOptions,
  fn: (client: GraphLayoutClient) => Promise<T>
): Promise<T> {
  const client = new GraphLayoutClient(isTransport(transport) ? transport : createTransport(transport));
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

function isTransport(value: LayoutTransport | TransportOptions): value is LayoutTransport {
  return 'send' in value;
}
