/**
 * Unit tests for the ELK engine host
 *
 * The elkjs kernel is replaced by a deterministic stub.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ElkEngine } from '../../../src/engine/elk-engine.js';
import { SceneTransformer } from '../../../src/scene/scene-transformer.js';
import { LayoutRejectedError, MalformedResponseError } from '../../../src/shared/errors.js';
import { StubKernel, fakeLayout } from '../../helpers/stub-kernel.js';
import { rejectionOf } from '../../helpers/rejection.js';
import { sequenceRandom } from '../../setup.js';

describe('ElkEngine', () => {
  describe('layout', () => {
    it('runs the kernel and returns the positioned graph', async () => {
      const engine = new ElkEngine(new StubKernel());

      const layouted = await engine.layout({
        id: 'g',
        children: [{ id: 'a' }, { id: 'b', width: 80, height: 20 }],
        edges: [{ id: 'e', sources: ['a'], targets: ['b'] }],
      });

      expect(layouted).toEqual({
        id: 'g',
        x: 0,
        y: 0,
        width: 50,
        height: 50,
        children: [
          { id: 'a', x: 0, y: 0, width: 50, height: 50 },
          { id: 'b', x: 100, y: 0, width: 80, height: 20 },
        ],
        edges: [
          {
            id: 'e',
            sources: ['a'],
            targets: ['b'],
            sections: [{ id: 'e_s0', startPoint: { x: 0, y: 0 }, endPoint: { x: 100, y: 0 } }],
          },
        ],
      });
    });

    it('names an unnamed root', async () => {
      const kernel = new StubKernel();
      const engine = new ElkEngine(kernel);

      await engine.layout({ children: [] });
      await engine.layout({ id: '', children: [] });

      expect(kernel.calls.map((graph) => graph.id)).toEqual(['root', 'root']);
    });

    it('leaves the caller document untouched', async () => {
      const document = { id: 'g', children: [{ id: 'a' }] };

      await new ElkEngine(new StubKernel()).layout(document);

      expect(document).toEqual({ id: 'g', children: [{ id: 'a' }] });
    });

    it.each([[null], [[]], ['graph'], [42]])('refuses %j as a graph', async (document) => {
      const kernel = new StubKernel();

      const error = await rejectionOf(new ElkEngine(kernel).layout(document));

      expect(error).toBeInstanceOf(LayoutRejectedError);
      expect(error).toMatchObject({ reason: 'graph must be a JSON object' });
      expect(kernel.calls).toHaveLength(0);
    });

    it('turns kernel errors into refusals', async () => {
      const engine = new ElkEngine(
        new StubKernel(() => {
          throw new Error("Referenced shape does not exist: 'ghost'");
        })
      );

      const error = await rejectionOf(engine.layout({ edges: [{ id: 'e', sources: ['ghost'], targets: ['a'] }] }));

      expect(error).toBeInstanceOf(LayoutRejectedError);
      expect(error).toMatchObject({ message: "Layout rejected: Referenced shape does not exist: 'ghost'" });
    });

    it('drops the hash counters elkjs leaves on its results', async () => {
      let runs = 0;
      const engine = new ElkEngine(
        new StubKernel((graph) => {
          runs++;
          const layouted = fakeLayout(graph);
          return { ...layouted, $H: 300 + runs, children: layouted.children?.map((child) => ({ ...child, $H: runs })) };
        })
      );

      const first = await engine.layout({ id: 'g', children: [{ id: 'a' }] });
      const second = await engine.layout({ id: 'g', children: [{ id: 'a' }] });

      expect(first).toEqual({
        id: 'g',
        x: 0,
        y: 0,
        width: 50,
        height: 50,
        children: [{ id: 'a', x: 0, y: 0, width: 50, height: 50 }],
      });
      expect(second).toEqual(first);
    });

    it('validates what the kernel returns', async () => {
      const engine = new ElkEngine(new StubKernel(() => ({ id: 'g', x: 'left' })));

      await expect(engine.layout({ id: 'g' })).rejects.toBeInstanceOf(MalformedResponseError);
    });
  });

  describe('run', () => {
    it('returns the layout in layout mode', async () => {
      const engine = new ElkEngine(new StubKernel());

      await expect(engine.run({ id: 'g' }, 'layout')).resolves.toEqual({ id: 'g', x: 0, y: 0, width: 50, height: 50 });
    });

    it('returns the scene in scene mode', async () => {
      const engine = new ElkEngine(new StubKernel(), new SceneTransformer({ random: sequenceRandom(0.5) }));

      const scene = await engine.run(
        {
          id: 'g',
          children: [{ id: 'a', labels: [{ text: 'A', width: 10, height: 10 }] }, { id: 'b' }],
          edges: [{ id: 'e', sources: ['a'], targets: ['b'] }],
        },
        'scene'
      );

      expect(scene).toEqual({
        type: 'graph',
        id: 'g',
        children: [
          {
            type: 'node',
            id: 'a',
            position: { x: 0, y: 0 },
            size: { width: 50, height: 50 },
            children: [
              { type: 'label', id: 'g_500000', text: 'A', position: { x: 0, y: 0 }, size: { width: 10, height: 10 } },
            ],
          },
          { type: 'node', id: 'b', position: { x: 100, y: 0 }, size: { width: 50, height: 50 }, children: [] },
          {
            type: 'edge',
            id: 'e',
            sourceId: 'a',
            targetId: 'b',
            routingPoints: [
              { x: 0, y: 0 },
              { x: 100, y: 0 },
            ],
            children: [],
          },
        ],
      });
    });
  });
});

describe('ElkEngine scene ids', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('generates label ids of GENERATED_ID_WIDTH digits in scene mode', async () => {
    process.env.GENERATED_ID_WIDTH = '8';
    const { ElkEngine: ConfiguredEngine } = await import('../../../src/engine/elk-engine.js');

    const scene = await new ConfiguredEngine(new StubKernel()).run(
      { id: 'g', children: [{ id: 'a', labels: [{ text: 'A' }] }] },
      'scene'
    );

    expect(JSON.stringify(scene)).toMatch(/"type":"label","id":"g_\d{8}","text":"A"/);
  });
});
