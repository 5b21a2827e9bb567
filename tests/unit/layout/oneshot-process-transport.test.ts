/**
 * Unit tests for OneShotProcessTransport
 *
 * The engine process is an in-memory fake; no process is spawned.
 */

import { describe, it, expect } from 'vitest';
import { OneShotProcessTransport } from '../../../src/layout/transports/oneshot-process-transport.js';
import {
  EngineFailureError,
  EngineTimeoutError,
  EngineUnavailableError,
  LayoutCancelledError,
  LayoutRejectedError,
  MalformedResponseError,
} from '../../../src/shared/errors.js';
import type { AbstractGraph, GraphNode } from '../../../src/shared/types/elk-graph.js';
import { fakeSpawner } from '../../helpers/fake-engine-process.js';
import type { FakeEngineBehavior } from '../../helpers/fake-engine-process.js';
import { rejectionOf } from '../../helpers/rejection.js';
import { createAbstractGraph } from '../../setup.js';

function createTransport(behavior: FakeEngineBehavior, timeoutMs = 5000) {
  const { spawnEngine, spawned } = fakeSpawner(behavior);
  const transport = new OneShotProcessTransport({
    command: 'node',
    args: ['engine.js'],
    spawnEngine,
    timeoutMs,
  });
  return { transport, spawned };
}

const echo: FakeEngineBehavior = {
  onInput(input, proc) {
    proc.writeStdout(input);
    proc.exit(0);
  },
};

describe('OneShotProcessTransport', () => {
  it('writes the graph to stdin and returns the decoded stdout', async () => {
    const { transport, spawned } = createTransport(echo);
    const graph = createAbstractGraph();

    const result = await transport.send(graph);

    expect(result).toEqual(graph);
    expect(spawned).toHaveLength(1);
    expect(spawned[0].command).toBe('node');
    expect(spawned[0].args).toEqual(['engine.js', '--once']);
    expect(spawned[0].received).toBe(JSON.stringify(graph));
  });

  it('spawns a fresh process for every call', async () => {
    const { transport, spawned } = createTransport(echo);

    await transport.send({ id: 'first' });
    await transport.send({ id: 'second' });

    expect(spawned.map((proc) => proc.received)).toEqual(['{"id":"first"}', '{"id":"second"}']);
  });

  it('asks for scenes in scene mode', async () => {
    const { spawnEngine, spawned } = fakeSpawner(echo);
    const transport = new OneShotProcessTransport({
      command: 'node',
      args: ['engine.js'],
      spawnEngine,
      outputMode: 'scene',
    });

    await transport.send({ id: 'g' });

    expect(spawned[0].args).toEqual(['engine.js', '--once', '--scene']);
  });

  it('still answers when a successful engine wrote to stderr', async () => {
    const { transport } = createTransport({
      onInput(_input, proc) {
        proc.writeStderr('warning: unknown option\n');
        proc.writeStdout('{"id":"root"}');
        proc.exit(0);
      },
    });

    await expect(transport.send({})).resolves.toEqual({ id: 'root' });
  });

  it('maps exit code 65 to LayoutRejectedError with the first stderr line', async () => {
    const { transport } = createTransport({
      onInput(_input, proc) {
        proc.writeStderr('\nunknown layout algorithm: spiral\nat line 3\n');
        proc.exit(65);
      },
    });

    const error = await rejectionOf(transport.send({}));

    expect(error).toBeInstanceOf(LayoutRejectedError);
    expect(error).toMatchObject({ message: 'Layout rejected: unknown layout algorithm: spiral' });
  });

  it('maps other exit codes to EngineFailureError', async () => {
    const { transport } = createTransport({
      onInput(_input, proc) {
        proc.writeStderr('out of memory\n');
        proc.exit(2);
      },
    });

    const error = await rejectionOf(transport.send({}));

    expect(error).toBeInstanceOf(EngineFailureError);
    expect(error).toMatchObject({
      message: 'Layout engine exited with code 2: out of memory',
      exitCode: 2,
      signal: null,
      stderr: 'out of memory\n',
      transport: 'oneshot-process',
    });
  });

  it('reports a process killed by a signal', async () => {
    const { transport } = createTransport({
      onInput(_input, proc) {
        proc.exit(null, 'SIGSEGV');
      },
    });

    await expect(transport.send({})).rejects.toThrow('Layout engine exited with signal SIGSEGV');
  });

  it('rejects empty and non-JSON output as malformed', async () => {
    const silent = createTransport({
      onInput(_input, proc) {
        proc.exit(0);
      },
    });
    const chatty = createTransport({
      onInput(_input, proc) {
        proc.writeStdout('layout done');
        proc.exit(0);
      },
    });

    const empty = await rejectionOf(silent.transport.send({}));
    const garbled = await rejectionOf(chatty.transport.send({}));

    expect(empty).toBeInstanceOf(MalformedResponseError);
    expect(empty).toMatchObject({ message: 'Malformed layout engine response: empty response' });
    expect(garbled).toBeInstanceOf(MalformedResponseError);
    expect(garbled).toMatchObject({ detail: expect.stringMatching(/^not valid JSON \(/) });
  });

  it('maps a failed start to EngineUnavailableError', async () => {
    const { transport } = createTransport({
      onSpawn(proc) {
        proc.failToStart('spawn node ENOENT');
      },
    });

    const error = await rejectionOf(transport.send({}));

    expect(error).toBeInstanceOf(EngineUnavailableError);
    expect(error).toMatchObject({ message: "Failed to start layout engine 'node': spawn node ENOENT" });
  });

  it('maps a throwing spawn to EngineUnavailableError', async () => {
    const transport = new OneShotProcessTransport({
      command: 'missing-engine',
      spawnEngine: () => {
        throw new Error('EACCES');
      },
    });

    await expect(transport.send({})).rejects.toThrow("Failed to start layout engine 'missing-engine': EACCES");
  });

  it('kills the process when the deadline passes', async () => {
    const { transport, spawned } = createTransport({}, 50);

    const error = await rejectionOf(transport.send({}));

    expect(error).toBeInstanceOf(EngineTimeoutError);
    expect(error).toMatchObject({ message: 'Layout engine did not answer within 50ms', timeoutMs: 50 });
    expect(spawned[0].killedWith).toBe('SIGKILL');
  });

  it('kills the process when the caller aborts', async () => {
    const controller = new AbortController();
    const { transport, spawned } = createTransport({
      onInput() {
        controller.abort();
      },
    });

    const error = await rejectionOf(transport.send({}, controller.signal));

    expect(error).toBeInstanceOf(LayoutCancelledError);
    expect(spawned[0].killedWith).toBe('SIGKILL');
  });

  it('spawns nothing for an already aborted call', async () => {
    const controller = new AbortController();
    controller.abort();
    const { transport, spawned } = createTransport(echo);

    await expect(transport.send({}, controller.signal)).rejects.toBeInstanceOf(LayoutCancelledError);
    expect(spawned).toHaveLength(0);
  });

  it('refuses graphs that cannot be serialized', async () => {
    const { transport, spawned } = createTransport(echo);
    const node: GraphNode = { id: 'loop', children: [] };
    node.children?.push(node);
    const graph: AbstractGraph = { children: [node] };

    const error = await rejectionOf(transport.send(graph));

    expect(error).toBeInstanceOf(LayoutRejectedError);
    expect(error).toMatchObject({ reason: expect.stringMatching(/^graph is not serializable: /) });
    expect(spawned).toHaveLength(0);
  });

  it('kills running processes on close and refuses later calls', async () => {
    const { transport, spawned } = createTransport({});

    const pending = rejectionOf(transport.send({}));
    await new Promise((resolve) => setImmediate(resolve));
    await transport.close();

    expect(spawned[0].killedWith).toBe('SIGKILL');
    expect(await pending).toBeInstanceOf(EngineFailureError);
    await expect(transport.send({})).rejects.toThrow('Layout transport is closed');
  });
});
