/**
 * Unit tests for the layout transport factory
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('unit: Transport Factory', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    delete process.env.LAYOUT_TRANSPORT;
    delete process.env.LAYOUT_TRANSFORM_SIDE;
    delete process.env.LAYOUT_TIMEOUT_MS;
    delete process.env.ELK_SERVER_PORT;
    delete process.env.ELK_ENGINE_URL;
    delete process.env.ELK_ENGINE_WS_URL;
    delete process.env.ELK_ENGINE_COMMAND;
    delete process.env.ELK_ENGINE_SCRIPT;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('loadTransportOptions', () => {
    it('defaults to the in-process transport answering with layouts', async () => {
      const { loadTransportOptions } = await import('../../../src/layout/transport-factory.js');

      expect(loadTransportOptions()).toMatchObject({
        kind: 'in-process',
        outputMode: 'layout',
        timeoutMs: 30000,
        command: process.execPath,
        url: 'http://localhost:3000',
      });
    });

    it('reads the environment', async () => {
      process.env.LAYOUT_TRANSPORT = 'websocket';
      process.env.LAYOUT_TRANSFORM_SIDE = 'engine';
      process.env.LAYOUT_TIMEOUT_MS = '1500';
      process.env.ELK_ENGINE_WS_URL = 'ws://layout.internal:8080';

      const { loadTransportOptions } = await import('../../../src/layout/transport-factory.js');

      expect(loadTransportOptions()).toMatchObject({
        kind: 'websocket',
        outputMode: 'scene',
        timeoutMs: 1500,
        url: 'ws://layout.internal:8080',
      });
    });

    it('lets overrides win over the environment', async () => {
      process.env.LAYOUT_TRANSPORT = 'http';

      const { loadTransportOptions } = await import('../../../src/layout/transport-factory.js');

      expect(
        loadTransportOptions({ kind: 'oneshot-process', args: ['engine.js'], outputMode: 'scene' })
      ).toMatchObject({ kind: 'oneshot-process', args: ['engine.js'], outputMode: 'scene' });
    });

    it('picks the URL matching the transport kind', async () => {
      process.env.ELK_SERVER_PORT = '4100';

      const { loadTransportOptions } = await import('../../../src/layout/transport-factory.js');

      expect(loadTransportOptions({ kind: 'http' }).url).toBe('http://localhost:4100');
      expect(loadTransportOptions({ kind: 'websocket' }).url).toBe('ws://localhost:4100');
    });
  });

  describe('createTransport', () => {
    it.each(['oneshot-process', 'persistent-process', 'http', 'websocket', 'in-process'] as const)(
      'creates the %s transport',
      async (kind) => {
        const { createTransport } = await import('../../../src/layout/transport-factory.js');

        const transport = createTransport({ kind, outputMode: 'scene' });

        expect(transport.kind).toBe(kind);
        expect(transport.outputMode).toBe('scene');
        await transport.close();
      }
    );

    it('follows LAYOUT_TRANSPORT without arguments', async () => {
      process.env.LAYOUT_TRANSPORT = 'persistent-process';

      const { createTransport } = await import('../../../src/layout/transport-factory.js');
      const transport = createTransport();

      expect(transport.kind).toBe('persistent-process');
      expect(transport.outputMode).toBe('layout');
      await transport.close();
    });
  });
});
