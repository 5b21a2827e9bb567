/**
 * Layout Server
 *
 * Long-lived layout service on one port:
 *   POST /layout (or /) -> positioned graph
 *   POST /scene         -> scene tree
 *   WebSocket           -> {requestId, mode, graph} envelopes
 *
 * Status codes: 400 invalid JSON, 422 graph refused, 404 unknown path,
 * 405 method other than POST, 500 anything else.
 */

import * as http from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { ELK_SERVER_PORT } from '../shared/config.js';
import { errorMessage, isGraphRefusal, refusalReason } from '../shared/errors.js';
import { LayoutLogger } from '../shared/logger.js';
import { rawDataToString, wsRequestSchema } from '../shared/protocol.js';
import type { EngineOutputMode, WsResponse } from '../shared/protocol.js';
import { ElkEngine } from './elk-engine.js';

const ROUTES = new Map<string, EngineOutputMode>([
  ['/', 'layout'],
  ['/layout', 'layout'],
  ['/scene', 'scene'],
]);

export class LayoutServer {
  private readonly server: http.Server;
  private readonly wss: WebSocketServer;

  constructor(private readonly engine: ElkEngine = new ElkEngine()) {
    this.server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        LayoutLogger.error('Layout request failed', error instanceof Error ? error : undefined);
        if (!res.headersSent) {
          this.respond(req, res, 500, { error: errorMessage(error) });
        } else {
          res.destroy();
        }
      });
    });

    this.wss = new WebSocketServer({ server: this.server });
    this.wss.on('connection', (ws: WebSocket) => this.handleConnection(ws));
  }

  /**
   * Start listening
   *
   * @param port - 0 picks a free port
   * @returns Bound port
   */
  listen(port: number = ELK_SERVER_PORT, host?: string): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        LayoutLogger.serverListening(boundPort);
        resolve(boundPort);
      });
    });
  }

  /**
   * Stop accepting requests and drop open connections
   */
  async close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }

    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });

    if (!this.server.listening) return;

    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
      this.server.closeAllConnections();
    });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const mode = ROUTES.get(path);

    if (!mode) {
      this.respond(req, res, 404, { error: `Unknown path ${path}` });
      return;
    }

    if (req.method !== 'POST') {
      res.setHeader('allow', 'POST');
      this.respond(req, res, 405, { error: `Method ${req.method ?? ''} not allowed` });
      return;
    }

    const body = await readBody(req);
    let document: unknown;
    try {
      document = JSON.parse(body);
    } catch (error) {
      this.respond(req, res, 400, { error: `invalid JSON: ${errorMessage(error)}` });
      return;
    }

    try {
      const result = await this.engine.run(document, mode);
      this.respond(req, res, 200, result);
    } catch (error) {
      if (isGraphRefusal(error)) {
        this.respond(req, res, 422, { error: refusalReason(error) });
        return;
      }
      throw error;
    }
  }

  private respond(req: http.IncomingMessage, res: http.ServerResponse, status: number, body: unknown): void {
    LayoutLogger.serverRequest(req.method ?? '?', req.url ?? '/', status);
    res.writeHead(status, { 'content-type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private handleConnection(ws: WebSocket): void {
    ws.on('message', (data: RawData) => {
      this.answerEnvelope(ws, data).catch((error: unknown) => {
        LayoutLogger.error('WebSocket request failed', error instanceof Error ? error : undefined);
      });
    });

    ws.on('error', (error: Error) => {
      LayoutLogger.warn(`WebSocket client error: ${error.message}`);
    });
  }

  private async answerEnvelope(ws: WebSocket, data: RawData): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(rawDataToString(data));
    } catch (error) {
      this.sendEnvelope(ws, {
        requestId: null,
        error: { kind: 'rejected', message: `invalid JSON: ${errorMessage(error)}` },
      });
      return;
    }

    const parsed = wsRequestSchema.safeParse(message);
    if (!parsed.success) {
      this.sendEnvelope(ws, {
        requestId: null,
        error: { kind: 'rejected', message: 'expected {requestId, mode, graph}' },
      });
      return;
    }

    const { requestId, mode, graph } = parsed.data;
    try {
      const result = await this.engine.run(graph, mode);
      this.sendEnvelope(ws, { requestId, result });
    } catch (error) {
      if (isGraphRefusal(error)) {
        this.sendEnvelope(ws, { requestId, error: { kind: 'rejected', message: refusalReason(error) } });
        return;
      }
      LayoutLogger.error(`WebSocket request ${requestId} failed`, error instanceof Error ? error : undefined);
      this.sendEnvelope(ws, { requestId, error: { kind: 'failure', message: errorMessage(error) } });
    }
  }

  private sendEnvelope(ws: WebSocket, envelope: WsResponse): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(envelope));
    }
  }
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}
