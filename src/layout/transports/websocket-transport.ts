/**
 * WebSocket Transport
 *
 * One long-lived connection to the layout service; requests are multiplexed
 * by requestId. The connection opens on the first call and reopens on the
 * next call after it drops. A drop fails every request sent over it.
 */

import WebSocket from 'ws';
import type { RawData } from 'ws';
import type { TransportKind } from '../../shared/config.js';
import { ELK_ENGINE_WS_URL } from '../../shared/config.js';
import {
  EngineFailureError,
  EngineUnavailableError,
  LayoutRejectedError,
  MalformedResponseError,
  errorMessage,
} from '../../shared/errors.js';
import { LayoutLogger } from '../../shared/logger.js';
import { rawDataToString, wsResponseSchema } from '../../shared/protocol.js';
import type { Deadline } from './deadline.js';
import type { NetworkTransportOptions } from './http-transport.js';
import { parseEngineResponse } from './response.js';
import { TransportBase } from './transport-base.js';

interface PendingRequest {
  socket: WebSocket;
  resolve(value: unknown): void;
  reject(error: Error): void;
}

export class WebSocketTransport extends TransportBase {
  readonly kind: TransportKind = 'websocket';
  private readonly url: string;
  private socket: WebSocket | null = null;
  private connecting: Promise<WebSocket> | null = null;
  private readonly pending = new Map<string, PendingRequest>();
  private requestCounter = 0;

  constructor(options: NetworkTransportOptions = {}) {
    super(options);
    this.url = options.url ?? ELK_ENGINE_WS_URL;
  }

  protected exchange(payload: string, deadline: Deadline): Promise<unknown> {
    const requestId = `req-${++this.requestCounter}`;
    const envelope = `{"requestId":${JSON.stringify(requestId)},"mode":"${this.outputMode}","graph":${payload}}`;

    return new Promise<unknown>((resolve, reject) => {
      const detach = deadline.onAbort(() => {
        this.pending.delete(requestId);
        reject(deadline.toError(this.kind));
      });
      if (deadline.aborted) return;

      const settle = {
        resolve: (value: unknown) => {
          detach();
          resolve(value);
        },
        reject: (error: Error) => {
          detach();
          reject(error);
        },
      };

      this.connect().then(
        (socket) => {
          if (deadline.aborted) return;
          this.pending.set(requestId, { socket, ...settle });
          socket.send(envelope, (error) => {
            if (error && this.pending.delete(requestId)) {
              settle.reject(
                new EngineFailureError(`Failed to send layout request: ${error.message}`, this.kind)
              );
            }
          });
        },
        (error: Error) => settle.reject(error)
      );
    });
  }

  protected async release(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.connecting = null;
    if (!socket) return;

    this.failPending(socket, new EngineUnavailableError('Layout transport is closed', this.kind));
    if (socket.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.close();
    });
  }

  private connect(): Promise<WebSocket> {
    if (this.socket && this.socket.readyState === WebSocket.OPEN) {
      return Promise.resolve(this.socket);
    }
    if (this.connecting) {
      return this.connecting;
    }

    const connecting = new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(this.url);

      ws.once('open', () => {
        if (this.connecting === connecting) this.connecting = null;
        if (this.closed) {
          ws.close();
          reject(new EngineUnavailableError('Layout transport is closed', this.kind));
          return;
        }
        this.socket = ws;
        LayoutLogger.connected(this.kind, this.url);
        resolve(ws);
      });

      ws.on('message', (data: RawData) => this.handleMessage(data));

      ws.on('error', (error: Error) => {
        LayoutLogger.warn(`WebSocket error [${this.kind}]: ${error.message}`);
        reject(
          new EngineUnavailableError(`Cannot connect to layout engine at ${this.url}: ${error.message}`, this.kind, {
            cause: error,
          })
        );
      });

      ws.on('close', () => {
        if (this.socket === ws) this.socket = null;
        if (this.connecting === connecting) this.connecting = null;
        reject(new EngineUnavailableError(`Connection to ${this.url} closed before it opened`, this.kind));
        this.failPending(ws, new EngineFailureError('Layout engine connection closed', this.kind));
      });
    });

    this.connecting = connecting;
    return connecting;
  }

  private handleMessage(data: RawData): void {
    let message: unknown;
    try {
      message = parseEngineResponse(rawDataToString(data), this.kind);
    } catch (error) {
      LayoutLogger.warn(`Unreadable engine message [${this.kind}]: ${errorMessage(error)}`);
      return;
    }

    const parsed = wsResponseSchema.safeParse(message);
    if (!parsed.success) {
      LayoutLogger.warn(`Engine message without envelope [${this.kind}]`);
      return;
    }

    const { requestId, result, error } = parsed.data;
    const entry = requestId !== null ? this.pending.get(requestId) : undefined;
    if (requestId === null || !entry) {
      LayoutLogger.warn(`Engine answer for unknown request [${this.kind}]: ${error?.message ?? requestId}`);
      return;
    }
    this.pending.delete(requestId);

    if (error) {
      entry.reject(
        error.kind === 'rejected'
          ? new LayoutRejectedError(error.message)
          : new EngineFailureError(error.message, this.kind)
      );
      return;
    }
    if (result === undefined) {
      entry.reject(new MalformedResponseError('envelope has neither result nor error', this.kind));
      return;
    }
    entry.resolve(result);
  }

  private failPending(socket: WebSocket, error: Error): void {
    for (const [requestId, entry] of this.pending) {
      if (entry.socket === socket) {
        this.pending.delete(requestId);
        entry.reject(error);
      }
    }
  }
}
