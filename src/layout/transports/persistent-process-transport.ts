/**
 * Persistent Process Transport
 *
 * Keeps one engine process in line mode. Requests are written one JSON
 * document per line; answers come back one line each, in request order.
 *
 * Lifecycle:
 * - spawned on the first call, ready once READY_MARKER is read
 * - respawned on the next call after it exits
 * - terminated when a call times out or is aborted; every request still
 *   in flight on that process fails
 */

import { createInterface } from 'readline';
import type { Writable } from 'stream';
import type { TransportKind } from '../../shared/config.js';
import { ELK_ENGINE_COMMAND, ELK_ENGINE_SCRIPT } from '../../shared/config.js';
import {
  EngineFailureError,
  EngineUnavailableError,
  LayoutRejectedError,
  errorMessage,
} from '../../shared/errors.js';
import { LayoutLogger } from '../../shared/logger.js';
import { READY_MARKER, engineErrorLineSchema } from '../../shared/protocol.js';
import type { EngineProcess, SpawnEngine } from '../types.js';
import type { Deadline } from './deadline.js';
import { spawnEngineProcess } from './oneshot-process-transport.js';
import type { ProcessTransportOptions } from './oneshot-process-transport.js';
import { parseEngineResponse } from './response.js';
import { TransportBase } from './transport-base.js';

interface PendingRequest {
  resolve(value: unknown): void;
  reject(error: Error): void;
}

/**
 * One engine process and the requests written to it
 */
class EngineSession {
  private readonly pending: PendingRequest[] = [];
  private readonly ready: Promise<void>;
  private markReady: () => void = () => undefined;
  private failStartup: (error: Error) => void = () => undefined;
  private started = false;
  private closeReason: Error | null = null;

  constructor(
    private readonly child: EngineProcess,
    private readonly stdin: Writable,
    private readonly kind: TransportKind
  ) {
    this.ready = new Promise<void>((resolve, reject) => {
      this.markReady = resolve;
      this.failStartup = reject;
    });
    // Callers see startup failures through request()
    this.ready.catch((error: Error) => LayoutLogger.debug(`Engine startup failed [${kind}]: ${error.message}`));

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout });
      lines.on('line', (line: string) => this.handleLine(line));
    }

    child.stderr?.on('data', (chunk: Buffer) => LayoutLogger.engineStderr(kind, chunk.toString('utf8')));
    stdin.on('error', (error: Error) => LayoutLogger.warn(`Engine stdin [${kind}]: ${error.message}`));

    child.on('error', (error: Error) => {
      this.shutdown(
        this.started
          ? new EngineFailureError(`Layout engine failed: ${error.message}`, kind)
          : new EngineUnavailableError(`Failed to start layout engine: ${error.message}`, kind, {
              cause: error,
            })
      );
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      LayoutLogger.engineExited(kind, code, signal);
      const reason = code !== null ? `code ${code}` : `signal ${signal ?? 'unknown'}`;
      this.shutdown(
        this.started
          ? new EngineFailureError(`Layout engine exited with ${reason}`, kind, { exitCode: code, signal })
          : new EngineUnavailableError(`Layout engine exited with ${reason} before it was ready`, kind)
      );
    });
  }

  get closed(): boolean {
    return this.closeReason !== null;
  }

  /**
   * Queue one serialized graph; settles with its answer line
   */
  request(payload: string, deadline: Deadline): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      const entry: PendingRequest = {
        resolve: (value) => {
          detach();
          resolve(value);
        },
        reject: (error) => {
          detach();
          reject(error);
        },
      };

      const detach = deadline.onAbort(() => {
        this.remove(entry);
        reject(deadline.toError(this.kind));
        this.terminate(
          new EngineFailureError('Layout engine was terminated after an abandoned request', this.kind)
        );
      });
      if (deadline.aborted) return;

      this.ready.then(
        () => {
          if (deadline.aborted) return;
          if (this.closeReason) {
            entry.reject(this.closeReason);
            return;
          }
          this.pending.push(entry);
          this.stdin.write(payload + '\n');
        },
        (error: Error) => entry.reject(error)
      );
    });
  }

  /**
   * Kill the process and fail everything still waiting on it
   */
  terminate(reason: Error): void {
    if (this.closed) return;
    this.shutdown(reason);
    this.child.kill();
  }

  private shutdown(reason: Error): void {
    if (this.closed) return;
    this.closeReason = reason;
    this.failStartup(reason);
    for (const entry of this.pending.splice(0)) {
      entry.reject(reason);
    }
  }

  private remove(entry: PendingRequest): void {
    const index = this.pending.indexOf(entry);
    if (index >= 0) {
      this.pending.splice(index, 1);
    }
  }

  private handleLine(line: string): void {
    if (!this.started) {
      if (line.trim() === READY_MARKER) {
        this.started = true;
        this.markReady();
      } else {
        this.terminate(
          new EngineUnavailableError(
            `Layout engine did not announce itself, got: ${line.substring(0, 200)}`,
            this.kind
          )
        );
      }
      return;
    }

    if (line.trim().length === 0) return;

    const entry = this.pending.shift();
    if (!entry) {
      LayoutLogger.warn(`Unsolicited engine output [${this.kind}]: ${line.substring(0, 200)}`);
      return;
    }

    let value: unknown;
    try {
      value = parseEngineResponse(line, this.kind);
    } catch (error) {
      entry.reject(error instanceof Error ? error : new Error(errorMessage(error)));
      return;
    }

    const engineError = engineErrorLineSchema.safeParse(value);
    if (engineError.success) {
      const { $error: message, kind } = engineError.data;
      entry.reject(
        kind === 'failure'
          ? new EngineFailureError(`Layout engine failed: ${message}`, this.kind)
          : new LayoutRejectedError(message)
      );
      return;
    }
    entry.resolve(value);
  }
}

export class PersistentProcessTransport extends TransportBase {
  readonly kind: TransportKind = 'persistent-process';
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly spawnEngine: SpawnEngine;
  private session: EngineSession | null = null;

  constructor(options: ProcessTransportOptions = {}) {
    super(options);
    this.command = options.command ?? ELK_ENGINE_COMMAND;
    this.args = options.args ?? [ELK_ENGINE_SCRIPT];
    this.spawnEngine = options.spawnEngine ?? spawnEngineProcess;
  }

  protected async exchange(payload: string, deadline: Deadline): Promise<unknown> {
    return this.acquire().request(payload, deadline);
  }

  protected async release(): Promise<void> {
    this.session?.terminate(new EngineUnavailableError('Layout transport is closed', this.kind));
    this.session = null;
  }

  private acquire(): EngineSession {
    if (this.session && !this.session.closed) {
      return this.session;
    }

    const args = [...this.args, '--lines', ...(this.outputMode === 'scene' ? ['--scene'] : [])];
    let child: EngineProcess;
    try {
      child = this.spawnEngine(this.command, args);
    } catch (error) {
      throw new EngineUnavailableError(
        `Failed to start layout engine '${this.command}': ${errorMessage(error)}`,
        this.kind,
        { cause: error }
      );
    }

    if (!child.stdin || !child.stdout) {
      child.kill();
      throw new EngineUnavailableError('Layout engine has no stdio pipes', this.kind);
    }

    LayoutLogger.engineStarted(this.kind, this.command, child.pid);
    this.session = new EngineSession(child, child.stdin, this.kind);
    return this.session;
  }
}
