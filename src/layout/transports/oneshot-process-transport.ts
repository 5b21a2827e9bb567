/**
 * One-Shot Process Transport
 *
 * Spawns the engine for every call: graph on stdin, answer on stdout,
 * result decided by the exit code once the process has closed.
 */

import { spawn } from 'child_process';
import type { TransportKind } from '../../shared/config.js';
import { ELK_ENGINE_COMMAND, ELK_ENGINE_SCRIPT } from '../../shared/config.js';
import {
  EngineFailureError,
  EngineUnavailableError,
  LayoutRejectedError,
  errorMessage,
} from '../../shared/errors.js';
import { LayoutLogger } from '../../shared/logger.js';
import { EXIT_CODE_REJECTED } from '../../shared/protocol.js';
import type { EngineProcess, SpawnEngine } from '../types.js';
import type { Deadline } from './deadline.js';
import { firstLine, parseEngineResponse } from './response.js';
import { TransportBase } from './transport-base.js';
import type { TransportBaseOptions } from './transport-base.js';

export interface ProcessTransportOptions extends TransportBaseOptions {
  /** Executable, the running Node binary by default */
  command?: string;
  /** Arguments placed before the mode flags, the engine script by default */
  args?: readonly string[];
  spawnEngine?: SpawnEngine;
}

export const spawnEngineProcess: SpawnEngine = (command, args) =>
  spawn(command, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

export class OneShotProcessTransport extends TransportBase {
  readonly kind: TransportKind = 'oneshot-process';
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly spawnEngine: SpawnEngine;
  private readonly running = new Set<EngineProcess>();

  constructor(options: ProcessTransportOptions = {}) {
    super(options);
    this.command = options.command ?? ELK_ENGINE_COMMAND;
    this.args = options.args ?? [ELK_ENGINE_SCRIPT];
    this.spawnEngine = options.spawnEngine ?? spawnEngineProcess;
  }

  protected async exchange(payload: string, deadline: Deadline): Promise<unknown> {
    const args = [...this.args, '--once', ...(this.outputMode === 'scene' ? ['--scene'] : [])];

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

    this.running.add(child);
    try {
      return await this.collect(child, payload, deadline);
    } finally {
      this.running.delete(child);
    }
  }

  protected async release(): Promise<void> {
    for (const child of this.running) {
      child.kill('SIGKILL');
    }
    this.running.clear();
  }

  private collect(child: EngineProcess, payload: string, deadline: Deadline): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      let detach: () => void = () => undefined;

      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        detach();
        outcome();
      };

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error: Error) => {
        settle(() =>
          reject(
            new EngineUnavailableError(
              `Failed to start layout engine '${this.command}': ${error.message}`,
              this.kind,
              { cause: error }
            )
          )
        );
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        LayoutLogger.engineExited(this.kind, code, signal);
        const errorText = Buffer.concat(stderr).toString('utf8');

        settle(() => {
          if (code === 0) {
            if (errorText.length > 0) {
              LayoutLogger.engineStderr(this.kind, errorText);
            }
            try {
              resolve(parseEngineResponse(Buffer.concat(stdout).toString('utf8'), this.kind));
            } catch (error) {
              reject(error);
            }
            return;
          }

          if (code === EXIT_CODE_REJECTED) {
            reject(new LayoutRejectedError(firstLine(errorText) ?? 'engine refused the graph'));
            return;
          }

          const reason = code !== null ? `code ${code}` : `signal ${signal ?? 'unknown'}`;
          const detail = firstLine(errorText);
          reject(
            new EngineFailureError(
              `Layout engine exited with ${reason}${detail ? `: ${detail}` : ''}`,
              this.kind,
              { exitCode: code, signal, stderr: errorText }
            )
          );
        });
      });

      detach = deadline.onAbort(() => {
        settle(() => reject(deadline.toError(this.kind)));
        child.kill('SIGKILL');
      });
      if (settled) return;

      LayoutLogger.engineStarted(this.kind, this.command, child.pid);

      const stdin = child.stdin;
      if (!stdin) {
        settle(() => reject(new EngineUnavailableError('Layout engine has no stdin', this.kind)));
        child.kill('SIGKILL');
        return;
      }
      // EPIPE when the engine exits early; the exit code reports the failure
      stdin.on('error', (error: Error) => LayoutLogger.warn(`Engine stdin [${this.kind}]: ${error.message}`));
      stdin.end(payload);
    });
  }
}
