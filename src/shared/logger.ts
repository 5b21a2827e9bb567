/**
 * Layout Logger
 *
 * Centralized logging for layout calls, engine processes and the engine service.
 * Writes to LOG_PATH only: the engine's stdout is a protocol channel.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from './config.js';
import type { TransportKind } from './config.js';

/**
 * Log levels for layout operations
 */
export enum LayoutLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  WARN = 'WARN',
  ERROR = 'ERROR',
  TRANSPORT = 'TRANSPORT',
}

/**
 * Layout logger utility
 */
export class LayoutLogger {
  private static enabled = !SUPPRESS_TEST_LOGS;

  /**
   * Log a message with timestamp and category
   */
  private static log(level: LayoutLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [Layout:${level}] ${message}`;

    fs.appendFileSync(LOG_PATH, logMsg + '\n');
  }

  /**
   * Log engine process start
   */
  static engineStarted(transport: TransportKind, command: string, pid: number | undefined): void {
    this.log(LayoutLogLevel.TRANSPORT, `▶ ENGINE started [${transport}] pid=${pid ?? '?'} command="${command}"`);
  }

  /**
   * Log engine process exit
   */
  static engineExited(transport: TransportKind, code: number | null, signal: string | null): void {
    this.log(LayoutLogLevel.TRANSPORT, `■ ENGINE exited [${transport}] code=${code} signal=${signal}`);
  }

  /**
   * Log engine stderr output (first line only)
   */
  static engineStderr(transport: TransportKind, stderr: string): void {
    const firstLine = stderr.split('\n').find((line) => line.trim().length > 0);
    if (!firstLine) return;
    this.log(LayoutLogLevel.WARN, `ENGINE stderr [${transport}] ${firstLine.substring(0, 200)}`);
  }

  /**
   * Log a connection to a networked engine
   */
  static connected(transport: TransportKind, url: string): void {
    this.log(LayoutLogLevel.TRANSPORT, `🔌 CONNECTED [${transport}] ${url}`);
  }

  /**
   * Log a finished layout call
   */
  static layoutCompleted(transport: TransportKind, durationMs: number): void {
    this.log(LayoutLogLevel.INFO, `✅ LAYOUT [${transport}] ${durationMs}ms`);
  }

  /**
   * Log a failed layout call (the error is still raised to the caller)
   */
  static layoutFailed(transport: TransportKind, error: Error): void {
    this.log(LayoutLogLevel.ERROR, `❌ LAYOUT FAILED [${transport}] ${error.name}: ${error.message}`);
  }

  /**
   * Log a transformed scene
   */
  static sceneBuilt(rootId: string, elementCount: number): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(LayoutLogLevel.DEBUG, `🧩 SCENE root="${rootId}" elements=${elementCount}`);
  }

  /**
   * Log service start
   */
  static serverListening(port: number): void {
    this.log(LayoutLogLevel.INFO, `🌐 Layout server listening on port ${port}`);
  }

  /**
   * Log a request answered by the service
   */
  static serverRequest(method: string, path: string, status: number): void {
    this.log(LayoutLogLevel.INFO, `${method} ${path} -> ${status}`);
  }

  /**
   * Log warning
   */
  static warn(message: string): void {
    this.log(LayoutLogLevel.WARN, `⚠️ ${message}`);
  }

  /**
   * Log error
   */
  static error(message: string, error?: Error): void {
    this.log(LayoutLogLevel.ERROR, `⚠️ ${message}`);
    if (error) {
      this.log(LayoutLogLevel.ERROR, `   ${error.message}`);
    }
  }

  /**
   * Log debug message
   */
  static debug(message: string): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(LayoutLogLevel.DEBUG, message);
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}
