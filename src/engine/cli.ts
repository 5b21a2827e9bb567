#!/usr/bin/env node
/**
 * elk-layouter - Engine Process Entry Point
 *
 * Usage:
 *   elk-layouter [--once] [--scene]             one graph on stdin, one answer on stdout
 *   elk-layouter --lines [--scene]              line mode for the persistent transport
 *   elk-layouter --serve [--port N]             HTTP + WebSocket service
 *
 * Exit codes: 0 success, 65 graph refused, 1 any other failure
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { ELK_SERVER_PORT } from '../shared/config.js';
import { LayoutConfigError, errorMessage, isGraphRefusal, refusalReason } from '../shared/errors.js';
import { LayoutLogger } from '../shared/logger.js';
import { EXIT_CODE_FAILURE, EXIT_CODE_REJECTED } from '../shared/protocol.js';
import type { EngineOutputMode } from '../shared/protocol.js';
import { ElkEngine } from './elk-engine.js';
import { LayoutServer } from './layout-server.js';
import { serveLines } from './line-protocol.js';

export type EngineRunMode = 'once' | 'lines' | 'serve';

export interface EngineArgs {
  runMode: EngineRunMode;
  output: EngineOutputMode;
  port: number;
}

/**
 * Parse engine arguments (without node and script path)
 *
 * @throws LayoutConfigError on unknown flags, conflicting modes or a bad port
 */
export function parseEngineArgs(argv: readonly string[]): EngineArgs {
  const runModes: EngineRunMode[] = [];
  let output: EngineOutputMode = 'layout';
  let port = ELK_SERVER_PORT;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--once':
        runModes.push('once');
        break;
      case '--lines':
        runModes.push('lines');
        break;
      case '--serve':
        runModes.push('serve');
        break;
      case '--scene':
        output = 'scene';
        break;
      case '--port': {
        const value = argv[++i];
        port = Number(value);
        if (value === undefined || !Number.isInteger(port) || port < 0 || port > 65535) {
          throw new LayoutConfigError(`--port expects a number between 0 and 65535, got '${value ?? ''}'`);
        }
        break;
      }
      default:
        throw new LayoutConfigError(`Unknown argument '${arg}'`);
    }
  }

  if (runModes.length > 1) {
    throw new LayoutConfigError(`Choose one of --once, --lines, --serve (got ${runModes.join(', ')})`);
  }

  return { runMode: runModes[0] ?? 'once', output, port };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * One-shot mode: the answer goes to stdout, the reason for a failure to stderr
 */
async function runOnce(engine: ElkEngine, output: EngineOutputMode): Promise<number> {
  let document: unknown;
  try {
    document = JSON.parse(await readStdin());
  } catch (error) {
    process.stderr.write(`invalid JSON: ${errorMessage(error)}\n`);
    return EXIT_CODE_REJECTED;
  }

  try {
    const result = await engine.run(document, output);
    process.stdout.write(JSON.stringify(result) + '\n');
    return 0;
  } catch (error) {
    if (isGraphRefusal(error)) {
      process.stderr.write(refusalReason(error) + '\n');
      return EXIT_CODE_REJECTED;
    }
    process.stderr.write(errorMessage(error) + '\n');
    return EXIT_CODE_FAILURE;
  }
}

async function serve(engine: ElkEngine, port: number): Promise<void> {
  const server = new LayoutServer(engine);
  const boundPort = await server.listen(port);
  console.log(`✅ Layout server listening on port ${boundPort}`);

  const shutdown = (): void => {
    console.log('🛑 Shutting down layout server...');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        LayoutLogger.error('Layout server did not close cleanly', error instanceof Error ? error : undefined);
        process.exit(EXIT_CODE_FAILURE);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

async function main(): Promise<void> {
  let args: EngineArgs;
  try {
    args = parseEngineArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(errorMessage(error) + '\n');
    process.exitCode = EXIT_CODE_FAILURE;
    return;
  }

  const engine = new ElkEngine();

  switch (args.runMode) {
    case 'once':
      process.exitCode = await runOnce(engine, args.output);
      return;
    case 'lines':
      await serveLines(process.stdin, process.stdout, (document) => engine.run(document, args.output));
      return;
    case 'serve':
      await serve(engine, args.port);
      return;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  // npm links bin scripts, so compare resolved paths
  return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
}

// Run if called directly
if (isEntryPoint()) {
  main().catch((error: unknown) => {
    LayoutLogger.error('Engine crashed', error instanceof Error ? error : undefined);
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exit(EXIT_CODE_FAILURE);
  });
}
