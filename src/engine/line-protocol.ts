/**
 * Line Protocol
 *
 * Engine side of the persistent process transport: announce readiness,
 * then answer every non-blank input line with exactly one output line,
 * strictly in input order.
 */

import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { errorMessage, isGraphRefusal, refusalReason } from '../shared/errors.js';
import { LayoutLogger } from '../shared/logger.js';
import { READY_MARKER } from '../shared/protocol.js';
import type { EngineErrorKind, EngineErrorLine } from '../shared/protocol.js';

export type DocumentHandler = (document: unknown) => Promise<unknown>;

/**
 * Serve until `input` ends
 */
export async function serveLines(input: Readable, output: Writable, handler: DocumentHandler): Promise<void> {
  output.write(READY_MARKER + '\n');

  const lines = createInterface({ input, crlfDelay: Infinity });
  for await (const line of lines) {
    if (line.trim().length === 0) continue;
    output.write((await answerLine(line, handler)) + '\n');
  }
}

/**
 * One answer line for one request line; never throws
 */
export async function answerLine(line: string, handler: DocumentHandler): Promise<string> {
  let document: unknown;
  try {
    document = JSON.parse(line);
  } catch (error) {
    return errorLine('rejected', `invalid JSON: ${errorMessage(error)}`);
  }

  try {
    return JSON.stringify(await handler(document));
  } catch (error) {
    if (isGraphRefusal(error)) {
      return errorLine('rejected', refusalReason(error));
    }
    LayoutLogger.error('Line request failed', error instanceof Error ? error : undefined);
    return errorLine('failure', errorMessage(error));
  }
}

function errorLine(kind: EngineErrorKind, message: string): string {
  const line: EngineErrorLine = { $error: message, kind };
  return JSON.stringify(line);
}
