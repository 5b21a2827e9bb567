/**
 * Request serialization and response decoding shared by the transports
 */

import { z } from 'zod';
import type { TransportKind } from '../../shared/config.js';
import { LayoutRejectedError, MalformedResponseError, errorMessage } from '../../shared/errors.js';
import type { AbstractGraph } from '../../shared/types/elk-graph.js';

/**
 * Serialize the graph for the wire
 *
 * @throws LayoutRejectedError if the graph is not JSON-serializable (cycles, BigInt)
 */
export function serializeGraph(graph: AbstractGraph): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(graph);
  } catch (error) {
    throw new LayoutRejectedError(`graph is not serializable: ${errorMessage(error)}`, { cause: error });
  }
  if (text === undefined) {
    throw new LayoutRejectedError('graph is not serializable');
  }
  return text;
}

/**
 * Decode an engine answer
 *
 * @throws MalformedResponseError if the text is not JSON
 */
export function parseEngineResponse(text: string, transport: TransportKind): unknown {
  if (text.trim().length === 0) {
    throw new MalformedResponseError('empty response', transport);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(`not valid JSON (${errorMessage(error)})`, transport, { cause: error });
  }
}

const errorBodySchema = z.object({ error: z.string() });

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reason carried by an engine error body: `{"error": "..."}`, or the raw text
 */
export function describeErrorBody(text: string, fallback: string): string {
  const parsed = errorBodySchema.safeParse(tryParseJson(text));
  if (parsed.success) return parsed.data.error;

  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed.substring(0, 500) : fallback;
}

/**
 * First non-blank line of engine stderr
 */
export function firstLine(text: string): string | undefined {
  return text
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);
}
