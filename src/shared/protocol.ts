/**
 * Engine Wire Protocol
 *
 * Constants and envelopes shared by the layout transports and the engine host.
 *
 * Process engine:
 * - one-shot: JSON document on stdin, JSON answer on stdout, exit 65 on rejection
 * - line mode: READY_MARKER first, then one JSON answer line per request line;
 *   a failed request answers {"$error": "...", "kind": "rejected" | "failure"}
 *   (a line without kind is a rejection)
 *
 * WebSocket engine:
 * - request  {requestId, mode, graph}
 * - response {requestId, result} | {requestId, error: {kind, message}}
 */

import { z } from 'zod';
import type { RawData } from 'ws';

export const READY_MARKER = '--- ELK layouter started ---';

/** Exit code of a one-shot engine that refused its input (EX_DATAERR) */
export const EXIT_CODE_REJECTED = 65;
export const EXIT_CODE_FAILURE = 1;

export const ENGINE_OUTPUT_MODES = ['layout', 'scene'] as const;

/**
 * What the engine answers with: the positioned graph, or the finished scene
 */
export type EngineOutputMode = (typeof ENGINE_OUTPUT_MODES)[number];

/**
 * Why a request failed: the graph was refused, or the engine itself broke
 */
export const engineErrorKindSchema = z.enum(['rejected', 'failure']);

export type EngineErrorKind = z.infer<typeof engineErrorKindSchema>;

export const engineErrorLineSchema = z.object({
  $error: z.string(),
  kind: engineErrorKindSchema.optional(),
});

export type EngineErrorLine = z.infer<typeof engineErrorLineSchema>;

export const wsRequestSchema = z.object({
  requestId: z.string(),
  mode: z.enum(ENGINE_OUTPUT_MODES),
  graph: z.unknown(),
});

export const wsErrorSchema = z.object({
  kind: engineErrorKindSchema,
  message: z.string(),
});

export const wsResponseSchema = z.object({
  requestId: z.string().nullable(),
  result: z.unknown(),
  error: wsErrorSchema.optional(),
});

export type WsResponse = z.infer<typeof wsResponseSchema>;

/**
 * Message payload of a ws frame as text
 */
export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}
