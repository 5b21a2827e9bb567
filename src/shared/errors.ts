/**
 * Layout Bridge Error Types
 *
 * Structural errors abort a scene transformation. Transport errors mean the
 * engine could not be reached or answered badly. A rejected layout means the
 * engine was reached and refused the graph.
 */

import type { TransportKind } from './config.js';

/**
 * Element kinds that own an id registry during a transformation pass
 */
export type ElementKind = 'node' | 'port' | 'edge' | 'label' | 'section';

/**
 * Base class for malformed layout output detected during transformation
 */
export class SceneStructureError extends Error {
  constructor(
    message: string,
    public readonly elementKind: ElementKind
  ) {
    super(message);
    this.name = 'SceneStructureError';
  }
}

/**
 * Thrown when a node, port or edge has no id
 */
export class MissingIdError extends SceneStructureError {
  constructor(
    elementKind: ElementKind,
    public readonly location: string
  ) {
    super(`Missing id on ${elementKind} at ${location}`, elementKind);
    this.name = 'MissingIdError';
  }
}

/**
 * Thrown when an id is registered twice in the same registry
 */
export class DuplicateIdError extends SceneStructureError {
  constructor(
    elementKind: ElementKind,
    public readonly elementId: string,
    public readonly location: string
  ) {
    super(`Duplicate ${elementKind} id '${elementId}' at ${location}`, elementKind);
    this.name = 'DuplicateIdError';
  }
}

/**
 * Thrown when no free generated id of the configured width is left
 */
export class IdSpaceExhaustedError extends SceneStructureError {
  constructor(
    elementKind: ElementKind,
    public readonly width: number,
    public readonly location: string
  ) {
    super(`No free ${width}-digit generated id left for ${elementKind} at ${location}`, elementKind);
    this.name = 'IdSpaceExhaustedError';
  }
}

/**
 * Thrown when an edge is neither a clean primitive nor a clean extended edge
 */
export class AmbiguousEdgeError extends SceneStructureError {
  constructor(
    public readonly edgeId: string,
    public readonly reason: string
  ) {
    super(`Edge '${edgeId}' cannot be classified: ${reason}`, 'edge');
    this.name = 'AmbiguousEdgeError';
  }
}

/**
 * Thrown when the engine refuses the graph, or the graph is not serializable
 */
export class LayoutRejectedError extends Error {
  constructor(
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Layout rejected: ${reason}`, options);
    this.name = 'LayoutRejectedError';
  }
}

/**
 * Base class for failures to exchange data with the layout engine
 */
export class LayoutTransportError extends Error {
  constructor(
    message: string,
    public readonly transport: TransportKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LayoutTransportError';
  }
}

/**
 * Thrown when the engine process cannot be started or the service cannot be reached
 */
export class EngineUnavailableError extends LayoutTransportError {
  constructor(message: string, transport: TransportKind, options?: { cause?: unknown }) {
    super(message, transport, options);
    this.name = 'EngineUnavailableError';
  }
}

export interface EngineFailureDetails {
  exitCode?: number | null;
  signal?: string | null;
  status?: number;
  stderr?: string;
}

/**
 * Thrown when the engine dies, exits non-zero or answers with a server error
 */
export class EngineFailureError extends LayoutTransportError {
  public readonly exitCode?: number | null;
  public readonly signal?: string | null;
  public readonly status?: number;
  public readonly stderr?: string;

  constructor(message: string, transport: TransportKind, details: EngineFailureDetails = {}) {
    super(message, transport);
    this.name = 'EngineFailureError';
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.status = details.status;
    this.stderr = details.stderr;
  }
}

/**
 * Thrown when a layout call exceeds its deadline
 */
export class EngineTimeoutError extends LayoutTransportError {
  constructor(
    public readonly timeoutMs: number,
    transport: TransportKind
  ) {
    super(`Layout engine did not answer within ${timeoutMs}ms`, transport);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Thrown when the caller aborts a layout call
 */
export class LayoutCancelledError extends LayoutTransportError {
  constructor(transport: TransportKind) {
    super('Layout call was cancelled', transport);
    this.name = 'LayoutCancelledError';
  }
}

/**
 * Thrown when the engine's answer is not JSON or not the expected shape
 */
export class MalformedResponseError extends LayoutTransportError {
  constructor(
    public readonly detail: string,
    transport: TransportKind,
    options?: { cause?: unknown }
  ) {
    super(`Malformed layout engine response: ${detail}`, transport, options);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Thrown when the client is asked for something its transport cannot provide
 */
export class LayoutConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutConfigError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for failures caused by the graph itself rather than by the engine
 */
export function isGraphRefusal(error: unknown): error is LayoutRejectedError | SceneStructureError {
  return error instanceof LayoutRejectedError || error instanceof SceneStructureError;
}

/**
 * Reason reported across the wire for a refused graph; the receiving
 * transport adds the "Layout rejected" prefix again
 */
export function refusalReason(error: LayoutRejectedError | SceneStructureError): string {
  return error instanceof LayoutRejectedError ? error.reason : error.message;
}
