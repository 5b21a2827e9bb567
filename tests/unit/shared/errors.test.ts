/**
 * Unit tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  AmbiguousEdgeError,
  EngineFailureError,
  EngineTimeoutError,
  LayoutRejectedError,
  LayoutTransportError,
  MissingIdError,
  SceneStructureError,
  errorMessage,
  isGraphRefusal,
  refusalReason,
} from '../../../src/shared/errors.js';

describe('errors', () => {
  it('groups structural errors under SceneStructureError', () => {
    const error = new AmbiguousEdgeError('e', 'source without target');

    expect(error).toBeInstanceOf(SceneStructureError);
    expect(error.name).toBe('AmbiguousEdgeError');
    expect(error.elementKind).toBe('edge');
  });

  it('groups transport errors under LayoutTransportError', () => {
    const timeout = new EngineTimeoutError(250, 'http');
    const failure = new EngineFailureError('Layout engine exited with code 3', 'oneshot-process', { exitCode: 3 });

    expect(timeout).toBeInstanceOf(LayoutTransportError);
    expect(timeout.transport).toBe('http');
    expect(failure).toBeInstanceOf(LayoutTransportError);
    expect(failure.exitCode).toBe(3);
    expect(failure.status).toBeUndefined();
  });

  it('keeps refusals apart from transport errors', () => {
    expect(new LayoutRejectedError('bad')).not.toBeInstanceOf(LayoutTransportError);
  });

  it('recognizes refusals of the graph itself', () => {
    expect(isGraphRefusal(new LayoutRejectedError('bad'))).toBe(true);
    expect(isGraphRefusal(new MissingIdError('port', 'root/children[0]/ports[0]'))).toBe(true);
    expect(isGraphRefusal(new EngineTimeoutError(10, 'websocket'))).toBe(false);
    expect(isGraphRefusal('bad')).toBe(false);
  });

  it('reports refusal reasons without the prefix', () => {
    expect(refusalReason(new LayoutRejectedError('unknown layout algorithm'))).toBe('unknown layout algorithm');
    expect(refusalReason(new MissingIdError('node', 'root/children[2]'))).toBe('Missing id on node at root/children[2]');
  });

  it('renders any thrown value as a message', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
