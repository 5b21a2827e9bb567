/**
 * Unit tests for IdRegistry
 */

import { describe, it, expect, vi } from 'vitest';
import { IdRegistry } from '../../../src/scene/id-registry.js';
import { DuplicateIdError, IdSpaceExhaustedError, MissingIdError } from '../../../src/shared/errors.js';
import { sequenceRandom } from '../../setup.js';

describe('IdRegistry', () => {
  describe('register', () => {
    it('returns and remembers the id', () => {
      const registry = new IdRegistry('node');

      expect(registry.register('a', 'root/children[0]')).toBe('a');
      expect(registry.has('a')).toBe(true);
      expect(registry.size).toBe(1);
    });

    it('throws MissingIdError for an absent id', () => {
      const registry = new IdRegistry('port');

      expect(() => registry.register(undefined, 'root/children[0]/ports[2]')).toThrow(MissingIdError);
      expect(registry.size).toBe(0);
    });

    it('throws DuplicateIdError carrying kind, id and location', () => {
      const registry = new IdRegistry('edge');
      registry.register('e', 'root/edges[0]');

      let caught: unknown;
      try {
        registry.register('e', 'root/edges[1]');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DuplicateIdError);
      expect(caught).toMatchObject({
        name: 'DuplicateIdError',
        elementKind: 'edge',
        elementId: 'e',
        location: 'root/edges[1]',
        message: "Duplicate edge id 'e' at root/edges[1]",
      });
    });
  });

  describe('registerOrGenerate', () => {
    it('keeps a given id', () => {
      const registry = new IdRegistry('label');

      expect(registry.registerOrGenerate('title', 'root/labels[0]')).toBe('title');
    });

    it('generates an id when none is given', () => {
      const registry = new IdRegistry('label');

      expect(registry.registerOrGenerate(undefined, 'root/labels[0]', 6, () => 0.75)).toBe('g_750000');
      expect(registry.has('g_750000')).toBe(true);
    });

    it('skips generated ids that are already registered', () => {
      const registry = new IdRegistry('label');
      registry.register('g_750000', 'root/labels[0]');

      const id = registry.registerOrGenerate(undefined, 'root/labels[1]', 6, sequenceRandom(0.75, 0.5));

      expect(id).toBe('g_500000');
      expect(registry.size).toBe(2);
    });

    it('gives up when the random source keeps drawing taken ids', () => {
      const registry = new IdRegistry('label');
      registry.register('g_500000', 'root/labels[0]');

      expect(() => registry.registerOrGenerate(undefined, 'root/labels[1]', 6, () => 0.5)).toThrow(
        IdSpaceExhaustedError
      );
      expect(registry.size).toBe(1);
    });

    it('fails at once when every id of the width is registered', () => {
      const registry = new IdRegistry('label');
      for (let digit = 0; digit < 10; digit++) {
        registry.register(`g_${digit}`, `root/labels[${digit}]`);
      }
      const random = vi.fn(() => 0.5);

      expect(() => registry.registerOrGenerate(undefined, 'root/labels[10]', 1, random)).toThrow(
        'No free 1-digit generated id left for label at root/labels[10]'
      );
      expect(random).not.toHaveBeenCalled();
    });

    it('does not count given ids of another width against the id space', () => {
      const registry = new IdRegistry('label');
      for (let digit = 0; digit < 9; digit++) {
        registry.register(`g_${digit}`, `root/labels[${digit}]`);
      }
      registry.register('g_12', 'root/labels[9]');

      expect(registry.registerOrGenerate(undefined, 'root/labels[10]', 1, () => 0.95)).toBe('g_9');
    });

    it('still rejects a given id that is taken', () => {
      const registry = new IdRegistry('label');
      registry.register('title', 'root/labels[0]');

      expect(() => registry.registerOrGenerate('title', 'root/labels[1]')).toThrow(
        "Duplicate label id 'title' at root/labels[1]"
      );
    });
  });
});
