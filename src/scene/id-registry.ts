/**
 * Id Registry
 *
 * Ids already assigned to one element kind during one transformation pass.
 * A registry never outlives the pass that created it.
 */

import { DuplicateIdError, IdSpaceExhaustedError, MissingIdError } from '../shared/errors.js';
import type { ElementKind } from '../shared/errors.js';
import { generateUniqueId, generatedIdPattern, DEFAULT_ID_WIDTH } from '../shared/utils/random-id.js';
import type { RandomSource } from '../shared/utils/random-id.js';

export class IdRegistry {
  private readonly ids = new Set<string>();

  constructor(public readonly kind: ElementKind) {}

  /**
   * Register a required id
   *
   * @throws MissingIdError if the id is absent
   * @throws DuplicateIdError if the id is already registered
   */
  register(id: string | undefined, location: string): string {
    if (id === undefined) {
      throw new MissingIdError(this.kind, location);
    }
    return this.add(id, location);
  }

  /**
   * Register an optional id, generating a fresh one when absent
   *
   * @throws DuplicateIdError if a given id is already registered
   * @throws IdSpaceExhaustedError if no generated id of `width` digits is free
   */
  registerOrGenerate(
    id: string | undefined,
    location: string,
    width: number = DEFAULT_ID_WIDTH,
    random?: RandomSource
  ): string {
    if (id !== undefined) {
      return this.add(id, location);
    }
    const free = this.generatedCount(width) < 10 ** width;
    const generated = free ? generateUniqueId(this.ids, width, random) : null;
    if (generated === null) {
      throw new IdSpaceExhaustedError(this.kind, width, location);
    }
    return this.add(generated, location);
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  private generatedCount(width: number): number {
    const pattern = generatedIdPattern(width);
    let count = 0;
    for (const id of this.ids) {
      if (pattern.test(id)) count++;
    }
    return count;
  }

  private add(id: string, location: string): string {
    if (this.ids.has(id)) {
      throw new DuplicateIdError(this.kind, id, location);
    }
    this.ids.add(id);
    return id;
  }
}
