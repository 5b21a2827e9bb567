/**
 * Generated Element IDs
 *
 * Labels may reach the scene without an id. They get a generated one.
 *
 * Format: g_{zero-padded random integer}
 * Example: g_004217
 *
 * Downstream consumers pattern-match this format; keep prefix and width stable.
 */

export const GENERATED_ID_PREFIX = 'g_';
export const DEFAULT_ID_WIDTH = 6;
export const MIN_ID_WIDTH = 1;
/** Widest id whose integers Number still represents exactly */
export const MAX_ID_WIDTH = 15;

/** Draws per generated id before the id space counts as full */
export const MAX_ID_ATTEMPTS = 1000;

/**
 * Uniform source in [0, 1), Math.random by default
 */
export type RandomSource = () => number;

/**
 * Generate one candidate id: a uniform integer in [0, 10^width), zero-padded
 *
 * @param width - Number of digits
 * @param random - Random source
 */
export function generateRandomId(
  width: number = DEFAULT_ID_WIDTH,
  random: RandomSource = Math.random
): string {
  const upperBound = 10 ** width;
  const value = Math.min(Math.floor(random() * upperBound), upperBound - 1);
  return GENERATED_ID_PREFIX + String(value).padStart(width, '0');
}

export function isValidIdWidth(width: number): boolean {
  return Number.isInteger(width) && width >= MIN_ID_WIDTH && width <= MAX_ID_WIDTH;
}

/**
 * Draw ids until one is not taken
 *
 * @param taken - Ids already in use
 * @returns Id absent from `taken` at the time of the call, or null after `maxAttempts` taken draws
 */
export function generateUniqueId(
  taken: { has(id: string): boolean },
  width: number = DEFAULT_ID_WIDTH,
  random: RandomSource = Math.random,
  maxAttempts: number = MAX_ID_ATTEMPTS
): string | null {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const id = generateRandomId(width, random);
    if (!taken.has(id)) {
      return id;
    }
  }
  return null;
}

/**
 * Pattern matched by every generated id of the given width
 */
export function generatedIdPattern(width: number = DEFAULT_ID_WIDTH): RegExp {
  return new RegExp(`^${GENERATED_ID_PREFIX}\\d{${width}}$`);
}
