/**
 * Generation parameters shared by one randomization context and the
 * size-driven populators it serves.
 *
 * All inputs are optional; unset values fall back to DEFAULT_PARAMETERS.
 * Resolved parameters are frozen and shared by reference, never mutated.
 */

import { validateParameters } from '../config/parameters-validator.js';

/**
 * Closed-open integer range [min, max)
 */
export interface Range {
  readonly min: number;
  readonly max: number;
}

export interface GenerationParameters {
  /** Capacity of each type's instance pool (default: 10) */
  readonly objectPoolSize: number;
  /** Maximum recursion depth before truncation (default: unbounded) */
  readonly randomizationDepth: number;
  /** Prefer pooled instances not yet used along the current path (default: false) */
  readonly avoidInfiniteRecursion: boolean;
  /** Substitute empty values instead of null at the deepest level (default: false) */
  readonly avoidNullsOnDeepestRecursionLevel: boolean;
  /** Size range for collections and arrays (default: [1, 100)) */
  readonly collectionSizeRange: Range;
  /** Seed for reproducible size draws, a uint32 (default: 123) */
  readonly seed: number;
  /** Write one stderr line per context decision (default: false) */
  readonly trace: boolean;
}

export type GenerationParametersInput = Partial<
  Omit<GenerationParameters, 'collectionSizeRange'>
> & {
  collectionSizeRange?: Partial<Range>;
};

export const DEFAULT_PARAMETERS: GenerationParameters = Object.freeze({
  objectPoolSize: 10,
  randomizationDepth: Number.MAX_SAFE_INTEGER,
  avoidInfiniteRecursion: false,
  avoidNullsOnDeepestRecursionLevel: false,
  collectionSizeRange: Object.freeze({ min: 1, max: 100 }),
  seed: 123,
  trace: false,
});

/**
 * Merge user input onto defaults, validate and freeze.
 * @throws ConfigError when a setting is out of range or of the wrong type
 */
export function resolveParameters(
  input: GenerationParametersInput = {}
): GenerationParameters {
  const candidate = {
    ...DEFAULT_PARAMETERS,
    ...definedOnly(input),
    collectionSizeRange: {
      ...DEFAULT_PARAMETERS.collectionSizeRange,
      ...definedOnly(input.collectionSizeRange ?? {}),
    },
  };

  const result = validateParameters(candidate);
  if (result.isErr()) {
    throw result.error;
  }

  return Object.freeze({
    ...result.value,
    collectionSizeRange: Object.freeze({ ...result.value.collectionSizeRange }),
  });
}

// Keys explicitly set to undefined keep their default
function definedOnly(input: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
}
