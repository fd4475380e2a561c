// Random sources shared by the randomization context and size-driven populators

/**
 * Uniform integer draws. Implementations must return a value in
 * [minInclusive, maxExclusive) whenever maxExclusive > minInclusive.
 */
export interface RandomSource {
  nextInt(minInclusive: number, maxExclusive: number): number;
}

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(salt), remapped when zero
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 implements RandomSource {
  private x: number;

  constructor(seed: number, salt = '') {
    const initial = ((seed >>> 0) ^ fnv1a32(salt)) >>> 0;
    // zero is a fixed point of xorshift
    this.x = initial === 0 ? 0x9e3779b9 : initial;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }

  nextInt(minInclusive: number, maxExclusive: number): number {
    return scaleToRange(this.nextFloat01(), minInclusive, maxExclusive);
  }
}

export function createSeededSource(seed: number, salt?: string): XorShift32 {
  return new XorShift32(seed, salt);
}

/** Math.random-backed source; not reproducible across runs. */
export function createUnseededSource(): RandomSource {
  return {
    nextInt: (minInclusive, maxExclusive) =>
      scaleToRange(Math.random(), minInclusive, maxExclusive),
  };
}

function scaleToRange(
  unit: number,
  minInclusive: number,
  maxExclusive: number
): number {
  if (maxExclusive <= minInclusive) {
    return minInclusive;
  }
  return minInclusive + Math.floor(unit * (maxExclusive - minInclusive));
}
