import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import { XorShift32 } from './rng.js';

/**
 * Seeded integer draws in [min, max). A degenerate range (min === max)
 * always yields min.
 */
export class IntegerRangeRandomizer {
  private readonly rng: XorShift32;

  constructor(
    public readonly min: number,
    public readonly max: number,
    seed: number
  ) {
    if (!Number.isInteger(min) || !Number.isInteger(max)) {
      throw new ConfigError(
        `Size range bounds must be integers, got [${min}, ${max})`,
        'collectionSizeRange',
        {
          errorCode: ErrorCode.INVALID_SIZE_RANGE,
          context: { value: { min, max } },
        }
      );
    }
    if (min > max) {
      throw new ConfigError(
        `Size range min (${min}) must be <= max (${max})`,
        'collectionSizeRange',
        {
          errorCode: ErrorCode.INVALID_SIZE_RANGE,
          context: { value: { min, max } },
        }
      );
    }
    this.rng = new XorShift32(seed);
  }

  getRandomValue(): number {
    return this.rng.nextInt(this.min, this.max);
  }
}
