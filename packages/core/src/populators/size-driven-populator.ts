import { IntegerRangeRandomizer } from '../random/integer-range-randomizer.js';
import type { GenerationParameters } from '../types/parameters.js';

/**
 * Base for populators that need a size (collections, arrays, maps).
 * Sizes are drawn from parameters.collectionSizeRange with parameters.seed,
 * so two populators built from the same parameters draw the same sequence.
 */
export abstract class SizeDrivenPopulator {
  protected readonly sizeRandomizer: IntegerRangeRandomizer;

  constructor(parameters: GenerationParameters) {
    const { min, max } = parameters.collectionSizeRange;
    this.sizeRandomizer = new IntegerRangeRandomizer(min, max, parameters.seed);
  }

  protected getRandomSize(): number {
    return this.sizeRandomizer.getRandomValue();
  }
}
