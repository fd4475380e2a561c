// @objectforge/core entry point
//
// Public API:
// - RandomizationContext / createRandomizationContext: per-call recursion
//   state consumed by a population engine (pooling, reuse, depth limits).
// - RandomizerContext: read-only view for custom randomizers.
// - GenerationParameters with defaults and validation.
// - SizeDrivenPopulator / IntegerRangeRandomizer for seeded size draws.

export * from './types/index.js';

// Context
export {
  RandomizationContext,
  createRandomizationContext,
  type RandomizationContextOptions,
} from './context/randomization-context.js';
export { ContextFrame } from './context/context-frame.js';
export {
  typeName,
  type TypeKey,
  type FieldRef,
  type RandomizerContext,
} from './context/types.js';

// Configuration
export {
  validateParameters,
  GENERATION_PARAMETERS_SCHEMA,
} from './config/parameters-validator.js';

// Randomness and sizing
export {
  XorShift32,
  fnv1a32,
  createSeededSource,
  createUnseededSource,
  type RandomSource,
} from './random/rng.js';
export { IntegerRangeRandomizer } from './random/integer-range-randomizer.js';
export { SizeDrivenPopulator } from './populators/size-driven-populator.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getExitCode,
} from './errors/codes.js';

// Diagnostics
export {
  ContextMetrics,
  type ContextMetricsSnapshot,
  type ContextMetricsOptions,
  type MetricsVerbosity,
} from './util/metrics.js';
export {
  createTracer,
  stderrSink,
  TRACE_PREFIX,
  type Tracer,
  type TraceSink,
} from './util/trace.js';
