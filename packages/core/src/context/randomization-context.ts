/**
 * Randomization context: per-call recursion state for one top-level
 * "generate an object of type T" request.
 *
 * The population engine drives it:
 * - checks exceedsMaxDepth() before descending into a field
 * - wraps each field's population in pushFrame()/popFrame()
 * - registers freshly built instances and, once a type is fully
 *   randomized, reuses pooled ones via pickPooledInstance()
 *
 * Pool and used-registries are owned by the context and never shared
 * between contexts.
 */

import { ErrorCode } from '../errors/codes.js';
import { ContextStateError } from '../types/errors.js';
import {
  resolveParameters,
  type GenerationParameters,
  type GenerationParametersInput,
} from '../types/parameters.js';
import { createUnseededSource, type RandomSource } from '../random/rng.js';
import {
  ContextMetrics,
  type ContextMetricsOptions,
  type ContextMetricsSnapshot,
} from '../util/metrics.js';
import { createTracer, type TraceSink, type Tracer } from '../util/trace.js';
import { ContextFrame } from './context-frame.js';
import {
  typeName,
  type FieldRef,
  type RandomizerContext,
  type TypeKey,
} from './types.js';

export interface RandomizationContextOptions {
  /** Source for pool-index draws (default: unseeded) */
  random?: RandomSource;
  /** Destination of trace lines when parameters.trace is on (default: stderr) */
  traceSink?: TraceSink;
  metrics?: ContextMetricsOptions;
}

export class RandomizationContext<TRoot = unknown>
  implements RandomizerContext<TRoot>
{
  private readonly pool = new Map<TypeKey, unknown[]>();
  private readonly stack: ContextFrame[] = [];
  // Usage recorded while the stack is empty
  private readonly usedInstances = new Map<TypeKey, unknown>();
  private readonly random: RandomSource;
  private readonly tracer: Tracer;
  private readonly metrics: ContextMetrics;
  private rootObject: TRoot | undefined;

  constructor(
    public readonly targetType: TypeKey,
    public readonly parameters: GenerationParameters,
    options: RandomizationContextOptions = {}
  ) {
    this.random = options.random ?? createUnseededSource();
    this.tracer = createTracer(parameters.trace, options.traceSink);
    this.metrics = new ContextMetrics(options.metrics);
  }

  /**
   * True once the pool of `type` has reached objectPoolSize: no fresh
   * instances of it will be kept.
   */
  hasAlreadyFullyRandomized(type: TypeKey): boolean {
    const instances = this.pool.get(type);
    return (
      instances !== undefined &&
      instances.length === this.parameters.objectPoolSize
    );
  }

  /** Adds `instance` to the pool of `type`; dropped silently when full. */
  registerBuiltInstance(type: TypeKey, instance: unknown): void {
    let instances = this.pool.get(type);
    if (!instances) {
      instances = [];
      this.pool.set(type, instances);
    }

    const accepted = instances.length < this.parameters.objectPoolSize;
    if (accepted) {
      instances.push(instance);
    }
    this.metrics.recordRegistration(accepted);
    this.metrics.trackPoolSize(typeName(type), instances.length);
    this.tracer.write(
      () =>
        `pool(${typeName(type)}): ${accepted ? 'registered' : 'dropped'} ` +
        `(${instances.length}/${this.parameters.objectPoolSize})`
    );
  }

  /**
   * Pick a pooled instance of `type`.
   *
   * Starts from a uniformly random index. With avoidInfiniteRecursion on,
   * scans forward (wrapping, at most one lap) for an instance not used on
   * any stacked frame nor at root level; when there is none, the random
   * pick is returned as is.
   *
   * @throws ContextStateError when nothing of `type` was registered
   */
  pickPooledInstance(type: TypeKey): unknown {
    const instances = this.pool.get(type);
    if (!instances || instances.length === 0) {
      throw new ContextStateError(
        `No pooled instance of ${typeName(type)} to pick from`,
        {
          errorCode: ErrorCode.POOL_EMPTY,
          context: this.errorContext(type),
        }
      );
    }

    const size = instances.length;
    const randomIndex = size > 1 ? this.random.nextInt(0, size) : 0;
    const randomPick = instances[randomIndex];
    if (!this.parameters.avoidInfiniteRecursion) {
      this.metrics.recordPick(false);
      this.tracer.write(
        () => `pick(${typeName(type)}): #${randomIndex} of ${size}`
      );
      return randomPick;
    }

    const used = this.collectUsedInstances(type);
    if (used.size < size) {
      for (let step = 0; step < size; step++) {
        const index = (randomIndex + step) % size;
        const candidate = instances[index];
        if (!used.has(candidate)) {
          this.metrics.recordPick(false);
          this.tracer.write(
            () =>
              `pick(${typeName(type)}): #${index} of ${size}, ${used.size} used`
          );
          return candidate;
        }
      }
    }

    this.metrics.recordPick(true);
    this.tracer.write(
      () =>
        `pick(${typeName(type)}): #${randomIndex} of ${size}, all used, reusing`
    );
    return randomPick;
  }

  pushFrame(object: unknown, field: FieldRef): void {
    this.stack.push(new ContextFrame(object, field));
    this.metrics.recordPush(this.stack.length);
    this.tracer.write(
      () => `push ${this.getCurrentField()} (depth ${this.stack.length})`
    );
  }

  /** @throws ContextStateError when no frame is left to pop */
  popFrame(): ContextFrame {
    const frame = this.stack.pop();
    if (!frame) {
      throw new ContextStateError(
        'popFrame() called on an empty recursion stack',
        { context: { depth: 0 } }
      );
    }
    this.tracer.write(
      () => `pop ${frame.field.name} (depth ${this.stack.length})`
    );
    return frame;
  }

  /** Lower-cased dotted path of the stacked fields followed by `field`. */
  fieldPath(field: FieldRef): string {
    return [...this.stackedFieldNames(), field.name]
      .map((name) => name.toLowerCase())
      .join('.');
  }

  exceedsMaxDepth(): boolean {
    const exceeded = this.stack.length > this.parameters.randomizationDepth;
    if (exceeded) {
      this.metrics.recordTruncation();
    }
    return exceeded;
  }

  isAtDeepestLevelAndShouldUseEmpty(): boolean {
    return (
      this.parameters.avoidNullsOnDeepestRecursionLevel &&
      this.stack.length === this.parameters.randomizationDepth
    );
  }

  /**
   * Remember `instance` as used for `type` on the top frame, or at root
   * level when the stack is empty. Ancestor frames are left untouched.
   * Absent values (null, undefined) are not instances and are ignored.
   */
  registerUsage(type: TypeKey, instance: unknown): void {
    if (
      !this.parameters.avoidInfiniteRecursion ||
      instance === undefined ||
      instance === null
    ) {
      return;
    }
    const top = this.stack.at(-1);
    if (top) {
      top.registerUsage(type, instance);
    } else {
      this.usedInstances.set(type, instance);
    }
  }

  setRootIfUnset(instance: TRoot): void {
    if (this.rootObject === undefined || this.rootObject === null) {
      this.rootObject = instance;
    }
  }

  /**
   * End of the top-level call: returns the root object.
   * @throws ContextStateError when frames are still on the stack
   */
  complete(): TRoot | undefined {
    if (this.stack.length > 0) {
      throw new ContextStateError(
        `Generation of ${typeName(this.targetType)} ended with ${this.stack.length} unpopped frame(s)`,
        { context: this.errorContext(this.targetType) }
      );
    }
    return this.rootObject;
  }

  getCurrentObject(): unknown {
    const top = this.stack.at(-1);
    return top ? top.object : this.rootObject;
  }

  getCurrentField(): string {
    return this.stackedFieldNames().join('.');
  }

  getCurrentRandomizationDepth(): number {
    return this.stack.length;
  }

  getRootObject(): TRoot | undefined {
    return this.rootObject;
  }

  getPooledInstances(type: TypeKey): readonly unknown[] {
    return [...(this.pool.get(type) ?? [])];
  }

  getMetrics(): Readonly<ContextMetricsSnapshot> {
    return this.metrics.snapshotMetrics();
  }

  // Union over every stacked frame plus the root-level registry
  private collectUsedInstances(type: TypeKey): Set<unknown> {
    const used = new Set<unknown>();
    for (const frame of this.stack) {
      if (frame.hasUsedInstance(type)) {
        used.add(frame.getUsedInstance(type));
      }
    }
    if (this.usedInstances.has(type)) {
      used.add(this.usedInstances.get(type));
    }
    return used;
  }

  private stackedFieldNames(): string[] {
    return this.stack.map((frame) => frame.field.name);
  }

  private errorContext(type: TypeKey): {
    type: string;
    depth: number;
    fieldPath: string;
  } {
    return {
      type: typeName(type),
      depth: this.stack.length,
      fieldPath: this.getCurrentField(),
    };
  }
}

export function createRandomizationContext<TRoot = unknown>(
  targetType: TypeKey,
  parameters: GenerationParametersInput = {},
  options: RandomizationContextOptions = {}
): RandomizationContext<TRoot> {
  return new RandomizationContext<TRoot>(
    targetType,
    resolveParameters(parameters),
    options
  );
}
