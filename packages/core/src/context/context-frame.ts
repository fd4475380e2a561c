import type { FieldRef, TypeKey } from './types.js';

/**
 * One entry of the recursion stack: "populating `field` of `object`".
 * Remembers the latest instance used per type while this frame is on top.
 */
export class ContextFrame {
  private readonly usedInstances = new Map<TypeKey, unknown>();

  constructor(
    public readonly object: unknown,
    public readonly field: FieldRef
  ) {}

  /** Overwrites any earlier usage of the same type in this frame. */
  registerUsage(type: TypeKey, instance: unknown): void {
    this.usedInstances.set(type, instance);
  }

  hasUsedInstance(type: TypeKey): boolean {
    return this.usedInstances.has(type);
  }

  getUsedInstance(type: TypeKey): unknown {
    return this.usedInstances.get(type);
  }
}
