import type { GenerationParameters } from '../types/parameters.js';

/**
 * Identity of a generated type. Pools and used-registries are keyed by
 * identity (Map semantics), never structurally.
 */
export type TypeKey =
  | string
  | symbol
  | (abstract new (...args: never[]) => unknown);

/**
 * Minimal descriptor of the field being populated.
 */
export interface FieldRef {
  readonly name: string;
  readonly declaringType?: TypeKey;
}

/**
 * Read-only view of a randomization context handed to custom randomizers.
 */
export interface RandomizerContext<TRoot = unknown> {
  readonly targetType: TypeKey;
  readonly parameters: GenerationParameters;
  /** Object being populated: top frame's object, or the root when the stack is empty */
  getCurrentObject(): unknown;
  /** Dotted names of the stacked fields, oldest first, case preserved */
  getCurrentField(): string;
  getCurrentRandomizationDepth(): number;
  getRootObject(): TRoot | undefined;
}

export function typeName(type: TypeKey): string {
  if (typeof type === 'string') return type;
  if (typeof type === 'symbol') return type.description ?? type.toString();
  return type.name || '<anonymous>';
}
