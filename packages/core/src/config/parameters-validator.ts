import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { GenerationParameters } from '../types/parameters.js';

export const GENERATION_PARAMETERS_SCHEMA = {
  $id: 'objectforge:generation-parameters',
  type: 'object',
  additionalProperties: false,
  required: [
    'objectPoolSize',
    'randomizationDepth',
    'avoidInfiniteRecursion',
    'avoidNullsOnDeepestRecursionLevel',
    'collectionSizeRange',
    'seed',
    'trace',
  ],
  properties: {
    objectPoolSize: { type: 'integer', minimum: 1 },
    randomizationDepth: { type: 'integer', minimum: 0 },
    avoidInfiniteRecursion: { type: 'boolean' },
    avoidNullsOnDeepestRecursionLevel: { type: 'boolean' },
    collectionSizeRange: {
      type: 'object',
      additionalProperties: false,
      required: ['min', 'max'],
      properties: {
        min: { type: 'integer', minimum: 0 },
        max: { type: 'integer', minimum: 0 },
      },
    },
    seed: { type: 'integer', minimum: 0, maximum: 0xffffffff },
    trace: { type: 'boolean' },
  },
} as const;

let compiled: ValidateFunction<GenerationParameters> | undefined;

function getValidator(): ValidateFunction<GenerationParameters> {
  if (!compiled) {
    const ajv = new Ajv({ allErrors: false, strict: true });
    compiled = ajv.compile<GenerationParameters>(GENERATION_PARAMETERS_SCHEMA);
  }
  return compiled;
}

/**
 * Validate a fully merged parameter object.
 * Schema checks run first (types, bounds, unknown keys), then cross-field
 * checks the schema cannot express.
 */
export function validateParameters(
  candidate: unknown
): Result<GenerationParameters, ConfigError> {
  const validate = getValidator();
  if (!validate(candidate)) {
    const [first] = validate.errors ?? [];
    return err(toConfigError(first));
  }

  const { min, max } = candidate.collectionSizeRange;
  if (min > max) {
    return err(
      new ConfigError(
        `Invalid generation parameter collectionSizeRange: min (${min}) must be <= max (${max})`,
        'collectionSizeRange',
        {
          errorCode: ErrorCode.INVALID_SIZE_RANGE,
          context: { value: { min, max } },
        }
      )
    );
  }

  return ok(candidate);
}

function toConfigError(error: ErrorObject | undefined): ConfigError {
  if (!error) {
    return new ConfigError('Invalid generation parameters');
  }
  const setting = settingOf(error);
  return new ConfigError(
    `Invalid generation parameter ${setting}: ${error.message ?? 'is invalid'}`,
    setting,
    { context: { keyword: error.keyword, params: error.params } }
  );
}

function settingOf(error: ErrorObject): string {
  const fromPath = error.instancePath.slice(1).replace(/\//g, '.');
  const extra: unknown = error.params['additionalProperty'];
  if (error.keyword === 'additionalProperties' && typeof extra === 'string') {
    return fromPath ? `${fromPath}.${extra}` : extra;
  }
  return fromPath || '(root)';
}
