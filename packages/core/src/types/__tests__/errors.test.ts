import { describe, expect, it } from 'vitest';

import { ErrorCode, getExitCode } from '../../errors/codes.js';
import { ConfigError, ContextStateError, isForgeError } from '../errors.js';

describe('ForgeError hierarchy', () => {
  it('gives ConfigError the configuration code and its setting', () => {
    const error = new ConfigError('bad pool size', 'objectPoolSize');

    expect(error.name).toBe('ConfigError');
    expect(error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
    expect(error.severity).toBe('error');
    expect(error.setting).toBe('objectPoolSize');
    expect(error.getExitCode()).toBe(50);
    expect(isForgeError(error)).toBe(true);
    expect(error).toBeInstanceOf(Error);
  });

  it('gives ContextStateError the context code by default', () => {
    const error = new ContextStateError('unbalanced', {
      context: { depth: 0 },
    });

    expect(error.errorCode).toBe(ErrorCode.CONTEXT_STATE_VIOLATION);
    expect(error.getExitCode()).toBe(70);
    expect(getExitCode(ErrorCode.POOL_EMPTY)).toBe(71);
    expect(error.toUserError()).toEqual({
      message: 'unbalanced',
      code: 'E400',
      severity: 'error',
      fieldPath: undefined,
    });
  });

  it('serializes the cause and keeps the stack in dev mode', () => {
    const cause = new Error('root cause');
    const error = new ConfigError('wrapped', 'seed', { cause });
    const json = error.toJSON();

    expect(json.cause).toEqual({ name: 'Error', message: 'root cause' });
    expect(json.stack).toContain('ConfigError');
    expect(json.context).toEqual({ setting: 'seed' });
  });

  it('drops the stack and offending value in prod mode', () => {
    const error = new ContextStateError('no pool', {
      errorCode: ErrorCode.POOL_EMPTY,
      context: { type: 'Node', value: { secret: 'test-secret' } },
    });
    const json = error.toJSON('prod');

    expect(json.stack).toBeUndefined();
    expect(json.context).toEqual({ type: 'Node' });
    expect(error.context?.value).toEqual({ secret: 'test-secret' });
  });

  it('does not treat plain errors as forge errors', () => {
    expect(isForgeError(new Error('plain'))).toBe(false);
    expect(isForgeError('E300')).toBe(false);
  });
});
