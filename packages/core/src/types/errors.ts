/**
 * Error hierarchy for ObjectForge
 * Structured errors carrying a stable code, a severity and typed context
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  setting?: string; // Parameter name (e.g. 'objectPoolSize')
  fieldPath?: string; // Dotted field path at the time of failure
  type?: string; // Printable type key
  depth?: number; // Recursion depth at the time of failure
  value?: unknown; // Problematic value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  fieldPath?: string;
}

export interface ForgeErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all ObjectForge errors
 */
export abstract class ForgeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  declare readonly cause?: Error;

  constructor(params: ForgeErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and drops context.value (generated instances)
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#stripValue(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      fieldPath: this.context?.fieldPath,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #stripValue(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Invalid generation parameters or size ranges
 */
export class ConfigError extends ForgeError {
  constructor(
    message: string,
    setting?: string,
    params: {
      errorCode?: ErrorCode;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super({
      message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: { setting, ...(params.context ?? {}) },
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Broken caller contract on a randomization context: unbalanced frame
 * push/pop or a pooled pick on an empty pool. Fatal to the current
 * generation call.
 */
export class ContextStateError extends ForgeError {
  constructor(
    message: string,
    params: {
      errorCode?: ErrorCode;
      context?: ErrorContext;
    } = {}
  ) {
    super({
      message,
      errorCode: params.errorCode ?? ErrorCode.CONTEXT_STATE_VIOLATION,
      context: params.context,
    });
  }
}

export function isForgeError(error: unknown): error is ForgeError {
  return error instanceof ForgeError;
}
