/**
 * Error hierarchy for runstat
 * Every failure surfaced by the model or the persistence layer is a
 * RunstatError carrying a stable code, a severity and optional context.
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
  benchmark?: string; // Benchmark name involved in the failure
  key?: string; // Metadata key (e.g., 'inner_loops')
  path?: string; // File path for persistence failures
  value?: unknown; // Offending value
  expected?: unknown; // Value the operation required
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

export interface RunstatErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/** Options accepted by the concrete error classes */
export interface RunstatErrorOptions {
  errorCode?: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all runstat errors
 */
export abstract class RunstatError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;

  constructor(params: RunstatErrorParams) {
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
   * - prod: excludes stack and the offending value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Invalid data handed to a constructor (empty runs, bad loops, blank metadata)
 */
export class ValidationError extends RunstatError {
  constructor(message: string, options: RunstatErrorOptions = {}) {
    super({
      message,
      errorCode: options.errorCode ?? ErrorCode.INVALID_RUN_DATA,
      context: options.context,
      cause: options.cause,
    });
  }
}

/**
 * Wrong argument shape passed to a mutator (e.g., a plain array instead of a Run)
 */
export class ArgumentTypeError extends RunstatError {
  constructor(message: string, options: RunstatErrorOptions = {}) {
    super({
      message,
      errorCode: options.errorCode ?? ErrorCode.ARGUMENT_TYPE_MISMATCH,
      context: options.context,
      cause: options.cause,
    });
  }
}

/**
 * Merge-time mismatch between runs or benchmarks
 */
export class IncompatibilityError extends RunstatError {
  constructor(message: string, options: RunstatErrorOptions = {}) {
    super({
      message,
      errorCode: options.errorCode ?? ErrorCode.INCOMPATIBLE_RUN,
      context: options.context,
      cause: options.cause,
    });
  }
}

/**
 * Unknown benchmark requested from a suite
 */
export class BenchmarkNotFoundError extends RunstatError {
  constructor(name: string, options: RunstatErrorOptions = {}) {
    super({
      message: `Benchmark not found: ${JSON.stringify(name)}`,
      errorCode: options.errorCode ?? ErrorCode.BENCHMARK_NOT_FOUND,
      context: { benchmark: name, ...(options.context ?? {}) },
      cause: options.cause,
    });
  }
}

/**
 * Operation not allowed in the object's current state
 */
export class StateError extends RunstatError {
  constructor(message: string, options: RunstatErrorOptions = {}) {
    super({
      message,
      errorCode: options.errorCode ?? ErrorCode.NO_SAMPLES,
      context: options.context,
      cause: options.cause,
    });
  }
}

/**
 * Load/dump failures. `code` mirrors the system error code when there is one
 * (`EEXIST` when dump refuses to overwrite a file).
 */
export class PersistenceError extends RunstatError {
  public readonly code?: string;
  public readonly path?: string;

  constructor(
    message: string,
    options: RunstatErrorOptions & { code?: string; path?: string } = {}
  ) {
    super({
      message,
      errorCode: options.errorCode ?? ErrorCode.IO_FAILED,
      context: { path: options.path, ...(options.context ?? {}) },
      cause: options.cause,
    });
    this.code = options.code;
    this.path = options.path;
  }
}

/**
 * Type guard for runstat errors
 */
export function isRunstatError(value: unknown): value is RunstatError {
  return value instanceof RunstatError;
}
