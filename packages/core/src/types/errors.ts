/**
 * Error hierarchy for leaprand
 * Only caller contract violations and configuration mistakes raise errors;
 * seeding, stepping and jumping a seeded generator never fail.
 */

import { ErrorCode, type Severity, getErrorTitle } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  generator?: string; // Generator name (e.g. 'KISS')
  argument?: string; // Offending parameter name
  expected?: string; // Human description of what was expected
  received?: string; // Safe rendering of what was received
  index?: number; // Position inside a tuple argument
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  title: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all leaprand errors
 */
export abstract class LeapRandError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: omits stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      title: getErrorTitle(this.errorCode),
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }
}

/**
 * Caller contract violations: negative jump counts, malformed state tuples
 */
export class InvalidArgumentError extends LeapRandError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode.INVALID_ARGUMENT | ErrorCode.INVALID_STATE_SHAPE;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_ARGUMENT,
      context: params.context,
      cause: params.cause,
    });
  }

  get argument(): string | undefined {
    return this.context?.argument;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends LeapRandError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode.CONFIGURATION_ERROR | ErrorCode.UNKNOWN_GENERATOR;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * Broken internal invariants (never expected in correct use)
 */
export class InternalError extends LeapRandError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, context });
  }
}

/**
 * Type guard for leaprand errors
 */
export function isLeapRandError(error: unknown): error is LeapRandError {
  return error instanceof LeapRandError;
}

/**
 * Render an arbitrary value for error context without leaking large payloads
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'bigint') return `${value.toString()}n`;
  if (typeof value === 'string') {
    return value.length > 40 ? `"${value.slice(0, 40)}…"` : `"${value}"`;
  }
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value === null) return 'null';
  if (typeof value === 'function') return 'function';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return String(value);
}
