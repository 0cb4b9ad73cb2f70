/**
 * Configuration options for leaprand generators
 *
 * All options are optional. A generator created without options is
 * unseeded (it falls back to its default seed on first use) and silent.
 */

import type { SeedInput } from '../seed/normalizer.js';
import type { TraceSink } from '../util/trace.js';
import { ConfigError, describeValue } from './errors.js';

export interface GeneratorOptions {
  /** Seed applied at construction; omitted means lazy default seeding */
  seed?: SeedInput;
  /** Steps to skip right after seeding (default: 0) */
  jumpAhead?: number | bigint;
  /** Write trace lines to stderr (default: LEAPRAND_TRACE env var) */
  trace?: boolean;
  /** Receive trace events instead of stderr lines; implies tracing */
  onTrace?: TraceSink;
}

export interface ResolvedGeneratorOptions {
  seed: SeedInput | undefined;
  jumpAhead: bigint;
  trace: boolean;
  onTrace: TraceSink | undefined;
}

export interface StreamPartitionOptions {
  /** Number of generators to create (>= 1) */
  count: number;
  /** Steps between consecutive streams (default: floor(period / count)) */
  stride?: number | bigint;
  seed?: SeedInput;
  trace?: boolean;
  onTrace?: TraceSink;
}

export interface ResolvedStreamPartitionOptions {
  count: number;
  stride: bigint | undefined;
  seed: SeedInput | undefined;
  trace: boolean;
  onTrace: TraceSink | undefined;
}

/**
 * LEAPRAND_TRACE=1|true|yes|on enables stderr tracing
 */
export function traceFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = env.LEAPRAND_TRACE?.trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on';
}

export const DEFAULT_OPTIONS: Readonly<ResolvedGeneratorOptions> = {
  seed: undefined,
  jumpAhead: 0n,
  trace: false,
  onTrace: undefined,
};

/**
 * Resolve user options against defaults and validate them
 */
export function resolveOptions(
  userOptions: GeneratorOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedGeneratorOptions {
  validateOptions(userOptions);
  return {
    ...DEFAULT_OPTIONS,
    seed: userOptions.seed,
    jumpAhead: toStepCount(userOptions.jumpAhead ?? DEFAULT_OPTIONS.jumpAhead),
    trace: userOptions.trace ?? traceFromEnv(env),
    onTrace: userOptions.onTrace,
  };
}

export function validateOptions(options: GeneratorOptions): void {
  if (options.jumpAhead !== undefined) {
    assertStepCount(options.jumpAhead, 'jumpAhead');
  }
  assertTraceOptions(options);
}

export function resolveStreamOptions(
  userOptions: StreamPartitionOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedStreamPartitionOptions {
  const { count, stride } = userOptions;
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new ConfigError({
      message: `count must be a positive integer, got ${describeValue(count)}`,
      context: { setting: 'count', expected: 'integer >= 1', received: describeValue(count) },
    });
  }
  if (stride !== undefined) {
    assertStepCount(stride, 'stride');
  }
  assertTraceOptions(userOptions);
  return {
    count,
    stride: stride === undefined ? undefined : toStepCount(stride),
    seed: userOptions.seed,
    trace: userOptions.trace ?? traceFromEnv(env),
    onTrace: userOptions.onTrace,
  };
}

function assertStepCount(value: number | bigint, setting: string): void {
  const ok =
    typeof value === 'bigint'
      ? value >= 0n
      : Number.isInteger(value) && value >= 0;
  if (!ok) {
    throw new ConfigError({
      message: `${setting} must be a non-negative integer, got ${describeValue(value)}`,
      context: { setting, expected: 'integer >= 0', received: describeValue(value) },
    });
  }
}

function assertTraceOptions(options: { trace?: unknown; onTrace?: unknown }): void {
  if (options.trace !== undefined && typeof options.trace !== 'boolean') {
    throw new ConfigError({
      message: 'trace must be boolean',
      context: { setting: 'trace', received: describeValue(options.trace) },
    });
  }
  if (options.onTrace !== undefined && typeof options.onTrace !== 'function') {
    throw new ConfigError({
      message: 'onTrace must be a function',
      context: { setting: 'onTrace', received: describeValue(options.onTrace) },
    });
  }
}

function toStepCount(value: number | bigint): bigint {
  return typeof value === 'bigint' ? value : BigInt(value);
}
