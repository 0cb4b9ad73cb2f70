import { ErrorCode } from '../errors/codes.js';
import type { GeneratorName, Recurrence } from '../families/family.js';
import {
  assertStateWords,
  toSeedLanes,
  type SeedInput,
} from '../seed/normalizer.js';
import { InvalidArgumentError, describeValue } from '../types/errors.js';
import { resolveOptions, type GeneratorOptions } from '../types/options.js';
import { resolveTraceSink, type TraceEvent, type TraceSink } from '../util/trace.js';

/**
 * Uniform contract shared by every generator.
 */
export interface RandomSource {
  readonly name: GeneratorName;
  /**
   * Cycle length. MWC, Cong and SHR3 states lie on the cycle as seeded;
   * LFSR states reach it after their first step.
   */
  readonly period: bigint;
  /** Length of the tuple returned by `getState()`. */
  readonly stateWords: number;
  readonly isSeeded: boolean;

  seed(raw?: SeedInput): void;
  /** Next raw uint32 output. */
  next(): number;
  /** Two outputs: the first is the low word, the second the high word. */
  nextU64(): bigint;
  /** `next() / 2^32`, in [0, 1). */
  nextFloat01(): number;
  fillBytes(dest: Uint8Array): void;
  jump(n: number | bigint): void;
  getState(): number[];
  setState(words: readonly number[]): void;
  /** State words of each part, keyed by label (one entry for plain families). */
  getComponentStates(): Record<string, number[]>;
}

/**
 * Generator facade: a recurrence plus the Unseeded → Seeded lifecycle.
 *
 * Operations that need a state (`next`, `jump`, `getState`) seed an
 * unseeded generator with its family's default seed first.
 */
export class Generator implements RandomSource {
  #seeded = false;
  readonly #sink: TraceSink | undefined;

  constructor(
    private readonly recurrence: Recurrence,
    options: GeneratorOptions = {}
  ) {
    const resolved = resolveOptions(options);
    this.#sink = resolveTraceSink(resolved.trace, resolved.onTrace);

    if (resolved.seed !== undefined) {
      this.seed(resolved.seed);
    }
    if (resolved.jumpAhead > 0n) {
      this.jump(resolved.jumpAhead);
    }
  }

  get name(): GeneratorName {
    return this.recurrence.name;
  }

  get period(): bigint {
    return this.recurrence.period;
  }

  get stateWords(): number {
    return this.recurrence.stateWords;
  }

  get isSeeded(): boolean {
    return this.#seeded;
  }

  seed(raw?: SeedInput): void {
    const lanes =
      raw === undefined
        ? [...this.recurrence.defaultSeed]
        : toSeedLanes(raw, this.recurrence.seedLanes);
    this.#emit({ kind: 'seed', generator: this.name, lanes });
    this.#apply(lanes);
  }

  next(): number {
    this.#ensureSeeded();
    return this.recurrence.step();
  }

  nextU64(): bigint {
    const low = this.next();
    const high = this.next();
    return (BigInt(high) << 32n) | BigInt(low);
  }

  nextFloat01(): number {
    return this.next() / 0x1_0000_0000;
  }

  fillBytes(dest: Uint8Array): void {
    if (!(dest instanceof Uint8Array)) {
      throw new InvalidArgumentError({
        message: 'fillBytes expects a Uint8Array',
        context: {
          generator: this.name,
          argument: 'dest',
          expected: 'Uint8Array',
          received: describeValue(dest),
        },
      });
    }
    for (let offset = 0; offset < dest.length; offset += 4) {
      const word = this.next();
      const end = Math.min(offset + 4, dest.length);
      for (let i = offset; i < end; i++) {
        dest[i] = (word >>> (8 * (i - offset))) & 0xff;
      }
    }
  }

  jump(n: number | bigint): void {
    const steps = this.#toStepCount(n);
    this.#ensureSeeded();
    const compositions = this.recurrence.jump(steps);
    this.#emit({ kind: 'jump', generator: this.name, steps, compositions });
  }

  getState(): number[] {
    this.#ensureSeeded();
    return this.recurrence.words();
  }

  setState(words: readonly number[]): void {
    assertStateWords(words, this.recurrence.stateWords, this.name);
    this.#emit({ kind: 'set-state', generator: this.name, words: [...words] });
    if (this.recurrence.restore(words)) {
      this.#emit({ kind: 'bad-state', generator: this.name, source: 'set-state' });
    }
    this.#seeded = true;
  }

  getComponentStates(): Record<string, number[]> {
    this.#ensureSeeded();
    return this.recurrence.components();
  }

  #ensureSeeded(): void {
    if (this.#seeded) return;
    this.#emit({ kind: 'default-seed', generator: this.name });
    this.#apply(this.recurrence.defaultSeed);
  }

  #apply(lanes: readonly number[]): void {
    if (this.recurrence.seed(lanes)) {
      this.#emit({ kind: 'bad-state', generator: this.name, source: 'seed' });
    }
    this.#seeded = true;
  }

  #toStepCount(n: unknown): bigint {
    if (typeof n === 'bigint' && n >= 0n) return n;
    if (typeof n === 'number' && Number.isInteger(n) && n >= 0) return BigInt(n);
    throw new InvalidArgumentError({
      message: `jump count must be a non-negative integer, got ${describeValue(n)}`,
      errorCode: ErrorCode.INVALID_ARGUMENT,
      context: {
        generator: this.name,
        argument: 'n',
        expected: 'integer >= 0',
        received: describeValue(n),
      },
    });
  }

  #emit(event: TraceEvent): void {
    this.#sink?.(event);
  }
}
