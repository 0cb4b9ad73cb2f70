import type { Normalized } from '../seed/normalizer.js';

export type GeneratorName =
  | 'MWC1'
  | 'MWC2'
  | 'MWC64'
  | 'Cong'
  | 'SHR3'
  | 'LFSR88'
  | 'LFSR113'
  | 'KISS'
  | 'KISS2';

export interface Stepped<S> {
  state: S;
  output: number;
}

export interface Jumped<S> {
  state: S;
  compositions: number;
}

/**
 * Constant description of one generator family plus its pure formulas.
 *
 * Implementations never mutate a state value; every operation returns a
 * fresh one.
 */
export interface Family<S> {
  readonly name: GeneratorName;
  /** uint32 seed values consumed by `normalize`. */
  readonly seedLanes: number;
  /** uint32 words in the exported state tuple. */
  readonly stateWords: number;
  /**
   * Cycle length. MWC, Cong and SHR3 states lie on the cycle as seeded;
   * LFSR states reach it after their first step.
   */
  readonly period: bigint;
  /** Raw seed used when a generator is stepped before it is seeded. */
  readonly defaultSeed: readonly number[];

  /** Map raw seed lanes onto a valid state. */
  normalize(lanes: readonly number[]): Normalized<S>;
  /** Rebuild a state from exported words, replacing degenerate lanes. */
  restore(words: readonly number[]): Normalized<S>;
  isValid(state: S): boolean;
  step(state: S): Stepped<S>;
  jump(state: S, n: bigint): Jumped<S>;
  toWords(state: S): number[];
}

/**
 * A family bound to one mutable state: what the generator facade drives.
 * Composites implement this over several part recurrences.
 */
export interface Recurrence {
  readonly name: GeneratorName;
  readonly seedLanes: number;
  readonly stateWords: number;
  readonly period: bigint;
  readonly defaultSeed: readonly number[];

  /** Returns true when a degenerate lane had to be replaced. */
  seed(lanes: readonly number[]): boolean;
  restore(words: readonly number[]): boolean;
  isValid(): boolean;
  step(): number;
  /** Returns the number of operator compositions performed. */
  jump(n: bigint): number;
  words(): number[];
  components(): Record<string, number[]>;
}

export class FamilyRecurrence<S> implements Recurrence {
  #state: S;

  constructor(readonly family: Family<S>) {
    this.#state = family.normalize(family.defaultSeed).state;
  }

  get name(): GeneratorName {
    return this.family.name;
  }
  get seedLanes(): number {
    return this.family.seedLanes;
  }
  get stateWords(): number {
    return this.family.stateWords;
  }
  get period(): bigint {
    return this.family.period;
  }
  get defaultSeed(): readonly number[] {
    return this.family.defaultSeed;
  }

  seed(lanes: readonly number[]): boolean {
    const { state, replaced } = this.family.normalize(lanes);
    this.#state = state;
    return replaced;
  }

  restore(words: readonly number[]): boolean {
    const { state, replaced } = this.family.restore(words);
    this.#state = state;
    return replaced;
  }

  isValid(): boolean {
    return this.family.isValid(this.#state);
  }

  step(): number {
    const { state, output } = this.family.step(this.#state);
    this.#state = state;
    return output;
  }

  jump(n: bigint): number {
    const { state, compositions } = this.family.jump(this.#state, n);
    this.#state = state;
    return compositions;
  }

  words(): number[] {
    return this.family.toWords(this.#state);
  }

  components(): Record<string, number[]> {
    return { [this.family.name]: this.words() };
  }
}
