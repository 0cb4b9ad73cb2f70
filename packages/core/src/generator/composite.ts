import { CONG } from '../families/cong.js';
import {
  FamilyRecurrence,
  type GeneratorName,
  type Recurrence,
} from '../families/family.js';
import { MWC2, MWC64 } from '../families/mwc.js';
import { SHR3 } from '../families/shr3.js';
import { lcm } from '../util/modular.js';

export type ComponentLabel = 'mwc' | 'cong' | 'shr3';

export interface CompositePart {
  readonly label: ComponentLabel;
  readonly recurrence: Recurrence;
}

/**
 * Independent combination of several recurrences. Each part owns its slice
 * of the seed lanes and state words, in declaration order, and is stepped
 * and jumped on its own; only the outputs are mixed.
 */
export class CompositeRecurrence implements Recurrence {
  readonly seedLanes: number;
  readonly stateWords: number;
  readonly period: bigint;
  readonly defaultSeed: readonly number[];

  constructor(
    readonly name: GeneratorName,
    readonly parts: readonly CompositePart[],
    private readonly combine: (outputs: readonly number[]) => number
  ) {
    this.seedLanes = sum(parts.map((p) => p.recurrence.seedLanes));
    this.stateWords = sum(parts.map((p) => p.recurrence.stateWords));
    this.period = parts.reduce((acc, p) => lcm(acc, p.recurrence.period), 1n);
    this.defaultSeed = parts.flatMap((p) => [...p.recurrence.defaultSeed]);
  }

  seed(lanes: readonly number[]): boolean {
    return this.#distribute(lanes, 'seedLanes', (r, slice) => r.seed(slice));
  }

  restore(words: readonly number[]): boolean {
    return this.#distribute(words, 'stateWords', (r, slice) => r.restore(slice));
  }

  isValid(): boolean {
    return this.parts.every((p) => p.recurrence.isValid());
  }

  step(): number {
    return this.combine(this.parts.map((p) => p.recurrence.step()));
  }

  jump(n: bigint): number {
    return sum(this.parts.map((p) => p.recurrence.jump(n)));
  }

  words(): number[] {
    return this.parts.flatMap((p) => p.recurrence.words());
  }

  components(): Record<string, number[]> {
    const out: Record<string, number[]> = {};
    for (const part of this.parts) {
      out[part.label] = part.recurrence.words();
    }
    return out;
  }

  #distribute(
    values: readonly number[],
    width: 'seedLanes' | 'stateWords',
    apply: (recurrence: Recurrence, slice: readonly number[]) => boolean
  ): boolean {
    let offset = 0;
    let replaced = false;
    for (const { recurrence } of this.parts) {
      const count = recurrence[width];
      // Every part must be reseeded, so no short-circuit here
      if (apply(recurrence, values.slice(offset, offset + count))) {
        replaced = true;
      }
      offset += count;
    }
    return replaced;
  }
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

/** KISS: ((MWC2 ^ Cong) + SHR3) mod 2^32. */
export function createKiss(): CompositeRecurrence {
  return new CompositeRecurrence(
    'KISS',
    [
      { label: 'mwc', recurrence: new FamilyRecurrence(MWC2) },
      { label: 'cong', recurrence: new FamilyRecurrence(CONG) },
      { label: 'shr3', recurrence: new FamilyRecurrence(SHR3) },
    ],
    ([mwc = 0, cong = 0, shr3 = 0]) => (((mwc ^ cong) >>> 0) + shr3) >>> 0
  );
}

/** KISS2: (MWC64 + Cong + SHR3) mod 2^32. */
export function createKiss2(): CompositeRecurrence {
  return new CompositeRecurrence(
    'KISS2',
    [
      { label: 'mwc', recurrence: new FamilyRecurrence(MWC64) },
      { label: 'cong', recurrence: new FamilyRecurrence(CONG) },
      { label: 'shr3', recurrence: new FamilyRecurrence(SHR3) },
    ],
    ([mwc = 0, cong = 0, shr3 = 0]) => (mwc + cong + shr3) >>> 0
  );
}
