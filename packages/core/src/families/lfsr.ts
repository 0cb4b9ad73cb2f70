import { powerOf } from '../jump/engine.js';
import {
  GF2_ALGEBRA,
  applyLinear,
  linearGf2,
  type LinearGf2Operator,
} from '../jump/operator.js';
import {
  isValidLfsrComponent,
  normalizeLfsrComponent,
  spreadLfsrSeed,
  type Normalized,
} from '../seed/normalizer.js';
import { BitMatrix } from '../util/bit-matrix.js';
import { lcm } from '../util/modular.js';
import type { Family, GeneratorName } from './family.js';

/**
 * One Tausworthe component:
 *   b  = ((z << q) ^ z) >> s
 *   z' = ((z & mask) << r) ^ b,   mask = 0xFFFFFFFF − (min − 1)
 *
 * `degree` is the length k of the underlying register; the component
 * cycles with period 2^k − 1 once its low 32 − k bits have been refreshed
 * by one step.
 */
export interface TauswortheComponent {
  readonly q: number;
  readonly s: number;
  readonly r: number;
  readonly min: number;
  readonly degree: number;
}

interface CompiledComponent extends TauswortheComponent {
  readonly mask: number;
  readonly operator: LinearGf2Operator;
}

export const LFSR113_COMPONENTS: readonly TauswortheComponent[] = [
  { q: 6, s: 13, r: 18, min: 2, degree: 31 },
  { q: 2, s: 27, r: 2, min: 8, degree: 29 },
  { q: 13, s: 21, r: 7, min: 16, degree: 28 },
  { q: 3, s: 12, r: 13, min: 128, degree: 25 },
];

export const LFSR88_COMPONENTS: readonly TauswortheComponent[] = [
  { q: 13, s: 19, r: 12, min: 2, degree: 31 },
  { q: 2, s: 25, r: 4, min: 8, degree: 29 },
  { q: 3, s: 11, r: 17, min: 16, degree: 28 },
];

/** S^r·D_mask + S^−s·(S^q + I) over GF(2), 32×32. */
export function componentMatrix(component: TauswortheComponent): BitMatrix {
  const mask = componentMask(component.min);
  const kept = BitMatrix.shift(32, component.r).mul(BitMatrix.diagonal(32, mask));
  const feedback = BitMatrix.shift(32, -component.s).mul(
    BitMatrix.shift(32, component.q).add(BitMatrix.identity(32))
  );
  return kept.add(feedback);
}

function componentMask(min: number): number {
  return (0xffff_ffff - (min - 1)) >>> 0;
}

function compile(component: TauswortheComponent): CompiledComponent {
  return {
    ...component,
    mask: componentMask(component.min),
    operator: linearGf2(componentMatrix(component)),
  };
}

function stepComponent(c: CompiledComponent, z: number): number {
  const b = ((z << c.q) ^ z) >>> c.s;
  return (((z & c.mask) << c.r) ^ b) >>> 0;
}

function xorAll(state: readonly number[]): number {
  let out = 0;
  for (const z of state) out ^= z;
  return out >>> 0;
}

function tauswortheFamily(
  name: GeneratorName,
  components: readonly TauswortheComponent[]
): Family<readonly number[]> {
  const compiled = components.map(compile);
  const period = components.reduce(
    (acc, c) => lcm(acc, (1n << BigInt(c.degree)) - 1n),
    1n
  );

  const normalizeWith =
    (prepare: (word: number) => number) =>
    (words: readonly number[]): Normalized<readonly number[]> => {
      let replaced = false;
      const state = compiled.map((c, i) => {
        const lane = normalizeLfsrComponent(prepare((words[i] ?? 0) >>> 0), c.min);
        replaced ||= lane.replaced;
        return lane.state;
      });
      return { state, replaced };
    };

  return {
    name,
    seedLanes: components.length,
    stateWords: components.length,
    period,
    defaultSeed: components.map(() => 0),
    normalize: normalizeWith(spreadLfsrSeed),
    restore: normalizeWith((word) => word),
    isValid: (state) =>
      compiled.every((c, i) => isValidLfsrComponent(state[i] ?? 0, c.min)),
    step(state) {
      const next = compiled.map((c, i) => stepComponent(c, state[i] ?? 0));
      return { state: next, output: xorAll(next) };
    },
    jump(state, n) {
      let compositions = 0;
      const next = compiled.map((c, i) => {
        const plan = powerOf(GF2_ALGEBRA, c.operator, n);
        compositions += plan.compositions;
        return applyLinear(plan.operator, state[i] ?? 0);
      });
      return { state: next, compositions };
    },
    toWords: (state) => [...state],
  };
}

export const LFSR113 = tauswortheFamily('LFSR113', LFSR113_COMPONENTS);
export const LFSR88 = tauswortheFamily('LFSR88', LFSR88_COMPONENTS);
