import { powerOf } from '../jump/engine.js';
import { GF2_ALGEBRA, applyLinear, linearGf2 } from '../jump/operator.js';
import { normalizeXorshiftWord } from '../seed/normalizer.js';
import { InvalidArgumentError } from '../types/errors.js';
import { BitMatrix, widthMask } from '../util/bit-matrix.js';
import type { Family } from './family.js';

/** Left, right, left shift amounts of a xorshift step. */
export type XorshiftTriple = readonly [number, number, number];

export const SHR3_SHIFTS: XorshiftTriple = [13, 17, 5];

/**
 * Matrix of x ^= x << a; x ^= x >> b; x ^= x << c at the given width:
 * (I + S^c)(I + S^−b)(I + S^a).
 */
export function xorshiftMatrix(width: number, shifts: XorshiftTriple): BitMatrix {
  assertShifts(width, shifts);
  const [a, b, c] = shifts;
  const identity = BitMatrix.identity(width);
  const left = identity.add(BitMatrix.shift(width, a));
  const right = identity.add(BitMatrix.shift(width, -b));
  const last = identity.add(BitMatrix.shift(width, c));
  return last.mul(right.mul(left));
}

/** Distinct prime factors in ascending order, by trial division. */
export function primeFactors(n: number): number[] {
  const factors: number[] = [];
  let rest = n;
  for (let p = 2; p * p <= rest; p++) {
    if (rest % p === 0) {
      factors.push(p);
      while (rest % p === 0) rest /= p;
    }
  }
  if (rest > 1) factors.push(rest);
  return factors;
}

/**
 * Exact maximal-period test for a xorshift triple: the step matrix M has
 * period 2^w − 1 on the non-zero vectors iff M^(2^w−1) = I and
 * M^((2^w−1)/p) ≠ I for every prime p dividing 2^w − 1.
 */
export function isFullPeriodXorshift(width: number, shifts: XorshiftTriple): boolean {
  const step = linearGf2(xorshiftMatrix(width, shifts));
  const order = widthMask(width);
  const power = (e: number) =>
    powerOf(GF2_ALGEBRA, step, BigInt(e)).operator.matrix;

  if (!power(order).isIdentity()) return false;
  return primeFactors(order).every((p) => !power(order / p).isIdentity());
}

function assertShifts(width: number, shifts: XorshiftTriple): void {
  shifts.forEach((shift, index) => {
    if (!Number.isInteger(shift) || shift < 1 || shift >= width) {
      throw new InvalidArgumentError({
        message: `Xorshift shift ${index} must be an integer in 1..${width - 1}, got ${shift}`,
        context: {
          argument: 'shifts',
          index,
          expected: `1..${width - 1}`,
          received: String(shift),
        },
      });
    }
  });
}

const SHR3_OPERATOR = linearGf2(xorshiftMatrix(32, SHR3_SHIFTS));
const [SHL_A, SHR_B, SHL_C] = SHR3_SHIFTS;

export const SHR3: Family<number> = {
  name: 'SHR3',
  seedLanes: 1,
  stateWords: 1,
  period: 0xffff_ffffn,
  defaultSeed: [0],
  normalize: (lanes) => normalizeXorshiftWord((lanes[0] ?? 0) >>> 0),
  restore: (words) => normalizeXorshiftWord((words[0] ?? 0) >>> 0),
  isValid: (x) => x !== 0,
  step(state) {
    let x = state;
    x ^= x << SHL_A;
    x ^= x >>> SHR_B;
    x ^= x << SHL_C;
    const next = x >>> 0;
    return { state: next, output: next };
  },
  jump(x, n) {
    const { operator, compositions } = powerOf(GF2_ALGEBRA, SHR3_OPERATOR, n);
    return { state: applyLinear(operator, x), compositions };
  },
  toWords: (x) => [x],
};
