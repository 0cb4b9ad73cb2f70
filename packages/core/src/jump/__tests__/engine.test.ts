import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { bitLength, powerOf } from '../engine.js';
import {
  AFFINE_ALGEBRA,
  GF2_ALGEBRA,
  TRANSITION_ALGEBRA,
  affine,
  applyAffine,
  applyLinear,
  linearGf2,
} from '../operator.js';
import { geomSeries, wrappingGeomSeries } from '../series.js';
import { BitMatrix } from '../../util/bit-matrix.js';
import { ErrorCode } from '../../errors/codes.js';
import { isLeapRandError } from '../../types/errors.js';

const LCG = affine(1n << 32n, 69069n, 12345n);

function iterateAffine(x: bigint, n: number): bigint {
  let v = x;
  for (let i = 0; i < n; i++) v = applyAffine(LCG, v);
  return v;
}

describe('affine operators', () => {
  it('reduces coefficients on construction', () => {
    expect(affine(7n, 10n, -1n)).toEqual({
      kind: 'affine',
      modulus: 7n,
      multiplier: 3n,
      offset: 6n,
    });
  });

  it('composes as (a1·a2, a1·c2 + c1)', () => {
    const outer = affine(101n, 3n, 4n);
    const inner = affine(101n, 5n, 6n);
    expect(AFFINE_ALGEBRA.compose(outer, inner)).toEqual(affine(101n, 15n, 22n));
    expect(applyAffine(AFFINE_ALGEBRA.compose(outer, inner), 9n)).toBe(
      applyAffine(outer, applyAffine(inner, 9n))
    );
  });

  it('rejects a non-positive modulus', () => {
    expect(() => affine(0n, 1n)).toThrow('Affine operator modulus must be positive');
  });

  it('refuses to mix moduli', () => {
    expect(() => AFFINE_ALGEBRA.compose(affine(7n, 2n), affine(11n, 2n))).toThrow(
      /different moduli/
    );
  });
});

describe('TRANSITION_ALGEBRA', () => {
  it('dispatches on the operator kind', () => {
    const gf2 = linearGf2(BitMatrix.shift(8, 1));
    const composed = TRANSITION_ALGEBRA.compose(gf2, gf2);
    expect(composed.kind).toBe('gf2');
    if (composed.kind === 'gf2') {
      expect(applyLinear(composed, 0b1)).toBe(0b100);
    }
    expect(TRANSITION_ALGEBRA.identity(LCG)).toEqual(affine(1n << 32n, 1n, 0n));
  });

  it('raises an internal error for mixed kinds', () => {
    let caught: unknown;
    try {
      TRANSITION_ALGEBRA.compose(LCG, linearGf2(BitMatrix.identity(32)));
    } catch (err) {
      caught = err;
    }
    expect(isLeapRandError(caught) && caught.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
  });
});

describe('powerOf', () => {
  it('returns the identity for n = 0 without composing', () => {
    const plan = powerOf(AFFINE_ALGEBRA, LCG, 0n);
    expect(plan.operator).toEqual(AFFINE_ALGEBRA.identity(LCG));
    expect(plan.compositions).toBe(0);
  });

  it('returns the base itself for n = 1', () => {
    expect(powerOf(AFFINE_ALGEBRA, LCG, 1n)).toEqual({ operator: LCG, compositions: 0 });
  });

  it.each([2, 3, 17, 255, 256, 10_000])('matches %i single steps', (n) => {
    const { operator } = powerOf(AFFINE_ALGEBRA, LCG, BigInt(n));
    expect(applyAffine(operator, 42n)).toBe(iterateAffine(42n, n));
  });

  it('performs at most 2·bitLength(n) compositions', () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: (1n << 128n) - 1n }), (n) => {
        const { compositions } = powerOf(AFFINE_ALGEBRA, LCG, n);
        expect(compositions).toBeLessThanOrEqual(2 * bitLength(n));
      }),
      { seed: 77, numRuns: 200 }
    );
    // 2^k needs exactly k squarings
    expect(powerOf(AFFINE_ALGEBRA, LCG, 1n << 40n).compositions).toBe(40);
    // all-ones needs k−1 squarings and k−1 accumulations
    expect(powerOf(AFFINE_ALGEBRA, LCG, 0xffn).compositions).toBe(14);
  });

  it('works on GF(2) matrices', () => {
    const rotate = linearGf2(
      BitMatrix.fromColumns([0b0010, 0b0100, 0b1000, 0b0001])
    );
    expect(powerOf(GF2_ALGEBRA, rotate, 4n).operator.matrix.isIdentity()).toBe(true);
    expect(applyLinear(powerOf(GF2_ALGEBRA, rotate, 6n).operator, 0b0001)).toBe(0b0100);
  });

  it('bitLength', () => {
    expect(bitLength(0n)).toBe(0);
    expect(bitLength(1n)).toBe(1);
    expect(bitLength(0x8000_0000n)).toBe(32);
  });
});

describe('geometric series', () => {
  it('sums 1 + r + … + r^(n−1)', () => {
    expect(geomSeries(3n, 4n, 1000n)).toBe(40n);
    expect(geomSeries(3n, 0n, 1000n)).toBe(0n);
    expect(geomSeries(3n, 1n, 1000n)).toBe(1n);
  });

  it('wraps at 32 bits', () => {
    expect(wrappingGeomSeries(21345n, 12345n)).toBe(2573576889n);
    expect(wrappingGeomSeries(69069n, 10n ** 18n)).toBe(629932032n);
  });
});
