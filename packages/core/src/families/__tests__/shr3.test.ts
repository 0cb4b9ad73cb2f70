import { describe, it, expect } from 'vitest';
import {
  SHR3,
  SHR3_SHIFTS,
  isFullPeriodXorshift,
  primeFactors,
  xorshiftMatrix,
  type XorshiftTriple,
} from '../shr3.js';
import { JUMP_DISTANCES, outputs, stepTimes } from './harness.js';

function cycleLength(width: number, [a, b, c]: XorshiftTriple, start = 1): number {
  const mask = 2 ** width - 1;
  let x = start;
  let n = 0;
  do {
    x = (x ^ (x << a)) & mask;
    x ^= x >>> b;
    x = (x ^ (x << c)) & mask;
    n++;
  } while (x !== start);
  return n;
}

describe('SHR3', () => {
  it('uses the <<13 >>17 <<5 triple', () => {
    expect(SHR3_SHIFTS).toEqual([13, 17, 5]);
  });

  it('replaces the zero fixed point', () => {
    expect(SHR3.step(0).state).toBe(0);
    expect(SHR3.normalize([0])).toEqual({ state: 0xffff_ffff, replaced: true });
    expect(SHR3.restore([0])).toEqual({ state: 0xffff_ffff, replaced: true });
    expect(SHR3.isValid(SHR3.normalize([0]).state)).toBe(true);
  });

  it('produces the reference sequence from the default seed', () => {
    const start = SHR3.normalize(SHR3.defaultSeed).state;
    expect(outputs(SHR3, start, 5)).toEqual([
      253983, 4228382207, 1958451267, 4056713434, 2049502865,
    ]);
  });

  it.each(JUMP_DISTANCES)('jump(%i) equals stepping', (n) => {
    expect(SHR3.jump(3360276411, BigInt(n)).state).toBe(stepTimes(SHR3, 3360276411, n));
  });

  it('cycles through every non-zero word', () => {
    expect(SHR3.period).toBe(0xffff_ffffn);
    expect(SHR3.jump(3360276411, SHR3.period).state).toBe(3360276411);
    expect(SHR3.step(SHR3.jump(3360276411, SHR3.period - 1n).state).state).toBe(3360276411);
  });
});

describe('xorshift period test', () => {
  it('factors 2^w − 1', () => {
    expect(primeFactors(0xffff_ffff)).toEqual([3, 5, 17, 257, 65537]);
    expect(primeFactors(0xffff)).toEqual([3, 5, 17, 257]);
    expect(primeFactors(7)).toEqual([7]);
  });

  it('proves the SHR3 triple has full period at 32 bits', () => {
    expect(isFullPeriodXorshift(32, [13, 17, 5])).toBe(true);
  });

  it('rejects the transposed 1999 triple', () => {
    expect(isFullPeriodXorshift(32, [17, 13, 5])).toBe(false);
  });

  const triples: XorshiftTriple[] = [
    [7, 9, 8],
    [6, 7, 13],
    [1, 1, 14],
    [1, 1, 1],
    [2, 3, 5],
    [3, 5, 7],
  ];

  it.each(triples.map((triple) => ({ triple })))(
    'agrees with a brute-force cycle count at 16 bits for $triple',
    ({ triple }) => {
      const full = cycleLength(16, triple) === 0xffff;
      expect(isFullPeriodXorshift(16, triple)).toBe(full);
    }
  );

  it('counts cycle lengths at 16 bits', () => {
    expect(cycleLength(16, [7, 9, 8])).toBe(65535);
    expect(cycleLength(16, [1, 1, 1])).toBe(16);
    expect(cycleLength(16, [2, 3, 5])).toBe(16383);
    expect(cycleLength(16, [3, 5, 7])).toBe(8191);
  });

  it('matrix matches the step at reduced width', () => {
    const m = xorshiftMatrix(16, [7, 9, 8]);
    let x = 1;
    for (let i = 0; i < 50; i++) {
      const expected = cycleStep(x);
      expect(m.dotVec(x)).toBe(expected);
      x = expected;
    }

    function cycleStep(v: number): number {
      let y = (v ^ (v << 7)) & 0xffff;
      y ^= y >>> 9;
      return (y ^ (y << 8)) & 0xffff;
    }
  });

  it('validates shift amounts', () => {
    expect(() => xorshiftMatrix(16, [0, 9, 8])).toThrow(
      'Xorshift shift 0 must be an integer in 1..15, got 0'
    );
    expect(() => isFullPeriodXorshift(16, [7, 16, 8])).toThrow(/shift 1 must be/);
  });
});
