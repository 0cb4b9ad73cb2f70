import { describe, it, expect } from 'vitest';
import {
  addMod,
  gcd,
  lcm,
  mod,
  mulMod,
  powMod,
  toU32,
  wrappingPow,
} from '../modular.js';

describe('modular arithmetic', () => {
  it('mod always lands in [0, m)', () => {
    expect(mod(7n, 5n)).toBe(2n);
    expect(mod(-7n, 5n)).toBe(3n);
    expect(mod(10n, 5n)).toBe(0n);
  });

  it('mulMod does not lose precision above 2^53', () => {
    expect(mulMod(123456789n, 3111222333n, 0x9068ffffn)).toBe(1473911797n);
    expect(mulMod(0xffff_ffff_ffffn, 0xffff_ffff_ffffn, 1n << 64n)).toBe(
      (0xffff_ffff_ffffn * 0xffff_ffff_ffffn) % (1n << 64n)
    );
  });

  it('addMod wraps', () => {
    expect(addMod(0xffff_fffen, 5n, 1n << 32n)).toBe(3n);
  });

  describe('powMod', () => {
    it('matches known values', () => {
      expect(powMod(648518821n, 12345n, 3288555137n)).toBe(2953876344n);
      expect(powMod(0xffff_fffcn, 0xffff_ffffn, 0xffff_ffffn)).toBe(0x71c7_1c71n);
    });

    it('treats x^0 as 1 and anything mod 1 as 0', () => {
      expect(powMod(12345n, 0n, 97n)).toBe(1n);
      expect(powMod(12345n, 10n, 1n)).toBe(0n);
    });

    it('satisfies Fermat for a prime modulus', () => {
      const p = 0x9068ffffn;
      expect(powMod(36969n, p - 1n, p)).toBe(1n);
    });
  });

  it('wrappingPow reduces mod 2^bits', () => {
    expect(wrappingPow(0xffff_fffdn, 0xffff_ffffn)).toBe(0x5555_5555n);
    expect(wrappingPow(3n, 4n, 4)).toBe(1n); // 81 mod 16
  });

  it('gcd and lcm', () => {
    expect(gcd(54n, 24n)).toBe(6n);
    expect(gcd(-12n, 18n)).toBe(6n);
    expect(lcm(4n, 6n)).toBe(12n);
    expect(lcm(0n, 5n)).toBe(0n);
    expect(lcm(0xffff_ffffn, 1n << 32n)).toBe(0xffff_ffffn << 32n);
  });

  it('toU32 keeps the low 32 bits', () => {
    expect(toU32(0x1_2345_6789n)).toBe(0x2345_6789);
    expect(toU32(-1n)).toBe(0xffff_ffff);
  });
});
