// Exact modular arithmetic on bigint. Every helper expects non-negative
// operands and a positive modulus; results are always reduced into [0, m).

export const U32_MASK = 0xffff_ffffn;
export const TWO_POW_32 = 1n << 32n;

export function mod(a: bigint, m: bigint): bigint {
  const r = a % m;
  return r < 0n ? r + m : r;
}

export function mulMod(a: bigint, b: bigint, m: bigint): bigint {
  return mod(a * b, m);
}

export function addMod(a: bigint, b: bigint, m: bigint): bigint {
  return mod(a + b, m);
}

/**
 * base^n mod m by square-and-multiply.
 */
export function powMod(base: bigint, n: bigint, m: bigint): bigint {
  if (m === 1n) return 0n;
  let result = 1n;
  let square = mod(base, m);
  let e = n;
  while (e > 0n) {
    if ((e & 1n) === 1n) {
      result = (result * square) % m;
    }
    e >>= 1n;
    if (e > 0n) {
      square = (square * square) % m;
    }
  }
  return result;
}

/**
 * base^n with fixed-width wraparound, i.e. mod 2^bits.
 */
export function wrappingPow(base: bigint, n: bigint, bits = 32): bigint {
  return powMod(base, n, 1n << BigInt(bits));
}

export function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

export function lcm(a: bigint, b: bigint): bigint {
  if (a === 0n || b === 0n) return 0n;
  return (a / gcd(a, b)) * b;
}

/**
 * Truncate an arbitrary integer to its low 32 bits (two's complement for
 * negatives) and return it as a uint32 number.
 */
export function toU32(value: bigint): number {
  return Number(value & U32_MASK);
}
