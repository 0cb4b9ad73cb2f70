import type { OperatorAlgebra } from './operator.js';

export interface JumpPlan<Op> {
  /** `base` composed with itself n times. */
  operator: Op;
  /** Number of `compose` calls performed (squarings + accumulations). */
  compositions: number;
}

/**
 * Raise a one-step operator to the power n by square-and-compose.
 *
 * Scans n from the least significant bit, so the cost is at most
 * 2·bitLength(n) compositions. n = 0 yields the identity.
 */
export function powerOf<Op>(
  algebra: OperatorAlgebra<Op>,
  base: Op,
  n: bigint
): JumpPlan<Op> {
  let result = algebra.identity(base);
  let square = base;
  let e = n;
  let compositions = 0;
  let first = true;

  while (e > 0n) {
    if ((e & 1n) === 1n) {
      // The first accumulation replaces the identity outright
      if (first) {
        result = square;
        first = false;
      } else {
        result = algebra.compose(square, result);
        compositions++;
      }
    }
    e >>= 1n;
    if (e > 0n) {
      square = algebra.compose(square, square);
      compositions++;
    }
  }

  return { operator: result, compositions };
}

export function bitLength(n: bigint): number {
  let bits = 0;
  let e = n;
  while (e > 0n) {
    e >>= 1n;
    bits++;
  }
  return bits;
}
