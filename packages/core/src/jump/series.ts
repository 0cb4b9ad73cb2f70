import { powerOf } from './engine.js';
import { AFFINE_ALGEBRA, affine } from './operator.js';

/**
 * 1 + r + r² + … + r^(n−1) (mod m), in O(log n) without division.
 *
 * Iterating `x ↦ r·x + 1` n times from 0 produces exactly this sum, so it
 * is the offset of that affine operator raised to the power n.
 */
export function geomSeries(r: bigint, n: bigint, m: bigint): bigint {
  return powerOf(AFFINE_ALGEBRA, affine(m, r, 1n), n).operator.offset;
}

/**
 * Geometric series with fixed-width wraparound (mod 2^bits).
 */
export function wrappingGeomSeries(r: bigint, n: bigint, bits = 32): bigint {
  return geomSeries(r, n, 1n << BigInt(bits));
}
