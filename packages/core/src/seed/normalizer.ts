import { InvalidArgumentError, describeValue } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import { U32_MASK, mod } from '../util/modular.js';

/**
 * Raw seed accepted by `seed()`: a scalar integer, or one value per lane.
 *
 * A scalar fills lanes least-significant word first, so its low 32 bits land
 * in lane 0. MWC64 packs lane 0 as the high half of its 64-bit state:
 * `seed(5)` yields the state 5·2^32 (`getState()` is `[5, 0]`). Pass
 * `[0, 5]` for the state 5.
 */
export type SeedInput = number | bigint | readonly (number | bigint)[];

/** Lane values after normalization, plus whether anything was replaced. */
export interface Normalized<S> {
  state: S;
  replaced: boolean;
}

// ============================================================================
// RAW SEED → LANES
// ============================================================================

function toBigIntTruncated(value: number | bigint): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isFinite(value)) return 0n;
  return BigInt(Math.trunc(value));
}

/**
 * Low 32 bits of any integer (two's complement for negatives). Non-finite
 * numbers map to 0 and fractions are truncated toward zero.
 */
export function truncateToU32(value: number | bigint): number {
  return Number(toBigIntTruncated(value) & U32_MASK);
}

/**
 * Spread a raw seed over `lanes` uint32 lanes.
 *
 * - scalar: split into 32-bit words, least-significant word first
 * - array: one entry per lane; missing lanes are 0, extra entries ignored
 */
export function toSeedLanes(raw: SeedInput, lanes: number): number[] {
  const out = new Array<number>(lanes).fill(0);
  if (typeof raw === 'number' || typeof raw === 'bigint') {
    let v = toBigIntTruncated(raw);
    for (let i = 0; i < lanes; i++) {
      out[i] = Number(v & U32_MASK);
      v >>= 32n;
    }
    return out;
  }
  for (let i = 0; i < lanes && i < raw.length; i++) {
    const entry = raw[i];
    out[i] = entry === undefined ? 0 : truncateToU32(entry);
  }
  return out;
}

// ============================================================================
// STATE TUPLES
// ============================================================================

/**
 * Reject state tuples of the wrong length or with words outside uint32.
 * Truncating silently would restore a different generator than was saved.
 */
export function assertStateWords(
  words: unknown,
  expected: number,
  generator: string
): asserts words is readonly number[] {
  if (!Array.isArray(words)) {
    throw new InvalidArgumentError({
      message: `${generator} state must be an array of ${expected} uint32 words`,
      errorCode: ErrorCode.INVALID_STATE_SHAPE,
      context: {
        generator,
        argument: 'words',
        expected: `array(${expected})`,
        received: describeValue(words),
      },
    });
  }
  if (words.length !== expected) {
    throw new InvalidArgumentError({
      message: `${generator} state must have exactly ${expected} words, got ${words.length}`,
      errorCode: ErrorCode.INVALID_STATE_SHAPE,
      context: {
        generator,
        argument: 'words',
        expected: `array(${expected})`,
        received: `array(${words.length})`,
      },
    });
  }
  words.forEach((word: unknown, index: number) => {
    if (
      typeof word !== 'number' ||
      !Number.isInteger(word) ||
      word < 0 ||
      word > 0xffff_ffff
    ) {
      throw new InvalidArgumentError({
        message: `${generator} state word ${index} is not a uint32: ${describeValue(word)}`,
        errorCode: ErrorCode.INVALID_STATE_SHAPE,
        context: {
          generator,
          argument: 'words',
          index,
          expected: 'integer in [0, 2^32)',
          received: describeValue(word),
        },
      });
    }
  });
}

// ============================================================================
// BAD-STATE PREDICATES AND REPLACEMENTS
// ============================================================================

/**
 * Multiply-with-carry lane modulo m = a·2^h − 1.
 *
 * The residue class 0 is absorbing: 0 ↦ 0 and m ↦ m are fixed points, and
 * every other multiple of m falls into one of them. Valid lanes are the
 * canonical residues 1..m−1.
 */
export function isValidMwcLane(x: bigint, modulus: bigint): boolean {
  return x >= 1n && x < modulus;
}

/**
 * Reduce a raw lane mod m; a zero residue is replaced by
 * (x XOR fullMask) mod m, which is non-zero for every multiple of m that
 * fits in the lane width.
 */
export function normalizeMwcLane(
  x: bigint,
  modulus: bigint,
  fullMask: bigint
): Normalized<bigint> {
  const reduced = mod(x, modulus);
  if (reduced !== 0n) {
    return { state: reduced, replaced: false };
  }
  return { state: mod(x ^ fullMask, modulus), replaced: true };
}

/** xorshift: 0 is the only fixed point. */
export const XORSHIFT_ZERO_REPLACEMENT = 0xffff_ffff;

export function normalizeXorshiftWord(x: number): Normalized<number> {
  return x === 0
    ? { state: XORSHIFT_ZERO_REPLACEMENT, replaced: true }
    : { state: x >>> 0, replaced: false };
}

/**
 * Tausworthe seed spreading: z = s XOR (s << 16).
 */
export function spreadLfsrSeed(seed: number): number {
  return (seed ^ (seed << 16)) >>> 0;
}

/**
 * A Tausworthe component whose bits above the discarded low bits are all
 * zero (z < min) collapses to 0 on the next step; it is replaced by its
 * complement.
 */
export function isValidLfsrComponent(z: number, min: number): boolean {
  return z >>> 0 >= min;
}

export function normalizeLfsrComponent(z: number, min: number): Normalized<number> {
  return isValidLfsrComponent(z, min)
    ? { state: z >>> 0, replaced: false }
    : { state: (z ^ 0xffff_ffff) >>> 0, replaced: true };
}
