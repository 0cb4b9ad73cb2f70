import { powerOf } from '../jump/engine.js';
import {
  AFFINE_ALGEBRA,
  affine,
  applyAffine,
  type AffineOperator,
} from '../jump/operator.js';
import {
  isValidMwcLane,
  normalizeMwcLane,
  type Normalized,
} from '../seed/normalizer.js';
import { lcm, toU32 } from '../util/modular.js';
import type { Family, GeneratorName, Jumped, Stepped } from './family.js';

/**
 * One multiply-with-carry lane: x' = a·(x mod 2^h) + (x >> h).
 *
 * On canonical residues 1..m−1 with m = a·2^h − 1 this is exactly
 * x ↦ a·x (mod m), so m being prime makes jump a modular power.
 */
export interface MwcLane {
  readonly multiplier: bigint;
  readonly halfBits: number;
  readonly modulus: bigint;
  /** All-ones mask of the lane width (2h bits), used for bad-lane replacement. */
  readonly laneMask: bigint;
  /** Order of a modulo m: every valid lane lies on a cycle of this length. */
  readonly period: bigint;
  readonly operator: AffineOperator;
}

function mwcLane(multiplier: bigint, halfBits: number, period: bigint): MwcLane {
  const modulus = (multiplier << BigInt(halfBits)) - 1n;
  return {
    multiplier,
    halfBits,
    modulus,
    laneMask: (1n << BigInt(2 * halfBits)) - 1n,
    period,
    operator: affine(modulus, multiplier),
  };
}

// m and (m − 1)/2 are both prime for all three lanes, and a is a quadratic
// residue mod m, so the order of a is exactly (m − 1)/2.
export const MWC_UPPER_LANE = mwcLane(36969n, 16, (0x9068_ffffn - 1n) / 2n);
export const MWC_LOWER_LANE = mwcLane(18000n, 16, (0x464f_ffffn - 1n) / 2n);
export const MWC64_LANE = mwcLane(698769069n, 32, (0x29a6_5eac_ffff_ffffn - 1n) / 2n);

function jumpLane(lane: MwcLane, x: bigint, n: bigint): Jumped<bigint> {
  const { operator, compositions } = powerOf(AFFINE_ALGEBRA, lane.operator, n);
  return { state: applyAffine(operator, x), compositions };
}

// ============================================================================
// MWC1 / MWC2: two 16+16-bit lanes in 32-bit words
// ============================================================================

export interface TwoLaneState {
  readonly upper: number;
  readonly lower: number;
}

/** Lane step on plain numbers, for lanes whose 2h bits fit a uint32. */
function narrowStep(lane: MwcLane): (x: number) => number {
  const a = Number(lane.multiplier);
  const h = lane.halfBits;
  const low = (1 << h) - 1;
  return (x) => a * (x & low) + (x >>> h);
}

const stepUpper = narrowStep(MWC_UPPER_LANE);
const stepLower = narrowStep(MWC_LOWER_LANE);

function normalizeTwoLane(lanes: readonly number[]): Normalized<TwoLaneState> {
  const upper = normalizeMwcLane(
    BigInt(lanes[0] ?? 0),
    MWC_UPPER_LANE.modulus,
    MWC_UPPER_LANE.laneMask
  );
  const lower = normalizeMwcLane(
    BigInt(lanes[1] ?? 0),
    MWC_LOWER_LANE.modulus,
    MWC_LOWER_LANE.laneMask
  );
  return {
    state: { upper: Number(upper.state), lower: Number(lower.state) },
    replaced: upper.replaced || lower.replaced,
  };
}

function twoLaneFamily(
  name: GeneratorName,
  output: (state: TwoLaneState) => number
): Family<TwoLaneState> {
  return {
    name,
    seedLanes: 2,
    stateWords: 2,
    period: lcm(MWC_UPPER_LANE.period, MWC_LOWER_LANE.period),
    defaultSeed: [0, 0],
    normalize: normalizeTwoLane,
    restore: normalizeTwoLane,
    isValid: (state) =>
      isValidMwcLane(BigInt(state.upper), MWC_UPPER_LANE.modulus) &&
      isValidMwcLane(BigInt(state.lower), MWC_LOWER_LANE.modulus),
    step(state): Stepped<TwoLaneState> {
      const next = {
        upper: stepUpper(state.upper),
        lower: stepLower(state.lower),
      };
      return { state: next, output: output(next) };
    },
    jump(state, n): Jumped<TwoLaneState> {
      const upper = jumpLane(MWC_UPPER_LANE, BigInt(state.upper), n);
      const lower = jumpLane(MWC_LOWER_LANE, BigInt(state.lower), n);
      return {
        state: { upper: Number(upper.state), lower: Number(lower.state) },
        compositions: upper.compositions + lower.compositions,
      };
    },
    toWords: (state) => [state.upper, state.lower],
  };
}

export const MWC1: Family<TwoLaneState> = twoLaneFamily(
  'MWC1',
  (s) => (s.lower + (s.upper << 16)) >>> 0
);

export const MWC2: Family<TwoLaneState> = twoLaneFamily(
  'MWC2',
  (s) => (s.lower + (s.upper << 16) + (s.upper >>> 16)) >>> 0
);

// ============================================================================
// MWC64: one 32+32-bit lane in a 64-bit word
// ============================================================================

const WIDE_HALF = BigInt(MWC64_LANE.halfBits);
const WIDE_LOW = (1n << WIDE_HALF) - 1n;

function normalizeWide(words: readonly number[]): Normalized<bigint> {
  const packed = (BigInt(words[0] ?? 0) << 32n) ^ BigInt(words[1] ?? 0);
  return normalizeMwcLane(packed, MWC64_LANE.modulus, MWC64_LANE.laneMask);
}

export const MWC64: Family<bigint> = {
  name: 'MWC64',
  seedLanes: 2,
  stateWords: 2,
  period: MWC64_LANE.period,
  defaultSeed: [0, 0],
  normalize: normalizeWide,
  restore: normalizeWide,
  isValid: (x) => isValidMwcLane(x, MWC64_LANE.modulus),
  step(x) {
    const next = MWC64_LANE.multiplier * (x & WIDE_LOW) + (x >> WIDE_HALF);
    return { state: next, output: toU32(next) };
  },
  jump: (x, n) => jumpLane(MWC64_LANE, x, n),
  toWords: (x) => [toU32(x >> 32n), toU32(x)],
};
