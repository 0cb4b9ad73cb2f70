import { BitMatrix } from '../util/bit-matrix.js';
import { mod } from '../util/modular.js';
import { InternalError, InvalidArgumentError } from '../types/errors.js';

/**
 * `x ↦ multiplier·x + offset (mod modulus)`.
 * Multiplicative recurrences use offset 0.
 */
export interface AffineOperator {
  readonly kind: 'affine';
  readonly modulus: bigint;
  readonly multiplier: bigint;
  readonly offset: bigint;
}

/** `x ↦ M·x` over GF(2). */
export interface LinearGf2Operator {
  readonly kind: 'gf2';
  readonly matrix: BitMatrix;
}

/**
 * One step of a recurrence, closed under composition.
 */
export type TransitionOperator = AffineOperator | LinearGf2Operator;

/**
 * Minimal capability the jump engine needs from an operator representation.
 */
export interface OperatorAlgebra<Op> {
  /** Identity with the same shape (modulus / width) as `like`. */
  identity(like: Op): Op;
  /** `outer ∘ inner`: apply `inner` first. */
  compose(outer: Op, inner: Op): Op;
}

export function affine(
  modulus: bigint,
  multiplier: bigint,
  offset = 0n
): AffineOperator {
  if (modulus < 1n) {
    throw new InvalidArgumentError({
      message: 'Affine operator modulus must be positive',
      context: { argument: 'modulus', received: modulus.toString() },
    });
  }
  return {
    kind: 'affine',
    modulus,
    multiplier: mod(multiplier, modulus),
    offset: mod(offset, modulus),
  };
}

export function linearGf2(matrix: BitMatrix): LinearGf2Operator {
  return { kind: 'gf2', matrix };
}

export function applyAffine(op: AffineOperator, x: bigint): bigint {
  return mod(op.multiplier * x + op.offset, op.modulus);
}

export function applyLinear(op: LinearGf2Operator, x: number): number {
  return op.matrix.dotVec(x);
}

function composeAffine(outer: AffineOperator, inner: AffineOperator): AffineOperator {
  if (outer.modulus !== inner.modulus) {
    throw new InternalError('Cannot compose affine operators with different moduli', {
      expected: outer.modulus.toString(),
      received: inner.modulus.toString(),
    });
  }
  const m = outer.modulus;
  return {
    kind: 'affine',
    modulus: m,
    multiplier: (outer.multiplier * inner.multiplier) % m,
    offset: (outer.multiplier * inner.offset + outer.offset) % m,
  };
}

export const AFFINE_ALGEBRA: OperatorAlgebra<AffineOperator> = {
  identity: (like) => ({
    kind: 'affine',
    modulus: like.modulus,
    multiplier: 1n % like.modulus,
    offset: 0n,
  }),
  compose: composeAffine,
};

export const GF2_ALGEBRA: OperatorAlgebra<LinearGf2Operator> = {
  identity: (like) => linearGf2(BitMatrix.identity(like.matrix.width)),
  compose: (outer, inner) => linearGf2(outer.matrix.mul(inner.matrix)),
};

/**
 * Algebra over the tagged union; both operands must be the same kind.
 */
export const TRANSITION_ALGEBRA: OperatorAlgebra<TransitionOperator> = {
  identity(like) {
    return like.kind === 'affine'
      ? AFFINE_ALGEBRA.identity(like)
      : GF2_ALGEBRA.identity(like);
  },
  compose(outer, inner) {
    if (outer.kind === 'affine' && inner.kind === 'affine') {
      return AFFINE_ALGEBRA.compose(outer, inner);
    }
    if (outer.kind === 'gf2' && inner.kind === 'gf2') {
      return GF2_ALGEBRA.compose(outer, inner);
    }
    throw new InternalError('Cannot compose operators of different kinds', {
      expected: outer.kind,
      received: inner.kind,
    });
  },
};
