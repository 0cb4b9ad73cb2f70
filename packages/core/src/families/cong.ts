import { powerOf } from '../jump/engine.js';
import { AFFINE_ALGEBRA, affine, applyAffine } from '../jump/operator.js';
import { TWO_POW_32 } from '../util/modular.js';
import type { Family } from './family.js';

export const CONG_MULTIPLIER = 69069;
export const CONG_INCREMENT = 12345;

const CONG_OPERATOR = affine(
  TWO_POW_32,
  BigInt(CONG_MULTIPLIER),
  BigInt(CONG_INCREMENT)
);

/**
 * Linear congruential generator x' = 69069·x + 12345 (mod 2^32).
 * Full period from every state, so nothing is ever replaced.
 */
export const CONG: Family<number> = {
  name: 'Cong',
  seedLanes: 1,
  stateWords: 1,
  period: TWO_POW_32,
  defaultSeed: [0],
  normalize: (lanes) => ({ state: (lanes[0] ?? 0) >>> 0, replaced: false }),
  restore: (words) => ({ state: (words[0] ?? 0) >>> 0, replaced: false }),
  isValid: () => true,
  step(x) {
    const next = (Math.imul(CONG_MULTIPLIER, x) + CONG_INCREMENT) >>> 0;
    return { state: next, output: next };
  },
  jump(x, n) {
    const { operator, compositions } = powerOf(AFFINE_ALGEBRA, CONG_OPERATOR, n);
    return { state: Number(applyAffine(operator, BigInt(x))), compositions };
  },
  toWords: (x) => [x],
};
