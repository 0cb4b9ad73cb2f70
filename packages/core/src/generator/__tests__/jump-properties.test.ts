import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { GENERATOR_NAMES, createGenerator } from '../registry.js';

const seedArb = fc.array(fc.integer({ min: 0, max: 0xffff_ffff }), {
  minLength: 4,
  maxLength: 4,
});
const countArb = fc.bigInt({ min: 0n, max: (1n << 96n) - 1n });

describe('jump properties', () => {
  it.each(GENERATOR_NAMES.map((name) => ({ name })))(
    '$name: jump(a + b) = jump(b) ∘ jump(a)',
    ({ name }) => {
      fc.assert(
        fc.property(seedArb, countArb, countArb, (seed, a, b) => {
          const once = createGenerator(name, { seed });
          const twice = createGenerator(name, { seed });
          once.jump(a + b);
          twice.jump(a);
          twice.jump(b);
          expect(twice.getState()).toEqual(once.getState());
        }),
        { seed: 202_602, numRuns: 25 }
      );
    }
  );

  it.each(GENERATOR_NAMES.map((name) => ({ name })))(
    '$name: small jumps match repeated next()',
    ({ name }) => {
      fc.assert(
        fc.property(seedArb, fc.integer({ min: 0, max: 300 }), (seed, n) => {
          const jumped = createGenerator(name, { seed });
          const stepped = createGenerator(name, { seed });
          jumped.jump(n);
          for (let i = 0; i < n; i++) stepped.next();
          expect(jumped.getState()).toEqual(stepped.getState());
          expect(jumped.next()).toBe(stepped.next());
        }),
        { seed: 202_602, numRuns: 25 }
      );
    }
  );

  it.each(GENERATOR_NAMES.map((name) => ({ name })))(
    '$name: any seed normalizes to a state that never degenerates',
    ({ name }) => {
      fc.assert(
        fc.property(
          fc.oneof(
            seedArb,
            fc.constant([0, 0, 0, 0]),
            fc.bigInt({ min: -(1n << 130n), max: 1n << 130n })
          ),
          (seed) => {
            const rng = createGenerator(name, { seed });
            const restored = createGenerator(name);
            for (let i = 0; i < 20; i++) rng.next();
            restored.setState(rng.getState());
            expect(restored.getState()).toEqual(rng.getState());
            expect(rng.getState().some((w) => w !== 0)).toBe(true);
          }
        ),
        { seed: 202_602, numRuns: 25 }
      );
    }
  );
});
