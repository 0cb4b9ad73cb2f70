import type { Family } from '../family.js';

export function stepTimes<S>(family: Family<S>, state: S, n: number): S {
  let current = state;
  for (let i = 0; i < n; i++) current = family.step(current).state;
  return current;
}

export function outputs<S>(family: Family<S>, state: S, n: number): number[] {
  const out: number[] = [];
  let current = state;
  for (let i = 0; i < n; i++) {
    const stepped = family.step(current);
    out.push(stepped.output);
    current = stepped.state;
  }
  return out;
}

export function words<S>(family: Family<S>, state: S): number[] {
  return family.toWords(state);
}

export const JUMP_DISTANCES = [0, 1, 2, 17, 10_000] as const;
