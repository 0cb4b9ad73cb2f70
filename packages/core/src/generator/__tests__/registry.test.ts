import { describe, it, expect } from 'vitest';
import { GENERATOR_NAMES, createGenerator, isGeneratorName } from '../registry.js';
import { ConfigError } from '../../types/errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('generator registry', () => {
  it('lists every generator once', () => {
    expect(GENERATOR_NAMES).toEqual([
      'MWC1',
      'MWC2',
      'MWC64',
      'Cong',
      'SHR3',
      'LFSR88',
      'LFSR113',
      'KISS',
      'KISS2',
    ]);
  });

  it.each(GENERATOR_NAMES.map((name) => ({ name })))('creates $name', ({ name }) => {
    const rng = createGenerator(name);
    expect(rng.name).toBe(name);
    expect(rng.getState()).toHaveLength(rng.stateWords);
  });

  it('returns independent instances', () => {
    const a = createGenerator('KISS', { seed: 1 });
    const b = createGenerator('KISS', { seed: 1 });
    a.next();
    expect(a.getState()).not.toEqual(b.getState());
  });

  it('isGeneratorName', () => {
    expect(isGeneratorName('LFSR113')).toBe(true);
    expect(isGeneratorName('lfsr113')).toBe(false);
    expect(isGeneratorName(42)).toBe(false);
  });

  it('rejects unknown names', () => {
    let caught: unknown;
    try {
      createGenerator('SHR3-1999');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.errorCode).toBe(ErrorCode.UNKNOWN_GENERATOR);
      expect(caught.setting).toBe('name');
      expect(caught.message).toBe(
        'Unknown generator "SHR3-1999"; expected one of MWC1, MWC2, MWC64, Cong, SHR3, LFSR88, LFSR113, KISS, KISS2'
      );
    }
  });

  it('rejects invalid options', () => {
    expect(() => createGenerator('Cong', { jumpAhead: -1 })).toThrow(ConfigError);
  });
});
