import { CONG } from '../families/cong.js';
import {
  FamilyRecurrence,
  type GeneratorName,
  type Recurrence,
} from '../families/family.js';
import { LFSR113, LFSR88 } from '../families/lfsr.js';
import { MWC1, MWC2, MWC64 } from '../families/mwc.js';
import { SHR3 } from '../families/shr3.js';
import { ErrorCode } from '../errors/codes.js';
import { ConfigError, describeValue } from '../types/errors.js';
import type { GeneratorOptions } from '../types/options.js';
import { createKiss, createKiss2 } from './composite.js';
import { Generator, type RandomSource } from './generator.js';

const RECURRENCES: Record<GeneratorName, () => Recurrence> = {
  MWC1: () => new FamilyRecurrence(MWC1),
  MWC2: () => new FamilyRecurrence(MWC2),
  MWC64: () => new FamilyRecurrence(MWC64),
  Cong: () => new FamilyRecurrence(CONG),
  SHR3: () => new FamilyRecurrence(SHR3),
  LFSR88: () => new FamilyRecurrence(LFSR88),
  LFSR113: () => new FamilyRecurrence(LFSR113),
  KISS: createKiss,
  KISS2: createKiss2,
};

export const GENERATOR_NAMES: readonly GeneratorName[] = [
  'MWC1',
  'MWC2',
  'MWC64',
  'Cong',
  'SHR3',
  'LFSR88',
  'LFSR113',
  'KISS',
  'KISS2',
];

export function isGeneratorName(value: unknown): value is GeneratorName {
  return typeof value === 'string' && GENERATOR_NAMES.some((name) => name === value);
}

/**
 * Create a generator by name.
 *
 * @throws ConfigError (E301) for unknown names, (E300) for invalid options
 */
export function createGenerator(
  name: GeneratorName | (string & {}),
  options: GeneratorOptions = {}
): RandomSource {
  if (!isGeneratorName(name)) {
    throw new ConfigError({
      message: `Unknown generator ${describeValue(name)}; expected one of ${GENERATOR_NAMES.join(', ')}`,
      errorCode: ErrorCode.UNKNOWN_GENERATOR,
      context: {
        setting: 'name',
        expected: GENERATOR_NAMES.join('|'),
        received: describeValue(name),
      },
    });
  }
  return new Generator(RECURRENCES[name](), options);
}
