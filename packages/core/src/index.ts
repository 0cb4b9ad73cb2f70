// @leaprand/core entry point
//
// Public API:
// - createGenerator() / partitionStreams() return RandomSource instances for the
//   nine generators (MWC1, MWC2, MWC64, Cong, SHR3, LFSR88, LFSR113, KISS, KISS2).
// - Re-exports the building blocks (modular arithmetic, GF(2) matrices, transition
//   operators, jump engine, family descriptors) for callers composing their own
//   recurrences.

// Generators
export {
  createGenerator,
  GENERATOR_NAMES,
  isGeneratorName,
} from './generator/registry.js';
export { Generator, type RandomSource } from './generator/generator.js';
export { partitionStreams } from './generator/streams.js';
export {
  CompositeRecurrence,
  createKiss,
  createKiss2,
  type CompositePart,
  type ComponentLabel,
} from './generator/composite.js';

// Families
export {
  FamilyRecurrence,
  type Family,
  type GeneratorName,
  type Jumped,
  type Recurrence,
  type Stepped,
} from './families/family.js';
export {
  MWC1,
  MWC2,
  MWC64,
  MWC_UPPER_LANE,
  MWC_LOWER_LANE,
  MWC64_LANE,
  type MwcLane,
  type TwoLaneState,
} from './families/mwc.js';
export { CONG, CONG_MULTIPLIER, CONG_INCREMENT } from './families/cong.js';
export {
  SHR3,
  SHR3_SHIFTS,
  isFullPeriodXorshift,
  primeFactors,
  xorshiftMatrix,
  type XorshiftTriple,
} from './families/shr3.js';
export {
  LFSR88,
  LFSR113,
  LFSR88_COMPONENTS,
  LFSR113_COMPONENTS,
  componentMatrix,
  type TauswortheComponent,
} from './families/lfsr.js';

// Seeding
export {
  toSeedLanes,
  truncateToU32,
  type Normalized,
  type SeedInput,
} from './seed/normalizer.js';

// Jump engine
export { powerOf, bitLength, type JumpPlan } from './jump/engine.js';
export {
  affine,
  linearGf2,
  applyAffine,
  applyLinear,
  AFFINE_ALGEBRA,
  GF2_ALGEBRA,
  TRANSITION_ALGEBRA,
  type AffineOperator,
  type LinearGf2Operator,
  type OperatorAlgebra,
  type TransitionOperator,
} from './jump/operator.js';
export { geomSeries, wrappingGeomSeries } from './jump/series.js';

// Arithmetic
export {
  mod,
  mulMod,
  addMod,
  powMod,
  wrappingPow,
  gcd,
  lcm,
} from './util/modular.js';
export { BitMatrix } from './util/bit-matrix.js';

// Options and tracing
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  resolveStreamOptions,
  validateOptions,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
  type StreamPartitionOptions,
} from './types/options.js';
export {
  formatTraceEvent,
  type TraceEvent,
  type TraceSink,
} from './util/trace.js';

// Errors
export { ErrorCode, getErrorTitle, type Severity } from './errors/codes.js';
export {
  LeapRandError,
  InvalidArgumentError,
  ConfigError,
  InternalError,
  isLeapRandError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
