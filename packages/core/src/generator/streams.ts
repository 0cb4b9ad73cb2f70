import type { GeneratorName } from '../families/family.js';
import { ConfigError } from '../types/errors.js';
import {
  resolveStreamOptions,
  type StreamPartitionOptions,
} from '../types/options.js';
import type { RandomSource } from './generator.js';
import { createGenerator } from './registry.js';

/**
 * Create `count` generators seeded identically, stream i jumped
 * i·stride steps ahead. With the default stride, floor(period / count),
 * the streams walk disjoint stretches of one cycle.
 */
export function partitionStreams(
  name: GeneratorName | (string & {}),
  options: StreamPartitionOptions
): RandomSource[] {
  const resolved = resolveStreamOptions(options);
  const streams: RandomSource[] = [];

  for (let index = 0; index < resolved.count; index++) {
    const generator = createGenerator(name, {
      trace: resolved.trace,
      onTrace: resolved.onTrace,
    });
    generator.seed(resolved.seed);

    const stride = resolved.stride ?? generator.period / BigInt(resolved.count);
    if (stride === 0n && resolved.count > 1) {
      throw new ConfigError({
        message: `stride resolves to 0 for ${resolved.count} ${generator.name} streams`,
        context: { setting: 'stride', generator: generator.name, expected: 'integer >= 1' },
      });
    }
    generator.jump(BigInt(index) * stride);
    streams.push(generator);
  }
  return streams;
}
