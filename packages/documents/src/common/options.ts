import { z } from 'zod';
import { defaultRandomSource } from '@brdocs/shared';
import type { RandomOption, RandomSource } from '@brdocs/contracts';

/**
 * `formatted` flag shared by every generator
 */
export const formattedOption = z.boolean().default(true);

/**
 * Base schema for generators that take only `formatted`
 */
export const formatOnlySchema = z.object({ formatted: formattedOption });

/**
 * Random source requested by the caller, or the default one.
 */
export function resolveRandom(options: RandomOption | undefined): RandomSource {
  return options?.random ?? defaultRandomSource;
}
