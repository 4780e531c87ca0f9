import { z } from 'zod';
import { env } from '../../config/env';
import { ConfigurationError } from '../../utils/errors';
import { formatZodIssues, isUnitInterval, sumsToOne } from '../../utils/validation';
import { DEFAULT_CONFIG, type DedupConfig } from './types';

const weightsSchema = z
  .object({
    name: z.number().min(0),
    emailLocal: z.number().min(0),
    domain: z.number().min(0),
    initials: z.number().min(0),
  })
  .refine((weights) => sumsToOne(Object.values(weights)), {
    message: 'Signal weights must sum to 1',
  });

const dedupConfigSchema = z.object({
  threshold: z.number().refine(isUnitInterval, 'Threshold must be between 0 and 1'),
  maxPairs: z.number().int().positive(),
  maxCommits: z.number().int().positive().optional(),
  blocking: z.enum(['domain', 'initials', 'both']),
  weights: weightsSchema,
});

export type DedupConfigInput = Partial<DedupConfig>;

/**
 * Merge overrides onto the defaults and validate the result.
 * This is the only place the engine raises on bad input.
 */
export function parseDedupConfig(input: DedupConfigInput = {}): DedupConfig {
  // An override left undefined keeps the default
  const overrides = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
  const result = dedupConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });

  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid dedup configuration:\n${issues.join('\n')}`, issues);
  }

  return result.data;
}

/**
 * Config derived from DEDUP_* environment variables.
 */
export function getDefaultDedupConfig(): DedupConfig {
  return parseDedupConfig({
    threshold: env.DEDUP_THRESHOLD,
    maxPairs: env.DEDUP_MAX_PAIRS,
    maxCommits: env.DEDUP_MAX_COMMITS,
    blocking: env.DEDUP_BLOCKING,
  });
}
