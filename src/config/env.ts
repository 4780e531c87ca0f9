import { config } from 'dotenv';
import { z } from 'zod';
import { formatZodIssues } from '../utils/validation';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DEDUP_THRESHOLD: z.string().default('0.85').transform(Number),
  DEDUP_MAX_PAIRS: z.string().default('1000').transform(Number),
  DEDUP_MAX_COMMITS: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? undefined : Number(value))),
  DEDUP_BLOCKING: z.enum(['domain', 'initials', 'both']).default('both'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(`Environment validation failed:\n${formatZodIssues(error).join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
