import type { z } from 'zod';

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Weights are accepted when their sum is within `tolerance` of 1.
 */
export function sumsToOne(values: readonly number[], tolerance = 1e-9): boolean {
  const total = values.reduce((sum, v) => sum + v, 0);
  return Math.abs(total - 1) <= tolerance;
}
