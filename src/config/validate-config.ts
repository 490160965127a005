import { z } from 'zod';

/**
 * Parses a slice of `process.env` with the given schema and fails fast on
 * startup, listing every offending variable.
 */
export function validateConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: NodeJS.ProcessEnv,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

export const booleanFromEnv = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');
