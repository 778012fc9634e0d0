import { z } from 'zod';
import { ValidationError } from '@converge/proto';
import { DEFAULT_CONCURRENCY } from '@converge/engine';
import { DEFAULT_RETRY_POLICY } from '@converge/connectors';

const positiveInt = z.coerce.number().int().min(1);

export const envSchema = z.object({
  /** Base URL of the flow host, e.g. http://localhost:8123 */
  CONVERGE_HOST_URL: z.string().url().optional(),
  /** Bearer token for the flow host */
  CONVERGE_HOST_TOKEN: z.string().min(1).optional(),
  /** JSON lock file holding the state */
  CONVERGE_STATE: z.string().min(1).optional(),
  CONVERGE_CONCURRENCY: positiveInt.default(DEFAULT_CONCURRENCY),
  /** Per stepper call; unset means no timeout */
  CONVERGE_TIMEOUT_MS: positiveInt.optional(),
  CONVERGE_RETRY_ATTEMPTS: positiveInt.default(DEFAULT_RETRY_POLICY.maxAttempts),
});

export type ConvergeEnv = z.infer<typeof envSchema>;

/**
 * Validate converge settings from an environment map. Empty values count as unset.
 */
export function parseEnv(source: Record<string, string | undefined>): ConvergeEnv {
  const values: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }

  const result = envSchema.safeParse(values);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid environment: ${issues.join('; ')}`, {
      source: 'env',
      field: result.error.issues[0]?.path.join('.'),
    });
  }
  return result.data;
}
