import { z } from 'zod';
import { DigestError, type EnvConfig } from '../shared/types';

const envConfigSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ARXIV_DIGEST_ROOT: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined)),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envConfigSchema.safeParse(env);

  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new DigestError({
      code: 'E102',
      severity: 'high',
      message: `Invalid environment variables: ${invalid}`,
    });
  }

  return {
    log_level: result.data.LOG_LEVEL,
    project_root: result.data.ARXIV_DIGEST_ROOT,
  };
}
