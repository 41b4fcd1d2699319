import { z } from 'zod';
import { ConfigError, type EnvConfig } from '../shared/types';

const envConfigSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envConfigSchema.safeParse(env);

  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigError(`Missing or invalid environment variables: ${invalid}`);
  }

  return {
    log_level: result.data.LOG_LEVEL,
  };
}
