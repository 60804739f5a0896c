import { EnvConfigSchema, type EnvConfig } from '@klinecheck/schemas';
import { InvalidArgumentError } from '../errors/kline-errors';

/**
 * Validate environment variables into the runtime configuration.
 *
 * Unlike a service bootstrap this never exits the process: the entry point
 * decides what an invalid environment means.
 *
 * @param env - Variables to read (default: process.env)
 * @throws InvalidArgumentError listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid environment variables: ${issues}`);
  }
  return result.data;
}
