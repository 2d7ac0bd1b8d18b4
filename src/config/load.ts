import dotenv from 'dotenv';
import { ValidationError } from '../core/errors.js';
import { configSchema, type AppConfig } from './schema.js';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH ?? '.env' });

/** Parses the environment into an AppConfig; the error lists every offending variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (result.success) return result.data;
  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ValidationError(`Config validation failed: ${issues.join('; ')}`, { issues });
}
