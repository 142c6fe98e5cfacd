import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { SessionConfigSchema, type SessionConfig } from './schema.js';

/**
 * Validate raw configuration and fill defaults. The result is deeply frozen.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadConfig(raw: unknown, source?: string): SessionConfig {
  const parsed = SessionConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigurationError.fromZod(parsed.error, source);
  }
  return deepFreeze(parsed.data);
}

/**
 * Read a JSON configuration file.
 */
export async function loadConfigFile(path: string): Promise<SessionConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read configuration file ${path}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid JSON in ${path}: ${message}`);
  }
  return loadConfig(raw, path);
}
