/**
 * Configuration loading
 */

import type { Config } from '../schemas/config.js';
import { ConfigSchema, DEFAULT_CONFIG } from '../schemas/config.js';
import { formatValidationErrors } from '../schemas/index.js';

/**
 * Validate parsed configuration content
 * @throws Error listing every invalid field
 */
export function parseConfig(content: unknown): Config {
  const result = ConfigSchema.safeParse(content);
  if (!result.success) {
    throw new Error(`Invalid config: ${formatValidationErrors(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * Load configuration from file. A missing file yields the defaults.
 */
export async function loadConfig(configPath: string): Promise<Config> {
  const fs = await import('fs/promises');

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return DEFAULT_CONFIG;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(parsed);
}

