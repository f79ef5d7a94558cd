import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigurationError } from '../../domain/index.js';
import { streamingConfigSchema } from '../../application/config-schema.js';
import type { StreamingConfig } from '../../application/config-schema.js';

/**
 * Validates an already-parsed config object.
 * Zod issues are flattened into one `ConfigurationError` message.
 */
export function parseStreamingConfig(raw: unknown): StreamingConfig {
  const result = streamingConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(`Invalid streaming config: ${details}`);
  }
  return result.data;
}

/**
 * Loads and validates the JSON config file.
 *
 * A missing file, invalid JSON or a failed schema check all surface as
 * `ConfigurationError` so startup can abort with a single message.
 */
export function loadStreamingConfig(configPath: string): StreamingConfig {
  const filePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigurationError(`Cannot read config file ${filePath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON`, { cause: err });
  }

  return parseStreamingConfig(raw);
}
