/**
 * @fileoverview Game configuration loading from YAML.
 * Validates and caches configuration for the guessing game and its hosts.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';

/** Upper bound of the secret number when no configuration says otherwise */
export const DEFAULT_MAX_SECRET_NUMBER = 10;

const GameConfigSchema = z.object({
  game: z.object({
    maxSecretNumber: z.number().int().positive().default(DEFAULT_MAX_SECRET_NUMBER),
  }),
  server: z.object({
    wsPort: z.number().int().min(0).max(65535),
    httpPort: z.number().int().min(0).max(65535),
  }),
});

export type GameConfigYaml = z.infer<typeof GameConfigSchema>;

let cachedConfig: GameConfigYaml | null = null;

/**
 * Load and validate game configuration from YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/game.yaml relative to cwd (project root)
 */
export function loadGameConfig(): GameConfigYaml {
  if (cachedConfig) {
    return cachedConfig;
  }

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configPath = process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/game.yaml');

  const fileContents = readFileSync(configPath, 'utf8');
  const validated = parseGameConfig(parseYaml(fileContents) as unknown);
  cachedConfig = validated;
  return validated;
}

/**
 * Validate an already-parsed configuration object.
 * @throws {InvalidConfigurationError} if the object does not match the schema
 */
export function parseGameConfig(rawConfig: unknown): GameConfigYaml {
  const result = GameConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(issues);
  }
  return result.data;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
