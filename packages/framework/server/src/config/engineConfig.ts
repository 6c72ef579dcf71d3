/**
 * @fileoverview Engine configuration loading from YAML.
 * Validates and caches configuration for lobbies, matches and the dispatcher.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { LobbyRules } from '@matchhall/framework-protocol';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createLogger } from '../logger.js';

const log = createLogger('config');

// Per-game overrides: any subset of the lobby rules a manifest declares
const GameOverrideSchema = z
  .object({
    minPlayers: z.number().int().positive(),
    maxPlayers: z.number().int().positive().nullable(),
    maxSpectators: z.number().int().min(0).nullable(),
    waitTimeMs: z.number().int().min(0),
    timeoutPolicy: z.enum(['end_match', 'forfeit', 'drop_participant']),
    matchInactivityTimeoutMs: z.number().int().positive(),
  })
  .partial()
  .strict();

const EngineConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  lobby: z
    .object({
      inactivityTimeoutMs: z.number().int().positive(),
    })
    .default({ inactivityTimeoutMs: 600_000 }),
  server: z
    .object({
      port: z.number().int().min(0).max(65535),
    })
    .default({ port: 3001 }),
  games: z.record(z.string(), GameOverrideSchema).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type GameOverride = z.infer<typeof GameOverrideSchema>;

/**
 * Configuration used when no file is loaded.
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

let cachedConfig: EngineConfig | null = null;

/**
 * Validate an already-parsed configuration object.
 * @throws {Error} if the object does not match the schema
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  try {
    return EngineConfigSchema.parse(raw ?? {});
  } catch (error) {
    if (error instanceof z.ZodError) {
      log.error('Invalid engine configuration', { issues: error.issues });
      throw new Error(`Invalid engine configuration: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Load and validate engine configuration from a YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - the explicit path argument if given
 * - ENGINE_CONFIG_PATH environment variable if set
 * - Otherwise from ./config/engine.yaml relative to cwd (project root)
 */
export function loadEngineConfig(path?: string): EngineConfig {
  if (cachedConfig && path === undefined) {
    return cachedConfig;
  }

  const configPath =
    path ??
    // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
    process.env['ENGINE_CONFIG_PATH'] ??
    join(process.cwd(), 'config/engine.yaml');

  const fileContents = readFileSync(configPath, 'utf8');
  const config = parseEngineConfig(parseYaml(fileContents) as unknown);
  log.info('Engine configuration loaded', { configPath, games: Object.keys(config.games) });

  if (path === undefined) {
    cachedConfig = config;
  }
  return config;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Apply a configured override on top of the rules a game declares.
 */
export function applyGameOverride(rules: LobbyRules, override: GameOverride | undefined): LobbyRules {
  if (!override) return rules;
  const merged: LobbyRules = { ...rules, ...override };
  if (merged.maxPlayers !== null && merged.maxPlayers < merged.minPlayers) {
    throw new Error(
      `Invalid override: maxPlayers ${merged.maxPlayers} is below minPlayers ${merged.minPlayers}`
    );
  }
  return merged;
}
