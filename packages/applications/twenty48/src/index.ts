/**
 * @fileoverview 2048 - slide and merge tiles until you reach the win tile.
 *
 * Importing this module registers the game with the global catalog.
 */

import { type GameManifest, validateManifest } from '@matchhall/framework-protocol';
import { type GameDefinition, globalCatalog } from '@matchhall/framework-server';
import type { z } from 'zod';
import { Twenty48Game } from './game/Twenty48Game.js';
import { Twenty48OptionsSchema } from './game/types.js';

/** Game identifier */
export const GAME_ID = 'twenty48';

/** Human-readable game name */
export const GAME_NAME = '2048';

/** Game version */
export const GAME_VERSION = '1.0.0';

/** Game manifest for catalog registration */
export const GAME_MANIFEST: GameManifest = {
  id: GAME_ID,
  name: GAME_NAME,
  version: GAME_VERSION,
  description: 'Slide numbered tiles on a 4x4 grid and merge them up to 2048',
  tags: ['puzzle', 'single-player'],
  tracksScore: true,
  rules: {
    minPlayers: 1,
    maxPlayers: 1,
    maxSpectators: 0,
    waitTimeMs: 0,
    timeoutPolicy: 'end_match',
    matchInactivityTimeoutMs: 60_000,
  },
};

/**
 * Build a definition with a custom win tile or continue-past-win mode.
 * @throws {ZodError} if the options are invalid
 */
export function createTwenty48Definition(
  options: z.input<typeof Twenty48OptionsSchema> = {}
): GameDefinition<Twenty48Game> {
  const parsed = Twenty48OptionsSchema.parse(options);
  return {
    manifest: GAME_MANIFEST,
    create: (context) => new Twenty48Game(context, parsed),
  };
}

export const GAME_DEFINITION = createTwenty48Definition();

/**
 * Register this game with the global catalog.
 * Safe to call multiple times (idempotent).
 */
export function registerGame(): void {
  if (!globalCatalog.has(GAME_ID)) {
    validateManifest(GAME_MANIFEST);
    globalCatalog.register(GAME_DEFINITION);
  }
}

// Auto-register when this module is imported
registerGame();

export * from './game/index.js';
