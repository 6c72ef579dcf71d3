/**
 * @fileoverview Numguess - find the secret number in a limited number of tries.
 *
 * Importing this module registers the game with the global catalog.
 */

import { type GameManifest, validateManifest } from '@matchhall/framework-protocol';
import { type GameDefinition, globalCatalog } from '@matchhall/framework-server';
import type { z } from 'zod';
import { NumguessGame } from './game/NumguessGame.js';
import { NumguessOptionsSchema } from './game/types.js';

/** Game identifier */
export const GAME_ID = 'numguess';

/** Human-readable game name */
export const GAME_NAME = 'Number Guessing';

/** Game version */
export const GAME_VERSION = '1.0.0';

/** Game manifest for catalog registration */
export const GAME_MANIFEST: GameManifest = {
  id: GAME_ID,
  name: GAME_NAME,
  version: GAME_VERSION,
  description: 'Guess a number between 1 and 100 before your tries run out',
  tags: ['puzzle', 'single-player'],
  tracksScore: false,
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
 * Build a definition with a custom number of tries.
 * @throws {ZodError} if the options are invalid
 */
export function createNumguessDefinition(
  options: z.input<typeof NumguessOptionsSchema> = {}
): GameDefinition<NumguessGame> {
  const parsed = NumguessOptionsSchema.parse(options);
  return {
    manifest: GAME_MANIFEST,
    create: (context) => new NumguessGame(context, parsed),
  };
}

export const GAME_DEFINITION = createNumguessDefinition();

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
