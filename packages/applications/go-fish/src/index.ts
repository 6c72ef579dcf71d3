/**
 * @fileoverview Go Fish - ask for ranks, collect books of four.
 *
 * Importing this module registers the game with the global catalog.
 */

import { type GameManifest, validateManifest } from '@matchhall/framework-protocol';
import { type GameDefinition, globalCatalog } from '@matchhall/framework-server';
import { GoFishGame } from './game/GoFishGame.js';

/** Game identifier */
export const GAME_ID = 'go-fish';

/** Human-readable game name */
export const GAME_NAME = 'Go Fish';

/** Game version */
export const GAME_VERSION = '1.0.0';

/** Game manifest for catalog registration */
export const GAME_MANIFEST: GameManifest = {
  id: GAME_ID,
  name: GAME_NAME,
  version: GAME_VERSION,
  description: 'Ask the other players for ranks and collect the most books of four',
  tags: ['cards', 'multiplayer'],
  tracksScore: false,
  rules: {
    minPlayers: 2,
    maxPlayers: 4,
    maxSpectators: null,
    waitTimeMs: 30_000,
    timeoutPolicy: 'drop_participant',
    matchInactivityTimeoutMs: 600_000,
  },
};

export const GAME_DEFINITION: GameDefinition<GoFishGame> = {
  manifest: GAME_MANIFEST,
  create: (context) => new GoFishGame(context),
};

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
