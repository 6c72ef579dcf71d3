/**
 * @fileoverview Connect 4 - drop pieces, line up four.
 *
 * Importing this module registers the game with the global catalog.
 */

import { type GameManifest, validateManifest } from '@matchhall/framework-protocol';
import { type GameDefinition, globalCatalog } from '@matchhall/framework-server';
import { Connect4Game } from './game/Connect4Game.js';

/** Game identifier */
export const GAME_ID = 'connect4';

/** Human-readable game name */
export const GAME_NAME = 'Connect 4';

/** Game version */
export const GAME_VERSION = '1.0.0';

/** Game manifest for catalog registration */
export const GAME_MANIFEST: GameManifest = {
  id: GAME_ID,
  name: GAME_NAME,
  version: GAME_VERSION,
  description: 'Drop pieces into a 7x7 grid and line up four of your color',
  tags: ['board', 'two-player'],
  tracksScore: false,
  rules: {
    minPlayers: 2,
    maxPlayers: 2,
    maxSpectators: null,
    waitTimeMs: 0,
    timeoutPolicy: 'end_match',
    matchInactivityTimeoutMs: 600_000,
  },
};

export const GAME_DEFINITION: GameDefinition<Connect4Game> = {
  manifest: GAME_MANIFEST,
  create: (context) => new Connect4Game(context),
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
