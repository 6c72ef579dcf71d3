/**
 * @fileoverview Catalog of playable games.
 *
 * Game packages register their definition on import, so adding a game
 * needs no change to the engine.
 */

import {
  type GameId,
  type GameManifest,
  UnknownGame,
  validateManifest,
} from '@matchhall/framework-protocol';
import type { AnyGame, GameFactory } from './GameContract.js';

/**
 * What a game package contributes: its manifest and a factory for matches.
 */
export interface GameDefinition<TGame extends AnyGame = AnyGame> {
  readonly manifest: GameManifest;
  readonly create: GameFactory<TGame>;
}

/**
 * Error thrown when trying to register a game with a duplicate ID.
 */
export class DuplicateGameError extends Error {
  constructor(gameId: GameId) {
    super(`Game already registered: ${gameId}`);
    this.name = 'DuplicateGameError';
  }
}

/**
 * Game catalog.
 *
 * @example
 * ```typescript
 * const catalog = new GameCatalog();
 * catalog.register({ manifest: CONNECT4_MANIFEST, create: (ctx) => new Connect4Game(ctx) });
 * const definition = catalog.get('connect4');
 * ```
 */
export class GameCatalog {
  private readonly games = new Map<GameId, GameDefinition>();

  /**
   * Register a game.
   * @throws {InvalidManifestError} if the manifest is invalid
   * @throws {DuplicateGameError} if a game with the same ID is registered
   */
  register(definition: GameDefinition): void {
    validateManifest(definition.manifest);

    if (this.games.has(definition.manifest.id)) {
      throw new DuplicateGameError(definition.manifest.id);
    }
    this.games.set(definition.manifest.id, definition);
  }

  /**
   * @throws {UnknownGame} if no game with this ID is registered
   */
  get(gameId: GameId): GameDefinition {
    const definition = this.games.get(gameId);
    if (!definition) {
      throw new UnknownGame(gameId);
    }
    return definition;
  }

  has(gameId: GameId): boolean {
    return this.games.has(gameId);
  }

  tryGet(gameId: GameId): GameDefinition | undefined {
    return this.games.get(gameId);
  }

  listIds(): GameId[] {
    return [...this.games.keys()];
  }

  listManifests(): GameManifest[] {
    return [...this.games.values()].map((definition) => definition.manifest);
  }

  get size(): number {
    return this.games.size;
  }

  /**
   * Remove every game. Primarily useful for testing.
   */
  clear(): void {
    this.games.clear();
  }
}

/**
 * Shared catalog game packages register themselves with.
 */
export const globalCatalog = new GameCatalog();
