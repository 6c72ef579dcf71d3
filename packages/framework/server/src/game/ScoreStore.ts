import type { GameId, Identity } from '@matchhall/framework-protocol';

/**
 * Persistence for per-player best scores of score-tracking games.
 */
export interface ScoreStore {
  /** Best recorded score, 0 when none */
  getBest(gameId: GameId, identity: Identity): Promise<number>;
  setBest(gameId: GameId, identity: Identity, score: number): Promise<void>;
}

/**
 * Process-local score store.
 */
export class InMemoryScoreStore implements ScoreStore {
  private readonly best = new Map<string, number>();

  async getBest(gameId: GameId, identity: Identity): Promise<number> {
    return this.best.get(this.key(gameId, identity)) ?? 0;
  }

  async setBest(gameId: GameId, identity: Identity, score: number): Promise<void> {
    this.best.set(this.key(gameId, identity), score);
  }

  private key(gameId: GameId, identity: Identity): string {
    return `${gameId}\u0000${identity}`;
  }
}
