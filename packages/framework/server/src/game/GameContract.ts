/**
 * @fileoverview Lifecycle contract every concrete turn-based game implements.
 *
 * The contract surface is `update`, `hasEnded` and `winner`. The base class
 * adds what the engine needs around it: turn checks, move parsing, the
 * per-match event channel, and the timeout policy.
 */

import {
  type GameId,
  type GameOverEvent,
  type Identity,
  IllegalMove,
  InvariantViolation,
  type LobbyRules,
  type MatchEndReason,
  type MatchEvent,
  type MatchId,
  NotInMatch,
  NotYourTurn,
  type Outcome,
} from '@matchhall/framework-protocol';
import type { z } from 'zod';
import type { BroadcastChannel } from '../channel/BroadcastChannel.js';

/**
 * Everything a game factory receives when a match starts.
 */
export interface MatchContext {
  readonly matchId: MatchId;
  readonly gameId: GameId;
  /** Popped players, in join order */
  readonly players: readonly Identity[];
  readonly spectators: readonly Identity[];
  /** Per-match channel the game publishes its events on */
  readonly events: BroadcastChannel<MatchEvent>;
  /** Effective rules (manifest plus configured overrides) */
  readonly rules: LobbyRules;
  /** Uniform random source in [0, 1) */
  readonly random: () => number;
}

export type DepartureReason = 'timed_out' | 'left';

export abstract class GameContract<TMove, TResult = void, TBoard = unknown> {
  /** Validates raw moves coming from the dispatcher */
  abstract readonly moveSchema: z.ZodType<TMove, z.ZodTypeDef, unknown>;

  private readonly active: Identity[];
  private readonly departed = new Map<Identity, DepartureReason>();
  private abortedBy: Exclude<MatchEndReason, 'completed'> | null = null;
  private announced = false;

  constructor(protected readonly context: MatchContext) {
    this.active = [...context.players];
  }

  // ============ Contract Surface ============

  /**
   * Apply a move for the player whose turn it is.
   * @throws {InvariantViolation} if the game has already ended
   */
  update(move: TMove): TResult {
    if (this.hasEnded()) {
      throw new InvariantViolation(`update() called on ended match ${this.context.matchId}`);
    }
    return this.applyMove(move);
  }

  hasEnded(): boolean {
    return this.abortedBy !== null || this.isFinished();
  }

  /**
   * Outcome for one player (the first player when omitted).
   */
  winner(player?: Identity): Outcome {
    const subject = player ?? this.context.players[0];
    if (subject === undefined) {
      throw new InvariantViolation(`match ${this.context.matchId} has no players`);
    }
    if (!this.hasEnded()) return 'not_over';
    if (this.departed.has(subject)) return 'drawn_or_lost';

    switch (this.abortedBy) {
      case 'timeout':
        return 'drawn_or_lost';
      case 'forfeit':
        return 'won';
      default:
        return this.outcomeFor(subject);
    }
  }

  // ============ Game-specific Hooks ============

  protected abstract applyMove(move: TMove): TResult;

  /** Whether the game reached its natural end */
  protected abstract isFinished(): boolean;

  /** Outcome of a naturally ended game for a player still in it */
  protected abstract outcomeFor(player: Identity): Outcome;

  /** Player expected to move next, or null when anyone may move */
  abstract currentPlayer(): Identity | null;

  /** Game-specific board as seen by one viewer */
  abstract render(viewer: Identity): TBoard;

  /** Score of a player, for games that report one */
  score(_player: Identity): number | null {
    return null;
  }

  /**
   * Remove a player from the turn order under the drop_participant policy.
   * Games using that policy override this.
   */
  protected onPlayerDropped(player: Identity): void {
    throw new InvariantViolation(
      `${this.context.gameId} does not support dropping ${player}; choose another timeout policy`
    );
  }

  // ============ Engine-facing Operations ============

  get matchId(): MatchId {
    return this.context.matchId;
  }

  get gameId(): GameId {
    return this.context.gameId;
  }

  get players(): readonly Identity[] {
    return this.context.players;
  }

  get spectators(): readonly Identity[] {
    return this.context.spectators;
  }

  /** Players still taking part (not timed out, not left) */
  get activePlayers(): readonly Identity[] {
    return this.active;
  }

  /** Why the match ended, or null while it runs */
  get endReason(): MatchEndReason | null {
    if (this.abortedBy !== null) return this.abortedBy;
    return this.isFinished() ? 'completed' : null;
  }

  isActive(player: Identity): boolean {
    return this.active.includes(player);
  }

  /**
   * Validate a raw move.
   * @throws {IllegalMove} if the payload does not match the move schema
   */
  parseMove(raw: unknown): TMove {
    const result = this.moveSchema.safeParse(raw);
    if (!result.success) {
      throw new IllegalMove(result.error.issues[0]?.message ?? 'malformed move');
    }
    return result.data;
  }

  /**
   * Apply a move on behalf of a participant and publish the resulting events.
   */
  play(player: Identity, move: TMove): TResult {
    if (this.hasEnded()) throw new IllegalMove('the match is over');
    if (!this.isActive(player)) throw new NotInMatch(player);

    const turn = this.currentPlayer();
    if (turn !== null && turn !== player) throw new NotYourTurn(player);

    const result = this.update(move);
    this.context.events.publish({ type: 'move_made', origin: player });
    if (this.hasEnded()) {
      this.announceEnd(player);
    }
    return result;
  }

  /**
   * A player timed out or left. Applies the game's timeout policy.
   * No-op once the game ended or for a player no longer active.
   */
  depart(player: Identity, reason: DepartureReason): void {
    if (this.hasEnded() || !this.isActive(player)) return;

    this.departed.set(player, reason);
    this.context.events.publish({ type: 'timeout', origin: player, reason });

    switch (this.context.rules.timeoutPolicy) {
      case 'end_match':
        this.abortedBy = 'timeout';
        break;
      case 'forfeit':
        this.removeActive(player);
        this.abortedBy = 'forfeit';
        break;
      case 'drop_participant':
        this.removeActive(player);
        this.onPlayerDropped(player);
        if (this.active.length < this.context.rules.minPlayers) {
          this.abortedBy = 'abandoned';
        }
        break;
    }

    if (this.hasEnded()) {
      this.announceEnd(player);
    }
  }

  private removeActive(player: Identity): void {
    const index = this.active.indexOf(player);
    if (index >= 0) this.active.splice(index, 1);
  }

  private announceEnd(origin: Identity | null): void {
    if (this.announced) return;
    this.announced = true;

    const reason = this.endReason;
    if (reason === null) {
      throw new InvariantViolation(`match ${this.context.matchId} announced end while running`);
    }
    const event: GameOverEvent = { type: 'game_over', origin, reason };
    this.context.events.publish(event);
  }
}

/**
 * Any game, as seen by the engine.
 */
export type AnyGame = GameContract<unknown, unknown, unknown>;

/**
 * Builds the game for a freshly started match.
 */
export type GameFactory<TGame extends AnyGame = AnyGame> = (context: MatchContext) => TGame;
