import {
  InvariantViolation,
  type MatchEvent,
  type MatchView,
  NotInMatch,
  type ScoreSummary,
  type SummaryView,
} from '@matchhall/framework-protocol';
import type { AnyGame } from '../game/GameContract.js';
import type { ScoreStore } from '../game/ScoreStore.js';
import { describeError } from '../logger.js';
import { ParticipantSession, type ParticipantSessionOptions } from './ParticipantSession.js';

export interface MatchSessionOptions extends ParticipantSessionOptions<MatchEvent> {
  readonly game: AnyGame;
  /** Where finished score-tracking games record best scores; null disables it */
  readonly scores: ScoreStore | null;
  readonly tracksScore: boolean;
}

type DepartState = 'timed_out' | 'left';

/**
 * A player or spectator of a running match.
 */
export class MatchSession extends ParticipantSession<MatchEvent> {
  private readonly game: AnyGame;
  private readonly scores: ScoreStore | null;
  private readonly tracksScore: boolean;
  private best: number | null = null;
  private bestReady = false;
  private readonly bestLoaded: Promise<void>;

  constructor(options: MatchSessionOptions) {
    super(options);
    this.game = options.game;
    this.scores = options.scores;
    this.tracksScore = options.tracksScore;
    this.bestLoaded = this.loadBest();
  }

  /**
   * Validate and apply a move, then re-render this participant's own view.
   * Other participants re-render from the move_made event.
   */
  async play(rawMove: unknown): Promise<unknown> {
    if (!this.isActive || this.role !== 'player') {
      throw new NotInMatch(this.identity);
    }

    const move = this.game.parseMove(rawMove);
    const result = this.game.play(this.identity, move);
    this.resetTimer();

    try {
      // Keeps this render behind the initial one
      if (!this.bestReady) await this.bestLoaded;
      await this.renderView(this.matchView());
    } catch (error) {
      if (error instanceof InvariantViolation) throw error;
      this.log.warn('Render failed after move, dropping participant', {
        identity: this.identity,
        error: describeError(error),
      });
      await this.onRenderFailure();
    }
    return result;
  }

  /**
   * Leave the match (resign, drop out or stop spectating).
   */
  depart(state: DepartState): Promise<void> {
    if (!this.isActive) return Promise.resolve();
    if (this.recordsScore) return this.recordThenDepart(state);
    return this.leaveGame(state, null);
  }

  matchView(): MatchView {
    const turn = this.game.currentPlayer();
    const yourTurn =
      this.role === 'player' &&
      !this.game.hasEnded() &&
      this.game.isActive(this.identity) &&
      (turn === null || turn === this.identity);

    return {
      kind: 'match',
      gameId: this.gameId,
      matchId: this.game.matchId,
      viewer: this.identity,
      role: this.role,
      yourTurn,
      board: this.game.render(this.identity),
      best: this.best,
    };
  }

  protected initialView(): MatchView {
    return this.matchView();
  }

  protected override prepare(): Promise<void> | null {
    return this.bestReady ? null : this.bestLoaded;
  }

  protected async handleEvent(event: MatchEvent): Promise<void> {
    switch (event.type) {
      case 'move_made':
        this.resetTimer();
        if (event.origin === this.identity) return;
        await this.renderView(this.matchView());
        return;
      case 'timeout':
        // A game_over follows when the departure ended the match
        if (event.origin === this.identity || this.game.hasEnded()) return;
        await this.renderView(this.matchView());
        return;
      case 'game_over': {
        const score = await this.recordScore();
        await this.finish('game_over', this.summaryView('game_over', score));
        return;
      }
    }
  }

  protected onInactivity(): Promise<void> {
    this.log.info('Match participant timed out', { identity: this.identity, role: this.role });
    return this.depart('timed_out');
  }

  protected async onRenderFailure(): Promise<void> {
    if (!this.isActive) return;
    if (this.recordsScore) {
      await this.recordScore();
      if (!this.isActive) return;
    }
    if (this.role === 'player') {
      this.game.depart(this.identity, 'left');
    }
    await this.finish('left', null);
  }

  private get recordsScore(): boolean {
    return this.tracksScore && this.role === 'player' && this.scores !== null;
  }

  /**
   * The score is written before the departure ends the match, since a
   * finished session no longer receives the game_over event.
   */
  private async recordThenDepart(state: DepartState): Promise<void> {
    const score = await this.recordScore();
    // The match may have ended while the store answered
    if (!this.isActive) return;
    await this.leaveGame(state, score);
  }

  private leaveGame(state: DepartState, score: ScoreSummary | null): Promise<void> {
    if (this.role === 'player') {
      this.game.depart(this.identity, state);
    }
    return this.finish(state, this.summaryView(state, score));
  }

  private summaryView(
    state: DepartState | 'game_over',
    score: ScoreSummary | null
  ): SummaryView {
    let outcome: SummaryView['outcome'] = null;
    if (this.role === 'player') {
      outcome = state === 'game_over' ? this.game.winner(this.identity) : 'drawn_or_lost';
    }
    return {
      kind: 'summary',
      gameId: this.gameId,
      viewer: this.identity,
      state,
      reason: this.game.endReason,
      outcome,
      board: this.game.render(this.identity),
      score,
    };
  }

  private async loadBest(): Promise<void> {
    if (!this.recordsScore || this.scores === null) {
      this.bestReady = true;
      return;
    }
    try {
      this.best = await this.scores.getBest(this.gameId, this.identity);
    } catch (error) {
      this.log.warn('Score store unavailable', { identity: this.identity, error: describeError(error) });
    } finally {
      this.bestReady = true;
    }
  }

  private async recordScore(): Promise<ScoreSummary | null> {
    if (!this.recordsScore || this.scores === null) return null;

    const score = this.game.score(this.identity);
    if (score === null) return null;

    try {
      const best = await this.scores.getBest(this.gameId, this.identity);
      const newBest = score > best;
      if (newBest) {
        await this.scores.setBest(this.gameId, this.identity, score);
      }
      return { score, best: newBest ? score : best, newBest };
    } catch (error) {
      this.log.warn('Score store unavailable', { identity: this.identity, error: describeError(error) });
      return null;
    }
  }
}
