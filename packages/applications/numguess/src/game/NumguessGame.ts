/**
 * @fileoverview Guess a secret number between 1 and 100.
 *
 * Every guess narrows the open interval around the secret. A guess outside
 * that interval is answered with -2 or 2 and costs no try.
 */

import { type Identity, InvariantViolation, type Outcome } from '@matchhall/framework-protocol';
import { GameContract, type MatchContext } from '@matchhall/framework-server';
import {
  type Comparison,
  MAX_SECRET,
  MIN_SECRET,
  type NumguessBoard,
  type NumguessMove,
  NumguessMoveSchema,
  type NumguessOptions,
} from './types.js';

export class NumguessGame extends GameContract<NumguessMove, Comparison, NumguessBoard> {
  readonly moveSchema = NumguessMoveSchema;

  readonly secret: number;
  private low = MIN_SECRET - 1;
  private high = MAX_SECRET + 1;
  private tries: number;
  private lastGuess: number | null = null;
  private lastResult: Comparison | null = null;

  constructor(context: MatchContext, options: NumguessOptions) {
    super(context);
    if (context.players.length !== 1) {
      throw new InvariantViolation(`numguess is single-player, got ${context.players.length} players`);
    }
    this.tries = options.tries;
    this.secret = MIN_SECRET + Math.floor(context.random() * (MAX_SECRET - MIN_SECRET + 1));
  }

  get triesLeft(): number {
    return this.tries;
  }

  currentPlayer(): Identity | null {
    return this.players[0] ?? null;
  }

  render(_viewer: Identity): NumguessBoard {
    return {
      low: this.low,
      high: this.high,
      triesLeft: this.tries,
      lastGuess: this.lastGuess,
      lastResult: this.lastResult,
      secret: this.hasEnded() ? this.secret : null,
    };
  }

  protected applyMove(move: NumguessMove): Comparison {
    const { guess } = move;
    const result = this.compare(guess);
    this.lastGuess = guess;
    this.lastResult = result;

    if (Math.abs(result) !== 2) {
      this.tries--;
    }
    return result;
  }

  protected isFinished(): boolean {
    return this.lastGuess === this.secret || this.tries <= 0;
  }

  protected outcomeFor(_player: Identity): Outcome {
    return this.lastGuess === this.secret ? 'won' : 'drawn_or_lost';
  }

  private compare(guess: number): Comparison {
    if (guess <= this.low) return -2;
    if (guess >= this.high) return 2;
    if (guess < this.secret) {
      this.low = guess;
      return -1;
    }
    if (guess > this.secret) {
      this.high = guess;
      return 1;
    }
    return 0;
  }
}
