/**
 * @fileoverview A minimal turn-based game for exercising the engine.
 *
 * Players take turns adding 1 to 3 to a shared total; the match ends once
 * the total reaches ten. Whoever contributed most among the players still
 * in the match wins.
 */

import type { GameManifest, Identity, LobbyRules, Outcome, PlaceholderView } from '@matchhall/framework-protocol';
import { z } from 'zod';
import { GameContract, type GameDefinition, type MatchContext } from '../src/index.js';

export const COUNT_GAME_ID = 'count';
export const COUNT_TARGET = 10;

const CountMoveSchema = z.object({ add: z.number().int().min(1).max(3) });

type CountMove = z.infer<typeof CountMoveSchema>;

export interface CountBoard {
  total: number;
  points: Record<Identity, number>;
  turn: Identity | null;
}

export class CountGame extends GameContract<CountMove, number, CountBoard> {
  readonly moveSchema = CountMoveSchema;

  protected readonly order: Identity[];
  private total = 0;
  private readonly points = new Map<Identity, number>();

  constructor(context: MatchContext) {
    super(context);
    this.order = [...context.players];
  }

  currentPlayer(): Identity | null {
    return this.order[0] ?? null;
  }

  render(_viewer: Identity): CountBoard {
    return {
      total: this.total,
      points: Object.fromEntries(this.points),
      turn: this.hasEnded() ? null : this.currentPlayer(),
    };
  }

  override score(player: Identity): number | null {
    return this.points.get(player) ?? 0;
  }

  protected applyMove(move: CountMove): number {
    const mover = this.order.shift();
    if (mover === undefined) return this.total;

    this.total += move.add;
    this.points.set(mover, (this.points.get(mover) ?? 0) + move.add);
    this.order.push(mover);
    return this.total;
  }

  protected isFinished(): boolean {
    return this.total >= COUNT_TARGET;
  }

  protected outcomeFor(player: Identity): Outcome {
    const best = Math.max(0, ...this.activePlayers.map((p) => this.points.get(p) ?? 0));
    return (this.points.get(player) ?? 0) === best ? 'won' : 'drawn_or_lost';
  }
}

/**
 * CountGame that supports the drop_participant policy.
 */
export class DroppableCountGame extends CountGame {
  protected override onPlayerDropped(player: Identity): void {
    const index = this.order.indexOf(player);
    if (index >= 0) this.order.splice(index, 1);
  }
}

export function countManifest(rules: Partial<LobbyRules> = {}, tracksScore = false): GameManifest {
  return {
    id: COUNT_GAME_ID,
    name: 'Count to Ten',
    version: '1.0.0',
    tracksScore,
    rules: {
      minPlayers: 2,
      maxPlayers: 2,
      maxSpectators: 0,
      waitTimeMs: 0,
      timeoutPolicy: 'end_match',
      matchInactivityTimeoutMs: 600_000,
      ...rules,
    },
  };
}

export function countDefinition(
  rules: Partial<LobbyRules> = {},
  tracksScore = false
): GameDefinition<DroppableCountGame> {
  return {
    manifest: countManifest(rules, tracksScore),
    create: (context) => new DroppableCountGame(context),
  };
}

export function placeholder(identity: Identity): PlaceholderView {
  return { kind: 'placeholder', gameId: COUNT_GAME_ID, identity };
}
