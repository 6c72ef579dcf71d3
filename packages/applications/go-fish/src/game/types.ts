import type { Identity } from '@matchhall/framework-protocol';
import { z } from 'zod';
import { type Card, type Rank, RankSchema } from './cards.js';

/** Cards dealt to each player */
export const HAND_SIZE = 7;

/** Log entries kept for display */
export const LOG_LENGTH = 5;

export const GoFishMoveSchema = z.object({
  /** Player asked for cards */
  victim: z.string().min(1),
  rank: RankSchema,
});

export type GoFishMove = z.infer<typeof GoFishMoveSchema>;

export type GoFishLogEntry =
  | { readonly type: 'game_start' }
  | {
      readonly type: 'took_cards';
      readonly taker: Identity;
      readonly victim: Identity;
      readonly rank: Rank;
      readonly count: number;
    }
  | { readonly type: 'went_fishing'; readonly fisher: Identity; readonly victim: Identity; readonly rank: Rank }
  | { readonly type: 'fished_card'; readonly fisher: Identity; readonly victim: Identity; readonly card: Card }
  | { readonly type: 'new_book'; readonly author: Identity; readonly rank: Rank }
  | { readonly type: 'hand_emptied'; readonly player: Identity }
  | { readonly type: 'dropped'; readonly player: Identity };

export interface AskResult {
  /** Cards taken from the victim */
  readonly taken: number;
  /** Card drawn from the pile, if the asker went fishing and the pile had one */
  readonly drew: Card | null;
  readonly keepsTurn: boolean;
}

export interface GoFishSeat {
  readonly identity: Identity;
  readonly handSize: number;
  /** Ranks of completed books */
  readonly books: readonly Rank[];
  /** False once the player timed out or left */
  readonly active: boolean;
}

export interface GoFishBoard {
  readonly seats: readonly GoFishSeat[];
  /** The viewer's own hand, null for spectators */
  readonly hand: readonly Card[] | null;
  /** Card the viewer drew on their last fishing trip */
  readonly lastFish: Card | null;
  readonly nextTurn: Identity | null;
  readonly deckSize: number;
  readonly log: readonly GoFishLogEntry[];
}

export interface GoFishOptions {
  /** Cards in dealing order; shuffled from a fresh deck when omitted */
  readonly deck?: readonly Card[];
}
