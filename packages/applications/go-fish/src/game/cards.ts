/**
 * @fileoverview French-suited playing cards.
 */

import { z } from 'zod';

export const SUITS = ['D', 'C', 'H', 'S'] as const;

export const RANKS = ['A', '2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K'] as const;

export const RankSchema = z.number().int().min(0).max(RANKS.length - 1);

/** Index into RANKS: 0 is the ace, 12 the king */
export type Rank = number;

export interface Card {
  /** Index into SUITS */
  readonly suit: number;
  readonly rank: Rank;
}

/** Cards of one rank that make a book */
export const BOOK_SIZE = SUITS.length;

export function rankLabel(rank: Rank): string {
  return RANKS[rank] ?? '?';
}

export function cardLabel(card: Card): string {
  return `${rankLabel(card.rank)}${SUITS[card.suit] ?? '?'}`;
}

/**
 * All 52 cards, suit by suit.
 */
export function makeDeck(): Card[] {
  return SUITS.flatMap((_, suit) => RANKS.map((_, rank) => ({ suit, rank })));
}

/**
 * Fisher-Yates shuffle in place.
 */
export function shuffle<T>(items: T[], random: () => number): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = items[i];
    const b = items[j];
    if (a === undefined || b === undefined) continue;
    items[i] = b;
    items[j] = a;
  }
  return items;
}

export function compareCards(a: Card, b: Card): number {
  return a.rank - b.rank || a.suit - b.suit;
}
