/**
 * @fileoverview Go Fish for two to four players.
 *
 * The player whose turn it is asks another player for a rank they hold.
 * Taking cards, or fishing the asked rank from the pile, keeps the turn;
 * anything else passes it on. Four cards of a rank form a book and leave
 * the hand. Players with an empty hand are skipped, and the game ends once
 * every remaining hand is empty. Most books wins.
 */

import {
  type Identity,
  IllegalMove,
  InvariantViolation,
  type Outcome,
} from '@matchhall/framework-protocol';
import { GameContract, type MatchContext } from '@matchhall/framework-server';
import { BOOK_SIZE, type Card, compareCards, makeDeck, type Rank, rankLabel, shuffle } from './cards.js';
import {
  type AskResult,
  type GoFishBoard,
  type GoFishLogEntry,
  type GoFishMove,
  GoFishMoveSchema,
  type GoFishOptions,
  HAND_SIZE,
  LOG_LENGTH,
} from './types.js';

interface Seat {
  hand: Card[];
  books: Rank[];
  lastFish: Card | null;
}

export class GoFishGame extends GameContract<GoFishMove, AskResult, GoFishBoard> {
  readonly moveSchema = GoFishMoveSchema;

  private readonly deck: Card[];
  private readonly seats = new Map<Identity, Seat>();
  /** Active players; the front one is to move */
  private readonly turns: Identity[];
  private readonly entries: GoFishLogEntry[] = [];

  constructor(context: MatchContext, options: GoFishOptions = {}) {
    super(context);
    this.deck = options.deck ? [...options.deck] : shuffle(makeDeck(), context.random);

    if (this.deck.length < context.players.length * HAND_SIZE) {
      throw new InvariantViolation(
        `a deck of ${this.deck.length} cannot deal ${HAND_SIZE} cards to ${context.players.length} players`
      );
    }
    for (const player of context.players) {
      const hand = this.deck.splice(0, HAND_SIZE).sort(compareCards);
      this.seats.set(player, { hand, books: [], lastFish: null });
    }
    this.turns = [...context.players];
    this.record({ type: 'game_start' });
  }

  // ============ Queries ============

  handOf(player: Identity): readonly Card[] {
    return this.seats.get(player)?.hand ?? [];
  }

  booksOf(player: Identity): readonly Rank[] {
    return this.seats.get(player)?.books ?? [];
  }

  get deckSize(): number {
    return this.deck.length;
  }

  get log(): readonly GoFishLogEntry[] {
    return this.entries;
  }

  /** Books per active player */
  bookCounts(): Map<Identity, number> {
    return new Map(this.turns.map((player) => [player, this.booksOf(player).length]));
  }

  // ============ GameContract ============

  currentPlayer(): Identity | null {
    return this.turns[0] ?? null;
  }

  render(viewer: Identity): GoFishBoard {
    const own = this.turns.includes(viewer) ? this.seats.get(viewer) : undefined;
    return {
      seats: this.players.map((identity) => ({
        identity,
        handSize: this.handOf(identity).length,
        books: [...this.booksOf(identity)],
        active: this.turns.includes(identity),
      })),
      hand: own ? [...own.hand] : null,
      lastFish: own?.lastFish ?? null,
      nextTurn: this.hasEnded() ? null : this.currentPlayer(),
      deckSize: this.deck.length,
      log: [...this.entries],
    };
  }

  protected applyMove(move: GoFishMove): AskResult {
    const asker = this.currentPlayer();
    const seat = asker === null ? undefined : this.seats.get(asker);
    if (asker === null || !seat) {
      throw new InvariantViolation('go-fish move with nobody to move');
    }

    const { victim, rank } = move;
    if (victim === asker) {
      throw new IllegalMove('you cannot ask yourself');
    }
    const victimSeat = this.turns.includes(victim) ? this.seats.get(victim) : undefined;
    if (!victimSeat) {
      throw new IllegalMove(`${victim} is not playing`);
    }
    if (!seat.hand.some((card) => card.rank === rank)) {
      throw new IllegalMove(`you hold no ${rankLabel(rank)}`);
    }

    const taken = victimSeat.hand.filter((card) => card.rank === rank);
    let result: AskResult;

    if (taken.length > 0) {
      victimSeat.hand = victimSeat.hand.filter((card) => card.rank !== rank);
      seat.hand = [...seat.hand, ...taken].sort(compareCards);
      seat.lastFish = null;
      this.withdrawBooks(asker, seat);
      this.record({ type: 'took_cards', taker: asker, victim, rank, count: taken.length });
      result = { taken: taken.length, drew: null, keepsTurn: true };
    } else {
      const drew = this.deck.shift() ?? null;
      const keepsTurn = drew !== null && drew.rank === rank;
      if (drew) {
        seat.hand = [...seat.hand, drew].sort(compareCards);
        seat.lastFish = drew;
      }
      // Books are logged ahead of the ask that completed them
      this.withdrawBooks(asker, seat);
      this.record(
        keepsTurn && drew
          ? { type: 'fished_card', fisher: asker, victim, card: drew }
          : { type: 'went_fishing', fisher: asker, victim, rank }
      );
      if (!keepsTurn) {
        this.advanceTurn();
      }
      result = { taken: 0, drew, keepsTurn };
    }

    this.skipEmptyHands();
    return result;
  }

  protected isFinished(): boolean {
    return this.turns.every((player) => this.handOf(player).length === 0);
  }

  protected outcomeFor(player: Identity): Outcome {
    const counts = [...this.bookCounts().values()];
    const most = Math.max(0, ...counts);
    return this.booksOf(player).length === most ? 'won' : 'drawn_or_lost';
  }

  protected override onPlayerDropped(player: Identity): void {
    const index = this.turns.indexOf(player);
    if (index < 0) return;

    this.turns.splice(index, 1);
    this.record({ type: 'dropped', player });
    this.skipEmptyHands();
  }

  // ============ Turn Order ============

  private advanceTurn(): void {
    const front = this.turns.shift();
    if (front !== undefined) {
      this.turns.push(front);
    }
  }

  private skipEmptyHands(): void {
    if (this.isFinished()) return;
    while (this.handOf(this.turns[0] ?? '').length === 0) {
      this.advanceTurn();
    }
  }

  private withdrawBooks(player: Identity, seat: Seat): void {
    if (seat.hand.length === 0) return;

    const counts = new Map<Rank, number>();
    for (const card of seat.hand) {
      counts.set(card.rank, (counts.get(card.rank) ?? 0) + 1);
    }
    for (const [rank, count] of counts) {
      if (count < BOOK_SIZE) continue;
      seat.hand = seat.hand.filter((card) => card.rank !== rank);
      seat.books.push(rank);
      this.record({ type: 'new_book', author: player, rank });
    }
    if (seat.hand.length === 0) {
      this.record({ type: 'hand_emptied', player });
    }
  }

  private record(entry: GoFishLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > LOG_LENGTH) {
      this.entries.shift();
    }
  }
}
