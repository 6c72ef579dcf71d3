/**
 * @fileoverview Single-player tile merging on a 4x4 board.
 *
 * A slide compacts every line toward the chosen edge and merges equal
 * neighbours, repeating until the line settles, so chains such as
 * 2 2 2 2 collapse into a single 8. A slide that changes nothing spawns no
 * tile.
 */

import { type Identity, InvariantViolation, type Outcome } from '@matchhall/framework-protocol';
import { GameContract, type MatchContext } from '@matchhall/framework-server';
import { type Coord, collapseLine, lineCoords } from './slide.js';
import {
  BOARD_SIZE,
  type SlideResult,
  type Tile,
  TWO_CHANCE,
  type Twenty48Board,
  type Twenty48Move,
  Twenty48MoveSchema,
  type Twenty48Options,
} from './types.js';

type Status = 'running' | 'won' | 'stuck';

export class Twenty48Game extends GameContract<Twenty48Move, SlideResult, Twenty48Board> {
  readonly moveSchema = Twenty48MoveSchema;

  private readonly tiles: Tile[][];
  private readonly options: Twenty48Options;
  private points = 0;

  constructor(context: MatchContext, options: Twenty48Options) {
    super(context);
    if (context.players.length !== 1) {
      throw new InvariantViolation(`twenty48 is single-player, got ${context.players.length} players`);
    }
    this.options = options;
    this.tiles = Array.from({ length: BOARD_SIZE }, () =>
      Array.from({ length: BOARD_SIZE }, (): Tile => null)
    );
    this.spawnTile();
    this.spawnTile();
  }

  // ============ Queries ============

  get totalPoints(): number {
    return this.points;
  }

  tileAt(row: number, column: number): Tile {
    return this.tiles[row]?.[column] ?? null;
  }

  /** Values of every occupied cell, row by row */
  occupied(): number[] {
    return this.tiles.flat().filter((tile): tile is number => tile !== null);
  }

  /** An empty cell or two equal neighbours exist */
  hasLegalMove(): boolean {
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let column = 0; column < BOARD_SIZE; column++) {
        const tile = this.tileAt(row, column);
        if (tile === null) return true;
        if (tile === this.tileAt(row, column + 1) || tile === this.tileAt(row + 1, column)) return true;
      }
    }
    return false;
  }

  get reachedWinTile(): boolean {
    return this.occupied().some((tile) => tile >= this.options.winTile);
  }

  // ============ GameContract ============

  currentPlayer(): Identity | null {
    return this.players[0] ?? null;
  }

  render(_viewer: Identity): Twenty48Board {
    return {
      tiles: this.tiles.map((row) => [...row]),
      points: this.points,
      winTile: this.options.winTile,
      allowContinue: this.options.allowContinue,
      reachedWinTile: this.reachedWinTile,
    };
  }

  override score(_player: Identity): number {
    return this.points;
  }

  protected applyMove(move: Twenty48Move): SlideResult {
    let moved = false;
    let gained = 0;

    for (let k = 0; k < BOARD_SIZE; k++) {
      const coords = lineCoords(move.direction, k);
      const before = coords.map(([row, column]) => this.tileAt(row, column));
      const after = collapseLine(before);

      coords.forEach(([row, column], i) => {
        const cells = this.tiles[row];
        const tile = after.line[i] ?? null;
        if (cells && cells[column] !== tile) {
          cells[column] = tile;
          moved = true;
        }
      });
      gained += after.gained;
    }

    this.points += gained;
    if (moved) {
      this.spawnTile();
    }
    return { moved, gained };
  }

  protected isFinished(): boolean {
    return this.status() !== 'running';
  }

  protected outcomeFor(_player: Identity): Outcome {
    return this.status() === 'won' ? 'won' : 'drawn_or_lost';
  }

  private status(): Status {
    if (this.options.allowContinue) {
      if (this.hasLegalMove()) return 'running';
      return this.reachedWinTile ? 'won' : 'stuck';
    }
    if (this.reachedWinTile) return 'won';
    return this.hasLegalMove() ? 'running' : 'stuck';
  }

  /**
   * Put a 2 (or, less often, a 4) on a random empty cell.
   */
  private spawnTile(): void {
    const { random } = this.context;
    const value = random() < TWO_CHANCE ? 2 : 4;

    const empty: Coord[] = [];
    this.tiles.forEach((cells, row) => {
      cells.forEach((tile, column) => {
        if (tile === null) empty.push([row, column]);
      });
    });

    const target = empty[Math.floor(random() * empty.length)];
    if (!target) return;
    const [row, column] = target;
    const cells = this.tiles[row];
    if (cells) cells[column] = value;
  }
}
