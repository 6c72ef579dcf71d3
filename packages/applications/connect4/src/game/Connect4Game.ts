/**
 * @fileoverview Four in a row on a 7x7 board.
 *
 * Colors are assigned in join order: the first player is red, the second is
 * blue, and blue moves first. Pieces fall to the lowest empty row.
 */

import {
  type Identity,
  IllegalMove,
  InvariantViolation,
  type Outcome,
} from '@matchhall/framework-protocol';
import { GameContract, type MatchContext } from '@matchhall/framework-server';
import {
  BOARD_SIZE,
  type Cell,
  type Color,
  type Connect4Board,
  type Connect4Move,
  Connect4MoveSchema,
  type DropResult,
  FIRST_COLOR,
  otherColor,
  RUN_LENGTH,
} from './types.js';

// Row and column steps of the four line directions: - | \ /
const DIRECTIONS: readonly (readonly [number, number])[] = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
];

export class Connect4Game extends GameContract<Connect4Move, DropResult, Connect4Board> {
  readonly moveSchema = Connect4MoveSchema;

  private readonly cells: Cell[][];
  private readonly seats: Record<Color, Identity>;
  private turn: Color = FIRST_COLOR;

  constructor(context: MatchContext) {
    super(context);
    const [red, blue] = context.players;
    if (red === undefined || blue === undefined || context.players.length !== 2) {
      throw new InvariantViolation(`connect4 needs exactly 2 players, got ${context.players.length}`);
    }
    this.seats = { blue, red };
    this.cells = Array.from({ length: BOARD_SIZE }, () =>
      Array.from({ length: BOARD_SIZE }, (): Cell => null)
    );
  }

  // ============ Queries ============

  get nextTurn(): Color {
    return this.turn;
  }

  colorOf(identity: Identity): Color | null {
    if (this.seats.blue === identity) return 'blue';
    if (this.seats.red === identity) return 'red';
    return null;
  }

  cellAt(row: number, column: number): Cell {
    return this.cells[row]?.[column] ?? null;
  }

  /**
   * Whether a color has four in a row anywhere on the board.
   */
  hasRun(color: Color): boolean {
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let column = 0; column < BOARD_SIZE; column++) {
        for (const [dRow, dColumn] of DIRECTIONS) {
          if (this.runFrom(row, column, dRow, dColumn, color)) return true;
        }
      }
    }
    return false;
  }

  isFull(): boolean {
    return this.cells.every((row) => row.every((cell) => cell !== null));
  }

  /** Color with four in a row, if any */
  winningColor(): Color | null {
    if (this.hasRun('blue')) return 'blue';
    if (this.hasRun('red')) return 'red';
    return null;
  }

  // ============ GameContract ============

  currentPlayer(): Identity {
    return this.seats[this.turn];
  }

  render(viewer: Identity): Connect4Board {
    return {
      cells: this.cells.map((row) => [...row]),
      nextTurn: this.turn,
      players: { ...this.seats },
      viewerColor: this.colorOf(viewer),
      winner: this.winningColor(),
    };
  }

  protected applyMove(move: Connect4Move): DropResult {
    const { column } = move;
    for (let row = BOARD_SIZE - 1; row >= 0; row--) {
      const cells = this.cells[row];
      if (cells && cells[column] === null) {
        const color = this.turn;
        cells[column] = color;
        this.turn = otherColor(color);
        return { row, column, color };
      }
    }
    throw new IllegalMove(`column ${column} is full`);
  }

  protected isFinished(): boolean {
    return this.winningColor() !== null || this.isFull();
  }

  protected outcomeFor(player: Identity): Outcome {
    const color = this.colorOf(player);
    return color !== null && this.winningColor() === color ? 'won' : 'drawn_or_lost';
  }

  private runFrom(row: number, column: number, dRow: number, dColumn: number, color: Color): boolean {
    for (let i = 0; i < RUN_LENGTH; i++) {
      if (this.cellAt(row + dRow * i, column + dColumn * i) !== color) return false;
    }
    return true;
  }
}
