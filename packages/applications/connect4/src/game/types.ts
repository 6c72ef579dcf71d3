import type { Identity } from '@matchhall/framework-protocol';
import { z } from 'zod';

/** Board dimension (rows and columns) */
export const BOARD_SIZE = 7;

/** Pieces in a row needed to win */
export const RUN_LENGTH = 4;

export type Color = 'blue' | 'red';

export type Cell = Color | null;

/** Color that moves first */
export const FIRST_COLOR: Color = 'blue';

export const Connect4MoveSchema = z.object({
  column: z.number().int().min(0).max(BOARD_SIZE - 1),
});

export type Connect4Move = z.infer<typeof Connect4MoveSchema>;

/**
 * Where a dropped piece landed.
 */
export interface DropResult {
  readonly row: number;
  readonly column: number;
  readonly color: Color;
}

/**
 * Board as shown to one viewer. Row 0 is the top row.
 */
export interface Connect4Board {
  readonly cells: readonly (readonly Cell[])[];
  readonly nextTurn: Color;
  readonly players: Readonly<Record<Color, Identity>>;
  /** Color of the viewer, null for spectators */
  readonly viewerColor: Color | null;
  /** Color with four in a row, if any */
  readonly winner: Color | null;
}

export function otherColor(color: Color): Color {
  return color === 'blue' ? 'red' : 'blue';
}
