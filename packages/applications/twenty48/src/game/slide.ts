/**
 * @fileoverview Line geometry and the slide rule.
 */

import { BOARD_SIZE, type Direction, type Tile } from './types.js';

export type Coord = readonly [row: number, column: number];

/**
 * Cells of the k-th line for a direction, starting at the edge tiles move toward.
 */
export function lineCoords(direction: Direction, k: number): Coord[] {
  const indices = Array.from({ length: BOARD_SIZE }, (_, i) => i);
  switch (direction) {
    case 'left':
      return indices.map((i): Coord => [k, i]);
    case 'right':
      return indices.map((i): Coord => [k, BOARD_SIZE - 1 - i]);
    case 'up':
      return indices.map((i): Coord => [i, k]);
    case 'down':
      return indices.map((i): Coord => [BOARD_SIZE - 1 - i, k]);
  }
}

/**
 * Slide one line toward index 0.
 */
export function collapseLine(line: readonly Tile[]): { line: Tile[]; gained: number } {
  let current = [...line];
  let gained = 0;

  for (;;) {
    const values = current.filter((tile): tile is number => tile !== null);
    const compacted: Tile[] = [...values, ...Array.from({ length: line.length - values.length }, () => null)];
    let changed = compacted.some((tile, i) => tile !== current[i]);

    for (let i = 1; i < compacted.length; i++) {
      const tile = compacted[i];
      if (tile !== null && tile !== undefined && tile === compacted[i - 1]) {
        compacted[i - 1] = tile * 2;
        compacted[i] = null;
        gained += tile * 2;
        changed = true;
      }
    }

    current = compacted;
    if (!changed) return { line: current, gained };
  }
}
