/**
 * @fileoverview Game logic exports for twenty48.
 */

export { type Coord, collapseLine, lineCoords } from './slide.js';
export { Twenty48Game } from './Twenty48Game.js';
export * from './types.js';
