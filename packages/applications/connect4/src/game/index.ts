/**
 * @fileoverview Game logic exports for connect4.
 */

export { Connect4Game } from './Connect4Game.js';
export * from './types.js';
