/**
 * @fileoverview Game logic exports for go-fish.
 */

export * from './cards.js';
export { GoFishGame } from './GoFishGame.js';
export * from './types.js';
