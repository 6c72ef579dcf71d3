/**
 * @fileoverview Game logic exports for numguess.
 */

export { NumguessGame } from './NumguessGame.js';
export * from './types.js';
