/**
 * @fileoverview Host wiring shared by the entry point and tests.
 */

export { registerAllGames } from './games.js';
