/**
 * @fileoverview The games this host serves.
 *
 * Each game package registers itself with the global catalog on import.
 */

import { registerGame as registerConnect4 } from '@matchhall/connect4';
import type { GameCatalog } from '@matchhall/framework-server';
import { globalCatalog } from '@matchhall/framework-server';
import { registerGame as registerGoFish } from '@matchhall/go-fish';
import { registerGame as registerNumguess } from '@matchhall/numguess';
import { registerGame as registerTwenty48 } from '@matchhall/twenty48';

/**
 * Make sure every bundled game is in the global catalog.
 * Safe to call multiple times.
 */
export function registerAllGames(): GameCatalog {
  registerConnect4();
  registerTwenty48();
  registerGoFish();
  registerNumguess();
  return globalCatalog;
}
