/**
 * @fileoverview Matchhall WebSocket host.
 *
 * Loads the engine configuration, registers the bundled games and serves
 * them through the dispatcher until SIGINT / SIGTERM.
 */

import {
  createDispatchServer,
  InMemoryScoreStore,
  loadEngineConfig,
  logger,
  setLogLevel,
} from '@matchhall/framework-server';
import { WebSocketServer } from 'ws';
import { registerAllGames } from './games.js';

const engine = loadEngineConfig();
setLogLevel(engine.logLevel);

const catalog = registerAllGames();
logger.info('Starting matchhall host...', { games: catalog.listIds() });

createDispatchServer(
  {
    catalog,
    engine,
    scores: new InMemoryScoreStore(),
  },
  WebSocketServer
);
