/**
 * @fileoverview Factory for the engine's WebSocket front end.
 *
 * Encapsulates:
 * - Registry wiring (catalog, lobbies, matches, score store)
 * - WebSocketServer setup and connection handling
 * - Graceful shutdown
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engineConfig.js';
import type { GameCatalog } from '../game/GameCatalog.js';
import type { ScoreStore } from '../game/ScoreStore.js';
import type { HostAuthority, LobbyRegistry } from '../lobby/LobbyRegistry.js';
import { createLogger, describeError, type Logger } from '../logger.js';
import { MatchRegistry } from '../match/Match.js';
import { type Connection, Dispatcher } from './Dispatcher.js';

/**
 * Configuration for creating a dispatch server.
 */
export interface DispatchServerConfig {
  readonly catalog: GameCatalog;
  /** Port to listen on (default: engine config, or PORT env var) */
  readonly port?: number;
  readonly engine?: EngineConfig;
  readonly scores?: ScoreStore;
  readonly authority?: HostAuthority;
  /** Random source handed to games */
  readonly random?: () => number;
  /** Stop on SIGINT / SIGTERM (default: true) */
  readonly handleSignals?: boolean;
  readonly logger?: Logger;
}

/**
 * Running dispatch server instance.
 */
export interface DispatchServer {
  readonly dispatcher: Dispatcher;
  readonly lobbies: LobbyRegistry;
  readonly matches: MatchRegistry;
  readonly port: number;
  /** Stop the server gracefully */
  stop(): Promise<void>;
}

/**
 * WebSocket interface for type compatibility.
 * `ws` WebSocket instances can be passed directly.
 */
interface WebSocketLike extends Connection {
  on(event: 'message', callback: (data: Buffer | string) => void): void;
  on(event: 'close', callback: () => void): void;
  on(event: 'error', callback: (error: unknown) => void): void;
}

interface WebSocketServerLike {
  on(event: 'connection', callback: (ws: WebSocketLike) => void): void;
  close(callback?: () => void): void;
  emit?(event: string): void;
}

interface WebSocketServerConstructor {
  new (options: { port: number }): WebSocketServerLike;
}

/**
 * Create and start a dispatch server.
 *
 * @example
 * ```typescript
 * import { createDispatchServer, globalCatalog } from '@matchhall/framework-server';
 * import { WebSocketServer } from 'ws';
 *
 * const server = createDispatchServer({ catalog: globalCatalog }, WebSocketServer);
 *
 * // Later: graceful shutdown
 * await server.stop();
 * ```
 */
export function createDispatchServer(
  config: DispatchServerConfig,
  WebSocketServerClass: WebSocketServerConstructor
): DispatchServer {
  const engine = config.engine ?? DEFAULT_ENGINE_CONFIG;
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const port = config.port ?? (Number(process.env['PORT']) || engine.server.port);
  const log = config.logger ?? createLogger('server');

  const matches = new MatchRegistry({
    scores: config.scores ?? null,
    ...(config.random ? { random: config.random } : {}),
  });

  const dispatcher = new Dispatcher({
    catalog: config.catalog,
    matches,
    engine,
    ...(config.authority ? { authority: config.authority } : {}),
  });
  const { lobbies } = dispatcher;

  log.info(`Starting server on port ${port}...`, { games: config.catalog.listIds() });

  const wss = new WebSocketServerClass({ port });

  log.info(`WebSocket server listening on port ${port}`);

  // Invariant violations are fatal: rethrow outside the promise chain
  const crash = (error: unknown): void => {
    log.error('Fatal engine error', { error: describeError(error) });
    process.nextTick(() => {
      throw error;
    });
  };

  wss.on('connection', (ws: WebSocketLike) => {
    wss.emit?.('connection_handled');

    ws.on('message', (data: Buffer | string) => {
      const message = typeof data === 'string' ? data : data.toString();
      dispatcher.handleMessage(ws, message).catch(crash);
    });

    ws.on('close', () => {
      dispatcher.handleDisconnection(ws).catch(crash);
    });

    ws.on('error', (error: unknown) => {
      log.error('WebSocket error', { error: describeError(error) });
    });
  });

  const shutdown = async (): Promise<void> => {
    log.info('Shutting down...');
    await lobbies.dispose();
    await matches.dispose();

    return new Promise((resolve) => {
      wss.close(() => {
        log.info('Server stopped');
        resolve();
      });
    });
  };

  if (config.handleSignals ?? true) {
    const handleSignal = (signal: string) => {
      log.info(`${signal} received`);
      shutdown()
        .then(() => process.exit(0))
        .catch(crash);
    };
    process.on('SIGTERM', () => handleSignal('SIGTERM'));
    process.on('SIGINT', () => handleSignal('SIGINT'));
  }

  return {
    dispatcher,
    lobbies,
    matches,
    port,
    stop: shutdown,
  };
}
