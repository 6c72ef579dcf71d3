/**
 * @fileoverview Matchmaking engine runtime.
 *
 * This package provides the session-lifecycle core shared by every game:
 * - Waiting parties, start triggers and the start sequence
 * - Broadcast channels fanning events out to participant sessions
 * - Per-participant sessions with inactivity timers
 * - The abstract game contract and the game catalog
 * - A WebSocket dispatcher in front of it all
 */

import type {
  GameId,
  Identity,
  MatchId,
  Outcome,
  Role,
  SessionState,
  TimeoutPolicy,
} from '@matchhall/framework-protocol';

// Re-export protocol types for convenience
export type { GameId, Identity, MatchId, Outcome, Role, SessionState, TimeoutPolicy };

export {
  BroadcastChannel,
  type BroadcastChannelOptions,
  type ChannelConsumer,
} from './channel/BroadcastChannel.js';
export {
  applyGameOverride,
  clearConfigCache,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type GameOverride,
  loadEngineConfig,
  parseEngineConfig,
} from './config/engineConfig.js';
export {
  ConnectionClosedError,
  type Connection,
  Dispatcher,
  type DispatcherOptions,
} from './dispatch/Dispatcher.js';
export {
  createDispatchServer,
  type DispatchServer,
  type DispatchServerConfig,
} from './dispatch/createDispatchServer.js';
export {
  DuplicateGameError,
  GameCatalog,
  type GameDefinition,
  globalCatalog,
} from './game/GameCatalog.js';
export {
  type AnyGame,
  type DepartureReason,
  GameContract,
  type GameFactory,
  type MatchContext,
} from './game/GameContract.js';
export { InMemoryScoreStore, type ScoreStore } from './game/ScoreStore.js';
export {
  type HostAuthority,
  LobbyRegistry,
  type LobbyRegistryOptions,
  selfHostAuthority,
} from './lobby/LobbyRegistry.js';
export {
  MatchmakingController,
  type MatchmakingControllerOptions,
} from './lobby/MatchmakingController.js';
export { createLogger, describeError, getLogLevel, type Logger, type LogLevel, logger, setLogLevel } from './logger.js';
export {
  type LaunchRequest,
  Match,
  MatchRegistry,
  type MatchRegistryOptions,
  type MatchRoster,
} from './match/Match.js';
export { type RenderHandle, type Renderer, ViewSlot } from './render/ViewSlot.js';
export { LobbySession, type LobbySessionHost } from './session/LobbySession.js';
export { MatchSession } from './session/MatchSession.js';
export { ParticipantSession, type TerminalState } from './session/ParticipantSession.js';
export { SessionTimer, type SessionTimerConfig, type SessionTimerState } from './timer/SessionTimer.js';

/**
 * Framework server version.
 */
export const FRAMEWORK_SERVER_VERSION = '1.0.0';
