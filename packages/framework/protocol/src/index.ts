/**
 * @fileoverview Shared protocol definitions for the matchmaking engine.
 *
 * This package defines the vocabulary every other package speaks:
 * - Participant identities and roles
 * - Events fanned out on lobby and match channels
 * - View models handed to the external renderer
 * - The error taxonomy and game manifests
 */

/**
 * Opaque participant identity, supplied by the dispatcher.
 */
export type Identity = string;

/**
 * Game identifier (e.g. 'connect4').
 */
export type GameId = string;

/**
 * Identifier of a started match.
 */
export type MatchId = string;

/**
 * How a participant takes part in a lobby or match.
 */
export type Role = 'player' | 'spectator';

/**
 * Result of a finished (or unfinished) game from one player's point of view.
 * The base contract does not distinguish a draw from a loss.
 */
export type Outcome = 'won' | 'drawn_or_lost' | 'not_over';

/**
 * What a match does with a player whose session timed out or left.
 */
export type TimeoutPolicy = 'end_match' | 'forfeit' | 'drop_participant';

/**
 * Lifecycle state of a participant session.
 * Everything but 'active' is terminal; 'started' is the lobby hand-off.
 */
export type SessionState = 'active' | 'started' | 'timed_out' | 'left' | 'game_over';

/**
 * Why a match ended.
 */
export type MatchEndReason = 'completed' | 'timeout' | 'forfeit' | 'abandoned';

// ============ Channel Events ============

/**
 * Lobby membership changed (join, leave, spectate, timeout).
 */
export interface PlayersChangedEvent {
  readonly type: 'players_changed';
  readonly origin: Identity | null;
}

/**
 * The waiting party started a match.
 */
export interface StartedEvent {
  readonly type: 'started';
  readonly origin: Identity | null;
  readonly matchId: MatchId;
  readonly players: readonly Identity[];
  readonly spectators: readonly Identity[];
}

export type LobbyEvent = PlayersChangedEvent | StartedEvent;

export interface MoveMadeEvent {
  readonly type: 'move_made';
  readonly origin: Identity;
}

/**
 * A participant timed out or left a running match.
 */
export interface TimeoutEvent {
  readonly type: 'timeout';
  readonly origin: Identity;
  readonly reason: 'timed_out' | 'left';
}

export interface GameOverEvent {
  readonly type: 'game_over';
  readonly origin: Identity | null;
  readonly reason: MatchEndReason;
}

export type MatchEvent = MoveMadeEvent | TimeoutEvent | GameOverEvent;

// ============ View Models ============

/**
 * Shown while a join or spectate request is being processed.
 */
export interface PlaceholderView {
  readonly kind: 'placeholder';
  readonly gameId: GameId;
  readonly identity: Identity;
}

export interface LobbyView {
  readonly kind: 'lobby';
  readonly gameId: GameId;
  readonly hostId: Identity | null;
  readonly players: readonly Identity[];
  readonly spectators: readonly Identity[];
  readonly spectatorsAllowed: boolean;
  /** Epoch milliseconds at which the pending start fires, if any */
  readonly startsAt: number | null;
  /** Whether the host may start the match now */
  readonly canStart: boolean;
}

export interface MatchView<TBoard = unknown> {
  readonly kind: 'match';
  readonly gameId: GameId;
  readonly matchId: MatchId;
  readonly viewer: Identity;
  readonly role: Role;
  readonly yourTurn: boolean;
  readonly board: TBoard;
  /** Stored best of a player in a score-tracking game, else null */
  readonly best: number | null;
}

/**
 * Score line shown at the end of a score-tracking game.
 */
export interface ScoreSummary {
  readonly score: number;
  readonly best: number;
  readonly newBest: boolean;
}

export interface SummaryView<TBoard = unknown> {
  readonly kind: 'summary';
  readonly gameId: GameId;
  readonly viewer: Identity;
  readonly state: Exclude<SessionState, 'active'>;
  readonly reason: MatchEndReason | null;
  readonly outcome: Outcome | null;
  readonly board: TBoard | null;
  readonly score: ScoreSummary | null;
}

export type ViewModel = PlaceholderView | LobbyView | MatchView | SummaryView;

/**
 * Framework protocol version.
 */
export const FRAMEWORK_PROTOCOL_VERSION = '1.0.0';

// ============ Errors ============

export {
  AlreadyQueued,
  IllegalMove,
  InvariantViolation,
  isEngineError,
  LobbyError,
  type LobbyErrorCode,
  LobbyFull,
  MatchError,
  type MatchErrorCode,
  NotHost,
  NotInMatch,
  NotQueued,
  NotYourTurn,
  TooFewPlayers,
  UnknownGame,
} from './errors.js';

// ============ Game Manifests ============

export {
  type GameManifest,
  GameManifestSchema,
  InvalidManifestError,
  type LobbyRules,
  LobbyRulesSchema,
  validateManifest,
} from './manifest.js';

// ============ Client Commands ============

export {
  type ClientCommand,
  ClientCommandSchema,
  parseClientCommand,
  type ServerMessage,
} from './commands.js';
