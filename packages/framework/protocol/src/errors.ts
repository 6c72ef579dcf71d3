/**
 * @fileoverview Error taxonomy.
 *
 * LobbyError and MatchError subclasses are expected, user-facing conditions:
 * the engine rejects with them and the dispatcher presents them.
 * InvariantViolation marks a programming error and is never caught by the engine.
 */

export type LobbyErrorCode =
  | 'LOBBY_FULL'
  | 'ALREADY_QUEUED'
  | 'NOT_QUEUED'
  | 'NOT_HOST'
  | 'TOO_FEW_PLAYERS'
  | 'UNKNOWN_GAME';

export type MatchErrorCode = 'NOT_IN_MATCH' | 'NOT_YOUR_TURN' | 'ILLEGAL_MOVE';

/**
 * Base class for rejected lobby requests.
 */
export class LobbyError extends Error {
  constructor(
    readonly code: LobbyErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'LobbyError';
  }
}

/**
 * The private lobby has no room left for another player or spectator.
 */
export class LobbyFull extends LobbyError {
  constructor(gameId: string) {
    super('LOBBY_FULL', `Lobby for ${gameId} is full`);
    this.name = 'LobbyFull';
  }
}

export class AlreadyQueued extends LobbyError {
  constructor(identity: string, gameId: string) {
    super('ALREADY_QUEUED', `${identity} is already queued for ${gameId}`);
    this.name = 'AlreadyQueued';
  }
}

export class NotQueued extends LobbyError {
  constructor(identity: string, gameId: string) {
    super('NOT_QUEUED', `${identity} is not queued for ${gameId}`);
    this.name = 'NotQueued';
  }
}

export class NotHost extends LobbyError {
  constructor(identity: string) {
    super('NOT_HOST', `${identity} is not the host of this lobby`);
    this.name = 'NotHost';
  }
}

export class TooFewPlayers extends LobbyError {
  constructor(readonly minPlayers: number) {
    super('TOO_FEW_PLAYERS', `At least ${minPlayers} players are needed to start`);
    this.name = 'TooFewPlayers';
  }
}

/**
 * Thrown when a game id is not registered in the catalog.
 */
export class UnknownGame extends LobbyError {
  constructor(gameId: string) {
    super('UNKNOWN_GAME', `Game not found: ${gameId}`);
    this.name = 'UnknownGame';
  }
}

/**
 * Base class for rejected in-match requests.
 */
export class MatchError extends Error {
  constructor(
    readonly code: MatchErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'MatchError';
  }
}

export class NotInMatch extends MatchError {
  constructor(identity: string) {
    super('NOT_IN_MATCH', `${identity} is not playing in a running match`);
    this.name = 'NotInMatch';
  }
}

export class NotYourTurn extends MatchError {
  constructor(identity: string) {
    super('NOT_YOUR_TURN', `It is not ${identity}'s turn`);
    this.name = 'NotYourTurn';
  }
}

export class IllegalMove extends MatchError {
  constructor(reason: string) {
    super('ILLEGAL_MOVE', `Illegal move: ${reason}`);
    this.name = 'IllegalMove';
  }
}

/**
 * Internal invariant broken (e.g. popping more participants than queued,
 * updating a game that already ended). The engine never catches it.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantViolation';
  }
}

/**
 * Check whether an error is one of the expected, user-facing rejections.
 */
export function isEngineError(error: unknown): error is LobbyError | MatchError {
  return error instanceof LobbyError || error instanceof MatchError;
}
