/**
 * @fileoverview Running matches and their participant sessions.
 */

import {
  type GameId,
  type GameManifest,
  type Identity,
  type LobbyRules,
  type MatchEvent,
  type MatchId,
  NotInMatch,
  type Role,
} from '@matchhall/framework-protocol';
import { BroadcastChannel } from '../channel/BroadcastChannel.js';
import type { AnyGame, GameFactory } from '../game/GameContract.js';
import type { ScoreStore } from '../game/ScoreStore.js';
import { createLogger } from '../logger.js';
import type { ViewSlot } from '../render/ViewSlot.js';
import { MatchSession } from '../session/MatchSession.js';

const log = createLogger('match');

/**
 * Participants popped from a waiting party, in join order, with the slots
 * their lobby sessions rendered through.
 */
export interface MatchRoster {
  readonly players: ReadonlyMap<Identity, ViewSlot>;
  readonly spectators: ReadonlyMap<Identity, ViewSlot>;
}

export interface LaunchRequest {
  readonly manifest: GameManifest;
  readonly create: GameFactory;
  /** Effective rules for this match */
  readonly rules: LobbyRules;
  readonly roster: MatchRoster;
}

/**
 * One running match: the game, its channel and one session per participant.
 */
export class Match {
  private readonly sessions = new Map<Identity, MatchSession>();

  constructor(
    readonly id: MatchId,
    readonly gameId: GameId,
    readonly game: AnyGame,
    readonly channel: BroadcastChannel<MatchEvent>
  ) {}

  attach(session: MatchSession): void {
    this.sessions.set(session.identity, session);
  }

  session(identity: Identity): MatchSession | undefined {
    return this.sessions.get(identity);
  }

  /** Whether the identity still has an active session here */
  hasActive(identity: Identity): boolean {
    return this.sessions.get(identity)?.isActive ?? false;
  }

  get participants(): Identity[] {
    return [...this.sessions.keys()];
  }

  /**
   * Apply a raw move from a participant.
   * @throws {NotInMatch} if the identity has no active player session here
   */
  play(identity: Identity, rawMove: unknown): Promise<unknown> {
    const session = this.sessions.get(identity);
    if (!session?.isActive) {
      return Promise.reject(new NotInMatch(identity));
    }
    return session.play(rawMove);
  }

  /**
   * Resign or stop spectating.
   */
  leave(identity: Identity): Promise<void> {
    const session = this.sessions.get(identity);
    if (!session?.isActive) {
      return Promise.reject(new NotInMatch(identity));
    }
    return session.depart('left');
  }

  /**
   * Resolves once every session has reached a terminal state.
   */
  async settled(): Promise<void> {
    await Promise.all([...this.sessions.values()].map((session) => session.finished));
  }
}

export interface MatchRegistryOptions {
  readonly scores?: ScoreStore | null;
  /** Random source handed to games */
  readonly random?: () => number;
}

/**
 * Tracks running matches. A match is released once its channel has no
 * consumers left, i.e. once every session has ended.
 */
export class MatchRegistry {
  private readonly matches = new Map<MatchId, Match>();
  private readonly scores: ScoreStore | null;
  private readonly random: () => number;

  constructor(options: MatchRegistryOptions = {}) {
    this.scores = options.scores ?? null;
    this.random = options.random ?? Math.random;
  }

  /**
   * Build the game for a popped roster and hand every participant a match
   * session on the slot its lobby session used. Synchronous.
   */
  launch(request: LaunchRequest): Match {
    const { manifest, rules, roster } = request;
    const matchId = this.generateMatchId();

    const channel = new BroadcastChannel<MatchEvent>({
      name: `match:${matchId}`,
      onIdle: () => this.release(matchId),
    });

    const game = request.create({
      matchId,
      gameId: manifest.id,
      players: [...roster.players.keys()],
      spectators: [...roster.spectators.keys()],
      events: channel,
      rules,
      random: this.random,
    });

    const match = new Match(matchId, manifest.id, game, channel);
    const inactivityTimeoutMs = rules.matchInactivityTimeoutMs;

    const attach = (role: Role, slots: ReadonlyMap<Identity, ViewSlot>): void => {
      for (const [identity, slot] of slots) {
        match.attach(
          new MatchSession({
            gameId: manifest.id,
            identity,
            role,
            slot,
            channel,
            inactivityTimeoutMs,
            game,
            scores: this.scores,
            tracksScore: manifest.tracksScore,
          })
        );
      }
    };
    attach('player', roster.players);
    attach('spectator', roster.spectators);

    this.matches.set(matchId, match);
    log.info('Match started', {
      matchId,
      gameId: manifest.id,
      players: roster.players.size,
      spectators: roster.spectators.size,
    });
    return match;
  }

  get(matchId: MatchId): Match | undefined {
    return this.matches.get(matchId);
  }

  /**
   * Most recent match of a game in which the identity is still active.
   */
  forParticipant(gameId: GameId, identity: Identity): Match | undefined {
    let found: Match | undefined;
    for (const match of this.matches.values()) {
      if (match.gameId === gameId && match.hasActive(identity)) {
        found = match;
      }
    }
    return found;
  }

  /**
   * @throws {NotInMatch} if the identity is in no running match of this game
   */
  play(gameId: GameId, identity: Identity, rawMove: unknown): Promise<unknown> {
    const match = this.forParticipant(gameId, identity);
    if (!match) return Promise.reject(new NotInMatch(identity));
    return match.play(identity, rawMove);
  }

  /**
   * @throws {NotInMatch} if the identity is in no running match of this game
   */
  leave(gameId: GameId, identity: Identity): Promise<void> {
    const match = this.forParticipant(gameId, identity);
    if (!match) return Promise.reject(new NotInMatch(identity));
    return match.leave(identity);
  }

  /**
   * Make every remaining participant leave. Used on shutdown.
   */
  async dispose(): Promise<void> {
    const departures = this.list().flatMap((match) =>
      match.participants.filter((identity) => match.hasActive(identity)).map((identity) => match.leave(identity))
    );
    await Promise.all(departures);
  }

  get size(): number {
    return this.matches.size;
  }

  list(): Match[] {
    return [...this.matches.values()];
  }

  private release(matchId: MatchId): void {
    if (this.matches.delete(matchId)) {
      log.info('Match released', { matchId });
    }
  }

  /**
   * Six-character match code.
   */
  private generateMatchId(): MatchId {
    const chars = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
    for (;;) {
      let id = '';
      for (let i = 0; i < 6; i++) {
        id += chars.charAt(Math.floor(Math.random() * chars.length));
      }
      if (!this.matches.has(id)) return id;
    }
  }
}
