/**
 * @fileoverview State machine for one waiting party.
 *
 * Handles:
 * - Player and spectator admission against the lobby rules
 * - Start triggers (party full, minimum reached in the public queue)
 * - The start sequence: pop, hand off, build the game, attach match sessions
 *
 * Everything here is synchronous apart from session renders, so a start can
 * never interleave with an admission.
 */

import {
  type GameId,
  type Identity,
  InvariantViolation,
  type LobbyEvent,
  LobbyFull,
  type LobbyRules,
  type LobbyView,
  NotQueued,
  type Role,
  TooFewPlayers,
} from '@matchhall/framework-protocol';
import { BroadcastChannel } from '../channel/BroadcastChannel.js';
import type { GameDefinition } from '../game/GameCatalog.js';
import { createLogger } from '../logger.js';
import type { Match, MatchRegistry } from '../match/Match.js';
import type { ViewSlot } from '../render/ViewSlot.js';
import { LobbySession, type LobbySessionHost } from '../session/LobbySession.js';
import { SessionTimer } from '../timer/SessionTimer.js';

const log = createLogger('lobby');

export interface MatchmakingControllerOptions {
  readonly definition: GameDefinition;
  /** Effective rules (manifest plus configured overrides) */
  readonly rules: LobbyRules;
  /** Host of a private party, null for the public queue */
  readonly hostId: Identity | null;
  readonly lobbyInactivityTimeoutMs: number;
  readonly matches: MatchRegistry;
  /** Called after a start or a departure so the owner can drop a spent party */
  readonly onSettled?: (controller: MatchmakingController) => void;
}

/**
 * Take up to `limit` entries (all when null) from the front of a map.
 */
function popFront<V>(map: Map<Identity, V>, limit: number | null): Map<Identity, V> {
  const popped = new Map<Identity, V>();
  for (const [key, value] of map) {
    if (limit !== null && popped.size >= limit) break;
    popped.set(key, value);
  }
  for (const key of popped.keys()) {
    map.delete(key);
  }
  return popped;
}

export class MatchmakingController implements LobbySessionHost {
  readonly gameId: GameId;
  readonly hostId: Identity | null;
  readonly rules: LobbyRules;

  private readonly options: MatchmakingControllerOptions;
  private readonly players = new Map<Identity, ViewSlot>();
  private readonly spectators = new Map<Identity, ViewSlot>();
  private readonly sessions = new Map<Identity, LobbySession>();
  private readonly channel: BroadcastChannel<LobbyEvent>;
  private startTimer: SessionTimer | null = null;
  private starting = false;
  private isClosed = false;

  constructor(options: MatchmakingControllerOptions) {
    this.options = options;
    this.gameId = options.definition.manifest.id;
    this.hostId = options.hostId;
    this.rules = options.rules;
    this.channel = new BroadcastChannel<LobbyEvent>({
      name: `lobby:${this.gameId}:${this.hostId ?? 'public'}`,
    });
  }

  // ============ State ============

  get playerIds(): Identity[] {
    return [...this.players.keys()];
  }

  get spectatorIds(): Identity[] {
    return [...this.spectators.keys()];
  }

  get isPublic(): boolean {
    return this.hostId === null;
  }

  /** True once a private party has started; it takes no further requests */
  get closed(): boolean {
    return this.isClosed;
  }

  /** No players, no spectators and no pending start */
  get isEmpty(): boolean {
    return this.players.size === 0 && this.spectators.size === 0 && this.startTimer === null;
  }

  get atPlayerCap(): boolean {
    return this.rules.maxPlayers !== null && this.players.size >= this.rules.maxPlayers;
  }

  /** Epoch milliseconds of the pending start, if any */
  get startsAt(): number | null {
    return this.startTimer?.firesAt ?? null;
  }

  has(identity: Identity): boolean {
    return this.players.has(identity) || this.spectators.has(identity);
  }

  roleOf(identity: Identity): Role | null {
    if (this.players.has(identity)) return 'player';
    if (this.spectators.has(identity)) return 'spectator';
    return null;
  }

  describe(): LobbyView {
    return {
      kind: 'lobby',
      gameId: this.gameId,
      hostId: this.hostId,
      players: this.playerIds,
      spectators: this.spectatorIds,
      spectatorsAllowed: this.rules.maxSpectators !== 0,
      startsAt: this.startsAt,
      canStart: this.hostId !== null && this.players.size >= this.rules.minPlayers,
    };
  }

  /**
   * Check there is room for one more participant in the given role.
   * The public queue never reports full players: a join there starts the
   * waiting match first.
   * @throws {LobbyFull}
   */
  assertRoom(role: Role): void {
    if (role === 'player') {
      if (!this.isPublic && this.atPlayerCap) throw new LobbyFull(this.gameId);
      return;
    }
    const { maxSpectators } = this.rules;
    if (maxSpectators === 0 || (maxSpectators !== null && this.spectators.size >= maxSpectators)) {
      throw new LobbyFull(this.gameId);
    }
  }

  // ============ Requests ============

  /**
   * Admit a participant whose placeholder is already rendered, then evaluate
   * the start triggers.
   * @returns The match if this admission started one
   * @throws {LobbyFull}
   */
  admit(identity: Identity, role: Role, slot: ViewSlot): Match | null {
    if (this.isClosed) {
      throw new InvariantViolation(`admission into closed party ${this.channel.name}`);
    }
    if (this.has(identity)) {
      throw new InvariantViolation(`${identity} admitted twice into ${this.channel.name}`);
    }
    this.assertRoom(role);

    (role === 'player' ? this.players : this.spectators).set(identity, slot);
    this.sessions.set(
      identity,
      new LobbySession({
        gameId: this.gameId,
        identity,
        role,
        slot,
        channel: this.channel,
        inactivityTimeoutMs: this.options.lobbyInactivityTimeoutMs,
        host: this,
      })
    );
    log.info('Participant queued', {
      gameId: this.gameId,
      hostId: this.hostId,
      identity,
      role,
      players: this.players.size,
      spectators: this.spectators.size,
    });

    this.channel.publish({ type: 'players_changed', origin: identity });
    return role === 'player' ? this.afterPlayerJoined(identity) : this.afterSpectatorJoined(identity);
  }

  /**
   * Remove a queued participant.
   * @throws {NotQueued}
   */
  async leave(identity: Identity): Promise<void> {
    if (!this.has(identity)) {
      throw new NotQueued(identity, this.gameId);
    }
    await this.remove(identity, 'left');
  }

  /**
   * Lobby session timeout or render failure. No-op for someone no longer queued.
   */
  async expire(identity: Identity, reason: 'timed_out' | 'left'): Promise<void> {
    if (!this.has(identity)) return;
    await this.remove(identity, reason);
  }

  /**
   * Host-initiated start. Authorization is checked by the caller.
   * @throws {TooFewPlayers}
   */
  start(origin: Identity): Match {
    if (this.players.size < this.rules.minPlayers) {
      throw new TooFewPlayers(this.rules.minPlayers);
    }
    const match = this.runStart(origin);
    if (!match) {
      throw new InvariantViolation(`start re-entered for ${this.channel.name}`);
    }
    return match;
  }

  /**
   * Start the match the public queue is holding at full players, to make
   * room for a newcomer.
   */
  startWaiting(origin: Identity): Match | null {
    if (!this.atPlayerCap) return null;
    return this.runStart(origin);
  }

  /**
   * Cancel the pending start and end every lobby session. Used on shutdown.
   */
  async dispose(): Promise<void> {
    this.cancelPendingStart();
    const identities = [...this.sessions.keys()];
    await Promise.all(identities.map((identity) => this.remove(identity, 'left')));
  }

  // ============ Triggers ============

  private afterPlayerJoined(origin: Identity): Match | null {
    const { minPlayers, maxPlayers, maxSpectators } = this.rules;
    let started: Match | null = null;

    // (a) party full
    if (maxPlayers !== null && this.players.size === maxPlayers) {
      const spectatorsFull = maxSpectators === null || this.spectators.size >= maxSpectators;
      if (spectatorsFull) {
        started = this.runStart(origin);
      }
    }

    // (b) minimum reached in the public queue; sees the count after (a)
    if (this.isPublic && this.players.size === minPlayers) {
      this.scheduleStart();
    }
    return started;
  }

  private afterSpectatorJoined(origin: Identity): Match | null {
    const { maxSpectators } = this.rules;
    if (maxSpectators !== null && this.spectators.size === maxSpectators && this.atPlayerCap) {
      return this.runStart(origin);
    }
    return null;
  }

  private scheduleStart(): void {
    if (this.startTimer?.pending) return;

    this.startTimer = new SessionTimer({
      delayMs: this.rules.waitTimeMs,
      label: `start:${this.channel.name}`,
      onFire: () => this.onWaitElapsed(),
    }).start();
    log.debug('Start scheduled', { gameId: this.gameId, delayMs: this.rules.waitTimeMs });
  }

  private onWaitElapsed(): void {
    this.startTimer = null;
    if (this.isClosed || this.players.size < this.rules.minPlayers) {
      this.options.onSettled?.(this);
      return;
    }
    this.runStart(null);
  }

  private cancelPendingStart(): void {
    if (this.startTimer === null) return;
    this.startTimer.cancel();
    this.startTimer = null;
  }

  // ============ Start Sequence ============

  /**
   * @returns null when a start is already running for this party
   */
  private runStart(origin: Identity | null): Match | null {
    if (this.starting) return null;
    this.starting = true;

    try {
      this.cancelPendingStart();

      const players = popFront(this.players, this.rules.maxPlayers);
      const spectators = popFront(this.spectators, this.rules.maxSpectators);
      if (players.size === 0) {
        throw new InvariantViolation(`start with no players in ${this.channel.name}`);
      }

      for (const identity of [...players.keys(), ...spectators.keys()]) {
        this.sessions.get(identity)?.handOff();
        this.sessions.delete(identity);
      }

      const match = this.options.matches.launch({
        manifest: this.options.definition.manifest,
        create: this.options.definition.create,
        rules: this.rules,
        roster: { players, spectators },
      });

      this.channel.publish({
        type: 'started',
        origin,
        matchId: match.id,
        players: [...players.keys()],
        spectators: [...spectators.keys()],
      });

      if (!this.isPublic) {
        this.isClosed = true;
      }
      log.info('Party started', { gameId: this.gameId, hostId: this.hostId, matchId: match.id });
      this.options.onSettled?.(this);
      return match;
    } finally {
      this.starting = false;
    }
  }

  private async remove(identity: Identity, reason: 'timed_out' | 'left'): Promise<void> {
    this.players.delete(identity);
    this.spectators.delete(identity);
    const session = this.sessions.get(identity);
    this.sessions.delete(identity);

    if (this.players.size < this.rules.minPlayers) {
      this.cancelPendingStart();
    }
    log.info('Participant left queue', { gameId: this.gameId, hostId: this.hostId, identity, reason });

    // Ends the session before the publish so it never sees its own departure
    const finalRender = session?.leave(reason);
    this.channel.publish({ type: 'players_changed', origin: identity });
    this.options.onSettled?.(this);
    await finalRender;
  }
}
