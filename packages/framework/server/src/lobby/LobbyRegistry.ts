/**
 * @fileoverview Waiting parties of every game, keyed by (gameId, hostId).
 *
 * This is the surface the dispatcher calls. Each request suspends at most
 * once, while the placeholder view is opened; everything after that point
 * runs against a fresh lookup of the party.
 */

import {
  AlreadyQueued,
  type GameId,
  type Identity,
  LobbyFull,
  type LobbyRules,
  NotHost,
  NotQueued,
  type PlaceholderView,
  type Role,
  TooFewPlayers,
} from '@matchhall/framework-protocol';
import {
  applyGameOverride,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
} from '../config/engineConfig.js';
import type { GameCatalog } from '../game/GameCatalog.js';
import { createLogger, describeError } from '../logger.js';
import type { Match, MatchRegistry } from '../match/Match.js';
import type { RenderHandle, Renderer } from '../render/ViewSlot.js';
import { ViewSlot } from '../render/ViewSlot.js';
import { MatchmakingController } from './MatchmakingController.js';

const log = createLogger('lobby');

/**
 * Decides who may start a private party.
 */
export interface HostAuthority {
  isAuthorizedHost(identity: Identity, hostId: Identity): boolean | Promise<boolean>;
}

/**
 * Only the host itself may start its party.
 */
export const selfHostAuthority: HostAuthority = {
  isAuthorizedHost: (identity, hostId) => identity === hostId,
};

export interface LobbyRegistryOptions {
  readonly catalog: GameCatalog;
  readonly renderer: Renderer;
  readonly matches: MatchRegistry;
  readonly authority?: HostAuthority;
  readonly config?: EngineConfig;
}

export class LobbyRegistry {
  private readonly parties = new Map<GameId, Map<Identity | null, MatchmakingController>>();
  private readonly catalog: GameCatalog;
  private readonly renderer: Renderer;
  private readonly authority: HostAuthority;
  private readonly config: EngineConfig;

  readonly matches: MatchRegistry;

  constructor(options: LobbyRegistryOptions) {
    this.catalog = options.catalog;
    this.renderer = options.renderer;
    this.matches = options.matches;
    this.authority = options.authority ?? selfHostAuthority;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
  }

  // ============ Party Bookkeeping ============

  /**
   * Effective lobby rules of a game.
   * @throws {UnknownGame}
   */
  rulesFor(gameId: GameId): LobbyRules {
    const definition = this.catalog.get(gameId);
    return applyGameOverride(definition.manifest.rules, this.config.games[gameId]);
  }

  /**
   * @throws {UnknownGame}
   */
  getOrCreate(gameId: GameId, hostId: Identity | null): MatchmakingController {
    const existing = this.find(gameId, hostId);
    if (existing) return existing;

    const definition = this.catalog.get(gameId);
    const controller = new MatchmakingController({
      definition,
      rules: this.rulesFor(gameId),
      hostId,
      lobbyInactivityTimeoutMs: this.config.lobby.inactivityTimeoutMs,
      matches: this.matches,
      onSettled: (settled) => this.prune(settled),
    });

    let byHost = this.parties.get(gameId);
    if (!byHost) {
      byHost = new Map();
      this.parties.set(gameId, byHost);
    }
    byHost.set(hostId, controller);
    log.debug('Party created', { gameId, hostId });
    return controller;
  }

  find(gameId: GameId, hostId: Identity | null): MatchmakingController | undefined {
    return this.parties.get(gameId)?.get(hostId);
  }

  /**
   * Drop a party that has started (private) or holds nobody.
   * @returns true if the party was removed
   */
  prune(controller: MatchmakingController): boolean {
    if (!controller.closed && !controller.isEmpty) return false;

    const byHost = this.parties.get(controller.gameId);
    if (byHost?.get(controller.hostId) !== controller) return false;

    byHost.delete(controller.hostId);
    if (byHost.size === 0) {
      this.parties.delete(controller.gameId);
    }
    log.debug('Party removed', { gameId: controller.gameId, hostId: controller.hostId });
    return true;
  }

  /** Waiting parties of a game */
  partiesFor(gameId: GameId): MatchmakingController[] {
    return [...(this.parties.get(gameId)?.values() ?? [])];
  }

  /** The party of a game an identity is queued in, if any */
  locate(gameId: GameId, identity: Identity): MatchmakingController | undefined {
    return this.partiesFor(gameId).find((controller) => controller.has(identity));
  }

  get size(): number {
    let count = 0;
    for (const byHost of this.parties.values()) {
      count += byHost.size;
    }
    return count;
  }

  // ============ Dispatcher Surface ============

  /**
   * Queue a player.
   * @throws {UnknownGame | AlreadyQueued | LobbyFull}
   */
  join(gameId: GameId, hostId: Identity | null, identity: Identity): Promise<RenderHandle> {
    return this.enqueue(gameId, hostId, identity, 'player');
  }

  /**
   * Queue a spectator.
   * @throws {UnknownGame | AlreadyQueued | LobbyFull}
   */
  spectate(gameId: GameId, hostId: Identity | null, identity: Identity): Promise<RenderHandle> {
    return this.enqueue(gameId, hostId, identity, 'spectator');
  }

  /**
   * Leave whichever party of the game the identity is queued in.
   * @throws {NotQueued}
   */
  async leave(gameId: GameId, identity: Identity): Promise<void> {
    const controller = this.locate(gameId, identity);
    if (!controller) {
      throw new NotQueued(identity, gameId);
    }
    await controller.leave(identity);
  }

  /**
   * Host-initiated start of a private party.
   * @throws {UnknownGame | NotHost | TooFewPlayers}
   */
  async start(gameId: GameId, hostId: Identity | null, identity: Identity): Promise<Match> {
    const rules = this.rulesFor(gameId);
    if (hostId === null || !(await this.authority.isAuthorizedHost(identity, hostId))) {
      throw new NotHost(identity);
    }

    const controller = this.find(gameId, hostId);
    if (!controller) {
      throw new TooFewPlayers(rules.minPlayers);
    }
    return controller.start(identity);
  }

  /**
   * End every lobby session. Used on shutdown.
   */
  async dispose(): Promise<void> {
    const controllers = [...this.parties.values()].flatMap((byHost) => [...byHost.values()]);
    await Promise.all(controllers.map((controller) => controller.dispose()));
  }

  private async enqueue(
    gameId: GameId,
    hostId: Identity | null,
    identity: Identity,
    role: Role
  ): Promise<RenderHandle> {
    this.assertAdmissible(gameId, hostId, identity, role);

    const placeholder: PlaceholderView = { kind: 'placeholder', gameId, identity };
    const handle = await this.renderer.open(identity, placeholder);

    // The party may have started or filled while the placeholder was opening
    try {
      this.assertAdmissible(gameId, hostId, identity, role);
    } catch (error) {
      await this.closeRejected(handle, identity);
      throw error;
    }

    let controller = this.getOrCreate(gameId, hostId);
    if (role === 'player' && controller.isPublic && controller.atPlayerCap) {
      controller.startWaiting(identity);
      controller = this.getOrCreate(gameId, hostId);
    }
    controller.admit(identity, role, new ViewSlot(identity, handle, placeholder));
    return handle;
  }

  /**
   * @throws {UnknownGame | AlreadyQueued | LobbyFull}
   */
  private assertAdmissible(
    gameId: GameId,
    hostId: Identity | null,
    identity: Identity,
    role: Role
  ): void {
    const rules = this.rulesFor(gameId);
    if (this.locate(gameId, identity)) {
      throw new AlreadyQueued(identity, gameId);
    }

    const controller = this.find(gameId, hostId);
    if (controller) {
      controller.assertRoom(role);
    } else if (role === 'spectator' && rules.maxSpectators === 0) {
      throw new LobbyFull(gameId);
    }
  }

  private async closeRejected(handle: RenderHandle, identity: Identity): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      log.warn('Closing rejected placeholder failed', { identity, error: describeError(error) });
    }
  }
}
