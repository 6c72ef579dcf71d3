/**
 * @fileoverview Connection-level command dispatch.
 *
 * Handles:
 * - Connection registry (one identity per connection, announced with hello)
 * - Command parsing and routing to the lobby and match registries
 * - Render handles realised as render / close_view messages
 * - Error presentation
 */

import {
  type ClientCommand,
  type Identity,
  InvariantViolation,
  isEngineError,
  parseClientCommand,
  type ServerMessage,
  type ViewModel,
} from '@matchhall/framework-protocol';
import type { EngineConfig } from '../config/engineConfig.js';
import type { GameCatalog } from '../game/GameCatalog.js';
import { type HostAuthority, LobbyRegistry } from '../lobby/LobbyRegistry.js';
import { createLogger, describeError } from '../logger.js';
import type { MatchRegistry } from '../match/Match.js';
import type { RenderHandle, Renderer } from '../render/ViewSlot.js';

const log = createLogger('dispatch');

/**
 * WebSocket-like interface for connection abstraction.
 * Allows testing without real WebSocket connections.
 */
export interface Connection {
  send(data: string): void;
  close(): void;
  /** Connection state (1 = OPEN) */
  readonly readyState: number;
  /** WebSocket OPEN constant */
  readonly OPEN: number;
}

/**
 * Error raised by a render handle whose connection is gone.
 */
export class ConnectionClosedError extends Error {
  constructor(identity: Identity) {
    super(`Connection of ${identity} is closed`);
    this.name = 'ConnectionClosedError';
  }
}

function send(conn: Connection, message: ServerMessage): boolean {
  if (conn.readyState !== conn.OPEN) return false;
  conn.send(JSON.stringify(message));
  return true;
}

class ConnectionRenderHandle implements RenderHandle {
  constructor(
    private readonly conn: Connection,
    private readonly identity: Identity,
    readonly viewId: number
  ) {}

  async update(view: ViewModel): Promise<RenderHandle> {
    if (!send(this.conn, { type: 'render', viewId: this.viewId, view })) {
      throw new ConnectionClosedError(this.identity);
    }
    return this;
  }

  async close(): Promise<void> {
    send(this.conn, { type: 'close_view', viewId: this.viewId });
  }
}

export interface DispatcherOptions {
  readonly catalog: GameCatalog;
  readonly matches: MatchRegistry;
  readonly engine?: EngineConfig;
  readonly authority?: HostAuthority;
}

/**
 * Routes client commands into the engine and renders views back onto the
 * connection of the identity they belong to.
 */
export class Dispatcher implements Renderer {
  readonly lobbies: LobbyRegistry;
  readonly matches: MatchRegistry;

  private readonly catalog: GameCatalog;
  private readonly identities = new Map<Connection, Identity>();
  private readonly connections = new Map<Identity, Connection>();
  private nextViewId = 1;

  constructor(options: DispatcherOptions) {
    this.catalog = options.catalog;
    this.matches = options.matches;
    this.lobbies = new LobbyRegistry({
      catalog: options.catalog,
      matches: options.matches,
      renderer: this,
      ...(options.engine ? { config: options.engine } : {}),
      ...(options.authority ? { authority: options.authority } : {}),
    });
  }

  // ============ Renderer ============

  async open(identity: Identity, view: ViewModel): Promise<RenderHandle> {
    const conn = this.connections.get(identity);
    if (!conn) {
      throw new ConnectionClosedError(identity);
    }
    const handle = new ConnectionRenderHandle(conn, identity, this.nextViewId++);
    return handle.update(view);
  }

  // ============ Connection Management ============

  get connectionCount(): number {
    return this.identities.size;
  }

  identityOf(conn: Connection): Identity | undefined {
    return this.identities.get(conn);
  }

  /**
   * Handle an incoming raw message. Resolves once the command has been
   * answered; rejects only on an invariant violation.
   */
  async handleMessage(conn: Connection, rawData: string): Promise<void> {
    let payload: unknown;
    try {
      payload = JSON.parse(rawData);
    } catch {
      send(conn, { type: 'error', code: 'BAD_REQUEST', message: 'Invalid JSON' });
      return;
    }

    const command = parseClientCommand(payload);
    if (!command) {
      send(conn, { type: 'error', code: 'BAD_REQUEST', message: 'Invalid message format' });
      return;
    }

    if (command.type === 'hello') {
      this.handleHello(conn, command.identity);
      return;
    }

    const identity = this.identities.get(conn);
    if (identity === undefined) {
      send(conn, { type: 'error', code: 'BAD_REQUEST', message: 'Send hello first' });
      return;
    }

    try {
      await this.execute(identity, command);
      send(conn, { type: 'ok', command: command.type });
    } catch (error) {
      if (isEngineError(error)) {
        send(conn, { type: 'error', code: error.code, message: error.message });
        return;
      }
      if (error instanceof InvariantViolation) throw error;

      log.error('Command failed', { identity, command: command.type, error: describeError(error) });
      send(conn, { type: 'error', code: 'INTERNAL', message: 'Internal error' });
    }
  }

  /**
   * Handle a connection closing: leave every queue and running match.
   */
  async handleDisconnection(conn: Connection): Promise<void> {
    const identity = this.identities.get(conn);
    if (identity === undefined) return;

    this.identities.delete(conn);
    if (this.connections.get(identity) === conn) {
      this.connections.delete(identity);
    }
    log.info('Connection closed', { identity });

    const { catalog, lobbies, matches } = this;
    const departures: Promise<void>[] = [];
    for (const gameId of catalog.listIds()) {
      if (lobbies.locate(gameId, identity)) {
        departures.push(lobbies.leave(gameId, identity));
      }
    }
    for (const match of matches.list()) {
      if (match.hasActive(identity)) {
        departures.push(match.leave(identity));
      }
    }
    await Promise.all(departures);
  }

  private handleHello(conn: Connection, identity: Identity): void {
    const current = this.identities.get(conn);
    if (current !== undefined && current !== identity) {
      send(conn, { type: 'error', code: 'BAD_REQUEST', message: `Already identified as ${current}` });
      return;
    }
    const other = this.connections.get(identity);
    if (other && other !== conn) {
      send(conn, { type: 'error', code: 'BAD_REQUEST', message: `${identity} is connected elsewhere` });
      return;
    }

    this.identities.set(conn, identity);
    this.connections.set(identity, conn);
    log.info('Connection identified', { identity });
    send(conn, { type: 'welcome', identity });
  }

  private async execute(
    identity: Identity,
    command: Exclude<ClientCommand, { type: 'hello' }>
  ): Promise<void> {
    const { lobbies, matches } = this;

    switch (command.type) {
      case 'join':
        await lobbies.join(command.gameId, command.hostId, identity);
        return;
      case 'spectate':
        await lobbies.spectate(command.gameId, command.hostId, identity);
        return;
      case 'leave':
        await lobbies.leave(command.gameId, identity);
        return;
      case 'start':
        await lobbies.start(command.gameId, command.hostId, identity);
        return;
      case 'move':
        await matches.play(command.gameId, identity, command.move);
        return;
      case 'resign':
        await matches.leave(command.gameId, identity);
        return;
    }
  }
}
