import type { Identity, LobbyEvent, LobbyView, ViewModel } from '@matchhall/framework-protocol';
import { ParticipantSession, type ParticipantSessionOptions } from './ParticipantSession.js';

/**
 * What a lobby session needs from the party it waits in.
 */
export interface LobbySessionHost {
  /** Current lobby view */
  describe(): LobbyView;
  /** Remove a participant whose lobby session went quiet or lost its rendering */
  expire(identity: Identity, reason: 'timed_out' | 'left'): Promise<void>;
}

export interface LobbySessionOptions extends ParticipantSessionOptions<LobbyEvent> {
  readonly host: LobbySessionHost;
}

/**
 * A participant waiting in a party. Re-renders the lobby on membership
 * changes made by others and is handed off when a match starts.
 */
export class LobbySession extends ParticipantSession<LobbyEvent> {
  private readonly host: LobbySessionHost;

  constructor(options: LobbySessionOptions) {
    super(options);
    this.host = options.host;
  }

  /**
   * Leave the party, leaving a final view behind.
   */
  leave(state: 'timed_out' | 'left'): Promise<void> {
    return this.finish(state, {
      kind: 'summary',
      gameId: this.gameId,
      viewer: this.identity,
      state,
      reason: null,
      outcome: null,
      board: null,
      score: null,
    });
  }

  protected initialView(): ViewModel {
    return this.host.describe();
  }

  protected async handleEvent(event: LobbyEvent): Promise<void> {
    switch (event.type) {
      case 'players_changed':
        if (event.origin === this.identity) return;
        await this.renderView(this.host.describe());
        return;
      case 'started':
        if (event.players.includes(this.identity) || event.spectators.includes(this.identity)) {
          this.handOff();
          return;
        }
        await this.renderView(this.host.describe());
        return;
    }
  }

  protected onInactivity(): Promise<void> {
    this.log.info('Lobby participant timed out', { identity: this.identity });
    return this.host.expire(this.identity, 'timed_out');
  }

  protected onRenderFailure(): Promise<void> {
    return this.host.expire(this.identity, 'left');
  }
}
