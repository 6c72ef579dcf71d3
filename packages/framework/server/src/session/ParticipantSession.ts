/**
 * @fileoverview Per-participant session base.
 *
 * A session owns one participant's view of a lobby or match. It consumes the
 * shared channel, re-renders through its ViewSlot and runs an inactivity timer.
 * The consume loop always deregisters on exit, whatever the exit path.
 */

import {
  type GameId,
  type Identity,
  InvariantViolation,
  type LobbyEvent,
  type MatchEvent,
  type Role,
  type SessionState,
  type ViewModel,
} from '@matchhall/framework-protocol';
import type { BroadcastChannel, ChannelConsumer } from '../channel/BroadcastChannel.js';
import { createLogger, describeError, type Logger } from '../logger.js';
import type { ViewSlot } from '../render/ViewSlot.js';
import { SessionTimer } from '../timer/SessionTimer.js';

export type TerminalState = Exclude<SessionState, 'active'>;

export interface ParticipantSessionOptions<TEvent extends LobbyEvent | MatchEvent> {
  readonly gameId: GameId;
  readonly identity: Identity;
  readonly role: Role;
  readonly slot: ViewSlot;
  readonly channel: BroadcastChannel<TEvent>;
  readonly inactivityTimeoutMs: number;
}

export abstract class ParticipantSession<TEvent extends LobbyEvent | MatchEvent> {
  readonly gameId: GameId;
  readonly identity: Identity;
  readonly role: Role;
  /** Settles with the terminal state once the consume loop has exited */
  readonly finished: Promise<TerminalState>;

  protected readonly slot: ViewSlot;
  protected readonly log: Logger;

  private readonly channel: BroadcastChannel<TEvent>;
  private readonly consumer: ChannelConsumer<TEvent>;
  private readonly timer: SessionTimer;
  private current: SessionState = 'active';
  private finalRender: Promise<void> = Promise.resolve();

  constructor(options: ParticipantSessionOptions<TEvent>) {
    this.gameId = options.gameId;
    this.identity = options.identity;
    this.role = options.role;
    this.slot = options.slot;
    this.channel = options.channel;
    this.log = createLogger(`session:${options.gameId}`);

    this.consumer = this.channel.register();
    this.timer = new SessionTimer({
      delayMs: options.inactivityTimeoutMs,
      onFire: () => this.onInactivity(),
      label: `${options.gameId}:${options.identity}`,
    });
    this.timer.start();

    // Subclass fields are initialised once the constructor chain returns
    this.finished = Promise.resolve().then(() => this.run());
  }

  get state(): SessionState {
    return this.current;
  }

  get isActive(): boolean {
    return this.current === 'active';
  }

  /**
   * Restart the inactivity countdown.
   */
  resetTimer(): void {
    if (this.isActive) {
      this.timer.reset();
    }
  }

  /**
   * Ends the lobby part of this session without touching the rendering:
   * the match session that takes over renders through the same slot.
   */
  handOff(): void {
    this.finish('started', null);
  }

  // ============ Subclass Hooks ============

  protected abstract initialView(): ViewModel;

  /** Work the initial render must wait for, or null when there is none */
  protected prepare(): Promise<void> | null {
    return null;
  }

  protected abstract handleEvent(event: TEvent): Promise<void>;

  protected abstract onInactivity(): void | Promise<void>;

  /** Called once when a render fails; the participant is treated as gone */
  protected abstract onRenderFailure(): void | Promise<void>;

  // ============ Helpers ============

  /**
   * Render a view while the session is still active.
   */
  protected async renderView(view: ViewModel): Promise<void> {
    if (!this.isActive) return;
    await this.slot.render(view);
  }

  /**
   * Move to a terminal state: stop the timer, leave the channel and queue the
   * final view (or nothing, for a hand-off). Only the first call has effect.
   * @returns Resolves when the final view has been handed to the renderer
   */
  protected finish(state: TerminalState, finalView: ViewModel | null): Promise<void> {
    if (!this.isActive) return this.finalRender;

    this.current = state;
    this.timer.cancel();
    this.channel.deregister(this.consumer);
    this.log.debug('Session finished', { identity: this.identity, role: this.role, state });

    if (finalView !== null) {
      this.finalRender = this.slot.render(finalView).catch((error: unknown) => {
        this.log.warn('Final render failed', { identity: this.identity, error: describeError(error) });
      });
    }
    return this.finalRender;
  }

  private async run(): Promise<TerminalState> {
    try {
      const pending = this.prepare();
      if (pending) await pending;
      await this.renderView(this.initialView());

      while (this.isActive) {
        const next = await this.consumer.next();
        if (next.done) break;
        await this.handleEvent(next.value);
      }
    } catch (error) {
      if (error instanceof InvariantViolation) throw error;

      this.log.warn('Render failed, dropping participant', {
        identity: this.identity,
        error: describeError(error),
      });
      await this.onRenderFailure();
    } finally {
      this.timer.cancel();
      this.channel.deregister(this.consumer);
    }

    await this.finalRender;
    if (this.current === 'active') {
      throw new InvariantViolation(`session for ${this.identity} exited while active`);
    }
    return this.current;
  }
}
