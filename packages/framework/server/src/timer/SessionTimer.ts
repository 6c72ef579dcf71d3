import { InvariantViolation } from '@matchhall/framework-protocol';
import { createLogger, describeError } from '../logger.js';

const log = createLogger('timer');

export type SessionTimerState = 'idle' | 'pending' | 'running' | 'fired' | 'cancelled';

export interface SessionTimerConfig {
  /** Delay in milliseconds before the action runs */
  delayMs: number;
  /** Action to run. It must re-validate state: it can run after a late cancel */
  onFire: () => void | Promise<void>;
  /** Label used in log lines */
  label?: string;
}

/**
 * A cancellable delayed action, used for lobby start countdowns and
 * participant inactivity timeouts.
 *
 * Cancelling before the action runs is synchronous and guaranteed.
 * Cancelling once the action has begun is a no-op.
 */
export class SessionTimer {
  private readonly config: SessionTimerConfig;
  private handle: ReturnType<typeof setTimeout> | null = null;
  private deadline: number | null = null;
  private current: SessionTimerState = 'idle';
  private lastRun: Promise<void> = Promise.resolve();

  constructor(config: SessionTimerConfig) {
    this.config = config;
  }

  get state(): SessionTimerState {
    return this.current;
  }

  /** Whether the action is scheduled and has not started */
  get pending(): boolean {
    return this.current === 'pending';
  }

  /** Epoch milliseconds at which a pending action fires, or null */
  get firesAt(): number | null {
    return this.pending ? this.deadline : null;
  }

  get delayMs(): number {
    return this.config.delayMs;
  }

  /**
   * Schedule the action. Does nothing if it is already pending.
   */
  start(): this {
    if (this.current === 'pending') return this;

    this.deadline = Date.now() + this.config.delayMs;
    this.current = 'pending';
    this.handle = setTimeout(() => this.fire(), this.config.delayMs);
    log.debug('Timer scheduled', { label: this.label, delayMs: this.config.delayMs });
    return this;
  }

  /**
   * Cancel a pending action.
   * @returns true if the action was pending and will now never run
   */
  cancel(): boolean {
    if (this.current !== 'pending') return false;

    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
    this.deadline = null;
    this.current = 'cancelled';
    log.debug('Timer cancelled', { label: this.label });
    return true;
  }

  /**
   * Cancel if pending, then schedule again with the full delay.
   */
  reset(): this {
    this.cancel();
    this.current = 'idle';
    return this.start();
  }

  /**
   * Resolves once the most recent action run has settled.
   */
  settled(): Promise<void> {
    return this.lastRun;
  }

  private get label(): string {
    return this.config.label ?? 'timer';
  }

  private fire(): void {
    if (this.current !== 'pending') return;

    this.handle = null;
    this.deadline = null;
    this.current = 'running';

    this.lastRun = (async () => {
      await this.config.onFire();
    })()
      .catch((error: unknown) => {
        log.error('Timer action failed', { label: this.label, error: describeError(error) });
        // Programming errors stay fatal
        if (error instanceof InvariantViolation) throw error;
      })
      .finally(() => {
        if (this.current === 'running') {
          this.current = 'fired';
        }
      });
  }
}
