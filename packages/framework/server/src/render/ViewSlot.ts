/**
 * @fileoverview Render-handle abstraction provided by the dispatcher.
 */

import type { Identity, ViewModel } from '@matchhall/framework-protocol';

/**
 * A live, updatable rendering owned by one participant (a chat message,
 * a socket-side view, ...).
 */
export interface RenderHandle {
  /**
   * Replace what the handle shows.
   * @returns The handle to use for subsequent updates
   */
  update(view: ViewModel): Promise<RenderHandle>;
  /** Remove the rendering */
  close(): Promise<void>;
}

/**
 * Creates render handles; implemented by the dispatcher.
 */
export interface Renderer {
  open(identity: Identity, view: ViewModel): Promise<RenderHandle>;
}

/**
 * Serializes every update to one render handle.
 *
 * A lobby session and the match session that replaces it share one slot,
 * so a lobby render still in flight always lands before the first match render.
 */
export class ViewSlot {
  private handle: RenderHandle;
  private tail: Promise<void> = Promise.resolve();
  private lastView: ViewModel | null;
  private isClosed = false;

  constructor(
    readonly identity: Identity,
    handle: RenderHandle,
    initialView: ViewModel | null = null
  ) {
    this.handle = handle;
    this.lastView = initialView;
  }

  get current(): RenderHandle {
    return this.handle;
  }

  get lastRendered(): ViewModel | null {
    return this.lastView;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Queue an update behind any update already in flight.
   * Rejects with the renderer's error if this update fails.
   */
  render(view: ViewModel): Promise<void> {
    const run = this.tail.then(async () => {
      if (this.isClosed) return;
      this.handle = await this.handle.update(view);
      this.lastView = view;
    });
    // A failed update must not block later ones
    this.tail = run.catch(() => undefined);
    return run;
  }

  /**
   * Queue removal of the rendering. Later renders are ignored.
   */
  close(): Promise<void> {
    const run = this.tail.then(async () => {
      if (this.isClosed) return;
      this.isClosed = true;
      await this.handle.close();
    });
    this.tail = run.catch(() => undefined);
    return run;
  }

  /**
   * Resolves once every queued operation has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
