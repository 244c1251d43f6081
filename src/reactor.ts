/**
 * Cooperative event loop abstraction.
 *
 * All socket readiness callbacks, deferred tasks and timers run on one loop
 * and never concurrently. Times are milliseconds on a monotonic clock.
 */

import { performance } from 'node:perf_hooks';

/** Wake time meaning "as soon as possible". */
export const NOW = 0;

/** Wake time meaning "not scheduled". */
export const NEVER = Number.POSITIVE_INFINITY;

/**
 * Something whose readiness can be watched, such as a socket.
 *
 * `watch` returns a function that stops watching.
 */
export interface Pollable {
  watch(onReady: () => void): () => void;
}

/**
 * Opaque handle for a registered readiness watch.
 */
export interface FdHandle {
  readonly source: Pollable;
}

/**
 * Opaque handle for a registered timer.
 */
export interface ReactorTimer {
  readonly waketime: number;
}

/**
 * Timer callback: receives the current time, returns the next wake time.
 */
export type TimerCallback = (eventtime: number) => number;

/**
 * Event loop surface consumed by the server.
 */
export interface Reactor {
  monotonic(): number;
  registerCallback(callback: (eventtime: number) => void): void;
  registerTimer(callback: TimerCallback, waketime?: number): ReactorTimer;
  updateTimer(timer: ReactorTimer, waketime: number): void;
  unregisterTimer(timer: ReactorTimer): void;
  registerFd(source: Pollable, callback: (eventtime: number) => void): FdHandle;
  unregisterFd(handle: FdHandle): void;
  /**
   * Resolve at (or after) `waketime`, yielding to other work meanwhile.
   */
  pause(waketime: number): Promise<number>;
}

class NodeTimer implements ReactorTimer {
  waketime = NEVER;
  handle: ReturnType<typeof setTimeout> | null = null;
  active = true;

  constructor(readonly callback: TimerCallback) {}
}

class NodeFdHandle implements FdHandle {
  constructor(
    readonly source: Pollable,
    readonly unwatch: () => void
  ) {}
}

/**
 * Reactor backed by the Node.js event loop.
 *
 * Timers are unref'd: open sockets, not pending timers, keep the process alive.
 */
export class NodeReactor implements Reactor {
  private _timers = new Set<NodeTimer>();

  monotonic(): number {
    return performance.now();
  }

  registerCallback(callback: (eventtime: number) => void): void {
    setImmediate(() => callback(this.monotonic()));
  }

  registerTimer(callback: TimerCallback, waketime = NEVER): ReactorTimer {
    const timer = new NodeTimer(callback);
    this._timers.add(timer);
    this._schedule(timer, waketime);
    return timer;
  }

  updateTimer(timer: ReactorTimer, waketime: number): void {
    const owned = this._own(timer);
    if (owned.active) {
      this._schedule(owned, waketime);
    }
  }

  unregisterTimer(timer: ReactorTimer): void {
    const owned = this._own(timer);
    this._schedule(owned, NEVER);
    owned.active = false;
    this._timers.delete(owned);
  }

  registerFd(source: Pollable, callback: (eventtime: number) => void): FdHandle {
    const unwatch = source.watch(() => callback(this.monotonic()));
    return new NodeFdHandle(source, unwatch);
  }

  unregisterFd(handle: FdHandle): void {
    if (!(handle instanceof NodeFdHandle)) {
      throw new Error('Handle was not registered with this reactor');
    }
    handle.unwatch();
  }

  pause(waketime: number): Promise<number> {
    const delayMs = Math.max(0, waketime - this.monotonic());
    return new Promise((resolve) => {
      setTimeout(() => resolve(this.monotonic()), delayMs);
    });
  }

  private _own(timer: ReactorTimer): NodeTimer {
    if (!(timer instanceof NodeTimer) || !this._timers.has(timer)) {
      throw new Error('Timer was not registered with this reactor');
    }
    return timer;
  }

  private _schedule(timer: NodeTimer, waketime: number): void {
    if (timer.handle) {
      clearTimeout(timer.handle);
      timer.handle = null;
    }
    timer.waketime = waketime;
    if (waketime === NEVER) return;

    const delayMs = Math.max(0, waketime - this.monotonic());
    timer.handle = setTimeout(() => this._fire(timer), delayMs);
    timer.handle.unref();
  }

  private _fire(timer: NodeTimer): void {
    timer.handle = null;
    const next = timer.callback(this.monotonic());
    // The callback may have rescheduled or removed the timer itself.
    if (timer.active && timer.handle === null) {
      this._schedule(timer, next);
    }
  }
}
