import { config } from '../../config';

/**
 * Wall-clock primitives the timer needs. Overridable for tests and for hosts
 * that run on a different clock.
 */
export interface TimerHost {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): ReturnType<typeof setTimeout>;
  clearTimeout(handle: ReturnType<typeof setTimeout>): void;
}

/**
 * Uses whatever global timer functions are installed at call time, so Jest
 * fake timers take effect even for timers created before they were enabled.
 */
export const globalTimerHost: TimerHost = {
  now: () => Date.now(),
  setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeout: (handle) => clearTimeout(handle),
};

export interface SuspendedEventTimerOptions {
  host?: TimerHost;
  /** Longest single wait; defaults to `config.timers.maxDelayMs`. */
  maxDelayMs?: number;
}

/**
 * Single-slot wall-clock timer for a session's suspended event.
 *
 * Arming always replaces whatever was armed before, mirroring the
 * single-slot contract of `suspendedEvent`. Deadlines further away than
 * `maxDelayMs` are reached by re-arming for the remainder each time the
 * shorter wait elapses. A deadline already in the past fires on the next
 * tick rather than synchronously, so callers never re-enter the session
 * from inside `arm`.
 */
export class SuspendedEventTimer {
  private readonly host: TimerHost;
  private readonly maxDelayMs: number;
  private handle: ReturnType<typeof setTimeout> | null = null;
  private fireAt: number | null = null;
  private onFire: (() => void) | null = null;

  constructor(options: SuspendedEventTimerOptions = {}) {
    this.host = options.host ?? globalTimerHost;
    this.maxDelayMs = options.maxDelayMs ?? config.timers.maxDelayMs;
  }

  arm(fireAt: number, onFire: () => void): void {
    this.disarm();
    this.fireAt = fireAt;
    this.onFire = onFire;
    this.schedule();
  }

  disarm(): void {
    if (this.handle !== null) {
      this.host.clearTimeout(this.handle);
    }
    this.handle = null;
    this.fireAt = null;
    this.onFire = null;
  }

  isArmed(): boolean {
    return this.fireAt !== null;
  }

  getFireAt(): number | null {
    return this.fireAt;
  }

  private schedule(): void {
    if (this.fireAt === null) return;
    const remaining = Math.max(0, this.fireAt - this.host.now());
    const delay = Math.min(remaining, this.maxDelayMs);
    this.handle = this.host.setTimeout(() => this.elapse(), delay);
  }

  private elapse(): void {
    this.handle = null;
    if (this.fireAt === null || this.onFire === null) return;

    if (this.fireAt > this.host.now()) {
      this.schedule();
      return;
    }

    const onFire = this.onFire;
    this.fireAt = null;
    this.onFire = null;
    onFire();
  }
}
