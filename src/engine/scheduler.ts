import type { AudioSnapshotCell } from '../audio/snapshotCell.js';
import { BLACK, clamp01, clampColor, wrapHue } from '../color/colorSpaces.js';
import { describeError, type Logger } from '../errors.js';
import type { EngineFrame, PatternEngine } from '../patterns/engine.js';
import type { PatternName } from '../patterns/types.js';
import type { LightHandle, LightTransport, LightUpdate } from '../transport/types.js';
import type { TickWatchdog, TickWatchdogSnapshot } from './tickWatchdog.js';

export type SchedulerState = 'idle' | 'running' | 'stopping' | 'terminated';

/** Clock and one-shot timer; `schedule` returns a cancel function. */
export type SchedulerTimers = {
  now(): number;
  schedule(callback: () => void, delayMs: number): () => void;
};

export const systemTimers: SchedulerTimers = {
  now: () => performance.now(),
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  },
};

export type LightSchedulerOptions = {
  updateRate: number;
  removeRetries: number;
  teardownTimeoutMs: number;
  logger?: Logger;
  timers?: SchedulerTimers;
  watchdog?: TickWatchdog;
};

export type TickResult = {
  tick: number;
  pattern: PatternName;
  elapsed: number;
  sent: number;
  unchanged: number;
  failed: number;
};

export type TeardownResult = {
  removed: number;
  failed: number;
  timedOut: boolean;
};

export type SchedulerStatus = {
  state: SchedulerState;
  pattern: PatternName;
  pendingPattern: PatternName | null;
  ticks: number;
  patternElapsed: number;
  updatesSent: number;
  updateFailures: number;
  lights: number;
  watchdog: TickWatchdogSnapshot | null;
};

export const COLOR_EPSILON = 1e-4;
export const ROTATION_EPSILON_DEGREES = 0.01;

const UPDATE_FAILURE_LOG_INTERVAL = 100;

const angleBetween = (a: number, b: number): number => {
  const delta = Math.abs(wrapHue(a) - wrapHue(b));
  return Math.min(delta, 360 - delta);
};

export const lightChanged = (previous: LightUpdate | null, next: LightUpdate): boolean => {
  if (!previous) return true;
  if (
    Math.abs(previous.intensity - next.intensity) > COLOR_EPSILON ||
    Math.abs(previous.color.r - next.color.r) > COLOR_EPSILON ||
    Math.abs(previous.color.g - next.color.g) > COLOR_EPSILON ||
    Math.abs(previous.color.b - next.color.b) > COLOR_EPSILON
  ) {
    return true;
  }
  if (next.rotation === undefined) return false;
  if (previous.rotation === undefined) return true;
  return angleBetween(previous.rotation, next.rotation) > ROTATION_EPSILON_DEGREES;
};

const sanitize = (frame: EngineFrame | undefined): LightUpdate => {
  if (!frame) return { color: BLACK, intensity: 0 };
  const update: LightUpdate = { color: clampColor(frame.color), intensity: clamp01(frame.intensity) };
  return frame.rotation === undefined ? update : { ...update, rotation: wrapHue(frame.rotation) };
};

/**
 * Fixed-rate light loop. Owns the last-sent state of every light, applies
 * pattern switches at tick boundaries and sends only changed lights.
 */
export class LightScheduler {
  private state: SchedulerState = 'idle';
  private readonly timers: SchedulerTimers;
  private readonly logger: Logger;
  private readonly periodMs: number;
  private readonly lastSent: (LightUpdate | null)[];
  private pendingPattern: PatternName | null = null;
  private patternStartedAt = 0;
  private loopStartedAt = 0;
  private ticks = 0;
  private updatesSent = 0;
  private updateFailures = 0;
  private cancelTimer: (() => void) | null = null;
  private stopping: Promise<TeardownResult> | null = null;

  constructor(
    private readonly engine: PatternEngine,
    private readonly cell: AudioSnapshotCell,
    private readonly transport: LightTransport,
    private readonly lights: readonly LightHandle[],
    private readonly options: LightSchedulerOptions,
  ) {
    if (!(options.updateRate > 0) || !Number.isFinite(options.updateRate)) {
      throw new RangeError(`updateRate must be a positive number (got ${options.updateRate})`);
    }
    this.timers = options.timers ?? systemTimers;
    this.logger = options.logger ?? console;
    this.periodMs = 1000 / options.updateRate;
    this.lastSent = lights.map(() => null);
  }

  getState(): SchedulerState {
    return this.state;
  }

  get activePattern(): PatternName {
    return this.engine.activePattern;
  }

  start(): void {
    if (this.state !== 'idle') {
      throw new Error(`[scheduler] cannot start from state ${this.state}`);
    }
    this.state = 'running';
    const now = this.timers.now();
    this.patternStartedAt = now;
    this.loopStartedAt = now;
    this.logger.log(
      `[scheduler] running ${this.lights.length} lights at ${this.options.updateRate} Hz, pattern ${this.engine.activePattern}`,
    );
    this.scheduleNext();
  }

  private scheduleNext() {
    if (this.state !== 'running') return;
    const now = this.timers.now();
    let due = this.loopStartedAt + (this.ticks + 1) * this.periodMs;
    if (now - due > this.periodMs) {
      // Fell more than a period behind; re-anchor instead of bursting.
      this.loopStartedAt = now - this.ticks * this.periodMs;
      due = now;
    }
    this.cancelTimer = this.timers.schedule(() => {
      this.cancelTimer = null;
      try {
        this.tick();
      } catch (error) {
        this.logger.error(`[scheduler] tick failed: ${describeError(error)}`);
      }
      this.scheduleNext();
    }, Math.max(0, due - now));
  }

  /**
   * Records a switch to be applied at the start of the next tick. Returns
   * false once the scheduler is stopping.
   */
  requestPattern(name: PatternName): boolean {
    if (this.state === 'stopping' || this.state === 'terminated') return false;
    this.pendingPattern = name;
    return true;
  }

  tick(): TickResult | null {
    if (this.state !== 'running') return null;
    const watchdog = this.options.watchdog;
    watchdog?.beginTick(this.ticks);
    try {
      return this.runTick();
    } finally {
      watchdog?.endTick();
    }
  }

  private runTick(): TickResult {
    const now = this.timers.now();
    if (this.pendingPattern !== null) {
      const next = this.pendingPattern;
      this.pendingPattern = null;
      this.engine.switchTo(next);
      this.patternStartedAt = now;
      this.logger.log(`[scheduler] pattern -> ${next}`);
    }
    const elapsed = Math.max(0, (now - this.patternStartedAt) / 1000);
    const frames = this.engine.evaluate(elapsed, this.cell.read());

    let sent = 0;
    let unchanged = 0;
    let failed = 0;
    this.lights.forEach((handle, i) => {
      const update = sanitize(frames[i]);
      if (!lightChanged(this.lastSent[i], update)) {
        unchanged += 1;
        return;
      }
      try {
        this.transport.updateLight(handle, update);
        this.lastSent[i] = update;
        sent += 1;
      } catch (error) {
        failed += 1;
        this.updateFailures += 1;
        if (this.updateFailures === 1 || this.updateFailures % UPDATE_FAILURE_LOG_INTERVAL === 0) {
          this.logger.warn(
            `[scheduler] update failed for ${handle.id}: ${describeError(error)} (${this.updateFailures} failures so far)`,
          );
        }
      }
    });

    this.ticks += 1;
    this.updatesSent += sent;
    return { tick: this.ticks, pattern: this.engine.activePattern, elapsed, sent, unchanged, failed };
  }

  /**
   * Stops ticking at once and removes every light, bounded by
   * `teardownTimeoutMs`. Repeated calls return the same result.
   */
  stop(): Promise<TeardownResult> {
    if (!this.stopping) {
      this.stopping = this.teardown();
    }
    return this.stopping;
  }

  private async teardown(): Promise<TeardownResult> {
    if (this.state === 'idle') {
      this.state = 'terminated';
      return { removed: 0, failed: 0, timedOut: false };
    }
    this.state = 'stopping';
    this.cancelTimer?.();
    this.cancelTimer = null;
    this.pendingPattern = null;

    let removed = 0;
    const removals = Promise.all(
      this.lights.map(async (handle) => {
        if (await this.removeWithRetry(handle)) removed += 1;
      }),
    );
    let expire: () => void = () => undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      expire = () => resolve('timeout');
    });
    const cancelTimeout = this.timers.schedule(() => expire(), this.options.teardownTimeoutMs);
    const outcome = await Promise.race([removals.then(() => 'done' as const), timeout]);
    cancelTimeout();

    const timedOut = outcome === 'timeout';
    const result: TeardownResult = { removed, failed: this.lights.length - removed, timedOut };
    if (timedOut) {
      this.logger.warn(
        `[scheduler] teardown timed out after ${this.options.teardownTimeoutMs} ms (${removed}/${this.lights.length} removed)`,
      );
    } else if (result.failed > 0) {
      this.logger.warn(`[scheduler] ${result.failed} of ${this.lights.length} lights could not be removed`);
    }
    this.state = 'terminated';
    this.logger.log('[scheduler] terminated');
    return result;
  }

  private async removeWithRetry(handle: LightHandle): Promise<boolean> {
    const attempts = 1 + Math.max(0, this.options.removeRetries);
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.transport.removeLight(handle);
        return true;
      } catch (error) {
        if (attempt === attempts) {
          this.logger.warn(`[scheduler] remove ${handle.id} failed: ${describeError(error)}`);
        }
      }
    }
    return false;
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      pattern: this.engine.activePattern,
      pendingPattern: this.pendingPattern,
      ticks: this.ticks,
      patternElapsed:
        this.state === 'running' ? Math.max(0, (this.timers.now() - this.patternStartedAt) / 1000) : 0,
      updatesSent: this.updatesSent,
      updateFailures: this.updateFailures,
      lights: this.lights.length,
      watchdog: this.options.watchdog?.snapshot() ?? null,
    };
  }
}
