import type { Logger } from '../errors.js';

export type TickSample = {
  tickIndex: number;
  tickMs: number;
  cpuPercent: number;
};

export type TickViolation = {
  tickIndex: number;
  tickMs: number;
  limitMs: number;
};

export type TickWatchdogSnapshot = {
  ticks: number;
  tickMsAvg: number;
  tickMsMax: number;
  cpuPercentAvg: number;
  overBudget: number;
  lastSample: TickSample | null;
  history: TickSample[];
  recentViolations: TickViolation[];
};

export type MeasurementProvider = {
  now: () => bigint;
  cpu: () => NodeJS.CpuUsage;
  /** Wall clock in ms used to rate-limit warnings. */
  wallMs: () => number;
};

export type TickWatchdogOptions = {
  budgetMs: number;
  tolerance?: number;
  historySize?: number;
  warnIntervalMs?: number;
  logger?: Logger;
};

const DEFAULT_PROVIDER: MeasurementProvider = {
  now: () => process.hrtime.bigint(),
  cpu: () => process.cpuUsage(),
  wallMs: () => Date.now(),
};

const MAX_RECENT_VIOLATIONS = 16;

/**
 * Measures scheduler ticks against the tick period. Over-budget ticks are
 * counted; warnings are rate limited to one per `warnIntervalMs`.
 */
export class TickWatchdog {
  private readonly budgetMs: number;
  private readonly tolerance: number;
  private readonly historySize: number;
  private readonly warnIntervalMs: number;
  private readonly logger: Logger;
  private readonly history: TickSample[] = [];
  private readonly violations: TickViolation[] = [];

  private tickCount = 0;
  private tickMsTotal = 0;
  private tickMsMax = 0;
  private cpuPercentTotal = 0;
  private overBudget = 0;
  private suppressed = 0;
  private lastWarnAt: number | null = null;
  private lastSample: TickSample | null = null;

  private tickStart: { time: bigint; cpu: NodeJS.CpuUsage; tickIndex: number } | null = null;

  constructor(
    options: TickWatchdogOptions,
    private readonly provider: MeasurementProvider = DEFAULT_PROVIDER,
  ) {
    this.budgetMs = options.budgetMs;
    this.tolerance = Math.max(0, options.tolerance ?? 0.1);
    this.historySize = Math.max(0, Math.floor(options.historySize ?? 32));
    this.warnIntervalMs = Math.max(0, options.warnIntervalMs ?? 1000);
    this.logger = options.logger ?? console;
  }

  beginTick(tickIndex: number) {
    if (this.tickStart) {
      throw new Error('[scheduler] beginTick called twice without endTick.');
    }
    this.tickStart = {
      time: this.provider.now(),
      cpu: this.provider.cpu(),
      tickIndex,
    };
  }

  endTick(): TickSample {
    if (!this.tickStart) {
      throw new Error('[scheduler] endTick called without beginTick.');
    }
    const endTime = this.provider.now();
    const endCpu = this.provider.cpu();
    const start = this.tickStart;
    this.tickStart = null;

    const tickMs = Number(endTime - start.time) / 1_000_000;
    const cpuMs = (endCpu.user - start.cpu.user + endCpu.system - start.cpu.system) / 1000;
    const cpuPercent = tickMs > 0 ? (cpuMs / tickMs) * 100 : 0;
    const sample: TickSample = { tickIndex: start.tickIndex, tickMs, cpuPercent };

    this.tickCount += 1;
    this.tickMsTotal += tickMs;
    this.cpuPercentTotal += cpuPercent;
    this.tickMsMax = Math.max(this.tickMsMax, tickMs);
    this.lastSample = sample;

    if (this.historySize > 0) {
      this.history.push(sample);
      if (this.history.length > this.historySize) {
        this.history.shift();
      }
    }

    this.checkBudget(sample);
    return sample;
  }

  private checkBudget(sample: TickSample) {
    const limitMs = this.budgetMs * (1 + this.tolerance);
    if (!(sample.tickMs > limitMs)) return;

    this.overBudget += 1;
    this.violations.push({ tickIndex: sample.tickIndex, tickMs: sample.tickMs, limitMs });
    if (this.violations.length > MAX_RECENT_VIOLATIONS) {
      this.violations.shift();
    }

    const now = this.provider.wallMs();
    if (this.lastWarnAt !== null && now - this.lastWarnAt < this.warnIntervalMs) {
      this.suppressed += 1;
      return;
    }
    const extra = this.suppressed > 0 ? ` (+${this.suppressed} more since last warning)` : '';
    this.logger.warn(
      `[scheduler] tick ${sample.tickIndex} took ${sample.tickMs.toFixed(1)} ms, budget ${this.budgetMs.toFixed(1)} ms${extra}`,
    );
    this.lastWarnAt = now;
    this.suppressed = 0;
  }

  snapshot(): TickWatchdogSnapshot {
    const ticks = this.tickCount;
    return {
      ticks,
      tickMsAvg: ticks > 0 ? this.tickMsTotal / ticks : 0,
      tickMsMax: this.tickMsMax,
      cpuPercentAvg: ticks > 0 ? this.cpuPercentTotal / ticks : 0,
      overBudget: this.overBudget,
      lastSample: this.lastSample,
      history: [...this.history],
      recentViolations: [...this.violations],
    };
  }

  reset(): void {
    this.tickCount = 0;
    this.tickMsTotal = 0;
    this.tickMsMax = 0;
    this.cpuPercentTotal = 0;
    this.overBudget = 0;
    this.suppressed = 0;
    this.lastWarnAt = null;
    this.lastSample = null;
    this.history.length = 0;
    this.violations.length = 0;
    this.tickStart = null;
  }
}
