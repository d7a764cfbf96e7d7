import process from 'node:process';
import type { Server } from 'node:http';
import type { Readable } from 'node:stream';

import { AudioAnalyzer } from '../audio/analyzer.js';
import { AudioPump } from '../audio/pump.js';
import { AudioSnapshotCell } from '../audio/snapshotCell.js';
import { FfmpegAudioSource } from '../audio/sources/ffmpegSource.js';
import { SyntheticAudioSource } from '../audio/sources/syntheticSource.js';
import type { AudioSource } from '../audio/sources/types.js';
import type { AudioConfig, ZonelightConfig } from '../config/defaults.js';
import { attachControlInput } from '../control/controlInput.js';
import type { ControlStatus, PatternController } from '../control/types.js';
import { LightScheduler, type SchedulerTimers, type TeardownResult } from '../engine/scheduler.js';
import { TickWatchdog } from '../engine/tickWatchdog.js';
import { ConfigurationError, TransportError, describeError, type Logger } from '../errors.js';
import { createLayout, describeLayout, type LightLayout } from '../layout/layout.js';
import { PatternEngine } from '../patterns/engine.js';
import type { PatternName } from '../patterns/types.js';
import { closeControlServer, startControlServer } from '../server/index.js';
import type { LightHandle, LightTransport } from '../transport/types.js';

export type CreateLightsOptions = {
  createRetries: number;
  logger?: Logger;
};

const removeQuietly = async (transport: LightTransport, handles: readonly LightHandle[], logger: Logger) => {
  const results = await Promise.allSettled(handles.map((handle) => transport.removeLight(handle)));
  const failed = results.filter((result) => result.status === 'rejected').length;
  if (failed > 0) {
    logger.warn(`[session] ${failed} lights could not be removed during rollback`);
  }
};

/**
 * Creates every light of the layout in global order. A light that still fails
 * after `createRetries` retries rolls back the lights created so far and
 * aborts with a TransportError.
 */
export const createSessionLights = async (
  transport: LightTransport,
  layout: LightLayout,
  options: CreateLightsOptions,
): Promise<LightHandle[]> => {
  const logger = options.logger ?? console;
  const attempts = 1 + Math.max(0, options.createRetries);
  const handles: LightHandle[] = [];

  for (const light of layout.lights) {
    const spec = {
      zone: light.zone,
      index: light.zoneIndex,
      globalIndex: light.globalIndex,
      position: light.position,
    };
    let lastError: unknown = null;
    let handle: LightHandle | null = null;
    for (let attempt = 1; attempt <= attempts && handle === null; attempt++) {
      try {
        handle = await transport.createLight(spec);
      } catch (error) {
        lastError = error;
        logger.warn(
          `[session] create ${light.zone}[${light.zoneIndex}] failed (attempt ${attempt}/${attempts}): ${describeError(error)}`,
        );
      }
    }
    if (handle === null) {
      await removeQuietly(transport, handles, logger);
      throw new TransportError(
        'create',
        `could not create light ${light.zone}[${light.zoneIndex}] after ${attempts} attempts`,
        { cause: lastError },
      );
    }
    handles.push(handle);
  }
  logger.log(`[session] created ${handles.length} lights (${describeLayout(layout) || 'empty layout'})`);
  return handles;
};

export const createAudioSource = (audio: AudioConfig, logger: Logger = console): AudioSource | null => {
  const base = { sampleRate: audio.sampleRate, blockSize: audio.hopSize };
  const ffmpeg = { ffmpeg: audio.ffmpeg, logger };
  switch (audio.source) {
    case 'none':
      return null;
    case 'synthetic':
      return new SyntheticAudioSource({ ...base, bpm: audio.syntheticBpm });
    case 'file':
      if (audio.path === undefined) {
        throw new ConfigurationError('audio.path is required when audio.source is "file"');
      }
      return new FfmpegAudioSource({ kind: 'file', path: audio.path }, { ...base, ...ffmpeg });
    case 'pulse':
    case 'alsa':
      return new FfmpegAudioSource({ kind: audio.source, device: audio.device }, { ...base, ...ffmpeg });
  }
};

export type SessionDependencies = {
  transport: LightTransport;
  /** Overrides the configured audio source; null runs without audio. */
  audioSource?: AudioSource | null;
  input?: Readable;
  logger?: Logger;
  timers?: SchedulerTimers;
  pattern?: PatternName;
};

export type SessionSummary = {
  pattern: PatternName;
  ticks: number;
  updatesSent: number;
  updateFailures: number;
  teardown: TeardownResult;
};

/** A running session: lights created, audio pumping, scheduler ticking. */
export class LightSession implements PatternController {
  private stopping: Promise<SessionSummary> | null = null;
  private resolveDone: (summary: SessionSummary) => void = () => undefined;
  readonly done: Promise<SessionSummary>;
  private detachInput: (() => void) | null = null;
  private server: Server | null = null;

  private constructor(
    readonly layout: LightLayout,
    readonly scheduler: LightScheduler,
    readonly cell: AudioSnapshotCell,
    private readonly transport: LightTransport,
    private readonly pump: AudioPump | null,
    private readonly audioDescription: string,
    private readonly logger: Logger,
  ) {
    this.done = new Promise<SessionSummary>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  static async start(config: ZonelightConfig, deps: SessionDependencies): Promise<LightSession> {
    const logger = deps.logger ?? console;
    const { transport } = deps;
    const layout = createLayout(config.layout);
    const handles = await createSessionLights(transport, layout, {
      createRetries: config.transport.createRetries,
      logger,
    });

    const cell = new AudioSnapshotCell();
    let pump: AudioPump | null = null;
    let source: AudioSource | null = null;
    try {
      source = deps.audioSource === undefined ? createAudioSource(config.audio, logger) : deps.audioSource;
      if (source) {
        const analyzer = new AudioAnalyzer(cell, config.audio, { logger });
        pump = new AudioPump(source, analyzer, cell, {
          dropoutTimeoutMs: config.audio.dropoutTimeoutMs,
          restartDelayMs: config.audio.restartDelayMs,
          logger,
        });
        await pump.start();
      } else {
        logger.log('[audio] no audio source; audio patterns show their idle look');
      }
    } catch (error) {
      await removeQuietly(transport, handles, logger);
      throw error;
    }

    const engine = new PatternEngine(layout, deps.pattern ?? config.defaultPattern, {
      patterns: { chaseTail: config.chaseTail, chaseStepSeconds: config.chaseStepSeconds },
      rotation: config.rotation,
    });
    const scheduler = new LightScheduler(engine, cell, transport, handles, {
      updateRate: config.updateRate,
      removeRetries: config.transport.removeRetries,
      teardownTimeoutMs: config.transport.teardownTimeoutMs,
      logger,
      timers: deps.timers,
      watchdog: new TickWatchdog({ budgetMs: 1000 / config.updateRate, logger }),
    });

    const session = new LightSession(
      layout,
      scheduler,
      cell,
      transport,
      pump,
      source?.description ?? 'none',
      logger,
    );
    scheduler.start();
    if (deps.input) {
      session.detachInput = attachControlInput(deps.input, session, logger);
    }
    if (config.control.port !== null) {
      try {
        session.server = await startControlServer({
          controller: session,
          port: config.control.port,
          host: config.control.host,
          logger,
        });
      } catch (error) {
        logger.warn(`[control] HTTP control unavailable: ${describeError(error)}`);
      }
    }
    return session;
  }

  currentPattern(): PatternName {
    return this.scheduler.getStatus().pendingPattern ?? this.scheduler.activePattern;
  }

  requestPattern(name: PatternName): boolean {
    return this.scheduler.requestPattern(name);
  }

  status(): ControlStatus {
    const status = this.scheduler.getStatus();
    const cell = this.cell.getDiagnostics();
    return {
      state: status.state,
      pattern: status.pattern,
      pendingPattern: status.pendingPattern,
      ticks: status.ticks,
      lights: status.lights,
      updatesSent: status.updatesSent,
      updateFailures: status.updateFailures,
      audio: { source: this.audioDescription, snapshotVersion: cell.version, lastSource: cell.lastSource },
    };
  }

  requestStop(): void {
    this.stop().catch((error: unknown) => {
      this.logger.error(`[session] shutdown failed: ${describeError(error)}`);
    });
  }

  /** Stops ticking, removes the lights and releases audio, control and transport. */
  stop(): Promise<SessionSummary> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<SessionSummary> {
    this.logger.log('[session] stopping');
    this.detachInput?.();
    this.detachInput = null;
    const teardown = await this.scheduler.stop();
    await this.pump?.stop();
    if (this.server) {
      await closeControlServer(this.server);
      this.server = null;
    }
    try {
      await this.transport.close();
    } catch (error) {
      this.logger.warn(`[session] transport close failed: ${describeError(error)}`);
    }
    const status = this.scheduler.getStatus();
    const summary: SessionSummary = {
      pattern: status.pattern,
      ticks: status.ticks,
      updatesSent: status.updatesSent,
      updateFailures: status.updateFailures,
      teardown,
    };
    this.logger.log(
      `[session] stopped after ${summary.ticks} ticks; removed ${teardown.removed}/${teardown.removed + teardown.failed} lights${teardown.timedOut ? ' (timed out)' : ''}`,
    );
    this.resolveDone(summary);
    return summary;
  }
}

/** Warns when lights may have been left behind; a timed-out teardown still ends the run normally. */
export const reportTeardown = (summary: SessionSummary, logger: Logger = console): void => {
  if (!summary.teardown.timedOut) return;
  logger.warn(`[session] teardown timed out; ${summary.teardown.failed} lights may still be on the host`);
};

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/** Stops the session on SIGINT/SIGTERM; returns a function removing the handlers. */
export const stopOnSignals = (session: LightSession, logger: Logger = console): (() => void) => {
  const handler = (signal: NodeJS.Signals) => {
    logger.log(`[session] received ${signal}`);
    session.requestStop();
  };
  for (const signal of STOP_SIGNALS) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of STOP_SIGNALS) {
      process.off(signal, handler);
    }
  };
};
