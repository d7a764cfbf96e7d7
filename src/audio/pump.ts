import { setTimeout as sleep } from 'node:timers/promises';

import { AudioSourceError, describeError, type Logger } from '../errors.js';
import type { AudioAnalyzer } from './analyzer.js';
import type { AudioSnapshotCell } from './snapshotCell.js';
import type { AudioSource } from './sources/types.js';

export type AudioPumpOptions = {
  dropoutTimeoutMs: number;
  restartDelayMs: number;
  logger?: Logger;
};

export type AudioPumpStats = {
  blocks: number;
  dropouts: number;
  failures: number;
  restarts: number;
};

export type AudioPumpState = 'idle' | 'running' | 'stopped';

const toSourceError = (source: AudioSource, error: unknown): AudioSourceError =>
  error instanceof AudioSourceError
    ? error
    : new AudioSourceError(source.description, describeError(error), { cause: error });

/**
 * Pulls PCM blocks from a source at the source's own cadence and feeds the
 * analyzer. Stalls publish silence; failures publish silence and restart the
 * source after a delay.
 */
export class AudioPump {
  private state: AudioPumpState = 'idle';
  private loop: Promise<void> | null = null;
  private abort = new AbortController();
  private readonly logger: Logger;
  private stats: AudioPumpStats = { blocks: 0, dropouts: 0, failures: 0, restarts: 0 };

  constructor(
    private readonly source: AudioSource,
    private readonly analyzer: AudioAnalyzer,
    private readonly cell: AudioSnapshotCell,
    private readonly options: AudioPumpOptions,
  ) {
    this.logger = options.logger ?? console;
  }

  getState(): AudioPumpState {
    return this.state;
  }

  getStats(): AudioPumpStats {
    return { ...this.stats };
  }

  /** Starts the source; a failure here is thrown so startup can abort. */
  async start(): Promise<void> {
    if (this.state !== 'idle') return;
    try {
      await this.source.start();
    } catch (error) {
      this.state = 'stopped';
      throw toSourceError(this.source, error);
    }
    this.state = 'running';
    this.logger.log(`[audio] reading from ${this.source.description} @ ${this.source.sampleRate} Hz`);
    this.loop = this.run().catch((error: unknown) => {
      this.state = 'stopped';
      this.logger.error(`[audio] read loop aborted: ${describeError(error)}`);
    });
  }

  private async run(): Promise<void> {
    while (this.state === 'running') {
      let block: Float32Array;
      try {
        block = await this.readWithDropout();
      } catch (error) {
        if (this.state !== 'running') break;
        await this.recover(toSourceError(this.source, error));
        continue;
      }
      if (this.state !== 'running') break;
      this.stats.blocks += 1;
      this.analyzer.push(block);
    }
  }

  private async readWithDropout(): Promise<Float32Array> {
    const timer = setTimeout(() => {
      this.stats.dropouts += 1;
      this.cell.publishSilence('dropout');
      this.logger.warn(
        `[audio] no audio from ${this.source.description} for ${this.options.dropoutTimeoutMs} ms; publishing silence`,
      );
    }, this.options.dropoutTimeoutMs);
    // A read the source never settles must not keep stop() waiting on the loop.
    const signal = this.abort.signal;
    let onAbort: () => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(new AudioSourceError(this.source.description, 'read aborted'));
      if (signal.aborted) onAbort();
      else signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      return await Promise.race([this.source.read(), aborted]);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async recover(error: AudioSourceError): Promise<void> {
    this.stats.failures += 1;
    this.logger.warn(`[audio] ${error.message}; retrying in ${this.options.restartDelayMs} ms`);
    this.cell.publishSilence('source-error');
    await this.stopSource();

    try {
      await sleep(this.options.restartDelayMs, undefined, { signal: this.abort.signal });
    } catch (sleepError) {
      if (this.abort.signal.aborted) return;
      throw sleepError;
    }
    if (this.state !== 'running') return;

    try {
      await this.source.start();
      this.analyzer.flush();
      this.stats.restarts += 1;
      this.logger.log(`[audio] restarted ${this.source.description}`);
    } catch (restartError) {
      this.logger.warn(`[audio] restart failed: ${describeError(restartError)}`);
    }
  }

  private async stopSource(): Promise<void> {
    try {
      await this.source.stop();
    } catch (error) {
      this.logger.warn(`[audio] failed to stop ${this.source.description}: ${describeError(error)}`);
    }
  }

  /** Ends the read loop and stops the source. Safe to call more than once. */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return;
    const wasRunning = this.state === 'running';
    this.state = 'stopped';
    this.abort.abort();
    this.abort = new AbortController();
    if (!wasRunning) return;
    await this.stopSource();
    await this.loop;
    this.loop = null;
    this.cell.publishSilence('stopped');
  }
}
