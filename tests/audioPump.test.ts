import assert from 'node:assert/strict';
import test from 'node:test';
import { setImmediate, setTimeout as sleep } from 'node:timers/promises';

import { AudioAnalyzer } from '../src/audio/analyzer.js';
import { AudioPump } from '../src/audio/pump.js';
import { AudioSnapshotCell } from '../src/audio/snapshotCell.js';
import type { AudioSource } from '../src/audio/sources/types.js';
import { AudioSourceError } from '../src/errors.js';

type Step = 'block' | 'fail';

/** Plays a script of reads, then hangs until stopped. */
class ScriptedSource implements AudioSource {
  readonly kind = 'buffer' as const;
  readonly sampleRate = 8000;
  readonly description = 'scripted';
  starts = 0;
  stops = 0;
  private hanging: ((error: Error) => void) | null = null;
  private stopped = false;

  constructor(
    private readonly script: Step[],
    private readonly startError: Error | null = null,
  ) {}

  async start(): Promise<void> {
    this.starts += 1;
    if (this.startError) throw this.startError;
    this.stopped = false;
  }

  async read(): Promise<Float32Array> {
    await setImmediate();
    if (this.stopped) throw new Error('stopped');
    const step = this.script.shift();
    if (step === 'block') return new Float32Array(128);
    if (step === 'fail') throw new Error('decoder crashed');
    return new Promise<Float32Array>((_, reject) => {
      this.hanging = reject;
    });
  }

  async stop(): Promise<void> {
    this.stops += 1;
    this.stopped = true;
    this.hanging?.(new Error('stopped'));
    this.hanging = null;
  }
}

/** Starts fine, then never settles a read. */
class SilentSource implements AudioSource {
  readonly kind = 'buffer' as const;
  readonly sampleRate = 8000;
  readonly description = 'silent';
  reads = 0;

  async start(): Promise<void> {}

  read(): Promise<Float32Array> {
    this.reads += 1;
    return new Promise<Float32Array>(() => undefined);
  }

  async stop(): Promise<void> {}
}

const createLogger = () => {
  const warnings: string[] = [];
  return {
    warnings,
    logger: { log: () => undefined, warn: (message: string) => warnings.push(message), error: () => undefined },
  };
};

const waitFor = async (predicate: () => boolean, timeoutMs = 2000) => {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('condition not reached in time');
    await sleep(5);
  }
};

const createPump = (source: AudioSource, options: { dropoutTimeoutMs?: number; restartDelayMs?: number } = {}) => {
  const cell = new AudioSnapshotCell();
  const { warnings, logger } = createLogger();
  const analyzer = new AudioAnalyzer(cell, { sampleRate: 8000, windowSize: 256, hopSize: 128 }, { logger });
  const pump = new AudioPump(source, analyzer, cell, {
    dropoutTimeoutMs: options.dropoutTimeoutMs ?? 1000,
    restartDelayMs: options.restartDelayMs ?? 0,
    logger,
  });
  return { pump, cell, analyzer, warnings };
};

test('a source that fails to start aborts pump start', async () => {
  const source = new ScriptedSource([], new Error('device busy'));
  const { pump } = createPump(source);
  await assert.rejects(pump.start(), (error: unknown) => {
    assert.ok(error instanceof AudioSourceError);
    assert.equal(error.message, 'scripted: device busy');
    return true;
  });
  assert.equal(pump.getState(), 'stopped');
});

test('blocks flow from the source into the analyzer', async () => {
  const source = new ScriptedSource(['block', 'block', 'block']);
  const { pump, cell, analyzer } = createPump(source);
  await pump.start();
  assert.equal(pump.getState(), 'running');
  await waitFor(() => pump.getStats().blocks === 3);
  assert.equal(analyzer.getStats().framesAnalyzed, 2);

  await pump.stop();
  assert.equal(pump.getState(), 'stopped');
  assert.equal(source.stops, 1);
  assert.equal(cell.getDiagnostics().lastSource, 'stopped');
  await pump.stop();
  assert.equal(source.stops, 1);
});

test('a stalled source publishes silence once per dropout', async () => {
  const source = new ScriptedSource([]);
  const { pump, cell, warnings } = createPump(source, { dropoutTimeoutMs: 10 });
  await pump.start();
  await waitFor(() => pump.getStats().dropouts === 1);
  await sleep(40);
  assert.equal(pump.getStats().dropouts, 1);
  assert.equal(cell.getDiagnostics().lastSource, 'dropout');
  assert.deepEqual(warnings, ['[audio] no audio from scripted for 10 ms; publishing silence']);
  await pump.stop();
});

test('a failing source is restarted after the delay', async () => {
  const source = new ScriptedSource(['block', 'fail', 'block']);
  const { pump, cell, warnings } = createPump(source);
  await pump.start();
  await waitFor(() => pump.getStats().restarts === 1 && pump.getStats().blocks === 2);
  assert.deepEqual(pump.getStats(), { blocks: 2, dropouts: 0, failures: 1, restarts: 1 });
  assert.equal(source.starts, 2);
  assert.equal(source.stops, 1);
  assert.equal(cell.getDiagnostics().lastSource, 'source-error');
  assert.deepEqual(warnings, ['[audio] scripted: decoder crashed; retrying in 0 ms']);
  await pump.stop();
});

test('stop before start leaves the source untouched', async () => {
  const source = new ScriptedSource(['block']);
  const { pump } = createPump(source);
  await pump.stop();
  await pump.start();
  assert.equal(pump.getState(), 'stopped');
  assert.equal(source.starts, 0);
});

test('stop returns even when a pending read never settles', async () => {
  const source = new SilentSource();
  const { pump, cell } = createPump(source, { dropoutTimeoutMs: 5000 });
  await pump.start();
  await waitFor(() => source.reads === 1);

  const outcome = await Promise.race([
    pump.stop().then(() => 'stopped'),
    sleep(1500).then(() => 'hung'),
  ]);
  assert.equal(outcome, 'stopped');
  assert.equal(pump.getState(), 'stopped');
  assert.equal(cell.getDiagnostics().lastSource, 'stopped');
  assert.equal(pump.getStats().dropouts, 0);
});
