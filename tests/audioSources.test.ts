import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import test from 'node:test';

import { BufferAudioSource } from '../src/audio/sources/bufferSource.js';
import {
  FfmpegAudioSource,
  buildFfmpegArgs,
  describeFfmpegInput,
  probeFfmpeg,
  terminateChild,
} from '../src/audio/sources/ffmpegSource.js';
import { BlockPacer } from '../src/audio/sources/pacer.js';
import { SyntheticAudioSource } from '../src/audio/sources/syntheticSource.js';
import { AudioSourceError } from '../src/errors.js';
import { silentLogger } from './helpers/fakeTimers.js';

const MISSING_BINARY = '/nonexistent/zonelight-ffmpeg';

test('ffmpeg arguments for a looping file', () => {
  assert.deepEqual(buildFfmpegArgs({ kind: 'file', path: '/music/set.flac' }, 44100), [
    '-hide_banner',
    '-loglevel',
    'error',
    '-nostdin',
    '-re',
    '-stream_loop',
    '-1',
    '-i',
    '/music/set.flac',
    '-vn',
    '-ac',
    '1',
    '-ar',
    '44100',
    '-f',
    'f32le',
    '-',
  ]);
});

test('ffmpeg arguments for device capture', () => {
  const pulse = buildFfmpegArgs({ kind: 'pulse' }, 48000);
  assert.deepEqual(pulse.slice(4, 8), ['-f', 'pulse', '-i', 'default']);
  const alsa = buildFfmpegArgs({ kind: 'alsa', device: 'hw:1' }, 48000);
  assert.deepEqual(alsa.slice(4, 8), ['-f', 'alsa', '-i', 'hw:1']);
  assert.equal(alsa[alsa.indexOf('-ar') + 1], '48000');
});

test('ffmpeg input descriptions', () => {
  assert.equal(describeFfmpegInput({ kind: 'file', path: '/music/set.flac' }), 'file set.flac');
  assert.equal(describeFfmpegInput({ kind: 'pulse' }), 'pulse default');
  assert.equal(describeFfmpegInput({ kind: 'alsa', device: 'hw:1' }), 'alsa hw:1');
});

test('ffmpeg source reports a missing binary as an AudioSourceError', async () => {
  const source = new FfmpegAudioSource(
    { kind: 'pulse' },
    { ffmpeg: MISSING_BINARY, sampleRate: 44100, blockSize: 512 },
  );
  await assert.rejects(source.read(), /source is not started/);
  await assert.rejects(source.start(), (error: unknown) => {
    assert.ok(error instanceof AudioSourceError);
    assert.equal(error.source, 'pulse default');
    assert.match(error.message, /failed to launch \/nonexistent\/zonelight-ffmpeg/);
    return true;
  });
  await source.stop();
});

/** Child process stand-in that closes only on the signals it honours. */
class FakeChild extends EventEmitter {
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly signals: NodeJS.Signals[] = [];

  constructor(private readonly honours: readonly NodeJS.Signals[]) {
    super();
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (this.honours.includes(signal)) {
      setImmediate(() => {
        this.signalCode = signal;
        this.emit('close', null, signal);
      });
    }
    return true;
  }
}

test('terminateChild stops a cooperative child with SIGTERM alone', async () => {
  const child = new FakeChild(['SIGTERM', 'SIGKILL']);
  const { logger, lines } = silentLogger();
  assert.equal(await terminateChild(child, 50, logger), true);
  assert.deepEqual(child.signals, ['SIGTERM']);
  assert.deepEqual(lines, []);
});

test('terminateChild escalates to SIGKILL when SIGTERM is ignored', async () => {
  const child = new FakeChild(['SIGKILL']);
  const { logger, warnings } = silentLogger();
  assert.equal(await terminateChild(child, 20, logger, 'pulse default'), true);
  assert.deepEqual(child.signals, ['SIGTERM', 'SIGKILL']);
  assert.deepEqual(warnings(), ['[audio] pulse default ignored SIGTERM for 20 ms; sending SIGKILL']);
});

test('terminateChild gives up on a child that survives SIGKILL', async () => {
  const child = new FakeChild([]);
  const { logger, lines } = silentLogger();
  assert.equal(await terminateChild(child, 10, logger), false);
  assert.deepEqual(child.signals, ['SIGTERM', 'SIGKILL']);
  assert.deepEqual(lines.map((line) => line.level), ['warn', 'error']);
  assert.equal(lines[1]?.message, '[audio] ffmpeg did not exit after SIGKILL; abandoning it');
});

test('terminateChild leaves an exited child alone', async () => {
  const child = new FakeChild([]);
  child.exitCode = 0;
  assert.equal(await terminateChild(child, 10, silentLogger().logger), true);
  assert.deepEqual(child.signals, []);
});

test('probeFfmpeg is false for a missing binary', async () => {
  assert.equal(await probeFfmpeg(MISSING_BINARY), false);
});

test('buffer source wraps around at the end', async () => {
  const source = new BufferAudioSource(new Float32Array([1, 2, 3, 4, 5]), { sampleRate: 8000, blockSize: 2 });
  await assert.rejects(source.read(), /source is not started/);
  await source.start();
  assert.deepEqual([...(await source.read())], [1, 2]);
  assert.deepEqual([...(await source.read())], [3, 4]);
  assert.deepEqual([...(await source.read())], [5, 1]);
  await source.stop();
  await assert.rejects(source.read(), AudioSourceError);
});

test('buffer source refuses an empty buffer', async () => {
  const source = new BufferAudioSource(new Float32Array(0), { sampleRate: 8000, blockSize: 4, label: 'empty' });
  await assert.rejects(source.start(), /empty: buffer is empty/);
});

test('synthetic source is deterministic and bounded', async () => {
  const options = { sampleRate: 8000, blockSize: 256, bpm: 128, realtime: false, seed: 7 };
  const a = new SyntheticAudioSource(options);
  const b = new SyntheticAudioSource(options);
  assert.equal(a.description, 'synthetic 128 BPM');
  await a.start();
  await b.start();
  const first = await a.read();
  assert.deepEqual([...first], [...(await b.read())]);
  assert.ok(first.every((sample) => sample >= -1 && sample <= 1));
  assert.ok(first.some((sample) => sample !== 0));

  await a.read();
  await a.start();
  assert.deepEqual([...(await a.read())], [...first]);
});

test('synthetic source falls back to 120 BPM', () => {
  const source = new SyntheticAudioSource({ sampleRate: 8000, blockSize: 256, bpm: 0, realtime: false });
  assert.equal(source.description, 'synthetic 120 BPM');
});

test('block pacer waits for the next block slot', async () => {
  const pacer = new BlockPacer(30, () => 0);
  const started = Date.now();
  await pacer.wait();
  assert.ok(Date.now() - started < 25, 'first block is immediate');
  await pacer.wait();
  assert.ok(Date.now() - started >= 25, 'second block waits a block period');
});
