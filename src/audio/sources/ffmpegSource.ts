import { spawn, type ChildProcessByStdio } from 'node:child_process';
import { once, type EventEmitter } from 'node:events';
import { basename } from 'node:path';
import type { Readable } from 'node:stream';

import { AudioSourceError, describeError, type Logger } from '../../errors.js';
import type { AudioSource } from './types.js';

export type FfmpegInput =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'pulse'; readonly device?: string }
  | { readonly kind: 'alsa'; readonly device?: string };

export type FfmpegSourceOptions = {
  ffmpeg?: string;
  sampleRate: number;
  blockSize: number;
  /** Blocks kept when the reader falls behind; older blocks are dropped. */
  maxQueuedBlocks?: number;
  /** Grace period after SIGTERM before the child is killed outright. */
  killTimeoutMs?: number;
  logger?: Logger;
};

const BYTES_PER_SAMPLE = 4;
const STDERR_TAIL = 2048;

export const buildFfmpegArgs = (input: FfmpegInput, sampleRate: number): string[] => {
  const args = ['-hide_banner', '-loglevel', 'error', '-nostdin'];
  switch (input.kind) {
    case 'file':
      // -re paces decoding at native speed; -stream_loop -1 restarts the file at EOF.
      args.push('-re', '-stream_loop', '-1', '-i', input.path);
      break;
    case 'pulse':
      args.push('-f', 'pulse', '-i', input.device ?? 'default');
      break;
    case 'alsa':
      args.push('-f', 'alsa', '-i', input.device ?? 'default');
      break;
  }
  args.push('-vn', '-ac', '1', '-ar', String(sampleRate), '-f', 'f32le', '-');
  return args;
};

export const describeFfmpegInput = (input: FfmpegInput): string => {
  switch (input.kind) {
    case 'file':
      return `file ${basename(input.path)}`;
    case 'pulse':
      return `pulse ${input.device ?? 'default'}`;
    case 'alsa':
      return `alsa ${input.device ?? 'default'}`;
  }
};

/** The slice of a child process that shutdown needs. */
export type StoppableChild = EventEmitter & {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
};

const waitForClose = (child: StoppableChild, timeoutMs: number): Promise<boolean> =>
  new Promise((resolve) => {
    const onClose = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.off('close', onClose);
      resolve(false);
    }, timeoutMs);
    child.once('close', onClose);
  });

/**
 * Sends SIGTERM and waits for the child to close, escalating to SIGKILL after
 * `killTimeoutMs`. Resolves false when the child outlives SIGKILL as well.
 */
export const terminateChild = async (
  child: StoppableChild,
  killTimeoutMs: number,
  logger: Logger = console,
  name = 'ffmpeg',
): Promise<boolean> => {
  if (child.exitCode !== null || child.signalCode !== null) return true;
  const closing = waitForClose(child, killTimeoutMs);
  child.kill('SIGTERM');
  if (await closing) return true;

  logger.warn(`[audio] ${name} ignored SIGTERM for ${killTimeoutMs} ms; sending SIGKILL`);
  const killed = waitForClose(child, killTimeoutMs);
  child.kill('SIGKILL');
  if (await killed) return true;
  logger.error(`[audio] ${name} did not exit after SIGKILL; abandoning it`);
  return false;
};

type Waiter = {
  resolve: (block: Float32Array) => void;
  reject: (error: Error) => void;
};

/**
 * Decodes or captures audio through an ffmpeg child process writing mono
 * 32-bit float PCM to stdout, sliced into fixed-size blocks.
 */
export class FfmpegAudioSource implements AudioSource {
  readonly kind: FfmpegInput['kind'];
  readonly sampleRate: number;
  readonly description: string;
  private readonly ffmpeg: string;
  private readonly blockBytes: number;
  private readonly maxQueuedBlocks: number;
  private readonly killTimeoutMs: number;
  private readonly logger: Logger;
  private child: ChildProcessByStdio<null, Readable, Readable> | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private readonly queue: Float32Array[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: AudioSourceError | null = null;
  private stderrTail = '';
  private stopping = false;

  constructor(
    private readonly input: FfmpegInput,
    options: FfmpegSourceOptions,
  ) {
    this.kind = input.kind;
    this.sampleRate = options.sampleRate;
    this.ffmpeg = options.ffmpeg ?? 'ffmpeg';
    this.blockBytes = Math.max(1, Math.floor(options.blockSize)) * BYTES_PER_SAMPLE;
    this.maxQueuedBlocks = Math.max(1, options.maxQueuedBlocks ?? 8);
    this.killTimeoutMs = options.killTimeoutMs ?? 2000;
    this.logger = options.logger ?? console;
    this.description = describeFfmpegInput(input);
  }

  async start(): Promise<void> {
    if (this.child) return;
    this.stopping = false;
    this.failure = null;
    this.pending = Buffer.alloc(0);
    this.queue.length = 0;
    this.stderrTail = '';

    const child = spawn(this.ffmpeg, buildFfmpegArgs(this.input, this.sampleRate), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.child = child;
    child.stdout.on('data', (chunk: Buffer) => this.handleData(chunk));
    child.stderr.on('data', (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL);
    });
    child.on('close', (code, signal) => this.handleClose(code, signal));

    try {
      await once(child, 'spawn');
    } catch (error) {
      this.child = null;
      throw new AudioSourceError(
        this.description,
        `failed to launch ${this.ffmpeg}: ${describeError(error)}`,
        { cause: error },
      );
    }
    child.on('error', (error) => {
      this.fail(new AudioSourceError(this.description, describeError(error), { cause: error }));
    });
  }

  private handleData(chunk: Buffer) {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    while (this.pending.length >= this.blockBytes) {
      const block = new Float32Array(this.blockBytes / BYTES_PER_SAMPLE);
      for (let i = 0; i < block.length; i++) {
        block[i] = this.pending.readFloatLE(i * BYTES_PER_SAMPLE);
      }
      this.pending = this.pending.subarray(this.blockBytes);
      this.deliver(block);
    }
  }

  private deliver(block: Float32Array) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(block);
      return;
    }
    this.queue.push(block);
    if (this.queue.length > this.maxQueuedBlocks) {
      this.queue.shift();
    }
  }

  private handleClose(code: number | null, signal: NodeJS.Signals | null) {
    this.child = null;
    if (this.stopping) return;
    const detail = this.stderrTail.trim();
    const reason = signal ? `signal ${signal}` : `exit code ${code ?? 'unknown'}`;
    this.fail(
      new AudioSourceError(
        this.description,
        `ffmpeg stopped (${reason})${detail ? `: ${detail.split('\n').pop() ?? detail}` : ''}`,
      ),
    );
  }

  private fail(error: AudioSourceError) {
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  read(): Promise<Float32Array> {
    const block = this.queue.shift();
    if (block) return Promise.resolve(block);
    if (this.failure) return Promise.reject(this.failure);
    if (!this.child) {
      return Promise.reject(new AudioSourceError(this.description, 'source is not started'));
    }
    return new Promise<Float32Array>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async stop(): Promise<void> {
    this.stopping = true;
    const child = this.child;
    this.child = null;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new AudioSourceError(this.description, 'source stopped'));
    }
    if (child) {
      await terminateChild(child, this.killTimeoutMs, this.logger, this.description);
    }
  }
}

/** Resolves true when `ffmpeg -version` runs successfully. */
export const probeFfmpeg = async (ffmpeg = 'ffmpeg'): Promise<boolean> => {
  const child = spawn(ffmpeg, ['-version'], { stdio: 'ignore' });
  try {
    const [code] = await once(child, 'close');
    return code === 0;
  } catch {
    return false;
  }
};
