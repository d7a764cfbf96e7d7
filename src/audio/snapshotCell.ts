import { SILENCE_SNAPSHOT, createSilenceSnapshot, freezeSnapshot, type AudioSnapshot } from './snapshot.js';

const now = () => {
  if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
    return performance.now();
  }
  return Date.now();
};

export type SnapshotCellDiagnostics = {
  version: number;
  lastSource: string;
  lastPublishedAt: number | null;
  reads: number;
};

/**
 * Single-writer latest-value slot shared by the analyzer (writer) and the
 * scheduler (reader). Reads never block and always return a frozen value.
 */
export class AudioSnapshotCell {
  private current: AudioSnapshot = SILENCE_SNAPSHOT;
  private version = 0;
  private lastSource = 'init';
  private lastPublishedAt: number | null = null;
  private reads = 0;

  constructor(private readonly clock: () => number = now) {}

  read(): AudioSnapshot {
    this.reads += 1;
    return this.current;
  }

  publish(snapshot: AudioSnapshot, source = 'analyzer'): number {
    this.current = freezeSnapshot(snapshot);
    this.version += 1;
    this.lastSource = source;
    this.lastPublishedAt = this.clock();
    return this.version;
  }

  /** Replaces the value with silence, keeping the running beat count. */
  publishSilence(source = 'silence'): number {
    return this.publish(createSilenceSnapshot(this.clock(), this.current.beatCount), source);
  }

  getVersion(): number {
    return this.version;
  }

  getDiagnostics(): SnapshotCellDiagnostics {
    return {
      version: this.version,
      lastSource: this.lastSource,
      lastPublishedAt: this.lastPublishedAt,
      reads: this.reads,
    };
  }
}
