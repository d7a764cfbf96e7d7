import { TransportError } from '../errors.js';
import type { LightHandle, LightSpec, LightTransport, LightUpdate } from './types.js';

export type RemoveMode = 'ok' | 'fail' | 'hang';

export type MemoryTransportOptions = {
  /** Return true to make this create attempt fail (attempt counts from 1 per light). */
  failCreate?: (spec: LightSpec, attempt: number) => boolean;
  failUpdate?: (handle: LightHandle) => boolean;
  removeMode?: RemoveMode;
  /** Most recent updates kept in `updates`; older entries are dropped. */
  maxRecordedUpdates?: number;
};

export type MemoryLight = {
  spec: LightSpec;
  state: LightUpdate | null;
  updateCount: number;
};

export type RecordedUpdate = {
  id: string;
  update: LightUpdate;
};

/** In-process stand-in for the host that records every call. */
export class MemoryTransport implements LightTransport {
  readonly name = 'memory';
  readonly lights = new Map<string, MemoryLight>();
  readonly updates: RecordedUpdate[] = [];
  readonly removeRequests: string[] = [];
  readonly removed: string[] = [];
  /** Lights removed successfully, with the last state they were sent. */
  readonly retired = new Map<string, MemoryLight>();
  private readonly createAttempts = new Map<number, number>();
  private nextId = 1;
  private closed = false;
  private totalUpdates = 0;

  constructor(private readonly options: MemoryTransportOptions = {}) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get updateCount(): number {
    return this.totalUpdates;
  }

  async createLight(spec: LightSpec): Promise<LightHandle> {
    this.assertOpen('create');
    const attempt = (this.createAttempts.get(spec.globalIndex) ?? 0) + 1;
    this.createAttempts.set(spec.globalIndex, attempt);
    if (this.options.failCreate?.(spec, attempt)) {
      throw new TransportError('create', `host rejected light ${spec.zone}[${spec.index}]`);
    }
    const id = `light-${this.nextId++}`;
    this.lights.set(id, { spec, state: null, updateCount: 0 });
    return { id, globalIndex: spec.globalIndex };
  }

  updateLight(handle: LightHandle, update: LightUpdate): void {
    this.assertOpen('update', handle.id);
    const light = this.lights.get(handle.id);
    if (!light) {
      throw new TransportError('update', `unknown light ${handle.id}`, { handle: handle.id });
    }
    if (this.options.failUpdate?.(handle)) {
      throw new TransportError('update', `host rejected update for ${handle.id}`, { handle: handle.id });
    }
    light.state = update;
    light.updateCount += 1;
    this.totalUpdates += 1;
    this.updates.push({ id: handle.id, update });
    const limit = this.options.maxRecordedUpdates ?? 10_000;
    if (this.updates.length > limit) {
      this.updates.splice(0, this.updates.length - limit);
    }
  }

  removeLight(handle: LightHandle): Promise<void> {
    this.removeRequests.push(handle.id);
    switch (this.options.removeMode ?? 'ok') {
      case 'hang':
        return new Promise<void>(() => undefined);
      case 'fail':
        return Promise.reject(
          new TransportError('remove', `host rejected removal of ${handle.id}`, { handle: handle.id }),
        );
      case 'ok': {
        const light = this.lights.get(handle.id);
        if (light) this.retired.set(handle.id, light);
        this.lights.delete(handle.id);
        this.removed.push(handle.id);
        return Promise.resolve();
      }
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(operation: 'create' | 'update', handle?: string) {
    if (this.closed) {
      throw new TransportError(operation, 'transport is closed', { handle });
    }
  }
}
