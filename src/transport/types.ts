import type { Rgb } from '../color/colorSpaces.js';
import type { Vec3, Zone } from '../layout/zones.js';

export type LightSpec = {
  readonly zone: Zone;
  readonly index: number;
  readonly globalIndex: number;
  readonly position: Vec3;
};

/** Opaque reference to a light created on the host. */
export type LightHandle = {
  readonly id: string;
  readonly globalIndex: number;
};

export type LightUpdate = {
  readonly color: Rgb;
  readonly intensity: number;
  /** Yaw in degrees. */
  readonly rotation?: number;
};

/**
 * Session with the host that renders the lights. `updateLight` is a
 * fire-and-forget send; failures are reported through the returned promise
 * of the create/remove calls or thrown synchronously by `updateLight`.
 */
export interface LightTransport {
  readonly name: string;
  createLight(spec: LightSpec): Promise<LightHandle>;
  updateLight(handle: LightHandle, update: LightUpdate): void;
  removeLight(handle: LightHandle): Promise<void>;
  close(): Promise<void>;
}
