export const ZONES = ['left', 'right', 'front', 'back', 'top', 'bottom'] as const;

export type Zone = (typeof ZONES)[number];

export type Vec3 = {
  readonly x: number;
  readonly y: number;
  readonly z: number;
};

export type ZoneGeometry = {
  /** Unit vector from the rig center towards the zone. */
  readonly direction: Vec3;
  /** Axis the zone's lights are spread along. */
  readonly spreadAxis: Vec3;
  readonly vertical: boolean;
};

const vec = (x: number, y: number, z: number): Vec3 => ({ x, y, z });

export const ZONE_GEOMETRY: Readonly<Record<Zone, ZoneGeometry>> = Object.freeze({
  left: { direction: vec(-1, 0, 0), spreadAxis: vec(0, 0, 1), vertical: false },
  right: { direction: vec(1, 0, 0), spreadAxis: vec(0, 0, 1), vertical: false },
  front: { direction: vec(0, 0, 1), spreadAxis: vec(1, 0, 0), vertical: false },
  back: { direction: vec(0, 0, -1), spreadAxis: vec(1, 0, 0), vertical: false },
  top: { direction: vec(0, 1, 0), spreadAxis: vec(1, 0, 0), vertical: true },
  bottom: { direction: vec(0, -1, 0), spreadAxis: vec(1, 0, 0), vertical: true },
});

export const isZone = (value: unknown): value is Zone =>
  ZONES.some((zone) => zone === value);

export const zoneOrdinal = (zone: Zone): number => ZONES.indexOf(zone);

export const addVec = (a: Vec3, b: Vec3): Vec3 => vec(a.x + b.x, a.y + b.y, a.z + b.z);

export const scaleVec = (v: Vec3, s: number): Vec3 => vec(v.x * s, v.y * s, v.z * s);
