import { ZONES, ZONE_GEOMETRY, addVec, scaleVec, type Vec3, type Zone } from './zones.js';

export type ZoneCounts = Readonly<Record<Zone, number>>;

export type LayoutConfig = {
  readonly counts: ZoneCounts;
  readonly center: Vec3;
  /** Distance between neighbouring lights within a zone. */
  readonly spacing: number;
  /** Distance from the center to the left/right/front/back anchors. */
  readonly radius: number;
  /** Elevation of the horizontal zones above the center. */
  readonly height: number;
  readonly ceilingHeight: number;
  readonly floorDepth: number;
};

export type LightDescriptor = {
  readonly globalIndex: number;
  readonly zone: Zone;
  readonly zoneIndex: number;
  readonly zoneCount: number;
  readonly position: Vec3;
};

export type LightLayout = {
  readonly config: LayoutConfig;
  readonly lights: readonly LightDescriptor[];
  readonly zoneCounts: ZoneCounts;
  readonly total: number;
  /** Global indices of the lights in each zone, in zone-index order. */
  readonly byZone: Readonly<Record<Zone, readonly number[]>>;
};

export const EMPTY_ZONE_COUNTS: ZoneCounts = Object.freeze({
  left: 0,
  right: 0,
  front: 0,
  back: 0,
  top: 0,
  bottom: 0,
});

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = Object.freeze({
  counts: Object.freeze({ left: 4, right: 4, front: 3, back: 3, top: 4, bottom: 0 }),
  center: Object.freeze({ x: 0, y: 0, z: 0 }),
  spacing: 0.5,
  radius: 3,
  height: 1.5,
  ceilingHeight: 4,
  floorDepth: 0.5,
});

export const zoneAnchor = (zone: Zone, config: LayoutConfig): Vec3 => {
  const geometry = ZONE_GEOMETRY[zone];
  if (geometry.vertical) {
    const distance = zone === 'top' ? config.ceilingHeight : config.floorDepth;
    return addVec(config.center, scaleVec(geometry.direction, distance));
  }
  const elevated = addVec(config.center, { x: 0, y: config.height, z: 0 });
  return addVec(elevated, scaleVec(geometry.direction, config.radius));
};

export const lightPosition = (
  zone: Zone,
  zoneIndex: number,
  zoneCount: number,
  config: LayoutConfig,
): Vec3 => {
  const offset = (zoneIndex - (zoneCount - 1) / 2) * config.spacing;
  return addVec(zoneAnchor(zone, config), scaleVec(ZONE_GEOMETRY[zone].spreadAxis, offset));
};

/**
 * Positions every light of the rig. Lights are ordered by zone
 * (left, right, front, back, top, bottom) and then by index within the zone.
 * Counts are expected to be validated non-negative integers.
 */
export const createLayout = (config: LayoutConfig): LightLayout => {
  const lights: LightDescriptor[] = [];
  const byZone: Record<Zone, number[]> = {
    left: [],
    right: [],
    front: [],
    back: [],
    top: [],
    bottom: [],
  };
  for (const zone of ZONES) {
    const count = config.counts[zone];
    const indices = byZone[zone];
    for (let zoneIndex = 0; zoneIndex < count; zoneIndex++) {
      indices.push(lights.length);
      lights.push({
        globalIndex: lights.length,
        zone,
        zoneIndex,
        zoneCount: count,
        position: lightPosition(zone, zoneIndex, count, config),
      });
    }
  }
  return {
    config,
    lights,
    zoneCounts: { ...config.counts },
    total: lights.length,
    byZone,
  };
};

export const lightAt = (
  layout: LightLayout,
  zone: Zone,
  zoneIndex: number,
): LightDescriptor | undefined => {
  const globalIndex = layout.byZone[zone][zoneIndex];
  return globalIndex === undefined ? undefined : layout.lights[globalIndex];
};

export const describeLayout = (layout: LightLayout): string =>
  ZONES.filter((zone) => layout.zoneCounts[zone] > 0)
    .map((zone) => `${zone} ${layout.zoneCounts[zone]}`)
    .join(', ');
