import { setTimeout as sleep } from 'node:timers/promises';

import type { AudioSource } from '../audio/sources/types.js';
import type { ZonelightConfig } from '../config/defaults.js';
import type { SchedulerTimers } from '../engine/scheduler.js';
import type { Logger } from '../errors.js';
import { ZONES, type Zone } from '../layout/zones.js';
import type { PatternName } from '../patterns/types.js';
import { MemoryTransport, type MemoryLight } from '../transport/memoryTransport.js';
import { LightSession, type SessionSummary } from './session.js';

export type ZoneSummary = {
  lights: number;
  meanIntensity: number;
};

export type SimulationSummary = {
  pattern: PatternName;
  ticks: number;
  updatesSent: number;
  updateFailures: number;
  teardown: SessionSummary['teardown'];
  zones: Partial<Record<Zone, ZoneSummary>>;
};

export type SimulateOptions = {
  seconds: number;
  logger?: Logger;
  timers?: SchedulerTimers;
  /** Overrides the configured audio source; null runs without audio. */
  audioSource?: AudioSource | null;
  /** Waits out the run. Aborted when the session ends first. */
  wait?: (ms: number, signal: AbortSignal) => Promise<unknown>;
  /** Called once the session is running; the returned function is called after it stops. */
  attach?: (session: LightSession) => () => void;
};

/** Light count and mean last-sent intensity per zone, in zone order; empty zones are left out. */
export const summarizeZones = (lights: Iterable<MemoryLight>): Partial<Record<Zone, ZoneSummary>> => {
  const all = [...lights];
  const zones: Partial<Record<Zone, ZoneSummary>> = {};
  for (const zone of ZONES) {
    const inZone = all.filter((light) => light.spec.zone === zone);
    if (inZone.length === 0) continue;
    const total = inZone.reduce((sum, light) => sum + (light.state?.intensity ?? 0), 0);
    zones[zone] = { lights: inZone.length, meanIntensity: total / inZone.length };
  }
  return zones;
};

/** Runs a session against an in-memory host for `seconds`, then stops it and summarizes what was sent. */
export const simulateSession = async (
  config: ZonelightConfig,
  options: SimulateOptions,
): Promise<SimulationSummary> => {
  const transport = new MemoryTransport({ maxRecordedUpdates: 0 });
  const session = await LightSession.start(config, {
    transport,
    audioSource: options.audioSource,
    logger: options.logger,
    timers: options.timers,
  });
  const detach = options.attach?.(session) ?? (() => undefined);
  const wait = options.wait ?? ((ms: number, signal: AbortSignal) => sleep(ms, undefined, { signal }));
  const elapsed = new AbortController();
  let summary: SessionSummary;
  try {
    await Promise.race([wait(Math.max(0, options.seconds) * 1000, elapsed.signal), session.done]);
    elapsed.abort();
    summary = await session.stop();
  } finally {
    detach();
  }
  return {
    pattern: summary.pattern,
    ticks: summary.ticks,
    updatesSent: summary.updatesSent,
    updateFailures: summary.updateFailures,
    teardown: summary.teardown,
    zones: summarizeZones([...transport.lights.values(), ...transport.retired.values()]),
  };
};

export const formatSimulation = (summary: SimulationSummary, seconds: number): string[] => {
  const lines = [
    `✔ Simulated ${summary.pattern} for ${seconds}s`,
    `  ticks:   ${summary.ticks}`,
    `  updates: ${summary.updatesSent} (${summary.updateFailures} failed)`,
  ];
  for (const zone of ZONES) {
    const info = summary.zones[zone];
    if (!info) continue;
    lines.push(`  ${zone.padEnd(7)} ${info.lights} lights, mean intensity ${info.meanIntensity.toFixed(2)}`);
  }
  if (summary.teardown.timedOut) {
    lines.push(`  teardown timed out (${summary.teardown.failed} lights not confirmed removed)`);
  }
  return lines;
};
