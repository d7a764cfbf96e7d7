import type { SchedulerState } from '../engine/scheduler.js';
import type { PatternName } from '../patterns/types.js';

export type ControlStatus = {
  state: SchedulerState;
  pattern: PatternName;
  pendingPattern: PatternName | null;
  ticks: number;
  lights: number;
  updatesSent: number;
  updateFailures: number;
  audio: {
    source: string;
    snapshotVersion: number;
    lastSource: string;
  };
};

/** What stdin and HTTP control act on. */
export interface PatternController {
  /** The pending pattern if a switch is queued, otherwise the active one. */
  currentPattern(): PatternName;
  requestPattern(name: PatternName): boolean;
  status(): ControlStatus;
  requestStop(): void;
}
