import type { ControlStatus, PatternController } from '../../src/control/types.js';
import type { PatternName } from '../../src/patterns/types.js';

/** Records what the control surfaces ask for. */
export class FakeController implements PatternController {
  pattern: PatternName = 'chase';
  pending: PatternName | null = null;
  accepting = true;
  stopRequests = 0;
  readonly requested: PatternName[] = [];

  currentPattern(): PatternName {
    return this.pending ?? this.pattern;
  }

  requestPattern(name: PatternName): boolean {
    if (!this.accepting) return false;
    this.requested.push(name);
    this.pending = name;
    return true;
  }

  status(): ControlStatus {
    return {
      state: this.accepting ? 'running' : 'stopping',
      pattern: this.pattern,
      pendingPattern: this.pending,
      ticks: 42,
      lights: 18,
      updatesSent: 700,
      updateFailures: 1,
      audio: { source: 'synthetic 120 BPM', snapshotVersion: 9, lastSource: 'analyzer' },
    };
  }

  requestStop(): void {
    this.stopRequests += 1;
    this.accepting = false;
  }
}
