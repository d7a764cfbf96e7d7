import { setTimeout as sleep } from 'node:timers/promises';

/** Spaces block delivery so a generated stream advances at wall-clock speed. */
export class BlockPacer {
  private startedAt: number | null = null;
  private served = 0;

  constructor(
    private readonly blockMs: number,
    private readonly now: () => number = () => performance.now(),
  ) {}

  async wait(): Promise<void> {
    const current = this.now();
    if (this.startedAt === null) {
      this.startedAt = current;
    }
    const due = this.startedAt + this.served * this.blockMs;
    this.served += 1;
    const delay = due - current;
    if (delay > 1) {
      await sleep(delay);
    }
  }

  reset(): void {
    this.startedAt = null;
    this.served = 0;
  }
}
