/*
Purpose: counting semaphore bounding in-flight remote calls across every item of a pass.
Assumptions: single process; waiters are served FIFO and a released slot is handed
straight to the next waiter.
Usage: const result = await slots.run(() => client.complete(prompt));
*/

export type ReleaseSlot = () => void;

export class SlotPool {
  private active = 0;
  private peak = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Slot pool capacity must be a positive integer (received ${capacity})`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get peakInFlight(): number {
    return this.peak;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<ReleaseSlot> {
    if (this.active < this.capacity) {
      this.active += 1;
      this.peak = Math.max(this.peak, this.active);
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active -= 1;
  }
}
