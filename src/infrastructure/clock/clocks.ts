import type { Clock } from '../../application/registry/collaborators.js';
import type { Timestamp } from '../../application/registry/types.js';

export class SystemClock implements Clock {
  public now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/** Clock pinned to a given instant; `advance` moves it forward. */
export class FixedClock implements Clock {
  public constructor(private current: Timestamp) {}

  public now(): Timestamp {
    return this.current;
  }

  public set(timestamp: Timestamp): void {
    this.current = timestamp;
  }

  public advance(seconds: number): void {
    this.current += seconds;
  }
}
