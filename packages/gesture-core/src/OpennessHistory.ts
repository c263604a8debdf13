export interface OpennessSample {
  timestamp: number;
  openness: number;
}

export interface OpennessHistoryOptions {
  capacity: number;
  minSamples: number;
  minSpanMs: number;
}

/**
 * Fixed-capacity ring buffer of recent openness readings. Pushing into a full
 * buffer overwrites the oldest sample. Stored timestamps are strictly
 * increasing: a sample that is not newer than the last one clears the buffer
 * first.
 */
export class OpennessHistory {
  private readonly slots: (OpennessSample | undefined)[];
  private head = 0;
  private count = 0;

  constructor(private readonly options: OpennessHistoryOptions) {
    this.slots = new Array<OpennessSample | undefined>(options.capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  push(timestamp: number, openness: number): void {
    const newest = this.newest();
    if (newest && timestamp <= newest.timestamp) {
      this.clear();
    }
    const tail = (this.head + this.count) % this.options.capacity;
    this.slots[tail] = { timestamp, openness };
    if (this.count < this.options.capacity) {
      this.count += 1;
    } else {
      this.head = (this.head + 1) % this.options.capacity;
    }
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  /** Oldest first. */
  samples(): OpennessSample[] {
    const out: OpennessSample[] = [];
    for (let i = 0; i < this.count; i++) {
      const sample = this.slots[(this.head + i) % this.options.capacity];
      if (sample) out.push({ ...sample });
    }
    return out;
  }

  /**
   * Openness change per second between the oldest and newest samples.
   * Positive while the hand opens. `null` until enough samples spanning
   * enough time are buffered.
   */
  speed(): number | null {
    if (this.count < this.options.minSamples) return null;
    const oldest = this.oldest();
    const newest = this.newest();
    if (!oldest || !newest) return null;
    const spanMs = newest.timestamp - oldest.timestamp;
    if (spanMs < this.options.minSpanMs) return null;
    return (newest.openness - oldest.openness) / (spanMs / 1000);
  }

  private oldest(): OpennessSample | undefined {
    if (this.count === 0) return undefined;
    return this.slots[this.head];
  }

  private newest(): OpennessSample | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.options.capacity];
  }
}
