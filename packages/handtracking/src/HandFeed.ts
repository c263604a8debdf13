import type { HandSnapshot } from "@handnav/gesture-core";

export interface FeedFrame {
  snapshot: HandSnapshot | null;
  /** Bumped on every publish, hand or not. */
  seq: number;
}

export interface SnapshotSource {
  latest(): FeedFrame;
}

/**
 * Latest-value mailbox between a tracker running at its own pace and the
 * single consumer that classifies frames. Older frames are overwritten, so a
 * slow consumer skips them.
 */
export class HandFeed implements SnapshotSource {
  private snapshot: HandSnapshot | null = null;
  private seq = 0;

  publish(snapshot: HandSnapshot | null): number {
    this.snapshot = snapshot;
    this.seq += 1;
    return this.seq;
  }

  latest(): FeedFrame {
    return { snapshot: this.snapshot, seq: this.seq };
  }
}
