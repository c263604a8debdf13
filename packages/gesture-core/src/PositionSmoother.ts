import type { Point3 } from "./types";

/**
 * Exponential moving average over a 3-D point. The first sample after
 * construction or `reset()` is taken as-is.
 */
export class PositionSmoother {
  private smoothed: Point3 | null = null;

  constructor(private readonly alpha: number) {}

  update(point: Point3): Point3 {
    const prev = this.smoothed;
    if (!prev) {
      this.smoothed = { ...point };
    } else {
      const a = this.alpha;
      this.smoothed = {
        x: a * point.x + (1 - a) * prev.x,
        y: a * point.y + (1 - a) * prev.y,
        z: a * point.z + (1 - a) * prev.z,
      };
    }
    return { ...this.smoothed };
  }

  current(): Point3 | null {
    return this.smoothed ? { ...this.smoothed } : null;
  }

  reset(): void {
    this.smoothed = null;
  }
}
