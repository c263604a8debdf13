import { resolveGestureClassifierOptions } from "./config";
import { fingertipCenter } from "./geometry";
import { advanceHysteresis, initialHysteresisState, type HysteresisState } from "./hysteresis";
import { handOpenness } from "./openness";
import { OpennessHistory } from "./OpennessHistory";
import { PositionSmoother } from "./PositionSmoother";
import { parseHandSnapshot } from "./schema";
import type {
  Gesture,
  GestureClassifierOptions,
  GestureDebugState,
  GestureResult,
  HandSnapshot,
  OrbitPayload,
} from "./types";

type Candidate = { gesture: Gesture; payload?: OrbitPayload };

/**
 * Turns one hand snapshot per tick into a confirmed navigation gesture.
 *
 * Opening or closing the hand quickly zooms; moving a mostly open hand
 * orbits. Raw per-tick decisions go through a confidence-frame filter, and
 * orbit is held off for a short window after a zoom ends so the hand settling
 * back does not rotate the view.
 */
export class GestureClassifier {
  private readonly options: Required<GestureClassifierOptions>;
  private readonly smoother: PositionSmoother;
  private readonly history: OpennessHistory;
  private hysteresis: HysteresisState = initialHysteresisState;
  private prevPosition: { x: number; y: number } | null = null;
  private zoomEndTime: number | null = null;
  private lastOpenness: number | null = null;
  private lastSpeed: number | null = null;
  private lastTimestamp: number | null = null;

  constructor(opts?: GestureClassifierOptions) {
    this.options = resolveGestureClassifierOptions(opts);
    this.smoother = new PositionSmoother(this.options.emaAlpha);
    this.history = new OpennessHistory({
      capacity: this.options.historyCapacity,
      minSamples: this.options.minSpeedSamples,
      minSpanMs: this.options.minSpeedSpanMs,
    });
  }

  /** Feed the current snapshot, or `null` when no hand is visible. */
  update(input: HandSnapshot | null | undefined): GestureResult {
    const hand = input ? parseHandSnapshot(input) : null;
    if (!hand) {
      this.loseTracking();
      return { gesture: this.confirm("IDLE") };
    }

    const now = hand.timestamp;
    const openness = handOpenness(hand.landmarks, this.options.opennessRange);
    const smoothed = this.smoother.update(fingertipCenter(hand.landmarks));
    const speed = this.history.speed();

    const candidate = this.classify(openness, speed, smoothed, now);
    const gesture = this.confirm(candidate.gesture);

    this.prevPosition = { x: smoothed.x, y: smoothed.y };
    this.history.push(now, openness);
    this.lastOpenness = openness;
    this.lastSpeed = speed;
    this.lastTimestamp = now;

    if (gesture === "ORBIT" && candidate.payload) {
      return { gesture, payload: candidate.payload };
    }
    return { gesture };
  }

  getGesture(): Gesture {
    return this.hysteresis.confirmed;
  }

  getDebugState(): GestureDebugState {
    return {
      gesture: this.hysteresis.confirmed,
      candidate: this.hysteresis.candidate,
      streak: this.hysteresis.streak,
      openness: this.lastOpenness,
      speed: this.lastSpeed,
      cooldownActive:
        this.zoomEndTime !== null &&
        this.lastTimestamp !== null &&
        this.lastTimestamp - this.zoomEndTime < this.options.orbitCooldownMs,
    };
  }

  private classify(
    openness: number,
    speed: number | null,
    smoothed: { x: number; y: number },
    now: number
  ): Candidate {
    const {
      zoomSpeedThreshold,
      zoomInSustainOpenness,
      zoomOutSustainOpenness,
      orbitCooldownMs,
      orbitOpenness,
      orbitDeadZone,
    } = this.options;
    const current = this.hysteresis.confirmed;

    if (speed !== null) {
      if (speed > zoomSpeedThreshold) return { gesture: "ZOOM_IN" };
      if (speed < -zoomSpeedThreshold) return { gesture: "ZOOM_OUT" };
    }

    // Keep zooming while the hand holds the pose that triggered it.
    if (current === "ZOOM_IN" && openness > zoomInSustainOpenness) return { gesture: "ZOOM_IN" };
    if (current === "ZOOM_OUT" && openness < zoomOutSustainOpenness) return { gesture: "ZOOM_OUT" };

    if (isZoom(current) && speed !== null && Math.abs(speed) < zoomSpeedThreshold) {
      this.zoomEndTime = now;
    }
    if (this.zoomEndTime !== null && now - this.zoomEndTime < orbitCooldownMs) {
      return { gesture: "IDLE" };
    }

    if (openness > orbitOpenness && this.prevPosition) {
      const dx = smoothed.x - this.prevPosition.x;
      const dy = smoothed.y - this.prevPosition.y;
      if (Math.hypot(dx, dy) > orbitDeadZone) {
        return { gesture: "ORBIT", payload: { dx, dy } };
      }
    }

    return { gesture: "IDLE" };
  }

  private confirm(candidate: Gesture): Gesture {
    this.hysteresis = advanceHysteresis(this.hysteresis, candidate, this.options.confidenceFrames);
    return this.hysteresis.confirmed;
  }

  // Hysteresis and the zoom-end anchor survive a dropped frame.
  private loseTracking(): void {
    this.smoother.reset();
    this.prevPosition = null;
    this.history.clear();
    this.lastOpenness = null;
    this.lastSpeed = null;
  }
}

function isZoom(gesture: Gesture): boolean {
  return gesture === "ZOOM_IN" || gesture === "ZOOM_OUT";
}
