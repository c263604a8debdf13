import { GestureActuator } from "@handnav/control-core";
import type { GestureActuatorOptions, ViewportCommand } from "@handnav/control-core";
import { GestureClassifier } from "@handnav/gesture-core";
import type {
  Gesture,
  GestureClassifierOptions,
  GestureDebugState,
  GestureResult,
} from "@handnav/gesture-core";
import type { SnapshotSource } from "@handnav/handtracking";

export type GestureLoopError =
  | { type: "tick-failed"; error: unknown }
  | { type: "release-failed"; error: unknown };

export type GestureDebugFrame = {
  seq: number;
  timestamp: number;
  handPresent: boolean;
  result: GestureResult;
  debugState: GestureDebugState;
  commands: ViewportCommand[];
  timings?: { classifyMs: number; totalMs: number };
};

export type GestureLoopOptions = {
  source: SnapshotSource;
  onCommand: (cmd: ViewportCommand) => void;
  /** Poll rate. Default 30. */
  fps?: number;
  debug?: boolean;
  onError?: (err: GestureLoopError) => void;
  onDebugFrame?: (frame: GestureDebugFrame) => void;
  gestureOptions?: GestureClassifierOptions;
  actuatorOptions?: GestureActuatorOptions;
  now?: () => number;
};

const DEFAULT_FPS = 30;

/**
 * Single consumer of a snapshot source. Each published frame is classified
 * at most once, in sequence order; frames published between two polls are
 * skipped.
 */
export class GestureLoop {
  private readonly classifier: GestureClassifier;
  private readonly actuator: GestureActuator;
  private readonly now: () => number;
  private lastSeq = 0;
  // Tracker clock of the last accepted hand, reused on ticks without one.
  private lastHandTime: number | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: GestureLoopOptions) {
    this.classifier = new GestureClassifier(options.gestureOptions);
    this.actuator = new GestureActuator(options.actuatorOptions);
    this.now = options.now ?? (() => performance.now());
  }

  start(): void {
    if (this.timer !== null) return;
    const fps = this.options.fps ?? DEFAULT_FPS;
    this.timer = setInterval(() => {
      this.tick();
    }, 1000 / fps);
  }

  /** Stops polling and lets go of any drag still held. */
  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    try {
      this.dispatch(this.actuator.releaseAll());
    } catch (err) {
      this.handleError({ type: "release-failed", error: err });
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getGesture(): Gesture {
    return this.classifier.getGesture();
  }

  /** Processes the source's latest frame if it is new; returns whether it was. */
  tick(): boolean {
    const { snapshot, seq } = this.options.source.latest();
    if (seq === this.lastSeq) return false;
    this.lastSeq = seq;

    try {
      const start = this.now();
      const result = this.classifier.update(snapshot);
      const classifyMs = this.now() - start;
      const debugState = this.classifier.getDebugState();
      const handPresent = snapshot !== null && debugState.openness !== null;
      if (handPresent) this.lastHandTime = snapshot.timestamp;
      const commands = this.actuator.act(result, this.lastHandTime ?? start);
      this.dispatch(commands);

      const debugCallback = this.options.onDebugFrame;
      if (debugCallback) {
        const timings = this.options.debug ? { classifyMs, totalMs: this.now() - start } : undefined;
        debugCallback({
          seq,
          timestamp: start,
          handPresent,
          result,
          debugState,
          commands,
          timings,
        });
      }
    } catch (err) {
      this.handleError({ type: "tick-failed", error: err });
    }
    return true;
  }

  private dispatch(commands: ViewportCommand[]): void {
    for (const cmd of commands) {
      this.options.onCommand(cmd);
    }
  }

  private handleError(err: GestureLoopError): void {
    this.options.onError?.(err);
    console.error("gesture loop", err);
  }
}
