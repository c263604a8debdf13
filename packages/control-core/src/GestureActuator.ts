import type { GestureResult, OrbitPayload } from "@handnav/gesture-core";
import type { GestureActuatorOptions, ViewportCommand } from "./types";

const DEFAULTS: Required<GestureActuatorOptions> = {
  captureWidth: 640,
  captureHeight: 480,
  orbitSensitivityX: 2.5,
  orbitSensitivityY: 2.5,
  zoomInTicks: 3,
  zoomOutTicks: -3,
  zoomIntervalMs: 50,
};

/**
 * Drives a viewport the way a mouse would: orbit is a held drag that
 * starts on the first orbit delta and ends as soon as any other gesture
 * arrives, zoom is a rate-limited scroll.
 */
export class GestureActuator {
  private readonly options: Required<GestureActuatorOptions>;
  private orbiting = false;
  private lastZoomTime: number | null = null;

  constructor(opts?: GestureActuatorOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  act(result: GestureResult, timestamp: number): ViewportCommand[] {
    const commands: ViewportCommand[] = [];
    switch (result.gesture) {
      case "ORBIT":
        this.orbit(result.payload, commands);
        break;
      case "ZOOM_IN":
        this.endOrbit(commands);
        this.zoom(this.options.zoomInTicks, timestamp, commands);
        break;
      case "ZOOM_OUT":
        this.endOrbit(commands);
        this.zoom(this.options.zoomOutTicks, timestamp, commands);
        break;
      case "IDLE":
        this.endOrbit(commands);
        break;
    }
    return commands;
  }

  /** Commands that leave nothing held, for shutdown. */
  releaseAll(): ViewportCommand[] {
    const commands: ViewportCommand[] = [];
    this.endOrbit(commands);
    return commands;
  }

  isOrbiting(): boolean {
    return this.orbiting;
  }

  private orbit(payload: OrbitPayload | undefined, commands: ViewportCommand[]): void {
    // A confirmed orbit without fresh movement keeps the drag held.
    if (!payload) return;
    const { captureWidth, captureHeight, orbitSensitivityX, orbitSensitivityY } = this.options;
    const dx = Math.trunc(payload.dx * captureWidth * orbitSensitivityX);
    const dy = Math.trunc(payload.dy * captureHeight * orbitSensitivityY);
    if (!this.orbiting) {
      commands.push({ type: "ORBIT_BEGIN" });
      this.orbiting = true;
    }
    commands.push({ type: "ORBIT", dx, dy });
  }

  private endOrbit(commands: ViewportCommand[]): void {
    if (!this.orbiting) return;
    commands.push({ type: "ORBIT_END" });
    this.orbiting = false;
  }

  private zoom(ticks: number, timestamp: number, commands: ViewportCommand[]): void {
    if (this.lastZoomTime !== null && timestamp - this.lastZoomTime < this.options.zoomIntervalMs) {
      return;
    }
    commands.push({ type: "ZOOM", ticks });
    this.lastZoomTime = timestamp;
  }
}

export { DEFAULTS as defaultGestureActuatorOptions };
