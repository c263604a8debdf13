export type ViewportCommand =
  | { type: "ORBIT_BEGIN" }
  | { type: "ORBIT"; dx: number; dy: number }
  | { type: "ORBIT_END" }
  | { type: "ZOOM"; ticks: number };

export interface GestureActuatorOptions {
  /** Pixel size the normalized orbit delta is scaled against. */
  captureWidth?: number;
  captureHeight?: number;
  orbitSensitivityX?: number;
  orbitSensitivityY?: number;
  /** Scroll ticks per zoom step; positive zooms in. */
  zoomInTicks?: number;
  zoomOutTicks?: number;
  /** Minimum time between two ZOOM commands. */
  zoomIntervalMs?: number;
}

export interface OrbitViewportConfig {
  radius?: number;
  minRadius?: number;
  maxRadius?: number;
  /** Radians per orbit pixel. */
  rotationSpeed?: number;
  /** Fraction of the radius removed per zoom tick. */
  zoomSpeed?: number;
  /**
   * When true, clamp vertical rotation to avoid flipping over the poles.
   * Set to false to allow upside-down views.
   * Default: true
   */
  clampVertical?: boolean;
}

export interface OrbitViewportState {
  radius: number;
  theta: number;
  phi: number;
  dragging: boolean;
}
