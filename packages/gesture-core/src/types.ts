export type Handedness = "Left" | "Right";

export interface Landmark {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Point3 {
  x: number;
  y: number;
  z: number;
}

export interface HandSnapshot {
  /** 21 landmarks in the MediaPipe hand index convention. */
  landmarks: readonly Landmark[];
  handedness: Handedness;
  /** Capture time in milliseconds. */
  timestamp: number;
}

export type Gesture = "IDLE" | "ORBIT" | "ZOOM_IN" | "ZOOM_OUT";

export interface OrbitPayload {
  dx: number;
  dy: number;
}

export interface GestureResult {
  gesture: Gesture;
  /** Only present when `gesture` is `ORBIT`. */
  payload?: OrbitPayload;
}

export interface GestureClassifierOptions {
  emaAlpha?: number;
  confidenceFrames?: number;
  orbitDeadZone?: number;
  /** Openness units per second. */
  zoomSpeedThreshold?: number;
  orbitCooldownMs?: number;
  historyCapacity?: number;
  minSpeedSamples?: number;
  minSpeedSpanMs?: number;
  opennessRange?: readonly [number, number];
  orbitOpenness?: number;
  zoomInSustainOpenness?: number;
  zoomOutSustainOpenness?: number;
}

export interface GestureDebugState {
  gesture: Gesture;
  candidate: Gesture;
  streak: number;
  openness: number | null;
  speed: number | null;
  cooldownActive: boolean;
}
