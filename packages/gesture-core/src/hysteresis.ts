import type { Gesture } from "./types";

export interface HysteresisState {
  readonly candidate: Gesture;
  readonly streak: number;
  readonly confirmed: Gesture;
}

export const initialHysteresisState: HysteresisState = {
  candidate: "IDLE",
  streak: 0,
  confirmed: "IDLE",
};

/**
 * Confidence-frame filter. The confirmed gesture only moves to a candidate
 * once that candidate has been seen `confidenceFrames` ticks in a row.
 */
export function advanceHysteresis(
  state: HysteresisState,
  candidate: Gesture,
  confidenceFrames: number
): HysteresisState {
  const streak = candidate === state.candidate ? state.streak + 1 : 1;
  const confirmed = streak >= confidenceFrames ? candidate : state.confirmed;
  return { candidate, streak, confirmed };
}
