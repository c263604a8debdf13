import { FINGERTIPS, PROXIMAL_KNUCKLES, WRIST, distance3 } from "./geometry";
import type { Landmark } from "./types";

/** Tip/knuckle ratio of a tight fist and of a fully open palm. */
export const DEFAULT_OPENNESS_RANGE: readonly [number, number] = [0.6, 1.6];

const MIN_KNUCKLE_DISTANCE = 1e-6;

/**
 * 0 for a closed fist, 1 for a fully open palm.
 *
 * Averages, over the five fingers, the fingertip-to-wrist distance divided by
 * the knuckle-to-wrist distance, then maps that ratio linearly from `range`
 * onto [0, 1]. Fingers whose knuckle sits on the wrist are ignored; a hand
 * with no usable finger reads as closed.
 */
export function handOpenness(
  landmarks: readonly Landmark[],
  range: readonly [number, number] = DEFAULT_OPENNESS_RANGE
): number {
  const wrist = landmarks[WRIST];
  if (!wrist) return 0;

  let sum = 0;
  let count = 0;
  FINGERTIPS.forEach((tipIndex, finger) => {
    const tip = landmarks[tipIndex];
    const knuckle = landmarks[PROXIMAL_KNUCKLES[finger]];
    if (!tip || !knuckle) return;
    const knuckleDistance = distance3(knuckle, wrist);
    if (knuckleDistance < MIN_KNUCKLE_DISTANCE) return;
    sum += distance3(tip, wrist) / knuckleDistance;
    count += 1;
  });

  if (count === 0) return 0;
  return opennessFromRatio(sum / count, range);
}

export function opennessFromRatio(
  ratio: number,
  [closed, open]: readonly [number, number] = DEFAULT_OPENNESS_RANGE
): number {
  const span = open - closed;
  if (!(span > 0) || Number.isNaN(ratio)) return 0;
  return clamp01((ratio - closed) / span);
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
