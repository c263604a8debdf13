import { z } from "zod";
import { HAND_LANDMARK_COUNT } from "./geometry";
import type { HandSnapshot } from "./types";

export const LandmarkSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

export const HandSnapshotSchema = z.object({
  landmarks: z.array(LandmarkSchema).length(HAND_LANDMARK_COUNT),
  handedness: z.enum(["Left", "Right"]),
  timestamp: z.number().finite(),
});

/** `null` for anything that is not a complete, finite hand snapshot. */
export function parseHandSnapshot(input: unknown): HandSnapshot | null {
  const result = HandSnapshotSchema.safeParse(input);
  return result.success ? result.data : null;
}
