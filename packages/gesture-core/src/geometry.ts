import type { Landmark, Point3 } from "./types";

export const WRIST = 0;
export const FINGERTIPS = [4, 8, 12, 16, 20] as const;
export const PROXIMAL_KNUCKLES = [2, 5, 9, 13, 17] as const;
export const HAND_LANDMARK_COUNT = 21;

const PALM_JOINTS = [WRIST, 5, 9, 13, 17] as const;

export function distance3(a: Landmark, b: Landmark): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

/** Mean of the five fingertips. */
export function fingertipCenter(landmarks: readonly Landmark[]): Point3 {
  return averageAt(landmarks, FINGERTIPS);
}

/** Mean of the wrist and the four finger MCP joints. */
export function palmCenter(landmarks: readonly Landmark[]): Point3 {
  return averageAt(landmarks, PALM_JOINTS);
}

function averageAt(landmarks: readonly Landmark[], indices: readonly number[]): Point3 {
  const sum = { x: 0, y: 0, z: 0 };
  let count = 0;
  for (const index of indices) {
    const lm = landmarks[index];
    if (!lm) continue;
    sum.x += lm.x;
    sum.y += lm.y;
    sum.z += lm.z;
    count += 1;
  }
  if (count === 0) return sum;
  return { x: sum.x / count, y: sum.y / count, z: sum.z / count };
}
