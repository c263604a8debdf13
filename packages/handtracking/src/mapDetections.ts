import type { Hand } from "@tensorflow-models/hand-pose-detection";
import { HAND_LANDMARK_COUNT } from "@handnav/gesture-core";
import type { HandSnapshot, Landmark } from "@handnav/gesture-core";

export interface VideoSize {
  videoWidth: number;
  videoHeight: number;
}

/**
 * Converts one frame of detector output into the snapshot the classifier
 * reads. Only the first detected hand is used. Pixel keypoints are
 * normalized by the video size; `z` is the keypoint's relative depth when
 * the detector provides one.
 */
export function mapDetectionsToSnapshot(
  detections: readonly Hand[],
  video: VideoSize,
  timestamp: number
): HandSnapshot | null {
  const hand = detections[0];
  if (!hand || hand.keypoints.length !== HAND_LANDMARK_COUNT) return null;

  const width = video.videoWidth || 1;
  const height = video.videoHeight || 1;
  const landmarks: Landmark[] = hand.keypoints.map((kp) => {
    const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
    const x = isNormalized ? kp.x : kp.x / width;
    const y = isNormalized ? kp.y : kp.y / height;
    return { x: clamp01(x), y: clamp01(y), z: kp.z ?? 0 };
  });

  return { landmarks, handedness: hand.handedness, timestamp };
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
