import { z } from "zod";
import { DEFAULT_OPENNESS_RANGE } from "./openness";
import type { GestureClassifierOptions } from "./types";

const DEFAULTS: Required<GestureClassifierOptions> = {
  emaAlpha: 0.45,
  confidenceFrames: 3,
  orbitDeadZone: 0.015,
  zoomSpeedThreshold: 0.8,
  orbitCooldownMs: 300,
  historyCapacity: 10,
  minSpeedSamples: 4,
  minSpeedSpanMs: 50,
  opennessRange: DEFAULT_OPENNESS_RANGE,
  orbitOpenness: 0.55,
  zoomInSustainOpenness: 0.7,
  zoomOutSustainOpenness: 0.3,
};

const unit = z.number().min(0).max(1);

export const GestureClassifierOptionsSchema = z
  .object({
    emaAlpha: z.number().gt(0).max(1),
    confidenceFrames: z.number().int().positive(),
    orbitDeadZone: z.number().nonnegative(),
    zoomSpeedThreshold: z.number().positive(),
    orbitCooldownMs: z.number().nonnegative(),
    historyCapacity: z.number().int().min(2),
    minSpeedSamples: z.number().int().min(2),
    minSpeedSpanMs: z.number().positive(),
    opennessRange: z
      .tuple([z.number().finite(), z.number().finite()])
      .refine(([closed, open]) => open > closed, "opennessRange must be increasing"),
    orbitOpenness: unit,
    zoomInSustainOpenness: unit,
    zoomOutSustainOpenness: unit,
  })
  .refine((o) => o.minSpeedSamples <= o.historyCapacity, {
    message: "minSpeedSamples cannot exceed historyCapacity",
    path: ["minSpeedSamples"],
  });

/** Merges `opts` over the defaults; throws a ZodError on invalid values. */
export function resolveGestureClassifierOptions(
  opts?: GestureClassifierOptions
): Required<GestureClassifierOptions> {
  return GestureClassifierOptionsSchema.parse({ ...DEFAULTS, ...(opts ?? {}) });
}

export { DEFAULTS as defaultGestureClassifierOptions };
