export * from "./types";
export * from "./geometry";
export * from "./openness";
export * from "./hysteresis";
export * from "./schema";
export { PositionSmoother } from "./PositionSmoother";
export { OpennessHistory, type OpennessHistoryOptions, type OpennessSample } from "./OpennessHistory";
export { GestureClassifier } from "./GestureClassifier";
export {
  GestureClassifierOptionsSchema,
  defaultGestureClassifierOptions,
  resolveGestureClassifierOptions,
} from "./config";
