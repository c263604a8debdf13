export * from "./types";
export { GestureActuator, defaultGestureActuatorOptions } from "./GestureActuator";
export { OrbitViewportController, defaultOrbitConfig } from "./OrbitViewportController";
