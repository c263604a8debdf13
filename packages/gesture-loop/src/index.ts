export {
  GestureLoop,
  type GestureDebugFrame,
  type GestureLoopError,
  type GestureLoopOptions,
} from "./GestureLoop";
