export type { Workout } from "./workout";
export { workoutsFromNames, isSameWorkout } from "./workout";
export type {
  ApplicationState,
  BluetoothStatus,
  Listener,
  StoreAction,
} from "./app-state";
export type { Result } from "./result";
export { ok, err } from "./result";
