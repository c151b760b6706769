// ─── Store Layer ───────────────────────────────────────────────────

export { createInitialState, reduce, type InitialStateOptions } from "./reducer";
export { createStore, type Store, type Unsubscribe } from "./store";
export {
  selectWorkouts,
  selectActiveWorkout,
  selectBluetoothStatus,
  selectIsActive,
} from "./selectors";
