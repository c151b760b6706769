// ─── Selectors ─────────────────────────────────────────────────────
// Pure reads over ApplicationState for useGlobalState and effects.
// Each returns a value already held by the state, so repeated calls on
// the same state are identical by reference.

import type { ApplicationState, BluetoothStatus } from "../types/app-state";
import type { Workout } from "../types/workout";

export function selectWorkouts(state: ApplicationState): readonly Workout[] {
  return state.workouts;
}

export function selectActiveWorkout(state: ApplicationState): Workout | null {
  return state.activeWorkout;
}

export function selectBluetoothStatus(state: ApplicationState): BluetoothStatus {
  return state.bluetoothStatus;
}

/** Builds a selector telling whether the named workout is the running one. */
export function selectIsActive(name: string): (state: ApplicationState) => boolean {
  return (state) => state.activeWorkout?.name === name;
}
