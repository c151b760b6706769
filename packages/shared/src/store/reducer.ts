// ─── Store Reducer ─────────────────────────────────────────────────
// Pure transitions over ApplicationState. A handler returns its input
// reference when the action changes nothing, so the store can detect
// change by identity alone.

import { SEED_WORKOUT_NAMES } from "../config";
import type {
  ApplicationState,
  BluetoothStatus,
  Listener,
  StoreAction,
} from "../types/app-state";
import { isSameWorkout, workoutsFromNames, type Workout } from "../types/workout";

// ─── Initial State Factory ─────────────────────────────────────────

export interface InitialStateOptions {
  /** Catalog to seed the store with. Defaults to SEED_WORKOUT_NAMES. */
  readonly workoutNames?: readonly string[];
  readonly activeWorkout?: Workout | null;
  readonly bluetoothStatus?: BluetoothStatus;
}

/**
 * Creates a fresh state with its own empty subscription set. Every
 * store instance must get its own state, never a shared one.
 */
export function createInitialState(options: InitialStateOptions = {}): ApplicationState {
  return {
    workouts: workoutsFromNames(options.workoutNames ?? SEED_WORKOUT_NAMES),
    activeWorkout: options.activeWorkout ?? null,
    subscriptions: new Set<Listener>(),
    bluetoothStatus: options.bluetoothStatus ?? "off",
  };
}

// ─── Reducer ───────────────────────────────────────────────────────

export function reduce(state: ApplicationState, action: StoreAction): ApplicationState {
  switch (action.type) {
    case "WORKOUT_START":
      return handleWorkoutStart(state, action.workout);

    case "WORKOUT_END":
      return handleWorkoutEnd(state);

    case "SUBSCRIPTION_ADD":
      // In place: bookkeeping must not look like a state change.
      state.subscriptions.add(action.listener);
      return state;

    case "SUBSCRIPTION_REMOVE":
      state.subscriptions.delete(action.listener);
      return state;

    case "WORKOUTS_LOADED":
      return handleWorkoutsLoaded(state, action.names);

    case "BLUETOOTH_STATUS":
      return handleBluetoothStatus(state, action.status);

    default:
      return assertNever(action);
  }
}

function assertNever(action: never): never {
  throw new Error(`Unhandled store action: ${JSON.stringify(action)}`);
}

// ─── Action Handlers ───────────────────────────────────────────────

function handleWorkoutStart(state: ApplicationState, workout: Workout): ApplicationState {
  if (isSameWorkout(state.activeWorkout, workout)) return state;

  return {
    ...state,
    activeWorkout: workout,
  };
}

function handleWorkoutEnd(state: ApplicationState): ApplicationState {
  if (state.activeWorkout === null) return state;

  return {
    ...state,
    activeWorkout: null,
  };
}

function handleWorkoutsLoaded(
  state: ApplicationState,
  names: readonly string[],
): ApplicationState {
  const unchanged =
    names.length === state.workouts.length &&
    names.every((name, i) => state.workouts[i]?.name === name);
  if (unchanged) return state;

  // activeWorkout is left alone: the catalog carries no referential constraint.
  return {
    ...state,
    workouts: workoutsFromNames(names),
  };
}

function handleBluetoothStatus(
  state: ApplicationState,
  status: BluetoothStatus,
): ApplicationState {
  if (state.bluetoothStatus === status) return state;

  return {
    ...state,
    bluetoothStatus: status,
  };
}
