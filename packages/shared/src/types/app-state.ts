// ─── Application State & Actions ───────────────────────────────────
// The single source of truth for the client. State is replaced, never
// mutated, on every accepted action; the subscription set is the one
// exception (see SUBSCRIPTION_ADD / SUBSCRIPTION_REMOVE).

import type { Workout } from "./workout";

// ─── Listener ──────────────────────────────────────────────────────

/** Zero-argument callback invoked after an accepted state change. */
export type Listener = () => void;

// ─── Bluetooth Status ──────────────────────────────────────────────

/** Treadmill connection state, tracked independently of workout state. */
export type BluetoothStatus = "off" | "scanning" | "connected";

// ─── Application State ─────────────────────────────────────────────

export interface ApplicationState {
  /** Catalog of selectable workouts, in display order. */
  readonly workouts: readonly Workout[];
  /** The running session, or null when no workout is active. */
  readonly activeWorkout: Workout | null;
  /**
   * Registered listeners. Membership is by identity: two listeners that
   * behave the same are still distinct entries.
   */
  readonly subscriptions: Set<Listener>;
  readonly bluetoothStatus: BluetoothStatus;
}

// ─── Actions ───────────────────────────────────────────────────────

/**
 * Every action the store accepts, as a discriminated union on `type`.
 * The reducer switches exhaustively over it.
 */
export type StoreAction =
  | { readonly type: "WORKOUT_START"; readonly workout: Workout }
  | { readonly type: "WORKOUT_END" }
  | { readonly type: "SUBSCRIPTION_ADD"; readonly listener: Listener }
  | { readonly type: "SUBSCRIPTION_REMOVE"; readonly listener: Listener }
  | { readonly type: "WORKOUTS_LOADED"; readonly names: readonly string[] }
  | { readonly type: "BLUETOOTH_STATUS"; readonly status: BluetoothStatus };
