// ─── Store Effects ─────────────────────────────────────────────────
// Async flows that run a background command and feed its outcome back
// into the store as actions. The reducer stays pure; all I/O is here.

import type { Store } from "../store/store";
import type { Result } from "../types/result";
import type { WorkoutNames } from "../schema/validation";
import type { CommandBridge } from "./commands";

/**
 * Refreshes the catalog from disk. On failure the seeded catalog stays
 * in place and the error is returned to the caller.
 */
export async function loadWorkouts(
  store: Store,
  bridge: CommandBridge,
): Promise<Result<WorkoutNames>> {
  const result = await bridge.readWorkouts();

  if (result.ok) {
    store.update({ type: "WORKOUTS_LOADED", names: result.value });
    console.log("[Workouts] Loaded:", result.value.length);
  } else {
    console.error("[Workouts] Load failed:", result.error);
  }

  return result;
}

/**
 * Marks the treadmill as scanning for the duration of the command, then
 * connected or off depending on the outcome.
 */
export async function connectTreadmill(
  store: Store,
  bridge: CommandBridge,
  name?: string,
): Promise<Result<void>> {
  store.update({ type: "BLUETOOTH_STATUS", status: "scanning" });

  const result = await bridge.connectToTreadmill(name);

  if (result.ok) {
    store.update({ type: "BLUETOOTH_STATUS", status: "connected" });
  } else {
    console.error("[Treadmill] Connection failed:", result.error);
    store.update({ type: "BLUETOOTH_STATUS", status: "off" });
  }

  return result;
}
