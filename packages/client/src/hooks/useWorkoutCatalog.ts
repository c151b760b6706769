// ─── Workout Catalog Loader ────────────────────────────────────────
// Reads the workout list from disk on mount and syncs it into the
// store. Returns a discriminated union so screens never deal with
// partial states; the seeded catalog is shown while loading or after
// a failure.

import { useEffect, useState } from "react";
import {
  loadWorkouts,
  selectWorkouts,
  type Workout,
} from "@treadmill-coach/shared";
import { useBridge, useStore } from "../context/StoreProvider.js";
import { useGlobalState } from "./useGlobalState.js";

export type CatalogState =
  | { readonly tag: "loading"; readonly workouts: readonly Workout[] }
  | { readonly tag: "error"; readonly message: string; readonly workouts: readonly Workout[] }
  | { readonly tag: "loaded"; readonly workouts: readonly Workout[] };

type LoadStatus =
  | { readonly tag: "loading" }
  | { readonly tag: "error"; readonly message: string }
  | { readonly tag: "loaded" };

export function useWorkoutCatalog(): CatalogState {
  const store = useStore();
  const bridge = useBridge();
  const workouts = useGlobalState(selectWorkouts);
  const [status, setStatus] = useState<LoadStatus>({ tag: "loading" });

  useEffect(() => {
    let cancelled = false;

    async function load(): Promise<void> {
      const result = await loadWorkouts(store, bridge);
      if (cancelled) return;

      setStatus(result.ok ? { tag: "loaded" } : { tag: "error", message: result.error.message });
    }

    void load();

    return () => {
      cancelled = true;
    };
  }, [store, bridge]);

  return { ...status, workouts };
}
