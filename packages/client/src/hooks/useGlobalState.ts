// ─── Global State Hooks ────────────────────────────────────────────
// Read a derived slice of the store through React's external-store
// contract, and dispatch actions into it.

import { useMemo, useSyncExternalStore } from "react";
import type { ApplicationState, StoreAction } from "@treadmill-coach/shared";
import { useStore } from "../context/StoreProvider.js";

/**
 * Returns `selector(state)` and re-renders when an accepted action
 * changes the selected value (compared with `Object.is`).
 *
 * The selection is cached per state reference, so the snapshot stays
 * stable between store changes even when the selector builds a new
 * object. The selector must be pure.
 */
export function useGlobalState<T>(selector: (state: ApplicationState) => T): T {
  const store = useStore();

  const getSnapshot = useMemo(() => {
    let cached: { readonly state: ApplicationState; readonly selection: T } | null = null;

    return (): T => {
      const state = store.getState();
      if (cached === null) {
        cached = { state, selection: selector(state) };
      } else if (cached.state !== state) {
        const selection = selector(state);
        cached = {
          state,
          selection: Object.is(selection, cached.selection) ? cached.selection : selection,
        };
      }
      return cached.selection;
    };
  }, [store, selector]);

  return useSyncExternalStore(store.subscribe, getSnapshot, getSnapshot);
}

/** The store's `update`, stable for the lifetime of the provider. */
export function useDispatch(): (action: StoreAction) => void {
  return useStore().update;
}
