// ─── Global Store ──────────────────────────────────────────────────
// Owns the current ApplicationState and notifies listeners when an
// action replaces it. Created explicitly and passed to the view layer;
// there is no module-level instance.

import type { ApplicationState, Listener, StoreAction } from "../types/app-state";
import { createInitialState, reduce } from "./reducer";

export type Unsubscribe = () => void;

export interface Store {
  /** Synchronous snapshot read. Stable between accepted actions. */
  readonly getState: () => ApplicationState;
  /** Runs the action through the reducer; notifies only on a new state reference. */
  readonly update: (action: StoreAction) => void;
  /**
   * Registers a listener without notifying anyone. The returned function
   * removes it and may be called any number of times.
   */
  readonly subscribe: (listener: Listener) => Unsubscribe;
}

export function createStore(initialState: ApplicationState = createInitialState()): Store {
  let currentState = initialState;

  function getState(): ApplicationState {
    return currentState;
  }

  function update(action: StoreAction): void {
    const nextState = reduce(currentState, action);
    if (nextState === currentState) return;

    currentState = nextState;

    // Listeners may subscribe or unsubscribe while being notified.
    const listeners = Array.from(nextState.subscriptions);
    for (const listener of listeners) {
      listener();
    }
  }

  function subscribe(listener: Listener): Unsubscribe {
    update({ type: "SUBSCRIPTION_ADD", listener });
    return () => update({ type: "SUBSCRIPTION_REMOVE", listener });
  }

  return { getState, update, subscribe };
}
