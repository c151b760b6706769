// ─── Store Provider ────────────────────────────────────────────────
// Hands the store and the command bridge to the component tree.
// Both are created by the caller, so tests can mount independent
// instances with stub transports.

import React, { createContext, useContext } from "react";
import type { CommandBridge, Store } from "@treadmill-coach/shared";

const StoreContext = createContext<Store | null>(null);
const BridgeContext = createContext<CommandBridge | null>(null);

interface StoreProviderProps {
  readonly store: Store;
  readonly bridge: CommandBridge;
  readonly children?: React.ReactNode;
}

export function StoreProvider({
  store,
  bridge,
  children,
}: StoreProviderProps): React.JSX.Element {
  return (
    <StoreContext.Provider value={store}>
      <BridgeContext.Provider value={bridge}>{children}</BridgeContext.Provider>
    </StoreContext.Provider>
  );
}

export function useStore(): Store {
  const store = useContext(StoreContext);
  if (!store) throw new Error("useStore must be used inside <StoreProvider>");
  return store;
}

export function useBridge(): CommandBridge {
  const bridge = useContext(BridgeContext);
  if (!bridge) throw new Error("useBridge must be used inside <StoreProvider>");
  return bridge;
}
