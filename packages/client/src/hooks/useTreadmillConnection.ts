// ─── Treadmill Connection ──────────────────────────────────────────
// Exposes the Bluetooth status and a connect action that drives it.

import { useCallback } from "react";
import {
  connectTreadmill,
  selectBluetoothStatus,
  type BluetoothStatus,
  type Result,
} from "@treadmill-coach/shared";
import { useBridge, useStore } from "../context/StoreProvider.js";
import { useGlobalState } from "./useGlobalState.js";

interface UseTreadmillConnectionResult {
  readonly status: BluetoothStatus;
  readonly connect: (name?: string) => Promise<Result<void>>;
}

export function useTreadmillConnection(): UseTreadmillConnectionResult {
  const store = useStore();
  const bridge = useBridge();
  const status = useGlobalState(selectBluetoothStatus);

  const connect = useCallback(
    (name?: string) => connectTreadmill(store, bridge, name),
    [store, bridge],
  );

  return { status, connect };
}
