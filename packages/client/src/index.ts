// ─── @treadmill-coach/client ───────────────────────────────────────
// React + Vite view layer for the desktop shell.

export { App } from "./App.js";
export { StoreProvider, useStore, useBridge } from "./context/StoreProvider.js";
export { useGlobalState, useDispatch } from "./hooks/useGlobalState.js";
export { useWorkoutCatalog, type CatalogState } from "./hooks/useWorkoutCatalog.js";
export { useTreadmillConnection } from "./hooks/useTreadmillConnection.js";
export { createShellBridge } from "./bridge/tauri-bridge.js";
export { WorkoutPickerScreen } from "./screens/WorkoutPickerScreen.js";
export { ActiveWorkoutScreen } from "./screens/ActiveWorkoutScreen.js";
export { BluetoothStatusBadge } from "./components/BluetoothStatusBadge.js";
export { WorkoutRow } from "./components/WorkoutRow.js";
