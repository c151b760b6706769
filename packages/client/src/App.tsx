// ─── App ───────────────────────────────────────────────────────────
// Root component. Routes between the picker and the running session
// based on the store's active workout.

import React from "react";
import { selectActiveWorkout } from "@treadmill-coach/shared";
import { useGlobalState } from "./hooks/useGlobalState.js";
import { ActiveWorkoutScreen } from "./screens/ActiveWorkoutScreen.js";
import { WorkoutPickerScreen } from "./screens/WorkoutPickerScreen.js";

export function App(): React.JSX.Element {
  const activeWorkout = useGlobalState(selectActiveWorkout);

  if (activeWorkout === null) {
    return <WorkoutPickerScreen />;
  }

  return <ActiveWorkoutScreen workout={activeWorkout} />;
}
