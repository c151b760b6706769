// ─── Workout Row ───────────────────────────────────────────────────
// One catalog entry with a start button. Reads its own active flag so
// only the rows whose flag flips re-render.

import React, { useCallback, useMemo } from "react";
import type { CSSProperties } from "react";
import { selectIsActive, type Workout } from "@treadmill-coach/shared";
import { useDispatch, useGlobalState } from "../hooks/useGlobalState.js";

interface WorkoutRowProps {
  readonly workout: Workout;
}

const rowStyle: CSSProperties = {
  display: "flex",
  alignItems: "center",
  justifyContent: "space-between",
  padding: "12px 16px",
  borderRadius: 12,
  backgroundColor: "var(--color-surface-raised)",
};

const nameStyle: CSSProperties = {
  fontSize: 16,
  fontWeight: 600,
};

const buttonStyle: CSSProperties = {
  minHeight: 40,
  padding: "8px 16px",
  borderRadius: 8,
  border: "none",
  fontWeight: 700,
  backgroundColor: "var(--color-accent)",
  color: "#fff",
  cursor: "pointer",
};

export function WorkoutRow({ workout }: WorkoutRowProps): React.JSX.Element {
  const dispatch = useDispatch();
  const isActiveSelector = useMemo(() => selectIsActive(workout.name), [workout.name]);
  const isActive = useGlobalState(isActiveSelector);

  const handleStart = useCallback(() => {
    dispatch({ type: "WORKOUT_START", workout });
  }, [dispatch, workout]);

  return (
    <li style={rowStyle}>
      <span style={nameStyle}>{workout.name}</span>
      <button type="button" style={buttonStyle} disabled={isActive} onClick={handleStart}>
        {isActive ? "Running" : "Start"}
      </button>
    </li>
  );
}
