// ─── Active Workout Screen ─────────────────────────────────────────
// Shown while a session runs. Ending it returns to the picker.

import React, { useCallback } from "react";
import type { CSSProperties } from "react";
import type { Workout } from "@treadmill-coach/shared";
import { BluetoothStatusBadge } from "../components/BluetoothStatusBadge.js";
import { useDispatch } from "../hooks/useGlobalState.js";
import { useTreadmillConnection } from "../hooks/useTreadmillConnection.js";

interface ActiveWorkoutScreenProps {
  readonly workout: Workout;
}

const containerStyle: CSSProperties = {
  display: "flex",
  flexDirection: "column",
  alignItems: "center",
  justifyContent: "center",
  height: "100%",
  padding: 24,
  gap: 24,
  textAlign: "center",
};

const titleStyle: CSSProperties = {
  fontSize: 32,
  fontWeight: 700,
};

const endButtonStyle: CSSProperties = {
  minHeight: 56,
  minWidth: 160,
  padding: "12px 20px",
  borderRadius: 12,
  border: "none",
  fontSize: 16,
  fontWeight: 700,
  backgroundColor: "var(--color-danger)",
  color: "#fff",
  cursor: "pointer",
};

export function ActiveWorkoutScreen({
  workout,
}: ActiveWorkoutScreenProps): React.JSX.Element {
  const dispatch = useDispatch();
  const { status } = useTreadmillConnection();

  const handleEnd = useCallback(() => {
    dispatch({ type: "WORKOUT_END" });
  }, [dispatch]);

  return (
    <div style={containerStyle}>
      <BluetoothStatusBadge status={status} />
      <h1 style={titleStyle}>{workout.name}</h1>
      <button type="button" style={endButtonStyle} onClick={handleEnd}>
        End workout
      </button>
    </div>
  );
}
