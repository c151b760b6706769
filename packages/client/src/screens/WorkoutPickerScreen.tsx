// ─── Workout Picker Screen ─────────────────────────────────────────
// Lists the workout catalog and the treadmill connection controls.

import React, { useCallback } from "react";
import type { CSSProperties } from "react";
import { BluetoothStatusBadge } from "../components/BluetoothStatusBadge.js";
import { WorkoutRow } from "../components/WorkoutRow.js";
import { useTreadmillConnection } from "../hooks/useTreadmillConnection.js";
import { useWorkoutCatalog } from "../hooks/useWorkoutCatalog.js";

const containerStyle: CSSProperties = {
  display: "flex",
  flexDirection: "column",
  gap: 16,
  padding: 24,
};

const headerStyle: CSSProperties = {
  display: "flex",
  alignItems: "center",
  justifyContent: "space-between",
  gap: 12,
};

const listStyle: CSSProperties = {
  listStyle: "none",
  margin: 0,
  padding: 0,
  display: "flex",
  flexDirection: "column",
  gap: 8,
};

const noticeStyle: CSSProperties = {
  fontSize: 14,
  color: "var(--color-text-muted)",
};

export function WorkoutPickerScreen(): React.JSX.Element {
  const catalog = useWorkoutCatalog();
  const { status, connect } = useTreadmillConnection();

  const handleConnect = useCallback(() => {
    void connect();
  }, [connect]);

  return (
    <div style={containerStyle}>
      <div style={headerStyle}>
        <h1>Workouts</h1>
        <BluetoothStatusBadge status={status} />
        <button type="button" disabled={status !== "off"} onClick={handleConnect}>
          Connect treadmill
        </button>
      </div>

      {catalog.tag === "loading" && <p style={noticeStyle}>Reading workouts...</p>}
      {catalog.tag === "error" && (
        <p role="alert" style={noticeStyle}>
          Could not read workouts: {catalog.message}
        </p>
      )}

      {catalog.workouts.length === 0 ? (
        <p style={noticeStyle}>No workouts found.</p>
      ) : (
        <ul style={listStyle}>
          {catalog.workouts.map((workout) => (
            <WorkoutRow key={workout.name} workout={workout} />
          ))}
        </ul>
      )}
    </div>
  );
}
