// ─── Bluetooth Status Badge ────────────────────────────────────────

import React from "react";
import type { CSSProperties } from "react";
import type { BluetoothStatus } from "@treadmill-coach/shared";

interface BluetoothStatusBadgeProps {
  readonly status: BluetoothStatus;
}

const LABELS: Readonly<Record<BluetoothStatus, string>> = {
  off: "Treadmill disconnected",
  scanning: "Searching for treadmill...",
  connected: "Treadmill connected",
};

const COLORS: Readonly<Record<BluetoothStatus, string>> = {
  off: "var(--color-text-muted)",
  scanning: "var(--color-accent-dim)",
  connected: "var(--color-accent)",
};

const badgeStyle: CSSProperties = {
  display: "inline-flex",
  alignItems: "center",
  gap: 8,
  padding: "4px 12px",
  borderRadius: 999,
  fontSize: 13,
  fontWeight: 600,
  backgroundColor: "var(--color-surface-raised)",
};

export function BluetoothStatusBadge({
  status,
}: BluetoothStatusBadgeProps): React.JSX.Element {
  return (
    <span role="status" style={{ ...badgeStyle, color: COLORS[status] }}>
      {LABELS[status]}
    </span>
  );
}
