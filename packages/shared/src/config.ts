// ─── Configuration ─────────────────────────────────────────────────
// Command names understood by the desktop shell's background process,
// plus start-up defaults for the store.

export const COMMANDS = {
  readWorkouts: "read_workouts",
  connectToTreadmill: "connect_to_treadmill",
} as const;

export type CommandName = (typeof COMMANDS)[keyof typeof COMMANDS];

/**
 * Replies `connect_to_treadmill` resolves with when it could not connect.
 * The command reports these as successful answers, not rejections.
 */
export const TREADMILL_FAILURE_REPLIES: readonly string[] = [
  "Treadmill not found.",
  "Error connecting to treadmill.",
];

/** Advertised Bluetooth name of the supported treadmill. */
export const DEFAULT_TREADMILL_NAME = "HORIZON_7.0AT";

/** Catalog shown before the first `read_workouts` round-trip completes. */
export const SEED_WORKOUT_NAMES: readonly string[] = ["6x400", "10x3min"];
