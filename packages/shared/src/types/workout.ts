// ─── Workout ───────────────────────────────────────────────────────
// A selectable entry of the workout catalog. The name is the identity:
// it doubles as the rendering key and as the file name the background
// process reads the workout from.

export interface Workout {
  readonly name: string;
}

/** Builds catalog entries from the names returned by `read_workouts`. */
export function workoutsFromNames(names: readonly string[]): readonly Workout[] {
  return names.map((name) => ({ name }));
}

/** Two workouts denote the same catalog entry when their names match. */
export function isSameWorkout(a: Workout | null, b: Workout | null): boolean {
  if (a === null || b === null) return a === b;
  return a.name === b.name;
}
