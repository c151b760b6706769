// ─── Payload Validation ────────────────────────────────────────────
// Zod schemas for values returned by the background process.
// This is the parse boundary: untyped JSON enters, typed data exits.

import { z } from "zod";
import { err, ok, type Result } from "../types/result";

// ─── Commands ──────────────────────────────────────────────────────

/** `read_workouts` answers with the workout file names, in directory order. */
export const WorkoutNamesSchema = z.array(z.string().min(1));

export type WorkoutNames = z.infer<typeof WorkoutNamesSchema>;

// ─── Parsers ───────────────────────────────────────────────────────

// One clause per rejected entry, e.g. "1: Expected string, received number".
function describeRejectedPayload(error: z.ZodError): string {
  const clauses = error.issues.map(({ path, message }) =>
    path.length === 0 ? `(root): ${message}` : `${path.join(".")}: ${message}`,
  );
  return `Validation failed: ${clauses.join("; ")}`;
}

/** Validates a `read_workouts` payload without throwing. */
export function parseWorkoutNames(raw: unknown): Result<WorkoutNames> {
  const parsed = WorkoutNamesSchema.safeParse(raw);
  return parsed.success
    ? ok(parsed.data)
    : err(new Error(describeRejectedPayload(parsed.error)));
}
