// ─── Background Commands ───────────────────────────────────────────
// The two operations the client needs from the background process,
// each a thin call through the command bridge.

import {
  COMMANDS,
  DEFAULT_TREADMILL_NAME,
  TREADMILL_FAILURE_REPLIES,
  type CommandName,
} from "../config";
import { parseWorkoutNames, type WorkoutNames } from "../schema/validation";
import { err, ok, type Result } from "../types/result";
import { wrapCommand, type InvokeArgs, type InvokeFn } from "./command-bridge";

export interface CommandBridge {
  /** Names of the workouts the background process finds on disk. */
  readonly readWorkouts: () => Promise<Result<WorkoutNames>>;
  /** Scans for the named treadmill and connects to it. */
  readonly connectToTreadmill: (name?: string) => Promise<Result<void>>;
}

export function createCommandBridge(invoke: InvokeFn): CommandBridge {
  const call = wrapCommand(
    ({ command, args }: { readonly command: CommandName; readonly args?: InvokeArgs }) =>
      invoke(command, args),
  );

  async function readWorkouts(): Promise<Result<WorkoutNames>> {
    const result = await call({ command: COMMANDS.readWorkouts });
    if (!result.ok) {
      console.warn(`[CommandBridge] ${COMMANDS.readWorkouts} failed:`, result.error.message);
      return result;
    }

    const parsed = parseWorkoutNames(result.value);
    if (!parsed.ok) {
      console.warn(`[CommandBridge] ${COMMANDS.readWorkouts} returned`, parsed.error.message);
    }
    return parsed;
  }

  async function connectToTreadmill(
    name: string = DEFAULT_TREADMILL_NAME,
  ): Promise<Result<void>> {
    const result = await call({ command: COMMANDS.connectToTreadmill, args: { name } });
    if (!result.ok) {
      console.warn(`[CommandBridge] ${COMMANDS.connectToTreadmill} failed:`, result.error.message);
      return result;
    }

    const reply = result.value;
    if (typeof reply === "string" && TREADMILL_FAILURE_REPLIES.includes(reply)) {
      console.warn(`[CommandBridge] ${COMMANDS.connectToTreadmill} failed:`, reply);
      return err(new Error(reply));
    }

    console.log(`[CommandBridge] ${COMMANDS.connectToTreadmill}:`, reply);
    return ok(undefined);
  }

  return { readWorkouts, connectToTreadmill };
}
