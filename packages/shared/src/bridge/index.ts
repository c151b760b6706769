// ─── Bridge Layer ──────────────────────────────────────────────────
// Background command wrappers and the effects that drive the store
// from their results.

export {
  attempt,
  wrapCommand,
  toError,
  type InvokeArgs,
  type InvokeFn,
} from "./command-bridge";
export { createCommandBridge, type CommandBridge } from "./commands";
export { loadWorkouts, connectTreadmill } from "./effects";
