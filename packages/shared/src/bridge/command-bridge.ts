// ─── Command Bridge ────────────────────────────────────────────────
// Converts the outcome of an asynchronous background operation into a
// Result. Rejections are captured here and never reach the caller as
// exceptions.

import { err, ok, type Result } from "../types/result";

/** Arguments passed along with a background command. */
export type InvokeArgs = Readonly<Record<string, unknown>>;

/**
 * The desktop shell's command transport: sends a named command to the
 * background process and resolves with its JSON answer.
 */
export type InvokeFn = (command: string, args?: InvokeArgs) => Promise<unknown>;

/**
 * Normalizes a rejection reason. The shell rejects with plain strings,
 * so anything that is not already an Error is wrapped, keeping the
 * original value as `cause`.
 */
export function toError(reason: unknown): Error {
  if (reason instanceof Error) return reason;
  return new Error(String(reason), { cause: reason });
}

/**
 * Runs `operation(input)` and resolves with `{ ok: true, value }` or
 * `{ ok: false, error }`. The returned promise never rejects, including
 * when `operation` throws synchronously.
 */
export async function attempt<I, O>(
  operation: (input: I) => Promise<O>,
  input: I,
): Promise<Result<O>> {
  try {
    return ok(await operation(input));
  } catch (reason) {
    return err(toError(reason));
  }
}

/** Curried form of {@link attempt} for building named operations. */
export function wrapCommand<I, O>(
  operation: (input: I) => Promise<O>,
): (input: I) => Promise<Result<O>> {
  return (input) => attempt(operation, input);
}
