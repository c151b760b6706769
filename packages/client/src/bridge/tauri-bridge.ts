// ─── Desktop Shell Bridge ──────────────────────────────────────────
// Binds the command bridge to the desktop shell's IPC `invoke`.

import { invoke } from "@tauri-apps/api/core";
import { createCommandBridge, type CommandBridge, type InvokeArgs } from "@treadmill-coach/shared";

export function createShellBridge(): CommandBridge {
  return createCommandBridge((command: string, args?: InvokeArgs) =>
    invoke<unknown>(command, args ? { ...args } : undefined),
  );
}
