// ─── @treadmill-coach/shared ───────────────────────────────────────
// Framework-free state core: store, reducer, selectors and the bridge
// to the background process. No React dependency.

export * from "./config";
export * from "./types/index";
export * from "./store/index";
export * from "./schema/index";
export * from "./bridge/index";
