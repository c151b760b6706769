import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { connectTreadmill, loadWorkouts } from "./effects";
import { createCommandBridge, type CommandBridge } from "./commands";
import { createStore } from "../store/store";
import { createInitialState } from "../store/reducer";
import type { BluetoothStatus } from "../types/app-state";

// ══════════════════════════════════════════════════════════════════════
// Factories
// ══════════════════════════════════════════════════════════════════════

function makeBridge(overrides: Partial<CommandBridge> = {}): CommandBridge {
  return {
    readWorkouts: vi.fn(async () => ({ ok: true as const, value: ["6x400", "10x3min"] })),
    connectToTreadmill: vi.fn(async () => ({ ok: true as const, value: undefined })),
    ...overrides,
  };
}

function makeStore() {
  return createStore(createInitialState({ workoutNames: ["seeded"] }));
}

// ══════════════════════════════════════════════════════════════════════
// Tests
// ══════════════════════════════════════════════════════════════════════

describe("store effects", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ── loadWorkouts ─────────────────────────────────────────────────

  describe("loadWorkouts", () => {
    it("replaces the catalog with the names read from disk", async () => {
      const store = makeStore();

      const result = await loadWorkouts(store, makeBridge());

      expect(result).toEqual({ ok: true, value: ["6x400", "10x3min"] });
      expect(store.getState().workouts).toEqual([{ name: "6x400" }, { name: "10x3min" }]);
    });

    it("notifies subscribers once", async () => {
      const store = makeStore();
      const listener = vi.fn();
      store.subscribe(listener);

      await loadWorkouts(store, makeBridge());

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it("keeps the seeded catalog and returns the error on failure", async () => {
      const store = makeStore();
      const before = store.getState();
      const failure = new Error("Error reading workouts directory.");
      const bridge = makeBridge({
        readWorkouts: vi.fn(async () => ({ ok: false as const, error: failure })),
      });

      const result = await loadWorkouts(store, bridge);

      expect(result).toEqual({ ok: false, error: failure });
      expect(store.getState()).toBe(before);
      expect(console.error).toHaveBeenCalledWith("[Workouts] Load failed:", failure);
    });
  });

  // ── connectTreadmill ─────────────────────────────────────────────

  describe("connectTreadmill", () => {
    it("moves bluetooth status through scanning to connected", async () => {
      const store = makeStore();
      const seen: BluetoothStatus[] = [];
      store.subscribe(() => seen.push(store.getState().bluetoothStatus));

      const result = await connectTreadmill(store, makeBridge());

      expect(result).toEqual({ ok: true, value: undefined });
      expect(seen).toEqual(["scanning", "connected"]);
    });

    it("is scanning while the command is in flight", async () => {
      const store = makeStore();
      let statusDuringCall: BluetoothStatus | null = null;
      const bridge = makeBridge({
        connectToTreadmill: vi.fn(async () => {
          statusDuringCall = store.getState().bluetoothStatus;
          return { ok: true as const, value: undefined };
        }),
      });

      await connectTreadmill(store, bridge);

      expect(statusDuringCall).toBe("scanning");
    });

    it("falls back to off when the connection fails", async () => {
      const store = makeStore();
      const seen: BluetoothStatus[] = [];
      store.subscribe(() => seen.push(store.getState().bluetoothStatus));
      const failure = new Error("Treadmill not found.");
      const bridge = makeBridge({
        connectToTreadmill: vi.fn(async () => ({ ok: false as const, error: failure })),
      });

      const result = await connectTreadmill(store, bridge);

      expect(result).toEqual({ ok: false, error: failure });
      expect(seen).toEqual(["scanning", "off"]);
    });

    it("ends at off when the treadmill is not found", async () => {
      const store = makeStore();
      const bridge = createCommandBridge(async () => "Treadmill not found.");

      const result = await connectTreadmill(store, bridge);

      expect(result).toEqual({ ok: false, error: new Error("Treadmill not found.") });
      expect(store.getState().bluetoothStatus).toBe("off");
    });

    it("forwards the device name", async () => {
      const bridge = makeBridge();

      await connectTreadmill(makeStore(), bridge, "T101");

      expect(bridge.connectToTreadmill).toHaveBeenCalledWith("T101");
    });

    it("leaves the workout session alone", async () => {
      const store = makeStore();
      store.update({ type: "WORKOUT_START", workout: { name: "seeded" } });

      await connectTreadmill(store, makeBridge());

      expect(store.getState().activeWorkout).toEqual({ name: "seeded" });
    });
  });
});
