import { describe, it, expect, vi } from "vitest";
import { act, renderHook } from "@testing-library/react";
import {
  selectActiveWorkout,
  selectWorkouts,
  type ApplicationState,
} from "@treadmill-coach/shared";
import { useDispatch, useGlobalState } from "./useGlobalState.js";
import { makeStore, makeWrapper } from "../test/render-helpers.js";

describe("useGlobalState", () => {
  it("returns the selected slice of the current state", () => {
    const store = makeStore();

    const { result } = renderHook(() => useGlobalState(selectWorkouts), {
      wrapper: makeWrapper(store),
    });

    expect(result.current).toEqual([{ name: "6x400" }, { name: "10x3min" }]);
  });

  it("re-renders with the new value after an accepted action", () => {
    const store = makeStore();
    const { result } = renderHook(() => useGlobalState(selectActiveWorkout), {
      wrapper: makeWrapper(store),
    });

    act(() => {
      store.update({ type: "WORKOUT_START", workout: { name: "6x400" } });
    });

    expect(result.current).toEqual({ name: "6x400" });
  });

  it("does not re-render when the selected value is unchanged", () => {
    const store = makeStore();
    let renders = 0;
    renderHook(
      () => {
        renders += 1;
        return useGlobalState(selectActiveWorkout);
      },
      { wrapper: makeWrapper(store) },
    );
    const rendersAfterMount = renders;

    act(() => {
      store.update({ type: "BLUETOOTH_STATUS", status: "scanning" });
    });

    expect(renders).toBe(rendersAfterMount);
  });

  it("accepts a selector that builds a new object", () => {
    const store = makeStore();
    const countWorkouts = (state: ApplicationState) => ({ count: state.workouts.length });
    const { result } = renderHook(() => useGlobalState(countWorkouts), {
      wrapper: makeWrapper(store),
    });

    expect(result.current).toEqual({ count: 2 });

    act(() => {
      store.update({ type: "WORKOUTS_LOADED", names: ["tempo"] });
    });

    expect(result.current).toEqual({ count: 1 });
  });

  it("subscribes while mounted and unsubscribes on unmount", () => {
    const store = makeStore();
    const { unmount } = renderHook(() => useGlobalState(selectActiveWorkout), {
      wrapper: makeWrapper(store),
    });

    expect(store.getState().subscriptions.size).toBe(1);

    unmount();

    expect(store.getState().subscriptions.size).toBe(0);
  });

  it("throws outside a StoreProvider", () => {
    // React reports the render error before rethrowing it
    vi.spyOn(console, "error").mockImplementation(() => {});

    expect(() => renderHook(() => useGlobalState(selectActiveWorkout))).toThrow(
      "useStore must be used inside <StoreProvider>",
    );

    vi.restoreAllMocks();
  });
});

describe("useDispatch", () => {
  it("returns the store's update function", () => {
    const store = makeStore();

    const { result } = renderHook(() => useDispatch(), { wrapper: makeWrapper(store) });

    expect(result.current).toBe(store.update);
  });
});
