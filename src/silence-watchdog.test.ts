// Crisis Relay - Silence watchdog tests

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SilenceWatchdog } from "./silence-watchdog.js";

describe("SilenceWatchdog", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T12:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts disarmed until the first qualifying event", () => {
    const onFire = vi.fn();
    const watchdog = new SilenceWatchdog({}, { onFire });
    expect(watchdog.currentState).toEqual({ phase: "disarmed", reason: "initial" });
    expect(watchdog.deadline).toBeNull();

    vi.advanceTimersByTime(60_000);
    expect(onFire).not.toHaveBeenCalled();
  });

  it("arms with a deadline threshold seconds ahead", () => {
    const watchdog = new SilenceWatchdog({}, { onFire: vi.fn() });
    watchdog.recordActivity();
    expect(watchdog.deadline).toBe(Date.now() + 10_000);
  });

  it("fires exactly once, never before the threshold", () => {
    const onFire = vi.fn();
    const watchdog = new SilenceWatchdog({ thresholdSeconds: 10 }, { onFire });
    watchdog.recordActivity();

    vi.advanceTimersByTime(9_999);
    expect(onFire).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(onFire).toHaveBeenCalledWith(10);
    expect(watchdog.currentState).toEqual({ phase: "disarmed", reason: "fired" });

    vi.advanceTimersByTime(120_000);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it("pushes the deadline out on every event", () => {
    const onFire = vi.fn();
    const watchdog = new SilenceWatchdog({ thresholdSeconds: 10 }, { onFire });
    watchdog.recordActivity();

    vi.advanceTimersByTime(5_000);
    watchdog.recordActivity();
    vi.advanceTimersByTime(9_000);
    expect(onFire).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1_000);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it("re-arms after firing when a new event arrives", () => {
    const onFire = vi.fn();
    const watchdog = new SilenceWatchdog({ thresholdSeconds: 2 }, { onFire });
    watchdog.recordActivity();
    vi.advanceTimersByTime(2_000);
    expect(onFire).toHaveBeenCalledTimes(1);

    watchdog.recordActivity();
    expect(watchdog.currentState.phase).toBe("armed");
    vi.advanceTimersByTime(2_000);
    expect(onFire).toHaveBeenCalledTimes(2);
  });

  it("never fires after stop, even on later events", () => {
    const onFire = vi.fn();
    const watchdog = new SilenceWatchdog({ thresholdSeconds: 1 }, { onFire });
    watchdog.recordActivity();
    watchdog.stop();
    watchdog.recordActivity();

    vi.advanceTimersByTime(10_000);
    expect(onFire).not.toHaveBeenCalled();
    expect(watchdog.currentState).toEqual({ phase: "disarmed", reason: "stopped" });
  });

  it("does nothing when disabled", () => {
    const onFire = vi.fn();
    const watchdog = new SilenceWatchdog({ enabled: false }, { onFire });
    watchdog.recordActivity();
    vi.advanceTimersByTime(60_000);
    expect(onFire).not.toHaveBeenCalled();
    expect(watchdog.deadline).toBeNull();
  });

  it("rejects a non-positive threshold", () => {
    expect(() => new SilenceWatchdog({ thresholdSeconds: 0 }, { onFire: vi.fn() })).toThrow(RangeError);
  });
});
