import { describe, expect, it, vi } from "vitest";
import {
  PollController,
  computePollTransition,
  defaultPollConfig,
} from "@/services/polling/PollController";
import type { PollScheduler, StateChange, StateSource } from "@/types";

const ENTITY = "sensor.charger_status_connector";

class FakeStateSource implements StateSource {
  readonly listeners = new Map<string, (change: StateChange) => void>();
  readonly unsubscribe = vi.fn();

  constructor(private readonly states: Record<string, string> = {}) {}

  getState(entityId: string): string | null {
    return this.states[entityId] ?? null;
  }

  subscribe(entityId: string, listener: (change: StateChange) => void) {
    this.listeners.set(entityId, listener);
    return this.unsubscribe;
  }

  emit(oldState: string | null, newState: string | null): void {
    this.listeners.get(ENTITY)?.({ oldState, newState });
  }
}

class FakeScheduler implements PollScheduler {
  interval = 14400;
  readonly setInterval = vi.fn((seconds: number) => {
    this.interval = seconds;
  });
  readonly requestRefresh = vi.fn(async () => undefined);

  getInterval(): number {
    return this.interval;
  }
}

describe("computePollTransition", () => {
  const config = defaultPollConfig();

  it("switches to the short interval and refreshes when charging starts", () => {
    expect(computePollTransition(false, "Charging", config)).toEqual({
      isCharging: true,
      intervalSeconds: 300,
      changed: true,
      refreshNow: true,
    });
  });

  it("returns to the long interval without a refresh when charging stops", () => {
    expect(computePollTransition(true, "Available", config)).toEqual({
      isCharging: false,
      intervalSeconds: 14400,
      changed: true,
      refreshNow: false,
    });
  });

  it("reports no change while the state stays the same", () => {
    expect(computePollTransition(true, "Charging", config)).toMatchObject({
      changed: false,
      refreshNow: false,
    });
  });

  it("honours a custom charging string", () => {
    const custom = defaultPollConfig({ chargingState: "SuspendedEV" });

    expect(computePollTransition(false, "SuspendedEV", custom).isCharging).toBe(true);
    expect(computePollTransition(false, "Charging", custom).isCharging).toBe(false);
  });
});

describe("PollController", () => {
  it("starts on the short interval when the charger is already charging", () => {
    const source = new FakeStateSource({ [ENTITY]: "Charging" });
    const scheduler = new FakeScheduler();
    const controller = new PollController(source, scheduler);

    controller.setup();

    expect(controller.isCharging).toBe(true);
    expect(scheduler.setInterval).toHaveBeenCalledWith(300);
    expect(scheduler.requestRefresh).not.toHaveBeenCalled();
    expect(source.listeners.has(ENTITY)).toBe(true);
  });

  it("leaves the interval alone when it already matches", () => {
    const source = new FakeStateSource({ [ENTITY]: "Available" });
    const scheduler = new FakeScheduler();

    new PollController(source, scheduler).setup();

    expect(scheduler.setInterval).not.toHaveBeenCalled();
  });

  it("reacts to charger state changes", () => {
    const source = new FakeStateSource();
    const scheduler = new FakeScheduler();
    const controller = new PollController(source, scheduler);
    controller.setup();

    source.emit("Available", "Charging");
    expect(scheduler.interval).toBe(300);
    expect(scheduler.requestRefresh).toHaveBeenCalledTimes(1);

    source.emit("Charging", "Charging");
    expect(scheduler.setInterval).toHaveBeenCalledTimes(1);

    source.emit("Charging", "Finishing");
    expect(scheduler.interval).toBe(14400);
    expect(scheduler.requestRefresh).toHaveBeenCalledTimes(1);
  });

  it("ignores notifications without a new state", () => {
    const source = new FakeStateSource({ [ENTITY]: "Charging" });
    const scheduler = new FakeScheduler();
    const controller = new PollController(source, scheduler);
    controller.setup();

    source.emit("Charging", null);

    expect(controller.isCharging).toBe(true);
    expect(scheduler.interval).toBe(300);
  });

  it("logs a failed immediate refresh instead of rejecting", async () => {
    const source = new FakeStateSource();
    const scheduler = new FakeScheduler();
    scheduler.requestRefresh.mockRejectedValueOnce(new Error("offline"));
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new PollController(source, scheduler).setup();

    source.emit("Available", "Charging");
    await vi.waitFor(() => expect(errorSpy).toHaveBeenCalled());

    expect(errorSpy).toHaveBeenCalledWith("[PollController] Immediate refresh failed:", "offline");
    errorSpy.mockRestore();
  });

  it("does nothing without a configured entity", () => {
    const source = new FakeStateSource({ [ENTITY]: "Charging" });
    const scheduler = new FakeScheduler();
    const controller = new PollController(
      source,
      scheduler,
      defaultPollConfig({ ocppEntity: null }),
    );

    controller.setup();
    controller.unsubscribe();

    expect(source.listeners.size).toBe(0);
    expect(scheduler.setInterval).not.toHaveBeenCalled();
    expect(source.unsubscribe).not.toHaveBeenCalled();
  });

  it("unsubscribes once", () => {
    const source = new FakeStateSource();
    const controller = new PollController(source, new FakeScheduler());
    controller.setup();

    controller.unsubscribe();
    controller.unsubscribe();

    expect(source.unsubscribe).toHaveBeenCalledTimes(1);
  });
});
