import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { TaskRegistry, scheduleOnce } from "./task-registry.js";

describe("scheduleOnce", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs once after the delay", async () => {
    const run = vi.fn();
    scheduleOnce(1000, run);

    await vi.advanceTimersByTimeAsync(999);
    expect(run).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await vi.advanceTimersByTimeAsync(5000);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("does nothing once cancelled", async () => {
    const run = vi.fn();
    scheduleOnce(1000, run).cancel();

    await vi.advanceTimersByTimeAsync(2000);
    expect(run).not.toHaveBeenCalled();
  });
});

describe("TaskRegistry", () => {
  function fakeTask() {
    return { cancel: vi.fn() };
  }

  it("cancels the previous holder of an identity", () => {
    const registry = new TaskRegistry();
    const first = fakeTask();
    const second = fakeTask();

    registry.startOrReplace("refresh:a", first);
    registry.startOrReplace("refresh:a", second);

    expect(first.cancel).toHaveBeenCalledTimes(1);
    expect(second.cancel).not.toHaveBeenCalled();
    expect(registry.size).toBe(1);
  });

  it("keeps tasks of different identities apart", () => {
    const registry = new TaskRegistry();
    registry.startOrReplace("refresh:a", fakeTask());
    registry.startOrReplace("refresh:b", fakeTask());

    expect(registry.has("refresh:a")).toBe(true);
    expect(registry.has("refresh:b")).toBe(true);
    expect(registry.size).toBe(2);
  });

  it("reports whether a cancel found a task", () => {
    const registry = new TaskRegistry();
    const task = fakeTask();
    registry.startOrReplace("idle-close", task);

    expect(registry.cancel("idle-close")).toBe(true);
    expect(registry.cancel("idle-close")).toBe(false);
    expect(task.cancel).toHaveBeenCalledTimes(1);
  });

  it("ignores a cancel from a task that was already replaced", () => {
    const registry = new TaskRegistry();
    const stale = fakeTask();
    const current = fakeTask();
    registry.startOrReplace("refresh:a", stale);
    registry.startOrReplace("refresh:a", current);

    expect(registry.cancel("refresh:a", stale)).toBe(false);
    expect(registry.has("refresh:a")).toBe(true);
    expect(current.cancel).not.toHaveBeenCalled();
  });

  it("cancels everything at once", () => {
    const registry = new TaskRegistry();
    const first = fakeTask();
    const second = fakeTask();
    registry.startOrReplace("a", first);
    registry.startOrReplace("b", second);

    registry.cancelAll();

    expect(first.cancel).toHaveBeenCalledTimes(1);
    expect(second.cancel).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
  });
});
