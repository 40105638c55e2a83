import { describe, expect, it, vi } from "vitest";
import { HotplugDetector } from "../hotplug-detector.js";
import { HotplugError, HotplugErrorCode } from "../hotplug-errors.js";
import type { HotplugEventT } from "../hotplug-types.js";
import { FakeBackend, flush, waitForAbort } from "./fake-backend.js";

function describeEvent(event: HotplugEventT<string>): string {
  return `${event.type} ${event.key}`;
}

async function take<T>(
  iterator: AsyncGenerator<T, void, undefined>,
  count: number
): Promise<T[]> {
  const items: T[] = [];
  for (let i = 0; i < count; i++) {
    const result = await iterator.next();
    if (result.done) {
      throw new Error(`Stream ended after ${items.length} items`);
    }
    items.push(result.value);
  }
  return items;
}

function createDetector(backend: FakeBackend): HotplugDetector<string> {
  return new HotplugDetector<string>({}, { backend });
}

describe("HotplugDetector.events", () => {
  it("reports additions and removals, removals first within a scan", async () => {
    const backend = new FakeBackend();
    const detector = createDetector(backend);
    const controller = new AbortController();
    const events = detector.events({ signal: controller.signal });

    const first = events.next();
    await backend.untilWaiting();
    expect(backend.scans).toBe(1);

    backend.setDevices(["A"]);
    backend.tick();
    const firstResult = await first;
    expect(firstResult.done).toBe(false);
    expect(firstResult.value).toEqual({ type: "added", device: "A", key: "A" });

    backend.setDevices(["A", "B"]);
    backend.tick();
    expect((await take(events, 1)).map(describeEvent)).toEqual(["added B"]);

    backend.setDevices(["B", "C"]);
    backend.tick();
    expect((await take(events, 2)).map(describeEvent)).toEqual([
      "removed A",
      "added C",
    ]);

    backend.setDevices([]);
    backend.tick();
    expect((await take(events, 2)).map(describeEvent)).toEqual([
      "removed B",
      "removed C",
    ]);
    expect(backend.scans).toBe(5);

    controller.abort();
    expect(await events.next()).toEqual({ value: undefined, done: true });
    expect(backend.closed).toBe(true);
  });

  it("reports a device listed several times in one scan once", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const controller = new AbortController();
    const events = createDetector(backend).events({ signal: controller.signal });

    expect((await take(events, 1)).map(describeEvent)).toEqual(["added foo"]);

    backend.setDevices(["foo", "bar", "bar", "bar"]);
    backend.tick();
    const result = await events.next();
    expect(result.value).toEqual({ type: "added", device: "bar", key: "bar" });

    // No further event: the loop blocks waiting for the next scan
    const pending = events.next();
    await backend.untilWaiting();
    controller.abort();
    expect(await pending).toEqual({ value: undefined, done: true });
    expect(backend.scans).toBe(2);
  });

  it("emits frozen events", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const controller = new AbortController();
    const events = createDetector(backend).events({ signal: controller.signal });

    const [event] = await take(events, 1);
    expect(Object.isFrozen(event)).toBe(true);

    controller.abort();
    await events.next();
  });

  it("does not report a device present in consecutive scans", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const controller = new AbortController();
    const events = createDetector(backend).events({ signal: controller.signal });

    await take(events, 1);

    backend.tick();
    const pending = events.next();
    await backend.untilWaiting();
    backend.tick();
    await backend.untilWaiting();
    expect(backend.scans).toBe(3);

    controller.abort();
    expect(await pending).toEqual({ value: undefined, done: true });
  });

  it("ends the stream with SCAN_FAILED when a scan fails", async () => {
    const backend = new FakeBackend();
    const failure = new Error("I/O hiccup");
    backend.scanError = failure;
    const events = createDetector(backend).events();

    const error = await events.next().then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(HotplugError);
    if (error instanceof HotplugError) {
      expect(error.code).toBe(HotplugErrorCode.SCAN_FAILED);
      expect(error.cause).toBe(failure);
    }
    expect(backend.closed).toBe(true);
    expect(await events.next()).toEqual({ value: undefined, done: true });
  });

  it("closes the backend when the consumer stops iterating", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo", "bar"]);
    const seen: string[] = [];

    for await (const event of createDetector(backend).events()) {
      seen.push(event.key);
      break;
    }

    expect(seen).toEqual(["foo"]);
    expect(backend.closed).toBe(true);
  });

  it("returns immediately for an already aborted signal", async () => {
    const factory = vi.fn(() => new FakeBackend());
    const detector = new HotplugDetector<string>({}, { backend: factory });

    const events = detector.events({ signal: AbortSignal.abort() });

    expect(await events.next()).toEqual({ value: undefined, done: true });
    expect(factory).not.toHaveBeenCalled();
  });

  it("creates a fresh backend for every stream", async () => {
    const backends: FakeBackend[] = [];
    const factory = vi.fn(() => {
      const backend = new FakeBackend();
      backend.setDevices(["foo"]);
      backends.push(backend);
      return backend;
    });
    const detector = new HotplugDetector<string>({}, { backend: factory });
    const controller = new AbortController();

    const first = detector.events({ signal: controller.signal });
    const second = detector.events({ signal: controller.signal });

    expect((await take(first, 1)).map(describeEvent)).toEqual(["added foo"]);
    expect((await take(second, 1)).map(describeEvent)).toEqual(["added foo"]);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(backends[0]).not.toBe(backends[1]);

    controller.abort();
    await first.next();
    await second.next();
  });
});

describe("HotplugDetector projections", () => {
  it("yields only added devices from addedDevices()", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const controller = new AbortController();
    const added = createDetector(backend).addedDevices({
      signal: controller.signal,
    });

    expect(await take(added, 1)).toEqual(["foo"]);

    backend.setDevices(["foo", "bar", "bar", "bar"]);
    backend.tick();
    expect(await take(added, 1)).toEqual(["bar"]);

    backend.setDevices(["foo", "baz"]);
    backend.tick();
    expect(await take(added, 1)).toEqual(["baz"]);

    backend.setDevices([]);
    backend.tick();
    const pending = added.next();
    await backend.untilWaiting();
    controller.abort();
    expect(await pending).toEqual({ value: undefined, done: true });
    expect(backend.scans).toBe(4);
  });

  it("yields only removed devices from removedDevices()", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const controller = new AbortController();
    const removed = createDetector(backend).removedDevices({
      signal: controller.signal,
    });

    const first = removed.next();
    await backend.untilWaiting();

    backend.setDevices(["foo", "bar", "bar", "bar"]);
    backend.tick();
    await backend.untilWaiting();

    backend.setDevices(["foo", "baz"]);
    backend.tick();
    expect(await first).toEqual({ value: "bar", done: false });

    backend.setDevices([]);
    backend.tick();
    expect(await take(removed, 2)).toEqual(["foo", "baz"]);

    controller.abort();
    await removed.next();
  });
});

describe("HotplugDetector suspension", () => {
  it("defers scanning until resumed and reports the accumulated diff", async () => {
    const backend = new FakeBackend();
    const detector = createDetector(backend);
    const controller = new AbortController();
    const events = detector.events({ signal: controller.signal });

    const first = events.next();
    await backend.untilWaiting();

    detector.suspend();
    backend.setDevices(["foo", "bar"]);
    backend.tick();
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(backend.scans).toBe(1);

    backend.setDevices(["foo", "baz"]);
    detector.resume();

    expect(await first).toEqual({
      value: { type: "added", device: "foo", key: "foo" },
      done: false,
    });
    expect((await take(events, 1)).map(describeEvent)).toEqual(["added baz"]);
    expect(backend.scans).toBe(2);

    controller.abort();
    await events.next();
  });

  it("needs one resume per suspend", async () => {
    const backend = new FakeBackend();
    const detector = createDetector(backend);
    const controller = new AbortController();
    const events = detector.events({ signal: controller.signal });

    const first = events.next();
    await backend.untilWaiting();

    detector.suspend();
    detector.suspend();
    expect(detector.suspendCount).toBe(2);
    backend.setDevices(["foo"]);
    backend.tick();

    detector.resume();
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(backend.scans).toBe(1);
    expect(detector.isSuspended).toBe(true);

    detector.resume();
    expect((await first).value).toEqual({
      type: "added",
      device: "foo",
      key: "foo",
    });
    expect(detector.isSuspended).toBe(false);

    controller.abort();
    await events.next();
  });

  it("resumes after suspended() even when the callback throws", async () => {
    const detector = createDetector(new FakeBackend());

    await expect(
      detector.suspended(async () => {
        expect(detector.isSuspended).toBe(true);
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(detector.isSuspended).toBe(false);
    expect(await detector.suspended(() => 42)).toBe(42);
  });

  it("rejects resume() without a matching suspend()", () => {
    const detector = createDetector(new FakeBackend());

    expect(() => detector.resume()).toThrow(HotplugError);
    expect(detector.suspendCount).toBe(0);
  });

  it("stops a stream blocked on the gate without breaking a later resume", async () => {
    const backend = new FakeBackend();
    const detector = createDetector(backend);
    const controller = new AbortController();
    const events = detector.events({ signal: controller.signal });

    const first = events.next();
    await backend.untilWaiting();
    detector.suspend();
    backend.tick();
    await new Promise((resolve) => setTimeout(resolve, 10));

    controller.abort();
    expect(await first).toEqual({ value: undefined, done: true });
    expect(detector.isSuspended).toBe(true);

    detector.resume();
    expect(detector.isSuspended).toBe(false);
  });
});

describe("HotplugDetector construction", () => {
  it("normalizes VID/PID passed to forDevice()", async () => {
    const backend = new FakeBackend();
    const detector = HotplugDetector.forDevice("0402", "0x0204", { backend });
    const controller = new AbortController();
    const events = detector.events({ signal: controller.signal });

    const pending = events.next();
    await backend.untilWaiting();

    expect(backend.params).toEqual({ idVendor: 0x0402, idProduct: 0x0204 });

    controller.abort();
    await pending;
  });

  it("accepts integer IDs in forDevice()", async () => {
    const backend = new FakeBackend();
    const detector = HotplugDetector.forDevice(1027, 24577, { backend });
    const controller = new AbortController();
    const events = detector.events({ signal: controller.signal });

    const pending = events.next();
    await backend.untilWaiting();

    expect(backend.params).toEqual({ idVendor: 1027, idProduct: 24577 });

    controller.abort();
    await pending;
  });

  it("rejects malformed IDs before scanning", () => {
    const backend = new FakeBackend();

    let error: unknown = null;
    try {
      HotplugDetector.forDevice("zz", "0001", { backend });
    } catch (caught: unknown) {
      error = caught;
    }

    expect(error).toBeInstanceOf(HotplugError);
    expect(error).toMatchObject({
      code: HotplugErrorCode.INVALID_DEVICE_ID,
      details: { field: "vendor ID", value: "zz" },
    });
    expect(backend.scans).toBe(0);
  });

  it("rewrites vid/pid aliases passed to the constructor", async () => {
    const backend = new FakeBackend();
    const detector = new HotplugDetector<string>(
      { vid: "1050", pid: 0x0407, busNumber: 3 },
      { backend }
    );
    const controller = new AbortController();
    const events = detector.events({ signal: controller.signal });

    const pending = events.next();
    await backend.untilWaiting();

    expect(backend.params).toEqual({
      idVendor: 0x1050,
      idProduct: 0x0407,
      busNumber: 3,
    });

    controller.abort();
    await pending;
  });
});

describe("HotplugDetector.runForEachDevice", () => {
  function createCounters() {
    const counters = new Map<string, number>();
    const bump = (device: string, delta: number) => {
      counters.set(device, (counters.get(device) ?? 0) + delta);
    };
    return { counters, bump };
  }

  it("cancels a device's task when the device is removed", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const detector = createDetector(backend);
    const { counters, bump } = createCounters();
    const controller = new AbortController();

    const run = detector.runForEachDevice(
      async (device, signal) => {
        bump(device, 1);
        try {
          await waitForAbort(signal);
        } finally {
          bump(device, -1);
        }
      },
      { signal: controller.signal }
    );

    await backend.untilWaiting();
    expect(Object.fromEntries(counters)).toEqual({ foo: 1 });

    backend.setDevices(["foo", "bar", "bar", "bar"]);
    backend.tick();
    await backend.untilWaiting();
    expect(Object.fromEntries(counters)).toEqual({ foo: 1, bar: 1 });

    backend.setDevices(["foo", "baz"]);
    backend.tick();
    await backend.untilWaiting();
    await flush();
    expect(Object.fromEntries(counters)).toEqual({ foo: 1, bar: 0, baz: 1 });

    backend.setDevices([]);
    backend.tick();
    await backend.untilWaiting();
    await flush();
    expect(Object.fromEntries(counters)).toEqual({ foo: 0, bar: 0, baz: 0 });

    controller.abort();
    await expect(run).resolves.toBeUndefined();
    expect(backend.closed).toBe(true);
  });

  it("keeps non-cancellable tasks running after removal", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const detector = createDetector(backend);
    const { counters, bump } = createCounters();
    const release = new AbortController();
    const controller = new AbortController();

    const run = detector.runForEachDevice(
      async (device) => {
        bump(device, 1);
        try {
          await waitForAbort(release.signal);
        } finally {
          bump(device, -1);
        }
      },
      { cancellable: false, signal: controller.signal }
    );

    await backend.untilWaiting();
    backend.setDevices(["foo", "bar"]);
    backend.tick();
    await backend.untilWaiting();
    backend.setDevices(["foo", "baz"]);
    backend.tick();
    await backend.untilWaiting();
    backend.setDevices([]);
    backend.tick();
    await backend.untilWaiting();
    await flush();
    expect(Object.fromEntries(counters)).toEqual({ foo: 1, bar: 1, baz: 1 });

    release.abort();
    await flush();
    expect(Object.fromEntries(counters)).toEqual({ foo: 0, bar: 0, baz: 0 });

    controller.abort();
    await run;
  });

  it("does not start a second task for a key whose task is still running", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const detector = createDetector(backend);
    const release = new AbortController();
    const controller = new AbortController();
    const task = vi.fn(async () => {
      await waitForAbort(release.signal);
    });

    const run = detector.runForEachDevice(task, {
      cancellable: false,
      signal: controller.signal,
    });

    await backend.untilWaiting();
    backend.setDevices([]);
    backend.tick();
    await backend.untilWaiting();
    backend.setDevices(["foo"]);
    backend.tick();
    await backend.untilWaiting();
    expect(task).toHaveBeenCalledTimes(1);

    release.abort();
    controller.abort();
    await run;
  });

  it("only starts tasks for devices matching the predicate", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["keep-1", "skip-1", "keep-2"]);
    const detector = createDetector(backend);
    const started: string[] = [];
    const controller = new AbortController();

    const run = detector.runForEachDevice(
      async (device, signal) => {
        started.push(device);
        await waitForAbort(signal);
      },
      {
        predicate: (device) => device.startsWith("keep"),
        signal: controller.signal,
      }
    );

    await backend.untilWaiting();
    expect(started).toEqual(["keep-1", "keep-2"]);

    controller.abort();
    await run;
  });

  it("cancels the other tasks and rejects with TASK_FAILED when a task fails", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["good", "bad"]);
    const detector = createDetector(backend);
    const { counters, bump } = createCounters();
    const failure = new Error("device exploded");

    const error = await detector
      .runForEachDevice(async (device, signal) => {
        if (device === "bad") {
          throw failure;
        }
        bump(device, 1);
        try {
          await waitForAbort(signal);
        } finally {
          bump(device, -1);
        }
      })
      .then(
        () => null,
        (reason: unknown) => reason
      );

    expect(error).toBeInstanceOf(HotplugError);
    if (error instanceof HotplugError) {
      expect(error.code).toBe(HotplugErrorCode.TASK_FAILED);
      expect(error.details).toEqual({ key: "bad" });
      expect(error.cause).toBe(failure);
    }
    expect(Object.fromEntries(counters)).toEqual({ good: 0 });
    expect(backend.closed).toBe(true);
  });

  it("rejects with TASK_FAILED when a cancelled task fails during cleanup", async () => {
    const backend = new FakeBackend();
    backend.setDevices(["foo"]);
    const detector = createDetector(backend);
    const controller = new AbortController();
    const failure = new Error("cleanup failed: could not release device handle");

    const outcome = detector
      .runForEachDevice(
        async (_device, signal) => {
          await waitForAbort(signal);
          throw failure;
        },
        { signal: controller.signal }
      )
      .then(
        () => "resolved",
        (reason: unknown) => reason
      );

    await backend.untilWaiting();
    backend.setDevices([]);
    backend.tick();
    await backend.untilWaiting();
    controller.abort();

    const error = await outcome;
    expect(error).toBeInstanceOf(HotplugError);
    if (error instanceof HotplugError) {
      expect(error.code).toBe(HotplugErrorCode.TASK_FAILED);
      expect(error.details).toEqual({ key: "foo" });
      expect(error.cause).toBe(failure);
    }
  });

  it("resolves without scanning for an already aborted signal", async () => {
    const factory = vi.fn(() => new FakeBackend());
    const detector = new HotplugDetector<string>({}, { backend: factory });
    const task = vi.fn(async () => undefined);

    await detector.runForEachDevice(task, { signal: AbortSignal.abort() });

    expect(factory).not.toHaveBeenCalled();
    expect(task).not.toHaveBeenCalled();
  });
});
