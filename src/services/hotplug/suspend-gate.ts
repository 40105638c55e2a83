import { raceAbort } from "../../utils/abort.js";
import { createNotSuspendedError } from "./hotplug-errors.js";

/**
 * Single-shot broadcast latch: once released, every current and future
 * waiter passes.
 */
class Latch {
  private readonly promise: Promise<void>;
  private releaseFn: () => void = () => undefined;
  private released = false;

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.releaseFn = resolve;
    });
  }

  wait(): Promise<void> {
    return this.promise;
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.releaseFn();
  }
}

/**
 * Suspend gate
 *
 * Nestable suspension counter. Scan loops call `wait()` before every scan and
 * block while the counter is above zero; the latch is released exactly once
 * when the last `resume()` brings the counter back to zero.
 */
export class SuspendGate {
  private count = 0;
  private latch: Latch | null = null;

  /**
   * Increment the suspension counter
   */
  suspend(): void {
    this.count += 1;
    if (!this.latch) {
      this.latch = new Latch();
    }
  }

  /**
   * Decrement the suspension counter, releasing waiters at zero
   *
   * @throws HotplugError (NOT_SUSPENDED) without a matching suspend()
   */
  resume(): void {
    if (this.count === 0) {
      throw createNotSuspendedError();
    }

    this.count -= 1;
    if (this.count === 0 && this.latch) {
      const latch = this.latch;
      this.latch = null;
      latch.release();
    }
  }

  /**
   * Run `fn` while suspended; resumes on every exit path
   */
  async suspended<T>(fn: () => T | Promise<T>): Promise<T> {
    this.suspend();
    try {
      return await fn();
    } finally {
      this.resume();
    }
  }

  /**
   * Block until the gate is open.
   *
   * Rejects when `signal` aborts. Aborting only stops this waiter; the
   * latch stays owned by the gate until the matching resume().
   */
  async wait(signal?: AbortSignal): Promise<void> {
    while (this.latch) {
      await raceAbort(this.latch.wait(), signal);
    }
  }

  get isSuspended(): boolean {
    return this.count > 0;
  }

  get suspendCount(): number {
    return this.count;
  }
}
