import { isAbortError } from "../../utils/abort.js";
import { silentLogger, type LoggerLikeT } from "../logger.js";
import { createTaskFailedError, type HotplugError } from "./hotplug-errors.js";
import type {
  DevicePredicateT,
  DeviceTaskT,
  HotplugEventT,
} from "./hotplug-types.js";

export type DeviceTaskSupervisorOptionsT<TDevice> = {
  predicate?: DevicePredicateT<TDevice>;
  cancellable?: boolean;
  logger?: LoggerLikeT;
};

/**
 * Device task supervisor
 *
 * Keeps at most one running task per device key. All tasks live in one
 * supervising scope: cancelling the scope cancels every task, and `close()`
 * waits for all of them to settle.
 *
 * Registry entries hold the task's AbortController, or `null` for tasks
 * that are not cancelled on device removal.
 */
export class DeviceTaskSupervisor<TDevice> {
  private readonly task: DeviceTaskT<TDevice>;
  private readonly predicate: DevicePredicateT<TDevice>;
  private readonly cancellable: boolean;
  private readonly logger: LoggerLikeT;

  private readonly registry = new Map<string, AbortController | null>();
  private readonly running = new Set<Promise<void>>();
  private readonly scope = new AbortController();
  private failure: HotplugError | null = null;

  constructor(
    task: DeviceTaskT<TDevice>,
    options: DeviceTaskSupervisorOptionsT<TDevice> = {}
  ) {
    this.task = task;
    this.predicate = options.predicate ?? (() => true);
    this.cancellable = options.cancellable ?? true;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Scope signal; aborts on cancel() or when a task fails
   */
  get signal(): AbortSignal {
    return this.scope.signal;
  }

  /**
   * Handle one hotplug event.
   *
   * Added: start a task unless the predicate rejects the device or a task
   * is still registered for the key. Removed: cancel the key's task when
   * supervision is cancellable.
   */
  dispatch(event: HotplugEventT<TDevice>): void {
    if (event.type === "added") {
      if (this.scope.signal.aborted || this.registry.has(event.key)) {
        return;
      }
      if (!this.predicate(event.device)) {
        return;
      }
      this.spawn(event);
      return;
    }

    const controller = this.registry.get(event.key);
    if (this.cancellable && controller) {
      this.logger.debug?.(
        `[DeviceTaskSupervisor] Cancelling task for removed device ${event.key}`
      );
      controller.abort();
    }
  }

  /**
   * Cancel the scope: every task is aborted and no new task starts
   */
  cancel(): void {
    this.scope.abort();
  }

  /**
   * Cancel the scope and wait until every task has settled
   */
  async close(): Promise<void> {
    this.cancel();
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running]);
    }
  }

  /**
   * Rethrow the first task failure, if any
   */
  throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }

  has(key: string): boolean {
    return this.registry.has(key);
  }

  /**
   * Keys of devices with a registered task
   */
  keys(): string[] {
    return [...this.registry.keys()];
  }

  get size(): number {
    return this.registry.size;
  }

  private spawn(event: HotplugEventT<TDevice>): void {
    const controller = new AbortController();
    const onScopeAbort = () => controller.abort(this.scope.signal.reason);
    this.scope.signal.addEventListener("abort", onScopeAbort, { once: true });

    this.registry.set(event.key, this.cancellable ? controller : null);
    this.logger.debug?.(
      `[DeviceTaskSupervisor] Starting task for device ${event.key}`
    );

    const promise: Promise<void> = this.runTask(event, controller).finally(
      () => {
        this.scope.signal.removeEventListener("abort", onScopeAbort);
        this.running.delete(promise);
      }
    );
    this.running.add(promise);
  }

  private async runTask(
    event: HotplugEventT<TDevice>,
    controller: AbortController
  ): Promise<void> {
    try {
      await this.task(event.device, controller.signal);
      this.logger.debug?.(
        `[DeviceTaskSupervisor] Task for device ${event.key} finished`
      );
    } catch (error: unknown) {
      if (this.isCancellation(error, controller.signal)) {
        this.logger.debug?.(
          `[DeviceTaskSupervisor] Task for device ${event.key} cancelled`
        );
      } else {
        this.fail(event.key, error);
      }
    } finally {
      this.registry.delete(event.key);
    }
  }

  /**
   * A rejection is a cancellation only when it is the abort itself; any other
   * error, even after the signal aborted, is a task failure.
   */
  private isCancellation(error: unknown, signal: AbortSignal): boolean {
    return signal.aborted && (isAbortError(error) || error === signal.reason);
  }

  private fail(key: string, error: unknown): void {
    this.logger.warn(
      `[DeviceTaskSupervisor] Task for device ${key} failed: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    if (!this.failure) {
      this.failure = createTaskFailedError(key, error);
    }
    this.scope.abort(this.failure);
  }
}
