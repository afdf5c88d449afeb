/**
 * Scoped Task Runner
 *
 * Runs device work for one controller off the dispatch call and resumes
 * the caller only once the work has finished. One runner per controller:
 * it never has two tasks in flight, and a message never has more than one.
 * Supports both 'queue' and 'reject' modes for work arriving while busy.
 */

import type { TaskQueueMode } from "@filmbus/types";
import { formatDuration } from "@filmbus/utils";
import { cameraLogger } from "./logger";
import {
  ControllerBusyError,
  TaskConflictError,
  TaskTimeoutError,
} from "./errors";
import type { HalMessage } from "../bus/message";

export interface TaskContext {
  owner: string;
  operation: string;
  messageId: string;
  messageType: string;
}

export interface ScopedTaskRunnerOptions {
  mode?: TaskQueueMode;
  /** 0 disables the timeout */
  timeoutMs?: number;
}

export class ScopedTaskRunner {
  private locked = false;
  private readonly waiters: (() => void)[] = [];
  private readonly inFlight = new Set<string>();
  private mode: TaskQueueMode;
  private readonly timeoutMs: number;

  constructor(
    private readonly owner: string,
    options: ScopedTaskRunnerOptions = {},
  ) {
    this.mode = options.mode ?? "queue";
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  setMode(mode: TaskQueueMode): void {
    this.mode = mode;
    cameraLogger.info(`ScopedTaskRunner(${this.owner}): Mode set to ${mode}`);
  }

  getMode(): TaskQueueMode {
    return this.mode;
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Tasks waiting for the running one to finish
   */
  pendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Run `work` for `message` and resolve with its result once it completes.
   */
  async run<T>(
    message: HalMessage,
    operation: string,
    work: () => T | Promise<T>,
  ): Promise<T> {
    const context: TaskContext = {
      owner: this.owner,
      operation,
      messageId: message.id,
      messageType: message.type,
    };

    if (this.inFlight.has(message.id)) {
      throw new TaskConflictError({
        operation,
        cameraName: this.owner,
        messageId: message.id,
        messageType: message.type,
      });
    }

    this.inFlight.add(message.id);
    try {
      await this.acquire(context);
      return await this.execute(work, context);
    } finally {
      this.inFlight.delete(message.id);
    }
  }

  private async acquire(context: TaskContext): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      cameraLogger.debug("ScopedTaskRunner: Lock acquired", context);
      return;
    }

    if (this.mode === "reject") {
      cameraLogger.warn("ScopedTaskRunner: Rejecting task - controller busy", context);
      throw new ControllerBusyError({
        operation: context.operation,
        cameraName: context.owner,
        messageId: context.messageId,
        messageType: context.messageType,
      });
    }

    cameraLogger.debug("ScopedTaskRunner: Queuing task", {
      ...context,
      position: this.waiters.length + 1,
    });

    // Ownership of the lock is handed over directly by release()
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(context: TaskContext): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.locked = false;
    cameraLogger.debug("ScopedTaskRunner: Lock released", context);
  }

  private async execute<T>(
    work: () => T | Promise<T>,
    context: TaskContext,
  ): Promise<T> {
    const startedAt = Date.now();
    let finished = false;

    // Never runs inline with the caller, even when `work` is synchronous
    const task = new Promise<void>((resolve) => setImmediate(resolve))
      .then(work)
      .finally(() => {
        finished = true;
      });

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      if (this.timeoutMs <= 0) {
        return await task;
      }

      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(
            new TaskTimeoutError(this.timeoutMs, {
              operation: context.operation,
              cameraName: context.owner,
              messageId: context.messageId,
              messageType: context.messageType,
            }),
          );
        }, this.timeoutMs);
      });
      return await Promise.race([task, timeout]);
    } finally {
      clearTimeout(timer);

      cameraLogger.debug("ScopedTaskRunner: Task settled", {
        ...context,
        finished,
        elapsed: formatDuration(Date.now() - startedAt),
      });

      if (finished) {
        this.release(context);
      } else {
        // Timed out: the device call still owns the controller until it returns
        void task
          .catch((error: unknown) => {
            cameraLogger.error("ScopedTaskRunner: Task failed after timeout", {
              ...context,
              error,
            });
          })
          .finally(() => this.release(context));
      }
    }
  }
}
