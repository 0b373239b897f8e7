import { v4 as uuid } from "uuid";
import { systemClock, type CancelScheduled, type Clock } from "./clock.js";
import { createLogger } from "./logger.js";

const log = createLogger("scheduler");

export type TaskHandle = string;

interface ScheduledTask {
  handle: TaskHandle;
  repeating: boolean;
  /** Delay for one-shots, period for repeating tasks. */
  intervalMs: number;
  callback: () => void;
  /** Running time accumulated over completed (paused) segments. */
  elapsedMs: number;
  /** Start of the current running segment, undefined while paused. */
  segmentStartedAt?: number;
  cancelTimer?: CancelScheduled;
}

/**
 * One-shot and repeating callbacks that can be paused as a group.
 *
 * Elapsed running time is tracked per task from the moment it was scheduled,
 * so resuming re-arms a repeating task at `period - elapsed % period` and a
 * one-shot at `delay - elapsed`. The bookkeeping survives any number of
 * pause/resume cycles and is only discarded by `stopAll()` or `cancel()`.
 */
export class Scheduler {
  private readonly tasks = new Map<TaskHandle, ScheduledTask>();
  private paused = false;

  constructor(private readonly clock: Clock = systemClock) {}

  get isPaused(): boolean {
    return this.paused;
  }

  get size(): number {
    return this.tasks.size;
  }

  has(handle: TaskHandle): boolean {
    return this.tasks.has(handle);
  }

  scheduleOnce(delayMs: number, callback: () => void): TaskHandle {
    return this.add(false, Math.max(delayMs, 0), callback);
  }

  scheduleRepeating(periodMs: number, callback: () => void): TaskHandle {
    if (periodMs <= 0) {
      throw new Error("Repeating period must be greater than zero.");
    }
    return this.add(true, periodMs, callback);
  }

  cancel(handle: TaskHandle): boolean {
    const task = this.tasks.get(handle);
    if (!task) {
      return false;
    }
    task.cancelTimer?.();
    this.tasks.delete(handle);
    return true;
  }

  /** Running time of a task since it was scheduled, excluding paused stretches. */
  elapsedMs(handle: TaskHandle): number | undefined {
    const task = this.tasks.get(handle);
    if (!task) {
      return undefined;
    }
    const running = task.segmentStartedAt === undefined ? 0 : this.clock.now() - task.segmentStartedAt;
    return task.elapsedMs + running;
  }

  pauseAll(): void {
    if (this.paused) {
      return;
    }
    this.paused = true;
    const now = this.clock.now();
    for (const task of this.tasks.values()) {
      task.cancelTimer?.();
      task.cancelTimer = undefined;
      if (task.segmentStartedAt !== undefined) {
        task.elapsedMs += now - task.segmentStartedAt;
        task.segmentStartedAt = undefined;
      }
    }
  }

  resumeAll(): void {
    if (!this.paused) {
      return;
    }
    this.paused = false;
    for (const task of this.tasks.values()) {
      this.arm(task, this.remainingWait(task));
    }
  }

  stopAll(): void {
    for (const task of this.tasks.values()) {
      task.cancelTimer?.();
    }
    this.tasks.clear();
    this.paused = false;
  }

  private add(repeating: boolean, intervalMs: number, callback: () => void): TaskHandle {
    const task: ScheduledTask = {
      handle: uuid(),
      repeating,
      intervalMs,
      callback,
      elapsedMs: 0
    };
    this.tasks.set(task.handle, task);
    if (!this.paused) {
      this.arm(task, intervalMs);
    }
    return task.handle;
  }

  private remainingWait(task: ScheduledTask): number {
    if (task.repeating) {
      return task.intervalMs - (task.elapsedMs % task.intervalMs);
    }
    return Math.max(task.intervalMs - task.elapsedMs, 0);
  }

  private arm(task: ScheduledTask, waitMs: number): void {
    task.segmentStartedAt ??= this.clock.now();
    task.cancelTimer = this.clock.schedule(() => this.fire(task), waitMs);
  }

  private fire(task: ScheduledTask): void {
    task.cancelTimer = undefined;
    if (this.tasks.get(task.handle) !== task) {
      return;
    }

    if (task.repeating) {
      // Re-arm before running so a pause issued by the callback sees this task armed.
      task.cancelTimer = this.clock.schedule(() => this.fire(task), task.intervalMs);
    } else {
      this.tasks.delete(task.handle);
    }

    try {
      task.callback();
    } catch (error) {
      log.error(`Scheduled task ${task.handle} failed`, error);
    }
  }
}
