import { createLogger, type Logger } from "../logger.js";
import type { Scheduler, TaskHandle } from "../scheduler.js";
import type { Action, Automation, Counter, Notifier, SoundPlayer, TimerDefinition, Trigger } from "../types.js";

/** Counter-change notifications nested deeper than this are dropped. */
export const MAX_COUNTER_CASCADE_DEPTH = 8;

export interface AutomationSource {
  getAutomations(listId: string): Automation[];
}

export interface SequenceControls {
  pause(): void;
  skipToNext(): void;
}

export interface CounterWriter {
  /** Adjusts every counter of the list with this name and reports each change back to the engine. */
  adjustCountersNamed(name: string, delta: number): void;
}

export interface AutomationEngineOptions {
  listId: string;
  automations: AutomationSource;
  scheduler: Scheduler;
  sequence: SequenceControls;
  counters: CounterWriter;
  sounds: SoundPlayer;
  notifier: Notifier;
  logger?: Logger;
}

interface ScheduledAutomation {
  handle: TaskHandle;
  automationId: string;
  triggerId: string;
  /** Set for repeating intervals, used to re-derive them on resume. */
  periodMs?: number;
}

/**
 * Evaluates a list's automations against sequencer and counter events.
 *
 * Threshold triggers are edge-detected with armed flags keyed by automation
 * and trigger. Interval and delayed triggers live in the scheduler and belong
 * to the active timer: leaving it in any way cancels them all.
 */
export class AutomationEngine {
  private readonly armed = new Set<string>();
  private readonly scheduled = new Map<string, ScheduledAutomation>();
  private readonly log: Logger;
  private epoch = 0;
  private counterDepth = 0;

  constructor(private readonly options: AutomationEngineOptions) {
    this.log = options.logger ?? createLogger("automations");
  }

  get scheduledCount(): number {
    return this.scheduled.size;
  }

  onTimerStarted(timer: TimerDefinition): void {
    const epoch = this.beginScope();

    this.evaluate("timer start", () => {
      for (const automation of this.enabledAutomations()) {
        for (const trigger of automation.triggers) {
          if (this.epoch !== epoch) {
            return;
          }
          switch (trigger.kind) {
            case "timerStart":
              if (trigger.timerName === timer.name) {
                this.execute(automation);
              }
              break;
            case "anyTimerStart":
              this.execute(automation);
              break;
            case "timerTimeElapsed":
              if (trigger.timerName === timer.name) {
                this.scheduleDelayed(automation, trigger, trigger.offsetSeconds * 1000);
              }
              break;
            case "repeatingInterval":
              this.scheduleInterval(automation, trigger, trigger.periodSeconds * 1000);
              break;
            default:
              break;
          }
        }
      }
    });
  }

  onTimerEnded(timer: TimerDefinition): void {
    const epoch = this.beginScope();

    this.evaluate("timer end", () => {
      for (const automation of this.enabledAutomations()) {
        for (const trigger of automation.triggers) {
          if (this.epoch !== epoch) {
            return;
          }
          if (trigger.kind === "anyTimerEnd" || (trigger.kind === "timerEnd" && trigger.timerName === timer.name)) {
            this.execute(automation);
          }
        }
      }
    });
  }

  onTimerTick(timer: TimerDefinition, remainingSeconds: number): void {
    const epoch = this.epoch;

    this.evaluate("timer tick", () => {
      for (const automation of this.enabledAutomations()) {
        for (const trigger of automation.triggers) {
          if (this.epoch !== epoch) {
            return;
          }
          if (trigger.kind !== "timerTimeRemaining" || trigger.timerName !== timer.name) {
            continue;
          }
          const key = triggerKey(automation, trigger);
          if (remainingSeconds <= trigger.thresholdSeconds) {
            if (!this.armed.has(key)) {
              this.armed.add(key);
              this.execute(automation);
            }
          } else {
            this.armed.delete(key);
          }
        }
      }
    });
  }

  onCounterChanged(counter: Counter, oldValue: number, newValue: number): void {
    if (newValue === oldValue) {
      return;
    }
    if (this.counterDepth >= MAX_COUNTER_CASCADE_DEPTH) {
      this.log.warn(`Counter "${counter.name}" changed too many times in one cascade; skipping automations.`);
      return;
    }

    this.counterDepth += 1;
    try {
      this.evaluate("counter change", () => {
        for (const automation of this.enabledAutomations()) {
          for (const trigger of automation.triggers) {
            if (
              trigger.kind === "counterReachesValue" &&
              trigger.counterName === counter.name &&
              newValue === trigger.targetValue &&
              oldValue !== trigger.targetValue
            ) {
              this.execute(automation);
            }
          }
        }
      });
    } finally {
      this.counterDepth -= 1;
    }
  }

  onPauseRequested(): void {
    this.options.scheduler.pauseAll();
  }

  /**
   * Re-derives the interval automations from the list as it is now, then
   * resumes the scheduler. Intervals that survived the pause keep their phase
   * and newly enabled ones start a fresh period. Handles whose automation no
   * longer matches are dropped.
   */
  onResumeRequested(): void {
    this.evaluate("resume", () => this.reconcileIntervals());
    this.options.scheduler.resumeAll();
  }

  onTimerAbandoned(): void {
    this.beginScope();
  }

  onSequenceStopped(): void {
    this.beginScope();
  }

  private reconcileIntervals(): void {
    const desired = new Map<string, { automation: Automation; trigger: Trigger; periodMs: number }>();
    const liveTriggers = new Set<string>();
    for (const automation of this.enabledAutomations()) {
      for (const trigger of automation.triggers) {
        const key = triggerKey(automation, trigger);
        liveTriggers.add(key);
        if (trigger.kind === "repeatingInterval") {
          desired.set(key, { automation, trigger, periodMs: trigger.periodSeconds * 1000 });
        }
      }
    }

    for (const [key, entry] of this.scheduled) {
      const wanted = desired.get(key);
      const stale =
        !liveTriggers.has(key) || (entry.periodMs !== undefined && (!wanted || wanted.periodMs !== entry.periodMs));
      if (stale) {
        this.options.scheduler.cancel(entry.handle);
        this.scheduled.delete(key);
      }
    }

    for (const [key, { automation, trigger, periodMs }] of desired) {
      if (!this.scheduled.has(key)) {
        this.scheduleInterval(automation, trigger, periodMs);
      }
    }
  }

  private beginScope(): number {
    this.options.scheduler.stopAll();
    this.scheduled.clear();
    this.armed.clear();
    this.epoch += 1;
    return this.epoch;
  }

  private enabledAutomations(): Automation[] {
    return this.options.automations
      .getAutomations(this.options.listId)
      .filter(automation => automation.enabled);
  }

  private scheduleDelayed(automation: Automation, trigger: Trigger, delayMs: number): void {
    const key = triggerKey(automation, trigger);
    this.cancelScheduled(key);
    const handle = this.options.scheduler.scheduleOnce(delayMs, () => {
      this.scheduled.delete(key);
      this.evaluate("delayed automation", () => this.executeById(automation.id));
    });
    this.scheduled.set(key, { handle, automationId: automation.id, triggerId: trigger.id });
  }

  private scheduleInterval(automation: Automation, trigger: Trigger, periodMs: number): void {
    if (periodMs <= 0) {
      return;
    }
    const key = triggerKey(automation, trigger);
    this.cancelScheduled(key);
    const handle = this.options.scheduler.scheduleRepeating(periodMs, () =>
      this.evaluate("interval automation", () => this.executeById(automation.id))
    );
    this.scheduled.set(key, { handle, automationId: automation.id, triggerId: trigger.id, periodMs });
  }

  private cancelScheduled(key: string): void {
    const existing = this.scheduled.get(key);
    if (existing) {
      this.options.scheduler.cancel(existing.handle);
      this.scheduled.delete(key);
    }
  }

  /** Runs one handler's trigger evaluation; a failure is logged and the emitting sequencer carries on. */
  private evaluate(event: string, body: () => void): void {
    try {
      body();
    } catch (error) {
      this.log.error(`Automations failed while handling ${event}`, error);
    }
  }

  private executeById(automationId: string): void {
    const automation = this.enabledAutomations().find(candidate => candidate.id === automationId);
    if (automation) {
      this.execute(automation);
    }
  }

  private execute(automation: Automation): void {
    try {
      for (const action of automation.actions) {
        this.dispatch(action);
      }
    } catch (error) {
      this.log.error(`Automation "${automation.name}" failed`, error);
    }
  }

  private dispatch(action: Action): void {
    switch (action.kind) {
      case "playSound":
        this.options.sounds.play(action.soundId);
        break;
      case "modifyCounter":
        this.options.counters.adjustCountersNamed(action.counterName, action.delta);
        break;
      case "showNotification":
        this.options.notifier.show(action.message);
        break;
      case "pauseActiveTimer":
        this.options.sequence.pause();
        break;
      case "skipToNextTimer":
        this.options.sequence.skipToNext();
        break;
    }
  }
}

function triggerKey(automation: Automation, trigger: Trigger): string {
  return `${automation.id}:${trigger.id}`;
}
