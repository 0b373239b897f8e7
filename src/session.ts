import { AutomationEngine, type CounterWriter } from "./automations/engine.js";
import { systemClock, type Clock } from "./clock.js";
import { adjustCounter, decrementCounter, incrementCounter, resetCounter } from "./counters.js";
import { createLogger } from "./logger.js";
import { Scheduler } from "./scheduler.js";
import { TimerSequencer, type SequencerSnapshot } from "./sequencer.js";
import type { ListStore } from "./state/listStore.js";
import type { Counter, Notifier, SoundId, SoundPlayer } from "./types.js";

const log = createLogger("session");

export interface TimerSessionOptions {
  store: ListStore;
  listId: string;
  sounds: SoundPlayer;
  notifier: Notifier;
  clock?: Clock;
  heartbeatMs?: number;
  autoplay?: boolean;
  completionSound?: SoundId | null;
}

export interface SessionSnapshot extends SequencerSnapshot {
  listId: string;
  counters: Counter[];
}

/**
 * Owns the sequencer, scheduler and automation engine for one timer list.
 *
 * Counter values change only through this class, whether the change comes
 * from a user or from an automation, so every change is persisted and
 * reported to the engine with the value it replaced.
 */
export class TimerSession implements CounterWriter {
  readonly listId: string;
  readonly scheduler: Scheduler;
  readonly sequencer: TimerSequencer;
  readonly engine: AutomationEngine;
  private readonly store: ListStore;
  private readonly detach: Array<() => void>;

  constructor(options: TimerSessionOptions) {
    const { store, listId } = options;
    if (!store.findList(listId)) {
      throw new Error("Timer list not found.");
    }
    const clock = options.clock ?? systemClock;

    this.store = store;
    this.listId = listId;
    this.scheduler = new Scheduler(clock);
    this.sequencer = new TimerSequencer({
      timers: store.getTimers(listId),
      clock,
      heartbeatMs: options.heartbeatMs,
      autoplay: options.autoplay,
      sounds: options.sounds,
      completionSound: options.completionSound
    });
    this.engine = new AutomationEngine({
      listId,
      automations: store,
      scheduler: this.scheduler,
      sequence: this.sequencer,
      counters: this,
      sounds: options.sounds,
      notifier: options.notifier
    });

    const { sequencer, engine } = this;
    this.detach = [
      sequencer.on("started", timer => engine.onTimerStarted(timer)),
      sequencer.on("tick", (timer, remaining) => engine.onTimerTick(timer, remaining)),
      sequencer.on("ended", timer => engine.onTimerEnded(timer)),
      sequencer.on("paused", () => engine.onPauseRequested()),
      sequencer.on("resumed", () => engine.onResumeRequested()),
      sequencer.on("abandoned", () => engine.onTimerAbandoned()),
      sequencer.on("stopped", () => engine.onSequenceStopped())
    ];
  }

  snapshot(): SessionSnapshot {
    return {
      ...this.sequencer.snapshot(),
      listId: this.listId,
      counters: this.store.getCounters(this.listId)
    };
  }

  start(fromIndex = 0): void {
    if (this.sequencer.status === "idle") {
      this.store.touchList(this.listId);
    }
    this.sequencer.start(fromIndex);
  }

  pause(): void {
    this.sequencer.pause();
  }

  resume(): void {
    this.sequencer.resume();
  }

  stop(): void {
    this.sequencer.stop();
  }

  skipToNext(): void {
    this.sequencer.skipToNext();
  }

  /** Picks up timer edits made between runs. */
  reloadTimers(): void {
    this.sequencer.setTimers(this.store.getTimers(this.listId));
  }

  incrementCounter(counterId: string): Counter {
    return this.mutateCounter(counterId, incrementCounter);
  }

  decrementCounter(counterId: string): Counter {
    return this.mutateCounter(counterId, decrementCounter);
  }

  resetCounter(counterId: string): Counter {
    return this.mutateCounter(counterId, resetCounter);
  }

  adjustCountersNamed(name: string, delta: number): void {
    const matches = this.store.getCounters(this.listId).filter(counter => counter.name === name);
    if (matches.length === 0) {
      log.debug(`No counter named "${name}" in list ${this.listId}.`);
    }
    for (const counter of matches) {
      this.mutateCounter(counter.id, current => adjustCounter(current, delta));
    }
  }

  dispose(): void {
    this.sequencer.stop();
    for (const off of this.detach.splice(0)) {
      off();
    }
  }

  private mutateCounter(counterId: string, mutate: (counter: Counter) => Counter): Counter {
    const current = this.store.getCounters(this.listId).find(counter => counter.id === counterId);
    if (!current) {
      throw new Error("Counter not found.");
    }
    const next = mutate(current);
    if (next === current) {
      return current;
    }
    const saved = this.store.setCounterValue(this.listId, counterId, next.value);
    this.engine.onCounterChanged(saved, current.value, saved.value);
    return saved;
  }
}
