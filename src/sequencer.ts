import { EventEmitter } from "events";
import { systemClock, type CancelScheduled, type Clock } from "./clock.js";
import { createLogger } from "./logger.js";
import type { SoundId, SoundPlayer, TimerDefinition } from "./types.js";

const log = createLogger("sequencer");

export type SequencerState = "idle" | "running" | "paused";

export const DEFAULT_HEARTBEAT_MS = 100;

export interface SequencerSnapshot {
  state: SequencerState;
  currentIndex: number | null;
  currentTimer: TimerDefinition | null;
  remainingSeconds: number;
  autoplay: boolean;
  timers: TimerDefinition[];
}

type SequencerEvents = {
  started: (timer: TimerDefinition, index: number) => void;
  tick: (timer: TimerDefinition, remainingSeconds: number) => void;
  ended: (timer: TimerDefinition) => void;
  paused: (timer: TimerDefinition) => void;
  resumed: (timer: TimerDefinition) => void;
  /** The active timer was left before completing (skip or restart). */
  abandoned: (timer: TimerDefinition) => void;
  stopped: () => void;
};

export interface TimerSequencerOptions {
  timers?: TimerDefinition[];
  clock?: Clock;
  heartbeatMs?: number;
  autoplay?: boolean;
  sounds?: SoundPlayer;
  /** Played after every completed timer; null disables it. */
  completionSound?: SoundId | null;
}

/**
 * Drives one countdown at a time through an ordered list of timers.
 *
 * Listeners run synchronously inside the call that emitted them and may call
 * back into the sequencer (pause, skip). Every transition bumps `run`, and the
 * code after an emit checks it so a listener that redirected the sequence wins.
 */
export class TimerSequencer {
  private readonly emitter = new EventEmitter();
  private readonly clock: Clock;
  private readonly heartbeatMs: number;
  private readonly sounds?: SoundPlayer;
  private readonly completionSound: SoundId | null;
  private timers: TimerDefinition[];
  private state: SequencerState = "idle";
  private currentIndex: number | null = null;
  private remainingMs = 0;
  private heartbeat?: CancelScheduled;
  private run = 0;
  private endedRun: number | null = null;

  autoplay: boolean;

  constructor(options: TimerSequencerOptions = {}) {
    this.timers = sortByOrder(options.timers ?? []);
    this.clock = options.clock ?? systemClock;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.autoplay = options.autoplay ?? true;
    this.sounds = options.sounds;
    this.completionSound = options.completionSound === undefined ? "bell" : options.completionSound;
  }

  on<T extends keyof SequencerEvents>(event: T, listener: SequencerEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  get status(): SequencerState {
    return this.state;
  }

  get currentTimer(): TimerDefinition | null {
    return this.currentIndex === null ? null : this.timers[this.currentIndex] ?? null;
  }

  get remainingSeconds(): number {
    return Math.max(this.remainingMs, 0) / 1000;
  }

  snapshot(): SequencerSnapshot {
    return {
      state: this.state,
      currentIndex: this.currentIndex,
      currentTimer: this.currentTimer,
      remainingSeconds: this.remainingSeconds,
      autoplay: this.autoplay,
      timers: [...this.timers]
    };
  }

  setTimers(timers: TimerDefinition[]): void {
    if (this.state !== "idle") {
      throw new Error("Timers can only be changed while the sequence is stopped.");
    }
    this.timers = sortByOrder(timers);
  }

  start(fromIndex = 0): void {
    if (this.timers.length === 0) {
      return;
    }
    if (this.state === "paused") {
      this.resume();
      return;
    }

    const previous = this.currentTimer;
    if (previous) {
      this.stopHeartbeat();
      this.emit("abandoned", previous);
    }
    this.currentIndex = fromIndex;
    this.startCurrent();
  }

  pause(): void {
    const timer = this.currentTimer;
    if (this.state !== "running" || !timer) {
      return;
    }
    this.stopHeartbeat();
    this.state = "paused";
    this.emit("paused", timer);
  }

  resume(): void {
    const timer = this.currentTimer;
    if (this.state !== "paused" || !timer) {
      return;
    }
    const run = this.run;
    this.state = "running";
    this.emit("resumed", timer);
    if (!this.isCurrentRun(run)) {
      return;
    }

    if (this.remainingMs > 0) {
      this.startHeartbeat();
    } else if (this.endedRun === run) {
      this.advance();
    } else {
      this.complete(timer);
    }
  }

  stop(): void {
    this.stopHeartbeat();
    this.run += 1;
    this.currentIndex = null;
    this.remainingMs = 0;
    this.state = "idle";
    this.emit("stopped");
  }

  skipToNext(): void {
    const index = this.currentIndex;
    const timer = this.currentTimer;
    if (index === null || !timer || index >= this.timers.length - 1) {
      this.stop();
      return;
    }
    this.stopHeartbeat();
    this.emit("abandoned", timer);
    this.currentIndex = index + 1;
    this.startCurrent();
  }

  tick(deltaMs: number = this.heartbeatMs): void {
    const timer = this.currentTimer;
    if (this.state !== "running" || !timer) {
      return;
    }
    const run = this.run;
    this.remainingMs -= deltaMs;
    this.emit("tick", timer, this.remainingMs / 1000);
    if (!this.isCurrentRun(run)) {
      return;
    }
    if (this.remainingMs <= 0) {
      this.complete(timer);
    }
  }

  private startCurrent(): void {
    const index = this.currentIndex;
    const timer = this.currentTimer;
    if (index === null || !timer) {
      this.stop();
      return;
    }

    this.run += 1;
    const run = this.run;
    this.endedRun = null;
    this.remainingMs = Math.round(timer.durationSeconds * 1000);
    this.state = "running";
    this.emit("started", timer, index);
    if (this.isCurrentRun(run)) {
      this.startHeartbeat();
    }
  }

  private complete(timer: TimerDefinition): void {
    const run = this.run;
    this.stopHeartbeat();
    this.endedRun = run;
    this.emit("ended", timer);
    this.playCompletionSound();
    if (this.isCurrentRun(run)) {
      this.advance();
    }
  }

  private playCompletionSound(): void {
    if (!this.completionSound) {
      return;
    }
    try {
      this.sounds?.play(this.completionSound);
    } catch (error) {
      log.error(`Completion sound "${this.completionSound}" failed`, error);
    }
  }

  private advance(): void {
    const index = this.currentIndex;
    if (this.autoplay && index !== null && index < this.timers.length - 1) {
      this.currentIndex = index + 1;
      this.startCurrent();
    } else {
      this.stop();
    }
  }

  private isCurrentRun(run: number): boolean {
    return this.run === run && this.state === "running";
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeat = this.clock.schedule(() => this.onHeartbeat(), this.heartbeatMs);
  }

  private stopHeartbeat(): void {
    this.heartbeat?.();
    this.heartbeat = undefined;
  }

  private onHeartbeat(): void {
    this.heartbeat = undefined;
    this.tick(this.heartbeatMs);
    if (this.state === "running" && !this.heartbeat) {
      this.startHeartbeat();
    }
  }

  private emit<T extends keyof SequencerEvents>(event: T, ...args: Parameters<SequencerEvents[T]>): void {
    this.emitter.emit(event, ...args);
  }
}

function sortByOrder(timers: TimerDefinition[]): TimerDefinition[] {
  return [...timers].sort((a, b) => a.order - b.order);
}
