import { TimerSession } from "../../src/session.js";
import { ListStore, type AutomationInput } from "../../src/state/listStore.js";
import { FakeClock } from "./fakeClock.js";
import type { Notifier, SoundId, SoundPlayer } from "../../src/types.js";

export class RecordingSounds implements SoundPlayer {
  readonly played: SoundId[] = [];

  play(soundId: SoundId): void {
    this.played.push(soundId);
  }

  count(soundId: SoundId): number {
    return this.played.filter(played => played === soundId).length;
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];

  show(message: string): void {
    this.messages.push(message);
  }
}

export interface SessionFixtureOptions {
  timers: Array<{ name: string; durationSeconds: number }>;
  counters?: Array<{ name: string; initialValue?: number; minValue?: number; maxValue?: number }>;
  automations?: AutomationInput[];
  autoplay?: boolean;
  clock?: FakeClock;
  sounds?: SoundPlayer;
}

/** A store holding one list, plus a session over it driven by a fake clock. */
export function createSessionFixture(options: SessionFixtureOptions) {
  const clock = options.clock ?? new FakeClock();
  const recorded = new RecordingSounds();
  const notifier = new RecordingNotifier();
  const store = new ListStore();
  const list = store.createList({ name: "Game night" });

  for (const timer of options.timers) {
    store.addTimer(list.id, timer);
  }
  for (const counter of options.counters ?? []) {
    store.addCounter(list.id, counter);
  }
  for (const automation of options.automations ?? []) {
    store.saveAutomation(list.id, automation);
  }

  const session = new TimerSession({
    store,
    listId: list.id,
    clock,
    sounds: options.sounds ?? recorded,
    notifier,
    autoplay: options.autoplay,
    completionSound: null
  });

  const counterValue = (name: string): number[] =>
    store.getCounters(list.id).filter(counter => counter.name === name).map(counter => counter.value);

  return { clock, sounds: recorded, notifier, store, listId: list.id, session, counterValue };
}
