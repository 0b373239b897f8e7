import { test } from "node:test";
import assert from "node:assert/strict";
import { TimerSequencer } from "../src/sequencer.js";
import type { TimerDefinition } from "../src/types.js";
import { FakeClock } from "./helpers/fakeClock.js";
import { RecordingSounds } from "./helpers/fixtures.js";

function timer(name: string, durationSeconds: number, order: number): TimerDefinition {
  return { id: `timer-${name}`, name, durationSeconds, order };
}

function setup(options: { autoplay?: boolean; timers?: TimerDefinition[] } = {}) {
  const clock = new FakeClock();
  const sounds = new RecordingSounds();
  const sequencer = new TimerSequencer({
    clock,
    sounds,
    autoplay: options.autoplay,
    timers: options.timers ?? [timer("A", 1, 0), timer("B", 2, 1), timer("C", 1, 2)]
  });
  const events: string[] = [];
  sequencer.on("started", (started, index) => events.push(`started:${started.name}:${index}`));
  sequencer.on("ended", ended => events.push(`ended:${ended.name}`));
  sequencer.on("paused", paused => events.push(`paused:${paused.name}`));
  sequencer.on("resumed", resumed => events.push(`resumed:${resumed.name}`));
  sequencer.on("abandoned", abandoned => events.push(`abandoned:${abandoned.name}`));
  sequencer.on("stopped", () => events.push("stopped"));
  return { clock, sounds, sequencer, events };
}

test("timers run in order and the sequence ends idle", () => {
  const { clock, sounds, sequencer, events } = setup();

  sequencer.start();
  assert.equal(sequencer.status, "running");
  clock.advance(4000);

  assert.deepEqual(events, [
    "started:A:0",
    "ended:A",
    "started:B:1",
    "ended:B",
    "started:C:2",
    "ended:C",
    "stopped"
  ]);
  assert.equal(sequencer.status, "idle");
  assert.equal(sequencer.currentTimer, null);
  assert.deepEqual(sounds.played, ["bell", "bell", "bell"]);
});

test("timers are sequenced by order, not by array position", () => {
  const { clock, sequencer, events } = setup({ timers: [timer("Second", 1, 1), timer("First", 1, 0)] });

  sequencer.start();
  clock.advance(2000);
  assert.deepEqual(events.filter(event => event.startsWith("started")), ["started:First:0", "started:Second:1"]);
});

test("ticks report the remaining seconds every heartbeat", () => {
  const { clock, sequencer } = setup({ timers: [timer("A", 0.5, 0)] });
  const ticks: number[] = [];
  sequencer.on("tick", (_timer, remaining) => ticks.push(remaining));

  sequencer.start();
  clock.advance(500);
  assert.deepEqual(ticks, [0.4, 0.3, 0.2, 0.1, 0]);
});

test("without autoplay the sequence stops after the first timer", () => {
  const { clock, sequencer, events } = setup({ autoplay: false });

  sequencer.start();
  clock.advance(5000);
  assert.deepEqual(events, ["started:A:0", "ended:A", "stopped"]);
});

test("pause keeps the remaining time and resume continues from it", () => {
  const { clock, sequencer, events } = setup();

  sequencer.start(1);
  clock.advance(500);
  sequencer.pause();
  assert.equal(sequencer.status, "paused");
  assert.equal(sequencer.remainingSeconds, 1.5);

  clock.advance(10_000);
  assert.equal(sequencer.remainingSeconds, 1.5);

  sequencer.resume();
  clock.advance(1400);
  assert.equal(sequencer.currentTimer?.name, "B");
  clock.advance(100);
  assert.equal(sequencer.currentTimer?.name, "C");
  assert.deepEqual(events.slice(0, 4), ["started:B:1", "paused:B", "resumed:B", "ended:B"]);
});

test("start while paused resumes instead of restarting", () => {
  const { clock, sequencer, events } = setup();

  sequencer.start(1);
  clock.advance(700);
  sequencer.pause();
  sequencer.start(0);

  assert.equal(sequencer.status, "running");
  assert.equal(sequencer.currentTimer?.name, "B");
  assert.equal(sequencer.remainingSeconds, 1.3);
  assert.deepEqual(events, ["started:B:1", "paused:B", "resumed:B"]);
});

test("resume and pause are ignored in the wrong state", () => {
  const { sequencer, events } = setup();

  sequencer.resume();
  sequencer.pause();
  assert.equal(sequencer.status, "idle");
  assert.deepEqual(events, []);
});

test("skipToNext on the last timer goes straight to idle", () => {
  const { sequencer, events } = setup();

  sequencer.start(2);
  sequencer.skipToNext();
  assert.equal(sequencer.status, "idle");
  assert.deepEqual(events, ["started:C:2", "stopped"]);
});

test("skipToNext abandons the current timer and starts the next", () => {
  const { clock, sounds, sequencer, events } = setup();

  sequencer.start();
  clock.advance(300);
  sequencer.skipToNext();
  assert.equal(sequencer.currentTimer?.name, "B");
  assert.equal(sequencer.remainingSeconds, 2);
  assert.deepEqual(events, ["started:A:0", "abandoned:A", "started:B:1"]);
  assert.deepEqual(sounds.played, []);
});

test("skipToNext while paused starts the next timer running", () => {
  const { sequencer } = setup();

  sequencer.start();
  sequencer.pause();
  sequencer.skipToNext();
  assert.equal(sequencer.status, "running");
  assert.equal(sequencer.currentTimer?.name, "B");
});

test("stop clears the index and time from any state", () => {
  const { clock, sequencer } = setup();

  sequencer.start();
  clock.advance(200);
  sequencer.pause();
  sequencer.stop();
  assert.deepEqual(
    { state: sequencer.status, index: sequencer.snapshot().currentIndex, remaining: sequencer.remainingSeconds },
    { state: "idle", index: null, remaining: 0 }
  );
  assert.equal(clock.pendingCount, 0);
});

test("a listener that pauses on tick halts the countdown", () => {
  const { clock, sequencer } = setup();
  sequencer.on("tick", (_timer, remaining) => {
    if (remaining <= 0.5) {
      sequencer.pause();
    }
  });

  sequencer.start();
  clock.advance(5000);
  assert.equal(sequencer.status, "paused");
  assert.equal(sequencer.remainingSeconds, 0.5);
});

test("a listener that skips on start is not overridden", () => {
  const { clock, sequencer, events } = setup();
  sequencer.on("started", started => {
    if (started.name === "A") {
      sequencer.skipToNext();
    }
  });

  sequencer.start();
  clock.advance(100);
  assert.equal(sequencer.currentTimer?.name, "B");
  assert.equal(sequencer.remainingSeconds, 1.9);
  assert.equal(clock.pendingCount, 1);
  assert.deepEqual(events, ["started:A:0", "abandoned:A", "started:B:1"]);
});

test("pausing inside ended holds the sequence until resumed", () => {
  const { clock, sequencer, events } = setup();
  sequencer.on("ended", ended => {
    if (ended.name === "A") {
      sequencer.pause();
    }
  });

  sequencer.start();
  clock.advance(3000);
  assert.equal(sequencer.status, "paused");
  assert.equal(sequencer.currentTimer?.name, "A");

  sequencer.resume();
  assert.equal(sequencer.currentTimer?.name, "B");
  assert.deepEqual(events, ["started:A:0", "ended:A", "paused:A", "resumed:A", "started:B:1"]);
});

test("setTimers is refused while a sequence is active", () => {
  const { sequencer } = setup();

  sequencer.start();
  assert.throws(() => sequencer.setTimers([]), /only be changed while the sequence is stopped/);
  sequencer.stop();
  sequencer.setTimers([timer("Solo", 3, 0)]);
  assert.equal(sequencer.snapshot().timers.length, 1);
});

test("start on an empty sequence does nothing", () => {
  const { sequencer, events } = setup({ timers: [] });

  sequencer.start();
  assert.equal(sequencer.status, "idle");
  assert.deepEqual(events, []);
});

test("a failing completion sound does not stop the sequence", () => {
  const clock = new FakeClock();
  const sequencer = new TimerSequencer({
    clock,
    sounds: {
      play() {
        throw new Error("no audio device");
      }
    },
    timers: [timer("A", 1, 0), timer("B", 1, 1)]
  });
  const started: string[] = [];
  sequencer.on("started", current => started.push(current.name));

  sequencer.start();
  clock.advance(3000);

  assert.deepEqual(started, ["A", "B"]);
  assert.equal(sequencer.status, "idle");
});
