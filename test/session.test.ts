import { test } from "node:test";
import assert from "node:assert/strict";
import type { SoundId } from "../src/types.js";
import { FakeClock } from "./helpers/fakeClock.js";
import { createSessionFixture } from "./helpers/fixtures.js";

test("a list plays through with automations firing at each timer end", () => {
  const clock = new FakeClock();
  const heard: Array<[SoundId, number]> = [];
  const { session } = createSessionFixture({
    clock,
    sounds: { play: soundId => heard.push([soundId, clock.now()]) },
    timers: [
      { name: "A", durationSeconds: 10 },
      { name: "B", durationSeconds: 5 },
      { name: "C", durationSeconds: 5 }
    ],
    automations: [
      { name: "Ding", triggers: [{ kind: "anyTimerEnd" }], actions: [{ kind: "playSound", soundId: "chime" }] }
    ]
  });

  session.start();
  clock.advance(25_000);

  assert.deepEqual(heard, [
    ["chime", 10_000],
    ["chime", 15_000],
    ["chime", 20_000]
  ]);
  assert.equal(session.sequencer.status, "idle");
  assert.equal(session.sequencer.currentTimer, null);
});

test("skipping the last timer stops the sequence", () => {
  const { clock, session } = createSessionFixture({
    timers: [
      { name: "A", durationSeconds: 5 },
      { name: "B", durationSeconds: 5 }
    ]
  });
  const started: string[] = [];
  session.sequencer.on("started", timer => started.push(timer.name));

  session.start();
  session.skipToNext();
  session.skipToNext();
  clock.advance(20_000);

  assert.deepEqual(started, ["A", "B"]);
  assert.equal(session.sequencer.status, "idle");
});

test("starting a sequence records when the list was last used", () => {
  const { session, store, listId } = createSessionFixture({
    timers: [{ name: "A", durationSeconds: 5 }]
  });
  assert.equal(store.findList(listId)?.lastUsedAt, undefined);

  session.start();

  assert.equal(typeof store.findList(listId)?.lastUsedAt, "string");
});

test("changing an unknown counter fails", () => {
  const { session } = createSessionFixture({ timers: [{ name: "A", durationSeconds: 5 }] });

  assert.throws(() => session.incrementCounter("missing"), /Counter not found\./);
});

test("timer edits are picked up between runs only", () => {
  const { session, store, listId } = createSessionFixture({
    timers: [{ name: "A", durationSeconds: 5 }]
  });
  const [timer] = store.getTimers(listId);

  store.updateTimer(listId, timer.id, { durationSeconds: 2 });
  session.reloadTimers();
  session.start();
  assert.equal(session.sequencer.remainingSeconds, 2);

  assert.throws(() => session.reloadTimers(), /Timers can only be changed while the sequence is stopped\./);
});

test("a disposed session no longer runs automations", () => {
  const { notifier, session } = createSessionFixture({
    timers: [{ name: "A", durationSeconds: 5 }],
    automations: [
      { name: "Go", triggers: [{ kind: "anyTimerStart" }], actions: [{ kind: "showNotification", message: "Go" }] }
    ]
  });

  session.dispose();
  session.sequencer.start();

  assert.deepEqual(notifier.messages, []);
});

test("snapshots carry the current counter values", () => {
  const { session, store, listId } = createSessionFixture({
    timers: [{ name: "A", durationSeconds: 5 }],
    counters: [{ name: "Score", initialValue: 2 }]
  });
  const [score] = store.getCounters(listId);

  session.incrementCounter(score.id);
  const snapshot = session.snapshot();

  assert.equal(snapshot.listId, listId);
  assert.equal(snapshot.state, "idle");
  assert.deepEqual(
    snapshot.counters.map(counter => [counter.name, counter.value]),
    [["Score", 3]]
  );
});

test("resetting a counter reports the change to automations", () => {
  const { notifier, session, store, listId } = createSessionFixture({
    timers: [{ name: "A", durationSeconds: 5 }],
    counters: [{ name: "Score" }],
    automations: [
      {
        name: "Back to zero",
        triggers: [{ kind: "counterReachesValue", counterName: "Score", targetValue: 0 }],
        actions: [{ kind: "showNotification", message: "Reset" }]
      }
    ]
  });
  const [score] = store.getCounters(listId);

  session.resetCounter(score.id);
  assert.deepEqual(notifier.messages, []);

  session.incrementCounter(score.id);
  session.resetCounter(score.id);
  assert.deepEqual(notifier.messages, ["Reset"]);
});
