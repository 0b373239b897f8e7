import { test } from "node:test";
import assert from "node:assert/strict";
import { describeAutomation, formatClock } from "../src/automations/describe.js";
import { parseDurationSeconds } from "../src/tools/duration.js";
import { buildListStructuredContent } from "../src/ui/builders.js";
import { createSessionFixture } from "./helpers/fixtures.js";

test("automations are summarised as triggers then actions", () => {
  const summary = describeAutomation({
    triggers: [
      { id: "t1", kind: "timerTimeRemaining", timerName: "Round", thresholdSeconds: 10 },
      { id: "t2", kind: "anyTimerEnd" }
    ],
    actions: [
      { id: "a1", kind: "playSound", soundId: "chime" },
      { id: "a2", kind: "modifyCounter", counterName: "Lives", delta: -1 },
      { id: "a3", kind: "modifyCounter", counterName: "Score", delta: 2 }
    ]
  });

  assert.equal(summary, "10s before Round ends or Any Timer Ends → Play Sound (Chime), Lives -1, Score +2");
});

test("clock formatting floors to whole seconds", () => {
  assert.equal(formatClock(0), "00:00");
  assert.equal(formatClock(59.9), "00:59");
  assert.equal(formatClock(754), "12:34");
  assert.equal(formatClock(6000), "100:00");
  assert.equal(formatClock(-5), "00:00");
});

test("durations parse from numbers, clock strings and units", () => {
  assert.equal(parseDurationSeconds("90"), 90);
  assert.equal(parseDurationSeconds("1:30"), 90);
  assert.equal(parseDurationSeconds("1m 30s"), 90);
  assert.equal(parseDurationSeconds("2 minutes and 5 seconds"), 125);
  assert.equal(parseDurationSeconds("1.5 hours"), 5400);
  assert.throws(() => parseDurationSeconds("0"), /Duration must be greater than zero seconds\./);
  assert.throws(() => parseDurationSeconds("soon"), /Could not parse duration "soon"\./);
});

test("an idle list renders a start card and idle rows", () => {
  const { store, listId } = createSessionFixture({
    timers: [
      { name: "Warm up", durationSeconds: 60 },
      { name: "Sprint", durationSeconds: 30 }
    ],
    counters: [{ name: "Laps", minValue: 0 }],
    automations: [
      { name: "Lap", triggers: [{ kind: "timerEnd", timerName: "Sprint" }], actions: [{ kind: "modifyCounter", counterName: "Laps", delta: 1 }] }
    ]
  });
  const list = store.findList(listId);
  assert.ok(list);

  const content = buildListStructuredContent({ list });

  assert.deepEqual(content.inlineCard, {
    surface: "inline_card",
    heading: "Game night",
    body: "2 timers ready.",
    cta: { label: "Start", action: "start_session", listId },
    accessibilityLabel: "Timer list Game night, not running."
  });
  assert.deepEqual(
    content.inspect?.items.map(row => [row.title, row.subtitle, row.status]),
    [
      ["Warm up", "01:00", "idle"],
      ["Sprint", "00:30", "idle"]
    ]
  );
  assert.deepEqual(
    content.counters?.map(counter => [counter.name, counter.value, counter.bounds]),
    [["Laps", 0, "0..∞"]]
  );
  assert.equal(content.automations?.[0].summary, "Timer Ends: Sprint → Laps +1");
  assert.equal(content.activity, undefined);
});

test("a running list renders progress and recent activity", () => {
  const { clock, session, store, listId } = createSessionFixture({
    timers: [
      { name: "Warm up", durationSeconds: 60 },
      { name: "Sprint", durationSeconds: 30 }
    ]
  });
  const list = store.findList(listId);
  assert.ok(list);

  session.start();
  clock.advance(1500);
  const running = buildListStructuredContent({
    list,
    session: session.snapshot(),
    activity: [
      { type: "sound", soundId: "bell", at: "2024-01-01T09:00:00Z" },
      { type: "notification", message: "Hydrate", at: "2024-01-01T09:00:01Z" }
    ]
  });

  assert.equal(running.inlineCard.heading, "Warm up");
  assert.equal(running.inlineCard.body, "00:59 remaining");
  assert.equal(running.inlineCard.badge, "1/2");
  assert.equal(running.inlineCard.cta?.action, "pause_session");
  assert.deepEqual(
    running.inspect?.items.map(row => row.status),
    ["active", "queued"]
  );
  assert.deepEqual(running.activity, ["Played Bell", "Notification: Hydrate"]);

  session.pause();
  const paused = buildListStructuredContent({ list, session: session.snapshot() });
  assert.equal(paused.inlineCard.body, "Paused with 00:59 left");
  assert.equal(paused.inlineCard.cta?.action, "resume_session");
});
