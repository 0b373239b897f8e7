import { test } from "node:test";
import assert from "node:assert/strict";
import { ActivityFeed, type ActivityEntry } from "../src/activity.js";

test("the feed keeps only its most recent entries", () => {
  const feed = new ActivityFeed(2);

  feed.play("bell");
  feed.show("first");
  feed.show("second");

  assert.deepEqual(
    feed.recent().map(entry => (entry.type === "sound" ? entry.soundId : entry.message)),
    ["first", "second"]
  );
  assert.equal(feed.recent(1).length, 1);
});

test("subscribers hear entries until they unsubscribe", () => {
  const feed = new ActivityFeed();
  const heard: ActivityEntry["type"][] = [];
  const unsubscribe = feed.subscribe(entry => heard.push(entry.type));

  feed.play("chime");
  unsubscribe();
  feed.show("ignored");

  assert.deepEqual(heard, ["sound"]);
});
