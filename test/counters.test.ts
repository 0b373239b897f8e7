import { test } from "node:test";
import assert from "node:assert/strict";
import {
  adjustCounter,
  canDecrement,
  canIncrement,
  clampCounterValue,
  decrementCounter,
  incrementCounter,
  resetCounter
} from "../src/counters.js";
import type { Counter } from "../src/types.js";

function counter(overrides: Partial<Counter> = {}): Counter {
  return {
    id: "counter-1",
    name: "Score",
    value: 0,
    initialValue: 0,
    order: 0,
    ...overrides
  };
}

test("increment is a no-op at the maximum", () => {
  const atMax = counter({ value: 3, maxValue: 3 });
  assert.equal(canIncrement(atMax), false);
  assert.equal(incrementCounter(atMax), atMax);
  assert.equal(incrementCounter(counter({ value: 2, maxValue: 3 })).value, 3);
});

test("decrement is a no-op at the minimum", () => {
  const atMin = counter({ value: -1, minValue: -1 });
  assert.equal(canDecrement(atMin), false);
  assert.equal(decrementCounter(atMin), atMin);
  assert.equal(decrementCounter(counter({ value: 0, minValue: -1 })).value, -1);
});

test("unbounded counters always move", () => {
  const free = counter({ value: 100 });
  assert.ok(canIncrement(free));
  assert.ok(canDecrement(free));
  assert.equal(incrementCounter(free).value, 101);
  assert.equal(decrementCounter(free).value, 99);
});

test("reset restores the initial value", () => {
  const moved = counter({ value: 7, initialValue: 2 });
  assert.equal(resetCounter(moved).value, 2);
  const untouched = counter({ value: 2, initialValue: 2 });
  assert.equal(resetCounter(untouched), untouched);
});

test("adjustCounter clamps into the bounds", () => {
  const bounded = counter({ value: 5, minValue: 0, maxValue: 10 });
  assert.equal(adjustCounter(bounded, 20).value, 10);
  assert.equal(adjustCounter(bounded, -20).value, 0);
  assert.equal(adjustCounter(bounded, 3).value, 8);
  assert.equal(clampCounterValue({ minValue: 2 }, -5), 2);
  assert.equal(clampCounterValue({}, -5), -5);
});

test("any sequence of operations keeps a bounded counter inside its range", () => {
  const deltas = [4, -9, 1, 1, 12, -3, -3, -3, -3, 6, 0, -1];
  let current = counter({ value: 1, initialValue: 1, minValue: -2, maxValue: 5 });

  for (const [step, delta] of deltas.entries()) {
    current = step % 3 === 0 ? incrementCounter(current) : step % 3 === 1 ? decrementCounter(current) : current;
    current = adjustCounter(current, delta);
    assert.ok(current.value >= -2 && current.value <= 5, `value ${current.value} escaped at step ${step}`);
  }
});
