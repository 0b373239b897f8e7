import type { Counter } from "./types.js";

// Mutators return the same record when nothing changed so callers can skip
// persistence and change notifications with an identity check.

export function canIncrement(counter: Counter): boolean {
  return counter.maxValue === undefined || counter.value < counter.maxValue;
}

export function canDecrement(counter: Counter): boolean {
  return counter.minValue === undefined || counter.value > counter.minValue;
}

export function incrementCounter(counter: Counter): Counter {
  if (!canIncrement(counter)) {
    return counter;
  }
  return { ...counter, value: counter.value + 1 };
}

export function decrementCounter(counter: Counter): Counter {
  if (!canDecrement(counter)) {
    return counter;
  }
  return { ...counter, value: counter.value - 1 };
}

/** Restores the initial value without re-clamping; bounds are validated against it on save. */
export function resetCounter(counter: Counter): Counter {
  if (counter.value === counter.initialValue) {
    return counter;
  }
  return { ...counter, value: counter.initialValue };
}

export function clampCounterValue(counter: Pick<Counter, "minValue" | "maxValue">, value: number): number {
  if (counter.minValue !== undefined && value < counter.minValue) {
    return counter.minValue;
  }
  if (counter.maxValue !== undefined && value > counter.maxValue) {
    return counter.maxValue;
  }
  return value;
}

export function adjustCounter(counter: Counter, delta: number): Counter {
  const value = clampCounterValue(counter, counter.value + delta);
  if (value === counter.value) {
    return counter;
  }
  return { ...counter, value };
}
