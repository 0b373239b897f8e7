import { formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import { clampCounterValue } from "../counters.js";
import { createLogger } from "../logger.js";
import type { ActionEffect, Automation, Counter, TimerDefinition, TimerList, TriggerCondition } from "../types.js";

const log = createLogger("list-store");

export const DEFAULT_LIST_COLOR = "#007AFF";
export const DEFAULT_TIMER_NAME = "New Timer";
export const DEFAULT_TIMER_SECONDS = 60;

interface ListStoreOptions {
  initialLists?: TimerList[];
  onChange?: (lists: TimerList[]) => void | Promise<void>;
  now?: () => Date;
}

export interface CounterInput {
  name: string;
  initialValue?: number;
  minValue?: number;
  maxValue?: number;
}

export interface CounterPatch {
  name?: string;
  initialValue?: number;
  /** null removes the bound. */
  minValue?: number | null;
  maxValue?: number | null;
}

export interface AutomationInput {
  name: string;
  enabled?: boolean;
  triggers: TriggerCondition[];
  actions: ActionEffect[];
}

/**
 * In-memory owner of every timer list and its children.
 *
 * Children are nested inside their list, so deleting a list (or an
 * automation) drops everything it owns. Every mutation hands a snapshot to
 * `onChange`; a failed save is logged and kept in `lastPersistError` but never
 * rolls back the in-memory state.
 */
export class ListStore {
  private readonly lists = new Map<string, TimerList>();
  private readonly onChange?: (lists: TimerList[]) => void | Promise<void>;
  private readonly now: () => Date;
  private pendingPersist: Promise<void> = Promise.resolve();
  private persistError: Error | null = null;

  constructor(options: ListStoreOptions = {}) {
    this.onChange = options.onChange;
    this.now = options.now ?? (() => new Date());

    for (const list of options.initialLists ?? []) {
      this.lists.set(list.id, list);
    }
  }

  get lastPersistError(): Error | null {
    return this.persistError;
  }

  async waitForPersistence(): Promise<void> {
    await this.pendingPersist;
  }

  getAll(): TimerList[] {
    return [...this.lists.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  findList(listId: string): TimerList | undefined {
    return this.lists.get(listId);
  }

  getTimers(listId: string): TimerDefinition[] {
    return byOrder(this.lists.get(listId)?.timers ?? []);
  }

  getCounters(listId: string): Counter[] {
    return byOrder(this.lists.get(listId)?.counters ?? []);
  }

  getAutomations(listId: string): Automation[] {
    return byOrder(this.lists.get(listId)?.automations ?? []);
  }

  findTimer(timerId: string): TimerDefinition | undefined {
    return this.findChild(list => list.timers, timerId);
  }

  findCounter(counterId: string): Counter | undefined {
    return this.findChild(list => list.counters, counterId);
  }

  findAutomation(automationId: string): Automation | undefined {
    return this.findChild(list => list.automations, automationId);
  }

  createList(input: { name: string; colorHex?: string }): TimerList {
    const list: TimerList = {
      id: uuid(),
      name: input.name,
      colorHex: input.colorHex ?? DEFAULT_LIST_COLOR,
      createdAt: this.timestamp(),
      timers: [],
      counters: [],
      automations: []
    };
    this.lists.set(list.id, list);
    this.emitChange();
    return list;
  }

  updateList(listId: string, patch: { name?: string; colorHex?: string }): TimerList {
    return this.replaceList(listId, list => ({
      ...list,
      name: patch.name ?? list.name,
      colorHex: patch.colorHex ?? list.colorHex
    }));
  }

  touchList(listId: string): TimerList {
    return this.replaceList(listId, list => ({ ...list, lastUsedAt: this.timestamp() }));
  }

  deleteList(listId: string): TimerList {
    const list = this.requireList(listId);
    this.lists.delete(listId);
    this.emitChange();
    return list;
  }

  addTimer(listId: string, input: { name?: string; durationSeconds?: number } = {}): TimerDefinition {
    const durationSeconds = input.durationSeconds ?? DEFAULT_TIMER_SECONDS;
    assertPositiveDuration(durationSeconds);
    const list = this.requireList(listId);
    const timer: TimerDefinition = {
      id: uuid(),
      name: input.name ?? DEFAULT_TIMER_NAME,
      durationSeconds,
      order: list.timers.length
    };
    this.replaceList(listId, current => ({ ...current, timers: [...byOrder(current.timers), timer] }));
    return timer;
  }

  updateTimer(listId: string, timerId: string, patch: { name?: string; durationSeconds?: number }): TimerDefinition {
    if (patch.durationSeconds !== undefined) {
      assertPositiveDuration(patch.durationSeconds);
    }
    const timer = this.requireChild(this.requireList(listId).timers, timerId, "Timer");
    const updated: TimerDefinition = {
      ...timer,
      name: patch.name ?? timer.name,
      durationSeconds: patch.durationSeconds ?? timer.durationSeconds
    };
    this.replaceList(listId, list => ({
      ...list,
      timers: list.timers.map(candidate => (candidate.id === timerId ? updated : candidate))
    }));
    return updated;
  }

  deleteTimer(listId: string, timerId: string): TimerDefinition {
    const timer = this.requireChild(this.requireList(listId).timers, timerId, "Timer");
    this.replaceList(listId, list => ({
      ...list,
      timers: renumber(byOrder(list.timers).filter(candidate => candidate.id !== timerId))
    }));
    return timer;
  }

  moveTimer(listId: string, fromIndex: number, toIndex: number): TimerDefinition[] {
    const ordered = byOrder(this.requireList(listId).timers);
    if (!Number.isInteger(fromIndex) || fromIndex < 0 || fromIndex >= ordered.length) {
      throw new Error(`No timer at position ${fromIndex}.`);
    }
    const [moved] = ordered.splice(fromIndex, 1);
    const target = Math.min(Math.max(Math.trunc(toIndex), 0), ordered.length);
    ordered.splice(target, 0, moved);
    const timers = renumber(ordered);
    this.replaceList(listId, list => ({ ...list, timers }));
    return timers;
  }

  addCounter(listId: string, input: CounterInput): Counter {
    const list = this.requireList(listId);
    const initialValue = input.initialValue ?? 0;
    const counter: Counter = {
      id: uuid(),
      name: input.name,
      value: initialValue,
      initialValue,
      minValue: input.minValue,
      maxValue: input.maxValue,
      order: list.counters.length
    };
    assertCounterBounds(counter);
    this.replaceList(listId, current => ({ ...current, counters: [...byOrder(current.counters), counter] }));
    return counter;
  }

  updateCounter(listId: string, counterId: string, patch: CounterPatch): Counter {
    const counter = this.requireChild(this.requireList(listId).counters, counterId, "Counter");
    const next: Counter = {
      ...counter,
      name: patch.name ?? counter.name,
      initialValue: patch.initialValue ?? counter.initialValue,
      minValue: patch.minValue === null ? undefined : patch.minValue ?? counter.minValue,
      maxValue: patch.maxValue === null ? undefined : patch.maxValue ?? counter.maxValue
    };
    assertCounterBounds(next);
    const updated = { ...next, value: clampCounterValue(next, next.value) };
    this.replaceCounter(listId, updated);
    return updated;
  }

  /** Writes a new value, clamped into the counter's bounds. */
  setCounterValue(listId: string, counterId: string, value: number): Counter {
    const counter = this.requireChild(this.requireList(listId).counters, counterId, "Counter");
    const updated = { ...counter, value: clampCounterValue(counter, value) };
    this.replaceCounter(listId, updated);
    return updated;
  }

  deleteCounter(listId: string, counterId: string): Counter {
    const counter = this.requireChild(this.requireList(listId).counters, counterId, "Counter");
    this.replaceList(listId, list => ({
      ...list,
      counters: renumber(byOrder(list.counters).filter(candidate => candidate.id !== counterId))
    }));
    return counter;
  }

  /**
   * Creates an automation, or replaces an existing one. Editing keeps the
   * automation's id, order and creation time but discards its triggers and
   * actions and creates new ones.
   */
  saveAutomation(listId: string, input: AutomationInput, automationId?: string): Automation {
    const list = this.requireList(listId);
    const existing = automationId ? this.requireChild(list.automations, automationId, "Automation") : undefined;
    const automation: Automation = {
      id: existing?.id ?? uuid(),
      name: input.name,
      enabled: input.enabled ?? existing?.enabled ?? true,
      order: existing?.order ?? list.automations.length,
      createdAt: existing?.createdAt ?? this.timestamp(),
      triggers: input.triggers.map(trigger => ({ ...trigger, id: uuid() })),
      actions: input.actions.map(action => ({ ...action, id: uuid() }))
    };

    this.replaceList(listId, current => ({
      ...current,
      automations: existing
        ? current.automations.map(candidate => (candidate.id === automation.id ? automation : candidate))
        : [...current.automations, automation]
    }));
    return automation;
  }

  setAutomationEnabled(listId: string, automationId: string, enabled: boolean): Automation {
    const automation = this.requireChild(this.requireList(listId).automations, automationId, "Automation");
    const updated = { ...automation, enabled };
    this.replaceList(listId, list => ({
      ...list,
      automations: list.automations.map(candidate => (candidate.id === automationId ? updated : candidate))
    }));
    return updated;
  }

  deleteAutomation(listId: string, automationId: string): Automation {
    const automation = this.requireChild(this.requireList(listId).automations, automationId, "Automation");
    this.replaceList(listId, list => ({
      ...list,
      automations: renumber(byOrder(list.automations).filter(candidate => candidate.id !== automationId))
    }));
    return automation;
  }

  private replaceCounter(listId: string, updated: Counter): void {
    this.replaceList(listId, list => ({
      ...list,
      counters: list.counters.map(candidate => (candidate.id === updated.id ? updated : candidate))
    }));
  }

  private replaceList(listId: string, update: (list: TimerList) => TimerList): TimerList {
    const updated = update(this.requireList(listId));
    this.lists.set(listId, updated);
    this.emitChange();
    return updated;
  }

  private requireList(listId: string): TimerList {
    const list = this.lists.get(listId);
    if (!list) {
      throw new Error("Timer list not found.");
    }
    return list;
  }

  private requireChild<T extends { id: string }>(items: T[], id: string, label: string): T {
    const item = items.find(candidate => candidate.id === id);
    if (!item) {
      throw new Error(`${label} not found.`);
    }
    return item;
  }

  private findChild<T extends { id: string }>(select: (list: TimerList) => T[], id: string): T | undefined {
    for (const list of this.lists.values()) {
      const match = select(list).find(candidate => candidate.id === id);
      if (match) {
        return match;
      }
    }
    return undefined;
  }

  private timestamp(): string {
    return formatISO(this.now());
  }

  private emitChange(): void {
    const onChange = this.onChange;
    if (!onChange) {
      return;
    }

    const snapshot = this.getAll();
    this.pendingPersist = this.pendingPersist
      .then(() => onChange(snapshot))
      .then(
        () => {
          this.persistError = null;
        },
        error => {
          this.persistError = error instanceof Error ? error : new Error(String(error));
          log.error("Failed to persist timer lists", this.persistError);
        }
      );
  }
}

export function assertCounterBounds(counter: Pick<Counter, "initialValue" | "minValue" | "maxValue">): void {
  const { initialValue, minValue, maxValue } = counter;
  if (minValue !== undefined && maxValue !== undefined && minValue > maxValue) {
    throw new Error("Counter minimum must not exceed its maximum.");
  }
  if ((minValue !== undefined && initialValue < minValue) || (maxValue !== undefined && initialValue > maxValue)) {
    throw new Error("Counter initial value must lie within its bounds.");
  }
}

function assertPositiveDuration(durationSeconds: number): void {
  if (!(durationSeconds > 0)) {
    throw new Error("Duration must be greater than zero seconds.");
  }
}

function byOrder<T extends { order: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => a.order - b.order);
}

function renumber<T extends { order: number }>(items: T[]): T[] {
  return items.map((item, index) => (item.order === index ? item : { ...item, order: index }));
}
