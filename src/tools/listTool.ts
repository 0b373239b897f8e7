import { z } from "zod";
import { actionCounterName, triggerCounterName, triggerTimerName } from "../automations/describe.js";
import type { Clock } from "../clock.js";
import { decrementCounter, incrementCounter, resetCounter } from "../counters.js";
import { TimerSession, type SessionSnapshot } from "../session.js";
import { actionSchema, nameSchema, triggerSchema } from "../state/listSchema.js";
import type { ListStore } from "../state/listStore.js";
import type { Automation, Counter, Notifier, SoundPlayer, TimerDefinition, TimerList } from "../types.js";
import { parseDurationSeconds } from "./duration.js";

const MAX_DURATION_SECONDS = 24 * 3600;

const durationSchema = z
  .preprocess(value => (typeof value === "string" ? parseDurationSeconds(value) : value), z.number().positive().max(MAX_DURATION_SECONDS))
  .describe('Duration in seconds, or a string like "5 minutes" or "1:30".');

export const automationInput = z.object({
  listId: z.string().uuid(),
  automationId: z.string().uuid().optional(),
  name: nameSchema,
  enabled: z.boolean().optional(),
  triggers: z.array(triggerSchema).min(1),
  actions: z.array(actionSchema).min(1)
});

export const timerInput = z.object({
  listId: z.string().uuid(),
  name: nameSchema.optional(),
  duration: durationSchema.optional()
});

export const timerPatchInput = z
  .object({
    listId: z.string().uuid(),
    timerId: z.string().uuid(),
    name: nameSchema.optional(),
    duration: durationSchema.optional()
  })
  .refine(value => value.name !== undefined || value.duration !== undefined, {
    message: "Provide a new name or duration."
  });

export const counterInput = z
  .object({
    listId: z.string().uuid(),
    name: nameSchema,
    initialValue: z.number().int().default(0),
    minValue: z.number().int().optional(),
    maxValue: z.number().int().optional()
  })
  .refine(value => value.minValue === undefined || value.maxValue === undefined || value.minValue <= value.maxValue, {
    message: "Minimum must not exceed maximum."
  })
  .refine(
    value =>
      (value.minValue === undefined || value.initialValue >= value.minValue) &&
      (value.maxValue === undefined || value.initialValue <= value.maxValue),
    { message: "Initial value must lie within the bounds." }
  );

export const counterPatchInput = z.object({
  listId: z.string().uuid(),
  counterId: z.string().uuid(),
  name: nameSchema.optional(),
  initialValue: z.number().int().optional(),
  minValue: z.number().int().nullable().optional(),
  maxValue: z.number().int().nullable().optional()
});

export const listInput = z.object({
  name: nameSchema,
  colorHex: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/)
    .optional()
});

export type SessionCommand = "start" | "pause" | "resume" | "stop" | "skip" | "status";

export type CounterChange = "increment" | "decrement" | "reset";

const COUNTER_CHANGES: Record<CounterChange, (counter: Counter) => Counter> = {
  increment: incrementCounter,
  decrement: decrementCounter,
  reset: resetCounter
};

export interface SessionCollaborators {
  sounds: SoundPlayer;
  notifier: Notifier;
  clock?: Clock;
  heartbeatMs?: number;
  autoplay?: boolean;
}

/**
 * Validated edit and control operations over the list store.
 *
 * At most one session runs at a time; starting another list replaces it.
 */
export class ListToolset {
  private session?: TimerSession;

  constructor(
    private readonly store: ListStore,
    private readonly collaborators: SessionCollaborators
  ) {}

  get activeSession(): TimerSession | undefined {
    return this.session;
  }

  listLists(): TimerList[] {
    return this.store.getAll();
  }

  async createList(input: z.input<typeof listInput>): Promise<TimerList> {
    const parsed = listInput.parse(input);
    const list = this.store.createList(parsed);
    await this.store.waitForPersistence();
    return list;
  }

  async renameList(listId: string, input: z.input<typeof listInput>): Promise<TimerList> {
    const parsed = listInput.parse(input);
    const list = this.store.updateList(listId, parsed);
    await this.store.waitForPersistence();
    return list;
  }

  async deleteList(listId: string): Promise<TimerList> {
    if (this.session?.listId === listId) {
      this.closeSession();
    }
    const list = this.store.deleteList(listId);
    await this.store.waitForPersistence();
    return list;
  }

  async addTimer(input: z.input<typeof timerInput>): Promise<TimerDefinition> {
    const parsed = timerInput.parse(input);
    const timer = this.store.addTimer(parsed.listId, { name: parsed.name, durationSeconds: parsed.duration });
    await this.store.waitForPersistence();
    return timer;
  }

  async updateTimer(input: z.input<typeof timerPatchInput>): Promise<TimerDefinition> {
    const parsed = timerPatchInput.parse(input);
    const timer = this.store.updateTimer(parsed.listId, parsed.timerId, {
      name: parsed.name,
      durationSeconds: parsed.duration
    });
    await this.store.waitForPersistence();
    return timer;
  }

  async removeTimer(listId: string, timerId: string): Promise<TimerDefinition> {
    const timer = this.store.deleteTimer(listId, timerId);
    await this.store.waitForPersistence();
    return timer;
  }

  async moveTimer(listId: string, fromIndex: number, toIndex: number): Promise<TimerDefinition[]> {
    const timers = this.store.moveTimer(listId, fromIndex, toIndex);
    await this.store.waitForPersistence();
    return timers;
  }

  async addCounter(input: z.input<typeof counterInput>): Promise<Counter> {
    const { listId, ...counter } = counterInput.parse(input);
    const created = this.store.addCounter(listId, counter);
    await this.store.waitForPersistence();
    return created;
  }

  async updateCounter(input: z.input<typeof counterPatchInput>): Promise<Counter> {
    const { listId, counterId, ...patch } = counterPatchInput.parse(input);
    const updated = this.store.updateCounter(listId, counterId, patch);
    await this.store.waitForPersistence();
    return updated;
  }

  async removeCounter(listId: string, counterId: string): Promise<Counter> {
    const counter = this.store.deleteCounter(listId, counterId);
    await this.store.waitForPersistence();
    return counter;
  }

  /**
   * Changes a counter through the active session when it belongs to this list
   * (or when none is open), so automations see the change. While another
   * list's session runs, the new value is written to the store directly.
   */
  async changeCounter(listId: string, counterId: string, change: CounterChange): Promise<Counter> {
    const session = !this.session || this.session.listId === listId ? this.sessionFor(listId) : undefined;
    const counter = session
      ? change === "increment"
        ? session.incrementCounter(counterId)
        : change === "decrement"
          ? session.decrementCounter(counterId)
          : session.resetCounter(counterId)
      : this.changeStoredCounter(listId, counterId, change);
    await this.store.waitForPersistence();
    return counter;
  }

  async saveAutomation(input: z.input<typeof automationInput>): Promise<Automation> {
    const { listId, automationId, ...automation } = automationInput.parse(input);
    this.assertReferencesExist(listId, automation);
    const saved = this.store.saveAutomation(listId, automation, automationId);
    await this.store.waitForPersistence();
    return saved;
  }

  async setAutomationEnabled(listId: string, automationId: string, enabled: boolean): Promise<Automation> {
    const automation = this.store.setAutomationEnabled(listId, automationId, enabled);
    await this.store.waitForPersistence();
    return automation;
  }

  async removeAutomation(listId: string, automationId: string): Promise<Automation> {
    const automation = this.store.deleteAutomation(listId, automationId);
    await this.store.waitForPersistence();
    return automation;
  }

  /**
   * Only `start` opens a session for another list (replacing the current
   * one). Other commands on a list without a session leave the running
   * session alone and report the list as idle.
   */
  async controlSession(listId: string, command: SessionCommand, fromIndex = 0): Promise<SessionSnapshot> {
    if (command === "start") {
      const session = this.sessionFor(listId);
      if (session.sequencer.status === "idle") {
        session.reloadTimers();
      }
      session.start(fromIndex);
      await this.store.waitForPersistence();
      return session.snapshot();
    }

    const session = this.session?.listId === listId ? this.session : undefined;
    if (!session) {
      return this.idleSnapshot(listId);
    }
    switch (command) {
      case "pause":
        session.pause();
        break;
      case "resume":
        session.resume();
        break;
      case "stop":
        session.stop();
        break;
      case "skip":
        session.skipToNext();
        break;
      case "status":
        break;
    }
    await this.store.waitForPersistence();
    return session.snapshot();
  }

  closeSession(): void {
    this.session?.dispose();
    this.session = undefined;
  }

  private sessionFor(listId: string): TimerSession {
    if (this.session?.listId === listId) {
      return this.session;
    }
    if (!this.store.findList(listId)) {
      throw new Error("Timer list not found.");
    }
    this.closeSession();
    this.session = new TimerSession({ store: this.store, listId, ...this.collaborators });
    return this.session;
  }

  private idleSnapshot(listId: string): SessionSnapshot {
    if (!this.store.findList(listId)) {
      throw new Error("Timer list not found.");
    }
    return {
      state: "idle",
      currentIndex: null,
      currentTimer: null,
      remainingSeconds: 0,
      autoplay: this.collaborators.autoplay ?? true,
      timers: this.store.getTimers(listId),
      listId,
      counters: this.store.getCounters(listId)
    };
  }

  private changeStoredCounter(listId: string, counterId: string, change: CounterChange): Counter {
    if (!this.store.findList(listId)) {
      throw new Error("Timer list not found.");
    }
    const current = this.store.getCounters(listId).find(counter => counter.id === counterId);
    if (!current) {
      throw new Error("Counter not found.");
    }
    const next = COUNTER_CHANGES[change](current);
    // setCounterValue clamps into the counter's bounds.
    return next === current ? current : this.store.setCounterValue(listId, counterId, next.value);
  }

  private assertReferencesExist(listId: string, automation: Pick<z.infer<typeof automationInput>, "triggers" | "actions">): void {
    if (!this.store.findList(listId)) {
      throw new Error("Timer list not found.");
    }
    const timerNames = new Set(this.store.getTimers(listId).map(timer => timer.name));
    const counterNames = new Set(this.store.getCounters(listId).map(counter => counter.name));

    for (const trigger of automation.triggers) {
      const timerName = triggerTimerName(trigger);
      if (timerName !== undefined && !timerNames.has(timerName)) {
        throw new Error(`No timer named "${timerName}" in this list.`);
      }
      const counterName = triggerCounterName(trigger);
      if (counterName !== undefined && !counterNames.has(counterName)) {
        throw new Error(`No counter named "${counterName}" in this list.`);
      }
    }
    for (const action of automation.actions) {
      const counterName = actionCounterName(action);
      if (counterName !== undefined && !counterNames.has(counterName)) {
        throw new Error(`No counter named "${counterName}" in this list.`);
      }
    }
  }
}
