import { z } from "zod";

export const nameSchema = z.string().trim().min(1).max(48);

export const soundSchema = z.enum(["bell", "chime", "alert", "notification", "custom"]);

export const triggerSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("timerStart"), timerName: nameSchema }),
  z.object({ kind: z.literal("timerEnd"), timerName: nameSchema }),
  z.object({ kind: z.literal("timerTimeRemaining"), timerName: nameSchema, thresholdSeconds: z.number().nonnegative() }),
  z.object({ kind: z.literal("timerTimeElapsed"), timerName: nameSchema, offsetSeconds: z.number().nonnegative() }),
  z.object({ kind: z.literal("repeatingInterval"), periodSeconds: z.number().positive() }),
  z.object({ kind: z.literal("counterReachesValue"), counterName: nameSchema, targetValue: z.number().int() }),
  z.object({ kind: z.literal("anyTimerStart") }),
  z.object({ kind: z.literal("anyTimerEnd") })
]);

export const actionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("playSound"), soundId: soundSchema }),
  z.object({ kind: z.literal("modifyCounter"), counterName: nameSchema, delta: z.number().int() }),
  z.object({ kind: z.literal("showNotification"), message: z.string().trim().min(1).max(200) }),
  z.object({ kind: z.literal("pauseActiveTimer") }),
  z.object({ kind: z.literal("skipToNextTimer") })
]);

// Stored records: the editing schemas above plus the ids and ordering the store assigns.

const storedId = z.object({ id: z.string().min(1) });
const order = z.number().int().nonnegative();

const storedTimerSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  durationSeconds: z.number().positive(),
  order
});

const storedCounterSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  value: z.number(),
  initialValue: z.number(),
  minValue: z.number().optional(),
  maxValue: z.number().optional(),
  order
});

const storedAutomationSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  enabled: z.boolean(),
  order,
  createdAt: z.string(),
  triggers: z.array(z.intersection(triggerSchema, storedId)),
  actions: z.array(z.intersection(actionSchema, storedId))
});

export const storedListSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  colorHex: z.string(),
  createdAt: z.string(),
  lastUsedAt: z.string().optional(),
  timers: z.array(storedTimerSchema),
  counters: z.array(storedCounterSchema),
  automations: z.array(storedAutomationSchema)
});
