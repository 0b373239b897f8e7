import type { ActionEffect, ActionKind, Automation, SoundId, TriggerCondition, TriggerKind } from "../types.js";

export const TRIGGER_LABELS: Record<TriggerKind, string> = {
  timerStart: "Timer Starts",
  timerEnd: "Timer Ends",
  timerTimeRemaining: "X Seconds Before Timer Ends",
  timerTimeElapsed: "X Seconds After Timer Starts",
  repeatingInterval: "Every X Seconds",
  counterReachesValue: "Counter Reaches Value",
  anyTimerStart: "Any Timer Starts",
  anyTimerEnd: "Any Timer Ends"
};

export const ACTION_LABELS: Record<ActionKind, string> = {
  playSound: "Play Sound",
  modifyCounter: "Modify Counter",
  showNotification: "Show Notification",
  pauseActiveTimer: "Pause Timer",
  skipToNextTimer: "Skip to Next Timer"
};

export const SOUND_LABELS: Record<SoundId, string> = {
  bell: "Bell",
  chime: "Chime",
  alert: "Alert",
  notification: "Notification",
  custom: "Custom"
};

/** Name of the timer a trigger refers to, if its kind refers to one. */
export function triggerTimerName(trigger: TriggerCondition): string | undefined {
  switch (trigger.kind) {
    case "timerStart":
    case "timerEnd":
    case "timerTimeRemaining":
    case "timerTimeElapsed":
      return trigger.timerName;
    default:
      return undefined;
  }
}

export function triggerCounterName(trigger: TriggerCondition): string | undefined {
  return trigger.kind === "counterReachesValue" ? trigger.counterName : undefined;
}

export function actionCounterName(action: ActionEffect): string | undefined {
  return action.kind === "modifyCounter" ? action.counterName : undefined;
}

export function describeTrigger(trigger: TriggerCondition): string {
  const label = TRIGGER_LABELS[trigger.kind];
  switch (trigger.kind) {
    case "timerStart":
    case "timerEnd":
      return `${label}: ${trigger.timerName}`;
    case "timerTimeRemaining":
      return `${trigger.thresholdSeconds}s before ${trigger.timerName} ends`;
    case "timerTimeElapsed":
      return `${trigger.offsetSeconds}s after ${trigger.timerName} starts`;
    case "repeatingInterval":
      return `Every ${trigger.periodSeconds}s`;
    case "counterReachesValue":
      return `${trigger.counterName} reaches ${trigger.targetValue}`;
    case "anyTimerStart":
    case "anyTimerEnd":
      return label;
  }
}

export function describeAction(action: ActionEffect): string {
  const label = ACTION_LABELS[action.kind];
  switch (action.kind) {
    case "playSound":
      return `${label} (${SOUND_LABELS[action.soundId]})`;
    case "modifyCounter":
      return `${action.counterName} ${action.delta >= 0 ? "+" : ""}${action.delta}`;
    case "showNotification":
      return `${label} ("${action.message}")`;
    case "pauseActiveTimer":
    case "skipToNextTimer":
      return label;
  }
}

export function describeAutomation(automation: Pick<Automation, "triggers" | "actions">): string {
  const triggers = automation.triggers.map(describeTrigger).join(" or ");
  const actions = automation.actions.map(describeAction).join(", ");
  return `${triggers} → ${actions}`;
}

/** mm:ss, truncating fractional seconds. */
export function formatClock(seconds: number): string {
  const totalSeconds = Math.max(Math.floor(seconds), 0);
  const minutes = Math.floor(totalSeconds / 60);
  const rest = totalSeconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(rest).padStart(2, "0")}`;
}
