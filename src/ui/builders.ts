import type { ActivityEntry } from "../activity.js";
import { describeAutomation, formatClock, SOUND_LABELS } from "../automations/describe.js";
import type { SessionSnapshot } from "../session.js";
import type { TimerList } from "../types.js";

export interface InlineCard {
  surface: "inline_card";
  heading: string;
  body: string;
  badge?: string;
  cta?: {
    label: string;
    action: "pause_session" | "resume_session" | "start_session";
    listId: string;
  };
  accessibilityLabel: string;
}

export interface InspectListRow {
  surface: "inspect";
  id: string;
  title: string;
  subtitle: string;
  status: "active" | "queued" | "done" | "idle";
  accessibilityLabel: string;
}

export type ListStructuredContent = {
  app: string;
  inlineCard: InlineCard;
  inspect?: {
    items: InspectListRow[];
  };
  counters?: Array<{ id: string; name: string; value: number; bounds: string }>;
  automations?: Array<{ id: string; name: string; enabled: boolean; summary: string }>;
  activity?: string[];
};

export const APP_NAME = "Timer Sequencer";

export function buildSessionCard(list: TimerList, session: SessionSnapshot | undefined): InlineCard {
  const timer = session?.currentTimer;
  if (!session || !timer || session.state === "idle") {
    return {
      surface: "inline_card",
      heading: list.name,
      body: `${list.timers.length} timer${list.timers.length === 1 ? "" : "s"} ready.`,
      cta: list.timers.length > 0 ? { label: "Start", action: "start_session", listId: list.id } : undefined,
      accessibilityLabel: `Timer list ${list.name}, not running.`
    };
  }

  const remaining = formatClock(Math.ceil(session.remainingSeconds));
  const paused = session.state === "paused";
  return {
    surface: "inline_card",
    heading: timer.name,
    body: paused ? `Paused with ${remaining} left` : `${remaining} remaining`,
    badge: `${(session.currentIndex ?? 0) + 1}/${session.timers.length}`,
    cta: paused
      ? { label: "Resume", action: "resume_session", listId: list.id }
      : { label: "Pause", action: "pause_session", listId: list.id },
    accessibilityLabel: `Timer ${timer.name}, ${paused ? "paused" : "running"}, ${remaining} left.`
  };
}

export function buildTimerRows(list: TimerList, session: SessionSnapshot | undefined): InspectListRow[] {
  const running = session && session.state !== "idle" ? session.currentIndex : null;
  return [...list.timers]
    .sort((a, b) => a.order - b.order)
    .map((timer, index) => {
      const status: InspectListRow["status"] =
        running === null ? "idle" : index === running ? "active" : index < running ? "done" : "queued";
      const subtitle = formatClock(timer.durationSeconds);
      return {
        surface: "inspect",
        id: timer.id,
        title: timer.name,
        subtitle,
        status,
        accessibilityLabel: `Timer ${timer.name}, ${subtitle}, ${status}.`
      };
    });
}

export function describeActivity(entry: ActivityEntry): string {
  return entry.type === "sound" ? `Played ${SOUND_LABELS[entry.soundId]}` : `Notification: ${entry.message}`;
}

export function buildListStructuredContent(input: {
  list: TimerList;
  session?: SessionSnapshot;
  activity?: ActivityEntry[];
}): ListStructuredContent {
  const { list, session, activity = [] } = input;
  const rows = buildTimerRows(list, session);
  const counters = session?.listId === list.id ? session.counters : list.counters;

  return {
    app: APP_NAME,
    inlineCard: buildSessionCard(list, session),
    inspect: rows.length > 0 ? { items: rows } : undefined,
    counters:
      counters.length > 0
        ? counters.map(counter => ({
          id: counter.id,
          name: counter.name,
          value: counter.value,
          bounds: `${counter.minValue ?? "-∞"}..${counter.maxValue ?? "∞"}`
        }))
        : undefined,
    automations:
      list.automations.length > 0
        ? list.automations.map(automation => ({
          id: automation.id,
          name: automation.name,
          enabled: automation.enabled,
          summary: describeAutomation(automation)
        }))
        : undefined,
    activity: activity.length > 0 ? activity.map(describeActivity) : undefined
  };
}
