export type SoundId = "bell" | "chime" | "alert" | "notification" | "custom";

export interface TimerDefinition {
  id: string;
  name: string;
  durationSeconds: number;
  order: number;
}

export interface Counter {
  id: string;
  name: string;
  value: number;
  initialValue: number;
  minValue?: number;
  maxValue?: number;
  order: number;
}

export type TriggerCondition =
  | { kind: "timerStart"; timerName: string }
  | { kind: "timerEnd"; timerName: string }
  | { kind: "timerTimeRemaining"; timerName: string; thresholdSeconds: number }
  | { kind: "timerTimeElapsed"; timerName: string; offsetSeconds: number }
  | { kind: "repeatingInterval"; periodSeconds: number }
  | { kind: "counterReachesValue"; counterName: string; targetValue: number }
  | { kind: "anyTimerStart" }
  | { kind: "anyTimerEnd" };

export type ActionEffect =
  | { kind: "playSound"; soundId: SoundId }
  | { kind: "modifyCounter"; counterName: string; delta: number }
  | { kind: "showNotification"; message: string }
  | { kind: "pauseActiveTimer" }
  | { kind: "skipToNextTimer" };

export type Trigger = TriggerCondition & { id: string };
export type Action = ActionEffect & { id: string };

export type TriggerKind = TriggerCondition["kind"];
export type ActionKind = ActionEffect["kind"];

export interface Automation {
  id: string;
  name: string;
  enabled: boolean;
  order: number;
  createdAt: string;
  triggers: Trigger[];
  actions: Action[];
}

export interface TimerList {
  id: string;
  name: string;
  colorHex: string;
  createdAt: string;
  lastUsedAt?: string;
  timers: TimerDefinition[];
  counters: Counter[];
  automations: Automation[];
}

export interface SoundPlayer {
  play(soundId: SoundId): void;
}

export interface Notifier {
  show(message: string): void;
}
