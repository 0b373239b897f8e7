import { formatISO } from "date-fns";
import type { Notifier, SoundId, SoundPlayer } from "./types.js";

export type ActivityEntry =
  | { type: "sound"; soundId: SoundId; at: string }
  | { type: "notification"; message: string; at: string };

const DEFAULT_CAPACITY = 50;

/**
 * Sound and notification collaborator for hosts without speakers or a
 * screen: entries are kept in a bounded feed and handed to subscribers.
 */
export class ActivityFeed implements SoundPlayer, Notifier {
  private readonly entries: ActivityEntry[] = [];
  private readonly listeners = new Set<(entry: ActivityEntry) => void>();

  constructor(private readonly capacity = DEFAULT_CAPACITY) {}

  subscribe(listener: (entry: ActivityEntry) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  play(soundId: SoundId): void {
    this.record({ type: "sound", soundId, at: formatISO(new Date()) });
  }

  show(message: string): void {
    this.record({ type: "notification", message, at: formatISO(new Date()) });
  }

  recent(limit = 10): ActivityEntry[] {
    return this.entries.slice(-limit);
  }

  private record(entry: ActivityEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    for (const listener of this.listeners) {
      listener(entry);
    }
  }
}
