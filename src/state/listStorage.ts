import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { createLogger } from "../logger.js";
import type { TimerList } from "../types.js";
import { storedListSchema } from "./listSchema.js";

const log = createLogger("list-storage");

export interface ListStorage {
  load(): Promise<TimerList[]>;
  save(lists: TimerList[]): Promise<void>;
}

/**
 * All timer lists in a single JSON file. Entries that fail the stored-list
 * schema are dropped on load with a warning. Saves are queued in call order.
 */
export class ListFileStorage implements ListStorage {
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<TimerList[]> {
    const raw = await this.readIfPresent();
    if (raw === undefined) {
      return [];
    }

    const entries: unknown = JSON.parse(raw);
    if (!Array.isArray(entries)) {
      log.warn(`${this.filePath} does not contain a list array; starting with no lists.`);
      return [];
    }

    return entries.flatMap((entry: unknown, index: number): TimerList[] => {
      const result = storedListSchema.safeParse(entry);
      if (result.success) {
        return [result.data];
      }
      const issue = result.error.issues[0];
      log.warn(`Dropping stored list #${index}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`);
      return [];
    });
  }

  save(lists: TimerList[]): Promise<void> {
    const body = JSON.stringify(lists, null, 2);
    // A failed earlier write was already reported to its own caller.
    const write = this.writes.catch(() => undefined).then(() => this.write(body));
    this.writes = write;
    return write;
  }

  private async readIfPresent(): Promise<string | undefined> {
    try {
      return await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  private async write(body: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, body, "utf-8");
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
