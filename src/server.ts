import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import packageJson from "../package.json" with { type: "json" };
import { ActivityFeed } from "./activity.js";
import { createLogger } from "./logger.js";
import type { SessionSnapshot } from "./session.js";
import type { ListStore } from "./state/listStore.js";
import { actionSchema, triggerSchema } from "./state/listSchema.js";
import { ListToolset, type SessionCommand } from "./tools/listTool.js";
import type { TimerList } from "./types.js";
import { APP_NAME, buildListStructuredContent, describeActivity } from "./ui/builders.js";

const log = createLogger("server");

export interface TimerServices {
  store: ListStore;
  toolset: ListToolset;
  activity: ActivityFeed;
}

export interface TimerServerContext {
  server: McpServer;
  /** Stops forwarding activity to this server's client. */
  detach: () => void;
}

const idSchema = z.string().uuid();
const durationField = z
  .union([z.number().positive(), z.string().min(1).describe('Examples: "5 minutes", "30s", "1:30".')])
  .optional();

/** Shared state for every connected client: one store, one running session, one activity feed. */
export function createTimerServices(store: ListStore, options: { heartbeatMs?: number; autoplay?: boolean } = {}): TimerServices {
  const activity = new ActivityFeed();
  const toolset = new ListToolset(store, {
    sounds: activity,
    notifier: activity,
    heartbeatMs: options.heartbeatMs,
    autoplay: options.autoplay
  });
  return { store, toolset, activity };
}

export function createTimerServer(services: TimerServices): TimerServerContext {
  const { store, toolset, activity } = services;
  const server = new McpServer(
    {
      name: APP_NAME,
      version: packageJson.version,
      description: "Sequenced countdown timers with counters and automations."
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const detach = activity.subscribe(entry => {
    server.server
      .sendLoggingMessage({ level: "info", logger: "automations", data: describeActivity(entry) })
      .catch(error => log.debug("Activity not forwarded", error));
  });

  const listResult = (message: string, list: TimerList | undefined) => {
    const session = toolset.activeSession;
    const snapshot = list && session?.listId === list.id ? session.snapshot() : undefined;
    return buildResult(message, list, snapshot, activity);
  };

  const current = (listId: string): TimerList | undefined => store.findList(listId);

  server.registerTool(
    "timer_lists",
    {
      title: "Timer lists",
      description: "List, show, create, rename, or delete timer lists. Deleting a list removes its timers, counters and automations.",
      inputSchema: {
        action: z.enum(["list", "show", "create", "rename", "delete"]),
        listId: idSchema.optional(),
        name: z.string().min(1).max(48).optional(),
        colorHex: z.string().optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input =>
      runTool(async () => {
        switch (input.action) {
          case "create": {
            const list = await toolset.createList({ name: input.name ?? "", colorHex: input.colorHex });
            return listResult(`Created list ${list.name}.`, list);
          }
          case "rename": {
            const list = await toolset.renameList(requireId(input.listId, "listId"), {
              name: input.name ?? "",
              colorHex: input.colorHex
            });
            return listResult(`Renamed list to ${list.name}.`, list);
          }
          case "delete": {
            const list = await toolset.deleteList(requireId(input.listId, "listId"));
            return listResult(`Deleted list ${list.name} and everything in it.`, undefined);
          }
          case "show": {
            const list = current(requireId(input.listId, "listId"));
            if (!list) {
              throw new Error("Timer list not found.");
            }
            return listResult(`Showing ${list.name}.`, list);
          }
          case "list":
          default: {
            const lists = toolset.listLists();
            const message =
              lists.length === 0
                ? "No timer lists yet."
                : lists.map(list => `${list.name} (${list.timers.length} timers) [${list.id}]`).join("\n");
            return buildResult(message, undefined, undefined, activity);
          }
        }
      })
  );

  server.registerTool(
    "timers",
    {
      title: "Timers",
      description: "Add, update, remove, or reorder the timers of a list.",
      inputSchema: {
        action: z.enum(["add", "update", "remove", "move"]),
        listId: idSchema,
        timerId: idSchema.optional(),
        name: z.string().min(1).max(48).optional(),
        duration: durationField,
        fromIndex: z.number().int().min(0).optional(),
        toIndex: z.number().int().min(0).optional()
      }
    },
    async input =>
      runTool(async () => {
        switch (input.action) {
          case "add": {
            const timer = await toolset.addTimer({ listId: input.listId, name: input.name, duration: input.duration });
            return listResult(`Added timer ${timer.name}.`, current(input.listId));
          }
          case "update": {
            const timer = await toolset.updateTimer({
              listId: input.listId,
              timerId: requireId(input.timerId, "timerId"),
              name: input.name,
              duration: input.duration
            });
            return listResult(`Updated timer ${timer.name}.`, current(input.listId));
          }
          case "remove": {
            const timer = await toolset.removeTimer(input.listId, requireId(input.timerId, "timerId"));
            return listResult(`Removed timer ${timer.name}.`, current(input.listId));
          }
          case "move": {
            await toolset.moveTimer(input.listId, input.fromIndex ?? 0, input.toIndex ?? 0);
            return listResult("Reordered timers.", current(input.listId));
          }
        }
      })
  );

  server.registerTool(
    "counters",
    {
      title: "Counters",
      description: "Add, update, remove, increment, decrement, or reset counters. Counter changes can trigger automations.",
      inputSchema: {
        action: z.enum(["add", "update", "remove", "increment", "decrement", "reset"]),
        listId: idSchema,
        counterId: idSchema.optional(),
        name: z.string().min(1).max(48).optional(),
        initialValue: z.number().int().optional(),
        minValue: z.number().int().nullable().optional(),
        maxValue: z.number().int().nullable().optional()
      }
    },
    async input =>
      runTool(async () => {
        switch (input.action) {
          case "add": {
            const counter = await toolset.addCounter({
              listId: input.listId,
              name: input.name ?? "",
              initialValue: input.initialValue,
              minValue: input.minValue ?? undefined,
              maxValue: input.maxValue ?? undefined
            });
            return listResult(`Added counter ${counter.name}.`, current(input.listId));
          }
          case "update": {
            const counter = await toolset.updateCounter({
              listId: input.listId,
              counterId: requireId(input.counterId, "counterId"),
              name: input.name,
              initialValue: input.initialValue,
              minValue: input.minValue,
              maxValue: input.maxValue
            });
            return listResult(`Updated counter ${counter.name}.`, current(input.listId));
          }
          case "remove": {
            const counter = await toolset.removeCounter(input.listId, requireId(input.counterId, "counterId"));
            return listResult(`Removed counter ${counter.name}.`, current(input.listId));
          }
          case "increment":
          case "decrement":
          case "reset": {
            const counter = await toolset.changeCounter(input.listId, requireId(input.counterId, "counterId"), input.action);
            return listResult(`${counter.name} is now ${counter.value}.`, current(input.listId));
          }
        }
      })
  );

  server.registerTool(
    "automations",
    {
      title: "Automations",
      description:
        "Save (create or replace), remove, enable, or disable automations. Triggers and actions refer to timers and counters by name.",
      inputSchema: {
        action: z.enum(["save", "remove", "enable", "disable"]),
        listId: idSchema,
        automationId: idSchema.optional(),
        name: z.string().min(1).max(48).optional(),
        enabled: z.boolean().optional(),
        triggers: z.array(triggerSchema).optional(),
        actions: z.array(actionSchema).optional()
      }
    },
    async input =>
      runTool(async () => {
        switch (input.action) {
          case "save": {
            const automation = await toolset.saveAutomation({
              listId: input.listId,
              automationId: input.automationId,
              name: input.name ?? "",
              enabled: input.enabled,
              triggers: input.triggers ?? [],
              actions: input.actions ?? []
            });
            return listResult(`Saved automation ${automation.name}.`, current(input.listId));
          }
          case "remove": {
            const automation = await toolset.removeAutomation(input.listId, requireId(input.automationId, "automationId"));
            return listResult(`Removed automation ${automation.name}.`, current(input.listId));
          }
          case "enable":
          case "disable": {
            const automation = await toolset.setAutomationEnabled(
              input.listId,
              requireId(input.automationId, "automationId"),
              input.action === "enable"
            );
            return listResult(
              `${automation.name} is ${automation.enabled ? "enabled" : "disabled"}.`,
              current(input.listId)
            );
          }
        }
      })
  );

  server.registerTool(
    "session",
    {
      title: "Session",
      description: "Start, pause, resume, stop, or skip the timer sequence of a list, or report its status.",
      inputSchema: {
        command: z.enum(["start", "pause", "resume", "stop", "skip", "status"]),
        listId: idSchema,
        fromIndex: z.number().int().min(0).optional()
      }
    },
    async input =>
      runTool(async () => {
        const command: SessionCommand = input.command;
        const snapshot = await toolset.controlSession(input.listId, command, input.fromIndex);
        const list = current(input.listId);
        return buildResult(describeSession(snapshot), list, snapshot, activity);
      })
  );

  return {
    server,
    detach
  };
}

function describeSession(snapshot: SessionSnapshot): string {
  const timer = snapshot.currentTimer;
  if (snapshot.state === "idle" || !timer) {
    return "Sequence is stopped.";
  }
  const remaining = Math.ceil(snapshot.remainingSeconds);
  return snapshot.state === "paused"
    ? `${timer.name} paused with ${remaining}s left.`
    : `${timer.name} running, ${remaining}s left.`;
}

function buildResult(message: string, list: TimerList | undefined, session: SessionSnapshot | undefined, activity: ActivityFeed) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    structuredContent: list
      ? buildListStructuredContent({ list, session, activity: activity.recent() })
      : { app: APP_NAME }
  };
}

type ToolResult = ReturnType<typeof buildResult>;

async function runTool(handler: () => Promise<ToolResult>) {
  try {
    return await handler();
  } catch (error) {
    const message = error instanceof z.ZodError ? error.issues.map(issue => issue.message).join("; ") : errorMessage(error);
    log.warn(`Tool call rejected: ${message}`);
    return {
      content: [{ type: "text" as const, text: message }],
      isError: true
    };
  }
}

function requireId(value: string | undefined, field: string): string {
  if (!value) {
    throw new Error(`${field} is required for this action.`);
  }
  return value;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
