import { z } from "zod";
import type { LogLevel } from "./logger.js";

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform(value => (typeof value === "boolean" ? value : !["0", "false", "no", "off"].includes(value.trim().toLowerCase())));

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(2091),
  DATA_FILE: z.string().min(1).default("data/timer-lists.json"),
  HEARTBEAT_MS: z.coerce.number().int().min(10).max(1000).default(100),
  AUTOPLAY: booleanFlag.default(true),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export interface AppConfig {
  port: number;
  dataFile: string;
  heartbeatMs: number;
  autoplay: boolean;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.parse({
    PORT: env.PORT,
    DATA_FILE: env.DATA_FILE,
    HEARTBEAT_MS: env.HEARTBEAT_MS,
    AUTOPLAY: env.AUTOPLAY,
    LOG_LEVEL: env.LOG_LEVEL
  });

  return {
    port: parsed.PORT,
    dataFile: parsed.DATA_FILE,
    heartbeatMs: parsed.HEARTBEAT_MS,
    autoplay: parsed.AUTOPLAY,
    logLevel: parsed.LOG_LEVEL
  };
}
