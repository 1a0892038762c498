import { getConfig } from "@/config/env";
import { getRequestContext } from "./request-context";

export type LogLevel = "INFO" | "WARN" | "ERROR";

const LEVEL_RANK: Record<LogLevel | "SILENT", number> = {
  INFO: 0,
  WARN: 1,
  ERROR: 2,
  SILENT: 3,
};

export function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  if (LEVEL_RANK[level] < LEVEL_RANK[getConfig().LOG_LEVEL]) return;

  const ctx = getRequestContext();

  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: ctx?.requestId ?? null,
    actor: ctx?.actor ?? null,
    ...meta,
  };

  // JSON-only output (log aggregation safe)
  console.log(JSON.stringify(entry));
}
