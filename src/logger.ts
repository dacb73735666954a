/**
 * Logging configuration using LogTape.
 *
 * Usage:
 *   import { getAppLogger } from "./logger.js";
 *   const log = getAppLogger("actions");
 *   log.info("Moved {file} to {dest}", { file, dest });
 *
 * Levels (in order): debug < info < warning < error < fatal
 *
 * Records go to the console until the screen opens. While the screen is up
 * they go to the status line instead (see `useStatusSink`), since anything
 * written to the terminal would be painted over on the next render.
 */

import { configure, getConsoleSink, getLogger } from "@logtape/logtape";
import type { LogLevel, LogRecord, Logger, Sink } from "@logtape/logtape";

export type { Logger } from "@logtape/logtape";

export const ROOT_CATEGORY = "sortview";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warning", "error"];

let lowestLevel: LogLevel = "info";

export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const v = value.toLowerCase();
  return LEVELS.find((l) => l === v) ?? null;
}

/** Joins a record's message parts into plain text. */
export function formatMessage(record: LogRecord): string {
  return record.message
    .map((part, i) => (i % 2 === 0 ? String(part) : renderValue(part)))
    .join("");
}

function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

async function applyConfig(sink: Sink, reset: boolean): Promise<void> {
  await configure({
    sinks: { main: sink },
    loggers: [
      { category: ROOT_CATEGORY, lowestLevel, sinks: ["main"] },
      // keep LogTape's own meta logger quiet
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: [] },
    ],
    reset,
  });
}

/** Call once at startup, before anything logs. */
export async function initLogger(verbose: boolean): Promise<void> {
  lowestLevel = verbose
    ? "debug"
    : (parseLogLevel(process.env.SORTVIEW_LOG_LEVEL) ?? "info");
  await applyConfig(getConsoleSink(), false);
}

/** Route records to `show` while the screen is open. */
export async function useStatusSink(
  show: (text: string, level: LogLevel) => void,
): Promise<void> {
  await applyConfig((record) => show(formatMessage(record), record.level), true);
}

export async function useConsoleSink(): Promise<void> {
  await applyConfig(getConsoleSink(), true);
}

/**
 * Get a logger for a feature. Categories are hierarchical:
 * `getAppLogger("actions")` logs under ["sortview", "actions"].
 */
export function getAppLogger(feature: string): Logger {
  return getLogger([ROOT_CATEGORY, feature]);
}
