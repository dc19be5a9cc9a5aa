/**
 * File-based execution logging.
 *
 * Creates a unique log file per run:
 * <logDir>/execution_YYYY-MM-DD_HH-MM-SS.txt
 *
 * Uses Node.js appendFile for O(1) append operations.
 */

import { join, dirname } from "node:path";
import { appendFile, mkdir } from "node:fs/promises";

// Capture startup time once (used for unique log filename per run)
const STARTUP_TS = new Date();

/**
 * Log entry types for execution events.
 */
export type ExecutionLogType =
  | "OPPORTUNITY"
  | "EXECUTION_START"
  | "LEG_SUBMIT"
  | "LEG_RESULT"
  | "EXECUTION_COMPLETE"
  | "NAKED_EXPOSURE"
  | "VENUE_FLAGGED"
  | "KILL_SWITCH"
  | "KILL_SWITCH_RESET"
  | "POSITION_SETTLED"
  | "ERROR";

/**
 * Structured log entry for file logging.
 */
export interface ExecutionLogEntry {
  /** ISO timestamp */
  timestamp: string;
  /** Type of log entry */
  type: ExecutionLogType;
  /** Log data (type-specific) */
  data: Record<string, unknown>;
}

const settings = {
  enabled: true,
  dir: join(process.cwd(), "logs"),
};

/**
 * Point file logging at a directory, or turn it off (tests).
 */
export function configureFileLogging(options: { enabled?: boolean; dir?: string }): void {
  if (options.enabled !== undefined) settings.enabled = options.enabled;
  if (options.dir !== undefined) settings.dir = options.dir;
}

export function isFileLoggingEnabled(): boolean {
  return settings.enabled;
}

export function getLogDirectory(): string {
  return settings.dir;
}

/**
 * Get the log file path for this run (unique per startup).
 */
export function getLogFilePath(): string {
  const year = STARTUP_TS.getUTCFullYear();
  const month = String(STARTUP_TS.getUTCMonth() + 1).padStart(2, "0");
  const day = String(STARTUP_TS.getUTCDate()).padStart(2, "0");
  const hours = String(STARTUP_TS.getUTCHours()).padStart(2, "0");
  const minutes = String(STARTUP_TS.getUTCMinutes()).padStart(2, "0");
  const seconds = String(STARTUP_TS.getUTCSeconds()).padStart(2, "0");

  const filename = `execution_${year}-${month}-${day}_${hours}-${minutes}-${seconds}.txt`;
  return join(settings.dir, filename);
}

/**
 * Format a log entry as a single line for file output.
 */
export function formatLogEntry(entry: ExecutionLogEntry): string {
  const dataStr = JSON.stringify(entry.data);
  return `[${entry.timestamp}] [${entry.type}] ${dataStr}\n`;
}

/**
 * Append a log entry to the execution log file.
 *
 * Creates the directory and file if they don't exist.
 */
export async function appendToExecutionLog(entry: ExecutionLogEntry): Promise<void> {
  if (!settings.enabled) return;
  const filePath = getLogFilePath();
  await mkdir(dirname(filePath), { recursive: true });
  await appendFile(filePath, formatLogEntry(entry), { encoding: "utf-8" });
}

/**
 * Create a log entry with current timestamp.
 */
export function createLogEntry(
  type: ExecutionLogType,
  data: Record<string, unknown>
): ExecutionLogEntry {
  return {
    timestamp: new Date().toISOString(),
    type,
    data,
  };
}

/**
 * Create and append an entry without blocking the caller. Write
 * failures go to stderr.
 */
export function logEntry(type: ExecutionLogType, data: Record<string, unknown>): void {
  appendToExecutionLog(createLogEntry(type, data)).catch((error: unknown) => {
    console.error(`[FILE_LOGGER] Failed to write to ${getLogFilePath()}:`, error);
  });
}
