/**
 * Debug logging for summary runs.
 *
 * Console output always; an append-only log file when enabled through
 * environment variables.
 *
 * @module debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

// Read per call: .env is loaded after this module is imported
function debugLogPath(): string {
  return path.resolve(process.env.CONSULT_DEBUG_LOG_PATH || "debug-summariser.log");
}

function debugLogFileEnabled(): boolean {
  return (process.env.CONSULT_DEBUG_LOG_FILE ?? "false").trim().toLowerCase() === "true";
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Serialise a log payload, truncated to DEBUG_LOG_MAX_DATA_CHARS.
 */
export function formatLogData(data: unknown): string {
  let payload: string;
  try {
    payload = typeof data === "string" ? data : JSON.stringify(data, null, 2) ?? String(data);
  } catch {
    payload = "[unserializable]";
  }
  if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
    payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
  }
  return payload;
}

/**
 * Log a message to the console and, when enabled, the debug file.
 */
export function debugLog(message: string, data?: unknown): void {
  let logLine = `[${new Date().toISOString()}] ${message}`;
  if (data !== undefined) {
    logLine += ` | ${formatLogData(data)}`;
  }

  // Async append so long runs are not blocked on disk
  if (debugLogFileEnabled()) {
    const logPath = debugLogPath();
    fs.promises.appendFile(logPath, logLine + "\n").catch((err: unknown) => {
      console.error(`[Debug] Could not write ${logPath}:`, err);
    });
  }

  console.log(logLine);
}
