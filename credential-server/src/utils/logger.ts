/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * File-based debug logging utility. Disabled by default and activated via
 * the --debug CLI flag or DEBUG_LOG=true. Writes ISO-timestamped entries to
 * logs/server.log with a console fallback when file operations fail.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

import { getLogFilePath } from "./paths";


let isLoggingEnabled = false;
let logDirectoryReady: Promise<void> | null = null;


function ensureLogDirectoryExists(logFilePath: string): Promise<void> {
  if (!logDirectoryReady) {
    logDirectoryReady = fs
      .mkdir(path.dirname(logFilePath), { recursive: true })
      .then(() => undefined);
  }
  return logDirectoryReady;
}


/**
 * Enables or disables file logging globally.
 */
export function setLoggingEnabled(enabled: boolean) {
  isLoggingEnabled = enabled;
}


export function isLoggingActive(): boolean {
  return isLoggingEnabled;
}


/**
 * Appends an ISO-timestamped message to the server log file. No-ops when
 * logging is disabled; falls back to console.error when the file write fails.
 */
export function logToFile(message: string) {
  if (!isLoggingEnabled) {
    return;
  }
  const logFilePath = getLogFilePath();
  const timestamp = new Date().toISOString();
  const logMessage = `${timestamp} - ${message}\n`;

  ensureLogDirectoryExists(logFilePath)
    .then(() => fs.appendFile(logFilePath, logMessage))
    .catch((err: unknown) => {
      console.error("[broker] failed to write to log file:", err);
    });
}
