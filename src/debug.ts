/**
 * Debug Logging
 *
 * Appends timestamped lines to a log file when enabled with --debug.
 * The terminal is owned by the editor, so nothing is ever written to stdout.
 */

import * as fs from 'fs';

let debugEnabled = false;
let logFile = 'debug.log';

/**
 * Enable or disable logging. Enabling truncates the previous log.
 */
export function setDebugEnabled(enabled: boolean, file: string = 'debug.log'): void {
  debugEnabled = enabled;
  logFile = file;
  if (enabled) {
    fs.writeFileSync(logFile, '');
  }
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function debugLog(msg: string): void {
  if (!debugEnabled) return;
  fs.appendFileSync(logFile, `[${new Date().toISOString()}] ${msg}\n`);
}
