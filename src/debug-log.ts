import fs from 'node:fs';
import { defaultDebugLogPath } from './config.js';

export const ENTRY_SEPARATOR = '---';

/** Append a raw hook event to debug.log. Never throws. */
export function appendDebugLog(event: Record<string, unknown>, logPath = defaultDebugLogPath()): void {
  try {
    fs.appendFileSync(logPath, JSON.stringify(event, null, 2) + `\n${ENTRY_SEPARATOR}\n`);
  } catch {
    // Never block Claude
  }
}
