/**
 * User Configuration
 *
 * Reads ~/.vted/settings.json and applies the recognised keys on top of the
 * defaults. A missing file is not an error; unknown keys and values of the
 * wrong type are skipped and reported.
 */

import * as fs from 'fs';
import * as path from 'path';
import { debugLog } from '../debug.ts';
import { defaultSettings, type EditorSettings, type SettingKey, type Settings } from './settings.ts';

export interface UserConfigResult {
  /** Path that was read */
  path: string;
  /** Whether the file existed */
  found: boolean;
  /** Keys that were applied */
  applied: SettingKey[];
  /** Human readable reasons for anything that was ignored */
  warnings: string[];
}

export function getConfigDir(): string {
  const home = process.env.HOME || process.env.USERPROFILE || '';
  return path.join(home, '.vted');
}

export function getSettingsPath(): string {
  return path.join(getConfigDir(), 'settings.json');
}

function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(defaultSettings, key);
}

/**
 * Validate one raw value against the type of its default.
 * Returns an error description, or null when the value is acceptable.
 */
function checkValue(key: SettingKey, value: unknown): string | null {
  const expected = typeof defaultSettings[key];
  if (typeof value !== expected) {
    return `${key}: expected ${expected}, got ${typeof value}`;
  }
  if (key === 'editor.tabSize' && (!Number.isInteger(value) || Number(value) < 1)) {
    return `${key}: must be a positive integer`;
  }
  if (key === 'editor.undoLimit' && (!Number.isInteger(value) || Number(value) < 0)) {
    return `${key}: must be a non-negative integer`;
  }
  return null;
}

/**
 * Pick the valid settings out of a parsed JSON document.
 */
export function parseUserSettings(raw: unknown): { values: Partial<EditorSettings>; warnings: string[] } {
  const values: Partial<EditorSettings> = {};
  const warnings: string[] = [];

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    warnings.push('settings file must contain a JSON object');
    return { values, warnings };
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isSettingKey(key)) {
      warnings.push(`unknown setting ${key}`);
      continue;
    }
    const problem = checkValue(key, value);
    if (problem) {
      warnings.push(problem);
      continue;
    }
    if (typeof value === 'number' && (key === 'editor.tabSize' || key === 'editor.undoLimit')) {
      values[key] = value;
    } else if (typeof value === 'boolean' && key !== 'editor.tabSize' && key !== 'editor.undoLimit') {
      values[key] = value;
    }
  }

  return { values, warnings };
}

/**
 * Load the user's settings file into the given settings object.
 */
export async function loadUserConfig(
  target: Settings,
  settingsPath: string = getSettingsPath()
): Promise<UserConfigResult> {
  const result: UserConfigResult = { path: settingsPath, found: false, applied: [], warnings: [] };

  let content: string;
  try {
    content = await fs.promises.readFile(settingsPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      debugLog(`[Config] No settings file at ${settingsPath}`);
      return result;
    }
    throw error;
  }
  result.found = true;

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    result.warnings.push(`invalid JSON: ${reason}`);
    debugLog(`[Config] Ignoring ${settingsPath}: invalid JSON: ${reason}`);
    return result;
  }

  const { values, warnings } = parseUserSettings(raw);
  target.update(values);
  result.applied = Object.keys(values).filter(isSettingKey);
  result.warnings.push(...warnings);

  for (const warning of warnings) {
    debugLog(`[Config] ${warning}`);
  }
  debugLog(`[Config] Loaded ${result.applied.length} setting(s) from ${settingsPath}`);
  return result;
}
