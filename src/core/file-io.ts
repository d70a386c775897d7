/**
 * File Persistence
 *
 * Plain text only. Tabs are expanded to 8-column stops on load and can be
 * packed back on save. Saves go to a temporary file that is renamed over
 * the target, so a failed save never touches the original.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EditorError } from './errors.ts';
import { debugLog } from '../debug.ts';

const TAB_STOP = 8;

/**
 * Replace tabs with spaces up to the next 8-column stop.
 */
export function expandTabs(line: string): string {
  if (!line.includes('\t')) return line;

  let result = '';
  let column = 0;
  for (const char of line) {
    if (char === '\t') {
      const width = TAB_STOP - (column % TAB_STOP);
      result += ' '.repeat(width);
      column += width;
    } else {
      result += char;
      column += 1;
    }
  }
  return result;
}

/**
 * Turn each 8-column chunk that ends in spaces into its text plus a tab.
 */
export function packTabs(line: string): string {
  let result = '';
  for (let i = 0; i < line.length; i += TAB_STOP) {
    const chunk = line.slice(i, i + TAB_STOP);
    const trimmed = chunk.replace(/ +$/, '');
    result += trimmed === chunk ? chunk : `${trimmed}\t`;
  }
  return result;
}

/**
 * Split text into editor lines: trailing whitespace stripped, tabs expanded.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => expandTabs(line.replace(/[\r\n\t ]+$/, '')));
}

/**
 * Join lines for writing; every line, the last included, ends with a newline.
 */
export function joinLines(lines: readonly string[], writeTabs: boolean): string {
  return lines.map((line) => (writeTabs ? packTabs(line) : line) + '\n').join('');
}

export async function loadFile(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EditorError('LOAD_FAILED', `Cannot open ${filePath}: ${reason}`, { cause: error });
  }
  const lines = splitLines(text);
  debugLog(`[FileIO] Loaded ${lines.length} lines from ${filePath}`);
  return lines;
}

export interface SaveOptions {
  writeTabs: boolean;
}

function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  return path.join(dir, `.${base}.${process.pid}.vted-tmp`);
}

/**
 * Write lines atomically: temp file first, then rename over the target.
 */
export async function saveFile(filePath: string, lines: readonly string[], options: SaveOptions): Promise<void> {
  const tempPath = tempPathFor(filePath);
  try {
    await fs.promises.writeFile(tempPath, joinLines(lines, options.writeTabs), 'utf8');
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    const reason = error instanceof Error ? error.message : String(error);
    throw new EditorError('SAVE_FAILED', `Cannot save ${filePath}: ${reason}`, { cause: error });
  }
  debugLog(`[FileIO] Saved ${lines.length} lines to ${filePath}`);
}
