/**
 * Document
 *
 * The lines of one open buffer plus its cursor, viewport and mark.
 * `lines` is never empty; an empty buffer holds a single empty line.
 */

import type { DocumentOptions } from '../config/settings.ts';
import { UndoLog, type UndoMergeKey } from './undo.ts';

/**
 * Inclusive-exclusive line range, start < end.
 */
export interface LineRange {
  start: number;
  end: number;
}

/**
 * Count spaces at the start of a line, or directly before `pos` when given.
 */
export function leadingSpaces(line: string, pos?: number): number {
  if (pos === undefined) {
    return line.length - line.replace(/^ +/, '').length;
  }
  const head = line.slice(0, pos);
  return head.length - head.replace(/ +$/, '').length;
}

export class Document {
  lines: string[];
  filename: string;

  cursorLine = 0;
  cursorCol = 0;

  /** First visible line */
  topLine = 0;
  /** Horizontal scroll offset */
  margin = 0;
  /** Cursor row within the window */
  row = 0;

  /** Line where a selection starts, or null */
  mark: number | null = null;
  /** Unsaved changes exist */
  changed = false;
  /** Status line message, cleared before each key */
  message = '';

  readonly options: DocumentOptions;
  readonly undo: UndoLog;

  constructor(options: DocumentOptions, lines: readonly string[] = [], filename: string = '') {
    this.options = { ...options };
    this.undo = new UndoLog(options.undoLimit);
    this.lines = lines.length > 0 ? [...lines] : [''];
    this.filename = filename;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  get currentLine(): string {
    return this.lines[this.cursorLine] ?? '';
  }

  set currentLine(text: string) {
    this.lines[this.cursorLine] = text;
  }

  /**
   * Replace the whole content, e.g. after loading a file.
   */
  setLines(lines: readonly string[]): void {
    this.lines = lines.length > 0 ? [...lines] : [''];
    this.cursorLine = Math.min(this.cursorLine, this.lines.length - 1);
  }

  /**
   * Force the cursor into the document.
   */
  clampCursor(): void {
    this.cursorLine = Math.min(this.lines.length - 1, Math.max(this.cursorLine, 0));
    this.cursorCol = Math.max(0, Math.min(this.cursorCol, this.currentLine.length));
  }

  /**
   * Clamp the cursor and scroll so that it is inside a window of the
   * given size. Horizontal jumps leave a quarter window of context.
   */
  updateViewport(width: number, height: number): void {
    this.clampCursor();

    const quarter = width >> 2;
    if (this.cursorCol >= this.margin + width) {
      this.margin = this.cursorCol - width + quarter;
    } else if (this.cursorCol < this.margin) {
      this.margin = Math.max(this.cursorCol - quarter, 0);
    }

    this.row = Math.max(0, Math.min(this.row, height - 1));
    if (!(this.topLine <= this.cursorLine && this.cursorLine < this.topLine + height)) {
      this.topLine = Math.max(this.cursorLine - this.row, 0);
    }
    this.row = this.cursorLine - this.topLine;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mark
  // ─────────────────────────────────────────────────────────────────────────

  toggleMark(): void {
    this.mark = this.mark === null ? this.cursorLine : null;
  }

  /**
   * Lines covered by the mark and the cursor line, or null without a mark.
   */
  markRange(): LineRange | null {
    if (this.mark === null) return null;
    return this.mark < this.cursorLine
      ? { start: this.mark, end: this.cursorLine + 1 }
      : { start: this.cursorLine, end: this.mark + 1 };
  }

  isMarked(line: number): boolean {
    const range = this.markRange();
    return range !== null && line >= range.start && line < range.end;
  }

  /**
   * Delete the marked lines as one undoable step and return them.
   */
  deleteMarkedLines(): string[] {
    const range = this.markRange();
    if (!range) return [];

    const removed = this.lines.slice(range.start, range.end);
    // Removing everything leaves a placeholder line that undo must replace
    const span = removed.length === this.lines.length ? 1 : 0;
    this.recordUndo(range.start, removed, 'none', span);
    this.lines.splice(range.start, range.end - range.start);
    if (this.lines.length === 0) {
      this.lines = [''];
    }
    this.cursorLine = range.start;
    this.mark = null;
    return removed;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Undo
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Record the state of lines about to change. Always marks the document
   * changed, even with undo disabled.
   */
  recordUndo(line: number, lines: readonly string[] | null, mergeKey: UndoMergeKey, span: number = 1): void {
    this.changed = true;
    this.undo.push({
      line,
      span,
      lines: lines === null ? null : [...lines],
      mergeKey,
      column: this.cursorCol,
    });
  }

  /**
   * Reverse the most recent record. Returns false if there was none.
   */
  undoLast(): boolean {
    const record = this.undo.pop();
    if (!record) return false;

    // Block indent groups leave the cursor where it is
    if (record.mergeKey !== 'indent' && record.mergeKey !== 'undent') {
      this.cursorLine = record.line;
      this.cursorCol = record.column;
    }

    if (record.span >= 0) {
      const restored = record.lines ?? [];
      if (record.line < this.lines.length) {
        this.lines.splice(record.line, record.span, ...restored);
      } else {
        this.lines.push(...restored);
      }
    } else {
      this.lines.splice(record.line, -record.span);
    }
    if (this.lines.length === 0) {
      this.lines = [''];
    }

    this.changed = !this.undo.isAtSavePoint();
    this.mark = null;
    return true;
  }

  /**
   * The buffer now matches what is on disk.
   */
  markSaved(): void {
    this.changed = false;
    this.undo.markSaved();
  }
}
