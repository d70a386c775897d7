/**
 * Screen Renderer
 *
 * Draws a document's window and status line with VT100 sequences.
 * Keeps the last frame, one cell per text row, and only rewrites rows whose
 * text or highlight changed. While the scroll region is set, a small move of
 * the window scrolls the terminal and only the uncovered rows are drawn.
 * The status line is repainted on every pass. Each pass is collected and
 * written with a single output call.
 */

import type { Document } from '../core/document.ts';
import type { Size } from '../terminal/port.ts';
import { CURSOR, MOUSE, SCREEN, STYLE } from '../terminal/ansi.ts';

// ============================================
// Types
// ============================================

export interface RowCell {
  highlighted: boolean;
  text: string;
}

export interface RendererOptions {
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Enable X10 mouse reporting while running */
  mouseReporting?: boolean;
}

/** Never equal to a real cell: NUL cannot appear in a line */
const INVALID_CELL: Readonly<RowCell> = { highlighted: false, text: '\0' };
const EMPTY_CELL: Readonly<RowCell> = { highlighted: false, text: '' };

/** Columns the status line reserves for the row/col fields */
const STATUS_RESERVED = 25;

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private frame: RowCell[] = [];
  /** Window origin of the last frame, null when the frame is invalid */
  private frameTop: number | null = null;
  private frameMargin = 0;
  private _width: number;
  private _height: number;
  private output: (data: string) => void;
  private mouseReporting: boolean;
  private initialized = false;

  constructor(size: Size, options: RendererOptions = {}) {
    this._width = size.width;
    this._height = Math.max(1, size.height - 1);
    this.output = options.output ?? ((data: string) => process.stdout.write(data));
    this.mouseReporting = options.mouseReporting ?? true;
    this.invalidate();
  }

  /** Text columns */
  get width(): number {
    return this._width;
  }

  /** Text rows; the terminal's last row is the status line */
  get height(): number {
    return this._height;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Protect the status line from scrolling and enable mouse reports.
   */
  initialize(): void {
    if (this.initialized) return;

    let initSequence = SCREEN.setScrollRegion(this._height);
    if (this.mouseReporting) {
      initSequence += MOUSE.enableBasic;
    }
    this.output(initSequence);
    this.initialized = true;
  }

  /**
   * Restore the terminal: full scroll region, empty status line, plain
   * attributes, visible cursor.
   */
  cleanup(): void {
    if (!this.initialized) return;

    let cleanupSequence = SCREEN.resetScrollRegion;
    if (this.mouseReporting) {
      cleanupSequence += MOUSE.disableBasic;
    }
    cleanupSequence += CURSOR.moveTo(this._height, 0) + STYLE.plain + SCREEN.clearToEnd + CURSOR.show;

    this.output(cleanupSequence);
    this.initialized = false;
  }

  /**
   * Adopt a new terminal size and force a full repaint.
   */
  resize(size: Size): void {
    this._width = size.width;
    this._height = Math.max(1, size.height - 1);
    if (this.initialized) {
      this.output(SCREEN.setScrollRegion(this._height));
    }
    this.invalidate();
  }

  /**
   * Forget the last frame so the next pass repaints every row.
   */
  invalidate(): void {
    this.frame = Array.from({ length: this._height }, () => ({ ...INVALID_CELL }));
    this.frameTop = null;
  }

  /**
   * The cell last drawn on a row (for tests and diagnostics).
   */
  getRow(row: number): RowCell | null {
    const cell = this.frame[row];
    return cell ? { ...cell } : null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Bring the screen up to date with the document.
   */
  render(doc: Document): void {
    doc.updateViewport(this._width, this._height);

    let output = CURSOR.hide + this.scroll(doc);
    for (let row = 0; row < this._height; row++) {
      output += this.renderRow(doc, row);
    }
    output += this.statusLine(doc);
    output += CURSOR.moveTo(doc.row, doc.cursorCol - doc.margin) + CURSOR.show;

    this.frameTop = doc.topLine;
    this.frameMargin = doc.margin;
    this.output(output);
  }

  /**
   * Write raw output, e.g. for a prompt on the status line.
   */
  write(data: string): void {
    this.output(data);
  }

  /**
   * Scroll the terminal to follow the window and shift the last frame to
   * match. Needs the scroll region, which keeps the status line in place.
   */
  private scroll(doc: Document): string {
    if (!this.initialized || this.frameTop === null || doc.margin !== this.frameMargin) {
      return '';
    }

    const delta = doc.topLine - this.frameTop;
    const count = Math.abs(delta);
    if (count === 0 || count >= this._height) return '';

    const blank = Array.from({ length: count }, () => ({ ...EMPTY_CELL }));
    if (delta > 0) {
      this.frame = [...this.frame.slice(count), ...blank];
      return CURSOR.moveTo(this._height - 1, 0) + SCREEN.index.repeat(count);
    }
    this.frame = [...blank, ...this.frame.slice(0, this._height - count)];
    return CURSOR.moveTo(0, 0) + SCREEN.reverseIndex.repeat(count);
  }

  private renderRow(doc: Document, row: number): string {
    const lineIndex = doc.topLine + row;
    const cell: RowCell =
      lineIndex < doc.lineCount
        ? {
            highlighted: doc.isMarked(lineIndex),
            text: (doc.lines[lineIndex] ?? '').slice(doc.margin, doc.margin + this._width),
          }
        : EMPTY_CELL;

    const previous = this.frame[row];
    if (previous && previous.highlighted === cell.highlighted && previous.text === cell.text) {
      return '';
    }
    this.frame[row] = { ...cell };

    let output = CURSOR.moveTo(row, 0);
    if (cell.highlighted) output += STYLE.selection;
    output += cell.text;
    if (cell.text.length < this._width) output += SCREEN.clearToEnd;
    if (cell.highlighted) output += STYLE.plain;
    return output;
  }

  private statusLine(doc: Document): string {
    const room = Math.max(0, this._width - STATUS_RESERVED - doc.filename.length);
    const text =
      `${doc.changed ? '*' : ''}${doc.filename} Row: ${doc.cursorLine + 1}/${doc.lineCount}` +
      ` Col: ${doc.cursorCol + 1}  ${doc.message.slice(0, room)}`;

    return (
      CURSOR.moveTo(this._height, 0) +
      STYLE.status +
      text.slice(0, this._width) +
      SCREEN.clearToEnd +
      STYLE.plain
    );
  }
}

// ============================================
// Factory Functions
// ============================================

/**
 * Create a renderer that captures output (for testing).
 */
export function createTestRenderer(
  size: Size
): { renderer: Renderer; getOutput: () => string; clearOutput: () => void } {
  let captured = '';

  const renderer = new Renderer(size, {
    output: (data: string) => {
      captured += data;
    },
    mouseReporting: false,
  });

  return {
    renderer,
    getOutput: () => captured,
    clearOutput: () => {
      captured = '';
    },
  };
}
