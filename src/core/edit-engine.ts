/**
 * Edit Engine
 *
 * Applies one logical key to a document. Every key is interpreted in the
 * same editing state; only the line prompt reads keys on its own. Edits
 * record undo information before touching the lines.
 *
 * handleKey never throws: a fault while handling a key comes back as a
 * failed EditResult, which the session shows on the status line.
 */

import type { Document } from './document.ts';
import { leadingSpaces } from './document.ts';
import type { SharedState } from './shared-state.ts';
import type { CommandKey, InputDecoder, KeyEvent } from '../terminal/input.ts';
import { isCommand } from '../terminal/input.ts';
import type { TerminalPort } from '../terminal/port.ts';
import type { Renderer } from '../ui/renderer.ts';
import type { LinePrompt } from '../ui/line-prompt.ts';
import { saveFile } from './file-io.ts';
import { formatError } from './errors.ts';

// ============================================
// Types
// ============================================

/**
 * What the session should do after a key.
 */
export type EditAction =
  | { type: 'continue' }
  | { type: 'close' }
  | { type: 'next' }
  | { type: 'open'; filename: string };

export type EditResult = { ok: true; action: EditAction } | { ok: false; error: string };

export interface EngineContext {
  shared: SharedState;
  renderer: Renderer;
  prompt: LinePrompt;
  input: InputDecoder;
  port: Pick<TerminalPort, 'querySize'>;
}

const CONTINUE: EditAction = { type: 'continue' };

const OPENING_BRACKETS = '([{<';
const CLOSING_BRACKETS = ')]}>';

/** Lines moved by one mouse wheel step */
const WHEEL_LINES = 3;

function assertNever(value: never): never {
  throw new Error(`Unhandled key: ${JSON.stringify(value)}`);
}

function yesNo(value: boolean): string {
  return value ? 'y' : 'n';
}

// ============================================
// EditEngine Class
// ============================================

export class EditEngine {
  constructor(private readonly ctx: EngineContext) {}

  /**
   * Handle one key for the given document.
   */
  async handleKey(doc: Document, event: KeyEvent): Promise<EditResult> {
    try {
      const action = await this.dispatch(doc, event);
      return { ok: true, action };
    } catch (error) {
      return { ok: false, error: formatError(error) };
    }
  }

  private async dispatch(doc: Document, event: KeyEvent): Promise<EditAction> {
    doc.clampCursor();
    switch (event.type) {
      case 'char':
        this.insertChar(doc, event.char);
        return CONTINUE;
      case 'mouse':
        this.pointTo(doc, event.x, event.y, event.toggleMark);
        return CONTINUE;
      case 'command':
        return this.runCommand(doc, event.key);
      default:
        return assertNever(event);
    }
  }

  private async runCommand(doc: Document, key: CommandKey): Promise<EditAction> {
    const { renderer } = this.ctx;

    switch (key) {
      // ─────────────────────────────────────────────────────────────────
      // Movement
      // ─────────────────────────────────────────────────────────────────
      case 'UP':
        doc.cursorLine -= 1;
        break;
      case 'DOWN':
        doc.cursorLine += 1;
        break;
      case 'LEFT':
        if (doc.cursorCol === 0 && doc.cursorLine > 0) {
          doc.cursorLine -= 1;
          doc.cursorCol = doc.currentLine.length;
        } else {
          doc.cursorCol -= 1;
        }
        break;
      case 'RIGHT':
        if (doc.cursorCol >= doc.currentLine.length && doc.cursorLine < doc.lineCount - 1) {
          doc.cursorCol = 0;
          doc.cursorLine += 1;
        } else {
          doc.cursorCol += 1;
        }
        break;
      case 'HOME':
        doc.cursorCol = doc.cursorCol === 0 ? leadingSpaces(doc.currentLine) : 0;
        break;
      case 'END':
        doc.cursorCol = doc.currentLine.length;
        break;
      case 'PAGE_UP':
        doc.cursorLine -= renderer.height;
        break;
      case 'PAGE_DOWN':
        doc.cursorLine += renderer.height;
        break;
      case 'FIRST':
        doc.cursorLine = 0;
        break;
      case 'LAST':
        doc.cursorLine = doc.lineCount - 1;
        doc.row = renderer.height - 1;
        break;
      case 'SCROLL_UP':
        this.scrollUp(doc);
        break;
      case 'SCROLL_DOWN':
        this.scrollDown(doc);
        break;
      case 'MATCH':
        this.matchBracket(doc);
        break;

      // ─────────────────────────────────────────────────────────────────
      // Editing
      // ─────────────────────────────────────────────────────────────────
      case 'ENTER':
        this.newline(doc);
        break;
      case 'BACKSPACE':
        this.backspace(doc);
        break;
      case 'DELETE':
        this.deleteForward(doc);
        break;
      case 'TAB':
        this.tab(doc);
        break;
      case 'BACKTAB':
        this.backtab(doc);
        break;
      case 'UNDO':
        doc.undoLast();
        break;

      // ─────────────────────────────────────────────────────────────────
      // Mark & clipboard
      // ─────────────────────────────────────────────────────────────────
      case 'MARK':
        doc.toggleMark();
        break;
      case 'YANK':
        if (doc.mark !== null) {
          this.ctx.shared.setYank(doc.deleteMarkedLines());
        }
        break;
      case 'DUPLICATE':
        this.duplicate(doc);
        break;
      case 'ZAP':
        this.zap(doc);
        break;

      // ─────────────────────────────────────────────────────────────────
      // Prompted commands
      // ─────────────────────────────────────────────────────────────────
      case 'FIND':
        await this.find(doc);
        break;
      case 'FIND_AGAIN':
        if (this.ctx.shared.findPattern) {
          this.findInDocument(doc, this.ctx.shared.findPattern, doc.cursorCol + 1, doc.lineCount);
          doc.row = renderer.height >> 1;
        }
        break;
      case 'REPLACE':
        await this.replace(doc);
        break;
      case 'GOTO':
        await this.gotoLine(doc);
        break;
      case 'TOGGLE':
        await this.toggleOptions(doc);
        break;
      case 'WRITE':
        await this.write(doc);
        break;
      case 'REDRAW':
        renderer.resize(await this.ctx.port.querySize());
        break;

      // ─────────────────────────────────────────────────────────────────
      // Session
      // ─────────────────────────────────────────────────────────────────
      case 'QUIT':
        return this.quit(doc);
      case 'NEXT':
        return { type: 'next' };
      case 'OPEN': {
        const filename = await this.ctx.prompt.ask('Open file: ', '');
        return filename === null ? CONTINUE : { type: 'open', filename };
      }
      default:
        return assertNever(key);
    }
    return CONTINUE;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Text Editing
  // ─────────────────────────────────────────────────────────────────────────

  private insertChar(doc: Document, char: string): void {
    doc.mark = null;
    const line = doc.currentLine;
    doc.recordUndo(doc.cursorLine, [line], char === ' ' ? 'space' : 'char');
    doc.currentLine = line.slice(0, doc.cursorCol) + char + line.slice(doc.cursorCol);
    doc.cursorCol += char.length;
  }

  /**
   * Split the line at the cursor. With autoindent the new line keeps the
   * indentation, plus one level after a trailing colon.
   */
  private newline(doc: Document): void {
    doc.mark = null;
    const line = doc.currentLine;
    const col = doc.cursorCol;
    doc.recordUndo(doc.cursorLine, [line], 'none', 2);
    doc.currentLine = line.slice(0, col);

    let indent = 0;
    if (doc.options.autoindent) {
      indent = Math.min(leadingSpaces(line), col);
      const code = (line.split('#', 1)[0] ?? '').trimEnd();
      if (code.endsWith(':') && col >= code.length) {
        indent += doc.options.tabSize;
      }
    }

    doc.cursorLine += 1;
    doc.lines.splice(doc.cursorLine, 0, ' '.repeat(indent) + line.slice(col));
    doc.cursorCol = indent;
  }

  private backspace(doc: Document): void {
    if (doc.mark !== null) {
      doc.deleteMarkedLines();
      return;
    }
    const line = doc.currentLine;
    if (doc.cursorCol > 0) {
      doc.recordUndo(doc.cursorLine, [line], 'backspace');
      doc.currentLine = line.slice(0, doc.cursorCol - 1) + line.slice(doc.cursorCol);
      doc.cursorCol -= 1;
    } else if (doc.cursorLine > 0) {
      const previous = doc.lines[doc.cursorLine - 1] ?? '';
      doc.recordUndo(doc.cursorLine - 1, [previous, line], 'none');
      doc.lines.splice(doc.cursorLine - 1, 2, previous + line);
      doc.cursorLine -= 1;
      doc.cursorCol = previous.length;
    }
  }

  private deleteForward(doc: Document): void {
    if (doc.mark !== null) {
      doc.deleteMarkedLines();
      return;
    }
    const line = doc.currentLine;
    if (doc.cursorCol < line.length) {
      doc.recordUndo(doc.cursorLine, [line], 'delete');
      doc.currentLine = line.slice(0, doc.cursorCol) + line.slice(doc.cursorCol + 1);
    } else if (doc.cursorLine + 1 < doc.lineCount) {
      const next = doc.lines[doc.cursorLine + 1] ?? '';
      doc.recordUndo(doc.cursorLine, [line, next], 'none');
      doc.lines.splice(doc.cursorLine, 2, line + next);
    }
  }

  /**
   * Without a mark insert spaces to the next tab stop; with a mark indent
   * every non-empty marked line to its own next stop.
   */
  private tab(doc: Document): void {
    const { tabSize } = doc.options;
    const range = doc.markRange();
    if (range) {
      doc.recordUndo(range.start, doc.lines.slice(range.start, range.end), 'indent', range.end - range.start);
      for (let i = range.start; i < range.end; i++) {
        const line = doc.lines[i] ?? '';
        if (line.length > 0) {
          doc.lines[i] = ' '.repeat(tabSize - (leadingSpaces(line) % tabSize)) + line;
        }
      }
      return;
    }

    const line = doc.currentLine;
    const count = tabSize - (doc.cursorCol % tabSize);
    doc.recordUndo(doc.cursorLine, [line], 'tab');
    doc.currentLine = line.slice(0, doc.cursorCol) + ' '.repeat(count) + line.slice(doc.cursorCol);
    doc.cursorCol += count;
  }

  /**
   * Remove up to one tab stop of indentation. Spaces directly before the
   * cursor go first; otherwise the line's leading spaces are reduced.
   */
  private backtab(doc: Document): void {
    const { tabSize } = doc.options;
    const range = doc.markRange();
    if (range) {
      doc.recordUndo(range.start, doc.lines.slice(range.start, range.end), 'undent', range.end - range.start);
      for (let i = range.start; i < range.end; i++) {
        const line = doc.lines[i] ?? '';
        const spaces = leadingSpaces(line);
        if (spaces > 0) {
          doc.lines[i] = line.slice(((spaces - 1) % tabSize) + 1);
        }
      }
      return;
    }

    const line = doc.currentLine;
    const col = doc.cursorCol;
    const before = leadingSpaces(line, col);
    if (before > 0) {
      const count = Math.min(((col - 1) % tabSize) + 1, before);
      doc.recordUndo(doc.cursorLine, [line], 'backtab');
      doc.currentLine = line.slice(0, col - count) + line.slice(col);
      doc.cursorCol -= count;
      return;
    }

    const indent = Math.min(leadingSpaces(line), col);
    if (indent > 0) {
      const count = ((indent - 1) % tabSize) + 1;
      doc.recordUndo(doc.cursorLine, [line], 'backtab');
      doc.currentLine = line.slice(count);
      doc.cursorCol -= count;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Clipboard
  // ─────────────────────────────────────────────────────────────────────────

  private duplicate(doc: Document): void {
    const range = doc.markRange();
    if (!range) return;
    this.ctx.shared.setYank(doc.lines.slice(range.start, range.end));
    doc.mark = null;
  }

  private zap(doc: Document): void {
    const { yankBuffer } = this.ctx.shared;
    if (yankBuffer.length === 0) return;

    if (doc.mark !== null) {
      doc.deleteMarkedLines();
    }
    doc.recordUndo(doc.cursorLine, null, 'none', -yankBuffer.length);
    doc.lines.splice(doc.cursorLine, 0, ...yankBuffer);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  private pointTo(doc: Document, x: number, y: number, toggleMark: boolean): void {
    if (y < 0 || y >= this.ctx.renderer.height) return;

    doc.cursorCol = Math.max(0, x) + doc.margin;
    doc.cursorLine = y + doc.topLine;
    if (toggleMark) {
      doc.clampCursor();
      doc.toggleMark();
    }
  }

  private scrollUp(doc: Document): void {
    if (doc.topLine === 0) return;
    doc.topLine = Math.max(doc.topLine - WHEEL_LINES, 0);
    doc.cursorLine = Math.min(doc.cursorLine, doc.topLine + this.ctx.renderer.height - 1);
  }

  private scrollDown(doc: Document): void {
    if (doc.topLine + this.ctx.renderer.height >= doc.lineCount) return;
    doc.topLine = Math.min(doc.topLine + WHEEL_LINES, doc.lineCount - 1);
    doc.cursorLine = Math.max(doc.cursorLine, doc.topLine);
  }

  /**
   * Jump from a bracket to its partner at the same nesting level.
   */
  private matchBracket(doc: Document): void {
    const line = doc.currentLine;
    if (doc.cursorCol >= line.length) return;

    const bracket = line.charAt(doc.cursorCol);
    const opening = OPENING_BRACKETS.indexOf(bracket);
    if (opening >= 0) {
      this.scanForward(doc, bracket, CLOSING_BRACKETS.charAt(opening));
      return;
    }
    const closing = CLOSING_BRACKETS.indexOf(bracket);
    if (closing >= 0) {
      this.scanBackward(doc, bracket, OPENING_BRACKETS.charAt(closing));
    }
  }

  private scanForward(doc: Document, bracket: string, partner: string): void {
    let level = 0;
    let start = doc.cursorCol + 1;
    for (let i = doc.cursorLine; i < doc.lineCount; i++) {
      const text = doc.lines[i] ?? '';
      for (let c = start; c < text.length; c++) {
        const char = text.charAt(c);
        if (char === partner) {
          if (level === 0) {
            doc.cursorLine = i;
            doc.cursorCol = c;
            return;
          }
          level--;
        } else if (char === bracket) {
          level++;
        }
      }
      start = 0;
    }
  }

  private scanBackward(doc: Document, bracket: string, partner: string): void {
    let level = 0;
    let start = doc.cursorCol - 1;
    for (let i = doc.cursorLine; i >= 0; i--) {
      const text = doc.lines[i] ?? '';
      for (let c = start; c >= 0; c--) {
        const char = text.charAt(c);
        if (char === partner) {
          if (level === 0) {
            doc.cursorLine = i;
            doc.cursorCol = c;
            return;
          }
          level--;
        } else if (char === bracket) {
          level++;
        }
      }
      if (i > 0) {
        start = (doc.lines[i - 1] ?? '').length - 1;
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Search & Replace
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Search from the cursor line at column `startCol` up to (not including)
   * `endLine`. Moves the cursor to the match and returns the pattern length,
   * or 0 with a status message when nothing matched.
   */
  findInDocument(doc: Document, pattern: string, startCol: number, endLine: number): number {
    this.ctx.shared.findPattern = pattern;
    const { caseSensitive } = doc.options;
    const needle = caseSensitive ? pattern : pattern.toLowerCase();

    let from = startCol;
    for (let line = Math.max(doc.cursorLine, 0); line < endLine; line++) {
      const text = doc.lines[line] ?? '';
      const haystack = caseSensitive ? text : text.toLowerCase();
      const index = haystack.indexOf(needle, from);
      if (index >= 0) {
        doc.cursorLine = line;
        doc.cursorCol = index;
        return pattern.length;
      }
      from = 0;
    }

    doc.message = `No match: ${pattern}`;
    return 0;
  }

  private async find(doc: Document): Promise<void> {
    const pattern = await this.ctx.prompt.ask('Find: ', this.ctx.shared.findPattern);
    if (!pattern) return;
    this.findInDocument(doc, pattern, doc.cursorCol, doc.lineCount);
    doc.row = this.ctx.renderer.height >> 1;
  }

  /**
   * Interactive replace over the marked lines, or from the cursor to the
   * end of the document.
   */
  private async replace(doc: Document): Promise<void> {
    const { shared, prompt, renderer, input } = this.ctx;

    const pattern = await prompt.ask('Replace: ', shared.findPattern);
    if (!pattern) return;
    const replacement = await prompt.ask('With: ', shared.replacePattern);
    if (replacement === null) return;
    shared.replacePattern = replacement;

    const savedLine = doc.cursorLine;
    let endLine = doc.lineCount;
    const range = doc.markRange();
    if (range) {
      doc.cursorLine = range.start;
      doc.cursorCol = 0;
      endLine = range.end;
    }

    let answer = '';
    let count = 0;
    doc.message = 'Replace (yes/No/all/quit) ? ';
    for (;;) {
      const length = this.findInDocument(doc, pattern, doc.cursorCol, endLine);
      if (!length) break;

      if (answer !== 'a') {
        renderer.render(doc);
        const event = await input.readKey();
        if (isCommand(event, 'QUIT')) break;
        answer = event.type === 'char' ? event.char.toLowerCase() : '';
      }
      if (answer === 'q') break;

      if (answer === 'a' || answer === 'y') {
        const line = doc.currentLine;
        doc.recordUndo(doc.cursorLine, [line], 'none');
        doc.currentLine = line.slice(0, doc.cursorCol) + replacement + line.slice(doc.cursorCol + length);
        doc.cursorCol += replacement.length;
        count++;
      } else {
        doc.cursorCol += 1;
      }
    }

    doc.cursorLine = savedLine;
    doc.message = `'${pattern}' replaced ${count} times`;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Other Prompts
  // ─────────────────────────────────────────────────────────────────────────

  private async gotoLine(doc: Document): Promise<void> {
    const answer = await this.ctx.prompt.ask('Goto Line: ', '');
    if (!answer) return;

    const text = answer.trim();
    if (!/^-?\d+$/.test(text)) {
      doc.message = `Not a line number: ${answer}`;
      return;
    }
    doc.cursorLine = parseInt(text, 10) - 1;
    doc.row = this.ctx.renderer.height >> 1;
  }

  /**
   * Flip autoindent, then offer all options on one line:
   * case sensitivity, autoindent, tab size, write tabs. Empty fields keep
   * their value; any malformed field leaves every option unchanged.
   */
  private async toggleOptions(doc: Document): Promise<void> {
    const { options } = doc;
    options.autoindent = !options.autoindent;

    const answer = await this.ctx.prompt.ask(
      `Case Sensitive Search ${yesNo(options.caseSensitive)}, Autoindent ${yesNo(options.autoindent)}, ` +
        `Tab Size ${options.tabSize}, Write Tabs ${yesNo(options.writeTabs)}: `,
      ''
    );
    if (!answer) return;

    const fields = answer.split(',').map((field) => field.trim().toLowerCase());
    const [caseField = '', indentField = '', tabField = '', writeTabsField = ''] = fields;

    let tabSize = options.tabSize;
    if (tabField) {
      if (!/^\d+$/.test(tabField) || parseInt(tabField, 10) < 1) {
        doc.message = `Invalid tab size: ${tabField}`;
        return;
      }
      tabSize = parseInt(tabField, 10);
    }

    if (caseField) options.caseSensitive = caseField.startsWith('y');
    if (indentField) options.autoindent = indentField.startsWith('y');
    options.tabSize = tabSize;
    if (writeTabsField) options.writeTabs = writeTabsField.startsWith('y');
  }

  private async write(doc: Document): Promise<void> {
    const filename = await this.ctx.prompt.ask('Save File: ', doc.filename);
    if (!filename) return;

    await saveFile(filename, doc.lines, { writeTabs: doc.options.writeTabs });
    doc.markSaved();
    if (!doc.filename) {
      doc.filename = filename;
    }
    doc.message = `Saved ${doc.lineCount} lines to ${filename}`;
  }

  private async quit(doc: Document): Promise<EditAction> {
    if (doc.changed) {
      const answer = await this.ctx.prompt.ask('Content changed! Quit without saving (y/N)? ', 'N');
      if (!answer || answer.charAt(0).toUpperCase() !== 'Y') {
        return CONTINUE;
      }
    }
    return { type: 'close' };
  }
}
