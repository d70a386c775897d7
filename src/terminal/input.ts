/**
 * Raw Terminal Input Decoder
 *
 * Turns the raw byte stream into logical key events, one per call.
 * Escape sequences have no length prefix, so bytes after ESC are collected
 * until a terminator (`~`, or a letter other than the SS3 intermediate `O`)
 * and the whole sequence is looked up.
 */

import type { TerminalPort } from './port.ts';

export type CommandKey =
  | 'UP'
  | 'DOWN'
  | 'LEFT'
  | 'RIGHT'
  | 'HOME'
  | 'END'
  | 'PAGE_UP'
  | 'PAGE_DOWN'
  | 'ENTER'
  | 'BACKSPACE'
  | 'DELETE'
  | 'TAB'
  | 'BACKTAB'
  | 'QUIT'
  | 'WRITE'
  | 'FIND'
  | 'FIND_AGAIN'
  | 'GOTO'
  | 'REPLACE'
  | 'REDRAW'
  | 'UNDO'
  | 'YANK'
  | 'ZAP'
  | 'DUPLICATE'
  | 'MARK'
  | 'FIRST'
  | 'LAST'
  | 'TOGGLE'
  | 'MATCH'
  | 'NEXT'
  | 'OPEN'
  | 'SCROLL_UP'
  | 'SCROLL_DOWN';

export type KeyEvent =
  | { type: 'command'; key: CommandKey }
  | { type: 'char'; char: string }
  /** x/y are 0-indexed screen cells */
  | { type: 'mouse'; x: number; y: number; toggleMark: boolean };

export function commandKey(key: CommandKey): KeyEvent {
  return { type: 'command', key };
}

export function charKey(char: string): KeyEvent {
  return { type: 'char', char };
}

export function isCommand(event: KeyEvent, key: CommandKey): boolean {
  return event.type === 'command' && event.key === key;
}

const ESC_BYTE = 0x1b;

/** Sequence after ESC that announces a three-byte X10 mouse report */
const MOUSE_PREFIX = '[M';

/** Offset added by the terminal to mouse coordinates (32, plus 1-indexing) */
const MOUSE_COORD_OFFSET = 33;

const MOUSE_WHEEL_UP = 0x60;
const MOUSE_WHEEL_DOWN = 0x61;
const MOUSE_RIGHT_BUTTON = 0x22;
const MOUSE_CTRL_LEFT_BUTTON = 0x30;

/** Longest escape sequence collected before it is given up as garbage */
const MAX_SEQUENCE_LENGTH = 16;

// Escape sequences, without the leading ESC, from the terminals in common use
const ESCAPE_SEQUENCES: ReadonlyMap<string, CommandKey> = new Map<string, CommandKey>([
  // Arrow keys
  ['[A', 'UP'],
  ['[B', 'DOWN'],
  ['[C', 'RIGHT'],
  ['[D', 'LEFT'],
  ['OA', 'UP'],
  ['OB', 'DOWN'],
  ['OC', 'RIGHT'],
  ['OD', 'LEFT'],
  // Home/End: Linux console, picocom/minicom, PuTTY, rxvt
  ['[H', 'HOME'],
  ['OH', 'HOME'],
  ['[1~', 'HOME'],
  ['[7~', 'HOME'],
  ['[F', 'END'],
  ['OF', 'END'],
  ['[4~', 'END'],
  ['[8~', 'END'],
  // Page Up/Down
  ['[5~', 'PAGE_UP'],
  ['[6~', 'PAGE_DOWN'],
  // Delete, Shift-Tab
  ['[3~', 'DELETE'],
  ['[Z', 'BACKTAB'],
  // Ctrl-Home, Ctrl-End, Ctrl-Delete
  ['[1;5H', 'FIRST'],
  ['[1;5F', 'LAST'],
  ['[3;5~', 'YANK'],
]);

// Single control bytes
const CONTROL_KEYS: ReadonlyMap<number, CommandKey> = new Map<number, CommandKey>([
  [0x01, 'TOGGLE'],      // Ctrl-A
  [0x02, 'LAST'],        // Ctrl-B
  [0x03, 'QUIT'],        // Ctrl-C
  [0x04, 'DUPLICATE'],   // Ctrl-D
  [0x05, 'REDRAW'],      // Ctrl-E
  [0x06, 'FIND'],        // Ctrl-F
  [0x07, 'GOTO'],        // Ctrl-G
  [0x08, 'BACKSPACE'],   // Ctrl-H
  [0x09, 'TAB'],
  [0x0a, 'ENTER'],       // LF
  [0x0b, 'MATCH'],       // Ctrl-K
  [0x0c, 'MARK'],        // Ctrl-L
  [0x0d, 'ENTER'],       // CR
  [0x0e, 'FIND_AGAIN'],  // Ctrl-N
  [0x0f, 'OPEN'],        // Ctrl-O
  [0x11, 'QUIT'],        // Ctrl-Q
  [0x12, 'REPLACE'],     // Ctrl-R
  [0x13, 'WRITE'],       // Ctrl-S
  [0x14, 'FIRST'],       // Ctrl-T
  [0x15, 'BACKTAB'],     // Ctrl-U
  [0x16, 'ZAP'],         // Ctrl-V
  [0x17, 'NEXT'],        // Ctrl-W
  [0x18, 'YANK'],        // Ctrl-X
  [0x1a, 'UNDO'],        // Ctrl-Z
  [0x7f, 'BACKSPACE'],   // DEL
]);

function isSequenceEnd(byte: number): boolean {
  if (byte === 0x7e /* ~ */) return true;
  if (byte === 0x4f /* O */) return false;
  return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);
}

/**
 * Number of continuation bytes that follow a UTF-8 lead byte, or -1 if the
 * byte cannot start a character.
 */
function utf8Continuations(lead: number): number {
  if (lead >= 0xc2 && lead <= 0xdf) return 1;
  if (lead >= 0xe0 && lead <= 0xef) return 2;
  if (lead >= 0xf0 && lead <= 0xf4) return 3;
  return -1;
}

export class InputDecoder {
  constructor(private readonly port: Pick<TerminalPort, 'readByte'>) {}

  /**
   * Read bytes until they form one logical key.
   * Unknown sequences and unmapped bytes are dropped.
   */
  async readKey(): Promise<KeyEvent> {
    for (;;) {
      const byte = await this.port.readByte(true);

      if (byte === ESC_BYTE) {
        const sequence = await this.readEscapeSequence();
        if (sequence === MOUSE_PREFIX) {
          return this.readMouseReport();
        }
        const key = sequence === null ? undefined : ESCAPE_SEQUENCES.get(sequence);
        if (key) {
          return commandKey(key);
        }
        continue;
      }

      const control = CONTROL_KEYS.get(byte);
      if (control) {
        return commandKey(control);
      }

      if (byte >= 0x20 && byte < 0x7f) {
        return charKey(String.fromCharCode(byte));
      }

      if (byte >= 0x80) {
        const char = await this.readUtf8(byte);
        if (char !== null) {
          return charKey(char);
        }
      }
    }
  }

  /**
   * Collect the bytes following ESC. Returns null for runaway sequences.
   */
  private async readEscapeSequence(): Promise<string | null> {
    let sequence = '';
    for (;;) {
      const byte = await this.port.readByte();
      sequence += String.fromCharCode(byte);
      if (isSequenceEnd(byte)) return sequence;
      if (sequence.length >= MAX_SEQUENCE_LENGTH) return null;
    }
  }

  /**
   * Parse an X10 mouse report: button code, then column and row.
   */
  private async readMouseReport(): Promise<KeyEvent> {
    const button = await this.port.readByte();
    const x = (await this.port.readByte()) - MOUSE_COORD_OFFSET;
    const y = (await this.port.readByte()) - MOUSE_COORD_OFFSET;

    if (button === MOUSE_WHEEL_UP) return commandKey('SCROLL_UP');
    if (button === MOUSE_WHEEL_DOWN) return commandKey('SCROLL_DOWN');

    return {
      type: 'mouse',
      x,
      y,
      toggleMark: button === MOUSE_RIGHT_BUTTON || button === MOUSE_CTRL_LEFT_BUTTON,
    };
  }

  /**
   * Assemble a multi-byte UTF-8 character. Returns null if malformed.
   * Code points outside the BMP are dropped: a column is one UTF-16 unit.
   */
  private async readUtf8(lead: number): Promise<string | null> {
    const count = utf8Continuations(lead);
    if (count < 0) return null;

    let codePoint = lead & (0x3f >> count);
    for (let i = 0; i < count; i++) {
      const byte = await this.port.readByte();
      if ((byte & 0xc0) !== 0x80) return null;
      codePoint = (codePoint << 6) | (byte & 0x3f);
    }

    if (codePoint > 0xffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) return null;
    return String.fromCharCode(codePoint);
  }
}
