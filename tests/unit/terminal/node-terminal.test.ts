/**
 * NodeTerminal Tests
 *
 * Streams are EventEmitters standing in for process.stdin/stdout.
 */

import { EventEmitter } from 'events';
import { describe, test, expect, beforeEach } from 'vitest';
import {
  NodeTerminal,
  REDRAW_BYTE,
  type TerminalInputStream,
  type TerminalOutputStream,
} from '../../../src/terminal/node-terminal.ts';
import { InputDecoder, charKey, commandKey } from '../../../src/terminal/input.ts';

// ============================================
// Test Setup
// ============================================

class FakeInput extends EventEmitter implements TerminalInputStream {
  isTTY = true;
  rawModes: boolean[] = [];
  paused = true;

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

class FakeOutput extends EventEmitter implements TerminalOutputStream {
  isTTY = true;
  rows = 30;
  columns = 100;
  written = '';

  write(data: string): boolean {
    this.written += data;
    return true;
  }
}

// ============================================
// Tests
// ============================================

describe('NodeTerminal', () => {
  let input: FakeInput;
  let output: FakeOutput;
  let terminal: NodeTerminal;

  beforeEach(() => {
    input = new FakeInput();
    output = new FakeOutput();
    terminal = new NodeTerminal(input, output);
  });

  test('enters and leaves raw mode once', () => {
    terminal.enterRawMode();
    terminal.enterRawMode();
    expect(input.rawModes).toEqual([true]);
    expect(input.paused).toBe(false);

    terminal.leaveRawMode();
    terminal.leaveRawMode();
    expect(input.rawModes).toEqual([true, false]);
    expect(input.paused).toBe(true);
    expect(input.listenerCount('data')).toBe(0);
    expect(output.listenerCount('resize')).toBe(0);
  });

  test('queues bytes from data chunks', async () => {
    terminal.enterRawMode();
    input.emit('data', Buffer.from('ab'));

    expect(terminal.hasPendingInput()).toBe(true);
    expect(await terminal.readByte()).toBe(0x61);
    expect(await terminal.readByte()).toBe(0x62);
    expect(terminal.hasPendingInput()).toBe(false);
  });

  test('a waiting read resolves when data arrives', async () => {
    terminal.enterRawMode();
    const pending = terminal.readByte();
    input.emit('data', Buffer.from([0x7a]));
    expect(await pending).toBe(0x7a);
  });

  test('a resize is delivered once, ahead of pending input', async () => {
    terminal.enterRawMode();
    input.emit('data', Buffer.from('x'));
    output.emit('resize');
    output.emit('resize');

    expect(await terminal.readByte(true)).toBe(REDRAW_BYTE);
    expect(await terminal.readByte(true)).toBe(0x78);
    expect(terminal.hasPendingInput()).toBe(false);
  });

  test('a pending resize counts as pending input', () => {
    terminal.enterRawMode();
    output.emit('resize');
    expect(terminal.hasPendingInput()).toBe(true);
  });

  test('a resize wakes a read waiting for a new key', async () => {
    terminal.enterRawMode();
    const pending = terminal.readByte(true);
    output.emit('resize');
    expect(await pending).toBe(REDRAW_BYTE);
  });

  test('a resize in the middle of a key waits for the next key', async () => {
    terminal.enterRawMode();
    const pending = terminal.readByte();
    output.emit('resize');
    input.emit('data', Buffer.from('y'));

    expect(await pending).toBe(0x79);
    expect(await terminal.readByte(true)).toBe(REDRAW_BYTE);
  });

  test('an escape sequence split by a resize still decodes', async () => {
    terminal.enterRawMode();
    const decoder = new InputDecoder(terminal);

    const first = decoder.readKey();
    input.emit('data', Buffer.from([0x1b]));
    await flush();
    output.emit('resize');
    input.emit('data', Buffer.from('[Ax'));

    expect(await first).toEqual(commandKey('UP'));
    expect(await decoder.readKey()).toEqual(commandKey('REDRAW'));
    expect(await decoder.readKey()).toEqual(charKey('x'));
  });

  test('write passes output through', () => {
    terminal.write('\x1b[0K');
    expect(output.written).toBe('\x1b[0K');
  });

  test('querySize uses the TTY dimensions', async () => {
    expect(await terminal.querySize()).toEqual({ width: 100, height: 30 });
  });

  test('querySize asks the terminal when output is not a TTY', async () => {
    output.isTTY = false;
    terminal.enterRawMode();
    const size = terminal.querySize();
    input.emit('data', Buffer.from('\x1b[50;132R'));

    expect(await size).toEqual({ width: 132, height: 50 });
    expect(output.written).toBe('\x1b[999;999H\x1b[6n');
  });
});
