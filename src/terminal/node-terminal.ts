/**
 * Node.js Terminal
 *
 * TerminalPort over a TTY input stream and a TTY output stream. Incoming
 * chunks are split into a byte queue; readers wait on the queue. A resize of
 * the output is turned into a synthetic Ctrl-E (redraw) byte so that it is
 * handled on the normal key path instead of re-entering the renderer. The
 * redraw is only handed to a read that starts a key, never inside one.
 */

import { queryScreenSize, type Size, type TerminalPort } from './port.ts';
import { debugLog } from '../debug.ts';

/** Byte the input decoder maps to the redraw command */
export const REDRAW_BYTE = 0x05;

export interface TerminalInputStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutputStream {
  isTTY?: boolean;
  rows?: number;
  columns?: number;
  write(data: string): unknown;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

interface Waiter {
  resolve: (byte: number) => void;
  keyStart: boolean;
}

export class NodeTerminal implements TerminalPort {
  private queue: number[] = [];
  private waiters: Waiter[] = [];
  private redrawPending = false;
  private isRaw = false;

  private readonly handleData = (chunk: Buffer): void => {
    for (const byte of chunk) {
      this.push(byte);
    }
  };

  private readonly handleResize = (): void => {
    debugLog('[Terminal] Resize');
    const waiter = this.waiters[0];
    if (waiter?.keyStart) {
      this.waiters.shift();
      waiter.resolve(REDRAW_BYTE);
    } else {
      this.redrawPending = true;
    }
  };

  constructor(
    private readonly input: TerminalInputStream = process.stdin,
    private readonly output: TerminalOutputStream = process.stdout
  ) {}

  enterRawMode(): void {
    if (this.isRaw) return;
    this.isRaw = true;

    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.on('data', this.handleData);
    this.input.resume();
    this.output.on('resize', this.handleResize);
  }

  leaveRawMode(): void {
    if (!this.isRaw) return;
    this.isRaw = false;

    this.output.off('resize', this.handleResize);
    this.input.off('data', this.handleData);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
  }

  readByte(keyStart: boolean = false): Promise<number> {
    if (keyStart && this.redrawPending) {
      this.redrawPending = false;
      return Promise.resolve(REDRAW_BYTE);
    }
    const byte = this.queue.shift();
    if (byte !== undefined) {
      return Promise.resolve(byte);
    }
    return new Promise((resolve) => {
      this.waiters.push({ resolve, keyStart });
    });
  }

  hasPendingInput(): boolean {
    return this.redrawPending || this.queue.length > 0;
  }

  write(data: string): void {
    this.output.write(data);
  }

  async querySize(): Promise<Size> {
    const { rows, columns } = this.output;
    if (this.output.isTTY && rows && columns) {
      return { width: columns, height: rows };
    }
    return queryScreenSize(this);
  }

  private push(byte: number): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(byte);
    } else {
      this.queue.push(byte);
    }
  }
}
