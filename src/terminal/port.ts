/**
 * Terminal Port
 *
 * The capability the editor core needs from a terminal. One implementation
 * is picked at startup; the core never looks at the platform.
 */

import { CURSOR, parseCursorReport } from './ansi.ts';
import { debugLog } from '../debug.ts';

/**
 * Terminal size in character cells.
 */
export interface Size {
  width: number;
  height: number;
}

export const DEFAULT_SIZE: Readonly<Size> = { width: 80, height: 24 };

export interface TerminalPort {
  /**
   * Resolve with the next input byte, waiting until one arrives. Only a read
   * marked `keyStart` may be answered with a redraw after a resize.
   */
  readByte(keyStart?: boolean): Promise<number>;
  /** Whether a byte can be read without waiting */
  hasPendingInput(): boolean;
  /** Pass output straight through to the device */
  write(data: string): void;
  /** Current terminal size */
  querySize(): Promise<Size>;
  /** Switch the device to unbuffered, unechoed input */
  enterRawMode(): void;
  /** Restore the device to the state before enterRawMode */
  leaveRawMode(): void;
}

/** Upper bound on a cursor report */
const MAX_REPORT_LENGTH = 32;

/**
 * Ask the terminal for its size by parking the cursor in the far corner and
 * requesting a cursor position report.
 */
export async function queryScreenSize(port: Pick<TerminalPort, 'readByte' | 'write'>): Promise<Size> {
  port.write(CURSOR.farCorner + CURSOR.report);

  let reply = '';
  for (;;) {
    const byte = await port.readByte();
    reply += String.fromCharCode(byte);
    if (byte === 0x52 /* R */ || reply.length >= MAX_REPORT_LENGTH) break;
  }

  const position = parseCursorReport(reply);
  if (!position || position.row < 2 || position.col < 1) {
    debugLog(`[Terminal] Unusable cursor report ${JSON.stringify(reply)}, assuming 80x24`);
    return { ...DEFAULT_SIZE };
  }
  return { width: position.col, height: position.row };
}
