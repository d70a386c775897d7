/**
 * ANSI Escape Code Constants
 *
 * The VT100 subset the editor emits. Nothing beyond this vocabulary is
 * written, so the editor runs on plain serial terminals.
 */

// Control characters
export const ESC = '\x1b';
export const CSI = `${ESC}[`;  // Control Sequence Introducer

// Cursor control
export const CURSOR = {
  hide: `${CSI}?25l`,
  show: `${CSI}?25h`,
  // Position: row and col are 0-indexed here, 1-indexed on the wire
  moveTo: (row: number, col: number) => `${CSI}${row + 1};${col + 1}H`,
  // Parked far away so the cursor report returns the screen size
  farCorner: `${CSI}999;999H`,
  report: `${CSI}6n`,
};

// Screen control
export const SCREEN = {
  clearToEnd: `${CSI}0K`,
  setScrollRegion: (bottom: number) => `${CSI}1;${bottom}r`,
  resetScrollRegion: `${CSI}r`,
  /** Scroll the region up one line when the cursor is on its last row */
  index: `${ESC}D`,
  /** Scroll the region down one line when the cursor is on its first row */
  reverseIndex: `${ESC}M`,
};

// Attribute sets
export const STYLE = {
  plain: `${CSI}0m`,
  status: `${CSI}1;47m`,
  selection: `${CSI}43m`,
};

// Mouse tracking (X10 mode: press reports only)
export const MOUSE = {
  enableBasic: `${CSI}?9h`,
  disableBasic: `${CSI}?9l`,
};

/**
 * Parse a cursor position report (ESC [ row ; col R).
 */
export function parseCursorReport(report: string): { row: number; col: number } | null {
  const match = /\x1b\[(\d+);(\d+)R$/.exec(report);
  if (!match) return null;
  return { row: parseInt(match[1] ?? '0', 10), col: parseInt(match[2] ?? '0', 10) };
}
