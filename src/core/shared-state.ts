/**
 * Shared Clipboard & Search State
 *
 * Owned by the session and handed to the edit engine by reference, so that
 * cut lines and the last search survive switching between buffers.
 */

export class SharedState {
  /** Lines from the last yank or duplicate */
  yankBuffer: string[] = [];
  /** Last pattern used by find or replace */
  findPattern = '';
  /** Last replacement text */
  replacePattern = '';

  setYank(lines: readonly string[]): void {
    this.yankBuffer = [...lines];
  }

  clear(): void {
    this.yankBuffer = [];
    this.findPattern = '';
    this.replacePattern = '';
  }
}
