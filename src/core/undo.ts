/**
 * Undo Log
 *
 * Bounded history of line-level edit records. Each record describes how to
 * put the lines back:
 *
 *   span >= 0  the `span` lines at `line` replace themselves with `lines`
 *   span <  0  `-span` lines were inserted at `line` and are removed again
 *
 * Consecutive records with the same non-trivial merge key on the same line
 * coalesce, so a run of typing undoes in one step.
 */

/**
 * What produced a record. 'none' never coalesces.
 */
export type UndoMergeKey =
  | 'none'
  | 'char'
  | 'space'
  | 'backspace'
  | 'delete'
  | 'tab'
  | 'backtab'
  | 'indent'
  | 'undent';

export interface UndoRecord {
  readonly line: number;
  readonly span: number;
  readonly lines: readonly string[] | null;
  readonly mergeKey: UndoMergeKey;
  /** Cursor column when the record was taken */
  readonly column: number;
}

export class UndoLog {
  private records: UndoRecord[] = [];
  /** Record count at the last save; may go negative once history is dropped */
  private zeroPoint = 0;
  readonly limit: number;

  constructor(limit: number) {
    this.limit = Math.max(0, Math.floor(limit));
  }

  get size(): number {
    return this.records.length;
  }

  get enabled(): boolean {
    return this.limit > 0;
  }

  /**
   * Add a record. Returns false when it was merged into the previous one
   * or when undo is disabled.
   */
  push(record: UndoRecord): boolean {
    if (!this.enabled || this.mergesWithLast(record)) {
      return false;
    }
    if (this.records.length >= this.limit) {
      this.records.shift();
      this.zeroPoint--;
    }
    this.records.push(record);
    return true;
  }

  pop(): UndoRecord | undefined {
    return this.records.pop();
  }

  peek(): UndoRecord | undefined {
    return this.records[this.records.length - 1];
  }

  /**
   * Remember the current depth as the saved state.
   */
  markSaved(): void {
    this.zeroPoint = this.records.length;
  }

  isAtSavePoint(): boolean {
    return this.records.length === this.zeroPoint;
  }

  private mergesWithLast(record: UndoRecord): boolean {
    const last = this.peek();
    return (
      last !== undefined &&
      record.mergeKey !== 'none' &&
      last.mergeKey === record.mergeKey &&
      last.line === record.line
    );
  }
}
