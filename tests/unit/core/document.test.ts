/**
 * Document Tests
 */

import { describe, test, expect } from 'vitest';
import { Document, leadingSpaces } from '../../../src/core/document.ts';
import { TEST_OPTIONS } from '../../helpers/editor-harness.ts';

function createDocument(lines: string[] = []): Document {
  return new Document(TEST_OPTIONS, lines);
}

describe('leadingSpaces', () => {
  test('counts indentation', () => {
    expect(leadingSpaces('    x')).toBe(4);
    expect(leadingSpaces('x  ')).toBe(0);
    expect(leadingSpaces('')).toBe(0);
  });

  test('counts spaces directly before a position', () => {
    expect(leadingSpaces('ab   cd', 5)).toBe(3);
    expect(leadingSpaces('ab   cd', 4)).toBe(2);
    expect(leadingSpaces('ab   cd', 2)).toBe(0);
  });
});

describe('Document', () => {
  test('an empty document holds one empty line', () => {
    const doc = createDocument();
    expect(doc.lines).toEqual(['']);
    expect(doc.lineCount).toBe(1);
    doc.setLines([]);
    expect(doc.lines).toEqual(['']);
  });

  test('copies its options', () => {
    const options = { ...TEST_OPTIONS };
    const doc = new Document(options);
    doc.options.tabSize = 8;
    expect(options.tabSize).toBe(4);
  });

  describe('clampCursor', () => {
    test('pulls the cursor into the text', () => {
      const doc = createDocument(['abc', 'de']);
      doc.cursorLine = 5;
      doc.cursorCol = 10;
      doc.clampCursor();
      expect([doc.cursorLine, doc.cursorCol]).toEqual([1, 2]);

      doc.cursorLine = -3;
      doc.cursorCol = -1;
      doc.clampCursor();
      expect([doc.cursorLine, doc.cursorCol]).toEqual([0, 0]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Viewport
  // ─────────────────────────────────────────────────────────────────────────

  describe('updateViewport', () => {
    const lines = Array.from({ length: 100 }, (_, i) => `line ${i}`);

    test('keeps the window when the cursor is inside it', () => {
      const doc = createDocument(lines);
      doc.cursorLine = 5;
      doc.updateViewport(80, 10);
      expect(doc.topLine).toBe(0);
      expect(doc.row).toBe(5);
    });

    test('scrolls so the cursor keeps its row', () => {
      const doc = createDocument(lines);
      doc.row = 3;
      doc.cursorLine = 50;
      doc.updateViewport(80, 10);
      expect(doc.topLine).toBe(47);
      expect(doc.row).toBe(3);
    });

    test('clamps the requested row to the window', () => {
      const doc = createDocument(lines);
      doc.row = 20;
      doc.cursorLine = 50;
      doc.updateViewport(80, 10);
      expect(doc.topLine).toBe(41);
      expect(doc.row).toBe(9);
    });

    test('scrolls right with a quarter window of context', () => {
      const doc = createDocument(['x'.repeat(200)]);
      doc.cursorCol = 100;
      doc.updateViewport(40, 10);
      expect(doc.margin).toBe(70);

      doc.cursorCol = 65;
      doc.updateViewport(40, 10);
      expect(doc.margin).toBe(55);

      doc.cursorCol = 5;
      doc.updateViewport(40, 10);
      expect(doc.margin).toBe(0);
    });

    test('keeps the cursor inside the window for any position', () => {
      const doc = createDocument(lines.map((line) => line.repeat(20)));
      for (const [line, col] of [[0, 0], [99, 150], [40, 3], [7, 139], [60, 80]]) {
        doc.cursorLine = line;
        doc.cursorCol = col;
        doc.updateViewport(40, 12);
        expect(doc.topLine).toBeLessThanOrEqual(doc.cursorLine);
        expect(doc.cursorLine).toBeLessThan(doc.topLine + 12);
        expect(doc.margin).toBeLessThanOrEqual(doc.cursorCol);
        expect(doc.cursorCol).toBeLessThan(doc.margin + 40);
      }
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Mark
  // ─────────────────────────────────────────────────────────────────────────

  describe('mark', () => {
    test('range covers mark and cursor in either order', () => {
      const doc = createDocument(['a', 'b', 'c', 'd']);
      expect(doc.markRange()).toBeNull();

      doc.toggleMark();
      doc.cursorLine = 2;
      expect(doc.markRange()).toEqual({ start: 0, end: 3 });

      doc.mark = 3;
      doc.cursorLine = 1;
      expect(doc.markRange()).toEqual({ start: 1, end: 4 });
      expect(doc.isMarked(0)).toBe(false);
      expect(doc.isMarked(3)).toBe(true);
    });

    test('toggle clears an existing mark', () => {
      const doc = createDocument(['a']);
      doc.toggleMark();
      expect(doc.mark).toBe(0);
      doc.toggleMark();
      expect(doc.mark).toBeNull();
    });

    test('deleteMarkedLines removes the range and returns it', () => {
      const doc = createDocument(['a', 'b', 'c', 'd']);
      doc.mark = 1;
      doc.cursorLine = 2;

      expect(doc.deleteMarkedLines()).toEqual(['b', 'c']);
      expect(doc.lines).toEqual(['a', 'd']);
      expect(doc.cursorLine).toBe(1);
      expect(doc.mark).toBeNull();
      expect(doc.changed).toBe(true);
    });

    test('undo restores deleted lines in place', () => {
      const doc = createDocument(['a', 'b', 'c', 'd']);
      doc.mark = 3;
      doc.cursorLine = 2;
      doc.deleteMarkedLines();
      expect(doc.lines).toEqual(['a', 'b']);

      doc.undoLast();
      expect(doc.lines).toEqual(['a', 'b', 'c', 'd']);
    });

    test('deleting every line leaves one empty line, and undo restores them', () => {
      const doc = createDocument(['a', 'b']);
      doc.mark = 0;
      doc.cursorLine = 1;
      doc.deleteMarkedLines();
      expect(doc.lines).toEqual(['']);

      doc.undoLast();
      expect(doc.lines).toEqual(['a', 'b']);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Undo
  // ─────────────────────────────────────────────────────────────────────────

  describe('undo', () => {
    test('restores replaced lines and the cursor', () => {
      const doc = createDocument(['hello']);
      doc.cursorCol = 2;
      doc.recordUndo(0, ['hello'], 'none');
      doc.currentLine = 'HELLO';
      doc.cursorCol = 5;

      expect(doc.undoLast()).toBe(true);
      expect(doc.lines).toEqual(['hello']);
      expect(doc.cursorCol).toBe(2);
    });

    test('removes inserted lines for a negative span', () => {
      const doc = createDocument(['a', 'd']);
      doc.cursorLine = 1;
      doc.recordUndo(1, null, 'none', -2);
      doc.lines.splice(1, 0, 'b', 'c');

      doc.undoLast();
      expect(doc.lines).toEqual(['a', 'd']);
    });

    test('leaves the cursor alone for block indent records', () => {
      const doc = createDocument(['a', 'b']);
      doc.recordUndo(0, ['a', 'b'], 'indent', 2);
      doc.lines = ['    a', '    b'];
      doc.cursorLine = 1;
      doc.cursorCol = 3;

      doc.undoLast();
      expect(doc.lines).toEqual(['a', 'b']);
      expect([doc.cursorLine, doc.cursorCol]).toEqual([1, 3]);
    });

    test('returns false with nothing to undo', () => {
      expect(createDocument(['a']).undoLast()).toBe(false);
    });

    test('changed clears when undo reaches the save point', () => {
      const doc = createDocument(['a']);
      doc.recordUndo(0, ['a'], 'none');
      doc.currentLine = 'b';
      doc.markSaved();
      expect(doc.changed).toBe(false);

      doc.recordUndo(0, ['b'], 'none');
      doc.currentLine = 'c';
      expect(doc.changed).toBe(true);

      doc.undoLast();
      expect(doc.changed).toBe(false);
      doc.undoLast();
      expect(doc.changed).toBe(true);
    });

    test('edits still mark the document changed with undo disabled', () => {
      const doc = new Document({ ...TEST_OPTIONS, undoLimit: 0 }, ['a']);
      doc.recordUndo(0, ['a'], 'char');
      expect(doc.changed).toBe(true);
      expect(doc.undoLast()).toBe(false);
    });
  });
});
