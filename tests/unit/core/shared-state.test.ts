/**
 * SharedState Tests
 */

import { describe, test, expect } from 'vitest';
import { SharedState } from '../../../src/core/shared-state.ts';

describe('SharedState', () => {
  test('setYank stores a copy', () => {
    const shared = new SharedState();
    const lines = ['a', 'b'];
    shared.setYank(lines);
    lines.push('c');
    expect(shared.yankBuffer).toEqual(['a', 'b']);
  });

  test('clear resets everything', () => {
    const shared = new SharedState();
    shared.setYank(['a']);
    shared.findPattern = 'x';
    shared.replacePattern = 'y';
    shared.clear();
    expect(shared.yankBuffer).toEqual([]);
    expect(shared.findPattern).toBe('');
    expect(shared.replacePattern).toBe('');
  });
});
