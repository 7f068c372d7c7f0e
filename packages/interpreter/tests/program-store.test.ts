import { describe, expect, it } from 'vitest';

import { parseStatement } from '../src/parser';
import { ProgramStore } from '../src/program-store';

function entry(line: number, source: string) {
  return { line, source, statement: parseStatement(source) };
}

describe('ProgramStore', () => {
  it('orders lines numerically regardless of insertion order', () => {
    const store = new ProgramStore();
    store.set(entry(30, 'PRINT 3'));
    store.set(entry(10, 'PRINT 1'));
    store.set(entry(20, 'PRINT 2'));

    expect(store.lines()).toEqual([10, 20, 30]);
    expect(store.entries().map((item) => item.source)).toEqual(['PRINT 1', 'PRINT 2', 'PRINT 3']);
    expect(store.firstLine()).toBe(10);
  });

  it('finds the next stored line strictly after any number', () => {
    const store = new ProgramStore();
    for (const line of [100, 5, 40]) {
      store.set(entry(line, 'END'));
    }

    expect(store.nextLineAfter(0)).toBe(5);
    expect(store.nextLineAfter(5)).toBe(40);
    expect(store.nextLineAfter(17)).toBe(40);
    expect(store.nextLineAfter(40)).toBe(100);
    expect(store.nextLineAfter(100)).toBeNull();
  });

  it('replaces a line typed again without growing', () => {
    const store = new ProgramStore();
    store.set(entry(10, 'PRINT 1'));
    store.set(entry(10, 'PRINT 2'));

    expect(store.size).toBe(1);
    expect(store.get(10)?.source).toBe('PRINT 2');
  });

  it('deletes lines and reports empty programs', () => {
    const store = new ProgramStore();
    store.set(entry(10, 'PRINT 1'));
    store.set(entry(20, 'PRINT 2'));

    expect(store.delete(10)).toBe(true);
    expect(store.delete(10)).toBe(false);
    expect(store.firstLine()).toBe(20);
    expect(store.has(10)).toBe(false);

    store.clear();
    expect(store.size).toBe(0);
    expect(store.firstLine()).toBeNull();
    expect(store.nextLineAfter(0)).toBeNull();
  });
});
