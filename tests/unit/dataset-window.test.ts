/**
 * Unit Tests for DatasetWindow
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DatasetWindow } from '../../src/dataset/dataset-window.js';
import { IndexOutOfRangeError } from '../../src/core/errors.js';

describe('DatasetWindow', () => {
  let window: DatasetWindow<string>;

  beforeEach(() => {
    window = new DatasetWindow<string>();
    window.replaceContents(['a', 'b', 'c']);
  });

  describe('insertAt', () => {
    it('should insert before the given position', () => {
      window.insertAt(1, 'x');
      expect(window.toArray()).toEqual(['a', 'x', 'b', 'c']);
    });

    it('should append at index equal to length', () => {
      window.insertAt(3, 'x');
      expect(window.toArray()).toEqual(['a', 'b', 'c', 'x']);
    });

    it('should reject positions outside 0..length and leave the rows untouched', () => {
      expect(() => window.insertAt(4, 'x')).toThrow(
        'Cannot insert at 4: index must be between 0 and 3'
      );
      expect(() => window.insertAt(-1, 'x')).toThrow(IndexOutOfRangeError);
      expect(window.toArray()).toEqual(['a', 'b', 'c']);
    });
  });

  describe('replace', () => {
    it('should overwrite the row in place', () => {
      window.replace(2, 'z');
      expect(window.toArray()).toEqual(['a', 'b', 'z']);
    });

    it('should reject out-of-range and negative positions', () => {
      expect(() => window.replace(3, 'z')).toThrow('Index 3 is out of range for a dataset of 3 items');
      expect(() => window.replace(-1, 'z')).toThrow(IndexOutOfRangeError);
    });
  });

  describe('removeAt', () => {
    it('should remove and return the row, shifting later rows down', () => {
      expect(window.removeAt(0)).toBe('a');
      expect(window.toArray()).toEqual(['b', 'c']);
      expect(window.at(0)).toBe('b');
    });

    it('should reject out-of-range positions', () => {
      expect(() => window.removeAt(3)).toThrow(IndexOutOfRangeError);
      expect(window.length).toBe(3);
    });
  });

  describe('replaceContents', () => {
    it('should truncate when the new page is shorter', () => {
      window.replaceContents(['p']);
      expect(window.toArray()).toEqual(['p']);
    });

    it('should append the remainder when the new page is longer', () => {
      window.replaceContents(['p', 'q', 'r', 's']);
      expect(window.toArray()).toEqual(['p', 'q', 'r', 's']);
    });

    it('should empty the window for an empty page', () => {
      window.replaceContents([]);
      expect(window.length).toBe(0);
    });
  });

  it('should look rows up by position', () => {
    expect(window.lookup(1)).toEqual({ found: true, item: 'b' });
    expect(window.lookup(3)).toEqual({ found: false });
    expect(window.at(-1)).toBeUndefined();
  });

  it('should find rows by identity', () => {
    expect(window.indexOf('c')).toBe(2);
    expect(window.indexOf('missing')).toBe(-1);
  });

  it('should find the first row equal under a custom equality', () => {
    const records = new DatasetWindow<{ id: number; tag: string }>();
    records.replaceContents([
      { id: 1, tag: 'x' },
      { id: 2, tag: 'y' },
      { id: 2, tag: 'z' },
    ]);

    expect(records.indexOf({ id: 2, tag: 'other' })).toBe(-1);
    expect(records.indexOf({ id: 2, tag: 'other' }, (a, b) => a.id === b.id)).toBe(1);
  });

  it('should hand out a copy of its rows', () => {
    const rows = window.toArray();
    rows.push('mutated');
    expect(window.length).toBe(3);
  });
});
