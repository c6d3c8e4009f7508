/**
 * Unit Tests - Cell Data Parser
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { parseCellData } from '../../../src/layout/cell-data-parser.js';
import { CellDataParseError } from '../../../src/grid/errors.js';

describe('parseCellData', () => {
  let ids: Map<string, number>;
  const intern = (name: string): number => {
    let id = ids.get(name);
    if (id === undefined) {
      id = ids.size;
      ids.set(name, id);
    }
    return id;
  };

  beforeEach(() => {
    ids = new Map();
  });

  it('should parse sizes and growth between grid lines', () => {
    expect(parseCellData('a 10 b 5+1 c', intern)).toEqual([
      { kind: 'width', start: 0, end: 1, size: 10 },
      { kind: 'width', start: 1, end: 2, size: 5 },
      { kind: 'growth', start: 1, end: 2, growth: 1 },
    ]);
    expect([...ids.keys()]).toEqual(['a', 'b', 'c']);
  });

  it('should place the previous grid line', () => {
    expect(parseCellData('a =5 10 b', intern)).toEqual([
      { kind: 'place', node: 0, position: 5 },
      { kind: 'width', start: 0, end: 1, size: 10 },
    ]);
  });

  it('should read several items from one token', () => {
    expect(parseCellData('a 10+2=3 b', intern)).toEqual([
      { kind: 'place', node: 0, position: 3 },
      { kind: 'width', start: 0, end: 1, size: 10 },
      { kind: 'growth', start: 0, end: 1, growth: 2 },
    ]);
  });

  it('should accept decimals and extra whitespace', () => {
    expect(parseCellData('  a   1.5  b ', intern)).toEqual([
      { kind: 'width', start: 0, end: 1, size: 1.5 },
    ]);
  });

  it('should emit nothing for adjacent grid lines', () => {
    expect(parseCellData('a b', intern)).toEqual([]);
    expect(parseCellData('', intern)).toEqual([]);
  });

  it('should reuse interned grid lines', () => {
    parseCellData('a 10 b', intern);

    expect(parseCellData('b 5 a2', intern)).toEqual([{ kind: 'width', start: 1, end: 2, size: 5 }]);
  });

  it('should reject data before the first grid line', () => {
    expect(() => parseCellData('10 a', intern)).toThrow(CellDataParseError);
  });

  it('should reject data after the last grid line', () => {
    expect(() => parseCellData('a 10', intern)).toThrow(CellDataParseError);
  });

  it('should reject a malformed data token', () => {
    expect(() => parseCellData('a 10x b', intern)).toThrow(CellDataParseError);
  });

  it('should reject grid line names with reserved characters', () => {
    expect(() => parseCellData('a+b 10 c', intern)).toThrow(CellDataParseError);
    expect(() => parseCellData('a.b 10 c', intern)).toThrow(CellDataParseError);
  });
});
