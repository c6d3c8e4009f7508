/**
 * Unit Tests - Range and BBox
 */

import { describe, it, expect } from 'vitest';
import { Range } from '../../../src/geometry/range.js';
import { BBox } from '../../../src/geometry/bbox.js';

describe('Range', () => {
  it('should be empty when none', () => {
    const none = Range.none();

    expect(none.isNone()).toBe(true);
    expect(none.size()).toBe(0);
    expect(none.center()).toBe(0);
    expect(none.toString()).toBe('(none)');
  });

  it('should order points', () => {
    const range = Range.ofPoints(5, -1);

    expect(range.min).toBe(-1);
    expect(range.max).toBe(5);
    expect(range.size()).toBe(6);
    expect(range.center()).toBe(2);
  });

  it('should grow to include a point', () => {
    const range = Range.none().include(3).include(-2);

    expect(range.toString()).toBe('(-2 to 3)');
  });

  it('should union and intersect', () => {
    const a = new Range(0, 4);
    const b = new Range(2, 6);

    expect(a.union(b).toString()).toBe('(0 to 6)');
    expect(a.intersect(b).toString()).toBe('(2 to 4)');
    expect(a.intersect(new Range(5, 6)).isNone()).toBe(true);
    expect(a.union(Range.none())).toBe(a);
  });

  it('should shift and resize', () => {
    const range = new Range(0, 10);

    expect(range.add(2).toString()).toBe('(2 to 12)');
    expect(range.sub(5).toString()).toBe('(-5 to 5)');
    expect(range.enlarge(1).toString()).toBe('(-1 to 11)');
    expect(range.reduce(2).toString()).toBe('(2 to 8)');
    expect(range.reduce(6).toString()).toBe('(5 to 5)');
    expect(Range.none().add(3).isNone()).toBe(true);
  });
});

describe('BBox', () => {
  it('should report center and size', () => {
    const bbox = BBox.fromCorners(10, 40, 0, 0);

    expect(bbox.getCwh()).toEqual([5, 20, 10, 40]);
    expect(bbox.toString()).toBe('[(0 to 10) x (0 to 40)]');
  });

  it('should be none when either axis is none', () => {
    expect(BBox.none().isNone()).toBe(true);
    expect(BBox.ofRanges(new Range(0, 1), Range.none()).isNone()).toBe(true);
  });

  it('should union boxes', () => {
    const a = BBox.fromCorners(0, 0, 1, 1);
    const b = BBox.fromCorners(2, -1, 3, 0);

    expect(a.union(b).toString()).toBe('[(0 to 3) x (-1 to 1)]');
    expect(BBox.none().union(a)).toBe(a);
  });
});
