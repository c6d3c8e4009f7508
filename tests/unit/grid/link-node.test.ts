/**
 * Unit Tests - Link and GridNode
 */

import { describe, it, expect } from 'vitest';
import { Link } from '../../../src/grid/link.js';
import { GridNode } from '../../../src/grid/node.js';
import { formatGridData, growthData, placeData, widthData } from '../../../src/grid/types.js';

describe('Link', () => {
  it('should keep the largest minimum size', () => {
    const link = new Link(0, 1, 4);
    link.union(6);
    link.union(5);

    expect(link.minSize).toBe(6);
  });

  it('should only be elastic with positive growth', () => {
    const link = new Link('a', 'b', 4);
    expect(link.isElastic()).toBe(false);

    link.setGrowth(0);
    expect(link.isElastic()).toBe(false);

    link.setGrowth(2);
    expect(link.isElastic()).toBe(true);
    expect(link.growth).toBe(2);
  });

  it('should format start, end, size and growth', () => {
    const link = new Link(0, 1, 4);
    expect(link.toString()).toBe('0->1:4');

    link.setGrowth(1.5);
    expect(link.toString()).toBe('0->1:4+1.5');
  });
});

describe('GridNode', () => {
  it('should be a root and a leaf until linked', () => {
    const node = new GridNode<string>('a', 0);
    expect(node.isRoot()).toBe(true);
    expect(node.isLeaf()).toBe(true);

    node.addStartpoint('x');
    node.addEndpoint('y');
    expect(node.isRoot()).toBe(false);
    expect(node.isLeaf()).toBe(false);
  });

  it('should prefer forced, then derived, then placed position', () => {
    const node = new GridNode(1, 0);
    expect(node.hasPosition()).toBe(false);

    node.placedPosition = 3;
    expect(node.getPosition()).toBe(3);
    expect(node.isPlaced()).toBe(true);

    node.position = 2;
    expect(node.getPosition()).toBe(2);

    node.forcedPosition = 1;
    expect(node.getPosition()).toBe(1);
  });

  it('should only reset the derived position', () => {
    const node = new GridNode(1, 0);
    node.placedPosition = 3;
    node.position = 2;
    node.resetPosition();

    expect(node.position).toBeUndefined();
    expect(node.getPosition()).toBe(3);
  });
});

describe('grid data', () => {
  it('should format each kind of entry', () => {
    expect(formatGridData(widthData(0, 4, 4))).toBe('[0->4:4]');
    expect(formatGridData(growthData(2, 4, 1))).toBe('[2->4:+1]');
    expect(formatGridData(placeData(3, -2.5))).toBe('[3@-2.5]');
  });
});
