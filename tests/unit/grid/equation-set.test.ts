/**
 * Unit Tests - Equation Set
 *
 * Spring rows, pinned and tied rows, and the solve.
 */

import { describe, it, expect } from 'vitest';
import { EquationSet } from '../../../src/grid/equation-set.js';
import { SingularMatrixError } from '../../../src/grid/errors.js';
import { expectArrayCloseTo } from '../../setup.js';

function solved(eqns: EquationSet): number[] {
  eqns.solve();
  return [...eqns.results()].map(([, value]) => value);
}

describe('EquationSet', () => {
  it('should start with zero rows and columns', () => {
    const eqns = new EquationSet(3);

    expect(eqns.rowIsZero(0)).toBe(true);
    expect(eqns.columnIsZero(2)).toBe(true);
  });

  it('should only touch the rows and columns of a spring', () => {
    const eqns = new EquationSet(3);
    eqns.addGrowthLink(0, 1, 10, 1);

    expect(eqns.rowIsZero(0)).toBe(false);
    expect(eqns.rowIsZero(1)).toBe(false);
    expect(eqns.rowIsZero(2)).toBe(true);
    expect(eqns.columnIsZero(2)).toBe(true);
  });

  it('should reject growth that is not positive', () => {
    const eqns = new EquationSet(2);

    expect(() => eqns.addGrowthLink(0, 1, 10, 0)).toThrow(RangeError);
    expect(() => eqns.addGrowthLink(0, 1, 10, -1)).toThrow(RangeError);
  });

  it('should hold a spring at its natural length from a forced end', () => {
    const eqns = new EquationSet(2);
    eqns.addGrowthLink(0, 1, 10, 1);
    eqns.forceValue(0, 5);

    expectArrayCloseTo(solved(eqns), [5, 15]);
  });

  it('should share the stretch between equal springs', () => {
    const eqns = new EquationSet(3);
    eqns.addGrowthLink(0, 1, 10, 1);
    eqns.addGrowthLink(1, 2, 10, 1);
    eqns.forceValue(0, 0);
    eqns.forceValue(2, 30);

    expectArrayCloseTo(solved(eqns), [0, 15, 30]);
  });

  it('should give more stretch to the spring with more growth', () => {
    const eqns = new EquationSet(3);
    eqns.addGrowthLink(0, 1, 10, 1);
    eqns.addGrowthLink(1, 2, 10, 3);
    eqns.forceValue(0, 0);
    eqns.forceValue(2, 40);

    expectArrayCloseTo(solved(eqns), [0, 15, 40]);
  });

  it('should tie unknowns by offset', () => {
    const eqns = new EquationSet(3);
    eqns.forceValue(0, 2);
    eqns.tieValue(1, 0, 3);
    eqns.tieValue(2, 1, 4);

    expectArrayCloseTo(solved(eqns), [2, 5, 9]);
  });

  it('should fail to solve springs with nothing pinned', () => {
    const eqns = new EquationSet(2);
    eqns.addGrowthLink(0, 1, 10, 1);

    expect(() => eqns.solve()).toThrow(SingularMatrixError);
    expect(() => eqns.solve()).toThrow('failed to decompose, not invertible');
  });

  it('should solve an empty set', () => {
    const eqns = new EquationSet(0);

    expect(solved(eqns)).toEqual([]);
  });

  it('should print one line per row', () => {
    const eqns = new EquationSet(2);
    eqns.forceValue(0, 1);

    const lines = eqns.toString().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe('|    1.0000     0.0000 |  (    1.0000)');
  });
});
