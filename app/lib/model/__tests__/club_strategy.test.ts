/**
 * Club transfer-strategy model
 *
 * Covers the dynamics' structural properties (boundary rest points,
 * population-swap symmetry, clamping, joint mass) plus the reference
 * scenarios the interactive view opens with.
 */

import { describe, test, expect } from '@jest/globals';
import {
  evaluateClubPayoffs,
  jointStrategyShares,
  simulateClubStrategy,
  swapPopulations,
} from '../club_strategy';
import { REFERENCE_PAYOFFS } from '../modes/reference';
import { SimulationConfigError } from '../validation';
import { PayoffTable } from '../types';

// Deliberately asymmetric so a population swap is not a no-op
const LOPSIDED: PayoffTable = {
  'Youth/Youth': { saudi: 3, europe: 1 },
  'Youth/Star': { saudi: 0, europe: 4 },
  'Star/Youth': { saudi: 2, europe: 2 },
  'Star/Star': { saudi: 1, europe: 0 },
};

describe('Club Transfer-Strategy Model', () => {

  describe('Expected payoffs', () => {
    test('Saudi all-Youth against European all-Star', () => {
      expect(evaluateClubPayoffs(1, 0)).toEqual({
        saudiYouth: 2,
        saudiStar: 1,
        saudiAvg: 2,
        europeYouth: 4,
        europeStar: 5,
        europeAvg: 5,
      });
    });
  });

  describe('Boundary fixed points', () => {
    const corners: [number, number][] = [[0, 0], [0, 1], [1, 0], [1, 1]];

    for (const payoffs of [REFERENCE_PAYOFFS, LOPSIDED]) {
      for (const [x0, y0] of corners) {
        test(`(${x0}, ${y0}) stays put under ${payoffs === LOPSIDED ? 'lopsided' : 'reference'} payoffs`, () => {
          const trajectory = simulateClubStrategy({ x0, y0, tEnd: 25, payoffs });

          expect(trajectory.x.every(v => v === x0)).toBe(true);
          expect(trajectory.y.every(v => v === y0)).toBe(true);
        });
      }
    }
  });

  describe('Population-swap symmetry', () => {
    test('swapping roles and initial shares exchanges x and y exactly', () => {
      const original = simulateClubStrategy({ x0: 0.3, y0: 0.8, tEnd: 15, payoffs: LOPSIDED });
      const swapped = simulateClubStrategy({ x0: 0.8, y0: 0.3, tEnd: 15, payoffs: swapPopulations(LOPSIDED) });

      expect(swapped.y).toEqual(original.x);
      expect(swapped.x).toEqual(original.y);
    });

    test('the reference table is its own population swap', () => {
      expect(swapPopulations(REFERENCE_PAYOFFS)).toEqual(REFERENCE_PAYOFFS);
    });

    test('swapping twice restores the table', () => {
      expect(swapPopulations(swapPopulations(LOPSIDED))).toEqual(LOPSIDED);
    });
  });

  describe('Clamping', () => {
    // Saudi strongly prefers Youth, Europe strongly prefers Star
    const extreme: PayoffTable = {
      'Youth/Youth': { saudi: 100, europe: 0 },
      'Youth/Star': { saudi: 100, europe: 100 },
      'Star/Youth': { saudi: 0, europe: 0 },
      'Star/Star': { saudi: 0, europe: 100 },
    };

    test('a single huge step lands on the boundary, not past it', () => {
      const trajectory = simulateClubStrategy({ x0: 0.5, y0: 0.5, tEnd: 40, payoffs: extreme }, { sampleCount: 2 });

      expect(trajectory.x).toEqual([0.5, 1]);
      expect(trajectory.y).toEqual([0.5, 0]);
    });

    test('every sample stays inside [0, 1] on a coarse grid', () => {
      const trajectory = simulateClubStrategy({ x0: 0.2, y0: 0.9, tEnd: 40, payoffs: extreme }, { sampleCount: 7 });

      for (let i = 0; i < trajectory.sampleCount; i++) {
        expect(trajectory.x[i]).toBeGreaterThanOrEqual(0);
        expect(trajectory.x[i]).toBeLessThanOrEqual(1);
        expect(trajectory.y[i]).toBeGreaterThanOrEqual(0);
        expect(trajectory.y[i]).toBeLessThanOrEqual(1);
      }
    });
  });

  describe('Joint strategy shares', () => {
    test('the four joint series sum to 1 at every sample', () => {
      const trajectory = simulateClubStrategy({ x0: 0.37, y0: 0.81, tEnd: 12 });

      for (let i = 0; i < trajectory.sampleCount; i++) {
        const total = trajectory.youthYouth[i] + trajectory.youthStar[i] + trajectory.starYouth[i] + trajectory.starStar[i];
        expect(Math.abs(total - 1)).toBeLessThan(1e-12);
      }
    });

    test('joint shares are products of the marginals', () => {
      expect(jointStrategyShares([0.5, 1], [0.25, 0])).toEqual({
        youthYouth: [0.125, 0],
        youthStar: [0.375, 1],
        starYouth: [0.125, 0],
        starStar: [0.375, 0],
      });
    });

    test('mismatched series are rejected', () => {
      expect(() => jointStrategyShares([0.5], [0.5, 0.5])).toThrow(/equal-length/);
    });
  });

  describe('Reference scenarios', () => {
    test('x0 = y0 = 0.5 is an interior rest point of the reference table', () => {
      const trajectory = simulateClubStrategy({ x0: 0.5, y0: 0.5, tEnd: 10 });

      expect(trajectory.sampleCount).toBe(1000);
      expect(trajectory.x.every(v => v === 0.5)).toBe(true);
      expect(trajectory.y.every(v => v === 0.5)).toBe(true);
    });

    test('Europe leaning Youth drives Saudi clubs to Stars', () => {
      const trajectory = simulateClubStrategy({ x0: 0.45, y0: 0.55, tEnd: 10 });
      const last = trajectory.sampleCount - 1;

      expect(trajectory.x[last]).toBeLessThan(trajectory.x[0]);
      expect(trajectory.y[last]).toBeGreaterThan(trajectory.y[0]);
      for (let i = 1; i <= last; i++) {
        expect(trajectory.x[i]).toBeLessThanOrEqual(trajectory.x[i - 1]);
      }
    });

    test('identical parameters give identical trajectories', () => {
      const params = { x0: 0.23, y0: 0.61, tEnd: 33 };
      expect(simulateClubStrategy(params)).toEqual(simulateClubStrategy(params));
    });
  });

  describe('Trajectory shape', () => {
    test('sample count is configurable', () => {
      const trajectory = simulateClubStrategy({ x0: 0.4, y0: 0.4, tEnd: 10 }, { sampleCount: 11 });

      expect(trajectory.dt).toBe(1);
      expect(trajectory.time).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(trajectory.x).toHaveLength(11);
      expect(trajectory.starStar).toHaveLength(11);
    });

    test('returned trajectory is frozen', () => {
      const trajectory = simulateClubStrategy({ x0: 0.4, y0: 0.4, tEnd: 10 });

      expect(Object.isFrozen(trajectory)).toBe(true);
      expect(Object.isFrozen(trajectory.x)).toBe(true);
      expect(Object.isFrozen(trajectory.time)).toBe(true);
    });
  });

  describe('Configuration errors', () => {
    test.each([0, -1, NaN, Infinity])('tEnd = %p is rejected', (tEnd) => {
      expect(() => simulateClubStrategy({ x0: 0.5, y0: 0.5, tEnd })).toThrow(SimulationConfigError);
    });

    test('out-of-range initial shares are rejected, not clamped', () => {
      expect(() => simulateClubStrategy({ x0: 1.2, y0: 0.5, tEnd: 10 })).toThrow(/x0 .* is 1.2/);
      expect(() => simulateClubStrategy({ x0: 0.5, y0: -0.01, tEnd: 10 })).toThrow(/y0 .* is -0.01/);
    });

    test('error carries the offending parameter', () => {
      let caught: unknown;
      try {
        simulateClubStrategy({ x0: 0.5, y0: 0.5, tEnd: 0 });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(SimulationConfigError);
      if (caught instanceof SimulationConfigError) {
        expect(caught.parameter).toBe('tEnd');
        expect(caught.value).toBe(0);
      }
    });

    test('non-finite payoff entries are rejected', () => {
      const payoffs: PayoffTable = { ...REFERENCE_PAYOFFS, 'Star/Star': { saudi: NaN, europe: 1 } };
      expect(() => simulateClubStrategy({ x0: 0.5, y0: 0.5, tEnd: 10, payoffs }))
        .toThrow(/payoffs\[Star\/Star\]\.saudi/);
    });

    test.each([1, 0, 2.5])('sampleCount = %p is rejected', (sampleCount) => {
      expect(() => simulateClubStrategy({ x0: 0.5, y0: 0.5, tEnd: 10 }, { sampleCount }))
        .toThrow(/sampleCount must be an integer >= 2/);
    });
  });
});
