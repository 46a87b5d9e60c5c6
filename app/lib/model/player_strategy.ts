/**
 * Player Motivation Model
 *
 * One population choosing Prestige (share x) or Money (share 1-x).
 * Same-strategy payoffs move with the mix:
 *   a = a0 + pGrow * x         (Prestige vs Prestige)
 *   d = d0 + mGrow * (1 - x)   (Money vs Money)
 *   b                          (cross, constant)
 *
 *   fP = a x + b (1-x),  fM = b x + d (1-x)
 *   dx/dt = x(1-x)(fP - fM)
 *
 * Unlike the club model, x is not clamped. With a coarse grid the Euler
 * step can overshoot [0, 1]; findPopulationExcursions reports that.
 */

import { integrateReplicator, ReplicatorRule } from './replicator';
import { resolveSampleCount, validatePlayerParams } from './validation';
import { isUnitInterval } from '../util/math';
import type {
  PlayerCoefficients,
  PlayerParams,
  PlayerTrajectory,
  SimulationOptions,
  ValidationWarning,
} from './types';

export interface PlayerPayoffs {
  fP: number;
  fM: number;
  a: number;
  d: number;
}

export const PLAYER_AUXILIARY_KEYS = ['fP', 'fM', 'a', 'd'] as const;

export function evaluatePlayerPayoffs(x: number, c: PlayerCoefficients): PlayerPayoffs {
  const a = c.a0 + c.pGrow * x;
  const d = c.d0 + c.mGrow * (1 - x);
  const fP = a * x + c.b * (1 - x);
  const fM = c.b * x + d * (1 - x);
  return { fP, fM, a, d };
}

export function playerReplicatorRule(coefficients: PlayerCoefficients): ReplicatorRule {
  // Snapshot so later edits to the caller's object can't leak into a run
  const c: PlayerCoefficients = {
    a0: coefficients.a0,
    d0: coefficients.d0,
    b: coefficients.b,
    pGrow: coefficients.pGrow,
    mGrow: coefficients.mGrow,
  };

  return {
    name: 'player-motivation',
    dimension: 1,
    boundary: 'unbounded',
    auxiliaryKeys: PLAYER_AUXILIARY_KEYS,
    evaluate([x]) {
      const { fP, fM, a, d } = evaluatePlayerPayoffs(x, c);
      return {
        derivative: [x * (1 - x) * (fP - fM)],
        auxiliary: [fP, fM, a, d],
      };
    },
  };
}

export function simulatePlayerStrategy(params: PlayerParams, options: SimulationOptions = {}): PlayerTrajectory {
  validatePlayerParams(params);
  const sampleCount = resolveSampleCount(options);

  const result = integrateReplicator(playerReplicatorRule(params), [params.x0], {
    tEnd: params.tEnd,
    sampleCount,
  });
  const [x] = result.states;
  const [fP, fM, a, d] = result.auxiliary;

  return Object.freeze({
    model: 'player',
    time: Object.freeze(result.time),
    dt: result.dt,
    sampleCount,
    x: Object.freeze(x),
    fP: Object.freeze(fP),
    fM: Object.freeze(fM),
    a: Object.freeze(a),
    d: Object.freeze(d),
  });
}

/**
 * Report samples where the Prestige share left [0, 1] or overflowed.
 * Nothing is corrected; this only surfaces the Euler overshoot.
 */
export function findPopulationExcursions(trajectory: PlayerTrajectory): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];

  const firstNonFinite = trajectory.x.findIndex(v => !Number.isFinite(v));
  if (firstNonFinite >= 0) {
    warnings.push({
      type: 'error',
      message: `Prestige share diverged at t=${trajectory.time[firstNonFinite]} (sample ${firstNonFinite}).`,
      suggestion: 'Shorten the time range or raise the sample count.',
      parameter: 'x',
    });
    return warnings;
  }

  const firstOutside = trajectory.x.findIndex(v => !isUnitInterval(v));
  if (firstOutside >= 0) {
    const value = trajectory.x[firstOutside];
    warnings.push({
      type: 'warning',
      message: `Prestige share left [0, 1] at t=${trajectory.time[firstOutside]} (x=${value}).`,
      suggestion: 'Step size too large for these payoffs; shorten the time range or raise the sample count.',
      parameter: 'x',
    });
  }

  return warnings;
}
