/**
 * Club Transfer-Strategy Model
 *
 * Two populations (Saudi clubs, European clubs) each choose Youth or Star.
 * x = P(Saudi plays Youth), y = P(Europe plays Youth).
 *
 *   dx/dt = x(1-x) * (f_saudi(Youth) - f̄_saudi)
 *   dy/dt = y(1-y) * (f_europe(Youth) - f̄_europe)
 *
 * States are clamped to [0, 1] after every step.
 */

import { integrateReplicator, ReplicatorRule } from './replicator';
import { REFERENCE_PAYOFFS } from './modes/reference';
import { resolveSampleCount, validateClubParams } from './validation';
import type {
  ClubParams,
  ClubStrategy,
  ClubTrajectory,
  PayoffTable,
  SimulationOptions,
  StrategyPair,
} from './types';

function pair(saudi: ClubStrategy, europe: ClubStrategy): StrategyPair {
  return `${saudi}/${europe}`;
}

function mapTable(entry: (saudi: ClubStrategy, europe: ClubStrategy) => { saudi: number; europe: number }): PayoffTable {
  return {
    'Youth/Youth': entry('Youth', 'Youth'),
    'Youth/Star': entry('Youth', 'Star'),
    'Star/Youth': entry('Star', 'Youth'),
    'Star/Star': entry('Star', 'Star'),
  };
}

/**
 * Exchange the roles of the two populations: Saudi plays what Europe
 * played and vice versa. Running the swapped table with (x0, y0) swapped
 * reproduces the original run with x and y exchanged.
 */
export function swapPopulations(table: PayoffTable): PayoffTable {
  return mapTable((saudi, europe) => {
    const mirrored = table[pair(europe, saudi)];
    return { saudi: mirrored.europe, europe: mirrored.saudi };
  });
}

export interface ClubPayoffs {
  saudiYouth: number;
  saudiStar: number;
  saudiAvg: number;
  europeYouth: number;
  europeStar: number;
  europeAvg: number;
}

/**
 * Expected payoffs of each strategy against the other population's mix.
 */
export function evaluateClubPayoffs(x: number, y: number, payoffs: PayoffTable = REFERENCE_PAYOFFS): ClubPayoffs {
  const saudiYouth = y * payoffs['Youth/Youth'].saudi + (1 - y) * payoffs['Youth/Star'].saudi;
  const saudiStar = y * payoffs['Star/Youth'].saudi + (1 - y) * payoffs['Star/Star'].saudi;
  const saudiAvg = x * saudiYouth + (1 - x) * saudiStar;

  const europeYouth = x * payoffs['Youth/Youth'].europe + (1 - x) * payoffs['Star/Youth'].europe;
  const europeStar = x * payoffs['Youth/Star'].europe + (1 - x) * payoffs['Star/Star'].europe;
  const europeAvg = y * europeYouth + (1 - y) * europeStar;

  return { saudiYouth, saudiStar, saudiAvg, europeYouth, europeStar, europeAvg };
}

export function clubReplicatorRule(payoffs: PayoffTable = REFERENCE_PAYOFFS): ReplicatorRule {
  return {
    name: 'club-transfer-strategy',
    dimension: 2,
    boundary: 'clamp-unit-interval',
    auxiliaryKeys: [],
    evaluate([x, y]) {
      const f = evaluateClubPayoffs(x, y, payoffs);
      const dx = x * (1 - x) * (f.saudiYouth - f.saudiAvg);
      const dy = y * (1 - y) * (f.europeYouth - f.europeAvg);
      return { derivative: [dx, dy], auxiliary: [] };
    },
  };
}

export interface JointStrategyShares {
  youthYouth: number[];
  youthStar: number[];
  starYouth: number[];
  starStar: number[];
}

/**
 * Mass on each (Saudi, Europe) strategy pair, treating the two
 * populations as independent. Derived, not integrated.
 */
export function jointStrategyShares(x: readonly number[], y: readonly number[]): JointStrategyShares {
  if (x.length !== y.length) {
    throw new Error(`[SIM] Joint shares need equal-length series, got ${x.length} and ${y.length}.`);
  }
  return {
    youthYouth: x.map((xi, i) => xi * y[i]),
    youthStar: x.map((xi, i) => xi * (1 - y[i])),
    starYouth: x.map((xi, i) => (1 - xi) * y[i]),
    starStar: x.map((xi, i) => (1 - xi) * (1 - y[i])),
  };
}

export function simulateClubStrategy(params: ClubParams, options: SimulationOptions = {}): ClubTrajectory {
  validateClubParams(params);
  const sampleCount = resolveSampleCount(options);
  const payoffs = params.payoffs ?? REFERENCE_PAYOFFS;

  const result = integrateReplicator(clubReplicatorRule(payoffs), [params.x0, params.y0], {
    tEnd: params.tEnd,
    sampleCount,
  });
  const [x, y] = result.states;
  const joint = jointStrategyShares(x, y);

  return Object.freeze({
    model: 'club',
    time: Object.freeze(result.time),
    dt: result.dt,
    sampleCount,
    x: Object.freeze(x),
    y: Object.freeze(y),
    youthYouth: Object.freeze(joint.youthYouth),
    youthStar: Object.freeze(joint.youthStar),
    starYouth: Object.freeze(joint.starYouth),
    starStar: Object.freeze(joint.starStar),
  });
}
