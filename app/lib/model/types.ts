// --- Strategy & Payoff Types ---

export type ClubStrategy = 'Youth' | 'Star';

export type StrategyPair = `${ClubStrategy}/${ClubStrategy}`; // `${saudi}/${europe}`

export interface PayoffPair {
  saudi: number;
  europe: number;
}

/**
 * Bimatrix payoff table keyed by (Saudi strategy, Europe strategy).
 */
export type PayoffTable = Readonly<Record<StrategyPair, Readonly<PayoffPair>>>;

export type ModelId = 'club' | 'player';

// --- Simulation Parameters ---

export interface ClubParams {
  x0: number;   // P(Saudi clubs play Youth) at t=0
  y0: number;   // P(European clubs play Youth) at t=0
  tEnd: number; // horizon, years
  payoffs?: PayoffTable; // defaults to REFERENCE_PAYOFFS
}

export interface PlayerCoefficients {
  a0: number;    // Prestige-vs-Prestige base payoff
  d0: number;    // Money-vs-Money base payoff
  b: number;     // cross-strategy payoff
  pGrow: number; // growth of a with Prestige share
  mGrow: number; // growth of d with Money share
}

export interface PlayerParams extends PlayerCoefficients {
  x0: number;   // Prestige share at t=0
  tEnd: number; // horizon, seasons
}

export interface SimulationOptions {
  sampleCount?: number;
}

// --- Trajectories ---

export interface TrajectoryBase {
  /** Uniform grid, time[0] = 0, time[N-1] = tEnd */
  time: readonly number[];
  dt: number;
  sampleCount: number;
}

export interface ClubTrajectory extends TrajectoryBase {
  model: 'club';
  x: readonly number[];
  y: readonly number[];
  // Joint mass over strategy pairs, assuming independent populations
  youthYouth: readonly number[];
  youthStar: readonly number[];
  starYouth: readonly number[];
  starStar: readonly number[];
}

/**
 * x is NOT clamped: a large dt can carry it outside [0,1].
 * See findPopulationExcursions.
 */
export interface PlayerTrajectory extends TrajectoryBase {
  model: 'player';
  x: readonly number[];
  fP: readonly number[];
  fM: readonly number[];
  a: readonly number[];
  d: readonly number[];
}

export type Trajectory = ClubTrajectory | PlayerTrajectory;

// --- Diagnostics ---

export interface ValidationWarning {
  type: 'error' | 'warning' | 'info';
  message: string;
  suggestion?: string;
  parameter?: string;
}
