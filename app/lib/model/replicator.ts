/**
 * Fixed-Step Replicator Integrator
 *
 * Forward Euler over a uniform grid of N samples on [0, tEnd]:
 *   dt = tEnd / (N - 1)
 *   s[i] = s[i-1] + f(s[i-1]) * dt
 *
 * The model supplies the derivative as a ReplicatorRule. Auxiliary outputs
 * (payoffs etc.) are recorded at the START of each step, so the last
 * sample gets one extra evaluation at the terminal state.
 *
 * No adaptive stepping; both models depend on the plain Euler behaviour.
 */

import { clamp01 } from '../util/math';
import { DEFAULT_SAMPLE_COUNT } from './modes/reference';

/**
 * What happens to a state component after each update.
 * - clamp-unit-interval: clamp to [0, 1] (club model)
 * - unbounded: leave as is, may leave [0, 1] for large dt (player model)
 */
export type BoundaryPolicy = 'clamp-unit-interval' | 'unbounded';

export interface StepEvaluation {
  derivative: number[];
  auxiliary: number[]; // ordered as rule.auxiliaryKeys
}

export interface ReplicatorRule {
  name: string;
  dimension: number;
  boundary: BoundaryPolicy;
  auxiliaryKeys: readonly string[];
  evaluate(state: readonly number[]): StepEvaluation;
}

export interface IntegrationOptions {
  tEnd: number;
  sampleCount?: number;
}

export interface IntegrationResult {
  time: number[];
  dt: number;
  sampleCount: number;
  states: number[][];    // states[component][i]
  auxiliary: number[][]; // auxiliary[key index][i]
}

/**
 * Uniform time grid with time[0] = 0 and time[N-1] = tEnd exactly.
 */
export function buildTimeGrid(tEnd: number, sampleCount: number = DEFAULT_SAMPLE_COUNT): { time: number[]; dt: number } {
  const dt = tEnd / (sampleCount - 1);
  const time = new Array<number>(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    time[i] = i * dt;
  }
  time[sampleCount - 1] = tEnd;
  return { time, dt };
}

function applyBoundary(value: number, boundary: BoundaryPolicy): number {
  switch (boundary) {
    case 'clamp-unit-interval':
      return clamp01(value);
    case 'unbounded':
      return value;
  }
}

function evaluateChecked(rule: ReplicatorRule, state: readonly number[]): StepEvaluation {
  const evaluation = rule.evaluate(state);
  if (evaluation.derivative.length !== rule.dimension) {
    throw new Error(
      `[SIM] Rule ${rule.name} returned ${evaluation.derivative.length} derivative components, expected ${rule.dimension}.`
    );
  }
  if (evaluation.auxiliary.length !== rule.auxiliaryKeys.length) {
    throw new Error(
      `[SIM] Rule ${rule.name} returned ${evaluation.auxiliary.length} auxiliary values, expected ${rule.auxiliaryKeys.length}.`
    );
  }
  return evaluation;
}

/**
 * Integrate a replicator rule from initialState over [0, tEnd].
 * Callers validate tEnd and sampleCount; this only checks the rule's shape.
 */
export function integrateReplicator(
  rule: ReplicatorRule,
  initialState: readonly number[],
  options: IntegrationOptions
): IntegrationResult {
  if (initialState.length !== rule.dimension) {
    throw new Error(
      `[SIM] Rule ${rule.name} expects ${rule.dimension} state components, got ${initialState.length}.`
    );
  }

  const sampleCount = options.sampleCount ?? DEFAULT_SAMPLE_COUNT;
  const { time, dt } = buildTimeGrid(options.tEnd, sampleCount);

  const states = initialState.map(s0 => {
    const series = new Array<number>(sampleCount).fill(0);
    series[0] = s0;
    return series;
  });
  const auxiliary = rule.auxiliaryKeys.map(() => new Array<number>(sampleCount).fill(0));

  let current = [...initialState];
  for (let i = 1; i < sampleCount; i++) {
    const { derivative, auxiliary: aux } = evaluateChecked(rule, current);
    aux.forEach((value, k) => {
      auxiliary[k][i - 1] = value;
    });

    current = current.map((s, c) => applyBoundary(s + derivative[c] * dt, rule.boundary));
    current.forEach((value, c) => {
      states[c][i] = value;
    });
  }

  if (rule.auxiliaryKeys.length > 0) {
    const terminal = evaluateChecked(rule, current);
    terminal.auxiliary.forEach((value, k) => {
      auxiliary[k][sampleCount - 1] = value;
    });
  }

  return { time, dt, sampleCount, states, auxiliary };
}
