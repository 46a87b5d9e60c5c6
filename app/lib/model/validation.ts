/**
 * Input Validation
 *
 * Rejects bad configuration at the boundary, before any stepping happens.
 * Per-step clamping in the club model is part of the dynamics and lives in
 * the stepper, not here.
 */

import { isUnitInterval } from '../util/math';
import { DEFAULT_SAMPLE_COUNT } from './modes/reference';
import type { ClubParams, PlayerParams, SimulationOptions } from './types';

export class SimulationConfigError extends Error {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, message: string) {
    super(message);
    this.name = 'SimulationConfigError';
    this.parameter = parameter;
    this.value = value;
  }
}

export function validateHorizon(tEnd: number, context: string = 'unknown'): number {
  if (!Number.isFinite(tEnd) || tEnd <= 0) {
    throw new SimulationConfigError(
      'tEnd',
      tEnd,
      `[SIM] Invalid time horizon in ${context}: ${tEnd}. ` +
      `Must be finite and positive.`
    );
  }
  return tEnd;
}

export function validateProbability(name: string, value: number, context: string = 'unknown'): number {
  if (!isUnitInterval(value)) {
    throw new SimulationConfigError(
      name,
      value,
      `[SIM] Initial share ${name} in ${context} is ${value}. ` +
      `Expected a probability in [0, 1].`
    );
  }
  return value;
}

export function validateCoefficient(name: string, value: number, context: string = 'unknown'): number {
  if (!Number.isFinite(value)) {
    throw new SimulationConfigError(
      name,
      value,
      `[SIM] Coefficient ${name} in ${context} must be finite, got ${value}.`
    );
  }
  return value;
}

/**
 * Resolve the sample count; N-1 is the step count, so N must be at least 2.
 */
export function resolveSampleCount(options: SimulationOptions = {}): number {
  const sampleCount = options.sampleCount ?? DEFAULT_SAMPLE_COUNT;
  if (!Number.isInteger(sampleCount) || sampleCount < 2) {
    throw new SimulationConfigError(
      'sampleCount',
      sampleCount,
      `[SIM] sampleCount must be an integer >= 2, got ${sampleCount}.`
    );
  }
  return sampleCount;
}

export function validateClubParams(params: ClubParams): ClubParams {
  validateProbability('x0', params.x0, 'club model');
  validateProbability('y0', params.y0, 'club model');
  validateHorizon(params.tEnd, 'club model');

  if (params.payoffs) {
    for (const [pair, payoff] of Object.entries(params.payoffs)) {
      validateCoefficient(`payoffs[${pair}].saudi`, payoff.saudi, 'club model');
      validateCoefficient(`payoffs[${pair}].europe`, payoff.europe, 'club model');
    }
  }
  return params;
}

export function validatePlayerParams(params: PlayerParams): PlayerParams {
  validateCoefficient('a0', params.a0, 'player model');
  validateCoefficient('d0', params.d0, 'player model');
  validateCoefficient('b', params.b, 'player model');
  validateCoefficient('pGrow', params.pGrow, 'player model');
  validateCoefficient('mGrow', params.mGrow, 'player model');
  validateProbability('x0', params.x0, 'player model');
  validateHorizon(params.tEnd, 'player model');
  return params;
}
