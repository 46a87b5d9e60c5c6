/**
 * Slider Definitions for the Interactive Models
 *
 * One entry per user-editable parameter: range, step, label and the value
 * the model opens with. A renderer builds its widgets from these; the
 * store validates edits against them before recomputing.
 */

import { ModelId, ValidationWarning } from '../model/types';
import { getReferenceClubParams, getReferencePlayerParams } from '../model/modes/reference';
import { formatSigFigs } from '../utils/formatNumber';
import { clamp } from '../util/math';

export type ClubSliderId = 'x0' | 'y0' | 'tEnd';
export type PlayerSliderId = 'a0' | 'd0' | 'b' | 'pGrow' | 'mGrow' | 'x0' | 'tEnd';

export interface SliderConfig<Id extends string = string> {
  id: Id;
  model: ModelId;
  label: string;
  min: number;
  max: number;
  step: number | null; // null = continuous
  initial: number;
  unit?: string;
  percent?: boolean;   // value is a share, display as %
}

const club = getReferenceClubParams();
const player = getReferencePlayerParams();

export const CLUB_SLIDER_CONFIGS: SliderConfig<ClubSliderId>[] = [
  { id: 'x0', model: 'club', label: 'Initial Saudi Youth %', min: 0, max: 1, step: 0.01, initial: club.x0, percent: true },
  { id: 'y0', model: 'club', label: 'Initial Europe Youth %', min: 0, max: 1, step: 0.01, initial: club.y0, percent: true },
  // Horizon slider has no step in the club view
  { id: 'tEnd', model: 'club', label: 'Time Horizon', min: 1, max: 40, step: null, initial: club.tEnd, unit: ' years' },
];

export const PLAYER_SLIDER_CONFIGS: SliderConfig<PlayerSliderId>[] = [
  { id: 'a0', model: 'player', label: 'PvP Base Payoff', min: 0.1, max: 5.0, step: 0.05, initial: player.a0 },
  { id: 'd0', model: 'player', label: 'MvM Base Payoff', min: 0.1, max: 5.0, step: 0.05, initial: player.d0 },
  { id: 'b', model: 'player', label: 'Cross-Payoff', min: 0.1, max: 5.0, step: 0.05, initial: player.b },
  { id: 'pGrow', model: 'player', label: 'Prestige Growth', min: 0.1, max: 10.0, step: 0.05, initial: player.pGrow },
  { id: 'mGrow', model: 'player', label: 'Money Growth', min: 0.1, max: 10.0, step: 0.05, initial: player.mGrow },
  { id: 'x0', model: 'player', label: 'Initial Prestige %', min: 0, max: 1, step: 0.01, initial: player.x0, percent: true },
  { id: 'tEnd', model: 'player', label: 'Time Range', min: 1, max: 50, step: 1, initial: player.tEnd, unit: ' seasons' },
];

export const SLIDER_CONFIGS: Record<ModelId, SliderConfig[]> = {
  club: CLUB_SLIDER_CONFIGS,
  player: PLAYER_SLIDER_CONFIGS,
};

/**
 * Get slider configuration by model and ID
 */
export function getSliderConfig(model: ModelId, id: string): SliderConfig | undefined {
  return SLIDER_CONFIGS[model].find(config => config.id === id);
}

/**
 * What the widget itself does with a raw position: clamp into range and
 * round to the nearest step counted from min.
 */
export function snapToSlider(config: SliderConfig, value: number): number {
  const bounded = clamp(config.min, config.max, value);
  if (config.step === null) return bounded;

  const steps = Math.round((bounded - config.min) / config.step);
  // Rounding to the step's decimals keeps 0.1 + 3 * 0.05 from printing as 0.25000000000000006
  const decimals = (config.step.toString().split('.')[1] ?? '').length;
  const snapped = Number((config.min + steps * config.step).toFixed(decimals));
  return clamp(config.min, config.max, snapped);
}

export function formatSliderValue(config: SliderConfig, value: number): string {
  if (config.percent) {
    return `${formatSigFigs(value * 100, 3)}%`;
  }
  return `${formatSigFigs(value, 4)}${config.unit ?? ''}`;
}

/**
 * Validate configuration and return warnings/errors
 */
export function validateConfiguration(
  model: ModelId,
  values: Record<string, number>
): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];

  for (const config of SLIDER_CONFIGS[model]) {
    const value = values[config.id];

    if (value === undefined) {
      warnings.push({
        type: 'error',
        message: `${config.label} is missing`,
        suggestion: `Default is ${formatSliderValue(config, config.initial)}`,
        parameter: config.id,
      });
      continue;
    }

    if (!Number.isFinite(value)) {
      warnings.push({
        type: 'error',
        message: `${config.label} must be a finite number, got ${value}`,
        parameter: config.id,
      });
      continue;
    }

    if (value < config.min) {
      warnings.push({
        type: 'error',
        message: `${config.label} (${value}) is below minimum ${config.min}`,
        parameter: config.id,
      });
    } else if (value > config.max) {
      warnings.push({
        type: 'error',
        message: `${config.label} (${value}) exceeds maximum ${config.max}`,
        parameter: config.id,
      });
    } else if (config.step !== null && snapToSlider(config, value) !== value) {
      warnings.push({
        type: 'info',
        message: `${config.label} (${value}) is between slider steps of ${config.step}`,
        parameter: config.id,
      });
    }
  }

  return warnings;
}

/**
 * Initial values for a model, keyed by slider ID
 */
export function getInitialSliderValues(model: ModelId): Record<string, number> {
  const values: Record<string, number> = {};
  for (const config of SLIDER_CONFIGS[model]) {
    values[config.id] = config.initial;
  }
  return values;
}
