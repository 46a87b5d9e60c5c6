/**
 * Chart Data Validator
 *
 * Checks that each panel carries the series its chart needs, that every
 * series lines up with the time axis and holds only finite values. Panels
 * from the builders are sanitized already; hand-built or edited panels
 * are not.
 */

import type { ChartPanel, ChartPanelId } from '../charts/chartSeries';
import type { ModelId } from '../model/types';

export interface ChartContract {
  chartName: string;
  panelId: ChartPanelId;
  model: ModelId;
  requiredSeries: string[];
}

export interface ValidationResult {
  valid: boolean;
  chartName: string;
  missingSeries: string[];
  lengthMismatches: string[];
  nonFiniteSeries: string[];
}

/**
 * Chart contracts - defines what data each chart needs
 */
export const CHART_CONTRACTS: ChartContract[] = [
  {
    chartName: 'Saudi Club Strategy Evolution',
    panelId: 'saudi',
    model: 'club',
    requiredSeries: ['saudiYouth', 'saudiStar'],
  },
  {
    chartName: 'European Club Strategy Evolution',
    panelId: 'europe',
    model: 'club',
    requiredSeries: ['europeYouth', 'europeStar'],
  },
  {
    chartName: 'Joint Strategy Populations Over Time',
    panelId: 'joint',
    model: 'club',
    requiredSeries: ['youthYouth', 'youthStar', 'starYouth', 'starStar'],
  },
  {
    chartName: 'Player Distribution Over Time',
    panelId: 'population',
    model: 'player',
    requiredSeries: ['prestige', 'money'],
  },
  {
    chartName: 'Payoff Dynamics',
    panelId: 'payoffs',
    model: 'player',
    requiredSeries: ['fP', 'fM', 'a', 'd'],
  },
];

/**
 * Validate a single panel against a chart contract
 */
export function validateChartPanel(panel: ChartPanel | undefined, contract: ChartContract): ValidationResult {
  if (!panel) {
    return {
      valid: false,
      chartName: contract.chartName,
      missingSeries: [...contract.requiredSeries],
      lengthMismatches: [],
      nonFiniteSeries: [],
    };
  }

  const missingSeries: string[] = [];
  const lengthMismatches: string[] = [];
  const nonFiniteSeries: string[] = [];

  for (const key of contract.requiredSeries) {
    const found = panel.series.find(s => s.key === key);
    if (!found) {
      missingSeries.push(key);
      continue;
    }
    if (found.values.length !== panel.time.length) {
      lengthMismatches.push(key);
    }
    if (found.values.some(v => !isFinite(v))) {
      nonFiniteSeries.push(key);
    }
  }

  return {
    valid: missingSeries.length === 0 && lengthMismatches.length === 0 && nonFiniteSeries.length === 0,
    chartName: contract.chartName,
    missingSeries,
    lengthMismatches,
    nonFiniteSeries,
  };
}

/**
 * Validate every contract of the model the panels belong to
 */
export function validateAllCharts(panels: ChartPanel[]): ValidationResult[] {
  const models = new Set(panels.map(p => p.model));
  return CHART_CONTRACTS
    .filter(contract => models.has(contract.model))
    .map(contract => validateChartPanel(panels.find(p => p.id === contract.panelId), contract));
}

/**
 * Log one [CHART] line per failed contract
 * @returns the failed results
 */
export function reportInvalidCharts(panels: ChartPanel[]): ValidationResult[] {
  const failed = validateAllCharts(panels).filter(result => !result.valid);
  for (const result of failed) {
    console.warn(
      `[CHART] ${result.chartName}: missing [${result.missingSeries.join(', ')}], ` +
      `length mismatch [${result.lengthMismatches.join(', ')}], ` +
      `non-finite [${result.nonFiniteSeries.join(', ')}]`
    );
  }
  return failed;
}
