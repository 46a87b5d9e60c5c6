/**
 * Chart Panels
 *
 * Turns a trajectory into plot-ready panels: one line per series with its
 * legend label, color and dash style. Renderers draw these as-is against
 * panel.time and redraw whenever the store publishes a new trajectory.
 */

import type { ClubTrajectory, ModelId, PlayerTrajectory } from '../model/types';
import { assertRange, createImputationMask, sanitizeSeries } from '../utils/sanitize';
import { reportInvalidCharts } from '../utils/chartValidator';

export type ChartPanelId = 'saudi' | 'europe' | 'joint' | 'population' | 'payoffs';

export type LineStyle = 'solid' | 'dashed';

export interface ChartSeries {
  key: string;
  label: string;
  color: string;
  lineStyle: LineStyle;
  values: number[];
  imputed: boolean[]; // true where a non-finite sample was replaced
}

export interface ChartPanel {
  id: ChartPanelId;
  model: ModelId;
  title: string;
  xLabel: string;
  yLabel?: string;
  grid: boolean;
  time: readonly number[];
  series: ChartSeries[];
}

export const SERIES_COLORS = {
  green: '#008000',
  magenta: '#bf00bf',
  blue: '#0000ff',
  cyan: '#00bfbf',
  red: '#ff0000',
} as const;

function series(
  key: string,
  label: string,
  color: string,
  raw: readonly number[],
  lineStyle: LineStyle = 'solid'
): ChartSeries {
  return {
    key,
    label,
    color,
    lineStyle,
    values: sanitizeSeries(raw, 'previous'),
    imputed: createImputationMask(raw),
  };
}

function complement(values: readonly number[]): number[] {
  return values.map(v => 1 - v);
}

export function buildClubCharts(trajectory: ClubTrajectory): ChartPanel[] {
  const { time } = trajectory;
  const xLabel = 'Years';

  const panels: ChartPanel[] = [
    {
      id: 'saudi',
      model: 'club',
      title: 'Saudi Club Strategy Evolution',
      xLabel,
      grid: false,
      time,
      series: [
        series('saudiYouth', 'Saudi Youth Dev Probability', SERIES_COLORS.green, trajectory.x),
        series('saudiStar', 'Saudi Superstar Probability', SERIES_COLORS.magenta, complement(trajectory.x)),
      ],
    },
    {
      id: 'europe',
      model: 'club',
      title: 'European Club Strategy Evolution',
      xLabel,
      grid: false,
      time,
      series: [
        series('europeYouth', 'Europe Youth Dev Probability', SERIES_COLORS.blue, trajectory.y),
        series('europeStar', 'Europe Superstar Probability', SERIES_COLORS.cyan, complement(trajectory.y)),
      ],
    },
    {
      id: 'joint',
      model: 'club',
      title: 'Joint Strategy Populations Over Time',
      xLabel,
      grid: false,
      time,
      series: [
        series('youthYouth', 'Saudi Youth & Europe Youth', SERIES_COLORS.green, trajectory.youthYouth),
        series('youthStar', 'Saudi Youth & Europe Star', SERIES_COLORS.magenta, trajectory.youthStar),
        series('starYouth', 'Saudi Star & Europe Youth', SERIES_COLORS.blue, trajectory.starYouth),
        series('starStar', 'Saudi Star & Europe Star', SERIES_COLORS.cyan, trajectory.starStar),
      ],
    },
  ];

  reportInvalidCharts(panels);
  return panels;
}

export function buildPlayerCharts(trajectory: PlayerTrajectory): ChartPanel[] {
  const { time } = trajectory;
  const xLabel = 'Time (Season)';

  const last = trajectory.x.length - 1;
  if (last >= 0) {
    assertRange('playerShare', trajectory.x[last], 0, 1);
  }

  const panels: ChartPanel[] = [
    {
      id: 'population',
      model: 'player',
      title: 'Player Distribution Over Time',
      xLabel,
      yLabel: 'Population Fraction',
      grid: true,
      time,
      series: [
        series('prestige', 'Prestige Players (P)', SERIES_COLORS.blue, trajectory.x),
        series('money', 'Money Players (M)', SERIES_COLORS.red, complement(trajectory.x)),
      ],
    },
    {
      id: 'payoffs',
      model: 'player',
      title: 'Payoff Dynamics',
      xLabel,
      yLabel: 'Payoff Value',
      grid: true,
      time,
      series: [
        series('fP', 'Avg. Prestige Payoff', SERIES_COLORS.blue, trajectory.fP),
        series('fM', 'Avg. Money Payoff', SERIES_COLORS.red, trajectory.fM),
        series('a', 'PvP Payoff', SERIES_COLORS.blue, trajectory.a, 'dashed'),
        series('d', 'MvM Payoff', SERIES_COLORS.red, trajectory.d, 'dashed'),
      ],
    },
  ];

  reportInvalidCharts(panels);
  return panels;
}
