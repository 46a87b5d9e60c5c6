export * from './lib/model/types';
export {
  buildTimeGrid,
  integrateReplicator,
  type BoundaryPolicy,
  type IntegrationOptions,
  type IntegrationResult,
  type ReplicatorRule,
  type StepEvaluation,
} from './lib/model/replicator';
export {
  clubReplicatorRule,
  evaluateClubPayoffs,
  jointStrategyShares,
  simulateClubStrategy,
  swapPopulations,
  type ClubPayoffs,
  type JointStrategyShares,
} from './lib/model/club_strategy';
export {
  evaluatePlayerPayoffs,
  findPopulationExcursions,
  playerReplicatorRule,
  simulatePlayerStrategy,
  PLAYER_AUXILIARY_KEYS,
  type PlayerPayoffs,
} from './lib/model/player_strategy';
export {
  DEFAULT_SAMPLE_COUNT,
  REFERENCE_PAYOFFS,
  getReferenceClubParams,
  getReferencePlayerParams,
} from './lib/model/modes/reference';
export { SimulationConfigError } from './lib/model/validation';
export {
  CLUB_SLIDER_CONFIGS,
  PLAYER_SLIDER_CONFIGS,
  SLIDER_CONFIGS,
  formatSliderValue,
  getInitialSliderValues,
  getSliderConfig,
  snapToSlider,
  validateConfiguration,
  type SliderConfig,
} from './lib/ui/sliderCoupling';
export { buildClubCharts, buildPlayerCharts, type ChartPanel, type ChartSeries } from './lib/charts/chartSeries';
export { CHART_CONTRACTS, reportInvalidCharts, validateAllCharts, validateChartPanel } from './lib/utils/chartValidator';
export { createSimulationStore, selectCharts, type SimulationStore, type SimulationStoreState } from './store/simulationStore';
