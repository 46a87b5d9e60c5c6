/**
 * Simulation Store
 * Holds the live parameters for both models and the trajectories computed
 * from them. Every accepted edit recomputes the whole trajectory from t=0.
 */

import { createStore } from "zustand/vanilla";
import type {
  ClubParams,
  ClubTrajectory,
  ModelId,
  PlayerParams,
  PlayerTrajectory,
  ValidationWarning,
} from "../lib/model/types";
import { simulateClubStrategy } from "../lib/model/club_strategy";
import { findPopulationExcursions, simulatePlayerStrategy } from "../lib/model/player_strategy";
import { getReferenceClubParams, getReferencePlayerParams, DEFAULT_SAMPLE_COUNT } from "../lib/model/modes/reference";
import { resolveSampleCount, SimulationConfigError } from "../lib/model/validation";
import {
  ClubSliderId,
  CLUB_SLIDER_CONFIGS,
  PlayerSliderId,
  PLAYER_SLIDER_CONFIGS,
  snapToSlider,
  SliderConfig,
  validateConfiguration,
} from "../lib/ui/sliderCoupling";
import { buildClubCharts, buildPlayerCharts, ChartPanel } from "../lib/charts/chartSeries";

export interface SimulationStoreState {
  sampleCount: number;
  clubParams: ClubParams;
  playerParams: PlayerParams;
  clubTrajectory: ClubTrajectory;
  playerTrajectory: PlayerTrajectory;
  warnings: Record<ModelId, ValidationWarning[]>;
  lastError: string | null;
  // Counts edits, accepted or not
  revision: number;

  // Actions (return false when the edit was rejected)
  updateClubParams: (updates: Partial<ClubParams>) => boolean;
  updatePlayerParams: (updates: Partial<PlayerParams>) => boolean;
  setSliderValue: (model: ModelId, id: string, rawValue: number) => boolean;
  resetModel: (model: ModelId) => boolean;
}

export interface SimulationStoreOptions {
  clubParams?: Partial<ClubParams>;
  playerParams?: Partial<PlayerParams>;
  sampleCount?: number;
}

function withValue<T extends object, K extends keyof T>(params: T, key: K, value: T[K]): T {
  return { ...params, [key]: value };
}

function findSlider<Id extends string>(configs: SliderConfig<Id>[], id: string): SliderConfig<Id> | undefined {
  return configs.find(config => config.id === id);
}

function sliderValues(params: ClubParams | PlayerParams): Record<string, number> {
  const values: Record<string, number> = {};
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === 'number') values[key] = value;
  }
  return values;
}

function playerWarnings(trajectory: PlayerTrajectory): ValidationWarning[] {
  const warnings = findPopulationExcursions(trajectory);
  for (const warning of warnings) {
    console.warn(`[SIM] ${warning.message}`);
  }
  return warnings;
}

/**
 * Create a store. Initial parameters are simulated immediately, so a bad
 * override throws SimulationConfigError here rather than on first edit.
 */
export function createSimulationStore(options: SimulationStoreOptions = {}) {
  const sampleCount = resolveSampleCount({ sampleCount: options.sampleCount ?? DEFAULT_SAMPLE_COUNT });
  const initialClub: ClubParams = { ...getReferenceClubParams(), ...options.clubParams };
  const initialPlayer: PlayerParams = { ...getReferencePlayerParams(), ...options.playerParams };
  const initialPlayerTrajectory = simulatePlayerStrategy(initialPlayer, { sampleCount });

  return createStore<SimulationStoreState>()((set, get) => {
    /**
     * Check the edited keys against their sliders, simulate, commit.
     * Untouched values (initial overrides included) are left to the engine.
     * Config errors leave the previous trajectory in place and land in lastError.
     */
    const apply = (
      model: ModelId,
      compute: () => Partial<SimulationStoreState>,
      values: Record<string, number>,
      edited: string[]
    ): boolean => {
      set({ revision: get().revision + 1 });

      const sliderIssues = validateConfiguration(model, values);
      const rejected = sliderIssues.find(
        w => w.type === 'error' && w.parameter !== undefined && edited.includes(w.parameter)
      );
      if (rejected) {
        console.warn(`[STORE] Rejected ${model} update: ${rejected.message}`);
        set({ lastError: rejected.message });
        return false;
      }

      let next: Partial<SimulationStoreState>;
      try {
        next = compute();
      } catch (err) {
        if (err instanceof SimulationConfigError) {
          console.warn(`[STORE] ${err.message}`);
          set({ lastError: err.message });
          return false;
        }
        throw err;
      }

      set({ ...next, lastError: null });
      return true;
    };

    const applyClub = (params: ClubParams, edited: string[]): boolean =>
      apply('club', () => {
        const clubTrajectory = simulateClubStrategy(params, { sampleCount });
        return {
          clubParams: params,
          clubTrajectory,
          warnings: { ...get().warnings, club: [] },
        };
      }, sliderValues(params), edited);

    const applyPlayer = (params: PlayerParams, edited: string[]): boolean =>
      apply('player', () => {
        const playerTrajectory = simulatePlayerStrategy(params, { sampleCount });
        return {
          playerParams: params,
          playerTrajectory,
          warnings: { ...get().warnings, player: playerWarnings(playerTrajectory) },
        };
      }, sliderValues(params), edited);

    return {
      sampleCount,
      clubParams: initialClub,
      playerParams: initialPlayer,
      clubTrajectory: simulateClubStrategy(initialClub, { sampleCount }),
      playerTrajectory: initialPlayerTrajectory,
      warnings: {
        club: [],
        player: playerWarnings(initialPlayerTrajectory),
      },
      lastError: null,
      revision: 0,

      updateClubParams: (updates) => applyClub({ ...get().clubParams, ...updates }, Object.keys(updates)),

      updatePlayerParams: (updates) => applyPlayer({ ...get().playerParams, ...updates }, Object.keys(updates)),

      setSliderValue: (model, id, rawValue) => {
        if (model === 'club') {
          const config = findSlider<ClubSliderId>(CLUB_SLIDER_CONFIGS, id);
          if (!config) throw new Error(`[STORE] Unknown club slider: ${id}`);
          return applyClub(withValue(get().clubParams, config.id, snapToSlider(config, rawValue)), [config.id]);
        }
        const config = findSlider<PlayerSliderId>(PLAYER_SLIDER_CONFIGS, id);
        if (!config) throw new Error(`[STORE] Unknown player slider: ${id}`);
        return applyPlayer(withValue(get().playerParams, config.id, snapToSlider(config, rawValue)), [config.id]);
      },

      resetModel: (model) =>
        model === 'club'
          ? applyClub({ ...getReferenceClubParams(), ...options.clubParams }, [])
          : applyPlayer({ ...getReferencePlayerParams(), ...options.playerParams }, []),
    };
  });
}

export type SimulationStore = ReturnType<typeof createSimulationStore>;

export function selectCharts(state: SimulationStoreState, model: ModelId): ChartPanel[] {
  return model === 'club'
    ? buildClubCharts(state.clubTrajectory)
    : buildPlayerCharts(state.playerTrajectory);
}
