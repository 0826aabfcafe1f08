// src/store/simulationStore.ts
import { createStore } from 'zustand/vanilla';
import type { MetricsRow, SimEvent } from '../engine/types';
import type { ModelConfig } from '../sim/config';
import { EndowmentModel, type ModelOptions } from '../sim/model';

/* --- session state: one live model per store --- */
export type SimulationStore = {
  model: EndowmentModel;
  config: ModelConfig;
  revision: number;      // bumps on every init/step so subscribers can diff cheaply
  latest: MetricsRow | undefined;
  recentEvents: SimEvent[];

  init: (config?: ModelConfig) => EndowmentModel;
  reset: () => EndowmentModel;
  step: () => MetricsRow | undefined;
  run: (steps: number) => MetricsRow | undefined;
};

const RECENT_EVENTS = 20;

const lastRow = (model: EndowmentModel) => model.getLatestMetrics();

export function createSimulationStore(config: ModelConfig = {}, opts: ModelOptions = {}) {
  // constructed up-front so an invalid config fails before a store exists
  const first = new EndowmentModel(config, opts);

  return createStore<SimulationStore>()((set, get) => ({
    model: first,
    config,
    revision: 0,
    latest: lastRow(first),
    recentEvents: first.getEvents(RECENT_EVENTS),

    init: (next = {}) => {
      const model = new EndowmentModel(next, opts);
      set((s) => ({
        model,
        config: next,
        revision: s.revision + 1,
        latest: lastRow(model),
        recentEvents: model.getEvents(RECENT_EVENTS),
      }));
      return model;
    },

    // same parameters, same seed -> same run from the start
    reset: () => {
      const { model, config: current } = get();
      return get().init({ ...current, seed: model.params.seed });
    },

    step: () => get().run(1),

    run: (steps) => {
      const { model } = get();
      const n = Math.max(0, Math.floor(steps));
      model.runSteps(n);
      const latest = lastRow(model);
      set((s) => ({ revision: s.revision + 1, latest, recentEvents: model.getEvents(RECENT_EVENTS) }));
      return latest;
    },
  }));
}
