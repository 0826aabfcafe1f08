export * from './engine/types';
export { RNG } from './engine/rng';
export { EmissionSchedule, WEEKS_PER_YEAR } from './engine/emissions';
export { default as EventLog, SIM_EVENT, SimEventNotice } from './engine/events';
export { MetricsHistory } from './engine/aggregator';

export {
  ARCHETYPES,
  ARCHETYPE_IDS,
  TIME_WEIGHT_MULTIPLIERS,
  TIER_LABELS,
  getArchetype,
  getMultiplierTier,
  isArchetypeId,
  listArchetypes,
  listMultipliers,
  tierForWeeks,
  timeWeightMultiplier,
  type ArchetypeDef,
  type MultiplierTier,
} from './sim/archetypes';
export {
  DEFAULT_ARCHETYPE_MIX,
  DEFAULT_PARAMS,
  EMISSION_PARAMS,
  ModelConfigSchema,
  resolveConfig,
  type DefaultParams,
  type ModelConfig,
} from './sim/config';
export { ConfigError, InvalidTransitionError } from './sim/errors';
export { CreditLedger } from './sim/credits';
export { Holder, type HolderOptions, type HolderStepOutcome, type StepContext } from './sim/holder';
export { Proposal } from './sim/proposal';
export {
  EndowmentModel,
  createModel,
  type AggregateSnapshot,
  type ModelMetrics,
  type ModelOptions,
  type ModelState,
  type StepCounters,
} from './sim/model';
export type { ArchetypeMetrics, ParticipationData, TierBucket } from './sim/reports';
export { createSimulationStore, type SimulationStore } from './store/simulationStore';
export { historyToCSV, holdersToCSV, proposalsToCSV, toCSV } from './utils/csv';
