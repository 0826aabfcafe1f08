import type { ArchetypeId, Range, TierLabel } from '../engine/types';
import { ConfigError } from './errors';

export interface ArchetypeDef {
  id: ArchetypeId;
  name: string;
  description: string;
  missionAlignment: Range;
  engagement: Range;
  priceSensitivity: Range;
  holdHorizon: Range;
  rscRange: Range;
  yieldThresholdOffset: number;
  warmStartWeeks: Range | null; // pre-existing holding history at t=0
}

export const ARCHETYPES: Readonly<Record<ArchetypeId, ArchetypeDef>> = {
  believer: {
    id: 'believer',
    name: 'Believer',
    description: 'Believes in open science. Holds long-term, deploys reliably, low churn.',
    missionAlignment: [0.7, 1.0],
    engagement: [0.6, 0.9],
    priceSensitivity: [0.0, 0.2],
    holdHorizon: [0.7, 1.0],
    rscRange: [5_000, 50_000],
    yieldThresholdOffset: -0.04,
    warmStartWeeks: null,
  },
  yield_seeker: {
    id: 'yield_seeker',
    name: 'Yield Seeker',
    description: 'Joins when yield is above threshold, exits when it falls. Primary self-balancing force.',
    missionAlignment: [0.1, 0.4],
    engagement: [0.2, 0.5],
    priceSensitivity: [0.7, 1.0],
    holdHorizon: [0.2, 0.5],
    rscRange: [1_000, 20_000],
    yieldThresholdOffset: 0.01,
    warmStartWeeks: null,
  },
  institution: {
    id: 'institution',
    name: 'Institution',
    description: 'Universities and foundations. Large holdings, very long-term, anchors participation.',
    missionAlignment: [0.6, 0.9],
    engagement: [0.4, 0.7],
    priceSensitivity: [0.0, 0.15],
    holdHorizon: [0.85, 1.0],
    rscRange: [100_000, 1_000_000],
    yieldThresholdOffset: -0.06,
    warmStartWeeks: [0, 52],
  },
  speculator: {
    id: 'speculator',
    name: 'Speculator',
    description: 'Enters on high yield, exits quickly. Amplifies participation swings.',
    missionAlignment: [0.0, 0.15],
    engagement: [0.05, 0.2],
    priceSensitivity: [0.85, 1.0],
    holdHorizon: [0.0, 0.2],
    rscRange: [500, 15_000],
    yieldThresholdOffset: 0.03,
    warmStartWeeks: null,
  },
};

export const ARCHETYPE_IDS: readonly ArchetypeId[] = ['believer', 'yield_seeker', 'institution', 'speculator'];

export function isArchetypeId(id: string): id is ArchetypeId {
  return Object.prototype.hasOwnProperty.call(ARCHETYPES, id);
}

export function getArchetype(id: string): ArchetypeDef {
  if (!isArchetypeId(id)) {
    throw new ConfigError(`Unknown archetype: ${id}. Available: ${ARCHETYPE_IDS.join(', ')}`);
  }
  return ARCHETYPES[id];
}

export function listArchetypes(): ArchetypeDef[] {
  return ARCHETYPE_IDS.map((id) => ARCHETYPES[id]);
}

/* --- time-weight multipliers --- */

export interface MultiplierTier {
  label: TierLabel;
  minWeeks: number;
  maxWeeks: number | null; // last whole week in the tier, null = unbounded
  multiplier: number;
  description: string;
}

export const TIME_WEIGHT_MULTIPLIERS: readonly MultiplierTier[] = [
  { label: 'New', minWeeks: 0, maxWeeks: 3, multiplier: 1.0, description: 'Holding < 4 weeks. Base yield share.' },
  { label: 'Holder', minWeeks: 4, maxWeeks: 52, multiplier: 1.15, description: 'Holding 4 weeks to 1 year. 15% boost.' },
  { label: 'LongTerm', minWeeks: 53, maxWeeks: null, multiplier: 1.2, description: 'Holding > 1 year. 20% boost.' },
];

export const TIER_LABELS: TierLabel[] = TIME_WEIGHT_MULTIPLIERS.map((t) => t.label);

// Highest tier whose lower bound has been reached.
export function tierForWeeks(weeksHeld: number): MultiplierTier {
  for (let i = TIME_WEIGHT_MULTIPLIERS.length - 1; i > 0; i--) {
    if (weeksHeld >= TIME_WEIGHT_MULTIPLIERS[i].minWeeks) return TIME_WEIGHT_MULTIPLIERS[i];
  }
  return TIME_WEIGHT_MULTIPLIERS[0];
}

export function timeWeightMultiplier(weeksHeld: number): number {
  return tierForWeeks(weeksHeld).multiplier;
}

export function getMultiplierTier(label: string): MultiplierTier {
  const tier = TIME_WEIGHT_MULTIPLIERS.find((t) => t.label === label);
  if (!tier) {
    throw new ConfigError(`Unknown tier: ${label}. Available: ${TIER_LABELS.join(', ')}`);
  }
  return tier;
}

export function listMultipliers(): MultiplierTier[] {
  return TIME_WEIGHT_MULTIPLIERS.map((t) => ({ ...t }));
}
