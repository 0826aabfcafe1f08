import type { ArchetypeId, HolderArchetype, ProposalStatus, StepDeployment, TierLabel } from '../engine/types';
import { ARCHETYPE_IDS, TIME_WEIGHT_MULTIPLIERS, tierForWeeks } from './archetypes';
import type { Holder } from './holder';
import type { Proposal } from './proposal';

export interface TierBucket {
  count: number;
  rsc: number;
  multiplier: number;
}

export interface ArchetypeMetrics {
  total: number;
  active: number;
  exited: number;
  avgRsc: number;
  avgWeeksHeld: number;
  avgMultiplier: number;
  avgCredits: number;
  totalDeployed: number;
  totalBurned: number;
}

export const SCENARIO_RATES = { '15pct': 0.15, '30pct': 0.3, '70pct': 0.7 } as const;
export type ScenarioKey = keyof typeof SCENARIO_RATES;

export interface ParticipationData {
  participationRate: number;
  currentApy: number;
  totalRscHeld: number;
  circulatingSupply: number;
  annualEmission: number;
  year: number;
  scenarios: Record<ScenarioKey, number>;
}

const sum = (xs: readonly number[]) => xs.reduce((s, x) => s + x, 0);
const mean = (xs: readonly number[]) => (xs.length ? sum(xs) / xs.length : 0);

export function activeOnly(holders: readonly Holder[]): Holder[] {
  return holders.filter((h) => h.active);
}

export function rscByArchetype(holders: readonly Holder[]): Record<ArchetypeId, number> {
  const out: Record<ArchetypeId, number> = { believer: 0, yield_seeker: 0, institution: 0, speculator: 0 };
  for (const h of holders) {
    if (h.active && h.archetype !== 'custom') out[h.archetype] += h.rscHeld;
  }
  return out;
}

export function multiplierDistribution(holders: readonly Holder[]): Record<TierLabel, TierBucket> {
  const out: Record<TierLabel, TierBucket> = {
    New: { count: 0, rsc: 0, multiplier: 1 },
    Holder: { count: 0, rsc: 0, multiplier: 1 },
    LongTerm: { count: 0, rsc: 0, multiplier: 1 },
  };
  for (const tier of TIME_WEIGHT_MULTIPLIERS) out[tier.label].multiplier = tier.multiplier;
  for (const h of holders) {
    if (!h.active) continue;
    const b = out[tierForWeeks(h.weeksHeld).label];
    b.count += 1;
    b.rsc += h.rscHeld;
  }
  return out;
}

export function countByTier(holders: readonly Holder[]): Record<TierLabel, number> {
  const dist = multiplierDistribution(holders);
  return { New: dist.New.count, Holder: dist.Holder.count, LongTerm: dist.LongTerm.count };
}

// Active holders per archetype.
export function archetypeDistribution(holders: readonly Holder[]): Partial<Record<HolderArchetype, number>> {
  const out: Partial<Record<HolderArchetype, number>> = {};
  for (const h of holders) {
    if (h.active) out[h.archetype] = (out[h.archetype] ?? 0) + 1;
  }
  return out;
}

// Archetypes with no holders at all are left out.
export function archetypeMetrics(holders: readonly Holder[]): Partial<Record<ArchetypeId, ArchetypeMetrics>> {
  const out: Partial<Record<ArchetypeId, ArchetypeMetrics>> = {};
  for (const id of ARCHETYPE_IDS) {
    const group = holders.filter((h) => h.archetype === id);
    if (group.length === 0) continue;
    const active = activeOnly(group);
    out[id] = {
      total: group.length,
      active: active.length,
      exited: group.length - active.length,
      avgRsc: mean(active.map((h) => h.rscHeld)),
      avgWeeksHeld: mean(active.map((h) => h.weeksHeld)),
      avgMultiplier: mean(active.map((h) => h.multiplier)),
      avgCredits: mean(active.map((h) => h.credits)),
      totalDeployed: sum(group.map((h) => h.totalDeployed)),
      totalBurned: sum(group.map((h) => h.totalBurned)),
    };
  }
  return out;
}

export function scenarioApys(annualEmission: number, circulating: number): Record<ScenarioKey, number> {
  const at = (rate: number) => (circulating > 0 ? annualEmission / (circulating * rate) : 0);
  return {
    '15pct': at(SCENARIO_RATES['15pct']),
    '30pct': at(SCENARIO_RATES['30pct']),
    '70pct': at(SCENARIO_RATES['70pct']),
  };
}

export function stepDeployments(holders: readonly Holder[], step: number): StepDeployment[] {
  const out: StepDeployment[] = [];
  for (const h of holders) {
    for (const d of h.deployments) {
      if (d.step === step) out.push({ ...d, holderId: h.id, archetype: h.archetype });
    }
  }
  return out;
}

export function countByStatus(proposals: readonly Proposal[]): Record<ProposalStatus, number> {
  const out: Record<ProposalStatus, number> = { open: 0, funded: 0, completed: 0, failed: 0 };
  for (const p of proposals) out[p.status] += 1;
  return out;
}
