import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { HolderRecord, MetricsRow, ProposalRecord } from '../engine/types';
import { ARCHETYPE_IDS, TIER_LABELS } from '../sim/archetypes';

export function toCSV(headers: string[], rows: (string | number | boolean | null)[][]): string {
  const esc = (v: string | number | boolean | null) => {
    const s = String(v ?? '');
    return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
  };
  return [headers.join(','), ...rows.map(r => r.map(esc).join(','))].join('\n');
}

export function writeCSV(filename: string, csv: string) {
  mkdirSync(dirname(filename), { recursive: true });
  writeFileSync(filename, csv + '\n', 'utf8');
}

// nested per-archetype / per-tier maps are flattened into rsc_<id> and count_<tier> columns
export function historyToCSV(rows: MetricsRow[]): string {
  const scalar = [
    'step', 'year', 'participationRate', 'currentApy', 'totalRscHeld', 'effectiveRsc',
    'circulatingSupply', 'weeklyEmission', 'cumulativeEmissions', 'totalBurned',
    'activeHolders', 'exitedHolders', 'openProposals', 'fundedProposals',
    'completedProposals', 'failedProposals', 'exitsStep', 'entriesStep',
    'creditsGeneratedStep', 'creditsDeployedStep', 'creditsExpiredStep',
  ] as const;
  const headers = [
    ...scalar,
    ...ARCHETYPE_IDS.map(id => `rsc_${id}`),
    ...TIER_LABELS.map(t => `count_${t}`),
  ];
  return toCSV(headers, rows.map(r => [
    ...scalar.map(k => r[k]),
    ...ARCHETYPE_IDS.map(id => r.rscByArchetype[id]),
    ...TIER_LABELS.map(t => r.countByTier[t]),
  ]));
}

export function holdersToCSV(holders: HolderRecord[]): string {
  const cols = [
    'id', 'archetype', 'active', 'missionAlignment', 'engagement', 'priceSensitivity',
    'holdHorizon', 'rscHeld', 'initialRsc', 'weeksHeld', 'multiplier', 'yieldThreshold',
    'credits', 'totalEarned', 'totalDeployed', 'totalBurned', 'totalExpired', 'idleSteps',
  ] as const;
  return toCSV([...cols], holders.map(h => cols.map(k => h[k])));
}

export function proposalsToCSV(proposals: ProposalRecord[]): string {
  const cols = [
    'id', 'status', 'fundingTarget', 'creditsReceived', 'fundingProgress', 'backerCount',
    'stepCreated', 'stepFunded', 'stepResolved',
  ] as const;
  return toCSV([...cols], proposals.map(p => cols.map(k => p[k])));
}
