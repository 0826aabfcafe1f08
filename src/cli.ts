#!/usr/bin/env node
/**
 * Endowment simulation CLI
 *
 * Usage:
 *   npm run sim -- run --steps 104 --seed 42
 *   npm run sim -- run --holders 500 --mix believer=0.4,speculator=0.6 --csv out/history.csv
 *   npm run sim -- archetypes
 */

import { pathToFileURL } from 'url';

import { Command, InvalidArgumentError } from 'commander';

import { SIM_EVENT, SimEventNotice } from './engine/events';
import type { FailureMode } from './engine/types';
import { listArchetypes, listMultipliers } from './sim/archetypes';
import { DEFAULT_ARCHETYPE_MIX, DEFAULT_PARAMS, EMISSION_PARAMS, FailureModeSchema, type ModelConfig } from './sim/config';
import { ConfigError } from './sim/errors';
import { pct } from './sim/holder';
import { createSimulationStore } from './store/simulationStore';
import { historyToCSV, holdersToCSV, proposalsToCSV, writeCSV } from './utils/csv';

export interface RunOptions {
  steps: number;
  seed?: string;
  holders?: number;
  proposals?: number;
  burnRate?: number;
  successRate?: number;
  fundingMin?: number;
  fundingMax?: number;
  deployProbability?: number;
  yieldThreshold?: number;
  participation?: number;
  mix?: Record<string, number>;
  expiry?: number;
  failureMode?: string;
  csv?: string;
  holdersCsv?: string;
  proposalsCsv?: string;
  events: number;
  verbose: boolean;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError(`Not a number: ${value}`);
  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError(`Not an integer: ${value}`);
  return n;
}

// "believer=0.4,speculator=0.6" -> { believer: 0.4, speculator: 0.6 }
export function parseMix(value: string): Record<string, number> {
  const mix: Record<string, number> = {};
  for (const part of value.split(',')) {
    const [id, fraction] = part.split('=').map((s) => s.trim());
    if (!id || fraction === undefined) throw new InvalidArgumentError(`Expected id=fraction, got "${part}"`);
    mix[id] = parseNumber(fraction);
  }
  return mix;
}

export function buildConfig(o: RunOptions): ModelConfig {
  let failureMode: FailureMode | undefined;
  if (o.failureMode !== undefined) {
    const parsed = FailureModeSchema.safeParse(o.failureMode);
    if (!parsed.success) {
      throw new ConfigError(`Unknown failure mode: ${o.failureMode}. Available: ${FailureModeSchema.options.join(', ')}`);
    }
    failureMode = parsed.data;
  }
  const seed = o.seed === undefined ? undefined : /^-?\d+$/.test(o.seed) ? Number(o.seed) : o.seed;
  return {
    numHolders: o.holders,
    numProposals: o.proposals,
    burnRate: o.burnRate,
    successRate: o.successRate,
    fundingTargetMin: o.fundingMin,
    fundingTargetMax: o.fundingMax,
    deployProbability: o.deployProbability,
    yieldThresholdMean: o.yieldThreshold,
    initialParticipationRate: o.participation,
    archetypeMix: o.mix,
    seed,
    creditExpiryEnabled: o.expiry !== undefined ? true : undefined,
    creditExpiryWeeks: o.expiry,
    failureMode,
  };
}

function run(o: RunOptions) {
  const bus = new EventTarget();
  if (o.verbose) {
    bus.addEventListener(SIM_EVENT, (ev) => {
      if (ev instanceof SimEventNotice) console.log(`  [${ev.detail.step}] ${ev.detail.type}: ${ev.detail.message}`);
    });
  }

  const store = createSimulationStore(buildConfig(o), { bus });
  const { model } = store.getState();

  console.log('Endowment Simulation');
  console.log('====================');
  console.log(`Seed: ${model.params.seed}`);
  console.log(`Holders: ${model.holders.length}  Proposals: ${model.proposals.length}`);
  console.log(`Steps: ${o.steps}`);
  console.log('');

  const latest = store.getState().run(o.steps);
  const m = model.getMetrics();

  console.log(`Step ${m.step} (year ${m.year.toFixed(2)})`);
  console.log(`  Participation rate: ${pct(m.participationRate)}`);
  console.log(`  Current APY:        ${pct(m.currentApy)}`);
  console.log(`  RSC held:           ${Math.round(m.totalRscHeld).toLocaleString('en-US')}`);
  console.log(`  Circulating:        ${Math.round(m.circulatingSupply).toLocaleString('en-US')}`);
  console.log(`  Burned:             ${m.totalBurned.toFixed(2)}`);
  console.log(`  Holders:            ${m.activeHolders} active / ${m.exitedHolders} exited`);
  console.log(
    `  Proposals:          ${m.openProposals} open, ${m.fundedProposals} funded, ` +
      `${m.completedProposals} completed, ${m.failedProposals} failed`,
  );
  if (latest) console.log(`  Last step:          ${latest.exitsStep} exits, ${latest.entriesStep} entries`);

  const scenarios = model.getParticipationData().scenarios;
  console.log(
    `  Reference APY:      15% -> ${pct(scenarios['15pct'])}, 30% -> ${pct(scenarios['30pct'])}, 70% -> ${pct(scenarios['70pct'])}`,
  );

  if (o.events > 0) {
    console.log('');
    console.log('Recent events:');
    for (const ev of model.getEvents(o.events)) console.log(`  [${ev.step}] ${ev.type}: ${ev.message}`);
  }

  if (o.csv) {
    writeCSV(o.csv, historyToCSV(model.getHistory()));
    console.log(`\nHistory written to ${o.csv}`);
  }
  if (o.holdersCsv) {
    writeCSV(o.holdersCsv, holdersToCSV(model.getHolders()));
    console.log(`Holders written to ${o.holdersCsv}`);
  }
  if (o.proposalsCsv) {
    writeCSV(o.proposalsCsv, proposalsToCSV(model.getProposals()));
    console.log(`Proposals written to ${o.proposalsCsv}`);
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('endowment-sim')
    .description('Simulate holder participation in a yield-bearing endowment account')
    .version('0.1.0');

  program
    .command('run')
    .description('Run the model for a number of weekly steps and print a summary')
    .option('-n, --steps <n>', 'Weekly steps to run', parseInteger, 52)
    .option('-s, --seed <seed>', 'RNG seed (number or string)')
    .option('--holders <n>', 'Initial holder count', parseInteger)
    .option('--proposals <n>', 'Initial open proposals', parseInteger)
    .option('--burn-rate <rate>', 'RSC burn rate on deployment', parseNumber)
    .option('--success-rate <rate>', 'Proposal completion probability', parseNumber)
    .option('--funding-min <credits>', 'Minimum funding target', parseInteger)
    .option('--funding-max <credits>', 'Maximum funding target', parseInteger)
    .option('--deploy-probability <p>', 'Deploy probability scaling', parseNumber)
    .option('--yield-threshold <apy>', 'Mean APY below which holders feel exit pressure', parseNumber)
    .option('--participation <rate>', 'Informational initial participation target', parseNumber)
    .option('--mix <mix>', 'Archetype mix, e.g. believer=0.5,yield_seeker=0.5', parseMix)
    .option('--expiry <weeks>', 'Enable credit expiry after this many weeks', parseInteger)
    .option('--failure-mode <mode>', 'nothing | partial_refund')
    .option('--csv <file>', 'Write metrics history as CSV')
    .option('--holders-csv <file>', 'Write final holder table as CSV')
    .option('--proposals-csv <file>', 'Write final proposal table as CSV')
    .option('-e, --events <n>', 'Recent events to print', parseInteger, 10)
    .option('-v, --verbose', 'Print every event as it happens', false)
    .action((options: RunOptions) => {
      try {
        run(options);
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        console.error(`Configuration error: ${err.message}`);
        process.exitCode = 1;
      }
    });

  program
    .command('archetypes')
    .description('List behavioural archetypes and the default population mix')
    .action(() => {
      for (const a of listArchetypes()) {
        const share = DEFAULT_ARCHETYPE_MIX[a.id] ?? 0;
        console.log(`${a.id.padEnd(13)} ${pct(share).padStart(6)}  ${a.description}`);
      }
    });

  program
    .command('multipliers')
    .description('List time-weight multiplier tiers')
    .action(() => {
      for (const t of listMultipliers()) console.log(`${t.label.padEnd(9)} ${t.multiplier.toFixed(2)}x  ${t.description}`);
    });

  program
    .command('defaults')
    .description('Print default parameters and emission constants')
    .action(() => {
      console.log(JSON.stringify({ ...DEFAULT_PARAMS, emission: EMISSION_PARAMS }, null, 2));
    });

  return program;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  buildProgram().parse(process.argv);
}
