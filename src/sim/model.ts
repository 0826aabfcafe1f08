import { MetricsHistory } from '../engine/aggregator';
import { EmissionSchedule, WEEKS_PER_YEAR } from '../engine/emissions';
import EventLog from '../engine/events';
import { RNG } from '../engine/rng';
import type {
  ArchetypeId,
  EmissionParams,
  EventType,
  HolderArchetype,
  HolderRecord,
  MetricsRow,
  ModelParams,
  ProposalRecord,
  SimEvent,
  StepDeployment,
  TierLabel,
} from '../engine/types';
import { getArchetype } from './archetypes';
import { EMISSION_PARAMS, resolveConfig, type ModelConfig } from './config';
import { BASELINE_DEPLOY_PROBABILITY, Holder, pct, type HolderOptions, type StepContext } from './holder';
import { Proposal } from './proposal';
import {
  archetypeDistribution,
  archetypeMetrics,
  countByStatus,
  countByTier,
  multiplierDistribution,
  rscByArchetype,
  scenarioApys,
  stepDeployments,
  type ArchetypeMetrics,
  type ParticipationData,
  type TierBucket,
} from './reports';

const ENTRY_THRESHOLD_MULT = 1.1;
const MAX_ENTRY_PROBABILITY = 0.15;
const MAX_OPEN_PROPOSALS = 5;
const PROPOSAL_SPAWN_PROBABILITY = 0.3;
const REFUND_SHARE = 0.5;

export interface ModelOptions {
  bus?: EventTarget;
  emission?: EmissionParams;
}

export interface StepCounters {
  creditsGenerated: number;
  creditsDeployed: number;
  creditsExpired: number;
  exits: number;
  entries: number;
}

export interface AggregateSnapshot {
  totalRscHeld: number;
  totalEffectiveRsc: number;
  annualEmission: number;
  weeklyEmission: number;
  currentApy: number;
}

export interface ModelMetrics {
  step: number;
  year: number;
  participationRate: number;
  currentApy: number;
  totalRscHeld: number;
  circulatingSupply: number;
  annualEmission: number;
  weeklyEmission: number;
  cumulativeEmissions: number;
  totalCredits: number;
  totalBurned: number;
  totalCreditsGenerated: number;
  totalCreditsDeployed: number;
  totalCreditsExpired: number;
  deploymentRate: number;
  multiplierDistribution: Record<TierLabel, TierBucket>;
  openProposals: number;
  fundedProposals: number;
  completedProposals: number;
  failedProposals: number;
  successRateActual: number;
  numHolders: number;
  activeHolders: number;
  exitedHolders: number;
  numProposals: number;
}

export interface ModelState extends ModelMetrics {
  archetypeDistribution: Partial<Record<HolderArchetype, number>>;
  archetypeMetrics: Partial<Record<ArchetypeId, ArchetypeMetrics>>;
  participationData: ParticipationData;
  stepDeployments: StepDeployment[];
  stepCounters: StepCounters;
  params: ModelParams;
}

const emptyCounters = (): StepCounters => ({
  creditsGenerated: 0,
  creditsDeployed: 0,
  creditsExpired: 0,
  exits: 0,
  entries: 0,
});

/**
 * Weekly-step endowment model.
 *
 * Holders earn a share of a decaying emission as funding credits, push credits into
 * proposals (burning RSC as they go) and leave when the APY drops under their
 * threshold. Exits raise the APY, which draws new yield seekers back in, and the
 * participation rate is where that loop settles.
 */
export class EndowmentModel {
  readonly params: Readonly<ModelParams>;
  readonly bus: EventTarget;

  private rng: RNG;
  private emissions: EmissionSchedule;
  private events: EventLog;
  private history = new MetricsHistory();

  private holderList: Holder[] = [];
  private holderIndex = new Map<number, Holder>();
  private proposalList: Proposal[] = [];

  private stepNo = 0;
  private cumulative = 0;
  private lastHolderId = 0;
  private lastProposalId = 0;

  private burnedTotal = 0;
  private generatedTotal = 0;
  private deployedTotal = 0;
  private expiredTotal = 0;
  private counters = emptyCounters();

  constructor(config: ModelConfig = {}, opts: ModelOptions = {}) {
    this.params = Object.freeze(resolveConfig(config));
    this.bus = opts.bus ?? new EventTarget();
    this.rng = new RNG(this.params.seed);
    this.emissions = new EmissionSchedule(opts.emission ?? EMISSION_PARAMS);
    this.events = new EventLog(this.bus);

    this.spawnPopulation(this.params.numHolders);
    for (let i = 0; i < this.params.numProposals; i++) this.addProposal();

    this.collect();
    this.logEvent(
      'init',
      `Model initialized: ${this.holderList.length} holders, ` +
        `${pct(this.params.initialParticipationRate)} participation target, APY=${pct(this.currentApy)}`,
    );
  }

  /* --- emissions --- */

  get stepCount(): number { return this.stepNo; }
  get year(): number { return this.stepNo / WEEKS_PER_YEAR; }
  get cumulativeEmissions(): number { return this.cumulative; }
  get annualEmission(): number { return this.emissions.annual(this.stepNo); }
  get weeklyEmission(): number { return this.emissions.weekly(this.stepNo); }
  get circulatingSupply(): number { return this.emissions.circulating(this.cumulative); }

  /* --- participation and APY, always computed from current holder state --- */

  get totalRscHeld(): number {
    let total = 0;
    for (const h of this.holderList) if (h.active) total += h.rscHeld;
    return total;
  }

  get totalEffectiveRsc(): number {
    let total = 0;
    for (const h of this.holderList) if (h.active) total += h.effectiveRsc;
    return total;
  }

  get participationRate(): number {
    const circ = this.circulatingSupply;
    if (circ <= 0) return 0;
    return this.totalRscHeld / circ;
  }

  // Base 1.0x rate; a holder's own rate is this times their multiplier.
  get currentApy(): number {
    const total = this.totalRscHeld;
    if (total <= 0) return 0;
    return this.annualEmission / total;
  }

  get totalBurned(): number { return this.burnedTotal; }
  get totalCreditsGenerated(): number { return this.generatedTotal; }
  get totalCreditsDeployed(): number { return this.deployedTotal; }
  get totalCreditsExpired(): number { return this.expiredTotal; }
  get stepCounters(): StepCounters { return { ...this.counters }; }

  get holders(): readonly Holder[] { return this.holderList; }
  get proposals(): readonly Proposal[] { return this.proposalList; }

  snapshot(): AggregateSnapshot {
    return {
      totalRscHeld: this.totalRscHeld,
      totalEffectiveRsc: this.totalEffectiveRsc,
      annualEmission: this.annualEmission,
      weeklyEmission: this.weeklyEmission,
      currentApy: this.currentApy,
    };
  }

  /* --- main step --- */

  step() {
    this.stepNo += 1;
    this.counters = emptyCounters();

    const frozen = this.snapshot();
    const ctx: StepContext = {
      step: this.stepNo,
      weeklyEmission: frozen.weeklyEmission,
      totalEffectiveRsc: frozen.totalEffectiveRsc,
      currentApy: frozen.currentApy,
      burnRate: this.params.burnRate,
      deployScale: this.params.deployProbability / BASELINE_DEPLOY_PROBABILITY,
      creditExpiryWeeks: this.params.creditExpiryEnabled ? this.params.creditExpiryWeeks : null,
      rng: this.rng,
      openProposals: () => this.proposalList.filter((p) => p.status === 'open'),
      log: (type, message) => this.logEvent(type, message),
    };

    const order = this.rng.shuffle(this.holderList.filter((h) => h.active));
    for (const h of order) {
      const o = h.step(ctx);
      this.counters.creditsGenerated += o.earned;
      this.counters.creditsExpired += o.expired;
      this.counters.creditsDeployed += o.deployed;
      if (o.exited) this.counters.exits += 1;
    }

    this.recomputeTotals();
    this.cumulative += frozen.weeklyEmission;

    this.resolveFundedProposals();
    this.maybeSpawnEntrants();
    this.maybeSpawnProposal();
    this.collect();
  }

  runSteps(n: number) {
    for (let i = 0; i < n; i++) this.step();
  }

  private recomputeTotals() {
    let burned = 0, generated = 0, deployed = 0, expired = 0;
    for (const h of this.holderList) {
      burned += h.totalBurned;
      generated += h.totalEarned;
      deployed += h.totalDeployed;
      expired += h.totalExpired;
    }
    this.burnedTotal = burned;
    this.generatedTotal = generated;
    this.deployedTotal = deployed;
    this.expiredTotal = expired;
  }

  /* --- holders --- */

  private nextHolderId(): number {
    this.lastHolderId += 1;
    return this.lastHolderId;
  }

  addHolder(opts: HolderOptions = {}): Holder {
    if (opts.archetype !== undefined) getArchetype(opts.archetype);
    const holder = Holder.spawn(this.nextHolderId(), opts, {
      rng: this.rng,
      step: this.stepNo,
      yieldThresholdMean: this.params.yieldThresholdMean,
      creditExpiryEnabled: this.params.creditExpiryEnabled,
    });
    this.holderList.push(holder);
    this.holderIndex.set(holder.id, holder);
    return holder;
  }

  // Largest fractions first; the last archetype takes whatever rounding leaves over.
  static splitPopulation(count: number, mix: Partial<Record<ArchetypeId, number>>): [ArchetypeId, number][] {
    const sorted: [ArchetypeId, number][] = [];
    for (const [id, fraction] of Object.entries(mix)) {
      if (fraction !== undefined) sorted.push([getArchetype(id).id, fraction]);
    }
    sorted.sort((a, b) => b[1] - a[1]);
    if (sorted.length === 0) return [];

    const out: [ArchetypeId, number][] = [];
    let remaining = count;
    for (const [id, fraction] of sorted.slice(0, -1)) {
      const n = Math.min(Math.round(count * fraction), remaining);
      out.push([id, n]);
      remaining -= n;
    }
    out.push([sorted[sorted.length - 1][0], Math.max(remaining, 0)]);
    return out;
  }

  private spawnPopulation(count: number) {
    for (const [archetype, n] of EndowmentModel.splitPopulation(count, this.params.archetypeMix)) {
      for (let i = 0; i < n; i++) this.addHolder({ archetype });
    }
  }

  // exits -> less RSC held -> higher APY -> new yield seekers
  private maybeSpawnEntrants() {
    const apy = this.currentApy;
    const entryThreshold = this.params.yieldThresholdMean * ENTRY_THRESHOLD_MULT;
    if (apy <= entryThreshold) return;

    const attractiveness = Math.min((apy - entryThreshold) / entryThreshold, 1);
    if (!this.rng.chance(attractiveness * MAX_ENTRY_PROBABILITY)) return;

    const n = this.rng.int(1, 3);
    for (let i = 0; i < n; i++) this.addHolder({ archetype: 'yield_seeker' });
    this.counters.entries += n;
    this.logEvent('entry', `${n} new Yield Seeker(s) entered -- APY ${pct(apy)} > threshold ${pct(entryThreshold)}`);
  }

  /* --- proposals --- */

  private nextProposalId(): number {
    this.lastProposalId += 1;
    return this.lastProposalId;
  }

  addProposal(fundingTarget?: number): Proposal {
    const target = fundingTarget ?? this.rng.int(this.params.fundingTargetMin, this.params.fundingTargetMax);
    const proposal = new Proposal(this.nextProposalId(), target, this.stepNo);
    this.proposalList.push(proposal);
    this.logEvent('new_proposal', `P${proposal.id} created (target: ${target.toLocaleString('en-US')} credits)`);
    return proposal;
  }

  private resolveFundedProposals() {
    for (const p of this.proposalList) {
      if (!p.canResolve(this.stepNo)) continue;
      const success = this.rng.chance(this.params.successRate);
      p.resolve(success, this.stepNo);
      if (success) {
        this.logEvent('completed', `P${p.id} completed successfully`);
        continue;
      }
      this.logEvent('failed', `P${p.id} failed`);
      if (this.params.failureMode === 'partial_refund') this.refundBackers(p);
    }
  }

  private refundBackers(p: Proposal) {
    let refunded = 0, backers = 0;
    for (const [holderId, credits] of p.backers) {
      const holder = this.holderIndex.get(holderId);
      if (!holder || !holder.active) continue;
      const amount = Math.max(0, credits * REFUND_SHARE);
      holder.addCredits(amount, this.stepNo);
      refunded += amount;
      backers += 1;
    }
    if (backers > 0) {
      this.logEvent('refund', `P${p.id} refunded ${refunded.toFixed(0)} credits to ${backers} backer(s)`);
    }
  }

  private maybeSpawnProposal() {
    const open = this.proposalList.filter((p) => p.status === 'open').length;
    if (open < MAX_OPEN_PROPOSALS && this.rng.chance(PROPOSAL_SPAWN_PROBABILITY)) this.addProposal();
  }

  /* --- events and metrics --- */

  logEvent(type: EventType, message: string): SimEvent {
    return this.events.log(this.stepNo, type, message);
  }

  private collect() {
    const status = countByStatus(this.proposalList);
    const active = this.holderList.filter((h) => h.active).length;
    const row: MetricsRow = {
      step: this.stepNo,
      year: this.year,
      participationRate: this.participationRate,
      currentApy: this.currentApy,
      totalRscHeld: this.totalRscHeld,
      effectiveRsc: this.totalEffectiveRsc,
      circulatingSupply: this.circulatingSupply,
      weeklyEmission: this.weeklyEmission,
      cumulativeEmissions: this.cumulative,
      totalBurned: this.burnedTotal,
      activeHolders: active,
      exitedHolders: this.holderList.length - active,
      openProposals: status.open,
      fundedProposals: status.funded,
      completedProposals: status.completed,
      failedProposals: status.failed,
      rscByArchetype: rscByArchetype(this.holderList),
      countByTier: countByTier(this.holderList),
      exitsStep: this.counters.exits,
      entriesStep: this.counters.entries,
      creditsGeneratedStep: this.counters.creditsGenerated,
      creditsDeployedStep: this.counters.creditsDeployed,
      creditsExpiredStep: this.counters.creditsExpired,
    };
    this.history.push(row);
  }

  /* --- read-only queries --- */

  getHolders(): HolderRecord[] {
    return this.holderList.map((h) => h.toRecord());
  }

  getHolder(id: number): HolderRecord | undefined {
    return this.holderIndex.get(id)?.toRecord();
  }

  getProposals(): ProposalRecord[] {
    return this.proposalList.map((p) => p.toRecord());
  }

  getProposal(id: number): ProposalRecord | undefined {
    return this.proposalList.find((p) => p.id === id)?.toRecord();
  }

  getHistory(): MetricsRow[] {
    return this.history.getSeries();
  }

  getLatestMetrics(): MetricsRow | undefined {
    const row = this.history.latest();
    return row && { ...row, rscByArchetype: { ...row.rscByArchetype }, countByTier: { ...row.countByTier } };
  }

  getEvents(limit = 50): SimEvent[] {
    return this.events.recent(limit);
  }

  getArchetypeDistribution() {
    return archetypeDistribution(this.holderList);
  }

  getArchetypeMetrics() {
    return archetypeMetrics(this.holderList);
  }

  getMultiplierDistribution() {
    return multiplierDistribution(this.holderList);
  }

  getStepDeployments(): StepDeployment[] {
    return stepDeployments(this.holderList, this.stepNo);
  }

  getParticipationData(): ParticipationData {
    const annual = this.annualEmission;
    const circ = this.circulatingSupply;
    return {
      participationRate: this.participationRate,
      currentApy: this.currentApy,
      totalRscHeld: this.totalRscHeld,
      circulatingSupply: circ,
      annualEmission: annual,
      year: this.year,
      scenarios: scenarioApys(annual, circ),
    };
  }

  getMetrics(): ModelMetrics {
    const active = this.holderList.filter((h) => h.active);
    const status = countByStatus(this.proposalList);
    const resolved = status.completed + status.failed;
    return {
      step: this.stepNo,
      year: this.year,
      participationRate: this.participationRate,
      currentApy: this.currentApy,
      totalRscHeld: this.totalRscHeld,
      circulatingSupply: this.circulatingSupply,
      annualEmission: this.annualEmission,
      weeklyEmission: this.weeklyEmission,
      cumulativeEmissions: this.cumulative,
      totalCredits: active.reduce((s, h) => s + h.credits, 0),
      totalBurned: this.burnedTotal,
      totalCreditsGenerated: this.generatedTotal,
      totalCreditsDeployed: this.deployedTotal,
      totalCreditsExpired: this.expiredTotal,
      deploymentRate: this.deployedTotal / Math.max(this.stepNo, 1),
      multiplierDistribution: multiplierDistribution(this.holderList),
      openProposals: status.open,
      fundedProposals: status.funded,
      completedProposals: status.completed,
      failedProposals: status.failed,
      successRateActual: resolved > 0 ? status.completed / resolved : 0,
      numHolders: this.holderList.length,
      activeHolders: active.length,
      exitedHolders: this.holderList.length - active.length,
      numProposals: this.proposalList.length,
    };
  }

  getState(): ModelState {
    return {
      ...this.getMetrics(),
      archetypeDistribution: this.getArchetypeDistribution(),
      archetypeMetrics: this.getArchetypeMetrics(),
      participationData: this.getParticipationData(),
      stepDeployments: this.getStepDeployments(),
      stepCounters: this.stepCounters,
      params: { ...this.params, archetypeMix: { ...this.params.archetypeMix } },
    };
  }
}

export function createModel(config: ModelConfig = {}, opts: ModelOptions = {}): EndowmentModel {
  return new EndowmentModel(config, opts);
}
