import type { RNG } from '../engine/rng';
import type {
  ArchetypeId,
  Deployment,
  EventType,
  HolderArchetype,
  HolderRecord,
  Range,
  Traits,
} from '../engine/types';
import { ARCHETYPES, tierForWeeks, timeWeightMultiplier } from './archetypes';
import { CreditLedger } from './credits';
import type { Proposal } from './proposal';

/**
 * Read-only view of the model that a holder acts against during one step.
 *
 * The numeric aggregates are frozen before the holder pass starts, so every holder
 * in a step sees the same denominator regardless of shuffle order. Open proposals
 * are read live because funding can close a proposal mid-pass.
 */
export interface StepContext {
  readonly step: number;
  readonly weeklyEmission: number;
  readonly totalEffectiveRsc: number;
  readonly currentApy: number;
  readonly burnRate: number;
  readonly deployScale: number;
  readonly creditExpiryWeeks: number | null; // null when expiry is off
  readonly rng: RNG;
  openProposals(): readonly Proposal[];
  log(type: EventType, message: string): void;
}

export interface HolderOptions extends Partial<Traits> {
  archetype?: ArchetypeId;
  rscHeld?: number;
  weeksHeld?: number;
  yieldThreshold?: number;
  credits?: number;
}

export interface SpawnEnv {
  rng: RNG;
  step: number;
  yieldThresholdMean: number;
  creditExpiryEnabled: boolean;
}

export interface HolderStepOutcome {
  earned: number;
  expired: number;
  deployed: number;
  burned: number;
  proposalId: number | null;
  exited: boolean;
}

const TRAIT_KEYS = ['missionAlignment', 'engagement', 'priceSensitivity', 'holdHorizon'] as const;
const UNIT: Range = [0, 1];
const CUSTOM_RSC: Range = [500, 20_000];
const THRESHOLD_NOISE = 0.01;
const THRESHOLD_FLOOR = 0.01;
const MAX_BURN_SHARE = 0.1;
const MAX_DEPLOY_PROBABILITY = 0.95;

// deployProbability at which the engagement/pressure curve is used unscaled
export const BASELINE_DEPLOY_PROBABILITY = 0.3;

export const pct = (x: number) => `${(x * 100).toFixed(1)}%`;

export class Holder {
  readonly id: number;
  readonly archetype: HolderArchetype;
  readonly missionAlignment: number;
  readonly engagement: number;
  readonly priceSensitivity: number;
  readonly holdHorizon: number;
  readonly yieldThreshold: number;
  readonly initialRsc: number;

  private rsc: number;
  private weeks: number;
  private balance = 0;
  private alive = true;
  private ledger: CreditLedger | null;

  private earnedTotal = 0;
  private deployedTotal = 0;
  private burnedTotal = 0;
  private expiredTotal = 0;
  private idle = 0;
  private history: Deployment[] = [];

  private constructor(id: number, archetype: HolderArchetype, traits: Traits, state: {
    rscHeld: number;
    weeksHeld: number;
    yieldThreshold: number;
    ledger: CreditLedger | null;
  }) {
    this.id = id;
    this.archetype = archetype;
    this.missionAlignment = traits.missionAlignment;
    this.engagement = traits.engagement;
    this.priceSensitivity = traits.priceSensitivity;
    this.holdHorizon = traits.holdHorizon;
    this.rsc = state.rscHeld;
    this.initialRsc = state.rscHeld;
    this.weeks = state.weeksHeld;
    this.yieldThreshold = state.yieldThreshold;
    this.ledger = state.ledger;
  }

  // Samples traits and holdings from the archetype ranges (or [0,1] for custom holders).
  static spawn(id: number, opts: HolderOptions, env: SpawnEnv): Holder {
    const { rng } = env;
    const def = opts.archetype ? ARCHETYPES[opts.archetype] : null;
    const draw = (given: number | undefined, range: Range) => given ?? rng.uniform(range[0], range[1]);

    const traits: Traits = {
      missionAlignment: draw(opts.missionAlignment, def?.missionAlignment ?? UNIT),
      engagement: draw(opts.engagement, def?.engagement ?? UNIT),
      priceSensitivity: draw(opts.priceSensitivity, def?.priceSensitivity ?? UNIT),
      holdHorizon: draw(opts.holdHorizon, def?.holdHorizon ?? UNIT),
    };
    for (const k of TRAIT_KEYS) {
      const v = traits[k];
      if (!(v >= 0 && v <= 1)) throw new RangeError(`H${id}: ${k} must be within [0, 1], got ${v}`);
    }

    const rscRange = def?.rscRange ?? CUSTOM_RSC;
    const rscHeld = opts.rscHeld ?? rng.int(rscRange[0], rscRange[1]);
    if (!(rscHeld >= 0)) throw new RangeError(`H${id}: rscHeld must be >= 0, got ${rscHeld}`);

    const offset = def?.yieldThresholdOffset ?? 0;
    const yieldThreshold =
      opts.yieldThreshold ??
      Math.max(THRESHOLD_FLOOR, env.yieldThresholdMean + offset + rng.normal(0, THRESHOLD_NOISE));
    if (!(yieldThreshold > 0)) throw new RangeError(`H${id}: yieldThreshold must be > 0, got ${yieldThreshold}`);

    const warm = def?.warmStartWeeks;
    const weeksHeld = opts.weeksHeld ?? (warm ? rng.int(warm[0], warm[1]) : 0);
    if (!(Number.isInteger(weeksHeld) && weeksHeld >= 0)) {
      throw new RangeError(`H${id}: weeksHeld must be a whole number >= 0, got ${weeksHeld}`);
    }

    const ledger = env.creditExpiryEnabled ? new CreditLedger() : null;
    const holder = new Holder(id, opts.archetype ?? 'custom', traits, { rscHeld, weeksHeld, yieldThreshold, ledger });
    if (opts.credits && opts.credits > 0) holder.addCredits(opts.credits, env.step);
    return holder;
  }

  get rscHeld(): number { return this.rsc; }
  get weeksHeld(): number { return this.weeks; }
  get credits(): number { return this.balance; }
  get active(): boolean { return this.alive; }
  get idleSteps(): number { return this.idle; }
  get totalEarned(): number { return this.earnedTotal; }
  get totalDeployed(): number { return this.deployedTotal; }
  get totalBurned(): number { return this.burnedTotal; }
  get totalExpired(): number { return this.expiredTotal; }
  get deployments(): readonly Deployment[] { return this.history; }

  get multiplier(): number { return timeWeightMultiplier(this.weeks); }
  get effectiveRsc(): number { return this.rsc * this.multiplier; }

  step(ctx: StepContext): HolderStepOutcome {
    const out: HolderStepOutcome = { earned: 0, expired: 0, deployed: 0, burned: 0, proposalId: null, exited: false };
    if (!this.alive) return out;

    this.weeks += 1;
    if (ctx.creditExpiryWeeks !== null) out.expired = this.expireCredits(ctx.step, ctx.creditExpiryWeeks);
    out.earned = this.earnYield(ctx);

    const target = this.shouldDeploy(ctx, out.earned) ? this.selectProposal(ctx) : null;
    const made = target ? this.deploy(target, this.deployAmount(ctx.rng), ctx) : null;
    if (made) {
      out.deployed = made.credits;
      out.burned = made.burned;
      out.proposalId = made.proposalId;
      this.idle = 0;
    } else {
      this.idle += 1;
    }

    out.exited = this.considerExit(ctx);
    return out;
  }

  addCredits(amount: number, step: number) {
    if (amount <= 0) return;
    this.balance += amount;
    this.ledger?.add(step, amount);
  }

  expireCredits(step: number, maxAgeWeeks: number): number {
    if (!this.ledger) return 0;
    const expired = this.ledger.expire(step, maxAgeWeeks);
    if (expired <= 0) return 0;
    const removed = Math.min(expired, this.balance);
    this.balance = Math.max(0, this.balance - expired);
    this.expiredTotal += removed;
    return removed;
  }

  earnYield(ctx: StepContext): number {
    if (ctx.totalEffectiveRsc <= 0 || ctx.weeklyEmission <= 0) return 0;
    const share = this.effectiveRsc / ctx.totalEffectiveRsc;
    const earned = ctx.weeklyEmission * share;
    this.addCredits(earned, ctx.step);
    this.earnedTotal += earned;
    return earned;
  }

  deployProbability(weeklyRate: number, deployScale: number): number {
    const base = this.engagement * 0.6;
    // sigmoid centred where credits equal ~4 weeks of earnings
    const ratio = this.balance / (Math.max(weeklyRate, 1) * 4);
    const pressure = 1 / (1 + Math.exp(-2 * (ratio - 1)));
    return Math.min((base + pressure * 0.3) * deployScale, MAX_DEPLOY_PROBABILITY);
  }

  private shouldDeploy(ctx: StepContext, weeklyRate: number): boolean {
    if (this.balance <= 0) return false;
    return ctx.rng.chance(this.deployProbability(weeklyRate, ctx.deployScale));
  }

  // Mission-aligned holders push proposals that are closest to their target.
  private selectProposal(ctx: StepContext): Proposal | null {
    const open = ctx.openProposals();
    if (open.length === 0) return null;
    if (this.missionAlignment <= 0.5) return ctx.rng.pick(open) ?? null;

    let best: Proposal | null = null;
    let bestScore = -Infinity;
    for (const p of open) {
      const score = p.fundingProgress * this.missionAlignment + ctx.rng.next() * (1 - this.missionAlignment);
      if (score > bestScore) {
        best = p;
        bestScore = score;
      }
    }
    return best;
  }

  private deployAmount(rng: RNG): number {
    const frac = rng.uniform(0.05, 0.15 + this.engagement * 0.45);
    return this.balance * frac;
  }

  /** Moves credits into the proposal and burns RSC in proportion to the share of credits spent. */
  deploy(proposal: Proposal, requested: number, ctx: Pick<StepContext, 'step' | 'burnRate' | 'log'>): Deployment | null {
    const before = this.balance;
    const amount = Math.min(requested, before);
    if (amount <= 0) return null;

    const backing = this.rsc * (amount / before) * ctx.burnRate;
    const burned = Math.min(backing, this.rsc * MAX_BURN_SHARE);

    this.balance = Math.max(0, before - amount);
    this.ledger?.consume(amount);
    this.rsc = Math.max(0, this.rsc - burned);
    this.deployedTotal += amount;
    this.burnedTotal += burned;
    const made: Deployment = { step: ctx.step, proposalId: proposal.id, credits: amount, burned };
    this.history.push(made);

    if (proposal.receive(this.id, amount, ctx.step)) {
      ctx.log(
        'funded',
        `P${proposal.id} reached funding target (${proposal.creditsReceived.toFixed(0)}/${proposal.fundingTarget})`,
      );
    }
    return made;
  }

  exitProbability(apy: number): number {
    if (apy >= this.yieldThreshold) return 0;
    const gap = Math.min(1, (this.yieldThreshold - apy) / this.yieldThreshold);
    return gap * this.priceSensitivity * 0.15 * (1 - this.holdHorizon * 0.8);
  }

  private considerExit(ctx: StepContext): boolean {
    const p = this.exitProbability(ctx.currentApy);
    if (p <= 0 || !ctx.rng.chance(p)) return false;
    this.alive = false;
    ctx.log(
      'exit',
      `H${this.id} (${this.archetype}) exited -- APY ${pct(ctx.currentApy)} below threshold ${pct(this.yieldThreshold)}`,
    );
    return true;
  }

  toRecord(): HolderRecord {
    const tier = tierForWeeks(this.weeks);
    return {
      id: this.id,
      archetype: this.archetype,
      active: this.alive,
      missionAlignment: this.missionAlignment,
      engagement: this.engagement,
      priceSensitivity: this.priceSensitivity,
      holdHorizon: this.holdHorizon,
      rscHeld: this.rsc,
      initialRsc: this.initialRsc,
      weeksHeld: this.weeks,
      multiplier: tier.multiplier,
      multiplierLabel: tier.label,
      yieldThreshold: this.yieldThreshold,
      credits: this.balance,
      creditBatches: this.ledger?.snapshot() ?? [],
      totalEarned: this.earnedTotal,
      totalDeployed: this.deployedTotal,
      totalBurned: this.burnedTotal,
      totalExpired: this.expiredTotal,
      deploymentsCount: this.history.length,
      idleSteps: this.idle,
    };
  }
}
