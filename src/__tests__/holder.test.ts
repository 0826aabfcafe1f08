import { describe, expect, it, vi } from 'vitest';
import { RNG } from '../engine/rng';
import { ARCHETYPES } from '../sim/archetypes';
import { Holder, type HolderOptions, type SpawnEnv } from '../sim/holder';
import { Proposal } from '../sim/proposal';
import { FixedRNG, makeCtx } from './helpers';

const env = (over: Partial<SpawnEnv> = {}): SpawnEnv => ({
  rng: new FixedRNG(0),
  step: 0,
  yieldThresholdMean: 0.08,
  creditExpiryEnabled: false,
  ...over,
});

// Fully specified custom holder: spawning it draws nothing from the RNG.
const calm: HolderOptions = {
  missionAlignment: 0.2,
  engagement: 0,
  priceSensitivity: 0,
  holdHorizon: 1,
  rscHeld: 10_000,
  yieldThreshold: 0.05,
};

describe('Holder.spawn', () => {
  it('samples traits and holdings inside the archetype ranges', () => {
    const rng = new RNG(1);
    for (let i = 0; i < 200; i++) {
      const h = Holder.spawn(i + 1, { archetype: 'institution' }, env({ rng }));
      const def = ARCHETYPES.institution;
      expect(h.archetype).toBe('institution');
      expect(h.missionAlignment).toBeGreaterThanOrEqual(def.missionAlignment[0]);
      expect(h.missionAlignment).toBeLessThanOrEqual(def.missionAlignment[1]);
      expect(h.holdHorizon).toBeGreaterThanOrEqual(def.holdHorizon[0]);
      expect(Number.isInteger(h.rscHeld)).toBe(true);
      expect(h.rscHeld).toBeGreaterThanOrEqual(100_000);
      expect(h.rscHeld).toBeLessThanOrEqual(1_000_000);
      expect(h.weeksHeld).toBeGreaterThanOrEqual(0);
      expect(h.weeksHeld).toBeLessThanOrEqual(52);
      expect(h.yieldThreshold).toBeGreaterThanOrEqual(0.01);
    }
  });

  it('gives non-institutions no holding history', () => {
    const rng = new RNG(2);
    for (let i = 0; i < 50; i++) {
      expect(Holder.spawn(i + 1, { archetype: 'speculator' }, env({ rng })).weeksHeld).toBe(0);
    }
  });

  it('spawns custom holders with unit traits and default holdings', () => {
    const rng = new RNG(3);
    const h = Holder.spawn(1, {}, env({ rng }));
    expect(h.archetype).toBe('custom');
    expect(h.rscHeld).toBeGreaterThanOrEqual(500);
    expect(h.rscHeld).toBeLessThanOrEqual(20_000);
    expect(h.engagement).toBeGreaterThanOrEqual(0);
    expect(h.engagement).toBeLessThanOrEqual(1);
  });

  it('keeps supplied values', () => {
    const h = Holder.spawn(9, { ...calm, weeksHeld: 60, credits: 25 }, env());
    expect(h.rscHeld).toBe(10_000);
    expect(h.weeksHeld).toBe(60);
    expect(h.multiplier).toBe(1.2);
    expect(h.effectiveRsc).toBeCloseTo(12_000);
    expect(h.credits).toBe(25);
  });

  it('rejects traits outside [0, 1]', () => {
    expect(() => Holder.spawn(1, { ...calm, engagement: 1.5 }, env())).toThrow('H1: engagement must be within [0, 1], got 1.5');
  });

  it('rejects part-weeks and negative holding history', () => {
    expect(() => Holder.spawn(3, { ...calm, weeksHeld: 2.5 }, env())).toThrow(
      'H3: weeksHeld must be a whole number >= 0, got 2.5',
    );
    expect(() => Holder.spawn(4, { ...calm, weeksHeld: -1 }, env())).toThrow(RangeError);
  });

  it('rejects negative holdings', () => {
    expect(() => Holder.spawn(2, { ...calm, rscHeld: -1 }, env())).toThrow(RangeError);
  });
});

describe('Holder.step', () => {
  it('earns its share of the frozen weekly emission', () => {
    const h = Holder.spawn(1, calm, env());
    const out = h.step(makeCtx());
    expect(out.earned).toBeCloseTo(100);
    expect(h.credits).toBeCloseTo(100);
    expect(h.totalEarned).toBeCloseTo(100);
    expect(h.weeksHeld).toBe(1);
    expect(out.deployed).toBe(0);
    expect(h.idleSteps).toBe(1);
  });

  it('applies the time-weight multiplier after ageing', () => {
    const h = Holder.spawn(1, { ...calm, weeksHeld: 3 }, env());
    const out = h.step(makeCtx());
    expect(h.weeksHeld).toBe(4);
    expect(out.earned).toBeCloseTo(115);
  });

  it('earns nothing when the snapshot holds no effective RSC', () => {
    const h = Holder.spawn(1, calm, env());
    expect(h.step(makeCtx({ totalEffectiveRsc: 0 })).earned).toBe(0);
  });

  it('deploys part of its balance and burns RSC in proportion', () => {
    const proposal = new Proposal(1, 1000, 0);
    const h = Holder.spawn(1, { ...calm, engagement: 0.5 }, env());
    const out = h.step(makeCtx({}, [proposal]));

    // FixedRNG: the deploy fraction sits at its 5% floor
    expect(out.proposalId).toBe(1);
    expect(out.deployed).toBeCloseTo(5);
    expect(out.burned).toBeCloseTo(10);
    expect(h.rscHeld).toBeCloseTo(9_990);
    expect(h.credits).toBeCloseTo(95);
    expect(proposal.creditsReceived).toBeCloseTo(5);
    expect(h.idleSteps).toBe(0);
    expect(h.deployments).toHaveLength(1);
  });

  it('mission-aligned holders back the proposal nearest its target', () => {
    const far = new Proposal(1, 1000, 0);
    const near = new Proposal(2, 1000, 0);
    near.receive(99, 500, 0);
    const h = Holder.spawn(1, { ...calm, missionAlignment: 0.9, engagement: 0.5 }, env());
    expect(h.step(makeCtx({}, [far, near])).proposalId).toBe(2);
  });

  it('logs when its contribution funds a proposal', () => {
    const proposal = new Proposal(1, 4, 0);
    const log = vi.fn();
    const h = Holder.spawn(1, { ...calm, engagement: 0.5 }, env());
    h.step(makeCtx({ log }, [proposal]));
    expect(proposal.status).toBe('funded');
    expect(proposal.stepFunded).toBe(1);
    expect(log).toHaveBeenCalledWith('funded', 'P1 reached funding target (5/4)');
  });

  it('exits below its threshold and stays out', () => {
    const log = vi.fn();
    const h = Holder.spawn(1, { ...calm, priceSensitivity: 1, holdHorizon: 0, yieldThreshold: 0.1 }, env());
    const out = h.step(makeCtx({ currentApy: 0.01, log }));
    expect(out.exited).toBe(true);
    expect(h.active).toBe(false);
    expect(log).toHaveBeenCalledWith('exit', 'H1 (custom) exited -- APY 1.0% below threshold 10.0%');

    const after = h.step(makeCtx());
    expect(after).toEqual({ earned: 0, expired: 0, deployed: 0, burned: 0, proposalId: null, exited: false });
    expect(h.weeksHeld).toBe(1);
  });

  it('expires stale credits before earning', () => {
    const h = Holder.spawn(1, { ...calm, credits: 50 }, env({ creditExpiryEnabled: true }));
    const out = h.step(makeCtx({ step: 10, creditExpiryWeeks: 8 }));
    expect(out.expired).toBe(50);
    expect(h.totalExpired).toBe(50);
    expect(h.credits).toBeCloseTo(100);
    const batches = h.toRecord().creditBatches;
    expect(batches).toHaveLength(1);
    expect(batches[0].step).toBe(10);
  });
});

describe('Holder.deploy', () => {
  const ctx = (burnRate: number) => ({ step: 1, burnRate, log: vi.fn() });

  it('caps the burn at 10% of holdings', () => {
    const h = Holder.spawn(1, { ...calm, credits: 1000 }, env());
    const made = h.deploy(new Proposal(1, 1_000_000, 0), 1000, ctx(1));
    expect(made).toEqual({ step: 1, proposalId: 1, credits: 1000, burned: 1000 });
    expect(h.rscHeld).toBe(9_000);
  });

  it('never burns more than 10% for any amount or rate', () => {
    for (const burnRate of [0, 0.02, 0.5, 1]) {
      for (const amount of [1, 250, 999, 1000, 5000]) {
        const h = Holder.spawn(1, { ...calm, credits: 1000 }, env());
        const before = h.rscHeld;
        const made = h.deploy(new Proposal(1, 1_000_000, 0), amount, ctx(burnRate));
        expect(made?.burned ?? 0).toBeLessThanOrEqual(before * 0.1 + 1e-9);
        expect(h.rscHeld).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('clamps the request to the balance', () => {
    const h = Holder.spawn(1, { ...calm, credits: 1000 }, env());
    const made = h.deploy(new Proposal(1, 1_000_000, 0), 5000, ctx(0.02));
    expect(made?.credits).toBe(1000);
    expect(h.credits).toBe(0);
    expect(h.totalDeployed).toBe(1000);
  });

  it('does nothing without credits', () => {
    const h = Holder.spawn(1, calm, env());
    expect(h.deploy(new Proposal(1, 10, 0), 5, ctx(0.02))).toBeNull();
    expect(h.rscHeld).toBe(10_000);
  });
});

describe('Holder probabilities', () => {
  it('scales exit probability with the yield gap', () => {
    const h = Holder.spawn(1, { ...calm, priceSensitivity: 1, holdHorizon: 0, yieldThreshold: 0.1 }, env());
    expect(h.exitProbability(0.2)).toBe(0);
    expect(h.exitProbability(0.1)).toBe(0);
    expect(h.exitProbability(0.05)).toBeCloseTo(0.075);
  });

  it('long horizons damp exit pressure', () => {
    const h = Holder.spawn(1, { ...calm, priceSensitivity: 1, holdHorizon: 1, yieldThreshold: 0.1 }, env());
    expect(h.exitProbability(0)).toBeCloseTo(0.03);
  });

  it('caps deploy probability at 0.95', () => {
    const h = Holder.spawn(1, { ...calm, engagement: 1, credits: 10_000 }, env());
    expect(h.deployProbability(1, 10)).toBe(0.95);
  });

  it('rises with idle credits', () => {
    const low = Holder.spawn(1, { ...calm, engagement: 0.5, credits: 10 }, env());
    const high = Holder.spawn(2, { ...calm, engagement: 0.5, credits: 10_000 }, env());
    expect(high.deployProbability(100, 1)).toBeGreaterThan(low.deployProbability(100, 1));
  });
});
