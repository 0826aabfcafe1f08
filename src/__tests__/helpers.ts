import { vi } from 'vitest';
import { RNG } from '../engine/rng';
import type { StepContext } from '../sim/holder';
import type { Proposal } from '../sim/proposal';

// Every draw returns `value`: chance(p) passes for any p > value, uniform() returns lo, pick() takes the first item.
// Never use it where a normal() draw can happen.
export class FixedRNG extends RNG {
  private value: number;

  constructor(value = 0) {
    super(1);
    this.value = value;
  }

  next(): number {
    return this.value;
  }
}

export function makeCtx(over: Partial<StepContext> = {}, proposals: Proposal[] = []): StepContext {
  return {
    step: 1,
    weeklyEmission: 1000,
    totalEffectiveRsc: 100_000,
    currentApy: 1,
    burnRate: 0.02,
    deployScale: 1,
    creditExpiryWeeks: null,
    rng: new FixedRNG(0),
    openProposals: () => proposals.filter((p) => p.status === 'open'),
    log: vi.fn(),
    ...over,
  };
}
