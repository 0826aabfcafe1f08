import type { ProposalRecord, ProposalStatus } from '../engine/types';
import { InvalidTransitionError } from './errors';

const NEXT: Record<ProposalStatus, readonly ProposalStatus[]> = {
  open: ['funded'],
  funded: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * A research funding proposal.
 *
 * Status only moves forward: open -> funded -> completed | failed. Funding fires the
 * moment credits reach the target; resolution is left to the model and can never
 * happen in the step the proposal was funded.
 */
export class Proposal {
  readonly id: number;
  readonly fundingTarget: number;
  readonly stepCreated: number;

  private received = 0;
  private ledger = new Map<number, number>();
  private state: ProposalStatus = 'open';
  private funded: number | null = null;
  private resolved: number | null = null;

  constructor(id: number, fundingTarget: number, stepCreated: number) {
    if (!(fundingTarget > 0)) throw new RangeError(`P${id}: funding target must be positive, got ${fundingTarget}`);
    this.id = id;
    this.fundingTarget = fundingTarget;
    this.stepCreated = stepCreated;
  }

  get status(): ProposalStatus { return this.state; }
  get creditsReceived(): number { return this.received; }
  get stepFunded(): number | null { return this.funded; }
  get stepResolved(): number | null { return this.resolved; }
  get backers(): ReadonlyMap<number, number> { return this.ledger; }

  // Fraction of target reached; can exceed 1 once funded.
  get fundingProgress(): number { return this.received / this.fundingTarget; }
  get isFunded(): boolean { return this.received >= this.fundingTarget; }

  /** Records a contribution. Returns true when this contribution funded the proposal. */
  receive(holderId: number, amount: number, step: number): boolean {
    if (this.state !== 'open' && this.state !== 'funded') {
      throw new InvalidTransitionError(this.id, this.state, 'funded');
    }
    if (amount <= 0) return false;
    this.received += amount;
    this.ledger.set(holderId, (this.ledger.get(holderId) ?? 0) + amount);

    if (this.state === 'open' && this.isFunded) {
      this.transition('funded');
      this.funded = step;
      return true;
    }
    return false;
  }

  canResolve(step: number): boolean {
    return this.state === 'funded' && this.funded !== null && step > this.funded;
  }

  resolve(success: boolean, step: number) {
    if (!this.canResolve(step)) {
      throw new InvalidTransitionError(this.id, this.state, success ? 'completed' : 'failed');
    }
    this.transition(success ? 'completed' : 'failed');
    this.resolved = step;
  }

  toRecord(): ProposalRecord {
    const backers: Record<number, number> = {};
    for (const [id, credits] of this.ledger) backers[id] = credits;
    return {
      id: this.id,
      fundingTarget: this.fundingTarget,
      creditsReceived: this.received,
      fundingProgress: this.fundingProgress,
      backers,
      backerCount: this.ledger.size,
      status: this.state,
      stepCreated: this.stepCreated,
      stepFunded: this.funded,
      stepResolved: this.resolved,
    };
  }

  private transition(to: ProposalStatus) {
    if (!NEXT[this.state].includes(to)) throw new InvalidTransitionError(this.id, this.state, to);
    this.state = to;
  }
}
