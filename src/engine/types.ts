export type ArchetypeId = 'believer' | 'yield_seeker' | 'institution' | 'speculator';
export type HolderArchetype = ArchetypeId | 'custom';

export type TierLabel = 'New' | 'Holder' | 'LongTerm';

export type ProposalStatus = 'open' | 'funded' | 'completed' | 'failed';
export type FailureMode = 'nothing' | 'partial_refund';

export type EventType =
  | 'init'
  | 'new_proposal'
  | 'funded'
  | 'completed'
  | 'failed'
  | 'refund'
  | 'exit'
  | 'entry';

export interface SimEvent {
  step: number;
  type: EventType;
  message: string;
}

export type Range = readonly [min: number, max: number];

export interface Traits {
  missionAlignment: number;
  engagement: number;
  priceSensitivity: number;
  holdHorizon: number;
}

export interface EmissionParams {
  year0Emission: number;     // RSC/year at t=0
  halfLifeYears: number;
  year0Circulating: number;  // RSC circulating at simulation start
  totalSupply: number;       // hard cap, informational
}

export interface ModelParams {
  numHolders: number;
  numProposals: number;
  burnRate: number;
  successRate: number;
  fundingTargetMin: number;
  fundingTargetMax: number;
  deployProbability: number;
  archetypeMix: Partial<Record<ArchetypeId, number>>;
  yieldThresholdMean: number;
  initialParticipationRate: number; // informational target, not enforced
  seed: number | string;
  creditExpiryEnabled: boolean;
  creditExpiryWeeks: number;
  failureMode: FailureMode;
}

export interface CreditBatch {
  step: number;
  amount: number;
}

export interface Deployment {
  step: number;
  proposalId: number;
  credits: number;
  burned: number;
}

export interface HolderRecord extends Traits {
  id: number;
  archetype: HolderArchetype;
  active: boolean;
  rscHeld: number;
  initialRsc: number;
  weeksHeld: number;
  multiplier: number;
  multiplierLabel: TierLabel;
  yieldThreshold: number;
  credits: number;
  creditBatches: CreditBatch[];
  totalEarned: number;
  totalDeployed: number;
  totalBurned: number;
  totalExpired: number;
  deploymentsCount: number;
  idleSteps: number;
}

export interface ProposalRecord {
  id: number;
  fundingTarget: number;
  creditsReceived: number;
  fundingProgress: number; // fraction of target, may exceed 1
  backers: Record<number, number>;
  backerCount: number;
  status: ProposalStatus;
  stepCreated: number;
  stepFunded: number | null;
  stepResolved: number | null;
}

export interface MetricsRow {
  step: number;
  year: number;
  participationRate: number;
  currentApy: number;
  totalRscHeld: number;
  effectiveRsc: number;
  circulatingSupply: number;
  weeklyEmission: number;
  cumulativeEmissions: number;
  totalBurned: number;
  activeHolders: number;
  exitedHolders: number;
  openProposals: number;
  fundedProposals: number;
  completedProposals: number;
  failedProposals: number;
  rscByArchetype: Record<ArchetypeId, number>;
  countByTier: Record<TierLabel, number>;
  exitsStep: number;
  entriesStep: number;
  creditsGeneratedStep: number;
  creditsDeployedStep: number;
  creditsExpiredStep: number;
}

export interface StepDeployment extends Deployment {
  holderId: number;
  archetype: HolderArchetype;
}
