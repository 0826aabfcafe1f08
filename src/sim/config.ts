import { z } from 'zod';
import raw from '../../config/config.json';
import type { ArchetypeId, EmissionParams, ModelParams } from '../engine/types';
import { ARCHETYPE_IDS, isArchetypeId } from './archetypes';
import { ConfigError } from './errors';

const unit = z.number().min(0).max(1);
const count = z.number().int().min(0);

export const MAX_NUMERIC_SEED = 0xffffffff;

export const FailureModeSchema = z.enum(['nothing', 'partial_refund']);

export const EmissionParamsSchema = z.object({
  year0Emission: z.number().positive(),
  halfLifeYears: z.number().positive(),
  year0Circulating: z.number().min(0),
  totalSupply: z.number().positive(),
});

export const ArchetypeMixSchema = z.record(z.string(), z.number().min(0));

const ParamFields = {
  numHolders: count,
  numProposals: count,
  burnRate: unit,
  successRate: unit,
  fundingTargetMin: z.number().int().positive(),
  fundingTargetMax: z.number().int().positive(),
  deployProbability: unit,
  yieldThresholdMean: z.number().positive(),
  initialParticipationRate: unit,
  creditExpiryEnabled: z.boolean(),
  creditExpiryWeeks: z.number().int().positive(),
  failureMode: FailureModeSchema,
};

const DefaultsSchema = z.object(ParamFields);

const ConfigFileSchema = z.object({
  emission: EmissionParamsSchema,
  defaults: DefaultsSchema,
  archetypeMix: ArchetypeMixSchema,
});

export const ModelConfigSchema = z
  .object({
    ...ParamFields,
    archetypeMix: ArchetypeMixSchema,
    // numeric seeds are used as the 32-bit generator state directly, so each one replays its own run
    seed: z.union([z.number().int().min(0).max(MAX_NUMERIC_SEED), z.string().min(1)]),
  })
  .partial()
  .strict();

export type ModelConfig = z.input<typeof ModelConfigSchema>;
export type DefaultParams = z.infer<typeof DefaultsSchema>;

function describe(err: z.ZodError): string[] {
  return err.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
}

function fail(issues: string[]): never {
  throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
}

export function toArchetypeMix(mix: Record<string, number>): Partial<Record<ArchetypeId, number>> {
  const out: Partial<Record<ArchetypeId, number>> = {};
  for (const [id, fraction] of Object.entries(mix)) {
    if (!isArchetypeId(id)) {
      throw new ConfigError(`Unknown archetype: ${id}. Available: ${ARCHETYPE_IDS.join(', ')}`);
    }
    out[id] = fraction;
  }
  const total = Object.values(out).reduce((s, f) => s + (f ?? 0), 0);
  if (total <= 0) fail(['archetypeMix: fractions must sum to a positive number']);
  return out;
}

function loadConfigFile() {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) fail(describe(parsed.error).map((m) => `config/config.json ${m}`));
  return parsed.data;
}

const file = loadConfigFile();

export const EMISSION_PARAMS: Readonly<EmissionParams> = Object.freeze({ ...file.emission });
export const DEFAULT_PARAMS: Readonly<DefaultParams> = Object.freeze({ ...file.defaults });
export const DEFAULT_ARCHETYPE_MIX: Readonly<Partial<Record<ArchetypeId, number>>> = Object.freeze(
  toArchetypeMix(file.archetypeMix),
);

export function randomSeed(): number {
  return Math.floor(Math.random() * 2 ** 31);
}

// Merges caller overrides onto the defaults. Throws ConfigError, never substitutes silently.
export function resolveConfig(input: unknown = {}): ModelParams {
  const parsed = ModelConfigSchema.safeParse(input ?? {});
  if (!parsed.success) fail(describe(parsed.error));
  const cfg = parsed.data;

  const d = DEFAULT_PARAMS;
  const params: ModelParams = {
    numHolders: cfg.numHolders ?? d.numHolders,
    numProposals: cfg.numProposals ?? d.numProposals,
    burnRate: cfg.burnRate ?? d.burnRate,
    successRate: cfg.successRate ?? d.successRate,
    fundingTargetMin: cfg.fundingTargetMin ?? d.fundingTargetMin,
    fundingTargetMax: cfg.fundingTargetMax ?? d.fundingTargetMax,
    deployProbability: cfg.deployProbability ?? d.deployProbability,
    archetypeMix: cfg.archetypeMix ? toArchetypeMix(cfg.archetypeMix) : { ...DEFAULT_ARCHETYPE_MIX },
    yieldThresholdMean: cfg.yieldThresholdMean ?? d.yieldThresholdMean,
    initialParticipationRate: cfg.initialParticipationRate ?? d.initialParticipationRate,
    seed: cfg.seed ?? randomSeed(),
    creditExpiryEnabled: cfg.creditExpiryEnabled ?? d.creditExpiryEnabled,
    creditExpiryWeeks: cfg.creditExpiryWeeks ?? d.creditExpiryWeeks,
    failureMode: cfg.failureMode ?? d.failureMode,
  };

  if (params.fundingTargetMin > params.fundingTargetMax) {
    fail([`fundingTargetMin (${params.fundingTargetMin}) exceeds fundingTargetMax (${params.fundingTargetMax})`]);
  }
  return params;
}
