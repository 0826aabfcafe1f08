import type { EmissionParams } from './types';

export const WEEKS_PER_YEAR = 52;

// E(t) = year0 / 2^(t / halfLife), t in years. Weekly issuance is the annual rate / 52.
export class EmissionSchedule {
  private cfg: EmissionParams;

  constructor(cfg: EmissionParams) {
    this.cfg = cfg;
  }

  annual(step: number): number {
    const tYears = step / WEEKS_PER_YEAR;
    return this.cfg.year0Emission / 2 ** (tYears / this.cfg.halfLifeYears);
  }

  weekly(step: number): number {
    return this.annual(step) / WEEKS_PER_YEAR;
  }

  // cumulative is the running sum of weekly() over elapsed steps, not the integral of the curve
  circulating(cumulative: number): number {
    return this.cfg.year0Circulating + cumulative;
  }
}
