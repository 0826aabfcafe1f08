import type { MetricsRow } from './types';

// One row per collected step, oldest first. Keeps every row for the life of the run.
export class MetricsHistory {
  private rows: MetricsRow[] = [];

  push(row: MetricsRow): { mode: 'new' | 'update'; row: MetricsRow } {
    const last = this.rows[this.rows.length - 1];
    if (last && last.step === row.step) {
      this.rows[this.rows.length - 1] = row;
      return { mode: 'update', row };
    }
    this.rows.push(row);
    return { mode: 'new', row };
  }

  latest(): MetricsRow | undefined {
    return this.rows[this.rows.length - 1];
  }

  getSeries(): MetricsRow[] {
    return this.rows.map((r) => ({
      ...r,
      rscByArchetype: { ...r.rscByArchetype },
      countByTier: { ...r.countByTier },
    }));
  }
}
