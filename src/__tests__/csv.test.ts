import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { EndowmentModel } from '../sim/model';
import { historyToCSV, holdersToCSV, proposalsToCSV, toCSV, writeCSV } from '../utils/csv';

describe('toCSV', () => {
  it('quotes cells that need it and blanks nulls', () => {
    expect(toCSV(['a', 'b'], [['x,y', 'q"r'], [1, null], [true, 'plain']])).toBe(
      'a,b\n"x,y","q""r"\n1,\ntrue,plain',
    );
  });
});

describe('model exports', () => {
  const model = new EndowmentModel({ seed: 8, numHolders: 12, numProposals: 3 });
  model.runSteps(2);

  it('flattens history into one row per step', () => {
    const lines = historyToCSV(model.getHistory()).split('\n');
    expect(lines).toHaveLength(4);
    const header = lines[0].split(',');
    expect(header.slice(0, 3)).toEqual(['step', 'year', 'participationRate']);
    expect(header.slice(-7)).toEqual([
      'rsc_believer',
      'rsc_yield_seeker',
      'rsc_institution',
      'rsc_speculator',
      'count_New',
      'count_Holder',
      'count_LongTerm',
    ]);
    for (const line of lines.slice(1)) expect(line.split(',')).toHaveLength(header.length);
    expect(lines[1].startsWith('0,0,')).toBe(true);
  });

  it('writes one row per holder', () => {
    const lines = holdersToCSV(model.getHolders()).split('\n');
    expect(lines[0].startsWith('id,archetype,active,')).toBe(true);
    expect(lines).toHaveLength(1 + model.holders.length);
  });

  it('leaves unset proposal steps empty', () => {
    const fresh = new EndowmentModel({ seed: 8, numHolders: 0, numProposals: 1 });
    const lines = proposalsToCSV(fresh.getProposals()).split('\n');
    expect(lines[0]).toBe(
      'id,status,fundingTarget,creditsReceived,fundingProgress,backerCount,stepCreated,stepFunded,stepResolved',
    );
    expect(lines[1].startsWith('1,open,')).toBe(true);
    expect(lines[1].endsWith(',0,0,0,,')).toBe(true);
  });
});

describe('writeCSV', () => {
  let dir = '';

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing directories', () => {
    dir = mkdtempSync(join(tmpdir(), 'endowment-csv-'));
    const file = join(dir, 'nested', 'out.csv');
    writeCSV(file, 'a,b\n1,2');
    expect(readFileSync(file, 'utf8')).toBe('a,b\n1,2\n');
  });
});
