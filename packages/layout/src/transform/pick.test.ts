import { describe, expect, it } from 'vitest';
import { getFeats, getSeqs } from '../accessors';
import { ValidationError } from '../errors';
import { layoutGenomes } from '../layout/genomes';
import { pick, pickSeqs } from './pick';

const seqs = [
  { seq_id: 'A', bin_id: 'g1', length: 100 },
  { seq_id: 'B', bin_id: 'g1', length: 50 },
  { seq_id: 'X', bin_id: 'g2', length: 30 },
  { seq_id: 'Y', bin_id: 'g3', length: 40 },
];
const feats = [
  { seq_id: 'A', start: 1, end: 10 },
  { seq_id: 'X', start: 1, end: 10 },
];

describe('pick', () => {
  it('reorders bins and removes the unlisted ones', () => {
    const state = pick(layoutGenomes({ seqs, feats }), ['g3', 'g1']);
    expect(getSeqs(state).map((s) => [s.seq_id, s.y, s.x_offset])).toEqual([
      ['Y', 0, 0],
      ['A', 1, 0],
      ['B', 1, 100],
    ]);
    expect(getFeats(state).map((f) => [f.seq_id, f.y])).toEqual([['A', 1]]);
    expect(state.feats[0].report.filtered).toBe(1);
    expect(state.feats[0].report.unresolved).toBe(0);
  });

  it('does not treat removed sequences as unknown in strict mode', () => {
    const strict = layoutGenomes({ seqs, feats }, { references: 'strict' });
    expect(() => pick(strict, ['g1'])).not.toThrow();

    const pinned = layoutGenomes({ seqs, feats: [{ seq_id: 'X', bin_id: 'g2', start: 1, end: 5 }] }, { references: 'strict' });
    expect(pick(pinned, ['g1']).feats[0].report.filtered).toBe(1);
  });

  it('is undone by picking the original order', () => {
    const laid = layoutGenomes({ seqs, feats });
    const back = pick(pick(laid, ['g3', 'g2', 'g1']), ['g1', 'g2', 'g3']);
    expect(getSeqs(back)).toEqual(getSeqs(laid));
    expect(getFeats(back)).toEqual(getFeats(laid));
  });

  it('rejects unknown and duplicated bins', () => {
    const laid = layoutGenomes({ seqs });
    expect(() => pick(laid, ['g1', 'g9'])).toThrow(ValidationError);
    expect(() => pick(laid, ['g1', 'g1'])).toThrow(ValidationError);
  });
});

describe('pickSeqs', () => {
  it('keeps the listed sequences grouped by bin', () => {
    const state = pickSeqs(layoutGenomes({ seqs }), ['B', 'X', 'A']);
    expect(getSeqs(state).map((s) => [s.seq_id, s.y, s.x_offset])).toEqual([
      ['B', 0, 0],
      ['A', 0, 50],
      ['X', 1, 0],
    ]);
  });

  it('rejects unknown sequences', () => {
    expect(() => pickSeqs(layoutGenomes({ seqs }), ['Q'])).toThrow(ValidationError);
  });
});
