import { describe, expect, it } from 'vitest';
import { getFeats, getSeqs } from '../accessors';
import { ValidationError } from '../errors';
import { layoutGenomes } from '../layout/genomes';
import { flipSeqs } from './flip';
import { shift } from './shift';

const seqs = [
  { seq_id: 'A', bin_id: 'g1', length: 100 },
  { seq_id: 'X', bin_id: 'g2', length: 30 },
];
const laid = layoutGenomes({ seqs, feats: [{ seq_id: 'X', start: 5, end: 10 }] });

describe('shift', () => {
  it('adds up repeated shifts', () => {
    const state = shift(shift(laid, ['g2'], 100), ['g2'], 50);
    expect(state.binShifts).toEqual({ g2: 150 });
    expect(getSeqs(state).map((s) => s.x_offset)).toEqual([0, 150]);
    expect(getFeats(state).map((f) => [f.x, f.xend])).toEqual([[155, 160]]);
  });

  it('survives later transforms', () => {
    const state = flipSeqs(shift(laid, ['g2'], 100), ['X']);
    expect(getFeats(state).map((f) => [f.x, f.xend])).toEqual([[120, 125]]);
  });

  it('rejects unknown bins', () => {
    expect(() => shift(laid, ['g9'], 10)).toThrow(ValidationError);
  });
});
