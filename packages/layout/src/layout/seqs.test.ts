import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { parseSeqs } from '../registry/schema';
import { layoutSeqs } from './seqs';

const seqs = () =>
  parseSeqs([
    { seq_id: 'A', bin_id: 'g1', length: 100 },
    { seq_id: 'X', bin_id: 'g2', length: 80 },
    { seq_id: 'B', bin_id: 'g1', length: 50 },
  ]);

describe('layoutSeqs', () => {
  it('concatenates the sequences of a bin without gaps', () => {
    const laid = layoutSeqs(seqs());
    expect(laid.map((s) => [s.seq_id, s.bin_index, s.seq_index, s.x_offset, s.xend, s.y])).toEqual([
      ['A', 0, 0, 0, 100, 0],
      ['B', 0, 1, 100, 150, 0],
      ['X', 1, 0, 0, 80, 1],
    ]);
  });

  it('keeps x_offset[i+1] = x_offset[i] + length[i] within a bin', () => {
    const laid = layoutSeqs(
      parseSeqs([
        { seq_id: 'c1', bin_id: 'g', length: 17 },
        { seq_id: 'c2', bin_id: 'g', length: 230 },
        { seq_id: 'c3', bin_id: 'g', length: 4 },
        { seq_id: 'c4', bin_id: 'g', length: 91 },
      ])
    );
    for (let i = 1; i < laid.length; i++) {
      expect(laid[i].x_offset).toBe(laid[i - 1].x_offset + laid[i - 1].length);
    }
  });

  it('puts listed bins and sequences first', () => {
    const laid = layoutSeqs(seqs(), { binOrder: ['g2'], seqOrder: ['B'] });
    expect(laid.map((s) => [s.seq_id, s.bin_index, s.x_offset])).toEqual([
      ['X', 0, 0],
      ['B', 1, 0],
      ['A', 1, 50],
    ]);
  });

  it('rejects unknown ids in the order arguments', () => {
    expect(() => layoutSeqs(seqs(), { binOrder: ['g9'] })).toThrow(ValidationError);
    expect(() => layoutSeqs(seqs(), { seqOrder: ['Q'] })).toThrow(ValidationError);
  });

  it('separates sequences by the configured spacing', () => {
    const laid = layoutSeqs(seqs(), { spacing: 10 });
    expect(laid.find((s) => s.seq_id === 'B')?.x_offset).toBe(110);
  });

  it('shifts whole bins', () => {
    const laid = layoutSeqs(seqs(), { binShifts: { g1: 5 } });
    expect(laid.map((s) => s.x_offset)).toEqual([5, 105, 0]);
  });

  it('reproduces its own output', () => {
    const once = layoutSeqs(seqs());
    expect(layoutSeqs(once)).toEqual(once);
  });

  it('uses the window width of sub-sequences', () => {
    const laid = layoutSeqs(
      parseSeqs([
        { seq_id: 'A', bin_id: 'g', length: 1000, start: 200, end: 300 },
        { seq_id: 'B', bin_id: 'g', length: 50 },
      ])
    );
    expect(laid.map((s) => [s.x_offset, s.xend])).toEqual([
      [0, 100],
      [100, 150],
    ]);
  });
});
