import { describe, expect, it, vi } from 'vitest';
import { getBins, getDiagnostics, getFeats, getSeqs, trackInfo } from './accessors';
import { layoutGenomes } from './layout/genomes';

const seqs = [
  { seq_id: 'A', bin_id: 'g1', length: 100 },
  { seq_id: 'B', bin_id: 'g1', length: 50 },
  { seq_id: 'X', bin_id: 'g2', length: 30 },
];
const state = layoutGenomes(
  {
    seqs,
    genes: [
      { seq_id: 'A', start: 1, end: 10 },
      { seq_id: 'Z', start: 1, end: 10 },
    ],
    links: [{ seq_id1: 'A', start1: 1, end1: 10, seq_id2: 'X', start2: 1, end2: 10 }],
  },
  { logger: { info: vi.fn(), warn: vi.fn() } }
);

describe('accessors', () => {
  it('hands out copies', () => {
    const copy = getSeqs(state);
    copy[0].x_offset = 999;
    const feats = getFeats(state);
    feats[0].x = 999;
    expect(getSeqs(state)[0].x_offset).toBe(0);
    expect(getFeats(state)[0].x).toBe(1);
  });

  it('summarizes bins', () => {
    expect(getBins(state)).toEqual([
      { bin_id: 'g1', bin_index: 0, y: 0, x: 0, xend: 150, seq_count: 2 },
      { bin_id: 'g2', bin_index: 1, y: 1, x: 0, xend: 30, seq_count: 1 },
    ]);
  });

  it('lists tracks with row counts', () => {
    expect(trackInfo(state)).toEqual([
      { id: 'seqs', kind: 'seqs', index: 0, rows: 3, shown: 3 },
      { id: 'genes', kind: 'feats', index: 0, rows: 2, shown: 1 },
      { id: 'links', kind: 'links', index: 0, rows: 1, shown: 1 },
    ]);
  });

  it('reports projection problems per track', () => {
    expect(getDiagnostics(state)).toEqual([
      { track_id: 'genes', kind: 'feats', unresolved: 1, filtered: 0, outside: 0, trimmed: 0, dropped: 0, examples: ['Z'] },
      { track_id: 'links', kind: 'links', unresolved: 0, filtered: 0, outside: 0, trimmed: 0, dropped: 0, examples: [] },
    ]);
  });
});
