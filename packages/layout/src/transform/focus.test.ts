import { describe, expect, it } from 'vitest';
import { getFeats, getLinks, getSeqs } from '../accessors';
import { ValidationError } from '../errors';
import { layoutGenomes } from '../layout/genomes';
import type { LayoutState, ProjectedFeat } from '../types/layout';
import { addFeats } from './add';
import { flipSeqs } from './flip';
import { focus, focusLinks } from './focus';

const seqs = [
  { seq_id: 'A', length: 1000 },
  { seq_id: 'B', length: 1000 },
];
const feats = [
  { seq_id: 'A', start: 100, end: 200, name: 'x', feat_id: 'a1' },
  { seq_id: 'A', start: 250, end: 300, feat_id: 'a2' },
  { seq_id: 'A', start: 700, end: 800, name: 'x', feat_id: 'a3' },
  { seq_id: 'B', start: 400, end: 500, feat_id: 'b1' },
];
const laid = layoutGenomes({ seqs, feats });
const isX = (f: ProjectedFeat) => f.name === 'x';

const placed = (state: LayoutState) =>
  getFeats(state).map((f) => [f.feat_id, f.locus_id, f.x, f.xend]);

describe('focus', () => {
  it('turns every match into a locus of its own', () => {
    const state = focus(laid, isX, { expand: 75, maxDist: 0 });
    expect(getSeqs(state).map((s) => [s.seq_id, s.parent_id, s.start, s.end, s.x_offset, s.xend])).toEqual([
      ['A:25-275', 'A', 25, 275, 0, 250],
      ['A:625-875', 'A', 625, 875, 250, 500],
    ]);
    expect(state.settings.overhang).toBe('drop');
    expect(placed(state)).toEqual([
      ['a1', 'A:25-275', 75, 175],
      ['a3', 'A:625-875', 325, 425],
    ]);
    expect(state.feats[0].report).toEqual({
      unresolved: 0,
      filtered: 1,
      outside: 0,
      trimmed: 0,
      dropped: 1,
      examples: [],
    });
  });

  it('trims or keeps overhanging rows on request', () => {
    const trimmed = focus(laid, isX, { expand: 75, maxDist: 0, overhang: 'trim' });
    expect(placed(trimmed)[1]).toEqual(['a2', 'A:25-275', 225, 250]);
    expect(trimmed.feats[0].report.trimmed).toBe(1);

    const kept = focus(laid, isX, { expand: 75, maxDist: 0, overhang: 'keep' });
    expect(placed(kept)[1]).toEqual(['a2', 'A:25-275', 225, 275]);
  });

  it('leaves rows that only touch a window outside', () => {
    const state = focus(laid, isX, { expand: 50, maxDist: 0, overhang: 'trim' });
    expect(getSeqs(state)[0].seq_id).toBe('A:50-250');
    expect(getFeats(state).map((f) => f.feat_id)).toEqual(['a1', 'a3']);
    expect(state.feats[0].report.outside).toBe(1);
    expect(state.feats[0].report.trimmed).toBe(0);
  });

  it('places the window where a transformed track draws its rows', () => {
    const withDomains = addFeats(
      laid,
      { doms: [{ seq_id: 'A', start: 1, end: 2 }] },
      { transform: ({ start, end }) => ({ start: start * 100, end: end * 100 }) }
    );
    const state = focus(withDomains, () => true, { track: 'doms', expand: 0 });
    expect(getSeqs(state).map((s) => s.seq_id)).toEqual(['A:100-200']);
    expect(getFeats(state, 'doms').map((f) => [f.x, f.xend])).toEqual([[0, 100]]);
  });

  it('merges targets closer than maxDist', () => {
    const state = focus(laid, isX, { expand: 50, maxDist: 500 });
    expect(getSeqs(state).map((s) => s.seq_id)).toEqual(['A:50-850']);
    expect(getFeats(state).map((f) => f.feat_id)).toEqual(['a1', 'a2', 'a3']);
  });

  it('expands upstream against the strand of the target', () => {
    const state = layoutGenomes({
      seqs,
      feats: [
        { seq_id: 'A', start: 100, end: 200, strand: '+' },
        { seq_id: 'B', start: 400, end: 500, strand: '-' },
      ],
    });
    const focused = focus(state, () => true, { expand: [10, 100] });
    expect(getSeqs(focused).map((s) => s.seq_id)).toEqual(['A:90-300', 'B:300-510']);
  });

  it('clamps windows to the sequence', () => {
    const state = focus(laid, (f) => f.feat_id === 'a1', { expand: 5000 });
    expect(getSeqs(state).map((s) => s.seq_id)).toEqual(['A:0-1000']);
  });

  it('takes explicit windows', () => {
    const state = focus(laid, undefined, { subseqs: [{ seq_id: 'B', start: 300, end: 600 }] });
    expect(getSeqs(state).map((s) => [s.seq_id, s.y])).toEqual([['B:300-600', 0]]);
    expect(placed(state)).toEqual([['b1', 'B:300-600', 100, 200]]);
  });

  it('lists the loci of a reverse sequence from right to left', () => {
    const state = focus(flipSeqs(laid, ['A']), isX, { expand: 50, maxDist: 0 });
    expect(getSeqs(state).map((s) => [s.seq_id, s.strand, s.x_offset])).toEqual([
      ['A:650-850', '-', 0],
      ['A:50-250', '-', 200],
    ]);
    expect(placed(state)).toEqual([
      ['a1', 'A:50-250', 250, 350],
      ['a3', 'A:650-850', 50, 150],
    ]);
  });

  it('narrows an existing focus', () => {
    const first = focus(laid, isX, { expand: 50, maxDist: 0 });
    const second = focus(first, (f) => f.feat_id === 'a1', { expand: 10, maxDist: 0 });
    expect(getSeqs(second).map((s) => s.seq_id)).toEqual(['A:90-210']);
    expect(placed(second)).toEqual([['a1', 'A:90-210', 10, 110]]);
    expect(second.feats[0].report.outside).toBe(2);
  });

  it('needs at least one window', () => {
    expect(() => focus(laid, () => false)).toThrow(ValidationError);
    expect(() => focus(laid, undefined, { subseqs: [{ seq_id: 'Q', start: 1, end: 5 }] })).toThrow(
      ValidationError
    );
  });
});

describe('focusLinks', () => {
  it('targets both ends of the matching links', () => {
    const state = layoutGenomes({
      seqs,
      links: [{ seq_id1: 'A', start1: 100, end1: 200, seq_id2: 'B', start2: 400, end2: 500, strand: '-' }],
    });
    const focused = focusLinks(state, () => true, { expand: [10, 100], maxDist: 0 });
    expect(getSeqs(focused).map((s) => s.seq_id)).toEqual(['A:90-300', 'B:300-510']);
    expect(getLinks(focused).map((l) => [l.x, l.xend, l.x2, l.xend2])).toEqual([[10, 110, 200, 100]]);
  });
});
