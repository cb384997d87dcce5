import { ValidationError } from '../errors';
import { findFeatTrack, findLinkTrack } from '../registry/tracks';
import type {
  FeatStrand,
  Interval,
  LayoutState,
  Overhang,
  ProjectedFeat,
  ProjectedLink,
  Seq,
  SeqBase,
  TrackRef,
} from '../types/layout';
import { settle } from './settle';

/** Explicit window on a sequence, in sequence-local coordinates */
export interface SubseqInput {
  seq_id: string;
  start: number;
  end: number;
}

export interface FocusOptions {
  /** Track the predicate runs over; the first track of its kind by default */
  track?: TrackRef;
  /** Margin around each target, or [upstream, downstream] */
  expand?: number | readonly [number, number];
  /** Targets on the same sequence closer than this are merged into one locus */
  maxDist?: number;
  /** Policy for rows reaching past the new windows */
  overhang?: Overhang;
  /** Windows to show in addition to the predicate targets */
  subseqs?: readonly SubseqInput[];
}

export const FOCUS_DEFAULTS = {
  expand: 5000,
  maxDist: 10000,
  overhang: 'drop',
} as const;

interface Window extends Interval {
  locus: Seq;
}

function expandTarget(
  locus: Seq,
  { start, end }: Interval,
  strand: FeatStrand,
  expand: FocusOptions['expand']
): Window {
  const [up, down] = typeof expand === 'number' ? [expand, expand] : expand ?? [FOCUS_DEFAULTS.expand, FOCUS_DEFAULTS.expand];
  // upstream is relative to the target's own strand
  const [before, after] = strand === '-' ? [down, up] : [up, down];
  return {
    locus,
    start: Math.max(locus.start, start - before),
    end: Math.min(locus.end, end + after),
  };
}

function subseqWindows(state: LayoutState, subseqs: readonly SubseqInput[]): Window[] {
  return subseqs.flatMap((sub) => {
    const loci = state.seqs.filter((s) => s.seq_id === sub.seq_id || s.parent_id === sub.seq_id);
    if (loci.length === 0) throw new ValidationError(`Unknown sequence in subseqs: ${sub.seq_id}`);
    return loci
      .map((locus) => ({
        locus,
        start: Math.max(locus.start, Math.min(sub.start, sub.end)),
        end: Math.min(locus.end, Math.max(sub.start, sub.end)),
      }))
      .filter((w) => w.start <= w.end);
  });
}

/** Merge windows per locus when they overlap or lie within maxDist of each other */
function mergeWindows(windows: readonly Window[], maxDist: number): Map<string, Interval[]> {
  const byLocus = new Map<string, Interval[]>();
  for (const w of windows) {
    const list = byLocus.get(w.locus.seq_id) ?? [];
    list.push({ start: w.start, end: w.end });
    byLocus.set(w.locus.seq_id, list);
  }
  for (const [id, list] of byLocus) {
    list.sort((a, b) => a.start - b.start);
    const merged: Interval[] = [];
    for (const w of list) {
      const last = merged[merged.length - 1];
      if (last && w.start - last.end <= maxDist) last.end = Math.max(last.end, w.end);
      else merged.push({ ...w });
    }
    byLocus.set(id, merged);
  }
  return byLocus;
}

function refocus(state: LayoutState, targets: readonly Window[], options: FocusOptions): LayoutState {
  const windows = [...targets, ...subseqWindows(state, options.subseqs ?? [])];
  if (windows.length === 0) {
    throw new ValidationError('focus matched no rows and no subseqs were given');
  }
  const merged = mergeWindows(windows, options.maxDist ?? FOCUS_DEFAULTS.maxDist);

  const seqs = state.seqs.flatMap((locus): SeqBase[] => {
    const list = merged.get(locus.seq_id) ?? [];
    // reverse sequences read right to left
    const ordered = locus.strand === '-' ? [...list].reverse() : list;
    return ordered.map((w) => ({
      ...locus,
      seq_id: `${locus.parent_id}:${w.start}-${w.end}`,
      start: w.start,
      end: w.end,
    }));
  });
  return settle(state, seqs, { overhang: options.overhang ?? FOCUS_DEFAULTS.overhang });
}

function locusOf(state: LayoutState, id: string): Seq {
  const locus = state.seqs.find((s) => s.seq_id === id);
  if (!locus) throw new ValidationError(`Unknown locus: ${id}`);
  return locus;
}

/**
 * Zoom in on the features matching `where`. Every match, widened by `expand`,
 * becomes a window of its sequence; nearby windows merge, and each window is
 * laid out as its own row entry. Sequences without windows disappear.
 */
export function focus(
  state: LayoutState,
  where: ((feat: ProjectedFeat) => boolean) | undefined,
  options: FocusOptions = {}
): LayoutState {
  if (!where) return refocus(state, [], options);
  const { projected, transform } = findFeatTrack(state, options.track);
  // windows go where the rows were placed, i.e. after the track's transform
  const targets = projected.filter(where).map((f) => {
    const local = { start: f.start, end: f.end };
    return expandTarget(locusOf(state, f.locus_id), transform ? transform(local) : local, f.strand, options.expand);
  });
  return refocus(state, targets, options);
}

/** Like {@link focus}, but targets both ends of the matching links */
export function focusLinks(
  state: LayoutState,
  where: ((link: ProjectedLink) => boolean) | undefined,
  options: FocusOptions = {}
): LayoutState {
  const hits = where ? findLinkTrack(state, options.track).projected.filter(where) : [];
  const targets = hits.flatMap((l) => [
    expandTarget(locusOf(state, l.locus_id1), { start: l.start1, end: l.end1 }, '+', options.expand),
    expandTarget(locusOf(state, l.locus_id2), { start: l.start2, end: l.end2 }, l.strand, options.expand),
  ]);
  return refocus(state, targets, options);
}
