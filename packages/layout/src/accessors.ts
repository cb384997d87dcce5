import { findFeatTrack, findLinkTrack } from './registry/tracks';
import type {
  LayoutState,
  ProjectedFeat,
  ProjectedLink,
  ProjectionReport,
  Seq,
  TrackKind,
  TrackRef,
} from './types/layout';

// Everything handed out here is a fresh copy. Later transforms never touch it.

export function getSeqs(state: LayoutState): Seq[] {
  return state.seqs.map((seq) => ({ ...seq }));
}

export function getFeats(state: LayoutState, track?: TrackRef): ProjectedFeat[] {
  return findFeatTrack(state, track).projected.map((feat) => ({ ...feat }));
}

export function getLinks(state: LayoutState, track?: TrackRef): ProjectedLink[] {
  return findLinkTrack(state, track).projected.map((link) => ({ ...link }));
}

export interface BinSummary {
  bin_id: string;
  bin_index: number;
  y: number;
  x: number;
  xend: number;
  seq_count: number;
}

/** One entry per bin, spanning from its leftmost to its rightmost sequence */
export function getBins(state: LayoutState): BinSummary[] {
  const bins = new Map<string, BinSummary>();
  for (const seq of state.seqs) {
    const bin = bins.get(seq.bin_id);
    if (bin) {
      bin.x = Math.min(bin.x, seq.x);
      bin.xend = Math.max(bin.xend, seq.xend);
      bin.seq_count++;
    } else {
      bins.set(seq.bin_id, {
        bin_id: seq.bin_id,
        bin_index: seq.bin_index,
        y: seq.y,
        x: seq.x,
        xend: seq.xend,
        seq_count: 1,
      });
    }
  }
  return [...bins.values()];
}

export interface TrackInfo {
  id: string;
  kind: TrackKind;
  /** Position among the tracks of the same kind */
  index: number;
  rows: number;
  shown: number;
}

export function trackInfo(state: LayoutState): TrackInfo[] {
  return [
    { id: 'seqs', kind: 'seqs', index: 0, rows: state.seqs.length, shown: state.seqs.length },
    ...state.feats.map((t, index): TrackInfo => ({
      id: t.id,
      kind: 'feats',
      index,
      rows: t.rows.length,
      shown: t.projected.length,
    })),
    ...state.links.map((t, index): TrackInfo => ({
      id: t.id,
      kind: 'links',
      index,
      rows: t.rows.length,
      shown: t.projected.length,
    })),
  ];
}

export interface TrackDiagnostic extends ProjectionReport {
  track_id: string;
  kind: 'feats' | 'links';
}

/** Projection reports of all tracks, as of the last transform */
export function getDiagnostics(state: LayoutState): TrackDiagnostic[] {
  return [
    ...state.feats.map((t): TrackDiagnostic => ({ track_id: t.id, kind: 'feats', ...t.report, examples: [...t.report.examples] })),
    ...state.links.map((t): TrackDiagnostic => ({ track_id: t.id, kind: 'links', ...t.report, examples: [...t.report.examples] })),
  ];
}
