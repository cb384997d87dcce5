import type { LayoutLog } from '../util/log';

/** Record types for the layout tables. Column names follow the tabular schemas. */

export type Strand = '+' | '-';
export type FeatStrand = '+' | '-' | '.';
export type Orientation = 'colinear' | 'inverted';

/** How rows reaching past their sequence window are handled */
export type Overhang = 'trim' | 'drop' | 'keep';

/** Unresolvable sequence references either fail or get dropped */
export type ReferenceMode = 'strict' | 'lenient';

export type LayoutStatus = 'laid' | 'transformed';

export type TrackKind = 'seqs' | 'feats' | 'links';

/** A track is addressed by its name or by its position among tracks of its kind */
export type TrackRef = string | number;

/** Untyped input row as handed over by a file reader */
export type Row = Readonly<Record<string, unknown>>;
export type RowTable = readonly Row[];

/** One table, named tables, or a list of unnamed tables */
export type TrackInput = RowTable | readonly RowTable[] | Readonly<Record<string, RowTable>>;

export interface Interval {
  start: number;
  end: number;
}

/** A sequence before layout: identity, displayed window and orientation */
export interface SeqBase {
  seq_id: string;
  bin_id: string;
  /** Sequence id that feats and links refer to; differs from seq_id for focus loci */
  parent_id: string;
  length: number;
  start: number;
  end: number;
  strand: Strand;
  [column: string]: unknown;
}

export interface Seq extends SeqBase {
  bin_index: number;
  seq_index: number;
  x_offset: number;
  x: number;
  xend: number;
  y: number;
}

export interface Feat {
  feat_id: string;
  seq_id: string;
  start: number;
  end: number;
  strand: FeatStrand;
  track_id: string;
  bin_id?: string;
  parent_feat_id?: string;
  cluster_id?: string;
  [column: string]: unknown;
}

export interface ProjectedFeat extends Feat {
  bin_id: string;
  locus_id: string;
  x: number;
  xend: number;
  y: number;
}

export interface Link {
  link_id: string;
  seq_id1: string;
  start1: number;
  end1: number;
  seq_id2: string;
  start2: number;
  end2: number;
  strand: FeatStrand;
  track_id: string;
  bin_id1?: string;
  bin_id2?: string;
  [column: string]: unknown;
}

export interface ProjectedLink extends Link {
  bin_id1: string;
  bin_id2: string;
  locus_id1: string;
  locus_id2: string;
  x: number;
  xend: number;
  y: number;
  x2: number;
  xend2: number;
  y2: number;
  orientation: Orientation;
}

/** Pure coordinate transform applied to sequence-local intervals before projection */
export type CoordTransform = (interval: Interval) => Interval;

/** Aggregated outcome of one projection run */
export interface ProjectionReport {
  /** Rows whose sequence is unknown to the layout */
  unresolved: number;
  /** Rows on sequences removed by pick or focus */
  filtered: number;
  /** Rows not overlapping any window of their sequence */
  outside: number;
  /** Rows clipped to their window */
  trimmed: number;
  /** Rows reaching past their window and removed by the drop policy */
  dropped: number;
  /** Up to five ids of unresolved rows */
  examples: string[];
}

export interface FeatTrack {
  id: string;
  kind: 'feats';
  rows: Feat[];
  transform: CoordTransform | null;
  projected: ProjectedFeat[];
  report: ProjectionReport;
}

export interface LinkTrack {
  id: string;
  kind: 'links';
  rows: Link[];
  projected: ProjectedLink[];
  report: ProjectionReport;
}

/** Destination of layout messages, `console` by default */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
}

export interface LayoutSettings {
  references: ReferenceMode;
  overhang: Overhang;
  spacing: number;
}

/** A sequence as rows refer to it: its parent id within one bin */
export interface SeqRef {
  bin_id: string;
  parent_id: string;
}

export interface LayoutState {
  status: LayoutStatus;
  settings: LayoutSettings;
  seqs: Seq[];
  /** Every sequence the layout was built with, including ones removed since */
  universe: SeqRef[];
  binShifts: Record<string, number>;
  feats: FeatTrack[];
  links: LinkTrack[];
  log: LayoutLog;
}
