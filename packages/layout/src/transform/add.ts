import { type } from 'arktype';
import { castDraft, produce } from 'immer';
import { ConfigurationError, UnresolvedReferenceError } from '../errors';
import { projectFeats } from '../project/feats';
import { projectLinks } from '../project/links';
import {
  ClusterSchema,
  checkInterval,
  parseFeats,
  parseLinks,
  SublinkSchema,
  SubfeatSchema,
  toFeatStrand,
} from '../registry/schema';
import { asTracks, findFeatTrack, trackNames } from '../registry/tracks';
import type {
  CoordTransform,
  Feat,
  FeatStrand,
  FeatTrack,
  LayoutState,
  Link,
  LinkTrack,
  ProjectionReport,
  RowTable,
  TrackInput,
  TrackRef,
} from '../types/layout';
import { projectOptions, reprojectFeats } from './settle';

/** Turns parent-relative coordinates into sequence coordinates for one parent feature */
export type SubfeatOffset = (parent: Feat) => CoordTransform;

/**
 * Amino-acid positions inside a coding feature to nucleotide positions on its
 * sequence. Residue 1 starts at the parent's start on '+', at its end on '-'.
 */
export const aminoToNucleotide: SubfeatOffset = (parent) => ({ start, end }) =>
  parent.strand === '-'
    ? { start: parent.end - end * 3 + 1, end: parent.end - (start - 1) * 3 }
    : { start: parent.start + (start - 1) * 3, end: parent.start + end * 3 - 1 };

const reverse = (strand: FeatStrand): FeatStrand =>
  strand === '+' ? '-' : strand === '-' ? '+' : '.';

/** Strand of a child given relative to a parent feature */
const relativeStrand = (child: FeatStrand | undefined, parent: FeatStrand): FeatStrand =>
  child === undefined || child === '.' ? parent : parent === '-' ? reverse(child) : child;

function pushFeatTracks(state: LayoutState, tracks: FeatTrack[]): LayoutState {
  for (const track of tracks) state.log.unresolved(track.id, track.report);
  return produce(state, (draft) => {
    draft.status = 'transformed';
    draft.feats.push(...castDraft(tracks));
  });
}

function pushLinkTracks(state: LayoutState, tracks: LinkTrack[]): LayoutState {
  for (const track of tracks) state.log.unresolved(track.id, track.report);
  return produce(state, (draft) => {
    draft.status = 'transformed';
    draft.links.push(...castDraft(tracks));
  });
}

function featTrack(state: LayoutState, id: string, rows: Feat[], transform: CoordTransform | null): FeatTrack {
  const { rows: projected, report } = projectFeats(state.seqs, { id, rows, transform }, projectOptions(state));
  return { id, kind: 'feats', rows, transform, projected, report };
}

function linkTrack(state: LayoutState, id: string, rows: Link[]): LinkTrack {
  const { rows: projected, report } = projectLinks(state.seqs, { id, rows }, projectOptions(state));
  return { id, kind: 'links', rows, projected, report };
}

/** Count rows whose parent feature is missing; strict mode refuses them */
function missingParents(state: LayoutState, trackId: string, ids: readonly string[]): ProjectionReport | null {
  if (ids.length === 0) return null;
  if (state.settings.references === 'strict') throw new UnresolvedReferenceError(trackId, [...new Set(ids)]);
  return {
    unresolved: ids.length,
    filtered: 0,
    outside: 0,
    trimmed: 0,
    dropped: 0,
    examples: [...new Set(ids)].slice(0, 5),
  };
}

function mergeReports(a: ProjectionReport, b: ProjectionReport | null): ProjectionReport {
  if (!b) return a;
  return {
    unresolved: a.unresolved + b.unresolved,
    filtered: a.filtered + b.filtered,
    outside: a.outside + b.outside,
    trimmed: a.trimmed + b.trimmed,
    dropped: a.dropped + b.dropped,
    examples: [...new Set([...a.examples, ...b.examples])].slice(0, 5),
  };
}

export interface AddFeatsOptions {
  /** Applied to every interval of the new tracks before projection */
  transform?: CoordTransform;
}

/** Add feature tracks and project them onto the current layout */
export function addFeats(state: LayoutState, input: TrackInput, options: AddFeatsOptions = {}): LayoutState {
  return addFeatTables(state, input, 'feats', options);
}

/** Same as {@link addFeats}, with "genes" as the default track name */
export function addGenes(state: LayoutState, input: TrackInput, options: AddFeatsOptions = {}): LayoutState {
  return addFeatTables(state, input, 'genes', options);
}

function addFeatTables(state: LayoutState, input: TrackInput, defaultName: string, options: AddFeatsOptions) {
  const tracks = asTracks(input, defaultName, trackNames(state)).map((t) =>
    featTrack(state, t.id, parseFeats(t.id, t.rows), options.transform ?? null)
  );
  return pushFeatTracks(state, tracks);
}

/** Add link tracks and project both of their ends onto the current layout */
export function addLinks(state: LayoutState, input: TrackInput): LayoutState {
  const tracks = asTracks(input, 'links', trackNames(state)).map((t) =>
    linkTrack(state, t.id, parseLinks(t.id, t.rows))
  );
  return pushLinkTracks(state, tracks);
}

export interface AddSubOptions {
  /** Feat track holding the parent features */
  parent?: TrackRef;
  offset?: SubfeatOffset;
}

/**
 * Add features positioned relative to features of another track, e.g. protein
 * domains given in residues of a gene. Rows name their parent through feat_id.
 */
export function addSubfeats(state: LayoutState, input: TrackInput, options: AddSubOptions = {}): LayoutState {
  const parents = findFeatTrack(state, options.parent);
  const byId = new Map(parents.rows.map((f) => [f.feat_id, f]));
  const offset = options.offset ?? aminoToNucleotide;

  const tracks = asTracks(input, 'subfeats', trackNames(state)).map((t) => {
    const missing: string[] = [];
    const rows = t.rows.flatMap((row, i): Feat[] => {
      const where = `Track "${t.id}", row ${i + 1}`;
      const out = SubfeatSchema(row);
      if (out instanceof type.errors) throw new ConfigurationError(`${where}: ${out.summary}`);
      checkInterval(out.start, out.end, where);
      const parent = byId.get(out.feat_id);
      if (!parent) {
        missing.push(out.feat_id);
        return [];
      }
      const { start, end } = offset(parent)({ start: out.start, end: out.end });
      return [{
        ...row,
        feat_id: out.subfeat_id ?? `${t.id}_${i + 1}`,
        parent_feat_id: parent.feat_id,
        seq_id: parent.seq_id,
        bin_id: parent.bin_id,
        start: Math.min(start, end),
        end: Math.max(start, end),
        strand: relativeStrand(out.strand === undefined ? undefined : toFeatStrand(out.strand, where), parent.strand),
        track_id: t.id,
      }];
    });
    const track = featTrack(state, t.id, rows, null);
    return { ...track, report: mergeReports(track.report, missingParents(state, t.id, missing)) };
  });
  return pushFeatTracks(state, tracks);
}

/** Add links whose ends are given relative to features of another track */
export function addSublinks(state: LayoutState, input: TrackInput, options: AddSubOptions = {}): LayoutState {
  const parents = findFeatTrack(state, options.parent);
  const byId = new Map(parents.rows.map((f) => [f.feat_id, f]));
  const offset = options.offset ?? aminoToNucleotide;

  const tracks = asTracks(input, 'sublinks', trackNames(state)).map((t) => {
    const missing: string[] = [];
    const rows = t.rows.flatMap((row, i): Link[] => {
      const where = `Track "${t.id}", row ${i + 1}`;
      const out = SublinkSchema(row);
      if (out instanceof type.errors) throw new ConfigurationError(`${where}: ${out.summary}`);
      checkInterval(out.start, out.end, where);
      checkInterval(out.start2, out.end2, where);
      const one = byId.get(out.feat_id);
      const two = byId.get(out.feat_id2);
      if (!one) missing.push(out.feat_id);
      if (!two) missing.push(out.feat_id2);
      if (!one || !two) return [];

      const a = offset(one)({ start: out.start, end: out.end });
      const b = offset(two)({ start: out.start2, end: out.end2 });
      const rel = toFeatStrand(out.strand, where);
      const flips = [rel === '-', one.strand === '-', two.strand === '-'].filter(Boolean).length;
      return [{
        ...row,
        link_id: out.link_id ?? `${t.id}_${i + 1}`,
        seq_id1: one.seq_id,
        start1: Math.min(a.start, a.end),
        end1: Math.max(a.start, a.end),
        bin_id1: one.bin_id,
        seq_id2: two.seq_id,
        start2: Math.min(b.start, b.end),
        end2: Math.max(b.start, b.end),
        bin_id2: two.bin_id,
        strand: flips % 2 === 1 ? '-' : '+',
        track_id: t.id,
      }];
    });
    const track = linkTrack(state, t.id, rows);
    return { ...track, report: mergeReports(track.report, missingParents(state, t.id, missing)) };
  });
  return pushLinkTracks(state, tracks);
}

export interface AddClustersOptions {
  /** Feat track the cluster members belong to */
  parent?: TrackRef;
  /** Name of the link track connecting cluster members */
  track?: string;
}

/**
 * Attach cluster_id to the members of each cluster and connect the members
 * of one cluster that sit on consecutive bins with links.
 */
export function addClusters(state: LayoutState, clusters: RowTable, options: AddClustersOptions = {}): LayoutState {
  const parent = findFeatTrack(state, options.parent);
  const [named] = asTracks(clusters, options.track ?? 'clusters', trackNames(state));

  const clusterOf = new Map<string, string>();
  const known = new Set(parent.rows.map((f) => f.feat_id));
  const missing: string[] = [];
  named.rows.forEach((row, i) => {
    const out = ClusterSchema(row);
    if (out instanceof type.errors) {
      throw new ConfigurationError(`Track "${named.id}", row ${i + 1}: ${out.summary}`);
    }
    if (known.has(out.feat_id)) clusterOf.set(out.feat_id, out.cluster_id);
    else missing.push(out.feat_id);
  });
  const report = missingParents(state, named.id, missing);

  const rows = parent.rows.map((f) => {
    const clusterId = clusterOf.get(f.feat_id);
    return clusterId === undefined ? f : { ...f, cluster_id: clusterId };
  });
  const annotated = reprojectFeats({ ...parent, rows }, state.seqs, projectOptions(state));

  // members ordered by row; only members on different rows get connected
  const members = new Map<string, typeof annotated.projected>();
  for (const feat of annotated.projected) {
    if (feat.cluster_id === undefined) continue;
    const list = members.get(feat.cluster_id) ?? [];
    list.push(feat);
    members.set(feat.cluster_id, list);
  }
  const links: Link[] = [];
  for (const [clusterId, list] of members) {
    const sorted = [...list].sort((a, b) => a.y - b.y);
    for (let i = 1; i < sorted.length; i++) {
      const [a, b] = [sorted[i - 1], sorted[i]];
      if (a.y === b.y) continue;
      links.push({
        link_id: `${named.id}_${links.length + 1}`,
        cluster_id: clusterId,
        seq_id1: a.seq_id,
        start1: a.start,
        end1: a.end,
        bin_id1: a.bin_id,
        seq_id2: b.seq_id,
        start2: b.start,
        end2: b.end,
        bin_id2: b.bin_id,
        strand: a.strand !== '.' && b.strand !== '.' && a.strand !== b.strand ? '-' : '+',
        track_id: named.id,
      });
    }
  }
  const track = linkTrack(state, named.id, links);
  const withParent = produce(state, (draft) => {
    const index = draft.feats.findIndex((t) => t.id === parent.id);
    draft.feats[index] = castDraft(annotated);
  });
  return pushLinkTracks(withParent, [{ ...track, report: mergeReports(track.report, report) }]);
}
