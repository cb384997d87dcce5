import { type } from 'arktype';
import { freeze } from 'immer';
import { ConfigurationError } from '../errors';
import { projectFeats } from '../project/feats';
import { projectLinks } from '../project/links';
import type { ProjectOptions } from '../project/resolve';
import { parseFeats, parseLinks, parseSeqs } from '../registry/schema';
import { asTracks, RESERVED_TRACK_NAMES } from '../registry/tracks';
import type {
  FeatTrack,
  LayoutState,
  LinkTrack,
  Logger,
  ReferenceMode,
  Row,
  RowTable,
  SeqBase,
  SeqRef,
  TrackInput,
} from '../types/layout';
import { LayoutLog } from '../util/log';
import { inferSeqsFromFeats, inferSeqsFromLinks, type InferStart } from './infer';
import { layoutSeqs } from './seqs';

export interface GenomeInput {
  seqs?: RowTable;
  /** Feats registered under the default name "genes" */
  genes?: TrackInput;
  feats?: TrackInput;
  links?: TrackInput;
}

export interface LayoutOptions {
  /** Unknown sequence references fail in strict mode and are dropped otherwise */
  references?: ReferenceMode;
  spacing?: number;
  binOrder?: readonly string[];
  seqOrder?: readonly string[];
  inferStart?: InferStart;
  inferBinId?: (row: Row) => string;
  logger?: Logger;
}

const LayoutOptionsSchema = type({
  'references?': "'strict' | 'lenient'",
  'spacing?': 'number>=0',
  'binOrder?': 'string[]',
  'seqOrder?': 'string[]',
  'inferStart?': "'span' | 'zero'",
});

/**
 * Build a layout from sequences, feature tracks and link tracks. Without
 * sequences, pseudo-sequences are inferred from the first feat track, or else
 * the first link track.
 */
export function layoutGenomes(input: GenomeInput, options: LayoutOptions = {}): LayoutState {
  const checked = LayoutOptionsSchema(options);
  if (checked instanceof type.errors) {
    throw new ConfigurationError(`Invalid layout options: ${checked.summary}`);
  }
  const log = new LayoutLog(options.logger);

  const genes = asTracks(input.genes, 'genes');
  const feats = asTracks(input.feats, 'feats', [...RESERVED_TRACK_NAMES, ...genes.map((t) => t.id)]);
  const featTables = [...genes, ...feats];
  const linkTables = asTracks(input.links, 'links', [
    ...RESERVED_TRACK_NAMES,
    ...featTables.map((t) => t.id),
  ]);

  const featRows = featTables.map((t) => ({ id: t.id, rows: parseFeats(t.id, t.rows) }));
  const linkRows = linkTables.map((t) => ({ id: t.id, rows: parseLinks(t.id, t.rows) }));

  let seqs: SeqBase[];
  if (input.seqs) {
    seqs = parseSeqs(input.seqs, options.inferBinId);
  } else if (featRows.length > 0) {
    log.info(`No seqs provided, inferring seqs from track "${featRows[0].id}"`);
    seqs = inferSeqsFromFeats(featRows[0].rows, options);
  } else if (linkRows.length > 0) {
    log.info(`No seqs or feats provided, inferring seqs from track "${linkRows[0].id}"`);
    seqs = inferSeqsFromLinks(linkRows[0].rows, options);
  } else {
    throw new ConfigurationError('Need at least one of: seqs, genes, feats or links');
  }

  const laid = layoutSeqs(seqs, {
    binOrder: options.binOrder,
    seqOrder: options.seqOrder,
    spacing: options.spacing,
  });
  const universe = laid.map((s): SeqRef => ({ bin_id: s.bin_id, parent_id: s.parent_id }));
  const projectOptions: ProjectOptions = {
    references: options.references ?? 'lenient',
    overhang: 'keep',
    universe,
  };

  const featTracks = featRows.map((t): FeatTrack => {
    const { rows, report } = projectFeats(laid, t, projectOptions);
    log.unresolved(t.id, report);
    return { id: t.id, kind: 'feats', rows: t.rows, transform: null, projected: rows, report };
  });
  const linkTracks = linkRows.map((t): LinkTrack => {
    const { rows, report } = projectLinks(laid, t, projectOptions);
    log.unresolved(t.id, report);
    return { id: t.id, kind: 'links', rows: t.rows, projected: rows, report };
  });

  const state: LayoutState = {
    status: 'laid',
    settings: {
      references: projectOptions.references,
      overhang: projectOptions.overhang,
      spacing: options.spacing ?? 0,
    },
    seqs: laid,
    universe,
    binShifts: {},
    feats: featTracks,
    links: linkTracks,
    log,
  };
  return freeze(state, true);
}
