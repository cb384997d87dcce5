import { UnresolvedReferenceError } from '../errors';
import { projectInterval } from '../layout/coords';
import type { CoordTransform, Feat, ProjectedFeat, ProjectionReport, Seq } from '../types/layout';
import { createResolver, emptyReport, tally, type ProjectOptions } from './resolve';

export interface FeatProjection {
  rows: ProjectedFeat[];
  report: ProjectionReport;
}

/**
 * Place every feature of a track into the shared coordinate space. Original
 * columns are kept; x, xend, y, bin_id and locus_id are appended.
 */
export function projectFeats(
  seqs: readonly Seq[],
  track: { id: string; rows: readonly Feat[]; transform?: CoordTransform | null },
  options: ProjectOptions
): FeatProjection {
  const resolver = createResolver(seqs, options);
  const report = emptyReport();
  const unknown = new Set<string>();
  const rows: ProjectedFeat[] = [];

  for (const feat of track.rows) {
    const local = { start: feat.start, end: feat.end };
    const interval = track.transform ? track.transform(local) : local;
    const hit = resolver.resolve(feat.seq_id, feat.bin_id, interval);
    if (hit.status !== 'placed') {
      if (hit.status === 'unresolved') unknown.add(feat.seq_id);
      tally(report, hit.status, feat.seq_id);
      continue;
    }
    if (hit.trimmed) report.trimmed++;
    const { x, xend } = projectInterval(hit.seq, hit.interval);
    rows.push({
      ...feat,
      bin_id: hit.seq.bin_id,
      locus_id: hit.seq.seq_id,
      x,
      xend,
      y: hit.seq.y,
    });
  }

  if (options.references === 'strict' && unknown.size > 0) {
    throw new UnresolvedReferenceError(track.id, [...unknown]);
  }
  return { rows, report };
}
