import { UnresolvedReferenceError } from '../errors';
import { toShared } from '../layout/coords';
import type { Link, Orientation, ProjectedLink, ProjectionReport, Seq } from '../types/layout';
import { createResolver, emptyReport, tally, type ProjectOptions } from './resolve';

export interface LinkProjection {
  rows: ProjectedLink[];
  report: ProjectionReport;
}

/**
 * Colinear when both projected ends run the same way along x. A link on a
 * flipped sequence, or one with strand '-', runs backwards on that end.
 */
export function linkOrientation(x: number, xend: number, x2: number, xend2: number): Orientation {
  return (xend >= x) === (xend2 >= x2) ? 'colinear' : 'inverted';
}

/**
 * Place both ends of every link. Unlike features, each end keeps its
 * direction: start maps to x and end to xend, so ends on reverse sequences
 * come out with x > xend.
 */
export function projectLinks(
  seqs: readonly Seq[],
  track: { id: string; rows: readonly Link[] },
  options: ProjectOptions
): LinkProjection {
  const resolver = createResolver(seqs, options);
  const report = emptyReport();
  const unknown = new Set<string>();
  const rows: ProjectedLink[] = [];

  for (const link of track.rows) {
    const one = resolver.resolve(link.seq_id1, link.bin_id1, { start: link.start1, end: link.end1 });
    const two = resolver.resolve(link.seq_id2, link.bin_id2, { start: link.start2, end: link.end2 });
    if (one.status === 'unresolved') unknown.add(link.seq_id1);
    if (two.status === 'unresolved') unknown.add(link.seq_id2);

    if (one.status !== 'placed') {
      tally(report, one.status, link.seq_id1);
      continue;
    }
    if (two.status !== 'placed') {
      tally(report, two.status, link.seq_id2);
      continue;
    }
    if (one.trimmed || two.trimmed) report.trimmed++;

    const x = toShared(one.seq, one.interval.start);
    const xend = toShared(one.seq, one.interval.end);
    const reversed = link.strand === '-';
    const x2 = toShared(two.seq, reversed ? two.interval.end : two.interval.start);
    const xend2 = toShared(two.seq, reversed ? two.interval.start : two.interval.end);

    rows.push({
      ...link,
      bin_id1: one.seq.bin_id,
      bin_id2: two.seq.bin_id,
      locus_id1: one.seq.seq_id,
      locus_id2: two.seq.seq_id,
      x,
      xend,
      y: one.seq.y,
      x2,
      xend2,
      y2: two.seq.y,
      orientation: linkOrientation(x, xend, x2, xend2),
    });
  }

  if (options.references === 'strict' && unknown.size > 0) {
    throw new UnresolvedReferenceError(track.id, [...unknown]);
  }
  return { rows, report };
}
