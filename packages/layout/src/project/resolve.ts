import { overlap } from '../layout/coords';
import type { Interval, Overhang, ProjectionReport, ReferenceMode, Seq, SeqRef } from '../types/layout';

export interface ProjectOptions {
  references: ReferenceMode;
  overhang: Overhang;
  /** Every sequence the layout has known; tells filtered rows from broken ones */
  universe: readonly SeqRef[];
}

export type Resolution =
  | { status: 'placed'; seq: Seq; interval: Interval; trimmed: boolean }
  | { status: 'unresolved' | 'filtered' | 'outside' | 'dropped' };

export interface Resolver {
  resolve(seqId: string, binId: string | undefined, interval: Interval): Resolution;
}

export function emptyReport(): ProjectionReport {
  return { unresolved: 0, filtered: 0, outside: 0, trimmed: 0, dropped: 0, examples: [] };
}

/**
 * Resolve sequence-local intervals against the current layout rows. A
 * sequence split by focus has several rows; the row whose window overlaps the
 * interval most wins, ties going to the earlier row.
 */
export function createResolver(seqs: readonly Seq[], options: ProjectOptions): Resolver {
  const byParent = new Map<string, Seq[]>();
  for (const seq of seqs) {
    const rows = byParent.get(seq.parent_id);
    if (rows) rows.push(seq);
    else byParent.set(seq.parent_id, [seq]);
  }
  const known = new Set(options.universe.map((ref) => ref.parent_id));
  const knownInBin = new Set(options.universe.map((ref) => `${ref.bin_id}\u0000${ref.parent_id}`));
  const wasKnown = (seqId: string, binId: string | undefined) =>
    binId === undefined ? known.has(seqId) : knownInBin.has(`${binId}\u0000${seqId}`);

  return {
    resolve(seqId, binId, interval) {
      const candidates = (byParent.get(seqId) ?? []).filter(
        (seq) => binId === undefined || seq.bin_id === binId
      );
      if (candidates.length === 0) {
        return { status: wasKnown(seqId, binId) ? 'filtered' : 'unresolved' };
      }

      let best: Seq | null = null;
      let bestOverlap = -1;
      for (const seq of candidates) {
        const o = overlap(interval, seq);
        if (o > bestOverlap) {
          best = seq;
          bestOverlap = o;
        }
      }
      // touching the window is not enough, unless the row is a single point
      const point = interval.start === interval.end;
      if (!best || bestOverlap < 0 || (bestOverlap === 0 && !point)) return { status: 'outside' };

      const spans = interval.start < best.start || interval.end > best.end;
      if (!spans || options.overhang === 'keep') {
        return { status: 'placed', seq: best, interval, trimmed: false };
      }
      if (options.overhang === 'drop') return { status: 'dropped' };
      return {
        status: 'placed',
        seq: best,
        interval: {
          start: Math.max(interval.start, best.start),
          end: Math.min(interval.end, best.end),
        },
        trimmed: true,
      };
    },
  };
}

/** Count a failed row in the report; unresolved ids are kept as examples */
export function tally(report: ProjectionReport, status: Exclude<Resolution['status'], 'placed'>, id?: string) {
  report[status]++;
  if (status === 'unresolved' && id !== undefined && report.examples.length < 5 && !report.examples.includes(id)) {
    report.examples.push(id);
  }
}
