import type { Feat, Link, Row, SeqBase } from '../types/layout';

/**
 * Window of an inferred sequence: `span` covers only the observed rows,
 * `zero` starts at the true beginning of the sequence.
 */
export type InferStart = 'span' | 'zero';

export interface InferOptions {
  inferStart?: InferStart;
  /** bin_id for rows that carry none; falls back to seq_id */
  inferBinId?: (row: Row) => string;
}

interface SidePosition {
  seq_id: string;
  bin_id?: string;
  start: number;
  end: number;
  row: Row;
}

function collect(positions: readonly SidePosition[], options: InferOptions): SeqBase[] {
  const groups = new Map<string, { seq_id: string; bin_id: string; min: number; max: number }>();
  for (const pos of positions) {
    const binId = pos.bin_id ?? options.inferBinId?.(pos.row) ?? pos.seq_id;
    const key = `${binId}\u0000${pos.seq_id}`;
    const lo = Math.min(pos.start, pos.end);
    const hi = Math.max(pos.start, pos.end);
    const group = groups.get(key);
    if (group) {
      group.min = Math.min(group.min, lo);
      group.max = Math.max(group.max, hi);
    } else {
      groups.set(key, { seq_id: pos.seq_id, bin_id: binId, min: lo, max: hi });
    }
  }

  return [...groups.values()].map((g): SeqBase => ({
    seq_id: g.seq_id,
    bin_id: g.bin_id,
    parent_id: g.seq_id,
    length: g.max,
    start: options.inferStart === 'zero' ? 0 : g.min,
    end: g.max,
    strand: '+',
  }));
}

/** One pseudo-sequence per (bin_id, seq_id) seen in a feat track */
export function inferSeqsFromFeats(feats: readonly Feat[], options: InferOptions = {}): SeqBase[] {
  return collect(
    feats.map((f) => ({ seq_id: f.seq_id, bin_id: f.bin_id, start: f.start, end: f.end, row: f })),
    options
  );
}

/** Both ends of every link contribute to the pseudo-sequences */
export function inferSeqsFromLinks(links: readonly Link[], options: InferOptions = {}): SeqBase[] {
  const sides = links.flatMap((l) => [
    { seq_id: l.seq_id1, bin_id: l.bin_id1, start: l.start1, end: l.end1 },
    { seq_id: l.seq_id2, bin_id: l.bin_id2, start: l.start2, end: l.end2 },
  ]);
  return collect(
    sides.map((side) => ({ ...side, row: side })),
    options
  );
}
