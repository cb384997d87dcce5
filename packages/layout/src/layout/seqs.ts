import { ValidationError } from '../errors';
import type { Seq, SeqBase } from '../types/layout';

export interface SeqLayoutOptions {
  /** Bins to put first, in this order; the others follow in order of appearance */
  binOrder?: readonly string[];
  /** Sequences to put first within their bin */
  seqOrder?: readonly string[];
  /** Gap between neighbouring sequences of a bin */
  spacing?: number;
  /** Extra x offset per bin */
  binShifts?: Readonly<Record<string, number>>;
}

function checkKnown(ids: readonly string[], known: ReadonlySet<string>, what: string) {
  const unknown = ids.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown ${what}: ${unknown.join(', ')}`);
  }
}

function rank(ids: readonly string[] | undefined): Map<string, number> {
  return new Map((ids ?? []).map((id, i) => [id, i]));
}

/** Sort bins, then sequences within bins: listed ids first, the rest by first appearance */
export function orderSeqs<T extends SeqBase>(seqs: readonly T[], options: SeqLayoutOptions = {}): T[] {
  const bins = new Map<string, T[]>();
  for (const seq of seqs) {
    const members = bins.get(seq.bin_id);
    if (members) members.push(seq);
    else bins.set(seq.bin_id, [seq]);
  }

  if (options.binOrder) checkKnown(options.binOrder, new Set(bins.keys()), 'bins');
  if (options.seqOrder) checkKnown(options.seqOrder, new Set(seqs.map((s) => s.seq_id)), 'sequences');

  const binRank = rank(options.binOrder);
  const seqRank = rank(options.seqOrder);
  const byRank = (ranks: Map<string, number>) => (a: string, b: string) =>
    (ranks.get(a) ?? ranks.size) - (ranks.get(b) ?? ranks.size);

  // Array.prototype.sort is stable, so unlisted ids keep their order
  const binIds = [...bins.keys()].sort(byRank(binRank));
  const seqCmp = byRank(seqRank);
  return binIds.flatMap((binId) =>
    [...(bins.get(binId) ?? [])].sort((a, b) => seqCmp(a.seq_id, b.seq_id))
  );
}

/**
 * Lay sequences out bin by bin. Each bin becomes a row (y = bin_index) and its
 * sequences are concatenated along x, separated by `spacing`.
 */
export function layoutSeqs(seqs: readonly SeqBase[], options: SeqLayoutOptions = {}): Seq[] {
  const spacing = options.spacing ?? 0;
  const binIndex = new Map<string, number>();
  const cursor = new Map<string, number>();
  const count = new Map<string, number>();

  return orderSeqs(seqs, options).map((seq) => {
    let bin = binIndex.get(seq.bin_id);
    if (bin === undefined) {
      bin = binIndex.size;
      binIndex.set(seq.bin_id, bin);
    }
    const seqIndex = count.get(seq.bin_id) ?? 0;
    count.set(seq.bin_id, seqIndex + 1);

    const width = seq.end - seq.start;
    const offset = (options.binShifts?.[seq.bin_id] ?? 0) + (cursor.get(seq.bin_id) ?? 0);
    cursor.set(seq.bin_id, (cursor.get(seq.bin_id) ?? 0) + width + spacing);

    return {
      ...seq,
      bin_index: bin,
      seq_index: seqIndex,
      x_offset: offset,
      x: offset,
      xend: offset + width,
      y: bin,
    };
  });
}
