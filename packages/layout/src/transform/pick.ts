import { ValidationError } from '../errors';
import type { LayoutState, Seq } from '../types/layout';
import { settle } from './settle';

function checkPick(ids: readonly string[], known: ReadonlySet<string>, what: string) {
  const unknown = ids.filter((id) => !known.has(id));
  if (unknown.length > 0) throw new ValidationError(`Unknown ${what}: ${unknown.join(', ')}`);
  const dupes = ids.filter((id, i) => ids.indexOf(id) !== i);
  if (dupes.length > 0) throw new ValidationError(`Duplicated ${what}: ${dupes.join(', ')}`);
}

/**
 * Put bins into the given order. Bins not listed are removed from the layout,
 * together with everything drawn on them.
 */
export function pick(state: LayoutState, binIds: readonly string[]): LayoutState {
  checkPick(binIds, new Set(state.seqs.map((s) => s.bin_id)), 'bins');
  const seqs = binIds.flatMap((binId) => state.seqs.filter((s) => s.bin_id === binId));
  return settle(state, seqs);
}

/**
 * Keep only the listed sequences, in listed order. Bins come in the order of
 * their first listed member. A parent id selects all of its loci.
 */
export function pickSeqs(state: LayoutState, seqIds: readonly string[]): LayoutState {
  checkPick(seqIds, new Set(state.seqs.flatMap((s) => [s.seq_id, s.parent_id])), 'sequences');

  const byBin = new Map<string, Seq[]>();
  for (const id of seqIds) {
    for (const seq of state.seqs.filter((s) => s.seq_id === id || s.parent_id === id)) {
      const members = byBin.get(seq.bin_id) ?? [];
      if (!members.includes(seq)) members.push(seq);
      byBin.set(seq.bin_id, members);
    }
  }
  return settle(state, [...byBin.values()].flat());
}
