import { produce } from 'immer';
import { ValidationError } from '../errors';
import type { LayoutState, Seq, Strand } from '../types/layout';
import { settle } from './settle';

const toggle = (strand: Strand): Strand => (strand === '+' ? '-' : '+');

/** Reverse each targeted bin: its sequence order is inverted and every strand toggled */
function flippedBins(seqs: readonly Seq[], binIds: ReadonlySet<string>): Seq[] {
  const toggled = produce(seqs, (draft) => {
    for (const seq of draft) {
      if (binIds.has(seq.bin_id)) seq.strand = toggle(seq.strand);
    }
  });
  const reversed = new Map<string, Seq[]>();
  for (const binId of binIds) {
    reversed.set(binId, toggled.filter((s) => s.bin_id === binId).reverse());
  }
  return toggled.map((seq) => {
    const queue = reversed.get(seq.bin_id);
    return queue?.shift() ?? seq;
  });
}

function flippedSeqs(seqs: readonly Seq[], seqIds: ReadonlySet<string>): readonly Seq[] {
  return produce(seqs, (draft) => {
    for (const seq of draft) {
      if (seqIds.has(seq.seq_id) || seqIds.has(seq.parent_id)) seq.strand = toggle(seq.strand);
    }
  });
}

function checkIds(ids: readonly string[], known: ReadonlySet<string>, what: string) {
  const unknown = ids.filter((id) => !known.has(id));
  if (unknown.length > 0) throw new ValidationError(`Unknown ${what}: ${unknown.join(', ')}`);
}

const binIdsOf = (state: LayoutState) => new Set(state.seqs.map((s) => s.bin_id));
const seqIdsOf = (state: LayoutState) =>
  new Set(state.seqs.flatMap((s) => [s.seq_id, s.parent_id]));

/** Reverse-complement whole bins */
export function flipBins(state: LayoutState, binIds: readonly string[]): LayoutState {
  checkIds(binIds, binIdsOf(state), 'bins');
  return settle(state, flippedBins(state.seqs, new Set(binIds)));
}

/** Toggle the strand of single sequences; a parent id flips all of its loci */
export function flipSeqs(state: LayoutState, seqIds: readonly string[]): LayoutState {
  checkIds(seqIds, seqIdsOf(state), 'sequences');
  return settle(state, flippedSeqs(state.seqs, new Set(seqIds)));
}

/**
 * Flip bins or sequences by id. An id naming a bin flips the whole bin,
 * otherwise it must name a sequence.
 */
export function flip(state: LayoutState, ids: readonly string[]): LayoutState {
  const bins = binIdsOf(state);
  const binTargets = ids.filter((id) => bins.has(id));
  const seqTargets = ids.filter((id) => !bins.has(id));
  checkIds(seqTargets, seqIdsOf(state), 'bins or sequences');
  const seqs = flippedSeqs(flippedBins(state.seqs, new Set(binTargets)), new Set(seqTargets));
  return settle(state, seqs);
}
