import { castDraft, produce } from 'immer';
import { layoutSeqs } from '../layout/seqs';
import { projectFeats } from '../project/feats';
import { projectLinks } from '../project/links';
import type { ProjectOptions } from '../project/resolve';
import type { FeatTrack, LayoutState, LinkTrack, Overhang, Seq, SeqBase } from '../types/layout';

export function projectOptions(state: LayoutState, overhang: Overhang = state.settings.overhang): ProjectOptions {
  return {
    references: state.settings.references,
    overhang,
    universe: state.universe,
  };
}

export function reprojectFeats(track: FeatTrack, seqs: readonly Seq[], options: ProjectOptions): FeatTrack {
  const { rows, report } = projectFeats(seqs, track, options);
  return { ...track, projected: rows, report };
}

export function reprojectLinks(track: LinkTrack, seqs: readonly Seq[], options: ProjectOptions): LinkTrack {
  const { rows, report } = projectLinks(seqs, track, options);
  return { ...track, projected: rows, report };
}

export interface SettlePatch {
  binShifts?: Record<string, number>;
  overhang?: Overhang;
}

/**
 * Lay out a new sequence set and recompute every derived coordinate. Nothing
 * is patched incrementally: projections are rebuilt from the raw rows.
 */
export function settle(state: LayoutState, seqs: readonly SeqBase[], patch: SettlePatch = {}): LayoutState {
  const binShifts = patch.binShifts ?? state.binShifts;
  const overhang = patch.overhang ?? state.settings.overhang;
  const laid = layoutSeqs(seqs, { spacing: state.settings.spacing, binShifts });
  const options = projectOptions(state, overhang);
  const feats = state.feats.map((track) => reprojectFeats(track, laid, options));
  const links = state.links.map((track) => reprojectLinks(track, laid, options));

  return produce(state, (draft) => {
    draft.status = 'transformed';
    draft.settings.overhang = overhang;
    draft.binShifts = binShifts;
    draft.seqs = castDraft(laid);
    draft.feats = castDraft(feats);
    draft.links = castDraft(links);
  });
}
