import { createStore } from 'zustand/vanilla';
import { ConfigurationError } from '../errors';
import { layoutGenomes, type GenomeInput, type LayoutOptions } from '../layout/genomes';
import {
  addClusters,
  addFeats,
  addGenes,
  addLinks,
  addSubfeats,
  addSublinks,
  type AddClustersOptions,
  type AddFeatsOptions,
  type AddSubOptions,
} from '../transform/add';
import { flip, flipBins, flipSeqs } from '../transform/flip';
import { focus, focusLinks, type FocusOptions } from '../transform/focus';
import { pick, pickSeqs } from '../transform/pick';
import { shift } from '../transform/shift';
import type {
  LayoutState,
  LayoutStatus,
  ProjectedFeat,
  ProjectedLink,
  RowTable,
  TrackInput,
} from '../types/layout';

export interface LayoutStoreState {
  /** null until init() succeeds */
  layout: LayoutState | null;

  // Actions
  init: (input: GenomeInput, options?: LayoutOptions) => void;
  flip: (ids: readonly string[]) => void;
  flipBins: (binIds: readonly string[]) => void;
  flipSeqs: (seqIds: readonly string[]) => void;
  pick: (binIds: readonly string[]) => void;
  pickSeqs: (seqIds: readonly string[]) => void;
  shift: (binIds: readonly string[], by: number) => void;
  focus: (where: ((feat: ProjectedFeat) => boolean) | undefined, options?: FocusOptions) => void;
  focusLinks: (where: ((link: ProjectedLink) => boolean) | undefined, options?: FocusOptions) => void;
  addFeats: (input: TrackInput, options?: AddFeatsOptions) => void;
  addGenes: (input: TrackInput, options?: AddFeatsOptions) => void;
  addLinks: (input: TrackInput) => void;
  addSubfeats: (input: TrackInput, options?: AddSubOptions) => void;
  addSublinks: (input: TrackInput, options?: AddSubOptions) => void;
  addClusters: (clusters: RowTable, options?: AddClustersOptions) => void;
  reset: () => void;
}

/**
 * Mutable cell around the immutable layout value. Every action swaps in the
 * state returned by a transform; when the transform throws, the stored
 * layout stays as it was.
 */
export const createLayoutStore = () =>
  createStore<LayoutStoreState>()((set, get) => {
    const apply = (transform: (layout: LayoutState) => LayoutState) => {
      const { layout } = get();
      if (!layout) throw new ConfigurationError('No layout yet, call init() first');
      set({ layout: transform(layout) });
    };

    return {
      layout: null,

      init: (input, options) => set({ layout: layoutGenomes(input, options) }),
      flip: (ids) => apply((l) => flip(l, ids)),
      flipBins: (binIds) => apply((l) => flipBins(l, binIds)),
      flipSeqs: (seqIds) => apply((l) => flipSeqs(l, seqIds)),
      pick: (binIds) => apply((l) => pick(l, binIds)),
      pickSeqs: (seqIds) => apply((l) => pickSeqs(l, seqIds)),
      shift: (binIds, by) => apply((l) => shift(l, binIds, by)),
      focus: (where, options) => apply((l) => focus(l, where, options)),
      focusLinks: (where, options) => apply((l) => focusLinks(l, where, options)),
      addFeats: (input, options) => apply((l) => addFeats(l, input, options)),
      addGenes: (input, options) => apply((l) => addGenes(l, input, options)),
      addLinks: (input) => apply((l) => addLinks(l, input)),
      addSubfeats: (input, options) => apply((l) => addSubfeats(l, input, options)),
      addSublinks: (input, options) => apply((l) => addSublinks(l, input, options)),
      addClusters: (clusters, options) => apply((l) => addClusters(l, clusters, options)),
      reset: () => set({ layout: null }),
    };
  });

export type LayoutStore = ReturnType<typeof createLayoutStore>;

/** Lifecycle of the stored layout */
export function selectStatus(state: LayoutStoreState): 'unlaid' | LayoutStatus {
  return state.layout?.status ?? 'unlaid';
}
