import { ValidationError } from '../errors';
import type { LayoutState } from '../types/layout';
import { settle } from './settle';

/** Move whole bins along x; shifts add up over repeated calls */
export function shift(state: LayoutState, binIds: readonly string[], by: number): LayoutState {
  const known = new Set(state.seqs.map((s) => s.bin_id));
  const unknown = binIds.filter((id) => !known.has(id));
  if (unknown.length > 0) throw new ValidationError(`Unknown bins: ${unknown.join(', ')}`);

  const binShifts = { ...state.binShifts };
  for (const binId of new Set(binIds)) {
    binShifts[binId] = (binShifts[binId] ?? 0) + by;
  }
  return settle(state, state.seqs, { binShifts });
}
