import { ConfigurationError } from '../errors';
import type {
  FeatTrack,
  LayoutState,
  LinkTrack,
  RowTable,
  TrackInput,
  TrackKind,
  TrackRef,
} from '../types/layout';

export interface NamedTable {
  id: string;
  rows: RowTable;
}

/** Names that can never be taken by a feat or link track */
export const RESERVED_TRACK_NAMES: readonly string[] = ['seqs'];

function isTable(input: TrackInput): input is RowTable {
  return Array.isArray(input) && !input.some((item) => Array.isArray(item));
}

function isTableList(input: TrackInput): input is readonly RowTable[] {
  return Array.isArray(input) && input.every((item) => Array.isArray(item));
}

function nextName(base: string, taken: ReadonlySet<string>): string {
  let n = 1;
  while (taken.has(`${base}_${n}`)) n++;
  return `${base}_${n}`;
}

/**
 * Turn track input into named tables. A single table is called `defaultName`;
 * unnamed tables in a list get `<defaultName>_<n>`. Any name already in
 * `taken` (or used twice here) is a configuration error.
 */
export function asTracks(
  input: TrackInput | undefined,
  defaultName: string,
  taken: readonly string[] = RESERVED_TRACK_NAMES
): NamedTable[] {
  if (input === undefined) return [];

  let tables: Array<{ id: string | null; rows: RowTable }>;
  if (isTable(input)) {
    tables = [{ id: defaultName, rows: input }];
  } else if (isTableList(input)) {
    tables = input.map((rows) => ({ id: null, rows }));
  } else {
    tables = Object.entries(input).map(([id, rows]) => ({ id: id === '' ? null : id, rows }));
  }

  const used = new Set(taken);
  const explicit = new Set<string>();
  for (const { id } of tables) {
    if (id === null) continue;
    if (used.has(id) || explicit.has(id)) {
      throw new ConfigurationError(`Track name "${id}" is already in use`);
    }
    explicit.add(id);
  }
  for (const id of explicit) used.add(id);

  return tables.map(({ id, rows }) => {
    if (id !== null) return { id, rows };
    const name = nextName(defaultName, used);
    used.add(name);
    return { id: name, rows };
  });
}

export function trackNames(state: LayoutState): string[] {
  return [
    ...RESERVED_TRACK_NAMES,
    ...state.feats.map((t) => t.id),
    ...state.links.map((t) => t.id),
  ];
}

function findTrack<T extends { id: string }>(tracks: readonly T[], ref: TrackRef, kind: TrackKind): T {
  const track =
    typeof ref === 'number' ? tracks[ref] : tracks.find((t) => t.id === ref);
  if (!track) {
    const known = tracks.map((t) => t.id).join(', ') || 'none';
    throw new ConfigurationError(`Unknown ${kind} track "${ref}" (known: ${known})`);
  }
  return track;
}

export function findFeatTrack(state: LayoutState, ref: TrackRef = 0): FeatTrack {
  return findTrack(state.feats, ref, 'feats');
}

export function findLinkTrack(state: LayoutState, ref: TrackRef = 0): LinkTrack {
  return findTrack(state.links, ref, 'links');
}
