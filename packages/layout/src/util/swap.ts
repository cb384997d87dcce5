import type { Row, RowTable } from '../types/layout';

/**
 * Swap query and subject columns of blast-like tables: every `name`/`name2`
 * pair (seq_id/seq_id2, start/start2, ...) and every `name1`/`name2` pair
 * (seq_id1/seq_id2, ...) trade values.
 */
export function swapQuery(rows: RowTable): Row[] {
  return rows.map((row) => {
    const swapped: Record<string, unknown> = { ...row };
    for (const key of Object.keys(row)) {
      const m = /^(.*\D)2$/.exec(key);
      if (!m) continue;
      const base = [m[1], `${m[1]}1`].find((name) => name in row);
      if (base === undefined) continue;
      swapped[base] = row[key];
      swapped[key] = row[base];
    }
    return swapped;
  });
}
