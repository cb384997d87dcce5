import { type } from 'arktype';
import { ConfigurationError } from '../errors';
import type { Feat, FeatStrand, Link, Row, RowTable, SeqBase, Strand } from '../types/layout';

// Undeclared columns pass validation untouched and travel with the row.

export const SeqSchema = type({
  seq_id: 'string>0',
  'bin_id?': 'string>0',
  'parent_id?': 'string>0',
  length: 'number>=0',
  'start?': 'number>=0',
  'end?': 'number>=0',
  'strand?': 'string | number',
});

export const FeatSchema = type({
  seq_id: 'string>0',
  start: 'number>=0',
  end: 'number>=0',
  'strand?': 'string | number',
  'feat_id?': 'string>0',
  'bin_id?': 'string>0',
});

export const LinkSchema = type({
  seq_id1: 'string>0',
  start1: 'number>=0',
  end1: 'number>=0',
  seq_id2: 'string>0',
  start2: 'number>=0',
  end2: 'number>=0',
  'strand?': 'string | number',
  'link_id?': 'string>0',
  'bin_id1?': 'string>0',
  'bin_id2?': 'string>0',
});

/** Sub-feature rows point at their parent feature through feat_id */
export const SubfeatSchema = type({
  feat_id: 'string>0',
  start: 'number>=0',
  end: 'number>=0',
  'strand?': 'string | number',
  'subfeat_id?': 'string>0',
});

export const SublinkSchema = type({
  feat_id: 'string>0',
  start: 'number>=0',
  end: 'number>=0',
  feat_id2: 'string>0',
  start2: 'number>=0',
  end2: 'number>=0',
  'strand?': 'string | number',
  'link_id?': 'string>0',
});

export const ClusterSchema = type({
  cluster_id: 'string>0',
  feat_id: 'string>0',
});

/** Map the strand spellings of common formats onto '+', '-' and '.' */
export function toFeatStrand(value: string | number | undefined, where: string): FeatStrand {
  switch (value) {
    case undefined:
    case '.':
    case '*':
    case '':
    case 0:
      return '.';
    case '+':
    case 1:
      return '+';
    case '-':
    case -1:
      return '-';
    default:
      throw new ConfigurationError(`${where}: unrecognized strand "${value}"`);
  }
}

export function toSeqStrand(value: string | number | undefined, where: string): Strand {
  return toFeatStrand(value, where) === '-' ? '-' : '+';
}

export function checkInterval(start: number, end: number, where: string) {
  if (start > end) {
    throw new ConfigurationError(`${where}: start (${start}) must not exceed end (${end})`);
  }
}

const rowLabel = (trackId: string, i: number) => `Track "${trackId}", row ${i + 1}`;

/**
 * Validate a sequence table. `bin_id` defaults to `inferBinId(row)` and then to
 * `seq_id`; the window defaults to the whole sequence.
 */
export function parseSeqs(rows: RowTable, inferBinId?: (row: Row) => string): SeqBase[] {
  const seen = new Set<string>();
  return rows.map((row, i) => {
    const where = rowLabel('seqs', i);
    const out = SeqSchema(row);
    if (out instanceof type.errors) {
      throw new ConfigurationError(`${where}: ${out.summary}`);
    }
    const start = out.start ?? 0;
    const end = out.end ?? out.length;
    checkInterval(start, end, where);
    if (end > out.length) {
      throw new ConfigurationError(`${where}: end (${end}) exceeds length (${out.length})`);
    }
    const binId = out.bin_id ?? inferBinId?.(row) ?? out.seq_id;
    const key = `${binId}\u0000${out.seq_id}`;
    if (seen.has(key)) {
      throw new ConfigurationError(`Sequence "${out.seq_id}" appears twice in bin "${binId}"`);
    }
    seen.add(key);
    return {
      ...row,
      seq_id: out.seq_id,
      bin_id: binId,
      parent_id: out.parent_id ?? out.seq_id,
      length: out.length,
      start,
      end,
      strand: toSeqStrand(out.strand, where),
    };
  });
}

export function parseFeats(trackId: string, rows: RowTable): Feat[] {
  return rows.map((row, i) => {
    const where = rowLabel(trackId, i);
    const out = FeatSchema(row);
    if (out instanceof type.errors) {
      throw new ConfigurationError(`${where}: ${out.summary}`);
    }
    checkInterval(out.start, out.end, where);
    return {
      ...row,
      seq_id: out.seq_id,
      start: out.start,
      end: out.end,
      bin_id: out.bin_id,
      feat_id: out.feat_id ?? `${trackId}_${i + 1}`,
      strand: toFeatStrand(out.strand, where),
      track_id: trackId,
    };
  });
}

export function parseLinks(trackId: string, rows: RowTable): Link[] {
  return rows.map((row, i) => {
    const where = rowLabel(trackId, i);
    const out = LinkSchema(row);
    if (out instanceof type.errors) {
      throw new ConfigurationError(`${where}: ${out.summary}`);
    }
    checkInterval(out.start1, out.end1, where);
    checkInterval(out.start2, out.end2, where);
    return {
      ...row,
      seq_id1: out.seq_id1,
      start1: out.start1,
      end1: out.end1,
      seq_id2: out.seq_id2,
      start2: out.start2,
      end2: out.end2,
      bin_id1: out.bin_id1,
      bin_id2: out.bin_id2,
      link_id: out.link_id ?? `${trackId}_${i + 1}`,
      strand: toFeatStrand(out.strand, where),
      track_id: trackId,
    };
  });
}
