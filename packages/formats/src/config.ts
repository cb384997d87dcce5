/** The kind of table a file is read into */
export type FormatContext = 'feats' | 'seqs' | 'links';

/**
 * Which formats can be read in which context, and the file extensions each
 * format is recognized by. Passed explicitly to every helper below.
 */
export interface FormatConfig {
  contexts: Record<FormatContext, Record<string, readonly string[]>>;
  /** Compression extensions ignored when looking for the format extension */
  zips: readonly string[];
}

export const defaultFormatConfig: FormatConfig = {
  contexts: {
    feats: {
      gff3: ['gff', 'gff3'],
      gbk: ['gbk', 'gb', 'gbff'],
      bed: ['bed'],
      fasta: ['fa', 'fas', 'fasta', 'ffn', 'fna', 'faa'],
    },
    seqs: {
      fai: ['fai'],
      'seq-len': ['seq-len'],
      fasta: ['fa', 'fas', 'fasta', 'ffn', 'fna', 'faa'],
      gbk: ['gbk', 'gb', 'gbff'],
      gff3: ['gff', 'gff3'],
    },
    links: {
      paf: ['paf'],
      blast: ['m8', 'o6', 'blast'],
      alitv: ['json'],
    },
  },
  zips: ['bz2', 'gz', 'xz', 'zip'],
};
