import { ConfigurationError, type RowTable } from '@synteny/layout';
import type { FormatConfig, FormatContext } from './config';
import { fileFormatUnique, fileLabel } from './files';

/** Contract for a parser adapter turning one file into a layout table */
export interface TrackReader {
  context: FormatContext;
  formats: readonly string[];
  read: (file: string, format: string) => RowTable;
}

/**
 * Read several files of one format with the matching reader. Each row gets
 * the file's label in the `idColumn` column (e.g. "bin_id" when every file
 * holds one genome).
 */
export function readTracks(
  files: readonly string[],
  context: FormatContext,
  readers: readonly TrackReader[],
  config: FormatConfig,
  idColumn = 'file_id'
): RowTable {
  const format = fileFormatUnique(files, context, config);
  const reader = readers.find((r) => r.context === context && r.formats.includes(format));
  if (!reader) {
    throw new ConfigurationError(`No reader for ${context} in format "${format}"`);
  }
  return fileLabel(files, config).flatMap(({ file, label }) =>
    reader.read(file, format).map((row) => ({ ...row, [idColumn]: label }))
  );
}
