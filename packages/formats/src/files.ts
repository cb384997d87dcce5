import { ConfigurationError } from '@synteny/layout';
import type { FormatConfig, FormatContext } from './config';

const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function zipPattern(config: FormatConfig): RegExp {
  return new RegExp(`\\.(${config.zips.map(escape).join('|')})$`, 'i');
}

export function fileIsZip(file: string, config: FormatConfig): boolean {
  return zipPattern(config).test(file);
}

export function fileIsUrl(file: string): boolean {
  return /^((http|ftp)s?|sftp):\/\//.test(file);
}

export function fileStripZip(file: string, config: FormatConfig): string {
  return file.replace(zipPattern(config), '');
}

/** Extension after the last dot, ignoring a compression suffix */
export function fileExt(file: string, config: FormatConfig): string | null {
  const m = /\.([^./]+)$/.exec(fileStripZip(file, config));
  return m ? m[1] : null;
}

/** Base name without directory, compression suffix and extension */
export function fileName(file: string, config: FormatConfig): string {
  const base = fileStripZip(file, config).split(/[\\/]/).pop() ?? file;
  return base.replace(/\.[^.]+$/, '');
}

export function extToFormat(ext: string, context: FormatContext, config: FormatConfig): string | null {
  const lower = ext.toLowerCase();
  const formats = config.contexts[context];
  return Object.keys(formats).find((format) => formats[format].includes(lower)) ?? null;
}

function describe(context: FormatContext, config: FormatConfig): string {
  return Object.entries(config.contexts[context])
    .map(([format, exts]) => `${format} [${exts.join(', ')}]`)
    .join('; ');
}

/** Format of every file, keyed by file; unknown extensions are an error */
export function fileFormat(
  files: readonly string[],
  context: FormatContext,
  config: FormatConfig
): Map<string, string> {
  const formats = new Map<string, string>();
  const bad: string[] = [];
  for (const file of files) {
    const ext = fileExt(file, config);
    const format = ext === null ? null : extToFormat(ext, context, config);
    if (format === null) bad.push(file);
    else formats.set(file, format);
  }
  if (bad.length > 0) {
    throw new ConfigurationError(
      `Bad extension for file format context "${context}": ${bad.join(', ')}. Recognized formats: ${describe(context, config)}`
    );
  }
  return formats;
}

/** The one format shared by all files */
export function fileFormatUnique(files: readonly string[], context: FormatContext, config: FormatConfig): string {
  const formats = [...new Set(fileFormat(files, context, config).values())];
  if (formats.length !== 1) {
    throw new ConfigurationError(`All files need the same format, got a mix of: ${formats.join(', ')}`);
  }
  return formats[0];
}

/**
 * Label files by name. Files already labelled keep their label; names that
 * are taken get "_2", "_3", ... appended.
 */
export function fileLabel(
  files: ReadonlyArray<string | { file: string; label: string }>,
  config: FormatConfig
): Array<{ file: string; label: string }> {
  const used = new Set(files.flatMap((entry) => (typeof entry === 'string' ? [] : [entry.label])));
  return files.map((entry) => {
    if (typeof entry !== 'string') return entry;
    const name = fileName(entry, config);
    let label = name;
    for (let n = 2; used.has(label); n++) label = `${name}_${n}`;
    used.add(label);
    return { file: entry, label };
  });
}
