export type LayoutErrorKind = 'configuration' | 'reference' | 'validation';

/** Base class for everything the layout engine throws on purpose */
export class LayoutError extends Error {
  readonly kind: LayoutErrorKind;

  constructor(kind: LayoutErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Missing columns, ambiguous or unknown tracks, nothing to derive sequences from */
export class ConfigurationError extends LayoutError {
  constructor(message: string) {
    super('configuration', message);
  }
}

/** A feat or link points at a sequence the layout does not know (strict mode) */
export class UnresolvedReferenceError extends LayoutError {
  readonly trackId: string;
  readonly ids: string[];

  constructor(trackId: string, ids: string[]) {
    const shown = ids.slice(0, 5).join(', ');
    const more = ids.length > 5 ? `, ... (${ids.length} total)` : '';
    super('reference', `Track "${trackId}" references unknown sequences: ${shown}${more}`);
    this.trackId = trackId;
    this.ids = ids;
  }
}

/** User-supplied ids that do not exist, or a focus that matched nothing */
export class ValidationError extends LayoutError {
  constructor(message: string) {
    super('validation', message);
  }
}
