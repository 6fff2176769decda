export type KitsmithErrorCode =
  | 'MAPPING_PARSE'
  | 'NOTE_SPEC_PARSE'
  | 'PATH_ESCAPE'
  | 'LISTING_FORMAT';

/**
 * Base class for every error the core throws on purpose.
 * `code` is stable and safe to branch on; `message` is for people.
 */
export class KitsmithError extends Error {
  readonly code: KitsmithErrorCode;

  constructor(code: KitsmithErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A line of a mapping definition could not be parsed.
 * Fatal: raised before any kit is processed.
 */
export class MappingParseError extends KitsmithError {
  constructor(
    readonly lineNumber: number,
    readonly line: string,
    reason: string
  ) {
    super('MAPPING_PARSE', `Mapping line ${lineNumber} (${JSON.stringify(line)}): ${reason}`);
  }
}

/**
 * A MIDI note list such as "82-127" or "36,38,40-42" is malformed.
 */
export class NoteSpecParseError extends KitsmithError {
  constructor(
    readonly spec: string,
    reason: string
  ) {
    super('NOTE_SPEC_PARSE', `Invalid MIDI note list ${JSON.stringify(spec)}: ${reason}`);
  }
}

/**
 * A sample resolves outside the sample-library root, so no valid
 * library-relative path can be written for it.
 */
export class PathEscapeError extends KitsmithError {
  constructor(
    readonly samplePath: string,
    readonly libraryRoot: string
  ) {
    super('PATH_ESCAPE', `Sample outside global base path: ${samplePath} (base=${libraryRoot})`);
  }
}

/**
 * A listing JSON file does not have the kit → category → paths shape.
 */
export class ListingFormatError extends KitsmithError {
  constructor(
    readonly source: string,
    reason: string
  ) {
    super('LISTING_FORMAT', `Invalid listing ${source}: ${reason}`);
  }
}
