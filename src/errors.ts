export type TaggerErrorKind = "TagParseError" | "UnsupportedFormat" | "IoError" | "PictureEncodeError";

export abstract class TaggerError extends Error {
  abstract readonly kind: TaggerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Existing tag or metadata block data could not be parsed. */
export class TagParseError extends TaggerError {
  readonly kind = "TagParseError";
}

export class UnsupportedFormatError extends TaggerError {
  readonly kind = "UnsupportedFormat";

  constructor(readonly format: string) {
    super(`format: ${format} is not supported`);
  }
}

export class IoError extends TaggerError {
  readonly kind = "IoError";

  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(`${message} (Path: ${path})`, options);
  }
}

/** Cover input was rejected; the session stays usable. */
export class PictureEncodeError extends TaggerError {
  readonly kind = "PictureEncodeError";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
