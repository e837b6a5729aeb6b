import { TagParseError } from "../../errors";
import { concatBytes, decodeUtf8, encodeUtf8, uint32LE, viewOf } from "../../utils/bytes";
import { BlockType } from "./flacFile";
import type { MetadataBlock } from "./flacFile";

export const VorbisField = {
  Title: "TITLE",
  Album: "ALBUM",
  Artist: "ARTIST",
} as const;

function isValidFieldName(key: string): boolean {
  if (key.length === 0) return false;

  for (let i = 0; i < key.length; i++) {
    const code = key.charCodeAt(i);
    if (code < 0x20 || code > 0x7d || code === 0x3d) return false;
  }

  return true;
}

/**
 * The key/value comment map carried by a VORBIS_COMMENT block. Entries are
 * kept as raw "KEY=value" strings in their original order.
 */
export class VorbisComment {
  private _comments: string[];

  constructor(public vendor: string, comments: string[] = []) {
    this._comments = [...comments];
  }

  get comments(): readonly string[] {
    return this._comments;
  }

  static parse(data: Uint8Array): VorbisComment {
    const view = viewOf(data);
    let offset = 0;

    const readString = (what: string): string => {
      if (offset + 4 > data.length) throw new TagParseError(`Vorbis comment ${what} length is truncated`);

      const length = view.getUint32(offset, true);
      offset += 4;
      if (offset + length > data.length) throw new TagParseError(`Vorbis comment ${what} overruns the block`);

      const value = decodeUtf8(data.subarray(offset, offset + length));
      offset += length;
      return value;
    };

    const vendor = readString("vendor");

    if (offset + 4 > data.length) throw new TagParseError("Vorbis comment count is truncated");
    const count = view.getUint32(offset, true);
    offset += 4;

    const comments: string[] = [];
    for (let i = 0; i < count; i++) {
      comments.push(readString(`entry ${i}`));
    }

    return new VorbisComment(vendor, comments);
  }

  /**
   * Values stored under `key`, compared case-insensitively. Throws when an
   * entry has no "=" separator.
   */
  get(key: string): string[] {
    const wanted = key.toUpperCase();
    const values: string[] = [];

    for (const comment of this._comments) {
      const separator = comment.indexOf("=");
      if (separator === -1) throw new TagParseError(`Malformed vorbis comment entry '${comment}'`);

      if (comment.slice(0, separator).toUpperCase() === wanted) values.push(comment.slice(separator + 1));
    }

    return values;
  }

  add(key: string, value: string): void {
    if (!isValidFieldName(key)) throw new TagParseError(`Invalid vorbis comment field name '${key}'`);

    this._comments.push(`${key}=${value}`);
  }

  marshal(): MetadataBlock {
    const chunks: Uint8Array[] = [];

    const vendor = encodeUtf8(this.vendor);
    chunks.push(uint32LE(vendor.length), vendor, uint32LE(this._comments.length));

    for (const comment of this._comments) {
      const bytes = encodeUtf8(comment);
      chunks.push(uint32LE(bytes.length), bytes);
    }

    return { type: BlockType.VorbisComment, data: concatBytes(chunks) };
  }
}
