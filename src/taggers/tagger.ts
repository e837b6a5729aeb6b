import type { Id3Version } from "../settings/config";

export type AudioFormat = "mp3" | "flac";

export interface TaggerOptions {
  /** Description stored with cover pictures. Defaults to the `cover-description` setting. */
  coverDescription?: string;
  /** Version of a newly created ID3 tag; an existing tag keeps its own. */
  id3Version?: Id3Version;
  /** Vendor string of a newly created FLAC comment block. */
  vendor?: string;
}

/**
 * A tagging session bound to one file. Setters only fill fields the file does
 * not have yet; cover setters always add a picture. Nothing reaches the disk
 * until {@link Tagger.finalize}, which must be called exactly once.
 */
export interface Tagger {
  readonly path: string;
  readonly format: AudioFormat;

  setCover(data: Uint8Array, mimeType: string): Promise<void>;
  setCoverByUrl(url: string): Promise<void>;
  setTitle(title: string): void;
  setAlbum(album: string): void;
  setArtist(artists: string[]): void;
  setComment(comment: string): void;
  finalize(): Promise<void>;
}
