import { IoError } from "../errors";
import { getConfigValue } from "../settings/config";
import { Logger, LogLevel } from "../utils/logger";
import { FRONT_COVER_PICTURE_TYPE } from "./cover";
import { BlockType, FlacFile } from "./flac/flacFile";
import { marshalPicture, pictureFromImageData, pictureFromUrl } from "./flac/flacPicture";
import type { FlacPicture } from "./flac/flacPicture";
import { VorbisComment, VorbisField } from "./flac/vorbisComment";
import type { AudioFormat, Tagger, TaggerOptions } from "./tagger";

const logger = Logger.create("FlacTagger", LogLevel.Debug);

export class FlacTagger implements Tagger {
  readonly format: AudioFormat = "flac";
  private _finalized = false;

  private constructor(
    readonly path: string,
    private readonly _file: FlacFile,
    private readonly _comments: VorbisComment,
    private readonly _coverDescription: string,
  ) { }

  /**
   * Reads the whole file and parses its metadata block chain. The first
   * VORBIS_COMMENT block, if any, seeds the comment map.
   */
  static async open(path: string, options: TaggerOptions = {}): Promise<FlacTagger> {
    try {
      const file = await FlacFile.parseFile(path);

      const block = file.findBlock(BlockType.VorbisComment);
      const comments = block ? VorbisComment.parse(block.data) : new VorbisComment(options.vendor ?? getConfigValue("vorbis-vendor"));

      if (!block) logger.logDebug(`No comment block in ${path}, starting an empty one`);

      const coverDescription = options.coverDescription ?? getConfigValue("cover-description");

      return new FlacTagger(path, file, comments, coverDescription);
    } catch (error) {
      logger.logError(`Failed to load FLAC metadata from ${path}`, error);
      throw error;
    }
  }

  async setCover(data: Uint8Array, mimeType: string): Promise<void> {
    try {
      const picture = await pictureFromImageData(FRONT_COVER_PICTURE_TYPE, this._coverDescription, data, mimeType);
      this._addPicture(picture);
    } catch (error) {
      logger.logWarn(`Cover rejected for ${this.path}`, error);
      throw error;
    }
  }

  async setCoverByUrl(url: string): Promise<void> {
    this._addPicture(pictureFromUrl(FRONT_COVER_PICTURE_TYPE, this._coverDescription, url));
  }

  setTitle(title: string): void {
    this._fillIfAbsent(VorbisField.Title, [title]);
  }

  setAlbum(album: string): void {
    this._fillIfAbsent(VorbisField.Album, [album]);
  }

  setArtist(artists: string[]): void {
    this._fillIfAbsent(VorbisField.Artist, artists);
  }

  /** Comments are not written to FLAC files; the call always succeeds. */
  setComment(_comment: string): void { }

  /**
   * Appends the comment map as a new VORBIS_COMMENT block and rewrites the
   * file. A comment block that was already in the file is left in place, so
   * the chain can end up with two.
   */
  async finalize(): Promise<void> {
    if (this._finalized) throw new IoError("Tagger has already been finalized", this.path);
    this._finalized = true;

    this._file.addBlock(this._comments.marshal());

    try {
      await this._file.save(this.path);
    } catch (error) {
      logger.logError(`Failed to save FLAC metadata to ${this.path}`, error);
      throw error;
    }

    logger.logDebug(`Wrote ${this._file.meta.length} metadata blocks to ${this.path}`);
  }

  private _fillIfAbsent(key: string, values: string[]): void {
    if (this._comments.get(key).length > 0) return;

    for (const value of values) {
      this._comments.add(key, value);
    }
  }

  private _addPicture(picture: FlacPicture): void {
    this._file.addBlock(marshalPicture(picture));
  }
}
