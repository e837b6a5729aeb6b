import { stat } from "fs/promises";
import {
  ByteVector,
  File,
  Id3v2AttachmentFrame,
  Id3v2CommentsFrame,
  Id3v2FrameClassType,
  Id3v2FrameIdentifiers,
  Id3v2Tag,
  Id3v2TextInformationFrame,
  Picture,
  PictureType,
  ReadStyle,
  StringType,
  TagTypes,
} from "node-taglib-sharp";
import { IoError, PictureEncodeError, TagParseError, describeError } from "../errors";
import { getConfigValue } from "../settings/config";
import { Logger, LogLevel } from "../utils/logger";
import { coverFromImage, coverFromUrl, encodeCover } from "./cover";
import type { Cover } from "./cover";
import type { AudioFormat, Tagger, TaggerOptions } from "./tagger";

const logger = Logger.create("Mp3Tagger", LogLevel.Debug);

/** Language code written with comment frames. */
export const COMMENT_LANGUAGE = "XXX";

export class Mp3Tagger implements Tagger {
  readonly format: AudioFormat = "mp3";
  private _finalized = false;

  private constructor(
    readonly path: string,
    private readonly _file: File,
    private readonly _tag: Id3v2Tag,
    private readonly _coverDescription: string,
  ) { }

  /**
   * Opens the file and reads its ID3v2 tag, starting an empty tag when the
   * file has none. The file stays open until {@link finalize}.
   */
  static async open(path: string, options: TaggerOptions = {}): Promise<Mp3Tagger> {
    try {
      await stat(path);
    } catch (error) {
      throw new IoError(`Failed to open file: ${describeError(error)}`, path, { cause: error });
    }

    let file: File;
    try {
      file = File.createFromPath(path, "taglib/mp3", ReadStyle.None);
    } catch (error) {
      logger.logError(`Failed to load ID3 tag from ${path}`, error);
      throw new TagParseError(`Failed to parse ID3 tag: ${describeError(error)}`, { cause: error });
    }

    try {
      if (file.isPossiblyCorrupt) {
        throw new TagParseError(`Failed to parse ID3 tag: ${file.corruptionReasons.join("; ")}`);
      }

      const hadTag = (file.tagTypesOnDisk & TagTypes.Id3v2) !== 0;
      const tag = file.getTag(TagTypes.Id3v2, true);
      if (!(tag instanceof Id3v2Tag)) throw new TagParseError("File does not carry an ID3v2 tag");

      if (!hadTag) {
        tag.version = options.id3Version ?? getConfigValue("id3-version");
        logger.logDebug(`No ID3 tag in ${path}, starting an empty ID3v2.${tag.version} tag`);
      }

      const coverDescription = options.coverDescription ?? getConfigValue("cover-description");

      return new Mp3Tagger(path, file, tag, coverDescription);
    } catch (error) {
      file.dispose();
      throw error;
    }
  }

  async setCover(data: Uint8Array, mimeType: string): Promise<void> {
    if (!data || data.byteLength < 1) throw new PictureEncodeError("Invalid value for cover image data");
    if (!mimeType) throw new PictureEncodeError("Invalid value for cover MIME type");

    this._addPicture(coverFromImage(data, mimeType));
  }

  async setCoverByUrl(url: string): Promise<void> {
    if (!url) throw new PictureEncodeError("Invalid value for cover URL");

    this._addPicture(coverFromUrl(url));
  }

  setTitle(title: string): void {
    if (!this._tag.title) this._tag.title = title;
  }

  setAlbum(album: string): void {
    if (!this._tag.album) this._tag.album = album;
  }

  setArtist(artists: string[]): void {
    const existing = this._tag.getFramesByIdentifier<Id3v2TextInformationFrame>(
      Id3v2FrameClassType.TextInformationFrame,
      Id3v2FrameIdentifiers.TPE1,
    );
    if (existing.length > 0) return;

    // one TPE1 frame per artist
    for (const artist of artists) {
      const frame = Id3v2TextInformationFrame.fromIdentifier(Id3v2FrameIdentifiers.TPE1);
      frame.text = [artist];
      this._tag.addFrame(frame);
    }
  }

  setComment(comment: string): void {
    const existing = this._tag.getFramesByIdentifier<Id3v2CommentsFrame>(
      Id3v2FrameClassType.CommentsFrame,
      Id3v2FrameIdentifiers.COMM,
    );
    if (existing.length > 0) return;

    const frame = Id3v2CommentsFrame.fromDescription("", COMMENT_LANGUAGE, StringType.Latin1);
    frame.text = comment;
    this._tag.addFrame(frame);
  }

  /**
   * Writes the tag back into the file in place and releases it. The file is
   * released even when writing fails; the first failure is the one reported.
   */
  async finalize(): Promise<void> {
    if (this._finalized) throw new IoError("Tagger has already been finalized", this.path);
    this._finalized = true;

    let saved = false;
    try {
      this._save();
      saved = true;
    } finally {
      this._release(saved);
    }
  }

  private _save(): void {
    try {
      this._file.save();
      logger.logDebug(`Wrote ${this._tag.frames.length} ID3 frames to ${this.path}`);
    } catch (error) {
      logger.logError(`Failed to save ID3 tag to ${this.path}`, error);
      throw new IoError(`Failed to save tag: ${describeError(error)}`, this.path, { cause: error });
    }
  }

  private _release(reportFailure: boolean): void {
    try {
      this._file.dispose();
    } catch (error) {
      if (reportFailure) {
        throw new IoError(`Failed to close file: ${describeError(error)}`, this.path, { cause: error });
      }
      // the save error is already on its way to the caller
      logger.logWarn(`Failed to close ${this.path} after a failed save`, error);
    }
  }

  private _addPicture(cover: Cover): void {
    const { mimeType, data } = encodeCover(cover);

    const picture = Picture.fromData(ByteVector.fromByteArray(data));
    picture.mimeType = mimeType;
    picture.type = PictureType.FrontCover;
    picture.description = this._coverDescription;

    const frame = Id3v2AttachmentFrame.fromPicture(picture);
    frame.textEncoding = StringType.Latin1;
    this._tag.addFrame(frame);
  }
}
