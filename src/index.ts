export { createTagger, isSupportedFormat, SUPPORTED_FORMATS } from "./taggers/createTagger";
export type { AudioFormat, Tagger, TaggerOptions } from "./taggers/tagger";
export { Mp3Tagger, COMMENT_LANGUAGE } from "./taggers/mp3Tagger";
export { FlacTagger } from "./taggers/flacTagger";
export { COVER_URL_MIME, FRONT_COVER_PICTURE_TYPE, coverFromImage, coverFromUrl, decodeCover, encodeCover } from "./taggers/cover";
export type { Cover, CoverImage, CoverPayload, CoverUrl } from "./taggers/cover";
export { BlockType, FlacFile } from "./taggers/flac/flacFile";
export type { MetadataBlock } from "./taggers/flac/flacFile";
export { VorbisComment, VorbisField } from "./taggers/flac/vorbisComment";
export { parsePicture } from "./taggers/flac/flacPicture";
export type { FlacPicture } from "./taggers/flac/flacPicture";
export { IoError, PictureEncodeError, TagParseError, TaggerError, UnsupportedFormatError } from "./errors";
export type { TaggerErrorKind } from "./errors";
export { configKeys, getConfigValue, loadConfiguration } from "./settings/config";
export type { Config, ConfigKey, Id3Version } from "./settings/config";
export { Logger, LogLevel } from "./utils/logger";
