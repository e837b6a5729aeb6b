import { UnsupportedFormatError } from "../errors";
import { FlacTagger } from "./flacTagger";
import { Mp3Tagger } from "./mp3Tagger";
import type { AudioFormat, Tagger, TaggerOptions } from "./tagger";

export const SUPPORTED_FORMATS: readonly AudioFormat[] = ["mp3", "flac"];

export function isSupportedFormat(format: string): boolean {
  const normalized = format.toLowerCase();
  return SUPPORTED_FORMATS.some(supported => supported === normalized);
}

/**
 * Opens a tagging session for `path`. The format name is matched
 * case-insensitively; an unknown name is rejected before the file is touched.
 */
export async function createTagger(path: string, format: string, options: TaggerOptions = {}): Promise<Tagger> {
  switch (format.toLowerCase()) {
    case "mp3":
      return Mp3Tagger.open(path, options);
    case "flac":
      return FlacTagger.open(path, options);
    default:
      throw new UnsupportedFormatError(format);
  }
}
