import sharp from "sharp";
import { PictureEncodeError, TagParseError, describeError } from "../../errors";
import { concatBytes, decodeLatin1, decodeUtf8, encodeLatin1, encodeUtf8, uint32BE, viewOf } from "../../utils/bytes";
import { COVER_URL_MIME } from "../cover";
import { BlockType, MAX_BLOCK_LENGTH } from "./flacFile";
import type { MetadataBlock } from "./flacFile";

export interface FlacPicture {
  pictureType: number;
  mimeType: string;
  description: string;
  width: number;
  height: number;
  colorDepth: number;
  /** Colours in the palette for indexed images, otherwise 0. */
  indexedColors: number;
  data: Uint8Array;
}

// picture type, MIME length, description length, width, height, depth, colours, data length
const FIXED_FIELDS_LENGTH = 8 * 4;

const supportedFormats: Record<string, string> = {
  "image/jpeg": "jpeg",
  "image/png": "png",
};

function bitsPerSample(depth: string | undefined): number {
  return depth === "ushort" || depth === "short" ? 16 : 8;
}

function assertFits(picture: FlacPicture): void {
  const length = FIXED_FIELDS_LENGTH + picture.mimeType.length + encodeUtf8(picture.description).length + picture.data.length;

  if (length > MAX_BLOCK_LENGTH) {
    throw new PictureEncodeError(`Picture block would be ${length} bytes, the limit is ${MAX_BLOCK_LENGTH}`);
  }
}

/**
 * Builds a picture from encoded image bytes, probing dimensions and colour
 * depth. Only JPEG and PNG are accepted and the bytes must match the MIME type.
 */
export async function pictureFromImageData(pictureType: number, description: string, data: Uint8Array, mimeType: string): Promise<FlacPicture> {
  const expectedFormat = supportedFormats[mimeType.toLowerCase()];
  if (!expectedFormat) throw new PictureEncodeError(`Unsupported cover MIME type '${mimeType}'`);

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(data).metadata();
  } catch (error) {
    throw new PictureEncodeError(`Failed to decode ${mimeType} cover: ${describeError(error)}`, { cause: error });
  }

  if (metadata.format !== expectedFormat) {
    throw new PictureEncodeError(`Cover data is ${metadata.format ?? "unknown"}, not ${mimeType}`);
  }
  if (!metadata.width || !metadata.height) throw new PictureEncodeError("Cover dimensions could not be determined");

  const picture: FlacPicture = {
    pictureType,
    mimeType,
    description,
    width: metadata.width,
    height: metadata.height,
    colorDepth: (metadata.channels ?? 3) * bitsPerSample(metadata.depth),
    indexedColors: 0,
    data,
  };

  assertFits(picture);
  return picture;
}

/** A picture whose payload is the URL itself, flagged by {@link COVER_URL_MIME}. */
export function pictureFromUrl(pictureType: number, description: string, url: string): FlacPicture {
  const picture: FlacPicture = {
    pictureType,
    mimeType: COVER_URL_MIME,
    description,
    width: 0,
    height: 0,
    colorDepth: 0,
    indexedColors: 0,
    data: encodeUtf8(url),
  };

  assertFits(picture);
  return picture;
}

export function marshalPicture(picture: FlacPicture): MetadataBlock {
  const mime = encodeLatin1(picture.mimeType);
  const description = encodeUtf8(picture.description);

  return {
    type: BlockType.Picture,
    data: concatBytes([
      uint32BE(picture.pictureType),
      uint32BE(mime.length),
      mime,
      uint32BE(description.length),
      description,
      uint32BE(picture.width),
      uint32BE(picture.height),
      uint32BE(picture.colorDepth),
      uint32BE(picture.indexedColors),
      uint32BE(picture.data.length),
      picture.data,
    ]),
  };
}

export function parsePicture(block: MetadataBlock): FlacPicture {
  if (block.type !== BlockType.Picture) throw new TagParseError(`Block type ${block.type} is not a picture`);

  const data = block.data;
  const view = viewOf(data);
  let offset = 0;

  const readUint32 = (): number => {
    if (offset + 4 > data.length) throw new TagParseError("Picture block is truncated");

    const value = view.getUint32(offset, false);
    offset += 4;
    return value;
  };

  const readBytes = (length: number): Uint8Array => {
    if (offset + length > data.length) throw new TagParseError("Picture block is truncated");

    const bytes = data.subarray(offset, offset + length);
    offset += length;
    return bytes;
  };

  const pictureType = readUint32();
  const mimeType = decodeLatin1(readBytes(readUint32()));
  const description = decodeUtf8(readBytes(readUint32()));
  const width = readUint32();
  const height = readUint32();
  const colorDepth = readUint32();
  const indexedColors = readUint32();
  const pictureData = readBytes(readUint32());

  return { pictureType, mimeType, description, width, height, colorDepth, indexedColors, data: pictureData };
}
