import { readFile, writeFile } from "fs/promises";
import { IoError, TagParseError, describeError } from "../../errors";
import { concatBytes, decodeLatin1, encodeLatin1 } from "../../utils/bytes";
import { Logger, LogLevel } from "../../utils/logger";

const FLAC_MARKER = "fLaC";
// last-block flag(1 bit) + type(7 bits) + length(24 bits)
const BLOCK_HEADER_LENGTH = 4;
export const MAX_BLOCK_LENGTH = 0xffffff;

export enum BlockType {
  StreamInfo = 0,
  Padding = 1,
  Application = 2,
  SeekTable = 3,
  VorbisComment = 4,
  CueSheet = 5,
  Picture = 6,
}

export interface MetadataBlock {
  type: number;
  data: Uint8Array;
}

const logger = Logger.create("FlacFile", LogLevel.Debug);

/**
 * A FLAC file split into its metadata block chain and the audio frames that
 * follow it. Frames are carried through untouched.
 */
export class FlacFile {
  constructor(public meta: MetadataBlock[], public frames: Uint8Array) { }

  static parse(bytes: Uint8Array): FlacFile {
    if (bytes.length < FLAC_MARKER.length || decodeLatin1(bytes.subarray(0, 4)) !== FLAC_MARKER) {
      throw new TagParseError("Missing fLaC stream marker");
    }

    const meta: MetadataBlock[] = [];
    let offset = FLAC_MARKER.length;
    let isLast = false;

    while (!isLast) {
      if (offset + BLOCK_HEADER_LENGTH > bytes.length) throw new TagParseError(`Metadata block header at offset ${offset} is truncated`);

      isLast = (bytes[offset] & 0x80) !== 0;
      const type = bytes[offset] & 0x7f;
      const length = (bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3];

      if (type === 127) throw new TagParseError(`Invalid metadata block type at offset ${offset}`);

      const dataStart = offset + BLOCK_HEADER_LENGTH;
      const dataEnd = dataStart + length;
      if (dataEnd > bytes.length) throw new TagParseError(`Metadata block of type ${type} overruns the file`);

      meta.push({ type, data: bytes.slice(dataStart, dataEnd) });
      offset = dataEnd;
    }

    if (meta[0].type !== BlockType.StreamInfo) throw new TagParseError("First metadata block is not STREAMINFO");

    logger.logDebug(`Parsed ${meta.length} metadata blocks, ${bytes.length - offset} bytes of audio frames`);

    return new FlacFile(meta, bytes.slice(offset));
  }

  static async parseFile(path: string): Promise<FlacFile> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new IoError(`Failed to read file: ${describeError(error)}`, path, { cause: error });
    }

    return FlacFile.parse(bytes);
  }

  findBlock(type: BlockType): MetadataBlock | undefined {
    return this.meta.find(block => block.type === type);
  }

  addBlock(block: MetadataBlock): void {
    this.meta.push(block);
  }

  marshal(): Uint8Array {
    const chunks: Uint8Array[] = [encodeLatin1(FLAC_MARKER)];

    this.meta.forEach((block, index) => {
      if (block.data.length > MAX_BLOCK_LENGTH) {
        throw new RangeError(`Metadata block of type ${block.type} is ${block.data.length} bytes, the limit is ${MAX_BLOCK_LENGTH}`);
      }

      const isLast = index === this.meta.length - 1;
      const length = block.data.length;

      chunks.push(Uint8Array.of((isLast ? 0x80 : 0) | block.type, (length >> 16) & 0xff, (length >> 8) & 0xff, length & 0xff));
      chunks.push(block.data);
    });

    chunks.push(this.frames);

    return concatBytes(chunks);
  }

  async save(path: string): Promise<void> {
    try {
      await writeFile(path, this.marshal());
    } catch (error) {
      throw new IoError(`Failed to write file: ${describeError(error)}`, path, { cause: error });
    }
  }
}
