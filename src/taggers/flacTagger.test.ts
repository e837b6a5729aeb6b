import { chmod, lstat, readFile, rm, stat, symlink } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { IoError, PictureEncodeError, TagParseError } from "../errors";
import { FLAC_AUDIO, buildFlac, createTempDir, streamInfoBlock, vorbisCommentData } from "../testing/audioFixtures";
import type { TempDir } from "../testing/audioFixtures";
import { solidPng } from "../testing/images";
import { BlockType, FlacFile } from "./flac/flacFile";
import { parsePicture } from "./flac/flacPicture";
import { VorbisComment } from "./flac/vorbisComment";
import { FlacTagger } from "./flacTagger";

async function readFlac(path: string): Promise<FlacFile> {
  return FlacFile.parse(await readFile(path));
}

function commentBlocks(file: FlacFile): VorbisComment[] {
  return file.meta.filter(block => block.type === BlockType.VorbisComment).map(block => VorbisComment.parse(block.data));
}

describe("FlacTagger", () => {
  let dir: TempDir;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it("should keep the first title written to a file without comments", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    const tagger = await FlacTagger.open(path, { vendor: "test-vendor" });

    tagger.setTitle("First");
    tagger.setTitle("First");
    tagger.setTitle("Second");
    await tagger.finalize();

    const [comments] = commentBlocks(await readFlac(path));
    expect(comments.vendor).toBe("test-vendor");
    expect(comments.comments).toEqual(["TITLE=First"]);
  });

  it("should not replace an existing title and should append a second comment block", async () => {
    const path = await dir.file("song.flac", buildFlac([
      streamInfoBlock(),
      { type: BlockType.VorbisComment, data: vorbisCommentData("ref", ["TITLE=Original"]) },
    ]));
    const tagger = await FlacTagger.open(path);

    tagger.setTitle("New");
    tagger.setAlbum("Album");
    await tagger.finalize();

    const file = await readFlac(path);
    const blocks = commentBlocks(file);

    expect(file.meta.map(block => block.type)).toEqual([BlockType.StreamInfo, BlockType.VorbisComment, BlockType.VorbisComment]);
    expect(blocks[0].comments).toEqual(["TITLE=Original"]);
    expect(blocks[1].vendor).toBe("ref");
    expect(blocks[1].get("TITLE")).toEqual(["Original"]);
    expect(blocks[1].get("ALBUM")).toEqual(["Album"]);
  });

  it("should write artists in order and only once", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    const tagger = await FlacTagger.open(path);

    tagger.setArtist(["A", "B", "C"]);
    tagger.setArtist(["D"]);
    await tagger.finalize();

    const [comments] = commentBlocks(await readFlac(path));
    expect(comments.get("ARTIST")).toEqual(["A", "B", "C"]);
  });

  it("should treat an existing artist key in any case as present", async () => {
    const path = await dir.file("song.flac", buildFlac([
      streamInfoBlock(),
      { type: BlockType.VorbisComment, data: vorbisCommentData("ref", ["artist=Someone"]) },
    ]));
    const tagger = await FlacTagger.open(path);

    tagger.setArtist(["X"]);
    await tagger.finalize();

    const blocks = commentBlocks(await readFlac(path));
    expect(blocks[1].comments).toEqual(["artist=Someone"]);
  });

  it("should accept and discard comments", async () => {
    const path = await dir.file("song.flac", buildFlac([
      streamInfoBlock(),
      { type: BlockType.VorbisComment, data: vorbisCommentData("ref", ["TITLE=Song"]) },
    ]));
    const tagger = await FlacTagger.open(path);

    expect(() => tagger.setComment("hello")).not.toThrow();
    await tagger.finalize();

    const blocks = commentBlocks(await readFlac(path));
    expect(blocks[1].comments).toEqual(["TITLE=Song"]);
    expect(blocks[1].get("COMMENT")).toEqual([]);
  });

  it("should store a cover URL as a picture block with the sentinel MIME type", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    const tagger = await FlacTagger.open(path);

    await tagger.setCoverByUrl("https://x/y.jpg");
    await tagger.finalize();

    const file = await readFlac(path);
    expect(file.meta.map(block => block.type)).toEqual([BlockType.StreamInfo, BlockType.Picture, BlockType.VorbisComment]);

    const picture = parsePicture(file.meta[1]);
    expect(picture.pictureType).toBe(3);
    expect(picture.mimeType).toBe("-->");
    expect(picture.description).toBe("Front cover");
    expect(Buffer.from(picture.data).toString("utf8")).toBe("https://x/y.jpg");
    expect(commentBlocks(file)[0].comments).toEqual([]);
  });

  it("should keep every cover that is set", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    const tagger = await FlacTagger.open(path, { coverDescription: "Cover" });
    const image = await solidPng(4, 4);

    await tagger.setCover(image, "image/png");
    await tagger.setCover(image, "image/png");
    await tagger.finalize();

    const pictures = (await readFlac(path)).meta.filter(block => block.type === BlockType.Picture).map(parsePicture);
    expect(pictures).toHaveLength(2);
    expect(pictures.map(picture => [picture.mimeType, picture.description, picture.width, picture.height])).toEqual([
      ["image/png", "Cover", 4, 4],
      ["image/png", "Cover", 4, 4],
    ]);
    expect(Array.from(pictures[0].data)).toEqual(Array.from(image));
  });

  it("should reject a bad cover and stay usable", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    const tagger = await FlacTagger.open(path);

    await expect(tagger.setCover(Uint8Array.of(1, 2, 3), "image/png")).rejects.toBeInstanceOf(PictureEncodeError);
    tagger.setTitle("Title");
    await tagger.finalize();

    const file = await readFlac(path);
    expect(file.findBlock(BlockType.Picture)).toBeUndefined();
    expect(commentBlocks(file)[0].comments).toEqual(["TITLE=Title"]);
  });

  it("should propagate a malformed comment entry from a setter", async () => {
    const path = await dir.file("song.flac", buildFlac([
      streamInfoBlock(),
      { type: BlockType.VorbisComment, data: vorbisCommentData("ref", ["BROKEN"]) },
    ]));
    const tagger = await FlacTagger.open(path);

    expect(() => tagger.setTitle("Title")).toThrow(TagParseError);
    await tagger.finalize();
  });

  it("should keep the audio frames after the metadata", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    const tagger = await FlacTagger.open(path);

    tagger.setAlbum("Album");
    await tagger.finalize();

    expect(Array.from((await readFlac(path)).frames)).toEqual(Array.from(FLAC_AUDIO));
  });

  it("should fail to open a file that is not FLAC", async () => {
    const path = await dir.file("song.flac", Uint8Array.of(0x4f, 0x67, 0x67, 0x53, 0, 2));

    await expect(FlacTagger.open(path)).rejects.toBeInstanceOf(TagParseError);
  });

  it("should fail to open a file with a malformed comment block", async () => {
    const data = vorbisCommentData("ref", ["TITLE=Song"]);
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock(), { type: BlockType.VorbisComment, data: data.subarray(0, 5) }]));

    await expect(FlacTagger.open(path)).rejects.toBeInstanceOf(TagParseError);
  });

  it("should report a missing file as an I/O error", async () => {
    await expect(FlacTagger.open(`${dir.path}/missing.flac`)).rejects.toBeInstanceOf(IoError);
  });

  it("should report a failed save and refuse a second finalize", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    const tagger = await FlacTagger.open(path);

    await rm(dir.path, { recursive: true, force: true });

    await expect(tagger.finalize()).rejects.toBeInstanceOf(IoError);
    await expect(tagger.finalize()).rejects.toThrow("Tagger has already been finalized");
  });

  it("should keep the permissions of the file", async () => {
    const path = await dir.file("song.flac", buildFlac([streamInfoBlock()]));
    await chmod(path, 0o600);
    const tagger = await FlacTagger.open(path);

    tagger.setTitle("Title");
    await tagger.finalize();

    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });

  it("should tag the target of a symlink and leave the link in place", async () => {
    const target = await dir.file("real.flac", buildFlac([streamInfoBlock()]));
    const link = join(dir.path, "link.flac");
    await symlink(target, link);
    const tagger = await FlacTagger.open(link);

    tagger.setTitle("Linked");
    await tagger.finalize();

    expect((await lstat(link)).isSymbolicLink()).toBe(true);
    const [comments] = commentBlocks(await readFlac(target));
    expect(comments.get("TITLE")).toEqual(["Linked"]);
  });
});
