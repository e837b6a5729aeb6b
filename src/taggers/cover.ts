import { decodeUtf8, encodeUtf8 } from "../utils/bytes";

/**
 * MIME value marking a picture entry whose payload is a URL string instead of
 * image data. Readers that understand the convention fetch the image from it.
 */
export const COVER_URL_MIME = "-->";

/** ID3 APIC and FLAC PICTURE both number the front cover 3. */
export const FRONT_COVER_PICTURE_TYPE = 3;

export interface CoverImage {
  kind: "image";
  data: Uint8Array;
  mimeType: string;
}

export interface CoverUrl {
  kind: "url";
  url: string;
}

export type Cover = CoverImage | CoverUrl;

export interface CoverPayload {
  mimeType: string;
  data: Uint8Array;
}

export function coverFromImage(data: Uint8Array, mimeType: string): CoverImage {
  return { kind: "image", data, mimeType };
}

export function coverFromUrl(url: string): CoverUrl {
  return { kind: "url", url };
}

/** Maps a cover to the MIME type and payload a picture entry carries. */
export function encodeCover(cover: Cover): CoverPayload {
  switch (cover.kind) {
    case "image":
      return { mimeType: cover.mimeType, data: cover.data };
    case "url":
      return { mimeType: COVER_URL_MIME, data: encodeUtf8(cover.url) };
  }
}

/** Inverse of {@link encodeCover}: a sentinel MIME type yields a URL cover. */
export function decodeCover(payload: CoverPayload): Cover {
  if (payload.mimeType === COVER_URL_MIME) return coverFromUrl(decodeUtf8(payload.data));

  return coverFromImage(payload.data, payload.mimeType);
}
