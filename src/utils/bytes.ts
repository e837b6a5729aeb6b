export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const totalLength = chunks.reduce((acc, cur) => acc + cur.byteLength, 0);

  const merged = new Uint8Array(totalLength);

  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);

    offset += chunk.byteLength;
  }

  return merged;
}

export function uint32BE(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value, false);
  return bytes;
}

export function uint32LE(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value, true);
  return bytes;
}

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Encodes to ISO-8859-1; characters above U+00FF become "?". */
export function encodeLatin1(input: string): Uint8Array {
  const bytes = new Uint8Array(input.length);

  for (let i = 0; i < input.length; i++) {
    const code = input.charCodeAt(i);
    bytes[i] = code > 0xff ? 0x3f : code;
  }

  return bytes;
}

export function decodeLatin1(bytes: Uint8Array): string {
  let result = "";

  for (let i = 0; i < bytes.length; i++) {
    result += String.fromCharCode(bytes[i]);
  }

  return result;
}

export function encodeUtf8(input: string): Uint8Array {
  return new TextEncoder().encode(input);
}

export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder("utf-8").decode(bytes);
}
