import iconv from 'iconv-lite';

/** Decodes bytes in `charset`, substituting U+FFFD for sequences that do not decode. */
export function decodeBytes(bytes: Uint8Array, charset: string): string {
  return iconv.decode(toBuffer(bytes), charset, { stripBOM: false });
}

export function encodeText(text: string, charset: string): Buffer {
  return iconv.encode(text, charset);
}

export function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
