const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * RFC 3986 percent-encoding. OSS expects `~` left as is and the sub-delims
 * `!'()*` escaped, which `encodeURIComponent` does not do on its own.
 *
 * @param input - Raw string to encode.
 * @param keepSlash - Leave `/` unescaped (object keys).
 */
export function uriEncode(input: string, keepSlash = false): string {
  const encoded = encodeURIComponent(input).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return keepSlash ? encoded.replace(/%2F/g, "/") : encoded;
}

export function toBytes(value: string | Uint8Array): Uint8Array {
  return typeof value === "string" ? encoder.encode(value) : value;
}

export function toText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Joins byte chunks into one contiguous array.
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  if (chunks.length === 1 && chunks[0]) return chunks[0];
  let total = 0;
  for (const chunk of chunks) total += chunk.byteLength;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}
