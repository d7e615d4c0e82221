const encoder = new TextEncoder();
const decoder = new TextDecoder();

const HEX_PAIR = /^[0-9a-fA-F]{2}$/;
const BASE64_ALPHABET = /^[A-Za-z0-9+/]*={0,2}$/;

export function toBytes(data: Uint8Array | string): Uint8Array {
  return typeof data === "string" ? encoder.encode(data) : data;
}

export function bytesToText(data: Uint8Array): string {
  return decoder.decode(data);
}

export function concatBytes(chunks: ReadonlyArray<Uint8Array>): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.byteLength;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

/**
 * Decodes a hex string. Whitespace between byte pairs is ignored; anything
 * else that is not a hex pair throws.
 */
export function decodeHex(input: string): Uint8Array {
  const compact = input.replace(/\s+/g, "");
  if (compact.length % 2 !== 0) {
    throw new Error(`invalid hex: odd length ${compact.length}`);
  }
  const out = new Uint8Array(compact.length / 2);
  for (let index = 0; index < out.length; index += 1) {
    const pair = compact.slice(index * 2, index * 2 + 2);
    if (!HEX_PAIR.test(pair)) {
      throw new Error(`invalid hex: non-hex digit at position ${index * 2}`);
    }
    out[index] = Number.parseInt(pair, 16);
  }
  return out;
}

/** Decodes base64 text, rejecting characters outside the alphabet and bad padding. */
export function decodeBase64Strict(input: string): Uint8Array {
  if (input.length % 4 !== 0 || !BASE64_ALPHABET.test(input)) {
    throw new Error("invalid base64 payload");
  }
  return new Uint8Array(Buffer.from(input, "base64"));
}

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("base64");
}
