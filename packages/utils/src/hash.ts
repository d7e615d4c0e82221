import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";

import { toBytes } from "./bytes.js";

export const ZERO_CHAIN = "0".repeat(64);

export function sha256Hex(data: Uint8Array | string): string {
  return bytesToHex(sha256(toBytes(data)));
}

export function prefixedSha256(data: Uint8Array | string): string {
  return `sha256:${sha256Hex(data)}`;
}
