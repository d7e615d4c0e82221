import {
  decodeBase64Strict,
  isNonNegativeInteger,
  isPositiveInteger,
  isRecord,
  parseJson,
  toBytes,
} from "@termtrace/utils";
import type { JsonRecord } from "@termtrace/utils";
import type { FrameOverrides } from "@termtrace/session-recorder";

const STRING_FIELDS = ["hash_algo", "frame_hash", "patch_hash", "mode", "hash_key", "interaction_hash"] as const;

const COUNT_FIELDS = [
  "frame_idx",
  "ts_ms",
  "patch_bytes",
  "patch_cells",
  "patch_runs",
  "present_bytes",
  "hovered_link_id",
  "cursor_offset",
  "cursor_style",
  "selection_start",
  "selection_end",
] as const;

const TIMING_FIELDS = ["render_ms", "present_ms"] as const;

export interface DecodedFrame {
  data: Uint8Array;
  overrides: FrameOverrides;
}

/** Keeps only the known metadata fields whose values have the expected kind. */
export function extractFrameOverrides(raw: JsonRecord): FrameOverrides {
  const out: FrameOverrides = {};
  for (const key of STRING_FIELDS) {
    const value = raw[key];
    if (typeof value === "string") out[key] = value;
  }
  if (typeof raw.selection_active === "boolean") {
    out.selection_active = raw.selection_active;
  }
  for (const key of COUNT_FIELDS) {
    const value = raw[key];
    if (isNonNegativeInteger(value)) out[key] = value;
  }
  if (isPositiveInteger(raw.cols)) out.cols = raw.cols;
  if (isPositiveInteger(raw.rows)) out.rows = raw.rows;
  for (const key of TIMING_FIELDS) {
    const value = raw[key];
    if (typeof value === "number") out[key] = value;
  }
  return out;
}

function framePayload(frame: JsonRecord): Uint8Array | undefined {
  try {
    if (typeof frame.data_b64 === "string") return decodeBase64Strict(frame.data_b64);
    if (typeof frame.bytes_b64 === "string") return decodeBase64Strict(frame.bytes_b64);
  } catch {
    return undefined;
  }
  if (typeof frame.data === "string") return toBytes(frame.data);
  return undefined;
}

/**
 * Decodes a structured `frame` text message, optionally wrapped in a
 * `payload` object. Anything else yields undefined and is treated as raw output.
 */
export function decodeFrameMessage(text: string): DecodedFrame | undefined {
  const parsed = parseJson(text);
  if (!parsed.ok || !isRecord(parsed.value)) return undefined;

  const { payload } = parsed.value;
  const frame: JsonRecord = isRecord(payload) ? { ...parsed.value, ...payload } : { ...parsed.value };
  if (frame.type !== "frame") return undefined;

  const data = framePayload(frame);
  if (data === undefined) return undefined;
  return { data, overrides: extractFrameOverrides(frame) };
}
