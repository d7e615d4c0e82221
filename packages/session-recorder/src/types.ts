import type { HistogramSummary } from "./histogram.js";

export const TRACE_SCHEMA_VERSION = "e2e-jsonl-v1";

export type EventFields = Record<string, unknown>;

export interface TraceEvent extends EventFields {
  schema_version: string;
  type: string;
  timestamp: string;
  run_id: string;
  seed: number;
}

/** Frame metadata supplied by a structured frame message; overrides computed fields. */
export interface FrameOverrides {
  hash_algo?: string;
  frame_hash?: string;
  patch_hash?: string;
  mode?: string;
  hash_key?: string;
  interaction_hash?: string;
  selection_active?: boolean;
  frame_idx?: number;
  ts_ms?: number;
  cols?: number;
  rows?: number;
  patch_bytes?: number;
  patch_cells?: number;
  patch_runs?: number;
  present_bytes?: number;
  hovered_link_id?: number;
  cursor_offset?: number;
  cursor_style?: number;
  selection_start?: number;
  selection_end?: number;
  render_ms?: number;
  present_ms?: number;
}

export interface SessionSummary {
  scenario: string;
  ws_in_bytes: number;
  ws_out_bytes: number;
  messages_tx: number;
  messages_rx: number;
  frames: number;
  output_sha256: string;
  checksum_chain: string;
  frame_gap_histogram_ms: HistogramSummary;
}
