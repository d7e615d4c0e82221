import { frameHashKey } from "@termtrace/hash-registry";
import { ZERO_CHAIN, concatBytes, isPositiveInteger, readHarnessConfig, sha256Hex } from "@termtrace/utils";

import { deterministicTimestamp, formatWallClock, systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { histogramSummary, round3 } from "./histogram.js";
import type { Sink } from "./sink.js";
import { TRACE_SCHEMA_VERSION } from "./types.js";
import type { EventFields, FrameOverrides, SessionSummary, TraceEvent } from "./types.js";

export const FRAME_MODE = "remote";

export interface SessionRecorderOptions {
  runId: string;
  scenario: string;
  initialCols: number;
  initialRows: number;
  sink?: Sink;
  clock?: Clock;
  seed?: number;
  deterministic?: boolean;
  timeStepMs?: number;
  schemaVersion?: string;
}

/**
 * Owns the trace of one run: the event log, byte and message counters, the
 * current geometry and the rolling checksum chain over received output.
 */
export class SessionRecorder {
  readonly runId: string;
  readonly scenario: string;
  readonly seed: number;

  private readonly sink: Sink | undefined;
  private readonly clock: Clock;
  private readonly deterministic: boolean;
  private readonly timeStepMs: number;
  private readonly schemaVersion: string;
  private readonly startedAt: number;

  private readonly log: TraceEvent[] = [];
  private readonly outputChunks: Uint8Array[] = [];
  private readonly frameGapsMs: number[] = [];
  private chain = ZERO_CHAIN;
  private frameIdx = 0;
  private eventIdx = 0;
  private lastFrameAt: number;
  private wsInBytes = 0;
  private wsOutBytes = 0;
  private messagesTx = 0;
  private messagesRx = 0;
  private currentCols: number;
  private currentRows: number;
  private sinkOpen: boolean;

  constructor(options: SessionRecorderOptions) {
    const needsConfig =
      options.seed === undefined || options.deterministic === undefined || options.timeStepMs === undefined;
    const config = needsConfig ? readHarnessConfig() : undefined;

    this.runId = options.runId;
    this.scenario = options.scenario;
    this.seed = options.seed ?? config?.seed ?? 0;
    this.deterministic = options.deterministic ?? config?.deterministic ?? true;
    this.timeStepMs = options.timeStepMs ?? config?.timeStepMs ?? 100;
    this.schemaVersion = options.schemaVersion ?? TRACE_SCHEMA_VERSION;
    this.sink = options.sink;
    this.sinkOpen = options.sink !== undefined;
    this.clock = options.clock ?? systemClock;
    this.currentCols = options.initialCols;
    this.currentRows = options.initialRows;
    this.startedAt = this.clock.now();
    this.lastFrameAt = this.startedAt;
  }

  get events(): readonly TraceEvent[] {
    return this.log;
  }

  get cols(): number {
    return this.currentCols;
  }

  get rows(): number {
    return this.currentRows;
  }

  emit(type: string, fields: EventFields = {}): TraceEvent {
    const event: TraceEvent = {
      schema_version: this.schemaVersion,
      type,
      timestamp: this.timestamp(),
      run_id: this.runId,
      seed: this.seed,
      ...fields,
    };
    this.log.push(event);
    if (this.sink && this.sinkOpen) {
      this.sink.write(event);
    }
    this.eventIdx += 1;
    return event;
  }

  /** Folds one output chunk into the checksum chain and emits its `frame` event. */
  recordOutput(data: Uint8Array, overrides?: FrameOverrides): TraceEvent {
    const now = this.clock.now();
    const gapMs = now - this.lastFrameAt;
    this.lastFrameAt = now;
    if (this.frameIdx > 0) {
      this.frameGapsMs.push(gapMs);
    }

    this.outputChunks.push(data);
    this.wsOutBytes += data.byteLength;
    const chunkHash = sha256Hex(data);
    this.chain = sha256Hex(this.chain + chunkHash);
    this.frameIdx += 1;

    const fields: EventFields = {
      frame_idx: this.frameIdx,
      hash_algo: "sha256",
      frame_hash: `sha256:${chunkHash}`,
      ts_ms: Math.trunc(now - this.startedAt),
      mode: FRAME_MODE,
      hash_key: this.hashKey(),
      cols: this.currentCols,
      rows: this.currentRows,
      patch_hash: `sha256:${chunkHash}`,
      patch_bytes: data.byteLength,
      // Byte-stream proxies; cell and run counts are not visible at this layer.
      patch_cells: data.byteLength,
      patch_runs: 1,
      present_ms: round3(gapMs),
      present_bytes: data.byteLength,
      checksum_chain: `sha256:${this.chain}`,
    };
    if (overrides) {
      Object.assign(fields, overrides);
      if (isPositiveInteger(overrides.cols) && isPositiveInteger(overrides.rows)) {
        this.setGeometry(overrides.cols, overrides.rows);
      }
    }
    return this.emit("frame", fields);
  }

  recordSend(data: Uint8Array): void {
    this.wsInBytes += data.byteLength;
    this.messagesTx += 1;
  }

  recordReceive(): void {
    this.messagesRx += 1;
  }

  setGeometry(cols: number, rows: number): void {
    this.currentCols = cols;
    this.currentRows = rows;
  }

  hashKey(cols: number = this.currentCols, rows: number = this.currentRows): string {
    return frameHashKey(FRAME_MODE, cols, rows, this.seed);
  }

  fullOutput(): Uint8Array {
    return concatBytes(this.outputChunks);
  }

  finalChecksum(): string {
    return this.chain;
  }

  summary(): SessionSummary {
    return {
      scenario: this.scenario,
      ws_in_bytes: this.wsInBytes,
      ws_out_bytes: this.wsOutBytes,
      messages_tx: this.messagesTx,
      messages_rx: this.messagesRx,
      frames: this.frameIdx,
      output_sha256: `sha256:${sha256Hex(this.fullOutput())}`,
      checksum_chain: `sha256:${this.chain}`,
      frame_gap_histogram_ms: histogramSummary(this.frameGapsMs),
    };
  }

  /** Releases the sink; later calls do nothing. */
  close(): void {
    if (this.sink && this.sinkOpen) {
      this.sinkOpen = false;
      this.sink.close();
    }
  }

  private timestamp(): string {
    if (this.deterministic) {
      return deterministicTimestamp(this.eventIdx, this.timeStepMs);
    }
    return formatWallClock(this.clock.wallTime());
  }
}
