export { deterministicTimestamp, formatWallClock, makeRunId, systemClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { histogramSummary, percentile } from "./histogram.js";
export type { HistogramSummary } from "./histogram.js";
export { FRAME_MODE, SessionRecorder } from "./recorder.js";
export type { SessionRecorderOptions } from "./recorder.js";
export { createMemorySink, openJsonlSink } from "./sink.js";
export type { MemorySink, Sink } from "./sink.js";
export { TRACE_SCHEMA_VERSION } from "./types.js";
export type { EventFields, FrameOverrides, SessionSummary, TraceEvent } from "./types.js";
