import * as os from "node:os";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import {
  createLogger,
  encodeBase64,
  errorMessage,
  prefixedSha256,
  readHarnessConfig,
  toBytes,
} from "@termtrace/utils";
import type { HarnessConfig, Logger } from "@termtrace/utils";
import { FRAME_MODE, systemClock } from "@termtrace/session-recorder";
import type { Clock, SessionRecorder, SessionSummary } from "@termtrace/session-recorder";

import { decodeFrameMessage } from "./frames.js";
import { GOLDEN_ASSERTION, compareGolden } from "./golden.js";
import { probeEnvironment } from "./probe.js";
import type { EnvironmentProbe } from "./probe.js";
import { decodeStepData } from "./scenario.js";
import type { ResizeStep, Scenario, ScenarioStep, SendStep } from "./scenario.js";
import { connectWebSocket } from "./transport.js";
import type { SessionSocket, SocketConnector, SocketMessage } from "./transport.js";

export const DEFAULT_WAIT_MS = 100;
export const DRAIN_MS = 500;
export const SETTLE_MS = 300;

export type Sleep = (ms: number) => Promise<void>;

export interface SessionOptions {
  url: string;
  scenario: Scenario;
  recorder: SessionRecorder;
  goldenPath?: string;
  /** Where the trace is written; its directory is reported as `log_dir`. */
  jsonlPath?: string;
  connect?: SocketConnector;
  sleep?: Sleep;
  clock?: Clock;
  config?: HarnessConfig;
  probe?: () => Promise<EnvironmentProbe>;
  logger?: Logger;
}

export type SessionOutcome = "pass" | "fail";

export interface SessionResult extends SessionSummary {
  outcome: SessionOutcome;
  errors: string[];
}

const defaultSleep: Sleep = (ms) => delay(ms);

type ReaderOutcome = { ok: true } | { ok: false; error: unknown };

/** Records every inbound message until the peer closes or `signal` aborts. */
async function readLoop(socket: SessionSocket, recorder: SessionRecorder, signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    let message: SocketMessage | undefined;
    try {
      message = await socket.receive(signal);
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    }
    if (message === undefined) return;

    recorder.recordReceive();
    if (message.kind === "binary") {
      recorder.recordOutput(message.data);
      continue;
    }
    const frame = decodeFrameMessage(message.text);
    if (frame) {
      recorder.recordOutput(frame.data, frame.overrides);
    } else {
      recorder.recordOutput(toBytes(message.text));
    }
  }
}

function geometryFields(recorder: SessionRecorder, cols = recorder.cols, rows = recorder.rows) {
  return { mode: FRAME_MODE, hash_key: recorder.hashKey(cols, rows), cols, rows };
}

async function runSend(socket: SessionSocket, recorder: SessionRecorder, step: SendStep): Promise<void> {
  const data = decodeStepData(step);
  await socket.send(data);
  recorder.recordSend(data);
  recorder.emit("input", {
    input_type: step.input_type ?? "keys",
    encoding: "base64",
    bytes_b64: encodeBase64(data),
    input_hash: prefixedSha256(data),
    details: step.comment ?? "",
    ...geometryFields(recorder),
  });
}

async function runResize(socket: SessionSocket, recorder: SessionRecorder, step: ResizeStep): Promise<void> {
  const message = JSON.stringify({ type: "resize", cols: step.cols, rows: step.rows });
  const bytes = toBytes(message);
  await socket.send(message);
  recorder.recordSend(bytes);
  recorder.setGeometry(step.cols, step.rows);
  recorder.emit("input", {
    input_type: "resize",
    encoding: "json",
    input_hash: prefixedSha256(bytes),
    details: step.comment ?? "",
    ...geometryFields(recorder, step.cols, step.rows),
  });
}

async function runStep(
  socket: SessionSocket,
  recorder: SessionRecorder,
  step: ScenarioStep,
  sleep: Sleep,
): Promise<void> {
  switch (step.type) {
    case "send":
      return runSend(socket, recorder, step);
    case "resize":
      return runResize(socket, recorder, step);
    case "wait":
      return sleep(step.ms ?? DEFAULT_WAIT_MS);
    case "drain":
      return sleep(DRAIN_MS);
  }
}

function emitPreamble(options: SessionOptions, config: HarnessConfig, probe: EnvironmentProbe): void {
  const { recorder, scenario, url } = options;
  const logDir = options.jsonlPath ? path.dirname(path.resolve(options.jsonlPath)) : config.logDir ?? "";

  recorder.emit("env", {
    ...probe,
    deterministic: config.deterministic,
    term: config.term,
    colorterm: config.colorterm,
    no_color: config.noColor,
    scenario: scenario.name,
    initial_cols: scenario.initial_cols,
    initial_rows: scenario.initial_rows,
  });
  recorder.emit("browser_env", {
    browser: config.browser,
    browser_version: config.browserVersion,
    user_agent: config.browserUserAgent ?? `ws node/${process.versions.node}`,
    dpr: config.browserDpr,
    platform: os.type(),
    locale: config.locale,
    timezone: config.timezone,
    headless: config.headless,
  });
  recorder.emit("run_start", {
    command: `trace-check run --url ${url} --scenario ${scenario.name}`,
    log_dir: logDir,
    results_dir: config.resultsDir ?? logDir,
    scenario: scenario.name,
    step_count: scenario.steps.length,
    timeout_s: scenario.timeout_s,
  });
}

/**
 * Drives one scripted session: the step script runs on this task while a
 * reader task folds inbound messages into the recorder. The socket is closed
 * on every path; the recorder is left open for the caller to close.
 */
export async function runSession(options: SessionOptions): Promise<SessionResult> {
  const { recorder, scenario, url } = options;
  const config = options.config ?? readHarnessConfig();
  const sleep = options.sleep ?? defaultSleep;
  const clock = options.clock ?? systemClock;
  const connect = options.connect ?? ((target: string) => connectWebSocket(target));
  const log = options.logger ?? createLogger("driver");
  const runStarted = clock.now();

  const probe = await (options.probe ?? (() => probeEnvironment(config.toolProbes)))();
  emitPreamble(options, config, probe);

  let outcome: SessionOutcome = "pass";
  const errors: string[] = [];

  try {
    const socket = await connect(url);
    log.info("connected", { url });
    const controller = new AbortController();
    const reader = readLoop(socket, recorder, controller.signal).then(
      (): ReaderOutcome => ({ ok: true }),
      (error: unknown): ReaderOutcome => ({ ok: false, error }),
    );
    let completed = false;
    let readerOutcome: ReaderOutcome = { ok: true };
    try {
      for (const [index, step] of scenario.steps.entries()) {
        const stepName = `${String(index).padStart(3, "0")}:${step.type}`;
        recorder.emit("step_start", { step: stepName, ...geometryFields(recorder) });
        const stepStarted = clock.now();

        const delayMs = step.delay_ms ?? 0;
        if (delayMs > 0) await sleep(delayMs);
        await runStep(socket, recorder, step, sleep);

        recorder.emit("step_end", {
          step: stepName,
          status: "passed",
          duration_ms: Math.trunc(clock.now() - stepStarted),
          ...geometryFields(recorder),
        });
      }
      await sleep(SETTLE_MS);
      completed = true;
    } finally {
      controller.abort();
      readerOutcome = await reader;
      await socket.close();
      if (!completed && !readerOutcome.ok) {
        log.warn("reader stopped with an error", readerOutcome.error);
      }
    }
    if (!readerOutcome.ok) throw readerOutcome.error;
  } catch (error) {
    const message = errorMessage(error);
    outcome = "fail";
    errors.push(message);
    recorder.emit("error", { message });
    log.error("session failed", message);
  }

  const summary = recorder.summary();

  if (options.goldenPath) {
    try {
      const golden = await compareGolden(options.goldenPath, summary);
      if (golden.status === "failed") {
        outcome = "fail";
        errors.push(golden.error);
      }
      if (golden.status !== "skipped") {
        recorder.emit("assert", { assertion: GOLDEN_ASSERTION, status: golden.status, details: golden.details });
      }
    } catch (error) {
      const message = `golden ${options.goldenPath}: ${errorMessage(error)}`;
      outcome = "fail";
      errors.push(message);
      recorder.emit("error", { message });
    }
  }

  recorder.emit("ws_metrics", {
    label: scenario.name,
    ws_url: url,
    bytes_tx: summary.ws_in_bytes,
    bytes_rx: summary.ws_out_bytes,
    messages_tx: summary.messages_tx,
    messages_rx: summary.messages_rx,
    latency_histogram_ms: summary.frame_gap_histogram_ms,
  });

  recorder.emit("run_end", {
    status: outcome === "pass" ? "passed" : "failed",
    duration_ms: Math.trunc(clock.now() - runStarted),
    failed_count: errors.length,
    outcome,
    ws_in_bytes: summary.ws_in_bytes,
    ws_out_bytes: summary.ws_out_bytes,
    frames: summary.frames,
    output_sha256: summary.output_sha256,
    checksum_chain: summary.checksum_chain,
  });

  return { outcome, errors, ...summary };
}
