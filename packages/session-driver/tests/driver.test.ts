import { writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";
import { ZERO_CHAIN, encodeBase64, parseHarnessConfig, prefixedSha256, sha256Hex, toBytes, withTmpDir } from "@termtrace/utils";
import type { Logger } from "@termtrace/utils";
import { SessionRecorder, createMemorySink } from "@termtrace/session-recorder";
import type { Clock, MemorySink } from "@termtrace/session-recorder";
import { loadBundledSchema, validateTrace } from "@termtrace/trace-schema";

import { parseScenario, runSession } from "../src/index.js";
import type { Scenario, SessionOptions, SessionSocket, SocketMessage } from "../src/index.js";
import { FakeSocket, tick } from "./fakeSocket.js";

const fixedClock: Clock = { now: () => 0, wallTime: () => new Date(0) };

const silent: Logger = { error: () => {}, warn: () => {}, info: () => {}, debug: () => {} };

const probe = async () => ({
  host: "test-host",
  node: "v20.0.0",
  tool_versions: {},
  git_commit: "abc1234",
  git_dirty: false,
});

const scenario: Scenario = parseScenario({
  name: "echo",
  initial_cols: 80,
  initial_rows: 24,
  steps: [
    { type: "send", data: "ls\n", delay_ms: 5, comment: "list" },
    { type: "resize", cols: 100, rows: 30 },
    { type: "wait", ms: 10 },
    { type: "drain" },
  ],
});

const echo = (data: Uint8Array | string): SocketMessage[] => {
  if (typeof data !== "string") return [{ kind: "binary", data }];
  return [{ kind: "text", text: JSON.stringify({ type: "frame", data_b64: encodeBase64(toBytes("resized")) }) }];
};

interface Harness {
  sink: MemorySink;
  recorder: SessionRecorder;
  sleeps: number[];
  options: SessionOptions;
}

function harness(socket: SessionSocket | Error, overrides: Partial<SessionOptions> = {}): Harness {
  const sink = createMemorySink();
  const recorder = new SessionRecorder({
    runId: "remote-00000000",
    scenario: scenario.name,
    initialCols: scenario.initial_cols,
    initialRows: scenario.initial_rows,
    seed: 0,
    deterministic: true,
    timeStepMs: 100,
    clock: fixedClock,
    sink,
  });
  const sleeps: number[] = [];
  const options: SessionOptions = {
    url: "ws://127.0.0.1:9231",
    scenario,
    recorder,
    connect: async () => {
      if (socket instanceof Error) throw socket;
      return socket;
    },
    sleep: async (ms) => {
      sleeps.push(ms);
      await tick();
    },
    clock: fixedClock,
    config: parseHarnessConfig({}),
    probe,
    logger: silent,
    ...overrides,
  };
  return { sink, recorder, sleeps, options };
}

function nonFrameTypes(recorder: SessionRecorder): string[] {
  return recorder.events.filter((event) => event.type !== "frame").map((event) => event.type);
}

describe("session driver", () => {
  it("runs the script and folds replies into the chain", async () => {
    const socket = new FakeSocket(echo);
    const { recorder, sleeps, options } = harness(socket);
    const result = await runSession(options);

    const chain = sha256Hex(sha256Hex(ZERO_CHAIN + sha256Hex("ls\n")) + sha256Hex("resized"));
    expect(result).toMatchObject({
      outcome: "pass",
      errors: [],
      scenario: "echo",
      frames: 2,
      messages_tx: 2,
      messages_rx: 2,
      ws_in_bytes: 3 + 38,
      ws_out_bytes: 3 + 7,
      checksum_chain: `sha256:${chain}`,
      output_sha256: `sha256:${sha256Hex("ls\nresized")}`,
    });
    expect(sleeps).toEqual([5, 10, 500, 300]);
    expect(socket.closeCalls).toBe(1);
    expect(socket.sent[1]).toBe('{"type":"resize","cols":100,"rows":30}');
    expect(nonFrameTypes(recorder)).toEqual([
      "env",
      "browser_env",
      "run_start",
      "step_start",
      "input",
      "step_end",
      "step_start",
      "input",
      "step_end",
      "step_start",
      "step_end",
      "step_start",
      "step_end",
      "ws_metrics",
      "run_end",
    ]);
  });

  it("describes inputs with the geometry in effect", async () => {
    const { recorder, options } = harness(new FakeSocket());
    await runSession(options);
    const inputs = recorder.events.filter((event) => event.type === "input");
    expect(inputs[0]).toMatchObject({
      input_type: "keys",
      encoding: "base64",
      bytes_b64: "bHMK",
      input_hash: prefixedSha256("ls\n"),
      details: "list",
      mode: "remote",
      hash_key: "remote-80x24-seed0",
      cols: 80,
      rows: 24,
    });
    expect(inputs[1]).toMatchObject({
      input_type: "resize",
      encoding: "json",
      input_hash: prefixedSha256('{"type":"resize","cols":100,"rows":30}'),
      hash_key: "remote-100x30-seed0",
    });
    const steps = recorder.events.filter((event) => event.type === "step_start").map((event) => event.step);
    expect(steps).toEqual(["000:send", "001:resize", "002:wait", "003:drain"]);
  });

  it("writes a trace that satisfies the bundled schema", async () => {
    const { sink, options } = harness(new FakeSocket(echo));
    await runSession(options);
    const schema = await loadBundledSchema();
    expect(validateTrace(schema, sink.lines)).toEqual([]);
  });

  it("adopts geometry announced by structured frames", async () => {
    const socket = new FakeSocket();
    socket.push({
      kind: "text",
      text: JSON.stringify({ type: "event", payload: { type: "frame", data: "x", cols: 90, rows: 20 } }),
    });
    const { recorder, options } = harness(socket, {
      scenario: parseScenario({ name: "idle", initial_cols: 80, initial_rows: 24, steps: [{ type: "drain" }] }),
    });
    const result = await runSession(options);
    expect(result.outcome).toBe("pass");
    expect(recorder.hashKey()).toBe("remote-90x20-seed0");
  });

  it("records undecodable text as raw output", async () => {
    const socket = new FakeSocket();
    socket.push({ kind: "text", text: '{"type":"frame","data_b64":"%%%"}' });
    const { options } = harness(socket, { scenario: parseScenario({ name: "raw", steps: [] }) });
    const result = await runSession(options);
    expect(result.ws_out_bytes).toBe('{"type":"frame","data_b64":"%%%"}'.length);
    expect(result.output_sha256).toBe(prefixedSha256('{"type":"frame","data_b64":"%%%"}'));
  });

  it("fails the run and still closes the socket when a step throws", async () => {
    const socket = new FakeSocket(() => [], new Error("send failed"));
    const { recorder, options } = harness(socket);
    const result = await runSession(options);
    expect(result.outcome).toBe("fail");
    expect(result.errors).toEqual(["send failed"]);
    expect(socket.closeCalls).toBe(1);
    const error = recorder.events.find((event) => event.type === "error");
    expect(error?.message).toBe("send failed");
    const end = recorder.events[recorder.events.length - 1];
    expect(end).toMatchObject({ type: "run_end", status: "failed", outcome: "fail", failed_count: 1 });
  });

  it("fails the run when the connection cannot be opened", async () => {
    const { recorder, options } = harness(new Error("connect ECONNREFUSED"));
    const result = await runSession(options);
    expect(result.outcome).toBe("fail");
    expect(result.errors).toEqual(["connect ECONNREFUSED"]);
    expect(nonFrameTypes(recorder)).toEqual(["env", "browser_env", "run_start", "error", "ws_metrics", "run_end"]);
  });

  it("surfaces reader failures but not its cancellation", async () => {
    const socket = new FakeSocket();
    socket.fail(new Error("connection reset"));
    const { options } = harness(socket);
    const result = await runSession(options);
    expect(result.errors).toEqual(["connection reset"]);

    const quiet = harness(new FakeSocket());
    expect((await runSession(quiet.options)).outcome).toBe("pass");
  });

  it("stops reading quietly when the peer hangs up", async () => {
    const socket = new FakeSocket();
    socket.push({ kind: "binary", data: toBytes("bye") });
    socket.hangUp();
    const { options } = harness(socket);
    const result = await runSession(options);
    expect(result.outcome).toBe("pass");
    expect(result.frames).toBe(1);
  });
});

describe("golden comparison in a run", () => {
  it("passes when the golden chain matches", async () => {
    await withTmpDir("termtrace-golden-", async (dir) => {
      const golden = path.join(dir, "golden.json");
      const expected = `sha256:${sha256Hex(ZERO_CHAIN + sha256Hex("ls\n"))}`;
      await writeFile(golden, JSON.stringify({ checksum_chain: expected, frames: 1 }), "utf-8");
      const { recorder, options } = harness(new FakeSocket((data) => (typeof data === "string" ? [] : [{ kind: "binary", data }])), {
        goldenPath: golden,
      });
      const result = await runSession(options);
      expect(result.outcome).toBe("pass");
      const assertion = recorder.events.find((event) => event.type === "assert");
      expect(assertion).toMatchObject({
        assertion: "golden_checksum_chain",
        status: "passed",
        details: `checksum=${expected} frames=1`,
      });
    });
  });

  it("fails with both chains when the golden differs", async () => {
    await withTmpDir("termtrace-golden-", async (dir) => {
      const golden = path.join(dir, "golden.json");
      await writeFile(golden, JSON.stringify({ checksum_chain: "sha256:other", frames: 4 }), "utf-8");
      const { recorder, options } = harness(new FakeSocket(), { goldenPath: golden });
      const result = await runSession(options);
      const actual = `sha256:${ZERO_CHAIN}`;
      expect(result.outcome).toBe("fail");
      expect(result.errors).toEqual([`Golden checksum mismatch: expected sha256:other, got ${actual}`]);
      const assertion = recorder.events.find((event) => event.type === "assert");
      expect(assertion?.details).toBe(`expected=sha256:other actual=${actual} frames_expected=4 frames_actual=0`);
    });
  });

  it("fails when the golden chain is not a string", async () => {
    await withTmpDir("termtrace-golden-", async (dir) => {
      const golden = path.join(dir, "golden.json");
      await writeFile(golden, JSON.stringify({ checksum_chain: 123, frames: 0 }), "utf-8");
      const { recorder, options } = harness(new FakeSocket(), { goldenPath: golden });
      const result = await runSession(options);
      const actual = `sha256:${ZERO_CHAIN}`;
      expect(result.outcome).toBe("fail");
      expect(result.errors).toEqual([`Golden checksum mismatch: expected 123, got ${actual}`]);
      const assertion = recorder.events.find((event) => event.type === "assert");
      expect(assertion?.status).toBe("failed");
    });
  });

  it("skips the comparison when the golden file is absent", async () => {
    await withTmpDir("termtrace-golden-", async (dir) => {
      const { recorder, options } = harness(new FakeSocket(), { goldenPath: path.join(dir, "missing.json") });
      const result = await runSession(options);
      expect(result.outcome).toBe("pass");
      expect(recorder.events.some((event) => event.type === "assert")).toBe(false);
    });
  });
});
