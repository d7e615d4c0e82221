import { loadScenario, runSession, saveTranscript } from "@termtrace/session-driver";
import type { SessionOptions } from "@termtrace/session-driver";
import { SessionRecorder, makeRunId, openJsonlSink } from "@termtrace/session-recorder";
import { readHarnessConfig } from "@termtrace/utils";

export const DEFAULT_URL = "ws://127.0.0.1:9231";

export type RunArgs = {
  scenario: string;
  url: string;
  golden?: string;
  jsonl?: string;
  transcript?: string;
  summary: boolean;
};

/** Seams the tests replace; production uses the real socket, sleep and probe. */
export type RunDeps = Pick<SessionOptions, "connect" | "sleep" | "probe" | "clock" | "logger">;

export async function runScenario(args: RunArgs, deps: RunDeps = {}): Promise<number> {
  const config = readHarnessConfig();
  const scenario = await loadScenario(args.scenario);
  const recorder = new SessionRecorder({
    runId: makeRunId(config.seed, config.deterministic),
    scenario: scenario.name,
    initialCols: scenario.initial_cols,
    initialRows: scenario.initial_rows,
    seed: config.seed,
    deterministic: config.deterministic,
    timeStepMs: config.timeStepMs,
    ...(args.jsonl ? { sink: openJsonlSink(args.jsonl) } : {}),
    ...(deps.clock ? { clock: deps.clock } : {}),
  });

  const result = await runSession({
    url: args.url,
    scenario,
    recorder,
    config,
    ...(args.golden ? { goldenPath: args.golden } : {}),
    ...(args.jsonl && args.jsonl !== "-" ? { jsonlPath: args.jsonl } : {}),
    ...deps,
  }).finally(() => recorder.close());

  if (args.transcript) {
    await saveTranscript(args.transcript, recorder.fullOutput());
  }
  if (args.summary || !args.jsonl) {
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  }
  return result.outcome === "pass" ? 0 : 1;
}
