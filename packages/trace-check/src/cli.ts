#!/usr/bin/env node
import { exit } from "node:process";

import { errorMessage } from "@termtrace/utils";

import { runPrintExamples } from "./commands/examples.js";
import { DEFAULT_URL, runScenario } from "./commands/run.js";
import type { RunDeps } from "./commands/run.js";
import { runValidateTrace } from "./commands/validate.js";
import { parseFlagArgs } from "./flags.js";
import { EXAMPLES_HELP, HELP_TEXT, RUN_HELP, VALIDATE_HELP } from "./help.js";

function printHelp(): void {
  process.stdout.write(`${HELP_TEXT}\n`);
}

function wantsHelp(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

export async function runValidate(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    process.stdout.write(VALIDATE_HELP);
    return 0;
  }
  try {
    const parsed = parseFlagArgs(args, ["--schema", "--registry", "--emit-registry"], ["--strict", "--warn"]);
    const [trace, ...extra] = parsed.positionals;
    if (!trace) {
      throw new Error("a trace path is required");
    }
    if (extra.length > 0) {
      throw new Error(`unexpected argument: ${extra[0]}`);
    }
    return await runValidateTrace({
      trace,
      schema: parsed.values["--schema"],
      registry: parsed.values["--registry"],
      emitRegistry: parsed.values["--emit-registry"],
      strict: parsed.toggles.has("--strict"),
    });
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n`);
    return 2;
  }
}

export async function runExamples(args: string[]): Promise<number> {
  if (wantsHelp(args)) {
    process.stdout.write(EXAMPLES_HELP);
    return 0;
  }
  try {
    const parsed = parseFlagArgs(args, ["--schema"]);
    if (parsed.positionals.length > 0) {
      throw new Error(`unexpected argument: ${parsed.positionals[0]}`);
    }
    return await runPrintExamples(parsed.values["--schema"]);
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n`);
    return 2;
  }
}

export async function runRun(args: string[], deps: RunDeps = {}): Promise<number> {
  if (wantsHelp(args)) {
    process.stdout.write(RUN_HELP);
    return 0;
  }
  try {
    const parsed = parseFlagArgs(
      args,
      ["--scenario", "--url", "--golden", "--jsonl", "--transcript"],
      ["--summary"],
    );
    if (parsed.positionals.length > 0) {
      throw new Error(`unexpected argument: ${parsed.positionals[0]}`);
    }
    const scenario = parsed.values["--scenario"];
    if (!scenario) {
      throw new Error("--scenario <path> is required");
    }
    return await runScenario(
      {
        scenario,
        url: parsed.values["--url"] ?? DEFAULT_URL,
        golden: parsed.values["--golden"],
        jsonl: parsed.values["--jsonl"],
        transcript: parsed.values["--transcript"],
        summary: parsed.toggles.has("--summary"),
      },
      deps,
    );
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n`);
    return 2;
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    printHelp();
    exit(0);
  }
  const command = args[0];
  const rest = args.slice(1);
  switch (command) {
    case "validate": {
      exit(await runValidate(rest));
      return;
    }
    case "examples": {
      exit(await runExamples(rest));
      return;
    }
    case "run": {
      exit(await runRun(rest));
      return;
    }
    default: {
      process.stderr.write(`unknown command: ${command}\n`);
      printHelp();
      exit(2);
    }
  }
}

if (!process.env.VITEST) {
  main().catch((error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    exit(2);
  });
}
