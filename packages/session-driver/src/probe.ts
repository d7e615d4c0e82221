import { execFile } from "node:child_process";
import { hostname } from "node:os";
import { promisify } from "node:util";

import { createLogger, errorMessage } from "@termtrace/utils";

const execFileAsync = promisify(execFile);
const log = createLogger("probe");

const PROBE_TIMEOUT_MS = 5_000;

export interface EnvironmentProbe {
  host: string;
  node: string;
  tool_versions: Record<string, string>;
  git_commit: string;
  git_dirty: boolean;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<string>;

const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, [...args], { timeout: PROBE_TIMEOUT_MS });
  return stdout;
};

async function firstLine(run: CommandRunner, command: string, args: readonly string[]): Promise<string> {
  try {
    const line = (await run(command, args)).trim().split(/\r?\n/)[0];
    return line === undefined || line === "" ? "unknown" : line;
  } catch (error) {
    log.debug(`${command} ${args.join(" ")} failed`, errorMessage(error));
    return "unknown";
  }
}

async function gitDirty(run: CommandRunner): Promise<boolean> {
  try {
    return (await run("git", ["status", "--porcelain"])).trim() !== "";
  } catch (error) {
    log.debug("git status failed", errorMessage(error));
    return false;
  }
}

/** Best-effort host facts; a probe that fails reports "unknown" instead of throwing. */
export async function probeEnvironment(
  tools: readonly string[],
  run: CommandRunner = runCommand,
): Promise<EnvironmentProbe> {
  const tool_versions: Record<string, string> = {};
  for (const tool of tools) {
    tool_versions[tool] = await firstLine(run, tool, ["--version"]);
  }
  return {
    host: hostname(),
    node: process.version,
    tool_versions,
    git_commit: await firstLine(run, "git", ["rev-parse", "--short", "HEAD"]),
    git_dirty: await gitDirty(run),
  };
}
