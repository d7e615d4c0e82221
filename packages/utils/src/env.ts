import { ConfigError } from "./errors.js";

export interface HarnessConfig {
  readonly deterministic: boolean;
  readonly timeStepMs: number;
  readonly seed: number;
  readonly browser: string;
  readonly browserVersion: string;
  readonly browserUserAgent?: string;
  readonly browserDpr: number;
  readonly headless: boolean;
  readonly logDir?: string;
  readonly resultsDir?: string;
  readonly toolProbes: readonly string[];
  readonly term: string;
  readonly colorterm: string;
  readonly noColor: string;
  readonly locale: string;
  readonly timezone: string;
}

type Env = Readonly<Record<string, string | undefined>>;

let cached: HarnessConfig | undefined;

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  const lowered = value.trim().toLowerCase();
  return lowered === "1" || lowered === "true";
}

function integer(name: string, value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function finite(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a finite number, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function optional(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

export function parseHarnessConfig(env: Env): HarnessConfig {
  return {
    deterministic: flag(env.E2E_DETERMINISTIC, true),
    timeStepMs: integer("E2E_TIME_STEP_MS", env.E2E_TIME_STEP_MS, 100),
    seed: integer("E2E_SEED", env.E2E_SEED, 0),
    browser: env.E2E_BROWSER ?? "node-ws",
    browserVersion: env.E2E_BROWSER_VERSION ?? "",
    browserUserAgent: optional(env.E2E_BROWSER_USER_AGENT),
    browserDpr: finite("E2E_BROWSER_DPR", env.E2E_BROWSER_DPR, 1),
    headless: flag(env.E2E_HEADLESS, true),
    logDir: optional(env.E2E_LOG_DIR),
    resultsDir: optional(env.E2E_RESULTS_DIR),
    toolProbes: (env.E2E_TOOL_PROBES ?? "")
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
    term: env.TERM ?? "",
    colorterm: env.COLORTERM ?? "",
    noColor: env.NO_COLOR ?? "",
    locale: env.LANG ?? "",
    timezone: env.TZ ?? "",
  };
}

// Read once per process; tests reset through resetHarnessConfigForTests.
export function readHarnessConfig(): HarnessConfig {
  if (cached === undefined) {
    cached = parseHarnessConfig(process.env);
  }
  return cached;
}

export function resetHarnessConfigForTests(): void {
  cached = undefined;
}
