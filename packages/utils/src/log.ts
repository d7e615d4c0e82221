export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface Logger {
  error(message: string, detail?: unknown): void;
  warn(message: string, detail?: unknown): void;
  info(message: string, detail?: unknown): void;
  debug(message: string, detail?: unknown): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const lowered = (value ?? "").trim().toLowerCase();
  if (lowered === "error" || lowered === "warn" || lowered === "info" || lowered === "debug") {
    return lowered;
  }
  return "warn";
}

function formatDetail(detail: unknown): string {
  if (detail === undefined) return "";
  if (detail instanceof Error) return ` ${detail.message}`;
  if (typeof detail === "string") return ` ${detail}`;
  return ` ${JSON.stringify(detail)}`;
}

/** Scoped stderr logger; the threshold comes from TERMTRACE_LOG unless given. */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVELS[options.level ?? parseLogLevel(process.env.TERMTRACE_LOG)];
  const write = options.write ?? ((line: string) => {
    process.stderr.write(line);
  });
  const log = (level: LogLevel) => (message: string, detail?: unknown) => {
    if (LEVELS[level] > threshold) return;
    write(`[${scope}] ${level}: ${message}${formatDetail(detail)}\n`);
  };
  return {
    error: log("error"),
    warn: log("warn"),
    info: log("info"),
    debug: log("debug"),
  };
}
