export interface Clock {
  /** Monotonic milliseconds; only differences are meaningful. */
  now(): number;
  wallTime(): Date;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  wallTime: () => new Date(),
};

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/** Local time as `YYYY-MM-DDTHH:MM:SS±HHMM`. */
export function formatWallClock(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";
  const absolute = Math.abs(offset);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `${sign}${pad(Math.floor(absolute / 60))}${pad(absolute % 60)}`
  );
}

export function deterministicTimestamp(eventIndex: number, stepMs: number): string {
  return `T${pad(eventIndex * stepMs, 6)}`;
}

export function makeRunId(seed: number, deterministic: boolean, nowMs: number = Date.now()): string {
  if (deterministic) {
    return `remote-${seed.toString(16).padStart(8, "0")}`;
  }
  return `remote-${Math.floor(nowMs).toString(16)}`;
}
