import { jsonIntegerText, jsonNumberValue } from "@termtrace/utils";
import type { JsonRecord } from "@termtrace/utils";

const PASS_STATUSES = new Set(["pass", "passed", "success"]);

// Integers keep every digit; an integral float such as 1.0 or 1e21 prints as an integer.
function seedText(seed: unknown): string | undefined {
  if (typeof seed === "string") return seed === "" ? undefined : seed;
  const exact = jsonIntegerText(seed);
  if (exact !== undefined) return exact;
  const value = jsonNumberValue(seed);
  return value !== undefined && Number.isInteger(value) ? BigInt(value).toString() : undefined;
}

function geometryText(value: unknown): string | undefined {
  const text = jsonIntegerText(value);
  return text === undefined || text.startsWith("-") ? undefined : text;
}

/** `mode`, falling back to `screen_mode` when `mode` is absent or null. */
export function eventMode(event: JsonRecord): unknown {
  const mode = event.mode;
  return mode === undefined || mode === null ? event.screen_mode : mode;
}

/**
 * Resolves the registry key of an event. A non-empty string `hash_key` wins;
 * otherwise the key is `{mode}-{cols}x{rows}-seed{seed}`, or undefined when
 * any component is unusable.
 */
export function computeHashKey(event: JsonRecord): string | undefined {
  const explicit = event.hash_key;
  if (typeof explicit === "string" && explicit !== "") return explicit;

  const mode = eventMode(event);
  if (typeof mode !== "string") return undefined;
  const cols = geometryText(event.cols);
  const rows = geometryText(event.rows);
  if (cols === undefined || rows === undefined) return undefined;
  const seed = seedText(event.seed);
  if (seed === undefined) return undefined;
  return `${mode}-${cols}x${rows}-seed${seed}`;
}

export function frameHashKey(mode: string, cols: number, rows: number, seed: number): string {
  return `${mode}-${cols}x${rows}-seed${seed}`;
}

// Absent and non-string statuses count as pass.
export function isPassStatus(status: unknown): boolean {
  if (typeof status !== "string") return true;
  return PASS_STATUSES.has(status.toLowerCase());
}
