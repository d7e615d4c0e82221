import { isRecord, parseJsonLossless, stringifyJson } from "@termtrace/utils";
import type { JsonRecord } from "@termtrace/utils";

export interface TraceEvent {
  line: number;
  event: JsonRecord;
  type: string;
}

/**
 * Yields the object lines of a trace that carry a string `type`. Blank lines,
 * unparsable lines and non-objects are skipped; schema validation reports those.
 * Numbers are decoded losslessly.
 */
export function* typedEvents(lines: Iterable<string>): Generator<TraceEvent> {
  let line = 0;
  for (const raw of lines) {
    line += 1;
    const stripped = raw.trim();
    if (stripped === "") continue;
    const parsed = parseJsonLossless(stripped);
    if (!parsed.ok || !isRecord(parsed.value)) continue;
    const type = parsed.value.type;
    if (typeof type !== "string") continue;
    yield { line, event: parsed.value, type };
  }
}

/** Renders a context value the way it appears in registry messages. */
export function contextValue(value: unknown): string {
  if (value === undefined || value === null) return "null";
  if (typeof value === "string") return value;
  return stringifyJson(value);
}
