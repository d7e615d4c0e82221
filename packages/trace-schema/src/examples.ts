import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { isRecord } from "@termtrace/utils";
import type { JsonRecord } from "@termtrace/utils";

const EXAMPLES_PATH = fileURLToPath(new URL("../fixtures/example-events.json", import.meta.url));

let cached: ReadonlyMap<string, JsonRecord> | undefined;

function loadFixtures(): ReadonlyMap<string, JsonRecord> {
  if (cached) return cached;
  const document: unknown = JSON.parse(readFileSync(EXAMPLES_PATH, "utf8"));
  if (!isRecord(document)) {
    throw new Error(`example fixtures at ${EXAMPLES_PATH} must be an object`);
  }
  const map = new Map<string, JsonRecord>();
  for (const [type, example] of Object.entries(document)) {
    if (!isRecord(example)) {
      throw new Error(`example for ${type} must be an object`);
    }
    map.set(type, example);
  }
  cached = map;
  return map;
}

/** One canonical event per known type, stamped with the given schema version. */
export function exampleEvents(version: string): JsonRecord[] {
  return [...loadFixtures().values()].map((example) => ({
    schema_version: version,
    ...example,
  }));
}

export function formatExampleLines(events: readonly JsonRecord[]): string {
  return events.map((event) => `${JSON.stringify(event)}\n`).join("");
}
