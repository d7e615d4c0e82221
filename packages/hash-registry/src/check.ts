import type { JsonRecord } from "@termtrace/utils";

import { computeHashKey, eventMode, isPassStatus } from "./hashKey.js";
import { contextValue, typedEvents } from "./lines.js";
import type { HashRegistry, HashRegistryEntry, RegistryFailure } from "./types.js";

function indexKey(eventType: string, hashKey: string): string {
  return JSON.stringify([eventType, hashKey]);
}

function describeContext(event: JsonRecord): string {
  return [
    `mode=${contextValue(eventMode(event))}`,
    `cols=${contextValue(event.cols)}`,
    `rows=${contextValue(event.rows)}`,
    `seed=${contextValue(event.seed)}`,
    `case=${contextValue(event.case)}`,
    `step=${contextValue(event.step)}`,
    `screen=${contextValue(event.screen)}`,
  ].join(" ");
}

function appliesTo(entry: HashRegistryEntry, event: JsonRecord): boolean {
  if (entry.case !== undefined && entry.case !== event.case) return false;
  if (entry.step !== undefined && entry.step !== event.step) return false;
  return true;
}

/**
 * Compares every passing event with a resolvable hash key against the
 * registry entries for its `(type, hash key)` pair.
 */
export function checkAgainstRegistry(registry: HashRegistry, lines: Iterable<string>): RegistryFailure[] {
  const index = new Map<string, HashRegistryEntry[]>();
  for (const entry of registry.entries) {
    const key = indexKey(entry.eventType, entry.hashKey);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(entry);
    } else {
      index.set(key, [entry]);
    }
  }

  const failures: RegistryFailure[] = [];
  for (const { line, event, type } of typedEvents(lines)) {
    if (!isPassStatus(event.status)) continue;
    const hashKey = computeHashKey(event);
    if (hashKey === undefined) continue;
    const entries = index.get(indexKey(type, hashKey));
    if (!entries) continue;

    const context = describeContext(event);
    for (const entry of entries) {
      if (!appliesTo(entry, event)) continue;
      if (!Object.hasOwn(event, entry.field)) {
        failures.push({
          line,
          message: `missing hash field ${entry.field} for ${type} ${hashKey} ${context}`,
        });
        continue;
      }
      const actual = event[entry.field];
      if (typeof actual !== "string") {
        failures.push({
          line,
          message: `hash field ${entry.field} for ${type} ${hashKey} ${context} is not a string`,
        });
        continue;
      }
      if (actual !== entry.value) {
        failures.push({
          line,
          message: `hash mismatch ${type} ${hashKey} ${context} field=${entry.field} expected=${entry.value} got=${actual}`,
        });
      }
    }
  }
  return failures;
}
