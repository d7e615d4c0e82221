import { computeHashKey, isPassStatus } from "./hashKey.js";
import { contextValue, typedEvents } from "./lines.js";
import { RegistryConflictError } from "./errors.js";
import { DEFAULT_REGISTRY_FIELDS } from "./types.js";
import type { HashRegistryEntry, RegistryFieldTable } from "./types.js";

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function compareEntries(left: HashRegistryEntry, right: HashRegistryEntry): number {
  const leftKey = [left.eventType, left.hashKey, left.case ?? "", left.step ?? "", left.field];
  const rightKey = [right.eventType, right.hashKey, right.case ?? "", right.step ?? "", right.field];
  for (let i = 0; i < leftKey.length; i++) {
    if (leftKey[i] < rightKey[i]) return -1;
    if (leftKey[i] > rightKey[i]) return 1;
  }
  return 0;
}

/**
 * Collects registry entries from the passing hash-bearing events of a trace.
 * Throws {@link RegistryConflictError} when two events disagree on a slot.
 */
export function deriveRegistryEntries(
  lines: Iterable<string>,
  fields: RegistryFieldTable = DEFAULT_REGISTRY_FIELDS,
): HashRegistryEntry[] {
  const entries = new Map<string, HashRegistryEntry>();
  for (const { line, event, type } of typedEvents(lines)) {
    if (!Object.hasOwn(fields, type)) continue;
    const hashFields = fields[type];
    if (hashFields.length === 0) continue;
    if (!isPassStatus(event.status)) continue;
    const hashKey = computeHashKey(event);
    if (hashKey === undefined) continue;

    const eventCase = optionalString(event.case);
    const eventStep = optionalString(event.step);
    for (const field of hashFields) {
      const value = event[field];
      if (typeof value !== "string" || value === "") continue;
      const slot = JSON.stringify([type, hashKey, field, eventCase ?? null, eventStep ?? null]);
      const existing = entries.get(slot);
      if (existing && existing.value !== value) {
        throw new RegistryConflictError(
          `conflicting registry values for ${type} ${hashKey} case=${contextValue(eventCase)} ` +
            `step=${contextValue(eventStep)} field=${field}: ${existing.value} vs ${value} (line ${line})`,
          line,
        );
      }
      entries.set(slot, {
        eventType: type,
        hashKey,
        field,
        value,
        ...(eventCase === undefined ? {} : { case: eventCase }),
        ...(eventStep === undefined ? {} : { step: eventStep }),
      });
    }
  }
  return [...entries.values()].sort(compareEntries);
}
