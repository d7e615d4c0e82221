import { isRecord, parseJsonLossless } from "@termtrace/utils";
import type { JsonRecord } from "@termtrace/utils";

import { eventSchemaFor, requiredFieldsFor, typesFor } from "./catalog.js";
import { describeConstraint, runtimeKind, typeMatches } from "./kinds.js";
import type { Schema, ValidationFailure } from "./types.js";

export function validateEvent(schema: Schema, event: JsonRecord): string[] {
  const errors: string[] = [];

  const type = event.type;
  if (typeof type !== "string") {
    errors.push("type must be a string");
    return errors;
  }

  const eventSchema = eventSchemaFor(schema, type);
  if (!eventSchema) {
    errors.push(`unknown event type: ${type}`);
    return errors;
  }

  for (const field of requiredFieldsFor(schema, eventSchema)) {
    if (!Object.hasOwn(event, field)) {
      errors.push(`missing required field: ${field}`);
    }
  }

  const version = event.schema_version;
  if (version !== undefined && version !== null && version !== schema.version) {
    errors.push(
      `schema_version mismatch: expected ${schema.version}, got ${String(version)}`,
    );
  }

  for (const [field, constraint] of typesFor(schema, eventSchema)) {
    if (!Object.hasOwn(event, field)) continue;
    const value = event[field];
    if (!typeMatches(value, constraint)) {
      errors.push(
        `field ${field} has wrong type: expected ${describeConstraint(constraint)}, got ${runtimeKind(value)}`,
      );
    }
  }

  return errors;
}

export function validateLine(schema: Schema, rawLine: string): string[] {
  const stripped = rawLine.trim();
  if (stripped === "") return [];
  const parsed = parseJsonLossless(stripped);
  if (!parsed.ok) {
    return [`invalid json: ${parsed.message}`];
  }
  if (!isRecord(parsed.value)) {
    return ["jsonl line must be an object"];
  }
  return validateEvent(schema, parsed.value);
}

export function validateTrace(schema: Schema, lines: Iterable<string>): ValidationFailure[] {
  const failures: ValidationFailure[] = [];
  let line = 0;
  for (const raw of lines) {
    line += 1;
    for (const message of validateLine(schema, raw)) {
      failures.push({ line, message });
    }
  }
  return failures;
}
