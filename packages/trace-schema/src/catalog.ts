import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { Ajv } from "ajv";
import { CodedError, errorMessage } from "@termtrace/utils";

import { oneOf, primitive } from "./kinds.js";
import { PRIMITIVE_KINDS } from "./types.js";
import type { EventSchema, PrimitiveKind, Schema, TypeConstraint } from "./types.js";

export const BUNDLED_SCHEMA_PATH = fileURLToPath(
  new URL("../schemas/e2e-jsonl-v1.json", import.meta.url),
);

export class SchemaLoadError extends CodedError {
  constructor(message: string) {
    super("E_SCHEMA_LOAD", message);
  }
}

type ConstraintDocument = PrimitiveKind | PrimitiveKind[];

interface EventSchemaDocument {
  required?: string[];
  types?: Record<string, ConstraintDocument>;
}

interface SchemaDocument {
  schema_version: string;
  common_required: string[];
  common_types: Record<string, ConstraintDocument>;
  events: Record<string, EventSchemaDocument>;
}

const kindDescriptor = { type: "string", enum: [...PRIMITIVE_KINDS] };

const constraintDescriptor = {
  anyOf: [kindDescriptor, { type: "array", items: kindDescriptor, minItems: 1 }],
};

const typesDescriptor = {
  type: "object",
  additionalProperties: constraintDescriptor,
};

const schemaDocumentDescriptor = {
  type: "object",
  required: ["schema_version", "common_required", "common_types", "events"],
  properties: {
    schema_version: { type: "string" },
    common_required: { type: "array", items: { type: "string" } },
    common_types: typesDescriptor,
    events: {
      type: "object",
      additionalProperties: {
        type: "object",
        properties: {
          required: { type: "array", items: { type: "string" } },
          types: typesDescriptor,
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSchemaDocument = ajv.compile<SchemaDocument>(schemaDocumentDescriptor);

function toConstraint(document: ConstraintDocument): TypeConstraint {
  return typeof document === "string" ? primitive(document) : oneOf(document);
}

function toTypeMap(types: Record<string, ConstraintDocument> | undefined): ReadonlyMap<string, TypeConstraint> {
  const map = new Map<string, TypeConstraint>();
  for (const [field, constraint] of Object.entries(types ?? {})) {
    map.set(field, toConstraint(constraint));
  }
  return map;
}

/** Builds an immutable catalog from a decoded schema document. */
export function parseSchema(document: unknown): Schema {
  if (!validateSchemaDocument(document)) {
    throw new SchemaLoadError(
      `invalid schema document: ${ajv.errorsText(validateSchemaDocument.errors, { dataVar: "schema" })}`,
    );
  }
  const events = new Map<string, EventSchema>();
  for (const [type, eventDocument] of Object.entries(document.events)) {
    events.set(
      type,
      Object.freeze({
        required: new Set(eventDocument.required ?? []),
        types: toTypeMap(eventDocument.types),
      }),
    );
  }
  return Object.freeze({
    version: document.schema_version,
    commonRequired: new Set(document.common_required),
    commonTypes: toTypeMap(document.common_types),
    events,
  });
}

export async function loadSchema(path: string): Promise<Schema> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new SchemaLoadError(`unable to read schema ${path}: ${errorMessage(error)}`);
  }
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new SchemaLoadError(`schema ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseSchema(document);
}

export function loadBundledSchema(): Promise<Schema> {
  return loadSchema(BUNDLED_SCHEMA_PATH);
}

export function eventSchemaFor(schema: Schema, type: string): EventSchema | undefined {
  return schema.events.get(type);
}

export function requiredFieldsFor(schema: Schema, eventSchema: EventSchema): ReadonlySet<string> {
  return new Set([...schema.commonRequired, ...eventSchema.required]);
}

/** Common constraints overlaid with the event's own; the event's entries win. */
export function typesFor(schema: Schema, eventSchema: EventSchema): ReadonlyMap<string, TypeConstraint> {
  const merged = new Map(schema.commonTypes);
  for (const [field, constraint] of eventSchema.types) {
    merged.set(field, constraint);
  }
  return merged;
}
