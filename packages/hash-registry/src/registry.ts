import { readFile } from "node:fs/promises";

import { Ajv } from "ajv";
import { errorMessage } from "@termtrace/utils";

import { RegistryLoadError } from "./errors.js";
import { REGISTRY_VERSION } from "./types.js";
import type { HashRegistry, HashRegistryEntry } from "./types.js";

interface RegistryEntryDocument {
  event_type: string;
  hash_key: string;
  field: string;
  value: string;
  case?: string | null;
  step?: string | null;
  note?: string | null;
}

export interface RegistryDocument {
  registry_version: string;
  entries: RegistryEntryDocument[];
}

const nonEmpty = { type: "string", minLength: 1 };
const nullableString = { type: ["string", "null"] };

const registryDescriptor = {
  type: "object",
  required: ["registry_version", "entries"],
  properties: {
    registry_version: { type: "string" },
    entries: {
      type: "array",
      items: {
        type: "object",
        required: ["event_type", "hash_key", "field", "value"],
        properties: {
          event_type: nonEmpty,
          hash_key: nonEmpty,
          field: nonEmpty,
          value: { type: "string" },
          case: nullableString,
          step: nullableString,
          note: nullableString,
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRegistryDocument = ajv.compile<RegistryDocument>(registryDescriptor);

function toEntry(document: RegistryEntryDocument): HashRegistryEntry {
  return {
    eventType: document.event_type,
    hashKey: document.hash_key,
    field: document.field,
    value: document.value,
    ...(typeof document.case === "string" ? { case: document.case } : {}),
    ...(typeof document.step === "string" ? { step: document.step } : {}),
    ...(typeof document.note === "string" ? { note: document.note } : {}),
  };
}

export function parseRegistry(document: unknown): HashRegistry {
  if (!validateRegistryDocument(document)) {
    throw new RegistryLoadError(
      `invalid registry document: ${ajv.errorsText(validateRegistryDocument.errors, { dataVar: "registry" })}`,
    );
  }
  if (document.registry_version !== REGISTRY_VERSION) {
    throw new RegistryLoadError(
      `registry_version must be ${REGISTRY_VERSION}, got ${document.registry_version}`,
    );
  }
  return Object.freeze({
    version: document.registry_version,
    entries: Object.freeze(document.entries.map(toEntry)),
  });
}

export async function loadRegistry(path: string): Promise<HashRegistry> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new RegistryLoadError(`unable to read registry ${path}: ${errorMessage(error)}`);
  }
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new RegistryLoadError(`registry ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseRegistry(document);
}

/** Absent optional fields are written as null. */
export function serializeRegistry(entries: readonly HashRegistryEntry[]): RegistryDocument {
  return {
    registry_version: REGISTRY_VERSION,
    entries: entries.map((entry) => ({
      event_type: entry.eventType,
      hash_key: entry.hashKey,
      field: entry.field,
      value: entry.value,
      case: entry.case ?? null,
      step: entry.step ?? null,
      note: entry.note ?? null,
    })),
  };
}

export function formatRegistry(entries: readonly HashRegistryEntry[]): string {
  return `${JSON.stringify(serializeRegistry(entries), null, 2)}\n`;
}
