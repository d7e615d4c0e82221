import { isJsonInteger, isJsonNumber, isRecord } from "@termtrace/utils";

import type { PrimitiveKind, TypeConstraint } from "./types.js";

type KindPredicate = (value: unknown) => boolean;

// number and integer never accept booleans; a lossless `80.0` is a number, not an integer.
const KIND_PREDICATES: Record<PrimitiveKind, KindPredicate> = {
  string: (value) => typeof value === "string",
  number: isJsonNumber,
  integer: isJsonInteger,
  boolean: (value) => typeof value === "boolean",
  null: (value) => value === null,
  object: (value) => isRecord(value),
  array: (value) => Array.isArray(value),
};

export function typeMatches(value: unknown, constraint: TypeConstraint): boolean {
  if (constraint.kind === "primitive") {
    return KIND_PREDICATES[constraint.type](value);
  }
  return constraint.types.some((type) => KIND_PREDICATES[type](value));
}

export function describeConstraint(constraint: TypeConstraint): string {
  return constraint.kind === "primitive" ? constraint.type : constraint.types.join("|");
}

/** Names the JSON kind of a decoded value; integers report as integer. */
export function runtimeKind(value: unknown): PrimitiveKind | "undefined" {
  if (value === null) return "null";
  if (isJsonNumber(value)) return isJsonInteger(value) ? "integer" : "number";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "string":
      return "string";
    case "boolean":
      return "boolean";
    case "object":
      return "object";
    default:
      return "undefined";
  }
}

export function primitive(type: PrimitiveKind): TypeConstraint {
  return { kind: "primitive", type };
}

export function oneOf(types: readonly PrimitiveKind[]): TypeConstraint {
  return types.length === 1 ? primitive(types[0]) : { kind: "oneOf", types: [...types] };
}
