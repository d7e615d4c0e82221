export const PRIMITIVE_KINDS = [
  "string",
  "number",
  "integer",
  "boolean",
  "null",
  "object",
  "array",
] as const;

export type PrimitiveKind = (typeof PRIMITIVE_KINDS)[number];

/** A single kind, or a set of alternatives of which any may match. */
export type TypeConstraint =
  | { readonly kind: "primitive"; readonly type: PrimitiveKind }
  | { readonly kind: "oneOf"; readonly types: readonly PrimitiveKind[] };

export interface EventSchema {
  readonly required: ReadonlySet<string>;
  readonly types: ReadonlyMap<string, TypeConstraint>;
}

export interface Schema {
  readonly version: string;
  readonly commonRequired: ReadonlySet<string>;
  readonly commonTypes: ReadonlyMap<string, TypeConstraint>;
  readonly events: ReadonlyMap<string, EventSchema>;
}

export interface ValidationFailure {
  line: number;
  message: string;
}
