import { isLosslessNumber, parse as parseLossless, stringify as stringifyLossless } from "lossless-json";

export type JsonRecord = Record<string, unknown>;

/** Plain objects only; arrays and lossless numbers are not records. */
export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

export type ParsedJson =
  | { ok: true; value: unknown }
  | { ok: false; message: string };

export function parseJson(text: string): ParsedJson {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : "invalid JSON" };
  }
}

/**
 * Parses JSON keeping every number as a `LosslessNumber` that carries its
 * source text, so `80.0` stays distinct from `80` and 64-bit integers keep
 * every digit. Conflicting duplicate keys are a parse error.
 */
export function parseJsonLossless(text: string): ParsedJson {
  try {
    return { ok: true, value: parseLossless(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : "invalid JSON" };
  }
}

/** Compact JSON text of a value that may hold lossless numbers. */
export function stringifyJson(value: unknown): string {
  return stringifyLossless(value) ?? "undefined";
}

const INTEGER_LITERAL = /^-?(?:0|[1-9]\d*)$/;

/** A JSON number, decoded either plainly or losslessly. */
export function isJsonNumber(value: unknown): boolean {
  return typeof value === "number" || isLosslessNumber(value);
}

/**
 * A JSON integer: a lossless number written without fraction or exponent, or
 * a plain integral number.
 */
export function isJsonInteger(value: unknown): boolean {
  if (isLosslessNumber(value)) return INTEGER_LITERAL.test(value.value);
  return isInteger(value);
}

/** Canonical decimal text of a JSON integer, with every digit kept. */
export function jsonIntegerText(value: unknown): string | undefined {
  if (isLosslessNumber(value)) {
    return INTEGER_LITERAL.test(value.value) ? BigInt(value.value).toString() : undefined;
  }
  return isInteger(value) ? BigInt(value).toString() : undefined;
}

/** Numeric value of a JSON number, rounded to the nearest double. */
export function jsonNumberValue(value: unknown): number | undefined {
  if (isLosslessNumber(value)) return Number(value.value);
  return typeof value === "number" ? value : undefined;
}

/** Integer check that never accepts booleans or non-finite numbers. */
export function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

export function isNonNegativeInteger(value: unknown): value is number {
  return isInteger(value) && value >= 0;
}

export function isPositiveInteger(value: unknown): value is number {
  return isInteger(value) && value > 0;
}
