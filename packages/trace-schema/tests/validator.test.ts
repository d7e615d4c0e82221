import { writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";
import { withTmpDir } from "@termtrace/utils";

import {
  SchemaLoadError,
  exampleEvents,
  formatExampleLines,
  ingestTraceFile,
  loadBundledSchema,
  loadSchema,
  parseSchema,
  validateEvent,
  validateLine,
  validateTrace,
} from "../src/index.js";
import type { Schema } from "../src/index.js";

const COMMON = { timestamp: "T000001", run_id: "run_1", seed: 0 };

function miniSchema(): Schema {
  return parseSchema({
    schema_version: "test-v1",
    common_required: ["type", "timestamp", "run_id", "seed"],
    common_types: { seed: "integer", timestamp: "string", duration_ms: "number" },
    events: {
      tick: { required: ["n"], types: { n: "integer", ratio: "number", code: ["integer", "null"] } },
      step_end: { types: { duration_ms: "integer" } },
    },
  });
}

describe("trace-schema catalog", () => {
  it("loads the bundled schema", async () => {
    const schema = await loadBundledSchema();
    expect(schema.version).toBe("e2e-jsonl-v1");
    expect([...schema.commonRequired]).toEqual(["schema_version", "type", "timestamp", "run_id", "seed"]);
    expect(schema.events.has("frame")).toBe(true);
    expect(Object.isFrozen(schema)).toBe(true);
  });

  it("rejects documents with missing sections", () => {
    expect(() => parseSchema({ schema_version: "x", common_required: [] })).toThrow(SchemaLoadError);
  });

  it("rejects constraint kinds outside the closed set", () => {
    const attempt = () =>
      parseSchema({
        schema_version: "x",
        common_required: [],
        common_types: { seed: "bigint" },
        events: {},
      });
    expect(attempt).toThrow(SchemaLoadError);
  });

  it("tags load failures with a stable code", async () => {
    await withTmpDir("termtrace-schema-", async (dir) => {
      const file = path.join(dir, "broken.json");
      await writeFile(file, "{not json", "utf-8");
      await expect(loadSchema(file)).rejects.toMatchObject({ code: "E_SCHEMA_LOAD" });
      await expect(loadSchema(path.join(dir, "absent.json"))).rejects.toBeInstanceOf(SchemaLoadError);
    });
  });
});

describe("trace-schema validation", () => {
  it("accepts every canonical example against the bundled schema", async () => {
    const schema = await loadBundledSchema();
    const lines = formatExampleLines(exampleEvents(schema.version)).split("\n");
    expect(validateTrace(schema, lines)).toEqual([]);
  });

  it("provides one example per event type", async () => {
    const schema = await loadBundledSchema();
    const types = exampleEvents(schema.version).map((event) => event.type);
    expect(types.slice().sort()).toEqual([...schema.events.keys()].sort());
  });

  it("reports each missing required field", () => {
    const errors = validateEvent(miniSchema(), { type: "tick", timestamp: "T000001" });
    expect(errors).toEqual([
      "missing required field: run_id",
      "missing required field: seed",
      "missing required field: n",
    ]);
  });

  it("names the field whose value has the wrong kind", async () => {
    const schema = await loadBundledSchema();
    const [example] = exampleEvents(schema.version).filter((event) => event.type === "run_start");
    const errors = validateEvent(schema, { ...example, seed: "oops" });
    expect(errors).toEqual(["field seed has wrong type: expected integer, got string"]);
  });

  it("never accepts booleans for numeric fields", () => {
    const schema = miniSchema();
    expect(validateEvent(schema, { type: "tick", ...COMMON, n: true })).toEqual([
      "field n has wrong type: expected integer, got boolean",
    ]);
    expect(validateEvent(schema, { type: "tick", ...COMMON, n: 1, ratio: false })).toEqual([
      "field ratio has wrong type: expected number, got boolean",
    ]);
  });

  it("distinguishes integers from fractional numbers", () => {
    const schema = miniSchema();
    expect(validateEvent(schema, { type: "tick", ...COMMON, n: 1.5 })).toEqual([
      "field n has wrong type: expected integer, got number",
    ]);
    expect(validateEvent(schema, { type: "tick", ...COMMON, n: 1, ratio: 3 })).toEqual([]);
  });

  it("keeps the integer and float spellings of a number apart", () => {
    const schema = miniSchema();
    const head = '{"type":"tick","timestamp":"T000001","run_id":"run_1","seed":0';
    expect(validateLine(schema, `${head},"n":80.0}`)).toEqual([
      "field n has wrong type: expected integer, got number",
    ]);
    expect(validateLine(schema, `${head},"n":1e2}`)).toEqual([
      "field n has wrong type: expected integer, got number",
    ]);
    expect(validateLine(schema, `${head},"n":1,"code":1.0}`)).toEqual([
      "field code has wrong type: expected integer|null, got number",
    ]);
    expect(validateLine(schema, `${head},"n":18446744073709551615,"ratio":80.0}`)).toEqual([]);
  });

  it("lets event-specific constraints override common ones", () => {
    const schema = miniSchema();
    expect(validateEvent(schema, { type: "step_end", ...COMMON, duration_ms: 2.5 })).toEqual([
      "field duration_ms has wrong type: expected integer, got number",
    ]);
  });

  it("matches any alternative of a oneOf constraint", () => {
    const schema = miniSchema();
    expect(validateEvent(schema, { type: "tick", ...COMMON, n: 1, code: null })).toEqual([]);
    expect(validateEvent(schema, { type: "tick", ...COMMON, n: 1, code: "x" })).toEqual([
      "field code has wrong type: expected integer|null, got string",
    ]);
  });

  it("looks only at the event's own fields", () => {
    const schema = parseSchema({
      schema_version: "test-v1",
      common_required: ["constructor"],
      common_types: { toString: "string" },
      events: { bare: {} },
    });
    expect(validateEvent(schema, { type: "bare" })).toEqual(["missing required field: constructor"]);
  });

  it("reports only the unknown type", () => {
    expect(validateLine(miniSchema(), JSON.stringify({ type: "mystery" }))).toEqual([
      "unknown event type: mystery",
    ]);
  });

  it("stops when type is not a string", () => {
    expect(validateLine(miniSchema(), JSON.stringify({ type: 7, seed: "bad" }))).toEqual([
      "type must be a string",
    ]);
  });

  it("rejects non-object lines", () => {
    expect(validateLine(miniSchema(), "[1,2]")).toEqual(["jsonl line must be an object"]);
    expect(validateLine(miniSchema(), "42")).toEqual(["jsonl line must be an object"]);
  });

  it("flags a schema_version mismatch but tolerates its absence", () => {
    const schema = miniSchema();
    const event = { type: "tick", ...COMMON, n: 1 };
    expect(validateEvent(schema, event)).toEqual([]);
    expect(validateEvent(schema, { ...event, schema_version: "other" })).toEqual([
      "schema_version mismatch: expected test-v1, got other",
    ]);
  });

  it("reports invalid json once and keeps scanning", () => {
    const good = JSON.stringify({ type: "tick", ...COMMON, n: 1 });
    const failures = validateTrace(miniSchema(), [good, "{nope", "", JSON.stringify({ type: "mystery" })]);
    expect(failures).toHaveLength(2);
    expect(failures[0].line).toBe(2);
    expect(failures[0].message.startsWith("invalid json: ")).toBe(true);
    expect(failures[1]).toEqual({ line: 4, message: "unknown event type: mystery" });
  });
});

describe("trace-schema ingest", () => {
  it("keeps interior blank lines and drops the trailing ones", async () => {
    await withTmpDir("termtrace-ingest-", async (dir) => {
      const file = path.join(dir, "trace.jsonl");
      await writeFile(file, "{\"a\":1}\r\n\n{\"b\":2}\n\n", "utf-8");
      expect(await ingestTraceFile(file)).toEqual(['{"a":1}', "", '{"b":2}']);
    });
  });
});
