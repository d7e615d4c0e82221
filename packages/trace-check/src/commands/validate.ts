import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  checkAgainstRegistry,
  deriveRegistryEntries,
  formatRegistry,
  loadRegistry,
} from "@termtrace/hash-registry";
import type { RegistryFailure } from "@termtrace/hash-registry";
import { ingestTraceFile, loadBundledSchema, loadSchema, validateTrace } from "@termtrace/trace-schema";
import type { Schema, ValidationFailure } from "@termtrace/trace-schema";

export type ValidateArgs = {
  trace: string;
  schema?: string;
  registry?: string;
  emitRegistry?: string;
  strict: boolean;
};

export function resolveSchema(schemaPath: string | undefined): Promise<Schema> {
  return schemaPath ? loadSchema(schemaPath) : loadBundledSchema();
}

async function exists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

function report(heading: string, failures: ReadonlyArray<ValidationFailure | RegistryFailure>): void {
  if (failures.length === 0) return;
  const body = failures.map(({ line, message }) => `line ${line}: ${message}`).join("\n");
  process.stderr.write(`${heading}\n${body}\n`);
}

/** Exit code 1 only under `strict`; the registry is emitted only for a clean trace. */
export async function runValidateTrace(args: ValidateArgs): Promise<number> {
  const schema = await resolveSchema(args.schema);
  const lines = await ingestTraceFile(args.trace);
  const failures = validateTrace(schema, lines);

  let registryFailures: RegistryFailure[] = [];
  if (args.registry) {
    if (await exists(args.registry)) {
      const registry = await loadRegistry(args.registry);
      registryFailures = checkAgainstRegistry(registry, lines);
    } else {
      registryFailures = [{ line: 0, message: `registry file not found: ${args.registry}` }];
    }
  }

  if (failures.length > 0 || registryFailures.length > 0) {
    report("JSONL schema validation failed:", failures);
    report("JSONL hash registry validation failed:", registryFailures);
    return args.strict ? 1 : 0;
  }

  if (args.emitRegistry) {
    const output = formatRegistry(deriveRegistryEntries(lines));
    if (args.emitRegistry === "-") {
      process.stdout.write(output);
    } else {
      const target = path.resolve(args.emitRegistry);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, output, "utf-8");
    }
  }
  return 0;
}
