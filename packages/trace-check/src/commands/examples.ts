import { exampleEvents, formatExampleLines } from "@termtrace/trace-schema";

import { resolveSchema } from "./validate.js";

export async function runPrintExamples(schemaPath: string | undefined): Promise<number> {
  const schema = await resolveSchema(schemaPath);
  process.stdout.write(formatExampleLines(exampleEvents(schema.version)));
  return 0;
}
