import { readFile } from "node:fs/promises";

/**
 * Reads a JSONL trace into its raw lines. Trailing blank lines are dropped so
 * line numbers stay aligned with the file while the validator skips blanks.
 */
export async function ingestTraceFile(path: string): Promise<string[]> {
  const content = await readFile(path, "utf8");
  const lines = content.split(/\r?\n/);

  let lastDataIndex = -1;
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim() !== "") {
      lastDataIndex = i;
      break;
    }
  }

  return lines.slice(0, lastDataIndex + 1);
}
