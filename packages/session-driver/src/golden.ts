import { readFile } from "node:fs/promises";

import { isRecord } from "@termtrace/utils";
import type { SessionSummary } from "@termtrace/session-recorder";

export const GOLDEN_ASSERTION = "golden_checksum_chain";

export type GoldenComparison =
  | { status: "skipped" }
  | { status: "passed"; details: string }
  | { status: "failed"; details: string; error: string };

function isMissing(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

function expectedChain(golden: unknown): string {
  if (!isRecord(golden)) return "";
  const chain = golden.checksum_chain;
  if (chain === undefined || chain === null) return "";
  return typeof chain === "string" ? chain : JSON.stringify(chain);
}

/**
 * Compares a run's checksum chain with the `checksum_chain` of a golden JSON
 * document. A missing file skips the comparison; an absent or empty expected
 * chain passes. A chain that is not a string never matches.
 */
export async function compareGolden(path: string, summary: SessionSummary): Promise<GoldenComparison> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissing(error)) return { status: "skipped" };
    throw error;
  }
  const golden: unknown = JSON.parse(text);
  const expected = expectedChain(golden);
  if (expected !== "" && expected !== summary.checksum_chain) {
    const framesExpected = isRecord(golden) && typeof golden.frames === "number" ? golden.frames : -1;
    return {
      status: "failed",
      details:
        `expected=${expected} actual=${summary.checksum_chain} ` +
        `frames_expected=${framesExpected} frames_actual=${summary.frames}`,
      error: `Golden checksum mismatch: expected ${expected}, got ${summary.checksum_chain}`,
    };
  }
  return {
    status: "passed",
    details: `checksum=${summary.checksum_chain} frames=${summary.frames}`,
  };
}
