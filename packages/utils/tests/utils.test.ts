import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  ConfigError,
  concatBytes,
  createLogger,
  decodeBase64Strict,
  decodeHex,
  encodeBase64,
  isInteger,
  isJsonInteger,
  isJsonNumber,
  isPositiveInteger,
  isRecord,
  jsonIntegerText,
  parseHarnessConfig,
  parseJson,
  parseJsonLossless,
  stringifyJson,
  prefixedSha256,
  sha256Hex,
  withTmpDir,
} from "../src/index.js";

describe("@termtrace/utils hashing", () => {
  it("hashes text and bytes identically", () => {
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
    expect(sha256Hex(new Uint8Array([0x61, 0x62, 0x63]))).toBe(sha256Hex("abc"));
  });

  it("prefixes digests with the algorithm tag", () => {
    expect(prefixedSha256("")).toBe(
      "sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });
});

describe("@termtrace/utils byte codecs", () => {
  it("decodes hex with whitespace between pairs", () => {
    expect(Array.from(decodeHex("6c 73\n0a"))).toEqual([0x6c, 0x73, 0x0a]);
  });

  it("rejects odd-length and non-hex input", () => {
    expect(() => decodeHex("abc")).toThrow("odd length");
    expect(() => decodeHex("zz")).toThrow("non-hex");
  });

  it("decodes strict base64 and refuses stray characters", () => {
    expect(Array.from(decodeBase64Strict("YWJj"))).toEqual([0x61, 0x62, 0x63]);
    expect(() => decodeBase64Strict("YWJ")).toThrow("invalid base64");
    expect(() => decodeBase64Strict("YW*j")).toThrow("invalid base64");
  });

  it("round-trips base64 for a view into a larger buffer", () => {
    const backing = new Uint8Array([0, 1, 2, 3, 4]);
    const view = backing.subarray(1, 4);
    expect(encodeBase64(view)).toBe("AQID");
  });

  it("concatenates chunks in order", () => {
    const joined = concatBytes([new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3])]);
    expect(Array.from(joined)).toEqual([1, 2, 3]);
  });
});

describe("@termtrace/utils json helpers", () => {
  it("reports the parser message on failure", () => {
    const parsed = parseJson("{nope}");
    expect(parsed.ok).toBe(false);
  });

  it("keeps number source text when parsing losslessly", () => {
    const parsed = parseJsonLossless('{"wide":18446744073709551615,"whole":80.0,"plain":3}');
    if (!parsed.ok || !isRecord(parsed.value)) throw new Error("expected an object");
    const { wide, whole, plain } = parsed.value;
    expect(jsonIntegerText(wide)).toBe("18446744073709551615");
    expect(isJsonNumber(whole)).toBe(true);
    expect(isJsonInteger(whole)).toBe(false);
    expect(isJsonInteger(plain)).toBe(true);
    expect(isRecord(plain)).toBe(false);
    expect(stringifyJson(parsed.value)).toBe('{"wide":18446744073709551615,"whole":80.0,"plain":3}');
  });

  it("reports lossless parse failures", () => {
    expect(parseJsonLossless("{nope").ok).toBe(false);
  });

  it("never treats booleans as integers", () => {
    expect(isInteger(true)).toBe(false);
    expect(isInteger(3)).toBe(true);
    expect(isPositiveInteger(0)).toBe(false);
  });
});

describe("@termtrace/utils harness config", () => {
  it("applies defaults", () => {
    const config = parseHarnessConfig({});
    expect(config.deterministic).toBe(true);
    expect(config.timeStepMs).toBe(100);
    expect(config.seed).toBe(0);
    expect(config.browser).toBe("node-ws");
    expect(config.browserDpr).toBe(1);
    expect(config.toolProbes).toEqual([]);
  });

  it("parses explicit values", () => {
    const config = parseHarnessConfig({
      E2E_DETERMINISTIC: "0",
      E2E_TIME_STEP_MS: "25",
      E2E_SEED: "42",
      E2E_TOOL_PROBES: "git, node ,",
      E2E_HEADLESS: "false",
    });
    expect(config.deterministic).toBe(false);
    expect(config.timeStepMs).toBe(25);
    expect(config.seed).toBe(42);
    expect(config.toolProbes).toEqual(["git", "node"]);
    expect(config.headless).toBe(false);
  });

  it("rejects a non-integer seed", () => {
    expect(() => parseHarnessConfig({ E2E_SEED: "1.5" })).toThrow(ConfigError);
  });
});

describe("@termtrace/utils logger", () => {
  it("filters by level and prefixes the scope", () => {
    const lines: string[] = [];
    const logger = createLogger("driver", { level: "info", write: (line) => lines.push(line) });
    logger.debug("hidden");
    logger.info("connected", { url: "ws://x" });
    logger.error("boom", new Error("bad"));
    expect(lines).toEqual([
      '[driver] info: connected {"url":"ws://x"}\n',
      "[driver] error: boom bad\n",
    ]);
  });
});

describe("@termtrace/utils tmp dirs", () => {
  it("creates and cleans temporary directories", async () => {
    let tempDir = "";
    await withTmpDir("termtrace-", async (dir) => {
      tempDir = dir;
      expect(dir.startsWith(tmpdir())).toBe(true);
      const marker = path.join(dir, "touch.txt");
      await writeFile(marker, "ok", "utf-8");
      expect(existsSync(marker)).toBe(true);
    });
    expect(tempDir).not.toBe("");
    expect(existsSync(tempDir)).toBe(false);
  });
});
