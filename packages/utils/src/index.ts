export { bytesToText, concatBytes, decodeBase64Strict, decodeHex, encodeBase64, toBytes } from "./bytes.js";
export { CodedError, ConfigError, errorMessage } from "./errors.js";
export { parseHarnessConfig, readHarnessConfig, resetHarnessConfigForTests } from "./env.js";
export type { HarnessConfig } from "./env.js";
export { ZERO_CHAIN, prefixedSha256, sha256Hex } from "./hash.js";
export {
  isInteger,
  isJsonInteger,
  isJsonNumber,
  isNonNegativeInteger,
  isPositiveInteger,
  isRecord,
  jsonIntegerText,
  jsonNumberValue,
  parseJson,
  parseJsonLossless,
  stringifyJson,
} from "./json.js";
export type { JsonRecord, ParsedJson } from "./json.js";
export { createLogger, parseLogLevel } from "./log.js";
export type { LogLevel, Logger, LoggerOptions } from "./log.js";
export { withTmpDir } from "./tmp.js";
