export const HELP_TEXT = [
  "Usage: trace-check <command> [options]",
  "",
  "Commands:",
  "  validate <trace.jsonl>   check a trace against the schema and a hash registry",
  "  examples                 print one example event per type as JSONL",
  "  run --scenario <path>    drive a scripted session and record its trace",
].join("\n");

export const VALIDATE_HELP =
  "Usage: trace-check validate <trace.jsonl> [--schema <path>] [--registry <path>]\n" +
  "                           [--emit-registry <path|->] [--strict] [--warn]\n";

export const EXAMPLES_HELP = "Usage: trace-check examples [--schema <path>]\n";

export const RUN_HELP =
  "Usage: trace-check run --scenario <path> [--url <ws-url>] [--golden <path>]\n" +
  "                      [--jsonl <path|->] [--transcript <path>] [--summary]\n";
