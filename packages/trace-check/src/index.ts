export { runPrintExamples } from "./commands/examples.js";
export { DEFAULT_URL, runScenario } from "./commands/run.js";
export type { RunArgs, RunDeps } from "./commands/run.js";
export { resolveSchema, runValidateTrace } from "./commands/validate.js";
export type { ValidateArgs } from "./commands/validate.js";
export { parseFlagArgs } from "./flags.js";
export type { ParsedFlags } from "./flags.js";
export { EXAMPLES_HELP, HELP_TEXT, RUN_HELP, VALIDATE_HELP } from "./help.js";
