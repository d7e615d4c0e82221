import { readFile } from "node:fs/promises";

import { Ajv } from "ajv";
import { CodedError, decodeBase64Strict, decodeHex, errorMessage, toBytes } from "@termtrace/utils";

export class ScenarioError extends CodedError {
  constructor(message: string) {
    super("E_SCENARIO", message);
  }
}

interface StepBase {
  delay_ms?: number;
  comment?: string;
}

export interface SendStep extends StepBase {
  type: "send";
  data_hex?: string;
  data_b64?: string;
  data?: string;
  input_type?: string;
}

export interface ResizeStep extends StepBase {
  type: "resize";
  cols: number;
  rows: number;
}

export interface WaitStep extends StepBase {
  type: "wait";
  ms?: number;
}

export interface DrainStep extends StepBase {
  type: "drain";
}

export type ScenarioStep = SendStep | ResizeStep | WaitStep | DrainStep;

export interface Scenario {
  name: string;
  description?: string;
  initial_cols: number;
  initial_rows: number;
  timeout_s: number;
  steps: ScenarioStep[];
}

interface ScenarioDocument {
  name: string;
  description?: string;
  initial_cols?: number;
  initial_rows?: number;
  timeout_s?: number;
  steps?: ScenarioStep[];
}

export const DEFAULT_COLS = 120;
export const DEFAULT_ROWS = 40;
export const DEFAULT_TIMEOUT_S = 30;

const stepCommon = {
  delay_ms: { type: "number", minimum: 0 },
  comment: { type: "string" },
};

const scenarioDescriptor = {
  type: "object",
  required: ["name"],
  properties: {
    name: { type: "string", minLength: 1 },
    description: { type: "string" },
    initial_cols: { type: "integer", minimum: 1 },
    initial_rows: { type: "integer", minimum: 1 },
    timeout_s: { type: "number", exclusiveMinimum: 0 },
    steps: {
      type: "array",
      items: {
        type: "object",
        required: ["type"],
        oneOf: [
          {
            properties: {
              ...stepCommon,
              type: { const: "send" },
              data_hex: { type: "string" },
              data_b64: { type: "string" },
              data: { type: "string" },
              input_type: { type: "string" },
            },
          },
          {
            required: ["cols", "rows"],
            properties: {
              ...stepCommon,
              type: { const: "resize" },
              cols: { type: "integer", minimum: 1 },
              rows: { type: "integer", minimum: 1 },
            },
          },
          { properties: { ...stepCommon, type: { const: "wait" }, ms: { type: "number", minimum: 0 } } },
          { properties: { ...stepCommon, type: { const: "drain" } } },
        ],
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateScenarioDocument = ajv.compile<ScenarioDocument>(scenarioDescriptor);

/** Payload of a `send` step: hex first, then base64, then literal text. */
export function decodeStepData(step: SendStep): Uint8Array {
  if (step.data_hex !== undefined) {
    try {
      return decodeHex(step.data_hex);
    } catch (error) {
      throw new ScenarioError(`data_hex: ${errorMessage(error)}`);
    }
  }
  if (step.data_b64 !== undefined) {
    try {
      return decodeBase64Strict(step.data_b64);
    } catch (error) {
      throw new ScenarioError(`data_b64: ${errorMessage(error)}`);
    }
  }
  if (step.data !== undefined) {
    return toBytes(step.data);
  }
  return new Uint8Array(0);
}

export function parseScenario(document: unknown): Scenario {
  if (!validateScenarioDocument(document)) {
    throw new ScenarioError(
      `invalid scenario: ${ajv.errorsText(validateScenarioDocument.errors, { dataVar: "scenario" })}`,
    );
  }
  const steps = document.steps ?? [];
  steps.forEach((step, index) => {
    if (step.type !== "send") return;
    try {
      decodeStepData(step);
    } catch (error) {
      throw new ScenarioError(`step ${index}: ${errorMessage(error)}`);
    }
  });
  return {
    name: document.name,
    ...(document.description === undefined ? {} : { description: document.description }),
    initial_cols: document.initial_cols ?? DEFAULT_COLS,
    initial_rows: document.initial_rows ?? DEFAULT_ROWS,
    timeout_s: document.timeout_s ?? DEFAULT_TIMEOUT_S,
    steps,
  };
}

export async function loadScenario(path: string): Promise<Scenario> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ScenarioError(`unable to read scenario ${path}: ${errorMessage(error)}`);
  }
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ScenarioError(`scenario ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseScenario(document);
}
