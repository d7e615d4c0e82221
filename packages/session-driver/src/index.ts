export { DEFAULT_WAIT_MS, DRAIN_MS, SETTLE_MS, runSession } from "./driver.js";
export type { SessionOptions, SessionOutcome, SessionResult, Sleep } from "./driver.js";
export { decodeFrameMessage, extractFrameOverrides } from "./frames.js";
export type { DecodedFrame } from "./frames.js";
export { GOLDEN_ASSERTION, compareGolden } from "./golden.js";
export type { GoldenComparison } from "./golden.js";
export { probeEnvironment } from "./probe.js";
export type { CommandRunner, EnvironmentProbe } from "./probe.js";
export {
  DEFAULT_COLS,
  DEFAULT_ROWS,
  DEFAULT_TIMEOUT_S,
  ScenarioError,
  decodeStepData,
  loadScenario,
  parseScenario,
} from "./scenario.js";
export type { DrainStep, ResizeStep, Scenario, ScenarioStep, SendStep, WaitStep } from "./scenario.js";
export { saveTranscript } from "./transcript.js";
export {
  CLOSE_TIMEOUT_MS,
  MAX_PAYLOAD_BYTES,
  MessageQueue,
  OPEN_TIMEOUT_MS,
  abortError,
  connectWebSocket,
} from "./transport.js";
export type { ConnectOptions, SessionSocket, SocketConnector, SocketMessage } from "./transport.js";
