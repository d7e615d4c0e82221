import { CodedError } from "@termtrace/utils";

export class RegistryLoadError extends CodedError {
  constructor(message: string) {
    super("E_REGISTRY_LOAD", message);
  }
}

/** Two passing events disagree on the value recorded for the same registry slot. */
export class RegistryConflictError extends CodedError {
  readonly line: number;

  constructor(message: string, line: number) {
    super("E_REGISTRY_CONFLICT", message);
    this.line = line;
  }
}
