export const REGISTRY_VERSION = "e2e-hash-registry-v1";

export interface HashRegistryEntry {
  readonly eventType: string;
  readonly hashKey: string;
  readonly field: string;
  readonly value: string;
  readonly case?: string;
  readonly step?: string;
  readonly note?: string;
}

export interface HashRegistry {
  readonly version: string;
  readonly entries: readonly HashRegistryEntry[];
}

export interface RegistryFailure {
  line: number;
  message: string;
}

/** Event types whose named fields carry registry-tracked hashes. */
export type RegistryFieldTable = Readonly<Record<string, readonly string[]>>;

export const DEFAULT_REGISTRY_FIELDS: RegistryFieldTable = Object.freeze({
  span_diff_case: ["diff_hash"],
  tile_skip_case: ["diff_hash"],
  selector_case: ["decision_hash"],
  budgeted_refresh_case: ["widget_refresh_hash"],
});
