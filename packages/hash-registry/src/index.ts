export { checkAgainstRegistry } from "./check.js";
export { deriveRegistryEntries } from "./derive.js";
export { RegistryConflictError, RegistryLoadError } from "./errors.js";
export { computeHashKey, eventMode, frameHashKey, isPassStatus } from "./hashKey.js";
export { formatRegistry, loadRegistry, parseRegistry, serializeRegistry } from "./registry.js";
export type { RegistryDocument } from "./registry.js";
export { DEFAULT_REGISTRY_FIELDS, REGISTRY_VERSION } from "./types.js";
export type { HashRegistry, HashRegistryEntry, RegistryFailure, RegistryFieldTable } from "./types.js";
