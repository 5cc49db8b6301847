/**
 * In-process map. Lost on restart.
 */
export type MemoryBackendKind = "memory"

/**
 * One file per entry under a local directory.
 */
export type FileBackendKind = "file"

/**
 * A network cache server (Redis).
 */
export type NetworkBackendKind = "network"

/**
 * A relational table (PostgreSQL).
 */
export type TableBackendKind = "table"

/**
 * Several leaf backends combined under a {@link CompositePolicy}.
 */
export type CompositeBackendKind = "composite"

export type LeafBackendKind =
  | MemoryBackendKind
  | FileBackendKind
  | NetworkBackendKind
  | TableBackendKind

export type BackendKind = LeafBackendKind | CompositeBackendKind

export const backendKinds = [
  "memory",
  "file",
  "network",
  "table",
  "composite",
] as const satisfies readonly BackendKind[]

export const leafBackendKinds = [
  "memory",
  "file",
  "network",
  "table",
] as const satisfies readonly LeafBackendKind[]

/**
 * - `fallback`: read from the first store that hits; write to the primary only.
 * - `replicate`: write to every store (best effort past the primary); read from
 *   the first store that answers.
 */
export type CompositePolicy = "fallback" | "replicate"

export const compositePolicies = [
  "fallback",
  "replicate",
] as const satisfies readonly CompositePolicy[]
