/**
 * @strongbox/snapshot-store — Whole-state snapshot persistence.
 *
 * Provides:
 * - SnapshotStore interface (save / load / exists / clear)
 * - FileSnapshotStore for durable single-document JSON persistence
 * - InMemorySnapshotStore for tests and embedded use
 * - The snapshot document codec (zod-validated)
 * - computeStateHash for comparing states across a reload
 *
 * @packageDocumentation
 */

// Core types
export type { SnapshotStore, SnapshotStoreErrorCode } from "./types.js";
export { SnapshotStoreError, isSnapshotStoreError } from "./types.js";

// Codec
export type { SnapshotDocument } from "./codec.js";
export {
  SnapshotDocumentSchema,
  AccountRecordSchema,
  TransactionRecordSchema,
  encodeSnapshot,
  serializeSnapshot,
  decodeSnapshot,
  parseSnapshot,
} from "./codec.js";

// Implementations
export type { FileSnapshotStoreOptions } from "./snapshot-store.js";
export {
  InMemorySnapshotStore,
  FileSnapshotStore,
  computeStateHash,
} from "./snapshot-store.js";
