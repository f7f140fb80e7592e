/**
 * @strongbox/snapshot-store — Core types.
 *
 * A snapshot store holds exactly one document: the full state of one
 * ledger. Every save overwrites the previous document.
 */

import type { LedgerState } from "@strongbox/types";

/**
 * Snapshot persistence.
 *
 * Invariants:
 * - load() after save(S) returns a state observationally equal to S
 * - load() on a store that was never written returns an empty state
 * - save() replaces the whole document; there are no partial updates
 */
export interface SnapshotStore {
  /**
   * Write the full state, replacing any previous document.
   *
   * @throws SnapshotStoreError with code IO_FAILURE if the write fails
   */
  save(state: LedgerState): void;

  /**
   * Read the persisted state.
   *
   * @returns The stored state, or an empty state if nothing was written
   * @throws SnapshotStoreError with code DECODE_FAILURE for unreadable content
   * @throws SnapshotStoreError with code IO_FAILURE if the read fails
   */
  load(): LedgerState;

  /** True if a document has been written. */
  exists(): boolean;

  /** Remove the document, if any. */
  clear(): void;
}

// =============================================================================
// Errors
// =============================================================================

export type SnapshotStoreErrorCode = "DECODE_FAILURE" | "IO_FAILURE";

/**
 * Error thrown by SnapshotStore operations.
 */
export class SnapshotStoreError extends Error {
  constructor(
    public readonly code: SnapshotStoreErrorCode,
    message: string,
    public readonly location?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SnapshotStoreError";
  }
}

export function isSnapshotStoreError(
  err: unknown,
  code?: SnapshotStoreErrorCode,
): err is SnapshotStoreError {
  return err instanceof SnapshotStoreError && (code === undefined || err.code === code);
}
