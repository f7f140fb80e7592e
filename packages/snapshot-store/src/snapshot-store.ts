/**
 * @strongbox/snapshot-store — Snapshot Store implementations.
 *
 * Snapshots are whole-state captures of a ledger, written after every
 * mutation and read once on startup.
 *
 * Design principles:
 * - One document per store; each save fully replaces the last one
 * - A missing document is an empty ledger, not an error
 * - Unreadable content is reported as DECODE_FAILURE; the caller decides
 *   whether to start empty or stop
 * - File writes go to a temp file, are fsynced, then renamed over the
 *   target so a crash leaves either the old or the new document
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import pino from "pino";
import type { Logger } from "pino";
import { emptyLedgerState } from "@strongbox/types";
import type { LedgerState } from "@strongbox/types";
import { parseSnapshot, serializeSnapshot } from "./codec.js";
import type { SnapshotStore } from "./types.js";
import { SnapshotStoreError } from "./types.js";

// =============================================================================
// State Hash
// =============================================================================

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state.
 * Two states with equal hashes are observationally identical.
 */
export function computeStateHash(state: LedgerState): string {
  const canonical = canonicalize(state);
  return createHash("sha256").update(canonical).digest("hex");
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

/**
 * In-memory snapshot store.
 *
 * Keeps the serialized document text rather than the state object, so a
 * load always goes through the same codec as the file store.
 * Suitable for tests and embedded use without durability.
 */
export class InMemorySnapshotStore implements SnapshotStore {
  private _text: string | undefined;

  /**
   * @param initialText - Document text to start from (may be invalid)
   */
  constructor(initialText?: string) {
    this._text = initialText;
  }

  save(state: LedgerState): void {
    this._text = serializeSnapshot(state);
  }

  load(): LedgerState {
    if (this._text === undefined) {
      return emptyLedgerState();
    }
    return parseSnapshot(this._text, "memory");
  }

  exists(): boolean {
    return this._text !== undefined;
  }

  clear(): void {
    this._text = undefined;
  }

  /** The current document text, if any. */
  get contents(): string | undefined {
    return this._text;
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

export interface FileSnapshotStoreOptions {
  /** Path to the JSON document */
  readonly filePath: string;

  /** Default: a silent pino logger */
  readonly logger?: Logger | undefined;
}

/**
 * File-based snapshot store.
 *
 * Stores the ledger as a single JSON document at `filePath`.
 * The parent directory is created on first save.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly _filePath: string;
  private readonly _log: Logger;

  constructor(options: FileSnapshotStoreOptions) {
    this._filePath = options.filePath;
    this._log = (options.logger ?? pino({ level: "silent" })).child({
      component: "snapshot-store",
    });
  }

  save(state: LedgerState): void {
    const text = serializeSnapshot(state);
    const tempPath = `${this._filePath}.tmp`;

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      const fd = openSync(tempPath, "w");
      try {
        writeSync(fd, text);
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tempPath, this._filePath);
    } catch (err) {
      this._discard(tempPath);
      throw new SnapshotStoreError(
        "IO_FAILURE",
        `Cannot write snapshot to ${this._filePath}: ${reason(err)}`,
        this._filePath,
        { cause: err },
      );
    }

    if (this._log.isLevelEnabled("debug")) {
      this._log.debug(
        {
          filePath: this._filePath,
          accounts: Object.keys(state.accounts).length,
          stateHash: computeStateHash(state),
        },
        "Snapshot saved",
      );
    }
  }

  load(): LedgerState {
    if (!existsSync(this._filePath)) {
      this._log.info({ filePath: this._filePath }, "No snapshot found, starting empty");
      return emptyLedgerState();
    }

    let text: string;
    try {
      text = readFileSync(this._filePath, "utf-8");
    } catch (err) {
      throw new SnapshotStoreError(
        "IO_FAILURE",
        `Cannot read snapshot from ${this._filePath}: ${reason(err)}`,
        this._filePath,
        { cause: err },
      );
    }

    const state = parseSnapshot(text, this._filePath);
    this._log.info(
      { filePath: this._filePath, accounts: Object.keys(state.accounts).length },
      "Snapshot loaded",
    );
    return state;
  }

  exists(): boolean {
    return existsSync(this._filePath);
  }

  clear(): void {
    if (!existsSync(this._filePath)) {
      return;
    }
    try {
      unlinkSync(this._filePath);
    } catch (err) {
      throw new SnapshotStoreError(
        "IO_FAILURE",
        `Cannot remove snapshot ${this._filePath}: ${reason(err)}`,
        this._filePath,
        { cause: err },
      );
    }
  }

  /** Best-effort removal of a temp file left by a failed save. */
  private _discard(tempPath: string): void {
    try {
      rmSync(tempPath, { force: true });
    } catch (err) {
      this._log.warn({ err, path: tempPath }, "Cannot remove temp snapshot file");
    }
  }

  /** Path of the JSON document */
  get filePath(): string {
    return this._filePath;
  }
}
