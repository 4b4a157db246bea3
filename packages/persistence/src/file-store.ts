/**
 * @splitledger/persistence — File-backed ledger storage.
 *
 * Saves and loads a whole ledger as one text file (see codec.ts).
 *
 * A ledger the codec cannot write is refused before the file is touched.
 *
 * Load semantics:
 * - An unreadable file fails with STORAGE_UNAVAILABLE and leaves the ledger alone
 * - Otherwise the ledger is cleared BEFORE the text is decoded, so a corrupt
 *   file leaves it empty
 * - On success the decoded users and expenses replace the ledger state
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { LedgerResult, LedgerSnapshot } from "@splitledger/ledger";
import { fail, ok } from "@splitledger/ledger";
import { decodeLedger, encodeLedger } from "./codec.js";

/**
 * The part of a ledger the file store needs.
 */
export interface SnapshotTarget {
  snapshot(): LedgerSnapshot;
  clear(): void;
  restore(snapshot: LedgerSnapshot): void;
}

/**
 * Options for creating a LedgerFileStore.
 */
export interface LedgerFileStoreOptions {
  /** Path to the ledger text file */
  readonly filePath: string;
}

/**
 * Summary of a completed save or load.
 */
export interface StorageReport {
  readonly filePath: string;
  readonly users: number;
  readonly expenses: number;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class LedgerFileStore {
  private readonly _filePath: string;

  constructor(options: LedgerFileStoreOptions) {
    this._filePath = options.filePath;
  }

  get filePath(): string {
    return this._filePath;
  }

  /**
   * Write the ledger to disk, creating the parent directory if needed.
   */
  save(ledger: SnapshotTarget): LedgerResult<StorageReport> {
    const snapshot = ledger.snapshot();
    const encoded = encodeLedger(snapshot);
    if (!encoded.ok) {
      return encoded;
    }

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      writeFileSync(this._filePath, encoded.value, "utf8");
    } catch (err: unknown) {
      return fail(
        "STORAGE_UNAVAILABLE",
        `Cannot open file for writing: ${this._filePath} (${describeError(err)})`,
      );
    }

    return ok(this._report(snapshot));
  }

  /**
   * Replace the ledger state with the file contents.
   */
  load(ledger: SnapshotTarget): LedgerResult<StorageReport> {
    let text: string;
    try {
      text = readFileSync(this._filePath, "utf8");
    } catch (err: unknown) {
      return fail(
        "STORAGE_UNAVAILABLE",
        `Cannot open file for reading: ${this._filePath} (${describeError(err)})`,
      );
    }

    ledger.clear();

    const decoded = decodeLedger(text);
    if (!decoded.ok) {
      return decoded;
    }

    ledger.restore(decoded.value);
    return ok(this._report(decoded.value));
  }

  private _report(snapshot: LedgerSnapshot): StorageReport {
    return {
      filePath: this._filePath,
      users: snapshot.users.length,
      expenses: snapshot.expenses.length,
    };
  }
}
