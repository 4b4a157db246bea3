/**
 * @splitledger/persistence — Text persistence for the ledger.
 *
 * - encodeLedger / decodeLedger: the line-oriented USERS / EXPENSES format
 * - LedgerFileStore: save and load a Ledger through a file
 *
 * Design rules:
 * - Fallible operations return a LedgerResult, never throw
 * - Loading clears the target ledger before decoding
 */

export { encodeLedger, decodeLedger } from "./codec.js";
export { LedgerFileStore } from "./file-store.js";
export type {
  LedgerFileStoreOptions,
  SnapshotTarget,
  StorageReport,
} from "./file-store.js";
export { TextCursor } from "./text-cursor.js";
