/**
 * Store module - Pluggable persistence for ledger records
 */

export type { LedgerChangeset, LedgerStore } from "./types.js";
export { StoreError } from "./types.js";

// Reference implementation
export { MemoryLedgerStore } from "./memory-store.js";

export { LedgerSession } from "./session.js";
