/**
 * Assets module - Value-transfer collaborators
 */

export type { AssetTransfer, TransferDirection } from "./types.js";
export { AssetTransferError } from "./types.js";

export { MemoryAsset } from "./memory-asset.js";
