/**
 * @mailguard/node - Node.js filesystem store for mailguard config files
 *
 * Re-exports everything from @mailguard/core plus the atomic file store.
 */

// Re-export everything from core
export * from "@mailguard/core";
export type { AtomicWriteOptions } from "./atomic-write.js";
export { toIoError, writeFileAtomic } from "./atomic-write.js";
export type { FileOps } from "./file-ops.js";
export { nodeFileOps } from "./file-ops.js";
export type { NodeConfigStoreConfig } from "./node-config-store.js";
// Export Node.js config store
export {
	makeNodeConfigStoreLayer,
	NodeConfigStoreLayer,
} from "./node-config-store.js";
