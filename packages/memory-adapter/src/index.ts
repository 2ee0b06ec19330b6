export { type MemoryAdapterOptions, memoryAdapter } from "./adapter.js";
export { type LockOwner, RowLockManager } from "./row-locks.js";
