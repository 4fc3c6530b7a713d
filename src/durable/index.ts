// src/durable/index.ts

export { atomicWriteFileSync, atomicWriteJsonSync, appendLineDurableSync } from "./atomic_write";
export type { FsyncMode } from "./atomic_write";
export { acquireLock, releaseLock } from "./lock";
export type { LockHandle } from "./lock";
