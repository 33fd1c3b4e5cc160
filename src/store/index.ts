/**
 * Persistence for tickrun: atomic writes, the state snapshot and the run lock.
 */

export { atomicWrite, atomicWriteJson, safeReadFile, sortKeysDeep } from './atomic.js';
export {
  loadState,
  saveState,
  parseSnapshot,
  emptySnapshot,
  createTaskRecord,
} from './state.js';
export {
  acquireRunLock,
  releaseRunLock,
  withRunLock,
  STALE_LOCK_MS,
} from './lock.js';
export type { RunLock, ReleaseFn } from './lock.js';
