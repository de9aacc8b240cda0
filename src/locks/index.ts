export {
  DEFAULT_LOCK_REASON,
  DEVELOPER_LOCK_BACK_REASON,
  LockBackEngine,
  OWNER_LOCK_BACK_REASON,
  decideLock,
  type LockBackEngineOptions,
  type LockDecision,
} from "./lock-back.js";
export {
  JsonFilePersistenceStore,
  LOCK_SNAPSHOT_VERSION,
  MemoryPersistenceStore,
  parseLockSnapshot,
  type LockSnapshot,
  type PersistenceStore,
} from "./persistence.js";
export { DEFAULT_MAX_LOCK_AGE_MS, LockStore, type LockStoreOptions } from "./store.js";
export {
  UnlockAuthorizer,
  requiredUnlockRole,
  unlockDenialReason,
  type RoleSource,
  type UnlockRole,
} from "./unlock.js";
export type {
  LockEntry,
  LockMetadata,
  LockNoopReason,
  LockResult,
  LockStats,
  UnlockDenialReason,
  UnlockResult,
} from "./types.js";
