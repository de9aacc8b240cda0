import type { Role } from "../rbac/types.js";

export type LockMetadata = {
  /** Only a developer may lift this lock */
  requiresDeveloperUnlock: boolean;
  /** Role of the member the locked user tried to restrict, for lock-backs */
  protectedRole: Role | null;
  /** Id of that protected member */
  protectedUserId: number | null;
  /** Epoch ms */
  createdAt: number;
};

/**
 * Restriction on a user in a chat. Inactive entries are kept for audit;
 * at most one entry per (chat, user) is active.
 */
export type LockEntry = {
  chatId: number;
  userId: number;
  active: boolean;
  reason: string;
  /** Who issued the lock request that produced this entry */
  issuedBy: number;
  metadata: LockMetadata;
  unlockedAt?: number;
  unlockedBy?: number;
};

export type LockNoopReason =
  | "developer-immune"
  | "self-target"
  | "lock-system-disabled"
  /** The target holds a lock the issuer may not lift */
  | "already-locked";

export type LockResult =
  | { kind: "locked"; target: number; entry: LockEntry }
  | { kind: "locked-back"; issuer: number; protectedRole: Role; entry: LockEntry }
  | { kind: "noop"; reason: LockNoopReason };

export type UnlockDenialReason =
  | "no active lock"
  | "requires developer"
  | "requires owner"
  | "requires admin";

export type UnlockResult =
  | { kind: "unlocked"; entry: LockEntry }
  | { kind: "denied"; reason: UnlockDenialReason };

export type LockStats = {
  totalLocked: number;
  chatsWithLocks: number;
  totalChats: number;
};
