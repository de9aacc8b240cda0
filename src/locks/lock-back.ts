/**
 * Lock requests and the protection hierarchy.
 *
 * Rules, first match wins:
 * 1. developer issuer  → lock the target (a developer target is a noop: developers are never locked)
 * 2. developer target  → lock the issuer instead; only a developer may lift it
 * 3. owner issuer      → lock the target
 * 4. owner target      → lock the issuer instead; owner or developer may lift it
 * 5. otherwise         → lock the target
 *
 * An active lock is never swapped for one that is easier to lift: a target
 * lock only replaces a lock the issuer could lift anyway, and a lock-back
 * keeps whichever of the old and new entries needs the higher role.
 */
import type { Clock } from "../infra/ttl-cache.js";
import { KeyedLock } from "../infra/keyed-lock.js";
import { createSubsystemLogger } from "../logger.js";
import { outranks, type Role } from "../rbac/types.js";
import type { LockStore } from "./store.js";
import type { LockEntry, LockNoopReason, LockResult, UnlockResult } from "./types.js";
import { requiredUnlockRole, unlockDenialReason, type RoleSource } from "./unlock.js";

const log = createSubsystemLogger("lock-back");

export const DEFAULT_LOCK_REASON = "Locked by admin";
export const DEVELOPER_LOCK_BACK_REASON = "attempted to lock Founder";
export const OWNER_LOCK_BACK_REASON = "attempted to lock Orang Dalam";

export type LockDecision =
  | { action: "lock-target" }
  | {
      action: "lock-back";
      protectedRole: Extract<Role, "developer" | "owner">;
      requiresDeveloperUnlock: boolean;
      reason: string;
    }
  | { action: "noop"; reason: LockNoopReason };

/** Apply the precedence table to already-resolved roles. */
export function decideLock(params: {
  issuerId: number;
  targetId: number;
  issuerRole: Role;
  targetRole: Role;
}): LockDecision {
  const { issuerId, targetId, issuerRole, targetRole } = params;
  if (issuerId === targetId) {
    return { action: "noop", reason: "self-target" };
  }
  if (issuerRole === "developer") {
    return targetRole === "developer"
      ? { action: "noop", reason: "developer-immune" }
      : { action: "lock-target" };
  }
  if (targetRole === "developer") {
    return {
      action: "lock-back",
      protectedRole: "developer",
      requiresDeveloperUnlock: true,
      reason: DEVELOPER_LOCK_BACK_REASON,
    };
  }
  if (issuerRole === "owner") {
    return { action: "lock-target" };
  }
  if (targetRole === "owner") {
    return {
      action: "lock-back",
      protectedRole: "owner",
      requiresDeveloperUnlock: false,
      reason: OWNER_LOCK_BACK_REASON,
    };
  }
  return { action: "lock-target" };
}

export type LockBackEngineOptions = {
  roles: RoleSource;
  store: LockStore;
  /** When false every lock request is a noop (default: true) */
  enabled?: boolean;
  now?: Clock;
};

export class LockBackEngine {
  private readonly roles: RoleSource;
  private readonly store: LockStore;
  private readonly enabled: boolean;
  private readonly now: Clock;
  // Decisions and their writes are serialized per chat.
  private readonly chatLocks = new KeyedLock();

  constructor(options: LockBackEngineOptions) {
    this.roles = options.roles;
    this.store = options.store;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;
  }

  async requestLock(
    chatId: number,
    issuerId: number,
    targetId: number,
    reason?: string,
  ): Promise<LockResult> {
    if (!this.enabled) {
      return { kind: "noop", reason: "lock-system-disabled" };
    }
    const [issuerRole, targetRole] = await Promise.all([
      this.resolveRole(issuerId, chatId),
      this.resolveRole(targetId, chatId),
    ]);

    return await this.chatLocks.run(String(chatId), async (): Promise<LockResult> => {
      await this.store.whenLoaded();
      const decision = decideLock({ issuerId, targetId, issuerRole, targetRole });
      switch (decision.action) {
        case "noop":
          log.info(
            `Ignored lock of ${targetId} by ${issuerId} in chat ${chatId}: ${decision.reason}`,
          );
          return { kind: "noop", reason: decision.reason };
        case "lock-back": {
          const next = this.buildEntry({
            chatId,
            userId: issuerId,
            issuedBy: issuerId,
            reason: decision.reason,
            requiresDeveloperUnlock: decision.requiresDeveloperUnlock,
            protectedRole: decision.protectedRole,
            protectedUserId: targetId,
          });
          const existing = this.store.get(chatId, issuerId);
          const entry =
            existing?.active && outranks(requiredUnlockRole(existing), requiredUnlockRole(next))
              ? existing
              : await this.store.put(next);
          log.warn(
            `Locked back ${issuerRole} ${issuerId} in chat ${chatId} for targeting ${decision.protectedRole} ${targetId}`,
          );
          return {
            kind: "locked-back",
            issuer: issuerId,
            protectedRole: decision.protectedRole,
            entry,
          };
        }
        case "lock-target": {
          const existing = this.store.get(chatId, targetId);
          if (existing?.active && unlockDenialReason(issuerRole, existing) !== null) {
            log.info(
              `Kept the ${requiredUnlockRole(existing)}-only lock on ${targetId} in chat ${chatId}; ${issuerRole} ${issuerId} may not replace it`,
            );
            return { kind: "noop", reason: "already-locked" };
          }
          const trimmed = reason?.trim();
          const entry = await this.store.put(
            this.buildEntry({
              chatId,
              userId: targetId,
              issuedBy: issuerId,
              reason: trimmed ? trimmed : DEFAULT_LOCK_REASON,
              requiresDeveloperUnlock: false,
              protectedRole: null,
              protectedUserId: null,
            }),
          );
          log.info(`Locked ${targetId} in chat ${chatId} by ${issuerRole} ${issuerId}`);
          return { kind: "locked", target: targetId, entry };
        }
      }
    });
  }

  async requestUnlock(chatId: number, requesterId: number, targetId: number): Promise<UnlockResult> {
    const requesterRole = await this.resolveRole(requesterId, chatId);
    return await this.chatLocks.run(String(chatId), async (): Promise<UnlockResult> => {
      await this.store.whenLoaded();
      const entry = this.store.get(chatId, targetId);
      if (!entry?.active) {
        return { kind: "denied", reason: "no active lock" };
      }
      const denial = unlockDenialReason(requesterRole, entry);
      if (denial) {
        log.info(
          `Denied unlock of ${targetId} in chat ${chatId} by ${requesterRole} ${requesterId}: ${denial}`,
        );
        return { kind: "denied", reason: denial };
      }
      const updated = await this.store.deactivate(chatId, targetId, requesterId);
      if (!updated) {
        return { kind: "denied", reason: "no active lock" };
      }
      log.info(`Unlocked ${targetId} in chat ${chatId} by ${requesterRole} ${requesterId}`);
      return { kind: "unlocked", entry: updated };
    });
  }

  /** Lift every lock in a chat that `requesterId` is allowed to lift. */
  async clearChat(chatId: number, requesterId: number): Promise<number> {
    const requesterRole = await this.resolveRole(requesterId, chatId);
    return await this.chatLocks.run(String(chatId), () =>
      this.store.deactivateChat(
        chatId,
        requesterId,
        (entry) => unlockDenialReason(requesterRole, entry) === null,
      ),
    );
  }

  // A failed resolution counts as the least privileged role.
  private async resolveRole(userId: number, chatId: number): Promise<Role> {
    try {
      return await this.roles.resolve(userId, chatId);
    } catch (err) {
      log.warn(`Role resolution failed for ${userId} in chat ${chatId}: ${String(err)}`);
      return "user";
    }
  }

  private buildEntry(params: {
    chatId: number;
    userId: number;
    issuedBy: number;
    reason: string;
    requiresDeveloperUnlock: boolean;
    protectedRole: Role | null;
    protectedUserId: number | null;
  }): LockEntry {
    return {
      chatId: params.chatId,
      userId: params.userId,
      active: true,
      reason: params.reason,
      issuedBy: params.issuedBy,
      metadata: {
        requiresDeveloperUnlock: params.requiresDeveloperUnlock,
        protectedRole: params.protectedRole,
        protectedUserId: params.protectedUserId,
        createdAt: this.now(),
      },
    };
  }
}
