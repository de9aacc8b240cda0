import type { Role } from "../rbac/types.js";
import type { LockEntry, UnlockDenialReason } from "./types.js";

export type RoleSource = {
  resolve(userId: number, chatId: number): Promise<Role>;
};

const ROLES_ALLOWED_TO_UNLOCK = {
  developer: new Set<Role>(["developer"]),
  owner: new Set<Role>(["developer", "owner"]),
  admin: new Set<Role>(["developer", "owner", "admin"]),
} as const;

export type UnlockRole = keyof typeof ROLES_ALLOWED_TO_UNLOCK;

const DENIAL_REASONS: Record<UnlockRole, UnlockDenialReason> = {
  developer: "requires developer",
  owner: "requires owner",
  admin: "requires admin",
};

/**
 * Lowest role that may lift `entry`.
 *
 * - requiresDeveloperUnlock → developer
 * - protectedRole owner     → owner
 * - anything else           → admin
 */
export function requiredUnlockRole(entry: LockEntry): UnlockRole {
  if (entry.metadata.requiresDeveloperUnlock) {
    return "developer";
  }
  return entry.metadata.protectedRole === "owner" ? "owner" : "admin";
}

/** Why `requesterRole` may not lift `entry`, or null when it may. */
export function unlockDenialReason(
  requesterRole: Role,
  entry: LockEntry,
): UnlockDenialReason | null {
  const required = requiredUnlockRole(entry);
  return ROLES_ALLOWED_TO_UNLOCK[required].has(requesterRole) ? null : DENIAL_REASONS[required];
}

export class UnlockAuthorizer {
  private readonly roles: RoleSource;

  constructor(roles: RoleSource) {
    this.roles = roles;
  }

  /** Read-only check; never mutates the lock. */
  async canUnlock(requesterId: number, chatId: number, entry: LockEntry): Promise<boolean> {
    const role = await this.roles.resolve(requesterId, chatId);
    return unlockDenialReason(role, entry) === null;
  }
}
