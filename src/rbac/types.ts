/**
 * Roles a chat member can hold, highest first.
 *
 * - developer — statically configured founders; immune to locks, bypass every check
 * - owner     — the statically configured bot owner; only developers may lock them
 * - admin     — chat-scoped, derived from the transport's admin status
 * - user      — everyone else
 */
export const ROLES = ["developer", "owner", "admin", "user"] as const;

export type Role = (typeof ROLES)[number];

/** Higher rank wins. */
export const ROLE_RANK: Record<Role, number> = {
  developer: 3,
  owner: 2,
  admin: 1,
  user: 0,
};

/**
 * Named permissions that can be checked at runtime.
 *
 * - ownerCommands    — owner-tier commands (bot configuration, global actions)
 * - adminCommands    — admin-tier commands (lock, unlock, moderation)
 * - publicCommands   — commands anyone may run
 * - bypassAllChecks  — skip per-command gates entirely
 */
export type Permission = "ownerCommands" | "adminCommands" | "publicCommands" | "bypassAllChecks";

export type PermissionSet = Record<Permission, boolean>;

/** Command tiers as the dispatcher classifies them. */
export type CommandTier = "owner" | "admin" | "public";

/** Scope for cache invalidation. */
export type CacheScope =
  | { kind: "all" }
  | { kind: "chat"; chatId: number }
  | { kind: "user"; userId: number };

/** Transport-side signal that tells whether a member administers a chat. */
export type AdminStatusProvider = {
  isAdmin(chatId: number, userId: number, opts: { signal: AbortSignal }): Promise<boolean>;
};

export function compareRoles(a: Role, b: Role): number {
  return ROLE_RANK[a] - ROLE_RANK[b];
}

export function outranks(a: Role, b: Role): boolean {
  return compareRoles(a, b) > 0;
}

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLES.some((role) => role === value);
}
