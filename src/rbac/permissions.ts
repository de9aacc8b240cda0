import type { Permission, PermissionSet, Role } from "./types.js";

/** Permissions granted to each role. */
const ROLE_PERMISSIONS: Record<Role, ReadonlySet<Permission>> = {
  developer: new Set(["ownerCommands", "adminCommands", "publicCommands", "bypassAllChecks"]),
  owner: new Set(["ownerCommands", "adminCommands", "publicCommands", "bypassAllChecks"]),
  admin: new Set(["adminCommands", "publicCommands"]),
  user: new Set(["publicCommands"]),
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].has(permission);
}

/**
 * Full capability flags for a role.
 */
export function permissionsFor(role: Role): PermissionSet {
  return {
    ownerCommands: hasPermission(role, "ownerCommands"),
    adminCommands: hasPermission(role, "adminCommands"),
    publicCommands: hasPermission(role, "publicCommands"),
    bypassAllChecks: hasPermission(role, "bypassAllChecks"),
  };
}
