export { hasPermission, permissionsFor } from "./permissions.js";
export { RoleResolver, type RoleResolverOptions } from "./resolve.js";
export {
  AdminLookupError,
  AdminStatusLookup,
  type AdminLookupErrorKind,
  type AdminLookupOutcome,
  type AdminStatusLookupOptions,
} from "./admin-status.js";
export { gateCommand, type CommandDenialReason, type CommandGateResult } from "./command-gates.js";
export {
  buildStaticRoleDirectory,
  resolveStaticRole,
  type StaticRoleDirectory,
} from "./static-roles.js";
export { ROLES, ROLE_RANK, compareRoles, isRole, outranks } from "./types.js";
export type {
  AdminStatusProvider,
  CacheScope,
  CommandTier,
  Permission,
  PermissionSet,
  Role,
} from "./types.js";
