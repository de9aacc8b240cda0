import type { Role } from "./types.js";

/** Globally configured roles; membership never depends on the chat. */
export type StaticRoleDirectory = {
  developerIds: ReadonlySet<number>;
  ownerId: number;
};

export function buildStaticRoleDirectory(params: {
  developerIds: Iterable<number>;
  ownerId: number;
}): StaticRoleDirectory {
  return { developerIds: new Set(params.developerIds), ownerId: params.ownerId };
}

/**
 * Developer membership is checked before owner, so an id configured as both
 * resolves to developer.
 */
export function resolveStaticRole(
  directory: StaticRoleDirectory,
  userId: number,
): Extract<Role, "developer" | "owner"> | null {
  if (directory.developerIds.has(userId)) {
    return "developer";
  }
  if (directory.ownerId > 0 && userId === directory.ownerId) {
    return "owner";
  }
  return null;
}
