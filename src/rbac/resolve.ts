import { TtlCache, type Clock } from "../infra/ttl-cache.js";
import { createSubsystemLogger } from "../logger.js";
import type { AdminStatusLookup } from "./admin-status.js";
import { matchesScope, scopeKey } from "./scope.js";
import { resolveStaticRole, type StaticRoleDirectory } from "./static-roles.js";
import type { CacheScope, Role } from "./types.js";

const log = createSubsystemLogger("rbac");

export type RoleResolverOptions = {
  directory: StaticRoleDirectory;
  adminLookup: AdminStatusLookup;
  ttlMs: number;
  maxEntries?: number;
  now?: Clock;
};

/**
 * Resolve the effective role of a user in a chat.
 *
 * Priority order:
 * 1. configured developer ids → developer
 * 2. configured owner id → owner
 * 3. cached role for (user, chat)
 * 4. admin-status lookup → admin, otherwise user
 *
 * Developer and owner are never cached. A role derived from a failed admin
 * lookup is returned but not cached, so the provider is retried next time.
 */
export class RoleResolver {
  private readonly directory: StaticRoleDirectory;
  private readonly adminLookup: AdminStatusLookup;
  private readonly ttlMs: number;
  private readonly cache: TtlCache<Role>;
  private generation = 0;

  constructor(options: RoleResolverOptions) {
    this.directory = options.directory;
    this.adminLookup = options.adminLookup;
    this.ttlMs = options.ttlMs;
    this.cache = new TtlCache<Role>({ maxEntries: options.maxEntries, now: options.now });
  }

  async resolve(userId: number, chatId: number): Promise<Role> {
    const staticRole = resolveStaticRole(this.directory, userId);
    if (staticRole) {
      return staticRole;
    }

    const key = scopeKey(chatId, userId);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const generation = this.generation;
    const outcome = await this.adminLookup.lookup(userId, chatId);
    const role: Role = outcome.isAdmin ? "admin" : "user";
    if (outcome.definitive && generation === this.generation) {
      this.cache.set(key, role, this.ttlMs);
    }
    log.debug(`resolved user ${userId} in chat ${chatId} as ${role}`);
    return role;
  }

  /** Drop cached roles and admin statuses within the scope. */
  clearCache(scope: CacheScope): { roles: number; adminStatuses: number } {
    this.generation += 1;
    const roles = this.cache.clear((key) => matchesScope(key, scope));
    const adminStatuses = this.adminLookup.clear(scope);
    return { roles, adminStatuses };
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}
