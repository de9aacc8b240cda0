/**
 * Authorization engine: the entry point a command dispatcher talks to.
 *
 * Wires role resolution, the permission policy, lock-back decisions and the
 * lock store around one injected clock and config. Every method reports its
 * outcome as a value; none of them throw for authorization or provider failures.
 */
import type { GroupwardenConfig } from "./config/config.js";
import type { Clock } from "./infra/ttl-cache.js";
import { LockBackEngine } from "./locks/lock-back.js";
import { JsonFilePersistenceStore, type PersistenceStore } from "./locks/persistence.js";
import { DEFAULT_MAX_LOCK_AGE_MS, LockStore } from "./locks/store.js";
import type { LockEntry, LockResult, LockStats, UnlockResult } from "./locks/types.js";
import { UnlockAuthorizer } from "./locks/unlock.js";
import { createSubsystemLogger } from "./logger.js";
import { AdminStatusLookup } from "./rbac/admin-status.js";
import { gateCommand, type CommandGateResult } from "./rbac/command-gates.js";
import { permissionsFor } from "./rbac/permissions.js";
import { RoleResolver } from "./rbac/resolve.js";
import {
  buildStaticRoleDirectory,
  resolveStaticRole,
  type StaticRoleDirectory,
} from "./rbac/static-roles.js";
import type {
  AdminStatusProvider,
  CacheScope,
  CommandTier,
  PermissionSet,
  Role,
} from "./rbac/types.js";

const log = createSubsystemLogger("engine");

export type GroupwardenEngineOptions = {
  config: GroupwardenConfig;
  provider: AdminStatusProvider;
  /** Defaults to a JSON file at `config.lockDataPath` */
  persistence?: PersistenceStore;
  now?: Clock;
};

export class GroupwardenEngine {
  readonly config: GroupwardenConfig;
  private readonly directory: StaticRoleDirectory;
  private readonly adminLookup: AdminStatusLookup;
  private readonly resolver: RoleResolver;
  private readonly store: LockStore;
  private readonly lockBack: LockBackEngine;
  private readonly unlockAuthorizer: UnlockAuthorizer;

  constructor(options: GroupwardenEngineOptions) {
    const { config, provider } = options;
    const now = options.now ?? Date.now;
    this.config = config;
    this.directory = buildStaticRoleDirectory(config);
    this.adminLookup = new AdminStatusLookup({
      directory: this.directory,
      provider,
      adminChatIds: config.adminChatIds,
      ttlMs: config.adminCacheTtlMs,
      timeoutMs: config.adminLookupTimeoutMs,
      maxEntries: config.cacheMaxEntries,
      now,
    });
    this.resolver = new RoleResolver({
      directory: this.directory,
      adminLookup: this.adminLookup,
      ttlMs: config.roleCacheTtlMs,
      maxEntries: config.cacheMaxEntries,
      now,
    });
    this.store = new LockStore({
      persistence: options.persistence ?? new JsonFilePersistenceStore(config.lockDataPath),
      now,
    });
    this.lockBack = new LockBackEngine({
      roles: this.resolver,
      store: this.store,
      enabled: config.enableLockSystem,
      now,
    });
    this.unlockAuthorizer = new UnlockAuthorizer(this.resolver);
  }

  /** Construct and hydrate locks from persistence. */
  static async create(options: GroupwardenEngineOptions): Promise<GroupwardenEngine> {
    const engine = new GroupwardenEngine(options);
    await engine.load();
    return engine;
  }

  async load(): Promise<number> {
    return await this.store.load();
  }

  // ── Roles & permissions ──────────────────────────────────────

  async resolveRole(userId: number, chatId: number): Promise<Role> {
    return await this.resolver.resolve(userId, chatId);
  }

  async isAdminInChat(userId: number, chatId: number): Promise<boolean> {
    return await this.adminLookup.isAdminInChat(userId, chatId);
  }

  permissionsFor(role: Role): PermissionSet {
    return permissionsFor(role);
  }

  async authorizeCommand(
    userId: number,
    chatId: number,
    tier: CommandTier,
  ): Promise<CommandGateResult> {
    const role = await this.resolver.resolve(userId, chatId);
    const result = gateCommand({
      role,
      tier,
      enablePublicCommands: this.config.enablePublicCommands,
      senderId: userId,
    });
    log.debug(
      `Command ${result.allowed ? "SUCCESS" : "DENIED"}: user=${userId} chat=${chatId} tier=${tier}`,
    );
    return result;
  }

  clearCache(scope: CacheScope): { roles: number; adminStatuses: number } {
    const cleared = this.resolver.clearCache(scope);
    log.debug(
      `Cleared ${cleared.roles} roles and ${cleared.adminStatuses} admin statuses (${scope.kind})`,
    );
    return cleared;
  }

  // ── Locks ────────────────────────────────────────────────────

  async requestLock(
    chatId: number,
    issuerId: number,
    targetId: number,
    reason?: string,
  ): Promise<LockResult> {
    return await this.lockBack.requestLock(chatId, issuerId, targetId, reason);
  }

  async requestUnlock(chatId: number, requesterId: number, targetId: number): Promise<UnlockResult> {
    return await this.lockBack.requestUnlock(chatId, requesterId, targetId);
  }

  async canUnlock(requesterId: number, chatId: number, entry: LockEntry): Promise<boolean> {
    return await this.unlockAuthorizer.canUnlock(requesterId, chatId, entry);
  }

  /**
   * Whether messages from this user should be suppressed. Developers are
   * never suppressed, even by a lock that predates their promotion.
   */
  isLocked(chatId: number, userId: number): boolean {
    if (!this.config.enableLockSystem) {
      return false;
    }
    if (resolveStaticRole(this.directory, userId) === "developer") {
      return false;
    }
    return this.store.isLocked(chatId, userId);
  }

  getLock(chatId: number, userId: number): LockEntry | undefined {
    return this.store.get(chatId, userId);
  }

  listLocks(chatId: number): LockEntry[] {
    return this.store.listActive(chatId);
  }

  lockStats(): LockStats {
    return this.store.stats();
  }

  async clearChatLocks(chatId: number, requesterId: number): Promise<number> {
    return await this.lockBack.clearChat(chatId, requesterId);
  }

  async pruneLocks(maxAgeMs: number = DEFAULT_MAX_LOCK_AGE_MS): Promise<number> {
    return await this.store.pruneOlderThan(maxAgeMs);
  }
}
