/**
 * Cached admin-status lookups against the chat transport.
 *
 * Developers and the owner are granted admin everywhere without touching the
 * cache or the provider. Configured admin chats grant every member. Anything
 * else goes through a short-lived cache in front of the provider; concurrent
 * misses for the same pair share one provider call.
 *
 * A provider failure or timeout answers `false` and is never cached, so the
 * next lookup asks the provider again.
 */
import { TtlCache, type Clock } from "../infra/ttl-cache.js";
import { TimeoutError, runWithTimeout } from "../infra/timeout.js";
import { createSubsystemLogger } from "../logger.js";
import { matchesScope, scopeKey } from "./scope.js";
import { resolveStaticRole, type StaticRoleDirectory } from "./static-roles.js";
import type { AdminStatusProvider, CacheScope } from "./types.js";

const log = createSubsystemLogger("admin-status");

export type AdminLookupErrorKind = "timeout" | "unavailable";

export class AdminLookupError extends Error {
  readonly kind: AdminLookupErrorKind;
  readonly chatId: number;
  readonly userId: number;

  constructor(params: {
    kind: AdminLookupErrorKind;
    chatId: number;
    userId: number;
    cause: unknown;
  }) {
    const detail = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super(`Admin status lookup ${params.kind} for user ${params.userId} in chat ${params.chatId}: ${detail}`, {
      cause: params.cause,
    });
    this.name = "AdminLookupError";
    this.kind = params.kind;
    this.chatId = params.chatId;
    this.userId = params.userId;
  }
}

/**
 * `definitive` is false when the answer is the fail-safe default after a
 * provider failure; callers must not cache anything derived from it.
 */
export type AdminLookupOutcome = {
  isAdmin: boolean;
  definitive: boolean;
};

export type AdminStatusLookupOptions = {
  directory: StaticRoleDirectory;
  provider: AdminStatusProvider;
  adminChatIds?: Iterable<number>;
  ttlMs: number;
  timeoutMs: number;
  maxEntries?: number;
  now?: Clock;
};

export class AdminStatusLookup {
  private readonly directory: StaticRoleDirectory;
  private readonly provider: AdminStatusProvider;
  private readonly adminChatIds: ReadonlySet<number>;
  private readonly ttlMs: number;
  private readonly timeoutMs: number;
  private readonly cache: TtlCache<boolean>;
  private readonly inflight = new Map<string, Promise<AdminLookupOutcome>>();
  // Bumped on every clear so in-flight lookups started before it don't repopulate the cache.
  private generation = 0;

  constructor(options: AdminStatusLookupOptions) {
    this.directory = options.directory;
    this.provider = options.provider;
    this.adminChatIds = new Set(options.adminChatIds ?? []);
    this.ttlMs = options.ttlMs;
    this.timeoutMs = options.timeoutMs;
    this.cache = new TtlCache<boolean>({ maxEntries: options.maxEntries, now: options.now });
  }

  async isAdminInChat(userId: number, chatId: number): Promise<boolean> {
    const outcome = await this.lookup(userId, chatId);
    return outcome.isAdmin;
  }

  async lookup(userId: number, chatId: number): Promise<AdminLookupOutcome> {
    if (resolveStaticRole(this.directory, userId)) {
      return { isAdmin: true, definitive: true };
    }
    if (this.adminChatIds.has(chatId)) {
      return { isAdmin: true, definitive: true };
    }

    const key = scopeKey(chatId, userId);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return { isAdmin: cached, definitive: true };
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return await pending;
    }
    const query = this.queryProvider(key, userId, chatId).finally(() => {
      if (this.inflight.get(key) === query) {
        this.inflight.delete(key);
      }
    });
    this.inflight.set(key, query);
    return await query;
  }

  clear(scope: CacheScope): number {
    this.generation += 1;
    for (const key of [...this.inflight.keys()]) {
      if (matchesScope(key, scope)) {
        this.inflight.delete(key);
      }
    }
    return this.cache.clear((key) => matchesScope(key, scope));
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async queryProvider(
    key: string,
    userId: number,
    chatId: number,
  ): Promise<AdminLookupOutcome> {
    const generation = this.generation;
    try {
      const isAdmin = await runWithTimeout("admin status lookup", this.timeoutMs, (signal) =>
        this.provider.isAdmin(chatId, userId, { signal }),
      );
      if (generation === this.generation) {
        this.cache.set(key, isAdmin, this.ttlMs);
      }
      return { isAdmin, definitive: true };
    } catch (err) {
      const lookupError = new AdminLookupError({
        kind: err instanceof TimeoutError ? "timeout" : "unavailable",
        chatId,
        userId,
        cause: err,
      });
      log.warn(`${lookupError.message}; treating as non-admin`);
      return { isAdmin: false, definitive: false };
    }
  }
}
