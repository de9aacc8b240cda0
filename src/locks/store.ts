import type { Clock } from "../infra/ttl-cache.js";
import { KeyedLock } from "../infra/keyed-lock.js";
import { createSubsystemLogger } from "../logger.js";
import { scopeKey } from "../rbac/scope.js";
import { cloneLockEntry, type PersistenceStore } from "./persistence.js";
import type { LockEntry, LockStats } from "./types.js";

const log = createSubsystemLogger("lock-store");

const SNAPSHOT_KEY = "snapshot";

export const DEFAULT_MAX_LOCK_AGE_MS = 30 * 24 * 60 * 60_000;

export type LockStoreOptions = {
  persistence: PersistenceStore;
  now?: Clock;
};

/**
 * (chat, user) → lock entry, written through to persistence on every change.
 *
 * Each key holds its latest entry. Unlocking flips `active` off and keeps the
 * entry; a later `put` for the same key replaces it. Callers needing atomic
 * read-then-write sequences serialize them outside the store.
 *
 * `load` queues behind pending saves, and changes requested while it runs
 * wait for it and apply on top of the loaded snapshot.
 */
export class LockStore {
  private readonly entries = new Map<string, LockEntry>();
  private readonly persistence: PersistenceStore;
  private readonly saves = new KeyedLock();
  private readonly now: Clock;
  private loading: Promise<number> | undefined;

  constructor(options: LockStoreOptions) {
    this.persistence = options.persistence;
    this.now = options.now ?? Date.now;
  }

  /** Replace in-memory state with the persisted snapshot. Returns the number of active locks. */
  async load(): Promise<number> {
    const loading = this.saves.run(SNAPSHOT_KEY, () => this.hydrate());
    this.loading = loading;
    try {
      return await loading;
    } finally {
      if (this.loading === loading) {
        this.loading = undefined;
      }
    }
  }

  async put(entry: LockEntry): Promise<LockEntry> {
    await this.whenLoaded();
    const stored = cloneLockEntry(entry);
    this.entries.set(scopeKey(entry.chatId, entry.userId), stored);
    await this.persist();
    return cloneLockEntry(stored);
  }

  get(chatId: number, userId: number): LockEntry | undefined {
    const entry = this.entries.get(scopeKey(chatId, userId));
    return entry ? cloneLockEntry(entry) : undefined;
  }

  isLocked(chatId: number, userId: number): boolean {
    return this.entries.get(scopeKey(chatId, userId))?.active === true;
  }

  /** Mark the active lock inactive. Returns the updated entry, or undefined if none was active. */
  async deactivate(chatId: number, userId: number, by: number): Promise<LockEntry | undefined> {
    await this.whenLoaded();
    const entry = this.entries.get(scopeKey(chatId, userId));
    if (!entry?.active) {
      return undefined;
    }
    this.markInactive(entry, by);
    await this.persist();
    return cloneLockEntry(entry);
  }

  /** Active locks in a chat, newest first. */
  listActive(chatId: number): LockEntry[] {
    return [...this.entries.values()]
      .filter((entry) => entry.active && entry.chatId === chatId)
      .sort((a, b) => b.metadata.createdAt - a.metadata.createdAt)
      .map(cloneLockEntry);
  }

  /**
   * Deactivate active locks in a chat, optionally only those matching `filter`.
   * Returns how many were lifted.
   */
  async deactivateChat(
    chatId: number,
    by: number,
    filter?: (entry: LockEntry) => boolean,
  ): Promise<number> {
    await this.whenLoaded();
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.active && entry.chatId === chatId && (!filter || filter(entry))) {
        this.markInactive(entry, by);
        count += 1;
      }
    }
    if (count > 0) {
      await this.persist();
      log.info(`Cleared ${count} locks in chat ${chatId}`);
    }
    return count;
  }

  /**
   * Deactivate active locks older than `maxAgeMs`, except those that need a
   * developer to lift them. Returns how many were lifted.
   */
  async pruneOlderThan(maxAgeMs: number = DEFAULT_MAX_LOCK_AGE_MS, by = 0): Promise<number> {
    await this.whenLoaded();
    const cutoff = this.now() - maxAgeMs;
    let count = 0;
    for (const entry of this.entries.values()) {
      if (
        entry.active &&
        !entry.metadata.requiresDeveloperUnlock &&
        entry.metadata.createdAt < cutoff
      ) {
        this.markInactive(entry, by);
        count += 1;
      }
    }
    if (count > 0) {
      await this.persist();
      log.info(`Pruned ${count} locks older than ${maxAgeMs}ms`);
    }
    return count;
  }

  stats(): LockStats {
    const chats = new Set<number>();
    const chatsWithLocks = new Set<number>();
    let totalLocked = 0;
    for (const entry of this.entries.values()) {
      chats.add(entry.chatId);
      if (entry.active) {
        totalLocked += 1;
        chatsWithLocks.add(entry.chatId);
      }
    }
    return { totalLocked, chatsWithLocks: chatsWithLocks.size, totalChats: chats.size };
  }

  /** Resolves once any in-flight `load` has finished. */
  async whenLoaded(): Promise<void> {
    if (this.loading) {
      await this.loading;
    }
  }

  private async hydrate(): Promise<number> {
    let loaded: LockEntry[];
    try {
      loaded = await this.persistence.loadLocks();
    } catch (err) {
      log.error(`Failed to load locks, starting empty: ${String(err)}`);
      loaded = [];
    }
    this.entries.clear();
    for (const entry of loaded) {
      const key = scopeKey(entry.chatId, entry.userId);
      const existing = this.entries.get(key);
      // A snapshot should never hold two entries per key; prefer the active, then the newest.
      if (existing && !prefer(entry, existing)) {
        continue;
      }
      this.entries.set(key, cloneLockEntry(entry));
    }
    const active = this.countActive();
    log.info(`Loaded ${active} active locks (${this.entries.size} entries)`);
    return active;
  }

  private markInactive(entry: LockEntry, by: number): void {
    entry.active = false;
    entry.unlockedAt = this.now();
    entry.unlockedBy = by;
  }

  private countActive(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.active) {
        count += 1;
      }
    }
    return count;
  }

  private async persist(): Promise<void> {
    await this.saves.run(SNAPSHOT_KEY, async () => {
      try {
        await this.persistence.saveLocks([...this.entries.values()]);
      } catch (err) {
        log.error(`Failed to save lock snapshot: ${String(err)}`);
      }
    });
  }
}

function prefer(candidate: LockEntry, existing: LockEntry): boolean {
  if (candidate.active !== existing.active) {
    return candidate.active;
  }
  return candidate.metadata.createdAt >= existing.metadata.createdAt;
}
