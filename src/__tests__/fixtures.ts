import { vi } from "vitest";
import type { GroupwardenConfig } from "../config/config.js";
import type { LockEntry } from "../locks/types.js";
import type { AdminStatusProvider, Role } from "../rbac/types.js";

export const CHAT = -1001;
export const OTHER_CHAT = -1002;

export const DEVELOPER = 1;
export const OWNER = 2;
export const ADMIN = 3;
export const USER = 4;
export const OTHER_ADMIN = 13;

export function testConfig(overrides: Partial<GroupwardenConfig> = {}): GroupwardenConfig {
  return {
    developerIds: [DEVELOPER],
    ownerId: OWNER,
    adminChatIds: [],
    roleCacheTtlMs: 5 * 60_000,
    adminCacheTtlMs: 3 * 60_000,
    cacheMaxEntries: 1000,
    adminLookupTimeoutMs: 50,
    enableLockSystem: true,
    enablePublicCommands: true,
    lockDataPath: "unused.json",
    ...overrides,
  };
}

/** Provider answering from a fixed admin list: entries are `${chatId}:${userId}`. */
export function createFakeProvider(admins: string[] = [`${CHAT}:${ADMIN}`, `${CHAT}:${OTHER_ADMIN}`]) {
  const adminSet = new Set(admins);
  const isAdmin = vi.fn(async (chatId: number, userId: number) =>
    adminSet.has(`${chatId}:${userId}`),
  );
  const provider: AdminStatusProvider = { isAdmin };
  return { provider, isAdmin };
}

/** Role source backed by a plain map; unknown ids are users. */
export function createRoleSource(roles: Record<number, Role>) {
  return {
    resolve: vi.fn(async (userId: number): Promise<Role> => roles[userId] ?? "user"),
  };
}

export function createDeferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function makeLockEntry(overrides: Partial<LockEntry> = {}): LockEntry {
  return {
    chatId: CHAT,
    userId: USER,
    active: true,
    reason: "spam",
    issuedBy: ADMIN,
    metadata: {
      requiresDeveloperUnlock: false,
      protectedRole: null,
      protectedUserId: null,
      createdAt: 1_000,
    },
    ...overrides,
  };
}
