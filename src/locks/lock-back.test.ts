import { beforeEach, describe, expect, it, vi } from "vitest";
import { CHAT, OTHER_CHAT, createRoleSource } from "../__tests__/fixtures.js";
import { ROLES, type Role } from "../rbac/types.js";
import {
  DEFAULT_LOCK_REASON,
  DEVELOPER_LOCK_BACK_REASON,
  LockBackEngine,
  OWNER_LOCK_BACK_REASON,
  decideLock,
} from "./lock-back.js";
import { MemoryPersistenceStore } from "./persistence.js";
import { LockStore } from "./store.js";
import type { LockResult } from "./types.js";

// Two members per role so every issuer/target role pair has distinct ids.
const MEMBERS: Record<Role, [number, number]> = {
  developer: [1, 11],
  owner: [2, 12],
  admin: [3, 13],
  user: [4, 14],
};

const ROLE_OF: Record<number, Role> = {
  1: "developer",
  11: "developer",
  2: "owner",
  12: "owner",
  3: "admin",
  13: "admin",
  4: "user",
  14: "user",
};

type Expected = "locked" | "noop" | "back:developer" | "back:owner";

const MATRIX: Array<[Role, Role, Expected]> = [
  ["developer", "developer", "noop"],
  ["developer", "owner", "locked"],
  ["developer", "admin", "locked"],
  ["developer", "user", "locked"],
  ["owner", "developer", "back:developer"],
  ["owner", "owner", "locked"],
  ["owner", "admin", "locked"],
  ["owner", "user", "locked"],
  ["admin", "developer", "back:developer"],
  ["admin", "owner", "back:owner"],
  ["admin", "admin", "locked"],
  ["admin", "user", "locked"],
  ["user", "developer", "back:developer"],
  ["user", "owner", "back:owner"],
  ["user", "admin", "locked"],
  ["user", "user", "locked"],
];

function summarize(result: LockResult): Expected {
  switch (result.kind) {
    case "locked":
      return "locked";
    case "noop":
      return "noop";
    case "locked-back":
      return result.protectedRole === "developer" ? "back:developer" : "back:owner";
  }
}

describe("decideLock", () => {
  it.each(MATRIX)("issuer %s → target %s: %s", (issuerRole, targetRole, expected) => {
    const decision = decideLock({
      issuerId: MEMBERS[issuerRole][0],
      targetId: MEMBERS[targetRole][1],
      issuerRole,
      targetRole,
    });
    const summary =
      decision.action === "lock-back"
        ? `back:${decision.protectedRole}`
        : decision.action === "lock-target"
          ? "locked"
          : "noop";
    expect(summary).toBe(expected);
  });

  it("ignores self-targeting for every role", () => {
    for (const role of ROLES) {
      expect(
        decideLock({ issuerId: 9, targetId: 9, issuerRole: role, targetRole: role }),
      ).toEqual({ action: "noop", reason: "self-target" });
    }
  });

  it("reports developer immunity for developer-on-developer requests", () => {
    expect(
      decideLock({ issuerId: 1, targetId: 11, issuerRole: "developer", targetRole: "developer" }),
    ).toEqual({ action: "noop", reason: "developer-immune" });
  });
});

describe("LockBackEngine", () => {
  let now = 0;
  const clock = () => now;
  let persistence: MemoryPersistenceStore;
  let store: LockStore;
  let engine: LockBackEngine;

  beforeEach(() => {
    now = 5_000;
    persistence = new MemoryPersistenceStore({ now: clock });
    store = new LockStore({ persistence, now: clock });
    engine = new LockBackEngine({ roles: createRoleSource(ROLE_OF), store, now: clock });
  });

  it.each(MATRIX)("issuer %s → target %s: %s", async (issuerRole, targetRole, expected) => {
    const issuer = MEMBERS[issuerRole][0];
    const target = MEMBERS[targetRole][1];
    const result = await engine.requestLock(CHAT, issuer, target, "flooding");
    expect(summarize(result)).toBe(expected);

    const developerIds = [...MEMBERS.developer];
    for (const entry of store.listActive(CHAT)) {
      expect(developerIds).not.toContain(entry.userId);
    }
  });

  it("locks the issuer back for targeting a developer", async () => {
    const result = await engine.requestLock(CHAT, 2, 1, "because");
    expect(result).toEqual({
      kind: "locked-back",
      issuer: 2,
      protectedRole: "developer",
      entry: {
        chatId: CHAT,
        userId: 2,
        active: true,
        reason: DEVELOPER_LOCK_BACK_REASON,
        issuedBy: 2,
        metadata: {
          requiresDeveloperUnlock: true,
          protectedRole: "developer",
          protectedUserId: 1,
          createdAt: 5_000,
        },
      },
    });
    expect(store.get(CHAT, 1)).toBeUndefined();
    expect(store.isLocked(CHAT, 2)).toBe(true);
  });

  it("locks an admin back for targeting the owner", async () => {
    const result = await engine.requestLock(CHAT, 3, 2, "because");
    expect(result.kind).toBe("locked-back");
    const entry = store.get(CHAT, 3);
    expect(entry?.reason).toBe(OWNER_LOCK_BACK_REASON);
    expect(entry?.metadata).toEqual({
      requiresDeveloperUnlock: false,
      protectedRole: "owner",
      protectedUserId: 2,
      createdAt: 5_000,
    });
    expect(store.isLocked(CHAT, 2)).toBe(false);
  });

  it("records an ordinary lock with the given reason", async () => {
    const result = await engine.requestLock(CHAT, 3, 4, "  spamming links ");
    expect(result).toMatchObject({ kind: "locked", target: 4 });
    expect(store.get(CHAT, 4)).toEqual({
      chatId: CHAT,
      userId: 4,
      active: true,
      reason: "spamming links",
      issuedBy: 3,
      metadata: {
        requiresDeveloperUnlock: false,
        protectedRole: null,
        protectedUserId: null,
        createdAt: 5_000,
      },
    });
  });

  it("falls back to the default reason", async () => {
    await engine.requestLock(CHAT, 3, 4, "   ");
    expect(store.get(CHAT, 4)?.reason).toBe(DEFAULT_LOCK_REASON);
  });

  it("replaces rather than duplicates a repeated lock", async () => {
    await engine.requestLock(CHAT, 3, 4, "first");
    now = 6_000;
    await engine.requestLock(CHAT, 3, 4, "first");

    const active = store.listActive(CHAT);
    expect(active).toHaveLength(1);
    expect(active[0]?.metadata.createdAt).toBe(6_000);
  });

  it("keeps one active entry under concurrent requests against the same target", async () => {
    const results = await Promise.all([
      engine.requestLock(CHAT, 3, 4, "from admin"),
      engine.requestLock(CHAT, 13, 4, "from other admin"),
    ]);
    expect(results.map((r) => r.kind)).toEqual(["locked", "locked"]);
    const active = store.listActive(CHAT);
    expect(active).toHaveLength(1);
    expect(["from admin", "from other admin"]).toContain(active[0]?.reason);
  });

  it("keeps chats independent", async () => {
    await engine.requestLock(CHAT, 3, 4, "here");
    expect(store.isLocked(OTHER_CHAT, 4)).toBe(false);
  });

  it("writes every lock through to persistence", async () => {
    await engine.requestLock(CHAT, 3, 4, "spam");
    await engine.requestLock(CHAT, 3, 2, "oops");
    expect(persistence.saveCount).toBe(2);
    expect(persistence.getSnapshot()?.locks.map((l) => l.userId)).toEqual([4, 3]);
  });

  it("does nothing while the lock system is disabled", async () => {
    const disabled = new LockBackEngine({
      roles: createRoleSource(ROLE_OF),
      store,
      enabled: false,
      now: clock,
    });
    await expect(disabled.requestLock(CHAT, 3, 4, "spam")).resolves.toEqual({
      kind: "noop",
      reason: "lock-system-disabled",
    });
    expect(store.stats().totalLocked).toBe(0);
  });

  it("treats a target whose role cannot be resolved as a user", async () => {
    const roles = {
      resolve: vi.fn(async (userId: number): Promise<Role> => {
        if (userId === 99) {
          throw new Error("lookup exploded");
        }
        return ROLE_OF[userId] ?? "user";
      }),
    };
    const fragile = new LockBackEngine({ roles, store, now: clock });
    await expect(fragile.requestLock(CHAT, 3, 99, "spam")).resolves.toMatchObject({
      kind: "locked",
      target: 99,
    });
  });

  describe("when the target is already locked", () => {
    it("keeps a developer lock-back when an admin locks the same user", async () => {
      await engine.requestLock(CHAT, 4, 1, "oops");

      await expect(engine.requestLock(CHAT, 3, 4, "spam")).resolves.toEqual({
        kind: "noop",
        reason: "already-locked",
      });
      expect(store.get(CHAT, 4)?.metadata.requiresDeveloperUnlock).toBe(true);
      await expect(engine.requestUnlock(CHAT, 3, 4)).resolves.toEqual({
        kind: "denied",
        reason: "requires developer",
      });
    });

    it("keeps a developer lock-back when the same user then targets the owner", async () => {
      await engine.requestLock(CHAT, 4, 1, "oops");

      const result = await engine.requestLock(CHAT, 4, 2, "again");
      expect(result).toMatchObject({
        kind: "locked-back",
        issuer: 4,
        protectedRole: "owner",
        entry: {
          reason: DEVELOPER_LOCK_BACK_REASON,
          metadata: { requiresDeveloperUnlock: true, protectedRole: "developer", protectedUserId: 1 },
        },
      });
      await expect(engine.requestUnlock(CHAT, 2, 4)).resolves.toEqual({
        kind: "denied",
        reason: "requires developer",
      });
    });

    it("raises an owner lock-back to a developer one", async () => {
      await engine.requestLock(CHAT, 4, 2, "oops");
      now = 6_000;
      await engine.requestLock(CHAT, 4, 1, "again");

      expect(store.get(CHAT, 4)?.metadata).toEqual({
        requiresDeveloperUnlock: true,
        protectedRole: "developer",
        protectedUserId: 1,
        createdAt: 6_000,
      });
    });

    it("stops a user from replacing an admin's lock", async () => {
      await engine.requestLock(CHAT, 3, 4, "spam");
      await expect(engine.requestLock(CHAT, 14, 4, "mine now")).resolves.toEqual({
        kind: "noop",
        reason: "already-locked",
      });
      expect(store.get(CHAT, 4)).toMatchObject({ reason: "spam", issuedBy: 3 });
    });

    it("lets a developer replace a lock only a developer may lift", async () => {
      await engine.requestLock(CHAT, 4, 1, "oops");
      await expect(engine.requestLock(CHAT, 11, 4, "reset")).resolves.toMatchObject({
        kind: "locked",
        target: 4,
      });
      expect(store.get(CHAT, 4)).toMatchObject({
        reason: "reset",
        metadata: { requiresDeveloperUnlock: false, protectedRole: null },
      });
    });
  });

  describe("requestUnlock", () => {
    it("denies when there is no active lock", async () => {
      await expect(engine.requestUnlock(CHAT, 3, 4)).resolves.toEqual({
        kind: "denied",
        reason: "no active lock",
      });
    });

    it("lets only a developer lift a developer lock-back", async () => {
      await engine.requestLock(CHAT, 2, 1, "oops");

      await expect(engine.requestUnlock(CHAT, 12, 2)).resolves.toEqual({
        kind: "denied",
        reason: "requires developer",
      });
      expect(store.isLocked(CHAT, 2)).toBe(true);

      now = 7_000;
      const result = await engine.requestUnlock(CHAT, 11, 2);
      expect(result).toMatchObject({
        kind: "unlocked",
        entry: { userId: 2, active: false, unlockedAt: 7_000, unlockedBy: 11 },
      });
      expect(store.isLocked(CHAT, 2)).toBe(false);
      expect(store.get(CHAT, 2)?.reason).toBe(DEVELOPER_LOCK_BACK_REASON);
    });

    it("lets owner or developer lift an owner lock-back", async () => {
      await engine.requestLock(CHAT, 3, 2, "oops");
      await expect(engine.requestUnlock(CHAT, 13, 3)).resolves.toEqual({
        kind: "denied",
        reason: "requires owner",
      });
      await expect(engine.requestUnlock(CHAT, 2, 3)).resolves.toMatchObject({ kind: "unlocked" });
    });

    it("lets admins lift ordinary locks but not users", async () => {
      await engine.requestLock(CHAT, 3, 4, "spam");
      await expect(engine.requestUnlock(CHAT, 14, 4)).resolves.toEqual({
        kind: "denied",
        reason: "requires admin",
      });
      await expect(engine.requestUnlock(CHAT, 13, 4)).resolves.toMatchObject({
        kind: "unlocked",
      });
      await expect(engine.requestUnlock(CHAT, 13, 4)).resolves.toEqual({
        kind: "denied",
        reason: "no active lock",
      });
    });
  });

  describe("clearChat", () => {
    it("lifts only the locks the requester may lift", async () => {
      await engine.requestLock(CHAT, 3, 4, "spam");
      await engine.requestLock(CHAT, 13, 1, "oops");
      await engine.requestLock(CHAT, 14, 2, "oops");

      await expect(engine.clearChat(CHAT, 3)).resolves.toBe(1);
      expect(store.isLocked(CHAT, 4)).toBe(false);
      expect(store.isLocked(CHAT, 13)).toBe(true);
      expect(store.isLocked(CHAT, 14)).toBe(true);

      await expect(engine.clearChat(CHAT, 1)).resolves.toBe(2);
      expect(store.listActive(CHAT)).toEqual([]);
    });
  });
});
