/**
 * Durable lock snapshots.
 *
 * The store behind `PersistenceStore` owns the storage format; the engine
 * only hands it whole snapshots. The JSON file format is versioned:
 *
 *   { "version": 1, "savedAt": <epoch ms>, "locks": [LockEntry, ...] }
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { ROLES } from "../rbac/types.js";
import type { LockEntry } from "./types.js";

export type PersistenceStore = {
  loadLocks(): Promise<LockEntry[]>;
  saveLocks(locks: readonly LockEntry[]): Promise<void>;
};

// ── Zod Schemas ────────────────────────────────────────────────

export const LOCK_SNAPSHOT_VERSION = 1;

const IdSchema = z.number().int().safe();

export const LockEntrySchema = z.object({
  chatId: IdSchema,
  userId: IdSchema,
  active: z.boolean(),
  reason: z.string(),
  issuedBy: IdSchema,
  metadata: z.object({
    requiresDeveloperUnlock: z.boolean(),
    protectedRole: z.enum(ROLES).nullable(),
    protectedUserId: IdSchema.nullable(),
    createdAt: z.number().nonnegative(),
  }),
  unlockedAt: z.number().nonnegative().optional(),
  unlockedBy: IdSchema.optional(),
});

export const LockSnapshotSchema = z.object({
  version: z.literal(LOCK_SNAPSHOT_VERSION),
  savedAt: z.number().nonnegative(),
  locks: z.array(LockEntrySchema),
});

export type LockSnapshot = z.infer<typeof LockSnapshotSchema>;

export function buildLockSnapshot(locks: readonly LockEntry[], savedAt: number): LockSnapshot {
  return { version: LOCK_SNAPSHOT_VERSION, savedAt, locks: locks.map(cloneLockEntry) };
}

/** Validate a decoded snapshot; throws with the offending paths on mismatch. */
export function parseLockSnapshot(input: unknown): LockSnapshot {
  const parseResult = LockSnapshotSchema.safeParse(input);
  if (!parseResult.success) {
    const formatted = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid lock snapshot: ${formatted}`);
  }
  return parseResult.data;
}

export function cloneLockEntry(entry: LockEntry): LockEntry {
  return { ...entry, metadata: { ...entry.metadata } };
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ── Stores ─────────────────────────────────────────────────────

let tmpSequence = 0;

/** Snapshot kept in a JSON file, replaced atomically via rename. */
export class JsonFilePersistenceStore implements PersistenceStore {
  readonly filePath: string;
  private readonly now: () => number;

  constructor(filePath: string, options: { now?: () => number } = {}) {
    this.filePath = path.resolve(filePath);
    this.now = options.now ?? Date.now;
  }

  async loadLocks(): Promise<LockEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFileError(err)) {
        return [];
      }
      throw err;
    }
    const decoded: unknown = JSON.parse(raw);
    return parseLockSnapshot(decoded).locks;
  }

  async saveLocks(locks: readonly LockEntry[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const snapshot = buildLockSnapshot(locks, this.now());
    tmpSequence += 1;
    const tmpPath = `${this.filePath}.${process.pid}.${tmpSequence}.tmp`;
    try {
      await fs.writeFile(tmpPath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf-8");
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }
}

/** Keeps the last snapshot in memory. */
export class MemoryPersistenceStore implements PersistenceStore {
  private snapshot: LockSnapshot | null;
  private readonly now: () => number;
  saveCount = 0;

  constructor(options: { initial?: readonly LockEntry[]; now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
    this.snapshot = options.initial ? buildLockSnapshot(options.initial, this.now()) : null;
  }

  async loadLocks(): Promise<LockEntry[]> {
    return this.snapshot ? this.snapshot.locks.map(cloneLockEntry) : [];
  }

  async saveLocks(locks: readonly LockEntry[]): Promise<void> {
    this.snapshot = buildLockSnapshot(locks, this.now());
    this.saveCount += 1;
  }

  getSnapshot(): LockSnapshot | null {
    return this.snapshot;
  }
}
