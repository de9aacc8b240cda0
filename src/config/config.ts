/**
 * Engine configuration: static role membership, cache tuning and feature switches.
 *
 * Loaded from environment variables by `loadConfigFromEnv` or supplied as an
 * object to `validateConfig`. Both paths go through the same zod schema.
 */
import { z } from "zod";
import { DEFAULT_CACHE_MAX_ENTRIES } from "../infra/ttl-cache.js";

// ── Defaults ───────────────────────────────────────────────────

export const DEFAULT_ROLE_CACHE_TTL_MS = 5 * 60_000;
export const DEFAULT_ADMIN_CACHE_TTL_MS = 3 * 60_000;
export const DEFAULT_ADMIN_LOOKUP_TIMEOUT_MS = 5_000;
export const DEFAULT_LOCK_DATA_PATH = "data/locked_users.json";

// ── Zod Schema ─────────────────────────────────────────────────

const ChatIdSchema = z.number().int().safe();
const UserIdSchema = z.number().int().safe().positive();

export const GroupwardenConfigSchema = z
  .object({
    /** Founders: highest role, immune to locks */
    developerIds: z.array(UserIdSchema).min(1, "At least one developer id is required"),
    /** Bot owner, protected from everyone but developers */
    ownerId: z.number().int().safe().positive("Owner id is required"),
    /** Chats in which every member counts as admin */
    adminChatIds: z.array(ChatIdSchema).default([]),
    roleCacheTtlMs: z.number().int().positive().default(DEFAULT_ROLE_CACHE_TTL_MS),
    adminCacheTtlMs: z.number().int().positive().default(DEFAULT_ADMIN_CACHE_TTL_MS),
    cacheMaxEntries: z.number().int().positive().default(DEFAULT_CACHE_MAX_ENTRIES),
    adminLookupTimeoutMs: z.number().int().positive().default(DEFAULT_ADMIN_LOOKUP_TIMEOUT_MS),
    enableLockSystem: z.boolean().default(true),
    enablePublicCommands: z.boolean().default(true),
    lockDataPath: z.string().min(1).default(DEFAULT_LOCK_DATA_PATH),
  })
  .strict();

export type GroupwardenConfig = z.infer<typeof GroupwardenConfigSchema>;
export type GroupwardenConfigInput = z.input<typeof GroupwardenConfigSchema>;

// ── Validation ─────────────────────────────────────────────────

export type ConfigValidationResult =
  | { success: true; data: GroupwardenConfig }
  | { success: false; error: string };

export function validateConfig(input: unknown): ConfigValidationResult {
  const parseResult = GroupwardenConfigSchema.safeParse(input);
  if (!parseResult.success) {
    const formatted = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return { success: false, error: formatted };
  }
  return { success: true, data: parseResult.data };
}

// ── Environment ────────────────────────────────────────────────

function envList(raw: string | undefined): number[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number(part));
}

function envNumber(raw: string | undefined): number | undefined {
  const trimmed = raw?.trim();
  return trimmed ? Number(trimmed) : undefined;
}

const TRUE_FLAGS = new Set(["true", "1", "yes", "on"]);
const FALSE_FLAGS = new Set(["false", "0", "no", "off"]);

// Unrecognized values pass through as strings so the schema rejects them.
function envFlag(raw: string | undefined): boolean | string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }
  const normalized = trimmed.toLowerCase();
  if (TRUE_FLAGS.has(normalized)) {
    return true;
  }
  if (FALSE_FLAGS.has(normalized)) {
    return false;
  }
  return trimmed;
}

/**
 * Build config from environment variables:
 * DEVELOPER_IDS, OWNER_ID, ADMIN_CHAT_IDS (comma separated ids),
 * ROLE_CACHE_TTL_MS, ADMIN_CACHE_TTL_MS, CACHE_MAX_ENTRIES, ADMIN_LOOKUP_TIMEOUT_MS,
 * ENABLE_LOCK_SYSTEM, ENABLE_PUBLIC_COMMANDS, LOCK_DATA_PATH.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigValidationResult {
  const lockDataPath = env.LOCK_DATA_PATH?.trim();
  return validateConfig({
    developerIds: envList(env.DEVELOPER_IDS),
    ownerId: envNumber(env.OWNER_ID) ?? 0,
    adminChatIds: envList(env.ADMIN_CHAT_IDS),
    roleCacheTtlMs: envNumber(env.ROLE_CACHE_TTL_MS),
    adminCacheTtlMs: envNumber(env.ADMIN_CACHE_TTL_MS),
    cacheMaxEntries: envNumber(env.CACHE_MAX_ENTRIES),
    adminLookupTimeoutMs: envNumber(env.ADMIN_LOOKUP_TIMEOUT_MS),
    enableLockSystem: envFlag(env.ENABLE_LOCK_SYSTEM),
    enablePublicCommands: envFlag(env.ENABLE_PUBLIC_COMMANDS),
    lockDataPath: lockDataPath || undefined,
  });
}
