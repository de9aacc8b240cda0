import type { CacheScope } from "./types.js";

/** Cache key for a (chat, user) pair. */
export function scopeKey(chatId: number, userId: number): string {
  return `${chatId}:${userId}`;
}

export function parseScopeKey(key: string): { chatId: number; userId: number } | null {
  const colonIdx = key.lastIndexOf(":");
  if (colonIdx <= 0) {
    return null;
  }
  const chatId = Number(key.slice(0, colonIdx));
  const userId = Number(key.slice(colonIdx + 1));
  if (!Number.isSafeInteger(chatId) || !Number.isSafeInteger(userId)) {
    return null;
  }
  return { chatId, userId };
}

export function matchesScope(key: string, scope: CacheScope): boolean {
  if (scope.kind === "all") {
    return true;
  }
  const parsed = parseScopeKey(key);
  if (!parsed) {
    return false;
  }
  return scope.kind === "chat" ? parsed.chatId === scope.chatId : parsed.userId === scope.userId;
}
