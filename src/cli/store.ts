import { resolveDatabasePath } from "../config/paths.js";
import { isPlatform, type UserKey } from "../conversation/types.js";
import { StoreDB } from "../store/db.js";
import { SqliteConversationStore } from "../store/sqlite-store.js";

export function openStore(): SqliteConversationStore {
  return new SqliteConversationStore(new StoreDB(resolveDatabasePath()));
}

export function parseUserKey(platform: string, platformUserId: string): UserKey | null {
  return isPlatform(platform) ? { platform, platformUserId } : null;
}

export function formatInstant(ms: number | null): string {
  return ms === null ? "-" : new Date(ms).toISOString();
}
