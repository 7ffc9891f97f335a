import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { NormalizedMessage } from "../../src/channels/adapter.js";
import { resolveDatabasePath } from "../../src/config/paths.js";
import { parseConfig } from "../../src/config/schema.js";
import type { AmicusConfig } from "../../src/config/types.js";
import type { StoredMessage, UserRecord } from "../../src/conversation/types.js";
import { StoreDB } from "../../src/store/db.js";
import { SqliteConversationStore } from "../../src/store/sqlite-store.js";

/** Wall-clock instant in Europe/Berlin during winter time (UTC+1). */
export function berlinWinter(day: number, hour: number, minute = 0): number {
  return Date.UTC(2025, 0, day, hour - 1, minute);
}

export const HOUR_MS = 3_600_000;

let messageCounter = 0;

export function makeMessage(overrides: Partial<NormalizedMessage> = {}): NormalizedMessage {
  messageCounter++;
  return {
    id: `msg-${messageCounter}`,
    platform: "telegram",
    platformUserId: "user-1",
    username: "alice",
    text: "Hello",
    timestamp: berlinWinter(15, 12),
    raw: {},
    ...overrides,
  };
}

export function makeUser(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: 1,
    platform: "telegram",
    platformUserId: "user-1",
    username: "alice",
    state: "active",
    persona: "companion",
    timezone: "Europe/Berlin",
    dailyMessageCount: 0,
    countWindowStart: null,
    lastInboundAt: null,
    lastOutboundAt: null,
    nextScheduledContact: null,
    unreachable: false,
    createdAt: 0,
    ...overrides,
  };
}

export function agentMessages(...texts: string[]): StoredMessage[] {
  return texts.map((text, i) => ({
    id: i + 1,
    userId: 1,
    sender: "agent",
    text,
    timestamp: i,
  }));
}

/** Config with test-friendly dispatch settings; everything else defaults. */
export function makeConfig(raw: Record<string, unknown> = {}): AmicusConfig {
  return parseConfig({
    dispatch: { storeRetryDelayMs: 1 },
    ...raw,
  });
}

export interface TempStore {
  store: SqliteConversationStore;
  dir: string;
  cleanup(): void;
}

export function createTempStore(maxMessagesPerUser = 0): TempStore {
  const dir = mkdtempSync(join(tmpdir(), "amicus-store-"));
  const store = new SqliteConversationStore(new StoreDB(resolveDatabasePath(dir)), { maxMessagesPerUser });
  return {
    store,
    dir,
    cleanup: () => {
      store.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
