import { z } from "zod";
import type { RetentionConfig } from "../config/types.js";
import {
  PLATFORMS,
  type MessageSender,
  type PersistedState,
  type StoredMessage,
  type UserKey,
  type UserRecord,
} from "../conversation/types.js";
import type { StoreDB } from "./db.js";
import type {
  ConversationStore,
  NewUserDefaults,
  SlotReservation,
} from "./types.js";

const userRowSchema = z
  .object({
    id: z.number().int(),
    platform: z.enum(PLATFORMS),
    platform_user_id: z.string(),
    username: z.string().nullable(),
    state: z.enum(["new", "awaiting_consent", "active", "paused"]),
    persona: z.string(),
    timezone: z.string(),
    daily_message_count: z.number().int(),
    count_window_start: z.string().nullable(),
    last_inbound_at: z.number().nullable(),
    last_outbound_at: z.number().nullable(),
    next_scheduled_contact: z.number().nullable(),
    unreachable: z.number().int(),
    created_at: z.number(),
  })
  .transform(
    (row): UserRecord => ({
      id: row.id,
      platform: row.platform,
      platformUserId: row.platform_user_id,
      username: row.username,
      state: row.state,
      persona: row.persona,
      timezone: row.timezone,
      dailyMessageCount: row.daily_message_count,
      countWindowStart: row.count_window_start,
      lastInboundAt: row.last_inbound_at,
      lastOutboundAt: row.last_outbound_at,
      nextScheduledContact: row.next_scheduled_contact,
      unreachable: row.unreachable !== 0,
      createdAt: row.created_at,
    }),
  );

const messageRowSchema = z
  .object({
    id: z.number().int(),
    user_id: z.number().int(),
    sender: z.enum(["user", "agent"]),
    text: z.string(),
    timestamp: z.number(),
  })
  .transform(
    (row): StoredMessage => ({
      id: row.id,
      userId: row.user_id,
      sender: row.sender,
      text: row.text,
      timestamp: row.timestamp,
    }),
  );

const counterRowSchema = z.object({
  daily_message_count: z.number().int(),
  count_window_start: z.string().nullable(),
});

const countSchema = z.object({ n: z.number().int() });

function parseUser(row: unknown): UserRecord | null {
  return row === undefined ? null : userRowSchema.parse(row);
}

export class SqliteConversationStore implements ConversationStore {
  private readonly db;

  constructor(
    private readonly storeDb: StoreDB,
    private readonly retention: RetentionConfig = { maxMessagesPerUser: 0 },
  ) {
    this.db = storeDb.raw();
  }

  // ── Users ──

  async getUser(key: UserKey): Promise<UserRecord | null> {
    const row = this.db
      .prepare("SELECT * FROM users WHERE platform = ? AND platform_user_id = ?")
      .get(key.platform, key.platformUserId);
    return parseUser(row);
  }

  async getUserById(id: number): Promise<UserRecord | null> {
    return parseUser(this.db.prepare("SELECT * FROM users WHERE id = ?").get(id));
  }

  async getOrCreateUser(
    key: UserKey,
    defaults: NewUserDefaults,
    now: number,
  ): Promise<UserRecord> {
    const row = this.db
      .prepare(
        `INSERT INTO users (platform, platform_user_id, username, persona, timezone, created_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(platform, platform_user_id)
           DO UPDATE SET username = COALESCE(excluded.username, users.username)
         RETURNING *`,
      )
      .get(
        key.platform,
        key.platformUserId,
        defaults.username,
        defaults.persona,
        defaults.timezone,
        now,
      );
    return userRowSchema.parse(row);
  }

  async setState(userId: number, state: PersistedState): Promise<void> {
    this.db.prepare("UPDATE users SET state = ? WHERE id = ?").run(state, userId);
  }

  async setNextContact(userId: number, at: number | null): Promise<void> {
    this.db
      .prepare("UPDATE users SET next_scheduled_contact = ? WHERE id = ?")
      .run(at, userId);
  }

  async setUnreachable(userId: number, unreachable: boolean): Promise<void> {
    this.db
      .prepare("UPDATE users SET unreachable = ? WHERE id = ?")
      .run(unreachable ? 1 : 0, userId);
  }

  // ── Counters ──

  async reserveDailySlot(
    userId: number,
    localDate: string,
    limit: number,
  ): Promise<SlotReservation> {
    const reserve = this.db.transaction((): SlotReservation => {
      const row = this.db
        .prepare("SELECT daily_message_count, count_window_start FROM users WHERE id = ?")
        .get(userId);
      if (row === undefined) return { reserved: false, count: 0 };

      const counters = counterRowSchema.parse(row);
      const count =
        counters.count_window_start === localDate ? counters.daily_message_count : 0;
      if (count >= limit) {
        return { reserved: false, count };
      }
      this.db
        .prepare(
          "UPDATE users SET daily_message_count = ?, count_window_start = ? WHERE id = ?",
        )
        .run(count + 1, localDate, userId);
      return { reserved: true, count: count + 1 };
    });
    // IMMEDIATE takes the write lock before the read
    return reserve.immediate();
  }

  async releaseDailySlot(userId: number, localDate: string): Promise<number> {
    const release = this.db.transaction((): number => {
      const row = this.db
        .prepare("SELECT daily_message_count, count_window_start FROM users WHERE id = ?")
        .get(userId);
      if (row === undefined) return 0;

      const counters = counterRowSchema.parse(row);
      if (counters.count_window_start !== localDate) return 0;
      const count = Math.max(0, counters.daily_message_count - 1);
      this.db.prepare("UPDATE users SET daily_message_count = ? WHERE id = ?").run(count, userId);
      return count;
    });
    return release.immediate();
  }

  // ── Messages ──

  async appendMessage(
    userId: number,
    sender: MessageSender,
    text: string,
    timestamp: number,
  ): Promise<StoredMessage> {
    const append = this.db.transaction((): StoredMessage => {
      const row = this.db
        .prepare(
          `INSERT INTO messages (user_id, sender, text, timestamp)
           VALUES (?, ?, ?, ?)
           RETURNING *`,
        )
        .get(userId, sender, text, timestamp);

      if (sender === "user") {
        this.db
          .prepare("UPDATE users SET last_inbound_at = ?, unreachable = 0 WHERE id = ?")
          .run(timestamp, userId);
      } else {
        this.db
          .prepare("UPDATE users SET last_outbound_at = ? WHERE id = ?")
          .run(timestamp, userId);
      }

      const keep = this.retention.maxMessagesPerUser;
      if (keep > 0) {
        this.db
          .prepare(
            `DELETE FROM messages WHERE user_id = ? AND id NOT IN (
               SELECT id FROM messages WHERE user_id = ? ORDER BY id DESC LIMIT ?
             )`,
          )
          .run(userId, userId, keep);
      }
      return messageRowSchema.parse(row);
    });
    return append();
  }

  async recentMessages(
    userId: number,
    limit: number,
    sender?: MessageSender,
  ): Promise<StoredMessage[]> {
    const bySender = sender ? "AND sender = ?" : "";
    const values: Array<number | string> = sender ? [userId, sender, limit] : [userId, limit];
    const rows = this.db
      .prepare(
        `SELECT * FROM (
           SELECT * FROM messages WHERE user_id = ? ${bySender} ORDER BY id DESC LIMIT ?
         ) ORDER BY id ASC`,
      )
      .all(...values);
    return rows.map((r) => messageRowSchema.parse(r));
  }

  async countMessages(userId: number): Promise<number> {
    const row = this.db
      .prepare("SELECT COUNT(*) AS n FROM messages WHERE user_id = ?")
      .get(userId);
    return countSchema.parse(row).n;
  }

  async deleteConversation(userId: number): Promise<boolean> {
    const result = this.db.prepare("DELETE FROM users WHERE id = ?").run(userId);
    return result.changes > 0;
  }

  // ── Scan ──

  async listDueUsers(now: number, limit: number): Promise<UserRecord[]> {
    const rows = this.db
      .prepare(
        `SELECT * FROM users
         WHERE state = 'active' AND unreachable = 0
           AND next_scheduled_contact IS NOT NULL
           AND next_scheduled_contact <= ?
         ORDER BY next_scheduled_contact ASC
         LIMIT ?`,
      )
      .all(now, limit);
    return rows.map((r) => userRowSchema.parse(r));
  }

  close(): void {
    this.storeDb.close();
  }
}
