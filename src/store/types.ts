import type {
  MessageSender,
  PersistedState,
  StoredMessage,
  UserKey,
  UserRecord,
} from "../conversation/types.js";

export interface NewUserDefaults {
  readonly username: string | null;
  readonly timezone: string;
  readonly persona: string;
}

export interface SlotReservation {
  readonly reserved: boolean;
  /** Count in the current local-date window after the call. */
  readonly count: number;
}

/**
 * Durable state for users, their conversation and counters. Async so that
 * remote stores fit behind it; callers serialize writes per user.
 */
export interface ConversationStore {
  getUser(key: UserKey): Promise<UserRecord | null>;
  getUserById(id: number): Promise<UserRecord | null>;
  /** Creates the user in state "new", or refreshes the username of an existing one. */
  getOrCreateUser(key: UserKey, defaults: NewUserDefaults, now: number): Promise<UserRecord>;
  setState(userId: number, state: PersistedState): Promise<void>;
  setNextContact(userId: number, at: number | null): Promise<void>;
  setUnreachable(userId: number, unreachable: boolean): Promise<void>;
  /**
   * Atomically rolls the window over when `localDate` differs from the
   * stored one, then takes a slot if the count is below `limit`.
   */
  reserveDailySlot(userId: number, localDate: string, limit: number): Promise<SlotReservation>;
  /**
   * Gives back a slot taken for a send that did not go out. Only touches the
   * window for `localDate`; returns the count afterwards.
   */
  releaseDailySlot(userId: number, localDate: string): Promise<number>;
  /** User messages also clear the unreachable flag. */
  appendMessage(
    userId: number,
    sender: MessageSender,
    text: string,
    timestamp: number,
  ): Promise<StoredMessage>;
  /** Latest `limit` messages, oldest first, optionally from one sender only. */
  recentMessages(userId: number, limit: number, sender?: MessageSender): Promise<StoredMessage[]>;
  countMessages(userId: number): Promise<number>;
  /** Removes the user row with its whole history. */
  deleteConversation(userId: number): Promise<boolean>;
  /** Active, reachable users whose next contact is at or before `now`, earliest first. */
  listDueUsers(now: number, limit: number): Promise<UserRecord[]>;
  close(): void;
}
