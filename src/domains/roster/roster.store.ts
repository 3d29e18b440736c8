/**
 * Roster Store - owns every ChatRoster and their durable copy
 *
 * The whole collection is kept in memory and written to a single Redis key as
 * one JSON document. Each write replaces the document in full; writes are
 * serialized so a slower save can never overwrite a newer one.
 *
 * Writes are built from the committed records, never from the live rosters:
 * a chat's record only advances once the write carrying it has succeeded, so
 * a change that is rolled back can never reach Redis through another chat's
 * save.
 */
import { z } from "zod";
import { logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { KeyedLock } from "@src/shared/keyed-lock.js";
import { ChatRoster } from "./chat.roster.js";
import { decodeEntry, encodeEntry } from "./entry.codec.js";
import { formatRosterDate } from "./roster.format.js";
import type {
  ChatRosterState,
  PersistedChatRoster,
  PersistedRosterCollection,
  RosterActionResult,
} from "./roster.types.js";

const persistedChatRosterSchema = z.object({
  open: z.boolean(),
  date: z.string(),
  time: z.string(),
  field: z.string(),
  limit: z.number().int().min(0),
  users: z.array(z.string()),
});

const persistedCollectionSchema = z.record(persistedChatRosterSchema);

const WRITE_LOCK_KEY = "persist";

/** The slice of the Redis client the store needs */
export interface RosterStateBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export interface RosterStoreOptions {
  /** Redis key holding the serialized collection */
  stateKey: string;
  defaultTime: string;
  defaultVenue: string;
  /** Clock used for the default date of new rosters */
  now?: () => Date;
}

export interface RosterMutation {
  result: RosterActionResult;
  /** Detached copy of the roster after the operation */
  roster: ChatRoster;
}

export class RosterStore {
  private readonly rosters = new Map<string, ChatRoster>();
  /** Last successfully written record per chat */
  private readonly committed = new Map<string, PersistedChatRoster>();
  private readonly chatLock = new KeyedLock();
  private readonly writeLock = new KeyedLock();
  private readonly now: () => Date;

  constructor(
    private readonly redis: RosterStateBackend,
    private readonly options: RosterStoreOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.rosters.size;
  }

  /**
   * Roster for a chat, created with defaults on first touch.
   * Callers must not hold on to the returned instance across commands.
   */
  get(chatId: string): ChatRoster {
    let roster = this.rosters.get(chatId);
    if (!roster) {
      roster = new ChatRoster(this.defaultState());
      this.rosters.set(chatId, roster);
    }
    return roster;
  }

  /**
   * Load the stored collection, replacing anything in memory.
   * A missing key yields an empty store; a malformed document throws.
   *
   * @returns number of chats loaded
   */
  async loadOrEmpty(): Promise<number> {
    const raw = await this.redis.get(this.options.stateKey);
    this.rosters.clear();
    this.committed.clear();
    if (raw === null) {
      logger.info({ key: this.options.stateKey }, "No stored rosters, starting empty");
      return 0;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Stored roster state is not valid JSON: ${String(err)}`);
    }

    const collection = persistedCollectionSchema.safeParse(parsed);
    if (!collection.success) {
      throw new Error(
        `Stored roster state has an invalid shape: ${collection.error.message}`,
      );
    }

    for (const [chatId, record] of Object.entries(collection.data)) {
      this.rosters.set(chatId, new ChatRoster(fromPersisted(record)));
      this.committed.set(chatId, record);
    }
    logger.info({ chats: this.rosters.size }, "Rosters loaded");
    return this.rosters.size;
  }

  /** Overwrite the stored collection with the committed records */
  async persist(): Promise<void> {
    await this.writeLock.run(WRITE_LOCK_KEY, async () => {
      await this.redis.set(this.options.stateKey, JSON.stringify(this.serialize()));
    });
  }

  /**
   * Run one roster operation under the chat's exclusive lock and persist it
   * when it succeeds. If the write fails the roster is rolled back and the
   * error propagates.
   */
  async mutate(
    chatId: string,
    operation: (roster: ChatRoster) => RosterActionResult,
  ): Promise<RosterMutation> {
    return this.chatLock.run(chatId, async () => {
      const roster = this.get(chatId);
      const before = roster.snapshot();
      const result = operation(roster);

      if (result.success) {
        try {
          await this.commit(chatId, toPersisted(roster.snapshot()));
        } catch (err) {
          this.rosters.set(chatId, new ChatRoster(before));
          metrics.rosterPersistFailures.inc();
          logger.error({ err, chatId }, "Failed to persist rosters, change rolled back");
          throw err;
        }
      }

      return { result, roster: new ChatRoster(roster.snapshot()) };
    });
  }

  /** Detached copy of a chat's roster, read under its lock */
  async view(chatId: string): Promise<ChatRoster> {
    return this.chatLock.run(chatId, () => new ChatRoster(this.get(chatId).snapshot()));
  }

  /** The collection as it was last written */
  serialize(): PersistedRosterCollection {
    return Object.fromEntries(this.committed);
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────

  /** Write the committed records with one chat's record replaced */
  private async commit(chatId: string, record: PersistedChatRoster): Promise<void> {
    await this.writeLock.run(WRITE_LOCK_KEY, async () => {
      const collection = { ...this.serialize(), [chatId]: record };
      await this.redis.set(this.options.stateKey, JSON.stringify(collection));
      this.committed.set(chatId, record);
    });
  }

  private defaultState(): ChatRosterState {
    return {
      open: false,
      date: formatRosterDate(this.now()),
      time: this.options.defaultTime,
      venue: this.options.defaultVenue,
      limit: 0,
      entries: [],
    };
  }
}

export function toPersisted(state: ChatRosterState): PersistedChatRoster {
  return {
    open: state.open,
    date: state.date,
    time: state.time,
    field: state.venue,
    limit: state.limit,
    users: state.entries.map(encodeEntry),
  };
}

export function fromPersisted(record: PersistedChatRoster): ChatRosterState {
  return {
    open: record.open,
    date: record.date,
    time: record.time,
    venue: record.field,
    limit: record.limit,
    entries: record.users.map(decodeEntry),
  };
}
