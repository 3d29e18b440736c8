/**
 * Roster domain types
 */
import type { ErrorCode } from "@src/shared/errors.js";

/** Most guests a single host may bring */
export const MAX_GUESTS_PER_HOST = 5;

export interface RosterEntry {
  hostDisplay: string;
  hostPresent: boolean;
  guestCount: number;
}

/** Caller identity as asserted by the chat gateway */
export interface RosterIdentity {
  displayName: string;
  handle?: string;
}

export interface ChatRosterState {
  open: boolean;
  /** DD/MM/YY */
  date: string;
  /** HH:MM-HH:MM */
  time: string;
  venue: string;
  /** 0 means unlimited */
  limit: number;
  entries: RosterEntry[];
}

/**
 * Durable record of one chat, as stored under the roster state key.
 * `users` holds codec-encoded entries.
 */
export interface PersistedChatRoster {
  open: boolean;
  date: string;
  time: string;
  field: string;
  limit: number;
  users: string[];
}

export type PersistedRosterCollection = Record<string, PersistedChatRoster>;

export type RosterErrorCategory =
  | "validation"
  | "capacity"
  | "conflict"
  | "not_found";

export type RosterOutcome =
  | "OPENED"
  | "CLOSED"
  | "LIMIT_SET"
  | "DATE_SET"
  | "TIME_SET"
  | "VENUE_SET"
  | "ENTRIES_REMOVED"
  | "RESET"
  | "JOINED"
  | "HOST_RESTORED"
  | "LEFT"
  | "LEFT_GUESTS_KEPT"
  | "GUESTS_ADDED"
  | "GUESTS_REMOVED"
  | "GUEST_ONLY_REMOVED";

export type RosterFailure = {
  success: false;
  error: ErrorCode;
  category: RosterErrorCategory;
  /** Present on capacity failures caused by the chat limit */
  limit?: number;
};

export type RosterSuccess = {
  success: true;
  outcome: RosterOutcome;
  /** Change in occupied slots caused by this operation */
  slotDelta: number;
  /** Entries dropped by removeByKey */
  removed?: number;
  /** Fields `open` could not apply */
  rejectedFields?: Array<"date" | "time">;
};

export type RosterActionResult = RosterSuccess | RosterFailure;
